import { Agent, request, type Dispatcher } from "undici";
import { encodePath } from "../http/path.js";
import { headerEntries, makeResponse, textResponse, type ProxyRequest } from "../http/pipeline.js";
import { createBackendLogger } from "../observability/logger.js";
import type { Backend } from "./types.js";

const HTTP_METHODS = ["GET", "HEAD", "PUT", "POST", "DELETE", "OPTIONS", "PATCH"] as const;
type ForwardedMethod = (typeof HTTP_METHODS)[number];

function isForwardedMethod(method: string): method is ForwardedMethod {
  return (HTTP_METHODS as readonly string[]).includes(method);
}

// Connection-scoped headers are set by each hop itself.
const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "host",
  "expect",
  "te",
  "trailer",
  "proxy-connection",
]);

export function backendUrl(baseUrl: string, req: Pick<ProxyRequest, "path" | "query">): string {
  const qs = req.query.toString();
  return `${baseUrl.replace(/\/+$/, "")}${encodePath(req.path)}${qs ? `?${qs}` : ""}`;
}

function outgoingHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of headerEntries(headers)) {
    if (!HOP_BY_HOP.has(key)) out[key] = value;
  }
  return out;
}

function incomingHeaders(headers: Dispatcher.ResponseData["headers"]): Headers {
  const out = new Headers();
  for (const [key, value] of Object.entries(headers)) {
    if (value == null || HOP_BY_HOP.has(key)) continue;
    for (const v of Array.isArray(value) ? value : [value]) out.append(key, v);
  }
  return out;
}

export interface HttpBackendOptions {
  baseUrl: string;
  dispatcher?: Dispatcher;
}

/** Forwards every request to a Swift-compatible endpoint, streaming bodies both ways. */
export function createHttpBackend(opts: HttpBackendOptions): Backend {
  const log = createBackendLogger("http");
  const ownsDispatcher = opts.dispatcher === undefined;
  const dispatcher = opts.dispatcher ?? new Agent();

  return {
    name: "http",
    async handle(req) {
      if (!isForwardedMethod(req.method)) {
        return textResponse(405, "Method Not Allowed", { Allow: HTTP_METHODS.join(", ") });
      }
      const url = backendUrl(opts.baseUrl, req);
      const res = await request(url, {
        method: req.method,
        headers: outgoingHeaders(req.headers),
        body: req.method === "GET" || req.method === "HEAD" ? null : req.body,
        dispatcher,
      });
      log.debug({ method: req.method, path: req.path, status: res.statusCode }, "Backend response");
      return makeResponse(res.statusCode, incomingHeaders(res.headers), res.body);
    },
    async close() {
      if (ownsDispatcher) await dispatcher.close();
    },
  };
}
