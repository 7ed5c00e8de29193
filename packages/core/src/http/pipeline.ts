import { Readable } from "node:stream";
import type { HttpError } from "../internal/errors.js";

export type Body = Buffer | Readable | null;

/**
 * Lets an outer middleware substitute what a copy actually reads, e.g. so that
 * copying a large-object manifest produces the assembled content.
 */
export type CopyHook = (
  sourceReq: ProxyRequest,
  sourceResp: ProxyResponse,
  req: ProxyRequest,
) => Promise<ProxyResponse>;

export interface ObjectConstraints {
  validateObjectCreation(name: string, length: number | null): HttpError | null;
}

/** Per-request orchestration state, cloned into every sub-request. */
export interface RequestContext {
  requestId?: string;
  /** Method the client sent, before any rewriting. */
  origMethod?: string;
  postAsCopy: boolean;
  copyHook?: CopyHook;
  constraints?: ObjectConstraints;
  logInfo: string[];
}

export interface ProxyRequest {
  method: string;
  /** Decoded path, e.g. `/v1/AUTH_test/photos/2024/a.jpg`. */
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: Body;
  ctx: RequestContext;
}

export interface ProxyResponse {
  status: number;
  headers: Headers;
  body: Body;
}

export type Handler = (req: ProxyRequest) => Promise<ProxyResponse>;
export type Middleware = (next: Handler) => Handler;

/** Builds a handler chain; the first middleware is the outermost. */
export function compose(middlewares: Middleware[], terminal: Handler): Handler {
  return middlewares.reduceRight<Handler>((next, mw) => mw(next), terminal);
}

export function createContext(init: Partial<RequestContext> = {}): RequestContext {
  return { postAsCopy: false, logInfo: [], ...init };
}

export interface ProxyRequestInit {
  method: string;
  path: string;
  query?: URLSearchParams | string;
  headers?: Headers | Record<string, string>;
  body?: Body;
  ctx?: RequestContext;
}

export function makeRequest(init: ProxyRequestInit): ProxyRequest {
  return {
    method: init.method.toUpperCase(),
    path: init.path,
    query: new URLSearchParams(init.query ?? ""),
    headers: new Headers(init.headers),
    body: init.body ?? null,
    ctx: init.ctx ?? createContext(),
  };
}

/**
 * Copies a request for use as a sub-request. Headers, query and context are
 * duplicated; the body is shared unless overridden.
 */
export function cloneRequest(
  req: ProxyRequest,
  overrides: Partial<Omit<ProxyRequest, "ctx">> = {},
): ProxyRequest {
  return {
    method: overrides.method ?? req.method,
    path: overrides.path ?? req.path,
    query: new URLSearchParams(overrides.query ?? req.query),
    headers: new Headers(overrides.headers ?? req.headers),
    body: overrides.body === undefined ? req.body : overrides.body,
    ctx: { ...req.ctx },
  };
}

export function makeResponse(
  status: number,
  headers?: Headers | Record<string, string>,
  body: Body = null,
): ProxyResponse {
  return { status, headers: new Headers(headers), body };
}

export function textResponse(
  status: number,
  text: string,
  headers?: Record<string, string>,
): ProxyResponse {
  const body = Buffer.from(text, "utf8");
  const res = makeResponse(status, headers, body);
  res.headers.set("Content-Type", "text/plain; charset=utf-8");
  res.headers.set("Content-Length", String(body.length));
  return res;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Declared length, or null when absent or not a non-negative integer. */
export function contentLength(headers: Headers): number | null {
  const raw = headers.get("content-length");
  if (raw == null || !/^\d+$/.test(raw.trim())) return null;
  return Number(raw.trim());
}

export function headerEntries(headers: Headers): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  headers.forEach((value, key) => out.push([key, value]));
  return out;
}

export async function readBody(body: Body): Promise<Buffer> {
  if (body == null) return Buffer.alloc(0);
  if (Buffer.isBuffer(body)) return body;
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function toReadable(body: Body): Readable {
  if (body == null) return Readable.from([]);
  if (Buffer.isBuffer(body)) return Readable.from([body]);
  return body;
}

/** Releases a response body nobody is going to read. */
export function discardBody(res: ProxyResponse): void {
  if (res.body instanceof Readable) res.body.destroy();
}
