import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { pinoHttp } from "pino-http";
import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import { Readable } from "node:stream";
import type { HttpServer, RequestLike, ResponseLike, HttpHandler } from "./http-server.js";
import {
  contentLength,
  createContext,
  makeRequest,
  type Body,
  type Handler,
  type ObjectConstraints,
  type ProxyResponse,
} from "./pipeline.js";
import { unquote } from "./path.js";
import { createRequestLogger, type Logger } from "../observability/logger.js";

export interface ExpressServerOptions {
  /** Installed into every request context. */
  constraints?: ObjectConstraints;
  logger?: Logger;
}

function toHeaders(raw: Request["headers"]): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw)) {
    if (value == null) continue;
    for (const v of Array.isArray(value) ? value : [value]) headers.append(key, v);
  }
  return headers;
}

function requestBody(req: Request): Body {
  const te = req.headers["transfer-encoding"];
  if (te && te.toLowerCase().includes("chunked")) return req;
  const length = Number(req.headers["content-length"] ?? "0");
  return length > 0 ? req : null;
}

function writeProxyResponse(req: Request, res: Response, out: ProxyResponse) {
  res.status(out.status);
  out.headers.forEach((value, key) => {
    if (key === "set-cookie") res.append(key, value);
    else res.setHeader(key, value);
  });
  const body = out.body;
  if (body == null || req.method === "HEAD") {
    if (body instanceof Readable) body.destroy();
    if (req.method !== "HEAD" && contentLength(out.headers) == null) res.setHeader("Content-Length", "0");
    res.end();
    return;
  }
  if (Buffer.isBuffer(body)) {
    res.end(body);
    return;
  }
  res.once("close", () => {
    if (!body.destroyed) body.destroy();
  });
  body.once("error", (err: Error) => {
    req.log.error({ err }, "Response stream failed");
    res.destroy(err);
  });
  body.pipe(res);
}

export function createExpressServer(opts: ExpressServerOptions = {}): HttpServer {
  const app = express();
  app.disable("x-powered-by");
  app.use(
    pinoHttp({
      logger: opts.logger ?? createRequestLogger(),
      genReqId: (req) => {
        const trans = req.headers["x-trans-id"];
        return typeof trans === "string" && trans ? trans : randomUUID();
      },
    }),
  );
  let server: Server | undefined;
  let errorHandlerInstalled = false;

  // Basic JSON error handler; installed after the routes so it sees their errors.
  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
    req.log.error({ err }, "Unhandled error");
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(status).json({ status: "error", code: "INTERNAL", message });
  };
  const installErrorHandler = () => {
    if (errorHandlerInstalled) return;
    app.use(errorHandler);
    errorHandlerInstalled = true;
  };

  const wrap = (h: HttpHandler) => (req: Request, res: Response, next: NextFunction) => {
    const reqAdapter: RequestLike = {
      params: req.params,
      query: req.query,
      headers: req.headers,
      ip: req.ip,
      userAgent: req.headers["user-agent"],
    };
    const resAdapter: ResponseLike = {
      status(code: number) {
        res.status(code);
        return this;
      },
      json(payload: unknown) {
        res.json(payload);
      },
      header(name: string, value: string | string[]) {
        res.setHeader(name, value);
        return this;
      },
    };
    Promise.resolve(h(reqAdapter, resAdapter)).catch(next);
  };

  const proxy = (handler: Handler) => (req: Request, res: Response, next: NextFunction) => {
    const url = new URL(req.originalUrl, "http://proxy.invalid");
    const proxyReq = makeRequest({
      method: req.method,
      path: unquote(url.pathname),
      query: url.searchParams,
      headers: toHeaders(req.headers),
      body: requestBody(req),
      ctx: createContext({ requestId: String(req.id), constraints: opts.constraints }),
    });
    handler(proxyReq)
      .then((out) => writeProxyResponse(req, res, out))
      .catch(next);
  };

  return {
    get: (p, h) => {
      app.get(p, wrap(h));
    },
    mount: (handler) => {
      app.use(proxy(handler));
      installErrorHandler();
    },
    listen: (port) =>
      new Promise((resolve, reject) => {
        installErrorHandler();
        const s = app.listen(port, () => {
          const addr = s.address();
          resolve(typeof addr === "object" && addr !== null ? addr.port : port);
        });
        s.once("error", reject);
        server = s;
      }),
    close: () =>
      new Promise((resolve, reject) => {
        if (!server) {
          resolve();
          return;
        }
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
