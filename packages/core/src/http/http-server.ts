import type { Handler } from "./pipeline.js";

export interface RequestLike {
  params?: unknown;
  query?: unknown;
  headers?: Record<string, string | string[] | undefined>;
  ip?: string;
  userAgent?: string;
}

export interface ResponseLike {
  status(code: number): ResponseLike;
  json(payload: unknown): void;
  header(name: string, value: string | string[]): ResponseLike;
}

export type HttpHandler = (req: RequestLike, res: ResponseLike) => Promise<void> | void;

export interface HttpServer {
  get(path: string, handler: HttpHandler): void;
  /** Routes every request not claimed by a `get` route through the proxy pipeline. */
  mount(handler: Handler): void;
  /** Resolves with the bound port; pass 0 for an ephemeral one. */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
}
