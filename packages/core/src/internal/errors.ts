import { textResponse, type ProxyResponse } from "../http/pipeline.js";

export type HttpErrorKind =
  | "BAD_REQUEST"
  | "PRECONDITION_FAILED"
  | "ENTITY_TOO_LARGE";

export interface HttpErrorOptions {
  kind: HttpErrorKind;
  status: number;
  message: string;
  headers?: Record<string, string>;
}

/**
 * A client-facing failure produced by the proxy itself rather than the backend.
 * Converted into a plain-text response at the edge of each middleware.
 */
export class HttpError extends Error {
  readonly kind: HttpErrorKind;
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(opts: HttpErrorOptions) {
    super(opts.message);
    this.name = "HttpError";
    this.kind = opts.kind;
    this.status = opts.status;
    this.headers = opts.headers ?? {};
  }

  toResponse(): ProxyResponse {
    return textResponse(this.status, this.message, this.headers);
  }

  static badRequest(message: string, headers?: Record<string, string>) {
    return new HttpError({ kind: "BAD_REQUEST", status: 400, message, headers });
  }

  static preconditionFailed(message: string, headers?: Record<string, string>) {
    return new HttpError({ kind: "PRECONDITION_FAILED", status: 412, message, headers });
  }

  static entityTooLarge(message = "Your request is too large.", headers?: Record<string, string>) {
    return new HttpError({ kind: "ENTITY_TOO_LARGE", status: 413, message, headers });
  }
}
