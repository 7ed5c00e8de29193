import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import {
  contentLength,
  type Handler,
  type Middleware,
  type ProxyRequest,
  type ProxyResponse,
} from "../http/pipeline.js";
import { parseObjectPath, quote, type ObjectPath } from "../http/path.js";
import { HttpError } from "../internal/errors.js";
import { createCopyLogger, type Logger } from "../observability/logger.js";
import { CopyOrchestrator } from "./orchestrator.js";
import { handleOptions } from "./options.js";
import { checkAccountFormat, checkCopyFromHeader, checkDestinationHeader } from "./validate.js";

export interface ServerSideCopyOptions {
  /** Turn object POSTs into copy-onto-self so sync mechanisms observe a fresh write. */
  objectPostAsCopy?: boolean;
  maxFileSize?: number;
  logger?: Logger;
}

function hasBody(req: ProxyRequest): boolean {
  const te = req.headers.get("transfer-encoding");
  if (te && te.toLowerCase().includes("chunked")) return true;
  const length = contentLength(req.headers);
  return length != null && length !== 0;
}

const zeroBodyError = () => HttpError.badRequest("Copy requests require a zero byte body");

/**
 * Classifies object requests as copy-PUT, COPY, POST-as-copy or OPTIONS and
 * rewrites them into the canonical PUT + `X-Copy-From` form.
 */
export function createServerSideCopyMiddleware(opts: ServerSideCopyOptions = {}): Middleware {
  const objectPostAsCopy = opts.objectPostAsCopy ?? true;
  const logger = opts.logger ?? createCopyLogger();

  return (next: Handler): Handler => {
    const orchestrator = new CopyOrchestrator({ next, maxFileSize: opts.maxFileSize, logger });

    async function handlePut(req: ProxyRequest, path: ObjectPath): Promise<ProxyResponse> {
      if (hasBody(req)) return zeroBodyError().toResponse();

      if ((req.ctx.origMethod ?? req.method) !== "POST") {
        req.ctx.logInfo.push(`x-copy-from:${req.headers.get("x-copy-from")}`);
      }

      let sourceAccount = path.account;
      const fromAccount = req.headers.get("x-copy-from-account");
      if (fromAccount != null) {
        const checked = checkAccountFormat(fromAccount);
        if (isErr(checked)) return unwrapErr(checked).toResponse();
        sourceAccount = unwrapOk(checked);
      }
      const source = checkCopyFromHeader(req.headers);
      if (isErr(source)) return unwrapErr(source).toResponse();
      const { container, object } = unwrapOk(source);

      const sourcePath: ObjectPath = { version: path.version, account: sourceAccount, container, object };
      logger.debug(
        { requestId: req.ctx.requestId, logInfo: req.ctx.logInfo, dest: req.path },
        "Server-side copy",
      );
      return orchestrator.copy(sourcePath, req);
    }

    async function handleCopy(req: ProxyRequest, path: ObjectPath): Promise<ProxyResponse> {
      if (!req.headers.get("destination")) {
        return HttpError.preconditionFailed("Destination header required").toResponse();
      }
      if (hasBody(req)) return zeroBodyError().toResponse();

      let destAccount = path.account;
      const destinationAccount = req.headers.get("destination-account");
      if (destinationAccount != null) {
        const checked = checkAccountFormat(destinationAccount);
        if (isErr(checked)) return unwrapErr(checked).toResponse();
        destAccount = unwrapOk(checked);
        req.headers.set("X-Copy-From-Account", path.account);
        req.headers.delete("Destination-Account");
      }
      const dest = checkDestinationHeader(req.headers);
      if (isErr(dest)) return unwrapErr(dest).toResponse();
      const { container, object } = unwrapOk(dest);

      const source = `/${path.container}/${path.object}`;
      // Rewrite in place so the backend routes by the destination container.
      req.method = "PUT";
      req.path = `/${path.version}/${destAccount}/${container}/${object}`;
      req.headers.set("Content-Length", "0");
      req.headers.set("X-Copy-From", quote(source));
      req.headers.delete("Destination");
      return handlePut(req, { version: path.version, account: destAccount, container, object });
    }

    async function handlePostAsCopy(req: ProxyRequest, path: ObjectPath): Promise<ProxyResponse> {
      req.method = "PUT";
      req.headers.set("Content-Length", "0");
      req.headers.delete("Transfer-Encoding");
      req.headers.set("X-Copy-From", quote(`/${path.container}/${path.object}`));
      req.ctx.postAsCopy = true;
      return handlePut(req, path);
    }

    return async (req) => {
      const path = parseObjectPath(req.path);
      if (!path) return next(req);

      req.ctx.origMethod ??= req.method;

      if (req.method === "PUT" && req.headers.get("x-copy-from")) {
        return handlePut(req, path);
      }
      if (req.method === "COPY") return handleCopy(req, path);
      if (req.method === "POST" && objectPostAsCopy) return handlePostAsCopy(req, path);
      if (req.method === "OPTIONS") return handleOptions(next, req);
      return next(req);
    };
  };
}
