import {
  cloneRequest,
  contentLength,
  discardBody,
  isSuccess,
  type Handler,
  type ProxyRequest,
  type ProxyResponse,
} from "../http/pipeline.js";
import { objectPath, parseObjectPath, quote, type ObjectPath } from "../http/path.js";
import { HttpError } from "../internal/errors.js";
import { configTrueValue } from "../internal/values.js";
import { createCopyLogger, type Logger } from "../observability/logger.js";
import {
  copyHeadersInto,
  copyHeaderSubset,
  isSysMeta,
  metadataHeaders,
  removeItems,
} from "./metadata.js";

/** Swift's default single-object limit: 5 GiB + 2 bytes. */
export const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024 * 1024 + 2;

export interface CopyOrchestratorOptions {
  next: Handler;
  maxFileSize?: number;
  logger?: Logger;
}

const passThroughHook = async (
  _sourceReq: ProxyRequest,
  sourceResp: ProxyResponse,
): Promise<ProxyResponse> => sourceResp;

function unquoteEtag(etag: string | null): string | null {
  if (!etag) return null;
  return etag.replace(/^"(.*)"$/, "$1");
}

/**
 * Performs a server-side copy: one GET sub-request for the source and one PUT
 * sub-request for the destination, then folds provenance into the response.
 */
export class CopyOrchestrator {
  private readonly next: Handler;
  private readonly maxFileSize: number;
  private readonly logger: Logger;

  constructor(opts: CopyOrchestratorOptions) {
    this.next = opts.next;
    this.maxFileSize = opts.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.logger = opts.logger ?? createCopyLogger();
  }

  async copy(sourcePath: ObjectPath, req: ProxyRequest): Promise<ProxyResponse> {
    const sourceResp = await this.getSourceObject(sourcePath, req);
    if (sourceResp.status >= 300) {
      this.logger.debug(
        { source: objectPath(sourcePath), status: sourceResp.status },
        "Copy source fetch did not succeed",
      );
      return sourceResp;
    }

    const length = contentLength(sourceResp.headers);
    const destination = parseObjectPath(req.path);
    const violation =
      destination && req.ctx.constraints?.validateObjectCreation(destination.object, length);
    if (violation) {
      discardBody(sourceResp);
      return violation.toResponse();
    }

    const sink = cloneRequest(req, { method: "PUT", body: sourceResp.body });
    sink.headers.set("Content-Length", String(length ?? 0));
    sink.headers.delete("Transfer-Encoding");
    const etag = unquoteEtag(sourceResp.headers.get("etag"));
    if (etag) sink.headers.set("ETag", etag);
    else sink.headers.delete("ETag");

    sink.headers.delete("X-Copy-From");
    sink.headers.delete("X-Copy-From-Account");

    if (!req.headers.get("content-type")) {
      const sourceType = sourceResp.headers.get("content-type");
      if (sourceType) sink.headers.set("Content-Type", sourceType);
    }

    const freshMetadata = configTrueValue(sink.headers.get("x-fresh-metadata"));
    if (freshMetadata || req.ctx.postAsCopy) {
      const condition = (k: string) => isSysMeta("object", k);
      removeItems(sink.headers, condition);
      copyHeaderSubset(sourceResp.headers, sink.headers, condition);
    } else {
      copyHeadersInto(sourceResp.headers, sink.headers);
      copyHeadersInto(req.headers, sink.headers);
    }

    const manifest = sourceResp.headers.get("x-static-large-object");
    if (
      manifest != null &&
      (req.query.get("multipart-manifest") === "get" || req.ctx.postAsCopy)
    ) {
      sink.headers.set("X-Static-Large-Object", manifest);
    }

    const respHeaders = this.createResponseHeaders(sourcePath, sourceResp, sink);
    return this.sendPutRequest(sink, respHeaders);
  }

  private async getSourceObject(
    sourcePath: ObjectPath,
    req: ProxyRequest,
  ): Promise<ProxyResponse> {
    const sourceReq = cloneRequest(req, {
      method: "GET",
      path: objectPath(sourcePath),
      body: null,
    });
    sourceReq.headers.delete("X-Backend-Storage-Policy-Index");
    sourceReq.headers.delete("Content-Length");
    sourceReq.headers.set("X-Newest", "true");

    const fetched = await this.next(sourceReq);
    const hook = req.ctx.copyHook ?? passThroughHook;
    const sourceResp = await hook(sourceReq, fetched, req);

    const length = contentLength(sourceResp.headers);
    if (length == null || length > this.maxFileSize) {
      // Chunked sources (unknown length) are refused rather than buffered.
      discardBody(sourceResp);
      this.logger.info(
        { source: objectPath(sourcePath), length, maxFileSize: this.maxFileSize },
        "Refusing copy of oversized or unsized source",
      );
      return HttpError.entityTooLarge().toResponse();
    }
    return sourceResp;
  }

  private createResponseHeaders(
    sourcePath: ObjectPath,
    sourceResp: ProxyResponse,
    sink: ProxyRequest,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      "X-Copied-From-Account": quote(sourcePath.account),
      "X-Copied-From": quote(`${sourcePath.container}/${sourcePath.object}`),
    };
    const lastModified = sourceResp.headers.get("last-modified");
    if (lastModified) headers["X-Copied-From-Last-Modified"] = lastModified;
    return { ...headers, ...metadataHeaders(sink.headers) };
  }

  private async sendPutRequest(
    sink: ProxyRequest,
    respHeaders: Record<string, string>,
  ): Promise<ProxyResponse> {
    const resp = await this.next(sink);
    if (isSuccess(resp.status)) {
      for (const [key, value] of Object.entries(respHeaders)) {
        resp.headers.set(key, value);
      }
    }
    // Older releases answered object POSTs with 202; keep that for post-as-copy.
    if (sink.ctx.origMethod === "POST" && resp.status === 201) {
      return { ...resp, status: 202 };
    }
    return resp;
  }
}
