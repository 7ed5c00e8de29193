import { createErr, createOk, isErr, unwrapErr, unwrapOk, type Result } from "option-t/plain_result";
import {
  cloneRequest,
  discardBody,
  isSuccess,
  type Handler,
  type ProxyRequest,
  type ProxyResponse,
} from "../http/pipeline.js";
import { objectPath, quote, type ObjectPath } from "../http/path.js";
import { userMetaPrefix } from "../copy/metadata.js";
import { normalizeTimestamp } from "../internal/values.js";
import type { DriverRegistry } from "../drivers/registry.js";
import type { MigrationDriver, SourceObject } from "../drivers/types.js";
import { createMigrationLogger, type Logger } from "../observability/logger.js";
import { MigrationError } from "./errors.js";
import { resolveDriver, type ResolvedDriver } from "./resolver.js";

export const IMPORTED_AT_HEADER = "X-Object-Sysmeta-Migration-Imported-At";
export const IMPORTED_FROM_HEADER = "X-Object-Sysmeta-Migration-Imported-From";

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

// Request headers that describe the client's read and must not leak into the upload.
const DROPPED_ON_UPLOAD = /^(range|if-.*|content-.*|transfer-encoding|etag|x-newest|x-container-migration-.*)$/;

/**
 * Source metadata as object user-metadata headers. Names already carrying the
 * object-meta prefix are kept; names that cannot be header names are dropped.
 */
export function toObjectMetaHeaders(metadata: Record<string, string>): Record<string, string> {
  const prefix = userMetaPrefix("object");
  const out: Record<string, string> = {};
  for (const [rawKey, rawValue] of Object.entries(metadata)) {
    const key = rawKey.toLowerCase();
    const name = key.startsWith(prefix) ? key : prefix + key;
    if (!TOKEN.test(name)) continue;
    out[name] = String(rawValue).replace(/[\r\n\0]+/g, " ").trim();
  }
  return out;
}

export interface DataMigratorOptions {
  next: Handler;
  registry: DriverRegistry;
  logger?: Logger;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

/** Pulls a missing object from its external source into the local backend, then replays the read. */
export class DataMigrator {
  private readonly next: Handler;
  private readonly registry: DriverRegistry;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: DataMigratorOptions) {
    this.next = opts.next;
    this.registry = opts.registry;
    this.logger = opts.logger ?? createMigrationLogger();
    this.now = opts.now ?? Date.now;
  }

  async migrate(
    original: ProxyRequest,
    path: ObjectPath,
    containerMd: Record<string, string>,
  ): Promise<Result<ProxyResponse, MigrationError>> {
    const imported = await this.importObject(original, path, containerMd);
    if (isErr(imported)) return imported;
    return createOk(await this.next(cloneRequest(original)));
  }

  private async importObject(
    original: ProxyRequest,
    path: ObjectPath,
    containerMd: Record<string, string>,
  ): Promise<Result<void, MigrationError>> {
    let resolved: Result<ResolvedDriver, MigrationError>;
    try {
      resolved = await resolveDriver(this.registry, containerMd);
    } catch (e) {
      return createErr(MigrationError.validation((e as Error).message));
    }
    if (isErr(resolved)) return resolved;
    const { driver, provider, source } = unwrapOk(resolved);

    try {
      const fetched = await driver.fetchObject(path.object);
      if (isErr(fetched)) return createErr(MigrationError.fromDriver("FETCH", unwrapErr(fetched)));
      const obj = unwrapOk(fetched);
      if (obj.body == null) {
        return createErr(MigrationError.fetch(`Object ${path.object} not found at ${provider} source`));
      }

      const violation = original.ctx.constraints?.validateObjectCreation(path.object, obj.size);
      if (violation) return createErr(MigrationError.validation(violation.message, violation.status));

      const upload = this.buildUploadRequest(original, path, obj, `${provider}:${source}`);
      let uploadResp: ProxyResponse;
      try {
        uploadResp = await this.next(upload);
      } catch (e) {
        return createErr(
          MigrationError.upload(`Failed to create local object: ${(e as Error).message}`),
        );
      }
      discardBody(uploadResp);
      if (!isSuccess(uploadResp.status)) {
        return createErr(
          MigrationError.upload(`Failed to create local object. Status ${uploadResp.status}`),
        );
      }
      this.logger.info(
        { requestId: original.ctx.requestId, object: objectPath(path), provider, size: obj.size },
        "Migrated object from external source",
      );
      return createOk(undefined);
    } catch (e) {
      return createErr(MigrationError.validation((e as Error).message));
    } finally {
      await this.finalize(driver, original);
    }
  }

  private async finalize(driver: MigrationDriver, original: ProxyRequest): Promise<void> {
    try {
      await driver.finalize();
    } catch (e) {
      this.logger.warn(
        { requestId: original.ctx.requestId, err: (e as Error).message },
        "Driver cleanup failed",
      );
    }
  }

  private buildUploadRequest(
    original: ProxyRequest,
    path: ObjectPath,
    obj: SourceObject,
    origin: string,
  ): ProxyRequest {
    const put = cloneRequest(original, {
      method: "PUT",
      path: objectPath(path),
      query: new URLSearchParams(),
      body: obj.body,
    });
    for (const [name] of [...put.headers]) {
      if (DROPPED_ON_UPLOAD.test(name)) put.headers.delete(name);
    }
    if (obj.size != null) put.headers.set("Content-Length", String(obj.size));
    else put.headers.set("Transfer-Encoding", "chunked");
    if (obj.contentType) put.headers.set("Content-Type", obj.contentType);
    for (const [name, value] of Object.entries(toObjectMetaHeaders(obj.metadata))) {
      put.headers.set(name, value);
    }

    const nowSeconds = this.now() / 1000;
    const sourceSeconds =
      obj.timestamp != null && Number.isFinite(obj.timestamp) ? obj.timestamp : nowSeconds;
    put.headers.set("X-Timestamp", normalizeTimestamp(Math.min(nowSeconds, sourceSeconds)));
    put.headers.set(IMPORTED_AT_HEADER, normalizeTimestamp(nowSeconds));
    put.headers.set(IMPORTED_FROM_HEADER, quote(origin, "/:"));
    return put;
  }
}
