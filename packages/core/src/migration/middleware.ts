import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import {
  cloneRequest,
  discardBody,
  textResponse,
  type Handler,
  type Middleware,
  type ProxyRequest,
  type ProxyResponse,
} from "../http/pipeline.js";
import { parseContainerPath, parseObjectPath, type ObjectPath } from "../http/path.js";
import { configTrueValue } from "../internal/values.js";
import type { DriverRegistry } from "../drivers/registry.js";
import { createMigrationLogger, type Logger } from "../observability/logger.js";
import { getContainerInfo } from "./container-info.js";
import { MIGRATION_STATUS_HEADER, type MigrationError } from "./errors.js";
import { DataMigrator } from "./migrator.js";
import {
  hasMigrationSetupHeader,
  mirrorMigrationHeaders,
  storeMigrationSetup,
  validateMigrationSetup,
} from "./setup.js";

export interface DataMigrationOptions {
  registry: DriverRegistry;
  logger?: Logger;
  now?: () => number;
}

/** Header values must stay on one line of visible ASCII. */
function headerSafe(message: string): string {
  return message.replace(/[^\x20-\x7e]+/g, " ").trim();
}

function failureResponse(original: ProxyResponse, err: MigrationError): ProxyResponse {
  const status = headerSafe(err.message);
  if (err.kind === "VALIDATION") {
    discardBody(original);
    return textResponse(err.status, err.message, { [MIGRATION_STATUS_HEADER]: status });
  }
  original.headers.set(MIGRATION_STATUS_HEADER, status);
  return original;
}

/**
 * Turns a 404 for an object in a migration-linked container into a fetch from
 * the external source, a local write and a replay of the client's read.
 */
export function createDataMigrationMiddleware(opts: DataMigrationOptions): Middleware {
  const logger = opts.logger ?? createMigrationLogger();
  const { registry } = opts;

  return (next: Handler): Handler => {
    const migrator = new DataMigrator({ next, registry, logger, now: opts.now });

    async function migrateOnMiss(
      req: ProxyRequest,
      path: ObjectPath,
      resp: ProxyResponse,
    ): Promise<ProxyResponse> {
      const info = await getContainerInfo(next, req, path);
      if (!configTrueValue(info.sysmeta["migration-active"])) return resp;

      const result = await migrator.migrate(req, path, info.sysmeta);
      if (isErr(result)) {
        const err = unwrapErr(result);
        logger.error(
          {
            requestId: req.ctx.requestId,
            path: req.path,
            kind: err.kind,
            driverError: err.driverError?.kind,
            err: err.message,
          },
          "Object migration failed",
        );
        return failureResponse(resp, err);
      }
      discardBody(resp);
      return unwrapOk(result);
    }

    return async (req) => {
      const containerPath = parseContainerPath(req.path);
      if (!containerPath) return next(req);

      const isContainerRequest = containerPath.object === undefined;
      if (isContainerRequest && (req.method === "PUT" || req.method === "POST")) {
        const invalid = validateMigrationSetup(req.headers, registry);
        if (invalid) {
          logger.info(
            { requestId: req.ctx.requestId, path: req.path, err: invalid.message },
            "Rejected migration setup",
          );
          return invalid.toResponse();
        }
        storeMigrationSetup(req.headers, registry);
      }

      const original = cloneRequest(req);
      const resp = await next(req);
      mirrorMigrationHeaders(resp.headers);

      const objectPath = parseObjectPath(original.path);
      if (
        objectPath &&
        resp.status === 404 &&
        (original.method === "GET" || original.method === "HEAD") &&
        !hasMigrationSetupHeader(original.headers)
      ) {
        return migrateOnMiss(original, objectPath, resp);
      }
      return resp;
    };
  };
}
