import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { createErr, createOk, type Result } from "option-t/plain_result";
import { createDriverLogger } from "../observability/logger.js";
import {
  DriverError,
  type MigrationDriver,
  type MigrationDriverModule,
  type MigrationParams,
  type SourceObject,
} from "./types.js";

export const FSYSTEM_PARENT_PATH_PARAM = "driver_fsystem_parent_path";

const SIDECAR_SUFFIX = ".meta.json";

const SidecarSchema = z
  .record(z.union([z.string(), z.number(), z.boolean()]))
  .transform((rec) => Object.fromEntries(Object.entries(rec).map(([k, v]) => [k, String(v)])));

const CONTENT_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".csv": "text/csv",
  ".js": "application/javascript",
  ".json": "application/json",
  ".xml": "application/xml",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".gz": "application/gzip",
  ".tar": "application/x-tar",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".webp": "image/webp",
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
};

export function guessContentType(file: string): string | undefined {
  return CONTENT_TYPES[path.extname(file).toLowerCase()];
}

function isValidPath(value: string): boolean {
  return value.trim() !== "" && !value.includes("..");
}

const log = createDriverLogger("fsystem");

async function readSidecar(file: string): Promise<Record<string, string>> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(file + SIDECAR_SUFFIX, "utf8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code !== "ENOENT") {
      log.warn({ file, error: (e as Error).message }, "Unreadable metadata sidecar");
    }
    return {};
  }
  try {
    const parsed = SidecarSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    log.warn({ file }, "Metadata sidecar is not a flat object");
  } catch (e) {
    log.warn({ file, error: (e as Error).message }, "Metadata sidecar is not valid JSON");
  }
  return {};
}

/**
 * Reads objects from a directory tree rooted at `driver_fsystem_parent_path`.
 * The container's migration source names a sub-directory of that root.
 */
export class FileSystemDriver implements MigrationDriver {
  readonly dataSource: string;
  private stream: fs.ReadStream | null = null;

  constructor(dataSource: string) {
    this.dataSource = dataSource;
  }

  async fetchObject(name: string): Promise<Result<SourceObject, DriverError>> {
    const file = path.join(this.dataSource, name);
    if (path.relative(this.dataSource, file).startsWith("..")) {
      return createErr(new DriverError("NOT_FOUND", `Object name ${name} escapes the source`));
    }
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(file);
    } catch {
      return createErr(new DriverError("NOT_FOUND", "Failed to access object in file system"));
    }
    if (stat.isDirectory()) {
      return createOk({ metadata: {}, size: null, body: null });
    }
    const metadata: Record<string, string> = {
      uid: String(stat.uid),
      gid: String(stat.gid),
      ...(await readSidecar(file)),
    };
    this.stream = fs.createReadStream(file);
    return createOk({
      metadata,
      size: stat.size,
      body: this.stream,
      contentType: guessContentType(file),
      timestamp: stat.mtimeMs / 1000,
    });
  }

  async finalize() {
    this.stream?.destroy();
    this.stream = null;
  }
}

export const fsystemDriverModule: MigrationDriverModule = {
  async isAvailable() {
    return true;
  },
  async create(source: string, params: MigrationParams) {
    const root = params[FSYSTEM_PARENT_PATH_PARAM];
    if (root == null) {
      return createErr(
        new DriverError(
          "MISCONFIGURED",
          `${FSYSTEM_PARENT_PATH_PARAM} parameter should be configured`,
        ),
      );
    }
    if (!isValidPath(root)) {
      return createErr(
        new DriverError("INVALID_PARAMS", `${FSYSTEM_PARENT_PATH_PARAM}: ${root} is invalid`),
      );
    }
    if (!isValidPath(source)) {
      return createErr(new DriverError("INVALID_PARAMS", `Migration source ${source} is invalid`));
    }
    const relative = source.startsWith(path.sep) ? source.slice(1) : source;
    return createOk(new FileSystemDriver(path.join(path.sep, root, relative)));
  },
};
