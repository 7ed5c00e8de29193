import { createHash } from "node:crypto";
import { parseContainerPath, splitPath } from "../http/path.js";
import {
  headerEntries,
  makeResponse,
  readBody,
  textResponse,
  type Handler,
  type ProxyRequest,
  type ProxyResponse,
} from "../http/pipeline.js";
import { isSysOrUserMeta, isUserMeta } from "../copy/metadata.js";
import { normalizeTimestamp } from "../internal/values.js";
import type { Backend } from "./types.js";

interface StoredObject {
  data: Buffer;
  etag: string;
  contentType: string;
  timestamp: number;
  /** Lower-cased metadata header -> value. */
  metadata: Record<string, string>;
}

interface StoredContainer {
  metadata: Record<string, string>;
  objects: Map<string, StoredObject>;
}

const ALLOW = "HEAD, GET, PUT, POST, DELETE, OPTIONS";

const OBJECT_EXTRA_HEADERS = new Set([
  "x-delete-at",
  "x-static-large-object",
  "content-disposition",
  "content-encoding",
]);

function httpDate(seconds: number): string {
  return new Date(Math.ceil(seconds) * 1000).toUTCString();
}

function pickHeaders(headers: Headers, keep: (key: string) => boolean): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of headerEntries(headers)) if (keep(key)) out[key] = value;
  return out;
}

const isObjectMetadata = (key: string) =>
  isSysOrUserMeta("object", key) || OBJECT_EXTRA_HEADERS.has(key);
const isContainerMetadata = (key: string) => isSysOrUserMeta("container", key);

export interface MemoryBackend extends Backend {
  /** Direct access for assertions: `account/container` -> stored objects. */
  readonly containers: ReadonlyMap<string, StoredContainer>;
}

/**
 * An in-process stand-in for a Swift cluster: accounts spring into existence,
 * containers must be created before objects are written to them.
 */
export function createMemoryBackend(opts: { now?: () => number } = {}): MemoryBackend {
  const now = () => (opts.now ?? Date.now)() / 1000;
  const containers = new Map<string, StoredContainer>();

  function objectHeaders(obj: StoredObject): Record<string, string> {
    return {
      ...obj.metadata,
      "Content-Type": obj.contentType,
      "Content-Length": String(obj.data.length),
      ETag: `"${obj.etag}"`,
      "Last-Modified": httpDate(obj.timestamp),
      "X-Timestamp": normalizeTimestamp(obj.timestamp),
    };
  }

  async function handleContainer(
    req: ProxyRequest,
    key: string,
  ): Promise<ProxyResponse> {
    const existing = containers.get(key);
    switch (req.method) {
      case "PUT": {
        const metadata = pickHeaders(req.headers, isContainerMetadata);
        if (existing) {
          Object.assign(existing.metadata, metadata);
          return makeResponse(202, { "Content-Length": "0" });
        }
        containers.set(key, { metadata, objects: new Map() });
        return makeResponse(201, { "Content-Length": "0" });
      }
      case "POST":
        if (!existing) return textResponse(404, "Not Found");
        Object.assign(existing.metadata, pickHeaders(req.headers, isContainerMetadata));
        return makeResponse(204);
      case "HEAD":
      case "GET": {
        if (!existing) return textResponse(404, "Not Found");
        const headers = {
          ...existing.metadata,
          "X-Container-Object-Count": String(existing.objects.size),
        };
        if (req.method === "HEAD") return makeResponse(204, headers);
        const listing = [...existing.objects.keys()].sort().join("\n");
        return textResponse(200, listing ? `${listing}\n` : "", headers);
      }
      case "DELETE":
        if (!existing) return textResponse(404, "Not Found");
        if (existing.objects.size > 0) return textResponse(409, "Conflict");
        containers.delete(key);
        return makeResponse(204);
      default:
        return textResponse(405, "Method Not Allowed", { Allow: ALLOW });
    }
  }

  async function handleObject(
    req: ProxyRequest,
    key: string,
    name: string,
  ): Promise<ProxyResponse> {
    const container = containers.get(key);
    const existing = container?.objects.get(name);
    switch (req.method) {
      case "PUT": {
        if (!container) return textResponse(404, "Not Found");
        const data = await readBody(req.body);
        const etag = createHash("md5").update(data).digest("hex");
        const expected = req.headers.get("etag");
        if (expected && expected.replace(/^"(.*)"$/, "$1") !== etag) {
          return textResponse(422, "Unprocessable Entity");
        }
        const rawTimestamp = Number(req.headers.get("x-timestamp"));
        const obj: StoredObject = {
          data,
          etag,
          contentType: req.headers.get("content-type") ?? "application/octet-stream",
          timestamp: Number.isFinite(rawTimestamp) && rawTimestamp > 0 ? rawTimestamp : now(),
          metadata: pickHeaders(req.headers, isObjectMetadata),
        };
        container.objects.set(name, obj);
        return makeResponse(201, {
          ETag: `"${etag}"`,
          "Last-Modified": httpDate(obj.timestamp),
          "Content-Length": "0",
        });
      }
      case "GET":
      case "HEAD":
        if (!existing) return textResponse(404, "Not Found");
        return makeResponse(
          200,
          objectHeaders(existing),
          req.method === "GET" ? Buffer.from(existing.data) : null,
        );
      case "POST": {
        if (!existing) return textResponse(404, "Not Found");
        // POST replaces user metadata and keeps system metadata.
        const kept = Object.entries(existing.metadata).filter(([k]) => !isUserMeta("object", k));
        existing.metadata = {
          ...Object.fromEntries(kept),
          ...pickHeaders(req.headers, (k) => isUserMeta("object", k) || OBJECT_EXTRA_HEADERS.has(k)),
        };
        existing.timestamp = now();
        return makeResponse(202, { "Content-Length": "0" });
      }
      case "DELETE":
        if (!existing || !container) return textResponse(404, "Not Found");
        container.objects.delete(name);
        return makeResponse(204);
      default:
        return textResponse(405, "Method Not Allowed", { Allow: ALLOW });
    }
  }

  const handle: Handler = async (req) => {
    if (req.method === "OPTIONS") {
      return makeResponse(200, { Allow: ALLOW, "Content-Length": "0" });
    }
    const path = parseContainerPath(req.path);
    if (!path) {
      const account = splitPath(req.path, 2, 2);
      if (account && (req.method === "HEAD" || req.method === "GET")) {
        const prefix = `${account[1]}/`;
        const count = [...containers.keys()].filter((k) => k.startsWith(prefix)).length;
        return makeResponse(204, { "X-Account-Container-Count": String(count) });
      }
      return textResponse(400, "Bad Request");
    }
    const key = `${path.account}/${path.container}`;
    if (path.object === undefined) return handleContainer(req, key);
    return handleObject(req, key, path.object);
  };

  return { name: "memory", handle, containers };
}
