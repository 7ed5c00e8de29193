// S3-compatible source driver. The AWS SDK is imported lazily so the provider
// can stay registered (and report itself unavailable) where the SDK is absent.
import { Readable } from "node:stream";
import { createErr, createOk, type Result } from "option-t/plain_result";
import type { GetObjectCommandOutput } from "@aws-sdk/client-s3";
import {
  DriverError,
  type MigrationDriver,
  type MigrationDriverModule,
  type MigrationParams,
  type SourceObject,
} from "./types.js";

type S3Module = typeof import("@aws-sdk/client-s3");

let cached: Promise<S3Module | null> | null = null;

async function importClientModule(): Promise<S3Module | null> {
  cached ??= import("@aws-sdk/client-s3").catch(() => null);
  return cached;
}

interface S3DriverConfig {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

function statusOf(e: unknown): number | undefined {
  if (typeof e !== "object" || e === null || !("$metadata" in e)) return undefined;
  const meta = e.$metadata;
  if (typeof meta !== "object" || meta === null || !("httpStatusCode" in meta)) return undefined;
  return typeof meta.httpStatusCode === "number" ? meta.httpStatusCode : undefined;
}

export class S3Driver implements MigrationDriver {
  readonly bucket: string;
  private readonly client: InstanceType<S3Module["S3Client"]>;
  private readonly mod: S3Module;
  private body: Readable | null = null;

  constructor(mod: S3Module, bucket: string, cfg: S3DriverConfig) {
    this.mod = mod;
    this.bucket = bucket;
    this.client = new mod.S3Client({
      region: cfg.region,
      endpoint: cfg.endpoint,
      forcePathStyle: cfg.forcePathStyle,
      credentials: { accessKeyId: cfg.accessKeyId, secretAccessKey: cfg.secretAccessKey },
    });
  }

  async fetchObject(name: string): Promise<Result<SourceObject, DriverError>> {
    let out: GetObjectCommandOutput;
    try {
      out = await this.client.send(
        new this.mod.GetObjectCommand({ Bucket: this.bucket, Key: name }),
      );
    } catch (e) {
      const status = statusOf(e);
      if (status === 404) {
        return createErr(new DriverError("NOT_FOUND", `Object GET failed: ${name} not found`));
      }
      return createErr(new DriverError("CONNECTION", (e as Error).message));
    }
    if (!(out.Body instanceof Readable)) {
      return createErr(new DriverError("CONNECTION", "S3 response body is not a stream"));
    }
    this.body = out.Body;
    return createOk({
      metadata: { ...(out.Metadata ?? {}) },
      size: out.ContentLength ?? null,
      body: out.Body,
      contentType: out.ContentType,
      timestamp: out.LastModified ? out.LastModified.getTime() / 1000 : undefined,
    });
  }

  async finalize() {
    if (this.body && !this.body.destroyed) this.body.destroy();
    this.body = null;
    this.client.destroy();
  }
}

export const s3DriverModule: MigrationDriverModule = {
  async isAvailable() {
    return (await importClientModule()) !== null;
  },
  async create(source: string, params: MigrationParams) {
    const mod = await importClientModule();
    if (!mod) {
      return createErr(new DriverError("UNAVAILABLE", "AWS SDK for S3 not installed"));
    }
    return createOk(
      new S3Driver(mod, source, {
        region: params["region"] ?? "us-east-1",
        accessKeyId: params["access-key-id"] ?? "",
        secretAccessKey: params["secret-access-key"] ?? "",
        endpoint: params["driver_s3_endpoint"] || undefined,
        forcePathStyle: params["driver_s3_force_path_style"] === "true",
      }),
    );
  },
};

/** Test hook: forget the cached SDK import. */
export function resetS3ModuleCache(): void {
  cached = null;
}
