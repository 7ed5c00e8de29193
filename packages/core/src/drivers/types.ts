import type { Readable } from "node:stream";
import type { Result } from "option-t/plain_result";

export type DriverErrorKind =
  /** The driver's optional dependency is not installed. */
  | "UNAVAILABLE"
  | "CONNECTION"
  | "NOT_FOUND"
  | "INVALID_PARAMS"
  /** Operator configuration the driver needs is missing entirely. */
  | "MISCONFIGURED";

export class DriverError extends Error {
  readonly kind: DriverErrorKind;

  constructor(kind: DriverErrorKind, message: string) {
    super(message);
    this.name = "DriverError";
    this.kind = kind;
  }
}

export interface SourceObject {
  /** Metadata as reported by the source; names need not carry the object-meta prefix. */
  metadata: Record<string, string>;
  /** Byte length, or null when the source did not say. */
  size: number | null;
  /** null means the object does not exist at the source. */
  body: Readable | null;
  contentType?: string;
  /** Seconds since the epoch. */
  timestamp?: number;
}

export interface MigrationDriver {
  fetchObject(name: string): Promise<Result<SourceObject, DriverError>>;
  /** Releases whatever fetchObject acquired; safe to call more than once. */
  finalize(): Promise<void>;
}

export type MigrationParams = Record<string, string>;

/**
 * A driver implementation as registered under a provider name. `isAvailable`
 * reports whether optional dependencies can be loaded in this process.
 */
export interface MigrationDriverModule {
  isAvailable(): Promise<boolean>;
  create(source: string, params: MigrationParams): Promise<Result<MigrationDriver, DriverError>>;
}
