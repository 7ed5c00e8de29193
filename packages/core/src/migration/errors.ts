import type { DriverError } from "../drivers/types.js";

export type MigrationErrorKind = "RESOLUTION" | "FETCH" | "UPLOAD" | "VALIDATION";

export const MIGRATION_STATUS_HEADER = "X-Migration-Status";

export class MigrationError extends Error {
  readonly kind: MigrationErrorKind;
  /** Status surfaced to the client; failures other than validation keep the original 404. */
  readonly status: number;
  readonly driverError?: DriverError;

  constructor(
    kind: MigrationErrorKind,
    message: string,
    opts: { status?: number; cause?: DriverError } = {},
  ) {
    super(message);
    this.name = "MigrationError";
    this.kind = kind;
    this.status = opts.status ?? (kind === "VALIDATION" ? 400 : 404);
    this.driverError = opts.cause;
  }

  static resolution(message: string, cause?: DriverError) {
    return new MigrationError("RESOLUTION", message, { cause });
  }

  static fetch(message: string, cause?: DriverError) {
    return new MigrationError("FETCH", message, { cause });
  }

  static upload(message: string) {
    return new MigrationError("UPLOAD", message);
  }

  static validation(message: string, status = 400, cause?: DriverError) {
    return new MigrationError("VALIDATION", message, { status, cause });
  }

  /** Maps a driver failure onto the stage it happened in. */
  static fromDriver(stage: "RESOLUTION" | "FETCH", err: DriverError) {
    if (err.kind === "MISCONFIGURED") return MigrationError.validation(err.message, 400, err);
    return new MigrationError(stage, err.message, { cause: err });
  }
}
