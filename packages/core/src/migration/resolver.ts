import { createErr, createOk, isErr, unwrapErr, unwrapOk, type Result } from "option-t/plain_result";
import type { DriverRegistry } from "../drivers/registry.js";
import type { MigrationDriver, MigrationParams } from "../drivers/types.js";
import { MigrationError } from "./errors.js";

export interface ResolvedDriver {
  provider: string;
  source: string;
  driver: MigrationDriver;
}

/** Builds the parameters a driver is constructed with from container metadata. */
export function migrationParams(
  requiredKeys: readonly string[],
  additionalParams: Readonly<Record<string, string>>,
  containerMd: Record<string, string>,
): Result<MigrationParams, MigrationError> {
  const params: MigrationParams = {};
  for (const key of requiredKeys) {
    const value = containerMd[`migration-${key}`];
    if (value === undefined) {
      return createErr(MigrationError.resolution(`Missing migration parameter: migration-${key}`));
    }
    params[key] = value;
  }
  return createOk({ ...params, ...additionalParams });
}

/** Finds and instantiates the driver a container's migration metadata points at. */
export async function resolveDriver(
  registry: DriverRegistry,
  containerMd: Record<string, string>,
): Promise<Result<ResolvedDriver, MigrationError>> {
  const provider = (containerMd["migration-provider"] ?? "").toLowerCase();
  const source = containerMd["migration-source"] ?? "";
  if (!provider) return createErr(MigrationError.resolution("Migration provider is missing"));
  const entry = registry.get(provider);
  if (!entry) return createErr(MigrationError.resolution(`Unknown migration provider: ${provider}`));
  if (!entry.driverLoaded) {
    return createErr(MigrationError.resolution("Failed to retrieve remote driver"));
  }

  const params = migrationParams(entry.requiredKeys, entry.additionalParams, containerMd);
  if (isErr(params)) return params;

  const created = await entry.module.create(source, unwrapOk(params));
  if (isErr(created)) return createErr(MigrationError.fromDriver("RESOLUTION", unwrapErr(created)));
  return createOk({ provider, source, driver: unwrapOk(created) });
}
