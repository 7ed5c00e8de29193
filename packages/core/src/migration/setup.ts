import { HttpError } from "../internal/errors.js";
import type { DriverRegistry } from "../drivers/registry.js";

export const MIGRATION_HEADER_PREFIX = "x-container-migration-";
export const MIGRATION_PROVIDER_HEADER = "X-Container-Migration-Provider";
export const MIGRATION_SOURCE_HEADER = "X-Container-Migration-Source";
export const MIGRATION_ACTIVE_HEADER = "X-Container-Migration-Active";

const BASE_HEADERS = [MIGRATION_PROVIDER_HEADER, MIGRATION_SOURCE_HEADER, MIGRATION_ACTIVE_HEADER];

/** `token-url` -> `Token-Url`, the way setup headers are spelled. */
export function titleCase(key: string): string {
  return key.replace(/[a-z]+/gi, (w) => w[0].toUpperCase() + w.slice(1).toLowerCase());
}

export function keyHeader(key: string): string {
  return `X-Container-Migration-${titleCase(key)}`;
}

export function toSysmetaHeader(name: string): string {
  return name.replace(/^x-container-/i, "X-Container-Sysmeta-");
}

export function hasMigrationSetupHeader(headers: Headers): boolean {
  let found = false;
  headers.forEach((_value, key) => {
    if (key.startsWith(MIGRATION_HEADER_PREFIX)) found = true;
  });
  return found;
}

/**
 * Checks the migration headers of a container PUT/POST. Returns the error to
 * send, or null when the request may proceed.
 */
export function validateMigrationSetup(headers: Headers, registry: DriverRegistry): HttpError | null {
  const provider = headers.get(MIGRATION_PROVIDER_HEADER);
  const source = headers.get(MIGRATION_SOURCE_HEADER);
  if (!source && provider != null) {
    return HttpError.preconditionFailed("Migration source is missing");
  }
  if (!provider && source != null) {
    return HttpError.preconditionFailed("Migration provider is missing");
  }
  if (provider == null || source == null) return null;
  if (headers.get(MIGRATION_ACTIVE_HEADER) == null) {
    return HttpError.preconditionFailed("Migration active flag is missing");
  }

  const entry = registry.get(provider.toLowerCase());
  if (!entry) return HttpError.badRequest("Invalid provider");
  if (!entry.driverLoaded) return HttpError.badRequest("Invalid access driver");
  for (const key of entry.requiredKeys) {
    if (headers.get(keyHeader(key)) == null) {
      return HttpError.badRequest(`Missing required header: ${keyHeader(key)}`);
    }
  }
  for (const [key, value] of Object.entries(entry.additionalParams)) {
    if (value.trim() === "") return HttpError.badRequest(`Missing value for ${key}`);
  }
  return null;
}

/** Stores accepted setup headers as container sysmeta so they survive on the container. */
export function storeMigrationSetup(headers: Headers, registry: DriverRegistry): void {
  const names = [...BASE_HEADERS];
  const provider = headers.get(MIGRATION_PROVIDER_HEADER);
  const entry = provider != null ? registry.get(provider.toLowerCase()) : undefined;
  if (entry && headers.get(MIGRATION_SOURCE_HEADER) != null) {
    names.push(...entry.requiredKeys.map(keyHeader));
  }
  for (const name of names) {
    const value = headers.get(name);
    if (value != null) headers.set(toSysmetaHeader(name), value);
  }
}

/** Exposes the container's migration link on container responses. */
export function mirrorMigrationHeaders(headers: Headers): void {
  for (const name of BASE_HEADERS) {
    const value = headers.get(toSysmetaHeader(name));
    if (value != null) headers.set(name, value);
  }
}
