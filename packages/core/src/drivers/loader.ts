import path from "node:path";
import { pathToFileURL } from "node:url";
import type { MigrationDriverModule } from "./types.js";
import { fsystemDriverModule } from "./fsystem.js";
import { swiftDriverModule } from "./swift.js";
import { s3DriverModule } from "./s3.js";

export const BUILTIN_DRIVERS: Readonly<Record<string, MigrationDriverModule>> = Object.freeze({
  fsystem: fsystemDriverModule,
  swift: swiftDriverModule,
  s3: s3DriverModule,
});

const BUILTIN_PREFIX = "builtin:";

export function isDriverModule(value: unknown): value is MigrationDriverModule {
  if (typeof value !== "object" || value === null) return false;
  return (
    "isAvailable" in value &&
    typeof value.isAvailable === "function" &&
    "create" in value &&
    typeof value.create === "function"
  );
}

function resolveDriverModule(mod: unknown, exportName: string | undefined): MigrationDriverModule {
  if (typeof mod !== "object" || mod === null) {
    throw new Error("Driver module did not load as an object");
  }
  const exports = new Map(Object.entries(mod));
  const candidates = exportName ? [exportName] : ["default", "driverModule"];
  for (const name of candidates) {
    const value = exports.get(name);
    if (isDriverModule(value)) return value;
  }
  throw new Error(
    `Driver module does not export a driver (${candidates.map((c) => `'${c}'`).join(", ")})`,
  );
}

/**
 * Resolves `driver_<name>_module`. Accepts `builtin:<driver>`, an empty value
 * (the built-in driver of the same name), or a module path with an optional
 * `#export` suffix. Relative paths resolve against the working directory.
 */
export async function loadDriverModule(
  provider: string,
  reference: string | undefined,
): Promise<MigrationDriverModule> {
  const ref = reference?.trim() ?? "";
  if (!ref || ref.startsWith(BUILTIN_PREFIX)) {
    const name = ref ? ref.slice(BUILTIN_PREFIX.length) : provider;
    const builtin = BUILTIN_DRIVERS[name];
    if (!builtin) throw new Error(`Unknown built-in migration driver '${name}' for ${provider}`);
    return builtin;
  }
  const hash = ref.lastIndexOf("#");
  const specifier = hash > 0 ? ref.slice(0, hash) : ref;
  const exportName = hash > 0 ? ref.slice(hash + 1) : undefined;
  const target =
    specifier.startsWith(".") || path.isAbsolute(specifier)
      ? pathToFileURL(path.resolve(process.cwd(), specifier)).href
      : specifier;
  const mod: unknown = await import(target);
  return resolveDriverModule(mod, exportName);
}
