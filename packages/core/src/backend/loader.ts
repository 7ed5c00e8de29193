import path from "node:path";
import { pathToFileURL } from "node:url";
import type { AppConfig } from "../config/config.js";
import type { Backend, BackendFactory } from "./types.js";

function resolveBackendFactory(mod: unknown): BackendFactory {
  if (typeof mod !== "object" || mod === null) throw new Error("Backend module does not export a factory");
  const exports = new Map(Object.entries(mod));
  for (const name of ["default", "createBackend"]) {
    const value = exports.get(name);
    if (typeof value === "function") {
      return async (opts) => {
        const backend: unknown = await value(opts);
        if (!isBackend(backend)) throw new Error("Backend factory did not return a backend");
        return backend;
      };
    }
  }
  throw new Error("Backend module does not export a factory");
}

function isBackend(value: unknown): value is Backend {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "handle" in value &&
    typeof value.handle === "function"
  );
}

/** `http`, `memory`, or a path to a module exporting a backend factory. */
export async function loadBackend(
  driver: string,
  config: Pick<AppConfig, "BACKEND_URL">,
): Promise<Backend> {
  if (driver === "memory") {
    const { createMemoryBackend } = await import("./memory.js");
    return createMemoryBackend();
  }
  if (!driver || driver === "http") {
    if (!config.BACKEND_URL) throw new Error("BACKEND_URL is required for the http backend");
    const { createHttpBackend } = await import("./http.js");
    return createHttpBackend({ baseUrl: config.BACKEND_URL });
  }
  const target =
    driver.startsWith(".") || path.isAbsolute(driver)
      ? pathToFileURL(path.resolve(process.cwd(), driver)).href
      : driver;
  const mod: unknown = await import(target);
  return resolveBackendFactory(mod)({ config: { ...config } });
}
