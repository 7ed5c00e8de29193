import { createDriverLogger } from "../observability/logger.js";
import { loadDriverModule } from "./loader.js";
import type { MigrationDriverModule } from "./types.js";

export interface DriverRegistration {
  readonly provider: string;
  readonly requiredKeys: readonly string[];
  /** False when the driver's optional dependency could not be loaded. */
  readonly driverLoaded: boolean;
  readonly additionalParams: Readonly<Record<string, string>>;
  readonly module: MigrationDriverModule;
}

/** Flat `key = value` configuration, e.g. `driver_swift_keys = token-url,user,key`. */
export type MigrationConf = Record<string, string | undefined>;

export function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Provider name -> registration; built once at startup and never mutated. */
export class DriverRegistry {
  private readonly entries: ReadonlyMap<string, DriverRegistration>;

  constructor(entries: Iterable<DriverRegistration>) {
    const map = new Map<string, DriverRegistration>();
    for (const entry of entries) map.set(entry.provider, Object.freeze({ ...entry }));
    this.entries = map;
  }

  get(provider: string): DriverRegistration | undefined {
    return this.entries.get(provider);
  }

  has(provider: string): boolean {
    return this.entries.has(provider);
  }

  providers(): string[] {
    return [...this.entries.keys()];
  }

  describe(): Record<string, "enabled" | "disabled"> {
    const out: Record<string, "enabled" | "disabled"> = {};
    for (const [name, entry] of this.entries) out[name] = entry.driverLoaded ? "enabled" : "disabled";
    return out;
  }
}

export async function buildDriverRegistry(conf: MigrationConf): Promise<DriverRegistry> {
  const log = createDriverLogger();
  const entries: DriverRegistration[] = [];
  for (const provider of splitList(conf["supported_drivers"])) {
    const prefix = `driver_${provider}_`;
    const reserved = new Set([`${prefix}keys`, `${prefix}module`]);
    const module = await loadDriverModule(provider, conf[`${prefix}module`]);
    const additionalParams: Record<string, string> = {};
    for (const [key, value] of Object.entries(conf)) {
      if (value !== undefined && key.startsWith(prefix) && !reserved.has(key)) {
        additionalParams[key] = value;
      }
    }
    const driverLoaded = await module.isAvailable();
    entries.push({
      provider,
      requiredKeys: splitList(conf[`${prefix}keys`]).map((k) => k.toLowerCase()),
      driverLoaded,
      additionalParams,
      module,
    });
    log.info({ provider, driverLoaded }, "Registered migration driver");
  }
  return new DriverRegistry(entries);
}
