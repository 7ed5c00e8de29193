import { z } from "zod";
import { DEFAULT_MAX_FILE_SIZE } from "../copy/orchestrator.js";
import type { MigrationConf } from "../drivers/registry.js";
import { configTrueValue } from "../internal/values.js";

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().positive());

const EnvSchema = z
  .object({
    PORT: z
      .string()
      .default("8080")
      .transform((v) => Number(v))
      .pipe(z.number().int().min(0).max(65535)),
    BACKEND_DRIVER: z.string().default("http"),
    BACKEND_URL: z.string().url().optional(),
    MAX_FILE_SIZE: positiveInt(String(DEFAULT_MAX_FILE_SIZE)),
    MAX_OBJECT_NAME_LENGTH: positiveInt("1024"),
    OBJECT_POST_AS_COPY: z
      .string()
      .optional()
      .transform((v) => (v == null || v === "" ? true : configTrueValue(v))),
    MIGRATION_SUPPORTED_DRIVERS: z.string().default(""),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.BACKEND_DRIVER === "http" && !cfg.BACKEND_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BACKEND_URL"],
        message: "BACKEND_URL is required when BACKEND_DRIVER is http",
      });
    }
  });

export type AppConfig = z.infer<typeof EnvSchema> & {
  /** Flat driver configuration derived from the MIGRATION_* variables. */
  MIGRATION: MigrationConf;
};

const MIGRATION_DRIVER_PREFIX = "MIGRATION_DRIVER_";

/**
 * `MIGRATION_SUPPORTED_DRIVERS=fsystem` and
 * `MIGRATION_DRIVER_FSYSTEM_PARENT_PATH=/srv` become
 * `{ supported_drivers: "fsystem", driver_fsystem_parent_path: "/srv" }`.
 */
export function migrationConfFromEnv(env: NodeJS.ProcessEnv): MigrationConf {
  const conf: MigrationConf = {
    supported_drivers: (env.MIGRATION_SUPPORTED_DRIVERS ?? "").toLowerCase(),
  };
  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.startsWith(MIGRATION_DRIVER_PREFIX)) continue;
    const rest = name.slice(MIGRATION_DRIVER_PREFIX.length).toLowerCase();
    if (rest.length > 0) conf[`driver_${rest}`] = value;
  }
  return conf;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  return { ...parsed.data, MIGRATION: migrationConfFromEnv(env) };
}
