import { fileURLToPath } from "node:url";
import { loadConfig, type AppConfig } from "./config/config.js";
import { logger } from "./observability/logger.js";
import { createExpressServer } from "./http/express-server.js";
import type { HttpServer } from "./http/http-server.js";
import { compose, createContext, discardBody, makeRequest, type Handler } from "./http/pipeline.js";
import { registerHealthRoutes } from "./routes/health.js";
import { loadBackend } from "./backend/loader.js";
import type { Backend } from "./backend/types.js";
import { buildDriverRegistry, type DriverRegistry } from "./drivers/registry.js";
import { createServerSideCopyMiddleware } from "./copy/middleware.js";
import { createDataMigrationMiddleware } from "./migration/middleware.js";
import { createObjectConstraints } from "./constraints/constraints.js";

export { compose, makeRequest, createContext } from "./http/pipeline.js";
export type { Handler, Middleware, ProxyRequest, ProxyResponse } from "./http/pipeline.js";
export { createServerSideCopyMiddleware } from "./copy/middleware.js";
export { CopyOrchestrator } from "./copy/orchestrator.js";
export { createDataMigrationMiddleware } from "./migration/middleware.js";
export { DataMigrator } from "./migration/migrator.js";
export { buildDriverRegistry, DriverRegistry } from "./drivers/registry.js";
export { DriverError } from "./drivers/types.js";
export type { MigrationDriver, MigrationDriverModule, SourceObject } from "./drivers/types.js";
export { createMemoryBackend } from "./backend/memory.js";
export { createHttpBackend } from "./backend/http.js";
export { createObjectConstraints } from "./constraints/constraints.js";
export { loadConfig, migrationConfFromEnv } from "./config/config.js";

/**
 * The request pipeline: migration sees the backend's 404s, copy rewrites
 * requests before they reach the backend.
 */
export function createPipeline(
  config: Pick<AppConfig, "OBJECT_POST_AS_COPY" | "MAX_FILE_SIZE">,
  registry: DriverRegistry,
  backend: Handler,
): Handler {
  return compose(
    [
      createDataMigrationMiddleware({ registry }),
      createServerSideCopyMiddleware({
        objectPostAsCopy: config.OBJECT_POST_AS_COPY,
        maxFileSize: config.MAX_FILE_SIZE,
      }),
    ],
    backend,
  );
}

export interface RunningProxy {
  port: number;
  server: HttpServer;
  backend: Backend;
  registry: DriverRegistry;
  stop(): Promise<void>;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<RunningProxy> {
  const config = loadConfig(env);
  const registry = await buildDriverRegistry(config.MIGRATION);
  const backend = await loadBackend(config.BACKEND_DRIVER, config);

  const server = createExpressServer({
    constraints: createObjectConstraints({
      maxObjectNameLength: config.MAX_OBJECT_NAME_LENGTH,
      maxFileSize: config.MAX_FILE_SIZE,
    }),
  });
  registerHealthRoutes(server, {
    backendName: backend.name,
    drivers: () => registry.describe(),
    checkBackend: async () => {
      const res = await backend.handle(
        makeRequest({ method: "OPTIONS", path: "/info", ctx: createContext() }),
      );
      discardBody(res);
      if (res.status >= 500) throw new Error(`Backend answered ${res.status}`);
    },
  });
  server.mount(createPipeline(config, registry, backend.handle));
  const port = await server.listen(config.PORT);
  logger.info(
    { port, backend: backend.name, drivers: registry.describe() },
    "Proxy listening",
  );

  const stop = async () => {
    await server.close();
    await backend.close?.();
  };
  return { port, server, backend, registry, stop };
}

// Only run when executed directly
if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  main()
    .then((running) => {
      const shutdown = (signal: NodeJS.Signals) => {
        process.once(signal, () => {
          running.stop().then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err, signal }, "Failed to shut down cleanly");
              process.exit(1);
            },
          );
        });
      };
      shutdown("SIGTERM");
      shutdown("SIGINT");
    })
    .catch((err: unknown) => {
      logger.error({ err }, "Failed to start proxy");
      process.exit(1);
    });
}
