import type { HttpServer } from "../http/http-server.js";

export function registerHealthRoutes(
  server: Pick<HttpServer, "get">,
  ctx: {
    backendName: string;
    drivers: () => Record<string, "enabled" | "disabled">;
    checkBackend?: () => Promise<void>;
  },
) {
  server.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", backend: ctx.backendName, drivers: ctx.drivers() });
  });

  server.get("/health/live", (_req, res) => {
    res.status(200).json({ status: "alive" });
  });

  server.get("/health/ready", async (_req, res) => {
    const results: Record<string, "ok" | "error"> = { backend: "ok" };
    const errors: string[] = [];
    if (ctx.checkBackend) {
      try {
        await ctx.checkBackend();
      } catch (e) {
        results.backend = "error";
        errors.push(e instanceof Error ? e.message : String(e));
      }
    }
    const allOk = Object.values(results).every((v) => v === "ok");
    if (allOk) {
      res.status(200).json({ status: "ready", components: results });
    } else {
      res.status(503).json({
        status: "error",
        code: "NOT_READY",
        message: "One or more dependencies are not ready",
        components: results,
        details: { errors },
      });
    }
  });
}
