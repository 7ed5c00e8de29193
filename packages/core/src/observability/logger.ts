import pino from "pino";
import { trace } from "@opentelemetry/api";

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  redact?: string[];
}

function createBaseLogger(config: LoggerConfig = {}) {
  const {
    level = process.env.LOG_LEVEL || "info",
    pretty = process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development",
    redact = [
      "key",
      "secret",
      "authorization",
      "params.key",
      "params.secret-access-key",
      'headers["x-auth-token"]',
      'headers["x-auth-key"]',
      'req.headers["x-auth-token"]',
      'req.headers["x-auth-key"]',
    ],
  } = config;

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    : undefined;

  return pino(
    {
      level,
      redact,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      mixin() {
        const span = trace.getActiveSpan();
        if (span) {
          const spanContext = span.spanContext();
          return {
            traceId: spanContext.traceId,
            spanId: spanContext.spanId,
          };
        }
        return {};
      },
    },
    transport,
  );
}

export const logger = createBaseLogger();

export type Logger = pino.Logger;

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function createRequestLogger(requestId?: string) {
  return createChildLogger({ component: "http", requestId });
}

export function createCopyLogger() {
  return createChildLogger({ component: "copy" });
}

export function createMigrationLogger() {
  return createChildLogger({ component: "migration" });
}

export function createDriverLogger(provider?: string) {
  return createChildLogger({ component: "drivers", provider });
}

export function createBackendLogger(backend?: string) {
  return createChildLogger({ component: "backend", backend });
}
