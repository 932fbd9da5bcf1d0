import pino, { type Logger } from "pino";

export const SERVICE_NAME = "browser-chat-bridge";

export type { Logger };

export interface LoggerConfig {
  level: "debug" | "info" | "warn" | "error";
  format: "json" | "pretty";
}

/** Logs go to stderr so MCP stdio mode keeps stdout for protocol frames. */
export function createLogger(config: LoggerConfig): Logger {
  if (config.format === "pretty") {
    return pino({
      level: config.level,
      base: { service: SERVICE_NAME },
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service",
        },
      },
    });
  }

  return pino(
    {
      level: config.level,
      base: { service: SERVICE_NAME },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: ["headers.authorization", "*.headers.authorization"], censor: "[REDACTED]" },
    },
    pino.destination({ dest: 2, sync: false }),
  );
}
