#!/usr/bin/env node

import { PlaywrightLauncher } from "./src/browser/playwright.js";
import { loadConfig } from "./src/config.js";
import { describeError } from "./src/errors.js";
import { startHttpServer } from "./src/http/server.js";
import { createLogger } from "./src/logger.js";
import { startMcpServer } from "./src/mcp/server.js";
import { createProviderAdapter } from "./src/providers/index.js";
import { ChatSession } from "./src/session/chatSession.js";
import { SingleFlightQueue } from "./src/utils/queue.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel, format: config.logFormat });

if (config.jobTimeoutClamped) {
  logger.warn(
    {
      event: "config_warning",
      jobTimeoutMs: config.jobTimeoutMs,
      effectiveJobTimeoutMs: config.effectiveJobTimeoutMs,
      loadTimeoutSec: config.loadTimeoutSec,
      responseTimeoutSec: config.responseTimeoutSec,
    },
    "JOB_TIMEOUT_MS was clamped to stay above LOAD_TIMEOUT_SEC + RESPONSE_TIMEOUT_SEC",
  );
}

const queue = new SingleFlightQueue({
  maxSize: config.maxQueueSize,
  defaultTimeoutMs: config.effectiveJobTimeoutMs,
  onLateOutcome: (event) => {
    logger.warn(
      {
        event: "late_outcome_after_timeout",
        label: event.label,
        outcome: event.outcome,
        timeoutMs: event.timeoutMs,
        durationMs: event.durationMs,
        errorCode: event.errorCode,
      },
      "late_outcome_after_timeout",
    );
  },
});

const adapter = createProviderAdapter(config.provider, {
  clipboardAttempts: config.clipboardAttempts,
  clipboardIntervalMs: config.clipboardIntervalMs,
});

const session = new ChatSession({
  adapter,
  launcher: new PlaywrightLauncher(config.browser, logger),
  logger,
  loadTimeoutMs: config.loadTimeoutSec * 1000,
  responseTimeoutMs: config.responseTimeoutSec * 1000,
  pollIntervalMs: config.pollIntervalMs,
  restartDelayMs: config.restartDelayMs,
});

process.on("unhandledRejection", (reason) => {
  logger.error({ event: "unhandled_rejection", reason }, "unhandled_rejection");
});

process.on("uncaughtException", (error) => {
  logger.error({ event: "uncaught_exception", error }, "uncaught_exception");
});

let shuttingDown = false;
const shutdown = (signal: NodeJS.Signals): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ event: "shutdown", signal }, "shutdown");
  session
    .close()
    .catch((error: unknown) => {
      logger.error({ event: "shutdown_failed", message: describeError(error) }, "shutdown_failed");
    })
    .finally(() => {
      process.exit(0);
    });
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info(
  { event: "bridge_starting", mode: config.bridgeMode, provider: adapter.spec.id, url: adapter.spec.url },
  "bridge_starting",
);

if (config.bridgeMode === "http") {
  await startHttpServer({ config, logger, queue, session });
} else {
  await startMcpServer({ config, logger, queue, session });
}

if (config.browserWarmup) {
  const result = await session.open("warmup");
  if (result.status !== "ok") {
    logger.error({ event: "warmup_failed", status: result.status }, "warmup_failed");
  }
}
