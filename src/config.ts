import { homedir } from "node:os";
import { resolve } from "node:path";
import { PROVIDER_IDS, type ProviderId } from "./providers/types.js";

export type BridgeMode = "http" | "mcp";

export interface BrowserLaunchConfig {
  headless: boolean;
  channel: string;
  executablePath: string;
  cdpUrl: string;
  profilePath: string;
  userAgent: string;
  proxy: string;
}

export interface BridgeConfig {
  version: string;
  bridgeMode: BridgeMode;
  httpHost: string;
  httpPort: number;
  httpBodyLimit: string;
  apiToken: string;

  provider: ProviderId;
  modelId: string;
  streamDefault: boolean;

  loadTimeoutSec: number;
  responseTimeoutSec: number;
  pollIntervalMs: number;
  clipboardAttempts: number;
  clipboardIntervalMs: number;

  maxQueueSize: number;
  jobTimeoutMs: number;
  effectiveJobTimeoutMs: number;
  jobTimeoutClamped: boolean;

  browser: BrowserLaunchConfig;
  browserWarmup: boolean;
  restartDelayMs: number;

  logLevel: "debug" | "info" | "warn" | "error";
  logFormat: "json" | "pretty";
}

// Headroom between the interaction deadlines and the queue-level job timeout,
// so the state machine always reports its own failure first.
const JOB_TIMEOUT_HEADROOM_SEC = 15;

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lowered = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  return fallback;
}

function parseNumber(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(parsed, min);
}

function parseLogLevel(value: string | undefined): BridgeConfig["logLevel"] {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function parseLogFormat(value: string | undefined): BridgeConfig["logFormat"] {
  if (value === "pretty" || value === "json") {
    return value;
  }
  return "json";
}

function parseBridgeMode(value: string | undefined): BridgeMode {
  if (value === "http" || value === "mcp") {
    return value;
  }
  return "http";
}

export function parseProviderId(value: string | undefined): ProviderId {
  const normalized = value?.trim().toLowerCase();
  const match = PROVIDER_IDS.find((id) => id === normalized);
  return match ?? "chatgpt";
}

function expandHomePath(pathValue: string): string {
  if (pathValue === "~") {
    return homedir();
  }
  if (pathValue.startsWith("~/")) {
    return resolve(homedir(), pathValue.slice(2));
  }
  return pathValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const loadTimeoutSec = parseNumber(env.LOAD_TIMEOUT_SEC, 120, 1);
  const responseTimeoutSec = parseNumber(env.RESPONSE_TIMEOUT_SEC, 120, 1);
  const jobTimeoutMs = parseNumber(env.JOB_TIMEOUT_MS, 300_000, 1000);
  const minimumTimeoutMs = (loadTimeoutSec + responseTimeoutSec + JOB_TIMEOUT_HEADROOM_SEC) * 1000;
  const effectiveJobTimeoutMs = Math.max(jobTimeoutMs, minimumTimeoutMs);
  const profilePath = env.BROWSER_PROFILE_PATH?.trim();

  return {
    version: env.BRIDGE_VERSION || "1.0.0",
    bridgeMode: parseBridgeMode(env.BRIDGE_MODE),
    httpHost: env.HTTP_HOST || "127.0.0.1",
    httpPort: parseNumber(env.HTTP_PORT, 5001, 1),
    httpBodyLimit: env.HTTP_BODY_LIMIT || "2mb",
    apiToken: env.BRIDGE_API_TOKEN?.trim() || "",

    provider: parseProviderId(env.PROVIDER),
    modelId: env.MODEL_ID || "browser-chat",
    streamDefault: parseBoolean(env.STREAM_DEFAULT, false),

    loadTimeoutSec,
    responseTimeoutSec,
    pollIntervalMs: parseNumber(env.POLL_INTERVAL_MS, 1000, 10),
    clipboardAttempts: parseNumber(env.CLIPBOARD_ATTEMPTS, 5, 1),
    clipboardIntervalMs: parseNumber(env.CLIPBOARD_INTERVAL_MS, 1000, 0),

    maxQueueSize: parseNumber(env.MAX_QUEUE_SIZE, 10, 1),
    jobTimeoutMs,
    effectiveJobTimeoutMs,
    jobTimeoutClamped: effectiveJobTimeoutMs !== jobTimeoutMs,

    browser: {
      headless: parseBoolean(env.BROWSER_HEADLESS, false),
      channel: env.BROWSER_CHANNEL?.trim() || "chrome",
      executablePath: env.BROWSER_EXECUTABLE_PATH?.trim() || "",
      cdpUrl: env.BROWSER_CDP_URL?.trim() || "",
      profilePath: profilePath ? resolve(expandHomePath(profilePath)) : "",
      userAgent: env.BROWSER_USER_AGENT?.trim() || "",
      proxy: env.BROWSER_PROXY?.trim() || "",
    },
    browserWarmup: parseBoolean(env.BROWSER_WARMUP, true),
    restartDelayMs: parseNumber(env.RESTART_DELAY_MS, 2000, 0),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}
