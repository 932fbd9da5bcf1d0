export type BridgeErrorCode =
  | "load_timeout"
  | "send_failed"
  | "response_timeout"
  | "extract_failed"
  | "transport_error"
  | "validation_error"
  | "unsupported_provider"
  | "unauthorized"
  | "queue_full"
  | "timeout"
  | "unknown";

export class BridgeError extends Error {
  public code: BridgeErrorCode;
  public details?: Record<string, unknown>;
  public retryAfterSec?: number;

  public constructor(
    code: BridgeErrorCode,
    message: string,
    details?: Record<string, unknown>,
    retryAfterSec?: number,
  ) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.details = details;
    this.retryAfterSec = retryAfterSec;
  }

  /** Only a dead browser handle warrants recreating the session. */
  public get restartRecommended(): boolean {
    return this.code === "transport_error";
  }
}

export function isBridgeError(value: unknown): value is BridgeError {
  return value instanceof BridgeError;
}

export function toBridgeError(value: unknown, fallbackMessage = "Unknown bridge error"): BridgeError {
  if (isBridgeError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new BridgeError("unknown", value.message || fallbackMessage);
  }

  return new BridgeError("unknown", fallbackMessage, {
    value: typeof value === "string" ? value : JSON.stringify(value),
  });
}

export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
