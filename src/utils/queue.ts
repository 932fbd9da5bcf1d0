import { BridgeError, toBridgeError } from "../errors.js";

export interface LateOutcomeEvent {
  label?: string;
  outcome: "resolved" | "rejected";
  timeoutMs: number;
  durationMs: number;
  errorCode?: string;
}

export interface QueueLike {
  add<T>(task: () => Promise<T>, timeoutMs?: number, label?: string): Promise<T>;
  getDepth(): number;
}

export interface SingleFlightQueueOptions {
  maxSize: number;
  defaultTimeoutMs: number;
  onLateOutcome?: (event: LateOutcomeEvent) => void;
}

// Jobs are stored type-erased; each closure settles its own caller's promise.
type PendingJob = () => Promise<void>;

/**
 * Runs one task at a time in FIFO order. A task that outlives its timeout
 * rejects its caller with `timeout` but keeps the slot until it settles, so
 * the page is never driven by two tasks at once.
 */
export class SingleFlightQueue implements QueueLike {
  private readonly maxSize: number;
  private readonly defaultTimeoutMs: number;
  private readonly onLateOutcome?: (event: LateOutcomeEvent) => void;
  private readonly pending: PendingJob[] = [];
  private active = false;

  public constructor(options: SingleFlightQueueOptions) {
    this.maxSize = options.maxSize;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.onLateOutcome = options.onLateOutcome;
  }

  public getDepth(): number {
    return this.pending.length + (this.active ? 1 : 0);
  }

  public add<T>(task: () => Promise<T>, timeoutMs = this.defaultTimeoutMs, label?: string): Promise<T> {
    if (this.getDepth() >= this.maxSize) {
      return Promise.reject(new BridgeError("queue_full", "Queue is full", { maxSize: this.maxSize }, 10));
    }

    return new Promise<T>((resolve, reject) => {
      this.pending.push(() => this.execute(task, timeoutMs, label, resolve, reject));
      this.pump();
    });
  }

  private pump(): void {
    if (this.active) {
      return;
    }

    const next = this.pending.shift();
    if (!next) {
      return;
    }

    this.active = true;
    void next().finally(() => {
      this.active = false;
      this.pump();
    });
  }

  private async execute<T>(
    task: () => Promise<T>,
    timeoutMs: number,
    label: string | undefined,
    resolve: (value: T) => void,
    reject: (reason: BridgeError) => void,
  ): Promise<void> {
    const startedAt = Date.now();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      reject(new BridgeError("timeout", "Job timed out", { timeoutMs, label }));
    }, timeoutMs);

    try {
      const value = await Promise.resolve().then(task);
      if (timedOut) {
        this.reportLateOutcome({ label, outcome: "resolved", timeoutMs, durationMs: Date.now() - startedAt });
        return;
      }
      resolve(value);
    } catch (error) {
      const bridgeError = toBridgeError(error);
      if (timedOut) {
        this.reportLateOutcome({
          label,
          outcome: "rejected",
          timeoutMs,
          durationMs: Date.now() - startedAt,
          errorCode: bridgeError.code,
        });
        return;
      }
      reject(bridgeError);
    } finally {
      clearTimeout(timer);
    }
  }

  private reportLateOutcome(event: LateOutcomeEvent): void {
    try {
      this.onLateOutcome?.(event);
    } catch (error) {
      // Observer failures must not stall the queue.
      process.emitWarning(`late outcome observer failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
