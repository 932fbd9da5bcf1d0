import type { Logger } from "pino";
import type { PageHandle } from "../browser/handle.js";
import { describeError } from "../errors.js";
import type { ProviderAdapter } from "../providers/types.js";
import { pollUntil, sleep, type PollOutcome } from "./poll.js";
import type { InteractionResult, InteractionStatus } from "./result.js";

export type InteractionState = "LOADING" | "READY" | "SENDING" | "AWAITING" | "DONE" | "FAILED";

export interface InteractionTimings {
  loadTimeoutMs: number;
  responseTimeoutMs: number;
  pollIntervalMs: number;
}

export interface StateTransition {
  rid?: string;
  state: InteractionState;
  status?: InteractionStatus;
}

export interface InteractionStateMachineOptions extends InteractionTimings {
  adapter: ProviderAdapter;
  logger: Logger;
  onTransition?: (transition: StateTransition) => void;
}

/**
 * Drives one provider through LOADING -> READY and then, per prompt,
 * SENDING -> AWAITING -> DONE | FAILED. Failures come back as values; a
 * deadline is terminal and never retried, and the page is left open.
 */
export class InteractionStateMachine {
  private readonly adapter: ProviderAdapter;
  private readonly logger: Logger;
  private readonly timings: InteractionTimings;
  private readonly onTransition?: (transition: StateTransition) => void;

  public constructor(options: InteractionStateMachineOptions) {
    this.adapter = options.adapter;
    this.logger = options.logger;
    this.timings = {
      loadTimeoutMs: options.loadTimeoutMs,
      responseTimeoutMs: options.responseTimeoutMs,
      pollIntervalMs: options.pollIntervalMs,
    };
    this.onTransition = options.onTransition;
  }

  public async waitUntilReady(handle: PageHandle, rid?: string): Promise<InteractionResult> {
    const startedAt = Date.now();
    this.enter({ rid, state: "LOADING" });

    const outcome = await pollUntil(() => this.adapter.isReady(handle), {
      timeoutMs: this.timings.loadTimeoutMs,
      intervalMs: this.timings.pollIntervalMs,
      shouldAbort: () => handle.isClosed(),
    });

    if (outcome !== "satisfied") {
      return this.fail(rid, outcome === "aborted" ? "transport_error" : "load_timeout", startedAt);
    }

    this.enter({ rid, state: "READY" });
    return { status: "ok", elapsedMs: Date.now() - startedAt };
  }

  public async run(handle: PageHandle, prompt: string, rid?: string): Promise<InteractionResult> {
    const startedAt = Date.now();
    this.enter({ rid, state: "SENDING" });

    if (handle.isClosed()) {
      return this.fail(rid, "transport_error", startedAt);
    }

    const baseline = await this.adapter.countAnswers(handle);
    if (!(await this.adapter.send(handle, prompt))) {
      return this.fail(rid, handle.isClosed() ? "transport_error" : "send_failed", startedAt);
    }
    await sleep(this.adapter.spec.settleDelayMs);

    this.enter({ rid, state: "AWAITING" });
    const outcome: PollOutcome = await pollUntil(() => this.adapter.isAnswered(handle, baseline), {
      timeoutMs: this.timings.responseTimeoutMs,
      intervalMs: this.timings.pollIntervalMs,
      shouldAbort: () => handle.isClosed(),
    });

    if (outcome === "aborted") {
      return this.fail(rid, "transport_error", startedAt);
    }
    if (outcome === "timeout") {
      return this.fail(rid, "timeout", startedAt);
    }

    await sleep(this.adapter.spec.settleDelayMs);
    const text = await this.extract(handle, rid);

    if (handle.isClosed()) {
      return this.fail(rid, "transport_error", startedAt);
    }
    if (!text) {
      return this.fail(rid, "extract_failed", startedAt);
    }

    this.enter({ rid, state: "DONE", status: "ok" });
    return { status: "ok", text, elapsedMs: Date.now() - startedAt };
  }

  private async extract(handle: PageHandle, rid?: string): Promise<string> {
    try {
      return (await this.adapter.extractAnswer(handle)).trim();
    } catch (error) {
      this.logger.warn(
        { rid, event: "extract_error", provider: this.adapter.spec.id, message: describeError(error) },
        "extract_error",
      );
      return "";
    }
  }

  private fail(rid: string | undefined, status: Exclude<InteractionStatus, "ok">, startedAt: number): InteractionResult {
    this.enter({ rid, state: "FAILED", status });
    return { status, elapsedMs: Date.now() - startedAt };
  }

  private enter(transition: StateTransition): void {
    this.logger.debug(
      {
        rid: transition.rid,
        event: "interaction_state",
        provider: this.adapter.spec.id,
        state: transition.state,
        status: transition.status,
      },
      "interaction_state",
    );
    this.onTransition?.(transition);
  }
}
