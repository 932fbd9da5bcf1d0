import type { Logger } from "pino";
import type { BrowserLauncher, PageHandle } from "../browser/handle.js";
import { describeError } from "../errors.js";
import { sleep } from "../interaction/poll.js";
import type { InteractionResult } from "../interaction/result.js";
import { InteractionStateMachine, type InteractionTimings } from "../interaction/stateMachine.js";
import type { ProviderAdapter, ProviderId } from "../providers/types.js";
import { Mutex } from "../utils/mutex.js";
import { SessionLedger } from "./ledger.js";
import type { ChatMessage } from "./messages.js";
import { SessionReconciler, type ReconcileResult } from "./reconciler.js";

export type SessionLifecycle = "idle" | "loading" | "ready" | "failed" | "closed";

export interface SessionHealth {
  state: SessionLifecycle;
  provider: ProviderId;
  ledgerSize: number;
  generation: number;
  handleOpen: boolean;
}

export interface ChatSessionOptions extends InteractionTimings {
  adapter: ProviderAdapter;
  launcher: BrowserLauncher;
  logger: Logger;
  restartDelayMs?: number;
}

export interface CompletionOutcome {
  result: InteractionResult;
  prompt: string;
  reconciliation?: ReconcileResult;
}

interface ReadySession {
  handle: PageHandle;
  generation: number;
}

/**
 * Owns the single browser tab for one provider together with the ledger of
 * what that tab has already seen. Lifecycle changes go through a mutex;
 * callers serialize interactions themselves (the single-flight queue).
 */
export class ChatSession {
  private readonly adapter: ProviderAdapter;
  private readonly launcher: BrowserLauncher;
  private readonly logger: Logger;
  private readonly restartDelayMs: number;
  private readonly machine: InteractionStateMachine;
  private readonly ledger = new SessionLedger();
  private readonly reconciler = new SessionReconciler(this.ledger);
  private readonly lifecycleLock = new Mutex();

  private handle: PageHandle | null = null;
  private lifecycle: SessionLifecycle = "idle";
  private generation = 0;
  private lastLoadResult: InteractionResult | null = null;

  public constructor(options: ChatSessionOptions) {
    this.adapter = options.adapter;
    this.launcher = options.launcher;
    this.logger = options.logger;
    this.restartDelayMs = options.restartDelayMs ?? 0;
    this.machine = new InteractionStateMachine({
      adapter: options.adapter,
      logger: options.logger,
      loadTimeoutMs: options.loadTimeoutMs,
      responseTimeoutMs: options.responseTimeoutMs,
      pollIntervalMs: options.pollIntervalMs,
    });
  }

  public getLedger(): readonly string[] {
    return this.ledger.entries();
  }

  public getHealth(): SessionHealth {
    return {
      state: this.lifecycle,
      provider: this.adapter.spec.id,
      ledgerSize: this.ledger.size(),
      generation: this.generation,
      handleOpen: this.handle !== null && !this.handle.isClosed(),
    };
  }

  /** Opens the tab and waits for the chat to load, unless that already happened. */
  public async open(rid?: string): Promise<InteractionResult> {
    const ready = await this.ensureReady(rid);
    return "status" in ready ? ready : { status: "ok", elapsedMs: 0 };
  }

  public async complete(messages: readonly ChatMessage[], rid?: string): Promise<CompletionOutcome> {
    const ready = await this.ensureReady(rid);
    if ("status" in ready) {
      return { result: ready, prompt: "" };
    }

    const reconciliation = this.reconciler.computeDelta(messages);
    if (reconciliation.reason !== "matched") {
      const entry = {
        rid,
        event: "reconciliation_miss",
        reason: reconciliation.reason,
        messages: messages.length,
        ledgerSize: this.ledger.size(),
      };
      if (reconciliation.reason === "empty_delta") {
        this.logger.warn(entry, "reconciliation_miss");
      } else {
        this.logger.debug(entry, "reconciliation_miss");
      }
    }
    this.reconciler.recordRequest(messages);

    const result = await this.machine.run(ready.handle, reconciliation.prompt, rid);
    this.recordAnswer(ready.generation, result, rid);
    return { result, prompt: reconciliation.prompt, reconciliation };
  }

  /** Sends one message verbatim, bypassing reconciliation. */
  public async ask(message: string, rid?: string): Promise<CompletionOutcome> {
    const ready = await this.ensureReady(rid);
    if ("status" in ready) {
      return { result: ready, prompt: "" };
    }

    this.ledger.append(message);
    const result = await this.machine.run(ready.handle, message, rid);
    this.recordAnswer(ready.generation, result, rid);
    return { result, prompt: message };
  }

  /**
   * Closes the tab, forgets the ledger and loads a fresh tab. Interactions
   * still running against the old tab observe it closed and fail fast.
   */
  public async restart(rid?: string): Promise<InteractionResult> {
    return this.lifecycleLock.runExclusive(async () => {
      this.logger.info({ rid, event: "session_restart", generation: this.generation }, "session_restart");
      await this.closeHandle(rid);
      this.ledger.clear();
      this.generation += 1;
      this.lifecycle = "idle";
      this.lastLoadResult = null;
      await sleep(this.restartDelayMs);
      return this.load(rid);
    });
  }

  public async close(): Promise<void> {
    await this.lifecycleLock.runExclusive(async () => {
      await this.closeHandle();
      this.lifecycle = "closed";
    });
  }

  private async ensureReady(rid?: string): Promise<ReadySession | InteractionResult> {
    return this.lifecycleLock.runExclusive(async () => {
      if (this.lifecycle === "idle") {
        const loaded = await this.load(rid);
        if (loaded.status !== "ok") {
          return loaded;
        }
      }

      if (this.lifecycle === "failed") {
        return this.lastLoadResult ?? { status: "load_timeout", elapsedMs: 0 };
      }

      if (this.lifecycle === "closed" || !this.handle || this.handle.isClosed()) {
        return { status: "transport_error", elapsedMs: 0 };
      }

      return { handle: this.handle, generation: this.generation };
    });
  }

  // Caller holds the lifecycle lock.
  private async load(rid?: string): Promise<InteractionResult> {
    const startedAt = Date.now();
    this.lifecycle = "loading";

    let handle: PageHandle;
    try {
      handle = await this.launcher.open();
      this.handle = handle;
      await handle.navigate(this.adapter.spec.url);
    } catch (error) {
      this.logger.error(
        { rid, event: "session_open_failed", provider: this.adapter.spec.id, message: describeError(error) },
        "session_open_failed",
      );
      await this.closeHandle(rid);
      return this.markFailed({ status: "transport_error", elapsedMs: Date.now() - startedAt });
    }

    const result = await this.machine.waitUntilReady(handle, rid);
    if (result.status !== "ok") {
      this.logger.error(
        { rid, event: "session_load_failed", provider: this.adapter.spec.id, status: result.status },
        "session_load_failed",
      );
      return this.markFailed(result);
    }

    this.lifecycle = "ready";
    this.lastLoadResult = result;
    this.logger.info(
      { rid, event: "session_ready", provider: this.adapter.spec.id, elapsedMs: result.elapsedMs },
      "session_ready",
    );
    return result;
  }

  private markFailed(result: InteractionResult): InteractionResult {
    this.lifecycle = "failed";
    this.lastLoadResult = result;
    return result;
  }

  private recordAnswer(generation: number, result: InteractionResult, rid?: string): void {
    if (generation !== this.generation) {
      this.logger.warn(
        { rid, event: "stale_interaction", generation, currentGeneration: this.generation, status: result.status },
        "stale_interaction",
      );
      return;
    }

    if (result.status === "ok" && result.text) {
      this.reconciler.recordAnswer(result.text);
    }
  }

  private async closeHandle(rid?: string): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) {
      return;
    }

    try {
      await handle.close();
    } catch (error) {
      this.logger.warn({ rid, event: "browser_close_failed", message: describeError(error) }, "browser_close_failed");
    }
  }
}
