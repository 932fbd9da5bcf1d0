import { describe, expect, it } from "vitest";
import { BridgeError } from "../src/errors.js";
import { Mutex } from "../src/utils/mutex.js";
import { SingleFlightQueue, type LateOutcomeEvent } from "../src/utils/queue.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("SingleFlightQueue", () => {
  it("rejects when queue is full", async () => {
    const queue = new SingleFlightQueue({ maxSize: 1, defaultTimeoutMs: 500 });

    const running = queue.add(async () => {
      await sleep(50);
      return "first";
    });

    await expect(queue.add(async () => "second")).rejects.toMatchObject({ code: "queue_full", retryAfterSec: 10 });
    await expect(running).resolves.toBe("first");
  });

  it("runs one job at a time in FIFO order", async () => {
    const queue = new SingleFlightQueue({ maxSize: 3, defaultTimeoutMs: 500 });
    const order: string[] = [];
    let concurrent = 0;
    let maxConcurrent = 0;

    const job = (name: string, ms: number) => async () => {
      concurrent += 1;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await sleep(ms);
      order.push(name);
      concurrent -= 1;
      return name;
    };

    await Promise.all([queue.add(job("first", 30)), queue.add(job("second", 5)), queue.add(job("third", 1))]);

    expect(order).toEqual(["first", "second", "third"]);
    expect(maxConcurrent).toBe(1);
  });

  it("passes task errors through as bridge errors", async () => {
    const queue = new SingleFlightQueue({ maxSize: 2, defaultTimeoutMs: 500 });

    await expect(
      queue.add(async () => {
        throw new BridgeError("send_failed", "Failed to send message");
      }),
    ).rejects.toMatchObject({ code: "send_failed" });
    await expect(
      queue.add(async () => {
        throw new Error("boom");
      }),
    ).rejects.toMatchObject({ code: "unknown", message: "boom" });
  });

  it("times out the caller but holds the slot until the task settles", async () => {
    const queue = new SingleFlightQueue({ maxSize: 5, defaultTimeoutMs: 50 });
    let releaseTask: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      releaseTask = resolve;
    });

    await expect(
      queue.add(async () => {
        await blocker;
        return "done";
      }),
    ).rejects.toMatchObject({ code: "timeout" });
    expect(queue.getDepth()).toBe(1);

    releaseTask();
    await sleep(20);
    expect(queue.getDepth()).toBe(0);
  });

  it("reports late outcomes with their label", async () => {
    const lateOutcomes: LateOutcomeEvent[] = [];
    const queue = new SingleFlightQueue({
      maxSize: 2,
      defaultTimeoutMs: 10,
      onLateOutcome: (event) => {
        lateOutcomes.push(event);
      },
    });

    await expect(
      queue.add(
        async () => {
          await sleep(40);
          throw new BridgeError("extract_failed", "Empty response");
        },
        10,
        "chat_completion",
      ),
    ).rejects.toMatchObject({ code: "timeout" });

    await sleep(60);
    expect(lateOutcomes).toHaveLength(1);
    expect(lateOutcomes[0]).toMatchObject({ label: "chat_completion", outcome: "rejected", errorCode: "extract_failed" });
  });
});

describe("Mutex", () => {
  it("runs sections one after another in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await sleep(20);
      events.push("first:end");
    });
    const second = mutex.runExclusive(async () => {
      events.push("second:start");
    });

    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("releases the lock when a section throws", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive(async () => "next")).resolves.toBe("next");
  });
});
