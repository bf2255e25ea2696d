import { describe, expect, it, vi } from "vitest";
import { DiagnosticsScheduler } from "../server/diagnostics-scheduler.js";

describe("diagnostics scheduler", () => {
  it("debounces publishes and runs only the latest schedule", async () => {
    vi.useFakeTimers();
    const scheduler = new DiagnosticsScheduler();
    const calls: string[] = [];

    scheduler.schedule({
      delayMs: 40,
      publish: () => {
        calls.push("first");
      },
    });
    scheduler.schedule({
      delayMs: 40,
      publish: () => {
        calls.push("second");
      },
    });

    await vi.advanceTimersByTimeAsync(39);
    expect(calls).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(calls).toEqual(["second"]);

    scheduler.dispose();
    vi.useRealTimers();
  });

  it("marks a run stale after a newer schedule", async () => {
    vi.useFakeTimers();
    const scheduler = new DiagnosticsScheduler();
    let beforeReschedule = false;
    let afterReschedule = true;

    scheduler.schedule({
      delayMs: 0,
      publish: (run) => {
        beforeReschedule = run.isCurrent();
        scheduler.schedule({
          delayMs: 20,
          publish: () => undefined,
        });
        afterReschedule = run.isCurrent();
      },
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(beforeReschedule).toBe(true);
    expect(afterReschedule).toBe(false);

    scheduler.dispose();
    vi.useRealTimers();
  });

  it("keeps touched documents until a current run finishes", async () => {
    vi.useFakeTimers();
    const scheduler = new DiagnosticsScheduler();
    const runs: string[][] = [];

    scheduler.schedule({
      delayMs: 0,
      uris: ["file:///a.mzn"],
      publish: (run) => {
        runs.push([...run.uris]);
        scheduler.schedule({
          delayMs: 10,
          uris: ["file:///b.mzn"],
          publish: (next) => {
            runs.push([...next.uris]);
          },
        });
      },
    });

    await vi.advanceTimersByTimeAsync(10);
    expect(runs).toEqual([["file:///a.mzn"], ["file:///a.mzn", "file:///b.mzn"]]);

    scheduler.schedule({
      delayMs: 0,
      publish: (run) => {
        runs.push([...run.uris]);
      },
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(runs[2]).toEqual([]);

    scheduler.dispose();
    vi.useRealTimers();
  });

  it("routes publish failures to onError", async () => {
    vi.useFakeTimers();
    const errors: unknown[] = [];
    const scheduler = new DiagnosticsScheduler({ onError: (error) => errors.push(error) });
    const failure = new Error("publish failed");

    scheduler.schedule({
      delayMs: 5,
      publish: async () => {
        throw failure;
      },
    });

    await vi.advanceTimersByTimeAsync(5);
    expect(errors).toEqual([failure]);

    scheduler.dispose();
    vi.useRealTimers();
  });
});
