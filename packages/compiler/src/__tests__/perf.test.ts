import { afterEach, describe, expect, it, vi } from "vitest";
import { PerfCounters, isPerfEnvEnabled } from "../perf.js";

describe("perf counters", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("reads the switch from the environment", () => {
    vi.stubEnv("TESSERA_PERF", " Yes ");
    expect(isPerfEnvEnabled()).toBe(true);
    vi.stubEnv("TESSERA_PERF", "0");
    expect(isPerfEnvEnabled()).toBe(false);
  });

  it("reports counter deltas sorted by name", () => {
    const perf = new PerfCounters(true);
    perf.increment("resolution.reused", 2);
    const before = perf.snapshot();
    perf.increment("resolution.reused");
    perf.increment("lowering.files");
    perf.increment("cache.dropped", 0);

    expect(perf.diff({ before, after: perf.snapshot() })).toEqual({
      "lowering.files": 1,
      "resolution.reused": 1,
    });
  });

  it("writes one line per summary when enabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    new PerfCounters(false).log({
      file: "a.mzn",
      revision: 1,
      phasesMs: {},
      counters: {},
      diagnostics: 0,
    });
    expect(error).not.toHaveBeenCalled();

    new PerfCounters(true).log({
      file: "a.mzn",
      revision: 3,
      phasesMs: { lower: 1.23456, invalidate: 0.5 },
      counters: { "lowering.files": 1 },
      diagnostics: 2,
    });
    expect(error).toHaveBeenCalledWith(
      '[tessera:perf] {"file":"a.mzn","revision":3,"diagnostics":2,' +
        '"phasesMs":{"invalidate":0.5,"lower":1.235},"counters":{"lowering.files":1}}'
    );
  });
});
