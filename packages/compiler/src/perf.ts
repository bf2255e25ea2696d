type PerfSummary = {
  file: string;
  revision: number;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const PERF_ENV = "TESSERA_PERF";

export const isPerfEnvEnabled = (): boolean => {
  const raw = process.env[PERF_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

const toSortedRecord = (entries: ReadonlyMap<string, number>): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) => left.localeCompare(right))
  );

/** Event counters of one workspace. Disabled counters record nothing. */
export class PerfCounters {
  readonly enabled: boolean;
  readonly #counters = new Map<string, number>();

  constructor(enabled: boolean = isPerfEnvEnabled()) {
    this.enabled = enabled;
  }

  increment(name: string, amount = 1): void {
    if (!this.enabled || amount === 0) return;
    this.#counters.set(name, (this.#counters.get(name) ?? 0) + amount);
  }

  snapshot(): Map<string, number> {
    return this.enabled ? new Map(this.#counters) : new Map();
  }

  diff({
    before,
    after,
  }: {
    before: ReadonlyMap<string, number>;
    after: ReadonlyMap<string, number>;
  }): Record<string, number> {
    if (!this.enabled) return {};
    const keys = new Set<string>([...before.keys(), ...after.keys()]);
    const delta = new Map<string, number>();
    keys.forEach((key) => {
      const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
      if (diff !== 0) delta.set(key, diff);
    });
    return toSortedRecord(delta);
  }

  /** One `[tessera:perf]` line on stderr */
  log({ file, revision, phasesMs, counters, diagnostics }: PerfSummary): void {
    if (!this.enabled) return;
    const summary = {
      file,
      revision,
      diagnostics,
      phasesMs: Object.fromEntries(
        Object.entries(phasesMs)
          .sort(([left], [right]) => left.localeCompare(right))
          .map(([phase, value]) => [phase, roundMs(value)])
      ),
      counters,
    };
    console.error(`[tessera:perf] ${JSON.stringify(summary)}`);
  }
}
