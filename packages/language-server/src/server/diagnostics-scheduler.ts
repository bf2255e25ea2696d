export type DiagnosticsRun = {
  isCurrent: () => boolean;
  /** Documents touched by the schedules no finished run has covered yet */
  uris: ReadonlySet<string>;
};

/**
 * Debounces diagnostics publishing. A run is obsolete as soon as another
 * schedule lands, and publishers are expected to check `isCurrent` between
 * documents.
 */
export class DiagnosticsScheduler {
  #runId = 0;
  #timer: ReturnType<typeof setTimeout> | undefined;
  #pending = new Set<string>();
  readonly #onError: (error: unknown) => void;

  constructor({ onError }: { onError?: (error: unknown) => void } = {}) {
    this.#onError =
      onError ??
      ((error) => {
        console.error(error);
      });
  }

  schedule({
    delayMs,
    uris = [],
    publish,
  }: {
    delayMs: number;
    uris?: Iterable<string>;
    publish: (run: DiagnosticsRun) => Promise<void> | void;
  }): void {
    this.#runId += 1;
    const runId = this.#runId;
    for (const uri of uris) this.#pending.add(uri);

    if (this.#timer) {
      clearTimeout(this.#timer);
    }

    this.#timer = setTimeout(() => {
      this.#timer = undefined;
      const touched = new Set(this.#pending);
      const isCurrent = () => runId === this.#runId;
      // A superseded run leaves its documents pending for the next one.
      Promise.resolve()
        .then(() => publish({ isCurrent, uris: touched }))
        .then(() => {
          if (isCurrent()) touched.forEach((uri) => this.#pending.delete(uri));
        })
        .catch(this.#onError);
    }, delayMs);
  }

  dispose(): void {
    this.#pending.clear();
    if (!this.#timer) {
      return;
    }
    clearTimeout(this.#timer);
    this.#timer = undefined;
  }
}
