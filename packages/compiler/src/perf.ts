type PerfSummary = {
  entryPath: string;
  success: boolean;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const PERF_ENV = "PYFUSE_PERF";

const PERF_ENABLED = (() => {
  const raw = process.env[PERF_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
})();

const counters = new Map<string, number>();

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: Iterable<[string, number]>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries).sort(([left], [right]) => left.localeCompare(right)),
  );

export const isPerfEnabled = (): boolean => PERF_ENABLED;

export const incrementPerfCounter = (name: string, amount = 1): void => {
  if (!PERF_ENABLED || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotPerfCounters = (): Map<string, number> =>
  PERF_ENABLED ? new Map(counters) : new Map();

export const diffPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!PERF_ENABLED) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta: [string, number][] = [];
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.push([key, diff]);
    }
  });
  return toSortedRecord(delta);
};

/** Wall-clock timings of named phases, in call order. */
export class PhaseTimer {
  readonly phasesMs: Record<string, number> = {};

  async time<T>(phase: string, run: () => Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      return await run();
    } finally {
      this.record(phase, started);
    }
  }

  timeSync<T>(phase: string, run: () => T): T {
    const started = performance.now();
    try {
      return run();
    } finally {
      this.record(phase, started);
    }
  }

  private record(phase: string, started: number) {
    this.phasesMs[phase] = (this.phasesMs[phase] ?? 0) + performance.now() - started;
  }
}

export const logPerfSummary = ({
  entryPath,
  success,
  phasesMs,
  counters: counterDelta,
  diagnostics,
}: PerfSummary): void => {
  if (!PERF_ENABLED) {
    return;
  }

  const summary = {
    entryPath,
    success,
    diagnostics,
    phasesMs: toSortedRecord(
      Object.entries(phasesMs).map(
        ([phase, value]): [string, number] => [phase, roundMs(value)],
      ),
    ),
    counters: counterDelta,
  };

  console.error(`[pyfuse:perf] ${JSON.stringify(summary)}`);
};
