export const COMPILER_PERF_ENV = "TALLOW_COMPILER_PERF";

const PERF_ENABLED = (() => {
  const raw = process.env[COMPILER_PERF_ENV];
  if (!raw) return false;
  return ["1", "true", "yes"].includes(raw.trim().toLowerCase());
})();

const counters = new Map<string, number>();

export const isCompilerPerfEnabled = (): boolean => PERF_ENABLED;

export const incrementCompilerPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!PERF_ENABLED || amount === 0) return;
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

/** Process-wide counter totals, keys sorted. Empty when perf is off. */
export const compilerPerfCounters = (): Record<string, number> =>
  Object.fromEntries(
    [...counters.entries()].sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export type CompilerPerfSummary = {
  unit: string;
  occurrences: number;
  distinctTexts: number;
};

export const logCompilerPerfSummary = (summary: CompilerPerfSummary): void => {
  if (!PERF_ENABLED) return;
  const line = { ...summary, counters: compilerPerfCounters() };
  console.error(`[tallow:compiler:perf] ${JSON.stringify(line)}`);
};
