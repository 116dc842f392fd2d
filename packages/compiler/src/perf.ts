import { parseFlag, readProcessEnv } from "./config.js";

type PatternPerfSummary = {
  label: string;
  patterns: number;
  phasesMs: Readonly<Record<string, number>>;
  diagnostics: number;
};

const PATTERN_PERF_ENV = "PATLOWER_PERF";
const PATTERN_TRACE_ENV = "PATLOWER_TRACE";

const env = readProcessEnv();
let perfEnabled = parseFlag(env[PATTERN_PERF_ENV]) ?? false;
const TRACE_ENABLED = parseFlag(env[PATTERN_TRACE_ENV]) ?? false;

const counters = new Map<string, number>();

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>,
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right),
    ),
  );

export const isPatternPerfEnabled = (): boolean => perfEnabled;

/** Turns perf counters on for the rest of the process, e.g. from a CLI flag. */
export const enablePatternPerf = (): void => {
  perfEnabled = true;
};

export const incrementPatternPerfCounter = (
  name: string,
  amount = 1,
): void => {
  if (!perfEnabled || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotPatternPerfCounters = (): Record<string, number> =>
  perfEnabled ? toSortedRecord(counters) : {};

export const resetPatternPerfCounters = (): void => {
  counters.clear();
};

export const logPatternPerfSummary = ({
  label,
  patterns,
  phasesMs,
  diagnostics,
}: PatternPerfSummary): void => {
  if (!perfEnabled) {
    return;
  }

  const summary = {
    label,
    patterns,
    diagnostics,
    phasesMs: Object.fromEntries(
      Object.entries(phasesMs)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([phase, value]) => [phase, roundMs(value)]),
    ),
    counters: snapshotPatternPerfCounters(),
  };

  console.error(`[patlower:perf] ${JSON.stringify(summary)}`);
};

/** `details` is only computed when tracing is on. */
export const tracePatternLowering = (
  message: string,
  details?: () => Record<string, unknown>,
): void => {
  if (!TRACE_ENABLED) {
    return;
  }
  const suffix = details ? ` ${JSON.stringify(details())}` : "";
  console.error(`[patlower:trace] ${message}${suffix}`);
};
