export type OutputMode = "patterns" | "ir" | "report";

export type PatlowerConfig = {
  /** Path to the JSON fixture to lower. */
  fixture: string;
  output: OutputMode;
  /** `undefined` defers to `PATLOWER_STRICT_INVARIANTS` and `NODE_ENV`. */
  strictInvariants?: boolean;
  perf: boolean;
};
