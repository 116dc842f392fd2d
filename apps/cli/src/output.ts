import { formatDiagnosticWithNotes } from "@patlower/compiler";
import type { LoweringReport } from "./lower-fixture.js";

const CIRCULAR_REFERENCE = "[Circular]";

const normalizeBigInt = (value: bigint): string => `${value}n`;

const normalizeWithTraversalTracking = ({
  value,
  ancestors,
  normalize,
}: {
  value: object;
  ancestors: WeakSet<object>;
  normalize: () => unknown;
}): unknown => {
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    return normalize();
  } finally {
    ancestors.delete(value);
  }
};

const normalizeOutput = ({
  value,
  ancestors = new WeakSet(),
}: {
  value: unknown;
  ancestors?: WeakSet<object>;
}): unknown => {
  if (typeof value === "bigint") {
    return normalizeBigInt(value);
  }

  if (!value || typeof value !== "object") {
    return value;
  }

  return normalizeWithTraversalTracking({
    value,
    ancestors,
    normalize: () =>
      Array.isArray(value)
        ? value.map((entry) => normalizeOutput({ value: entry, ancestors }))
        : Object.fromEntries(
            Object.entries(value).map(([key, entry]) => [
              key,
              normalizeOutput({ value: entry, ancestors }),
            ])
          ),
  });
};

/** JSON text for lowered IR; scalar bits are bigints and print as `"255n"`. */
export const stringifyOutput = (value: unknown): string =>
  JSON.stringify(normalizeOutput({ value }), undefined, 2);

export const printJson = (value: unknown): void => {
  console.log(stringifyOutput(value));
};

/** Source-like rendering: one line per arm, then the diagnostics. */
export const formatReport = (report: LoweringReport): string[] => [
  ...report.arms.map((arm, index) => `arm ${index}: ${arm.printed}`),
  ...report.diagnostics.flatMap((diagnostic) => formatDiagnosticWithNotes(diagnostic)),
];

export const printReport = (report: LoweringReport): void => {
  formatReport(report).forEach((line) => console.log(line));
};
