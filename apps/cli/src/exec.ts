import { readFileSync } from "node:fs";
import { performance } from "node:perf_hooks";
import {
  enablePatternPerf,
  logPatternPerfSummary,
  PatternLoweringBug,
} from "@patlower/compiler";
import { getConfig } from "./config/index.js";
import type { OutputMode } from "./config/types.js";
import { decodeFixture } from "./fixture/decode.js";
import { FixtureError } from "./fixture/errors.js";
import { lowerFixture, type LoweringReport } from "./lower-fixture.js";
import { printJson, printReport } from "./output.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  if (config.perf) {
    enablePatternPerf();
  }

  const startedAt = performance.now();
  const fixture = decodeFixture(readFixture(config.fixture), config.fixture);
  const decodedAt = performance.now();
  const report = lowerFixture(
    fixture,
    config.strictInvariants === undefined ? {} : { strictInvariants: config.strictInvariants }
  );
  const loweredAt = performance.now();

  emit(config.output, report);
  logPatternPerfSummary({
    label: fixture.file,
    patterns: report.arms.length,
    phasesMs: { decode: decodedAt - startedAt, lower: loweredAt - decodedAt },
    diagnostics: report.diagnostics.length,
  });

  if (report.errorCount > 0) {
    process.exitCode = 1;
  }
}

const readFixture = (path: string): unknown => {
  const text = readFileSync(path, "utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FixtureError(`${path} is not valid JSON: ${reason}`);
  }
};

const emit = (mode: OutputMode, report: LoweringReport): void => {
  switch (mode) {
    case "ir":
      return printJson(report.arms.map((arm) => arm.pattern));
    case "report":
      return printJson(report);
    case "patterns":
      return printReport(report);
  }
};

function errorHandler(error: unknown) {
  if (error instanceof FixtureError) {
    console.error(`invalid fixture: ${error.message}`);
    process.exit(1);
  }

  if (error instanceof PatternLoweringBug) {
    console.error(`internal compiler error: ${error.message}`);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
