import { Command } from "commander";
import { createRequire } from "node:module";
import type { OutputMode, PatlowerConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

type CliOptions = {
  emitIr?: boolean;
  json?: boolean;
  strict?: boolean;
  perf?: boolean;
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

const outputModeOf = (opts: CliOptions): OutputMode => {
  if (opts.json) return "report";
  if (opts.emitIr) return "ir";
  return "patterns";
};

export const parseCliArgs = (argv: readonly string[]): PatlowerConfig => {
  const program = createBaseCommand({
    name: "patlower",
    description: "Lower the match arm patterns of a JSON fixture and print the result",
  });

  program
    .argument("<fixture>", "JSON fixture describing items, types and patterns")
    .option("--emit-ir", "write the lowered pattern IR as JSON to stdout")
    .option("--json", "write the full report (IR, printed arms, diagnostics) as JSON")
    .option("--strict", "throw on internal invariant violations")
    .option("--no-strict", "report internal invariant violations as LW9999")
    .option("--perf", "log lowering counters and timings to stderr");

  program.parse(["node", "patlower", ...argv]);
  const opts = program.opts<CliOptions>();
  const [fixture] = program.args;
  if (fixture === undefined) {
    program.error("missing fixture path");
  }

  return {
    fixture,
    output: outputModeOf(opts),
    ...(opts.strict === undefined ? {} : { strictInvariants: opts.strict }),
    perf: opts.perf ?? false,
  };
};

export const getConfigFromCli = (): PatlowerConfig =>
  parseCliArgs(process.argv.slice(2));
