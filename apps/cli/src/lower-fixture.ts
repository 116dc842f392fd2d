import {
  createPatternLoweringContext,
  DiagnosticEmitter,
  patternFromHir,
  printPattern,
  type Diagnostic,
  type Pattern,
  type PatternLoweringOptions,
} from "@patlower/compiler";
import type { LoweringFixture } from "./fixture/decode.js";

export type LoweredArm = {
  printed: string;
  pattern: Pattern;
};

export type LoweringReport = {
  file: string;
  arms: LoweredArm[];
  diagnostics: readonly Diagnostic[];
  errorCount: number;
};

/** Lowers every arm of a fixture with one shared context and emitter. */
export const lowerFixture = (
  fixture: LoweringFixture,
  options: Partial<PatternLoweringOptions> = {}
): LoweringReport => {
  const diagnostics = new DiagnosticEmitter();
  const ctx = createPatternLoweringContext({
    arena: fixture.arena,
    items: fixture.items,
    typeck: fixture.typeck,
    consts: fixture.consts,
    diagnostics,
    genericArgs: fixture.genericArgs,
    options,
  });

  const arms = fixture.arms.map((arm) => {
    const pattern = patternFromHir(arm, ctx);
    return { printed: printPattern(pattern, ctx), pattern };
  });

  return {
    file: fixture.file,
    arms,
    diagnostics: diagnostics.diagnostics,
    errorCount: diagnostics.errorCount,
  };
};
