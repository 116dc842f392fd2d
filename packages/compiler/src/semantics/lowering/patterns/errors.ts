import {
  reportDiagnostic,
  type DiagnosticCode,
  type DiagnosticParams,
} from "../../../diagnostics/index.js";
import { incrementPatternPerfCounter } from "../../../perf.js";
import type { Diagnostic, SourceSpan } from "../../ids.js";
import type { PatternError, PatternErrorKind } from "../../patterns/nodes.js";
import type { PatternLoweringContext } from "./context.js";

export type LoweringResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PatternError };

/** An earlier phase handed lowering input it promised never to produce. */
export class PatternLoweringBug extends Error {
  readonly span: SourceSpan;

  constructor(message: string, span: SourceSpan) {
    super(`${message} (${span.file}:${span.start}-${span.end})`);
    this.name = "PatternLoweringBug";
    this.span = span;
  }
}

export const patternError = <K extends DiagnosticCode>({
  ctx,
  error,
  code,
  params,
  span,
  related,
}: {
  ctx: PatternLoweringContext;
  error: PatternErrorKind;
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  related?: readonly Diagnostic[];
}): PatternError => {
  incrementPatternPerfCounter("patterns.errors");
  return {
    error,
    diagnostic: reportDiagnostic({ ctx, code, params, span, related }),
  };
};

/** Reports a diagnostic produced by a collaborator and ties it to an error node. */
export const reportedPatternError = (
  ctx: PatternLoweringContext,
  error: PatternErrorKind,
  diagnostic: Diagnostic
): PatternError => {
  incrementPatternPerfCounter("patterns.errors");
  return { error, diagnostic: ctx.diagnostics.report(diagnostic) };
};

/**
 * Throws `PatternLoweringBug` under strict invariants. Otherwise reports
 * LW9999 so lowering can continue with an `internal` error node.
 */
export const invariant = (
  ctx: PatternLoweringContext,
  message: string,
  span: SourceSpan
): PatternError => {
  if (ctx.options.strictInvariants) {
    throw new PatternLoweringBug(message, span);
  }
  return patternError({
    ctx,
    error: "internal",
    code: "LW9999",
    params: { kind: "internal-invariant", message },
    span,
  });
};
