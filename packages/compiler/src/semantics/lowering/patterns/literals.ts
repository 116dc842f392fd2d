import type { HirId, SourceSpan, TypeId } from "../../ids.js";
import type {
  HirConstBlock,
  HirExpr,
  HirLiteral,
  HirQPath,
} from "../../hir/nodes.js";
import type { EvalError, EvalResult } from "../../consts/evaluator.js";
import {
  constType,
  tyConstValue,
  valConst,
  type Instance,
  type PatConst,
} from "../../consts/values.js";
import { incrementPatternPerfCounter } from "../../../perf.js";
import {
  errorKind,
  type Pattern,
  type PatternError,
  type PatternKind,
} from "../../patterns/nodes.js";
import type { PatternLoweringContext } from "./context.js";
import { invariant, patternError, reportedPatternError } from "./errors.js";
import { lowerVariantOrLeaf } from "./variants.js";

const decompose = (
  value: PatConst,
  span: SourceSpan,
  ctx: PatternLoweringContext
): Pattern =>
  ctx.decompose({ value, span, arena: ctx.arena, items: ctx.items });

/** `lit` or `-lit`, the only expressions the literal converter accepts. */
const literalOperand = (
  expr: HirExpr
): { literal: HirLiteral; negated: boolean } | undefined => {
  if (expr.exprKind === "literal") {
    return { literal: expr.literal, negated: false };
  }
  if (expr.exprKind === "unary" && expr.operand.exprKind === "literal") {
    return { literal: expr.operand.literal, negated: true };
  }
  return undefined;
};

const tooGenericError = (
  ctx: PatternLoweringContext,
  span: SourceSpan
): PatternError =>
  patternError({
    ctx,
    error: "const-eval-too-generic",
    code: "LW0008",
    params: { kind: "const-depends-on-generic-parameter" },
    span,
  });

const couldNotEvaluateError = (
  ctx: PatternLoweringContext,
  span: SourceSpan,
  cause?: EvalError
): PatternError =>
  patternError({
    ctx,
    error: "const-eval-failed",
    code: "LW0009",
    params: { kind: "could-not-eval-const-pattern" },
    span,
    related: cause?.kind === "failed" ? [cause.diagnostic] : undefined,
  });

/** Evaluates to a structured constant when possible, to an opaque one otherwise. */
const evaluateInstance = (
  instance: Instance,
  type: TypeId,
  span: SourceSpan,
  ctx: PatternLoweringContext
): EvalResult<PatConst> | { ok: false; bug: string } => {
  incrementPatternPerfCounter("consts.evaluated");
  const valtree = ctx.consts.evaluateToValTree(instance, span);
  if (!valtree.ok) {
    return valtree;
  }
  if (valtree.value) {
    return { ok: true, value: tyConstValue(type, valtree.value) };
  }
  const value = ctx.consts.evaluateToValue(instance, span);
  if (!value.ok) {
    return {
      ok: false,
      bug: `constant ${ctx.items.defName(instance.def)} has neither a structured nor an opaque value`,
    };
  }
  return { ok: true, value: valConst(type, value.value) };
};

type LowerPathParams = {
  qpath: HirQPath;
  hirId: HirId;
  span: SourceSpan;
  ctx: PatternLoweringContext;
};

/**
 * Lowers a path pattern. Constants are evaluated and decomposed into the
 * pattern they stand for; any other path is a unit variant or struct.
 */
export const lowerPath = ({ qpath, hirId, span, ctx }: LowerPathParams): Pattern => {
  const type = ctx.typeck.nodeType(hirId);
  const res = ctx.typeck.qpathRes(qpath, hirId);
  const fromKind = (kind: PatternKind): Pattern => ({ type, span: { ...span }, kind });

  if (
    res.kind !== "def" ||
    (res.defKind !== "const" && res.defKind !== "assoc-const")
  ) {
    return fromKind(lowerVariantOrLeaf({ res, hirId, span, type, subpatterns: [], ctx }));
  }

  const isAssociatedConst = res.defKind === "assoc-const";
  const resolution = ctx.items.resolveInstance(res.def, ctx.typeck.nodeArgs(hirId));
  if (resolution.kind === "unresolved") {
    return fromKind(
      errorKind(
        patternError({
          ctx,
          error: "assoc-const-unresolved",
          code: "LW0007",
          params: { kind: "assoc-const-in-pattern" },
          span,
        })
      )
    );
  }
  if (resolution.kind === "error") {
    return fromKind(errorKind(couldNotEvaluateError(ctx, span)));
  }

  const evaluated = evaluateInstance(resolution.instance, type, span, ctx);
  if (!evaluated.ok) {
    if ("bug" in evaluated) {
      return fromKind(errorKind(invariant(ctx, evaluated.bug, span)));
    }
    return fromKind(
      errorKind(
        evaluated.error.kind === "too-generic"
          ? tooGenericError(ctx, span)
          : couldNotEvaluateError(ctx, span, evaluated.error)
      )
    );
  }

  const pattern = decompose(evaluated.value, span, ctx);
  if (!isAssociatedConst) {
    return pattern;
  }

  const userType = ctx.typeck.userProvidedType(hirId);
  if (!userType) {
    return pattern;
  }
  // The constant's type flows into the pattern, so the ascription is contravariant.
  return {
    type: constType(evaluated.value),
    span: { ...span },
    kind: {
      kind: "ascribe-user-type",
      subpattern: pattern,
      ascription: {
        annotation: {
          userType,
          span: { ...span },
          inferredType: ctx.typeck.nodeType(hirId),
        },
        variance: "contravariant",
      },
    },
  };
};

type LowerInlineConstParams = {
  block: HirConstBlock;
  hirId: HirId;
  span: SourceSpan;
  ctx: PatternLoweringContext;
};

export const lowerInlineConst = ({
  block,
  hirId,
  span,
  ctx,
}: LowerInlineConstParams): PatternKind => {
  const type = ctx.typeck.nodeType(hirId);

  // Literal bodies skip evaluation. Conversion errors are left for the
  // evaluator to report.
  const operand = literalOperand(block.body);
  if (operand) {
    const converted = ctx.consts.litToConst({ ...operand, type });
    if (converted.ok) {
      return decompose({ kind: "ty", value: converted.value }, span, ctx).kind;
    }
  }

  const instance: Instance = { def: block.def, args: [...ctx.genericArgs, type] };
  incrementPatternPerfCounter("consts.evaluated");
  const valtree = ctx.consts.evaluateToValTree(instance, span);
  if (valtree.ok && valtree.value) {
    return decompose(tyConstValue(type, valtree.value), span, ctx).kind;
  }

  const value = ctx.consts.evaluateToValue(instance, span);
  if (value.ok) {
    return decompose(valConst(type, value.value), span, ctx).kind;
  }
  return errorKind(
    value.error.kind === "too-generic"
      ? tooGenericError(ctx, span)
      : reportedPatternError(ctx, "const-eval-failed", value.error.diagnostic)
  );
};

/**
 * Lowers the expression of a literal pattern or range endpoint: a path, an
 * inline constant, or a literal that may be negated. Negation is applied
 * before truncation so the minimum of a signed type stays representable.
 */
export const lowerLit = (
  expr: HirExpr,
  ctx: PatternLoweringContext
): PatternKind => {
  switch (expr.exprKind) {
    case "path":
      return lowerPath({ qpath: expr.qpath, hirId: expr.hirId, span: expr.span, ctx })
        .kind;
    case "const-block":
      return lowerInlineConst({
        block: expr.block,
        hirId: expr.hirId,
        span: expr.span,
        ctx,
      });
    case "literal":
    case "unary":
      break;
  }

  const operand = literalOperand(expr);
  if (!operand) {
    return errorKind(invariant(ctx, "negated pattern operand is not a literal", expr.span));
  }

  const converted = ctx.consts.litToConst({
    ...operand,
    type: ctx.typeck.nodeType(expr.hirId),
  });
  if (converted.ok) {
    return decompose({ kind: "ty", value: converted.value }, operand.literal.span, ctx)
      .kind;
  }
  if (converted.error.kind === "invalid") {
    return errorKind(
      reportedPatternError(ctx, "literal-rejected", converted.error.diagnostic)
    );
  }
  return errorKind(invariant(ctx, "literal pattern does not match its type", expr.span));
};
