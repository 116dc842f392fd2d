import type { SourceSpan, TypeId } from "../../ids.js";
import type { HirExpr, RangeEnd } from "../../hir/nodes.js";
import { compareConstValues } from "../../consts/compare.js";
import { constType, tyConstValue, leaf, type PatConst } from "../../consts/values.js";
import {
  integerRange,
  numericMaxValue,
  numericMinValue,
} from "../../typing/numeric.js";
import { formatType } from "../../typing/type-format.js";
import type {
  Ascription,
  PatternError,
  PatternKind,
} from "../../patterns/nodes.js";
import type { PatternLoweringContext } from "./context.js";
import { invariant, patternError, type LoweringResult } from "./errors.js";
import { lowerLit } from "./literals.js";

type RangeEndpoint = {
  value?: PatConst;
  ascription?: Ascription;
};

const lowerRangeEndpoint = (
  expr: HirExpr | undefined,
  ctx: PatternLoweringContext
): LoweringResult<RangeEndpoint> => {
  if (!expr) {
    return { ok: true, value: {} };
  }

  let kind = lowerLit(expr, ctx);
  let ascription: Ascription | undefined;
  if (kind.kind === "ascribe-user-type") {
    ascription = kind.ascription;
    kind = kind.subpattern.kind;
  }

  if (kind.kind === "constant") {
    return { ok: true, value: { value: kind.value, ascription } };
  }
  if (kind.kind === "error") {
    return { ok: false, error: { error: kind.error, diagnostic: kind.diagnostic } };
  }
  return {
    ok: false,
    error: invariant(ctx, `range endpoint lowered to ${kind.kind}`, expr.span),
  };
};

/**
 * Reports an integer literal endpoint outside its type's range. A wrapped
 * literal such as `-130i8` would otherwise show up as an inverted range.
 */
const literalOverflowError = (
  expr: HirExpr | undefined,
  type: TypeId,
  ctx: PatternLoweringContext
): PatternError | undefined => {
  if (!expr) return undefined;

  const negated = expr.exprKind === "unary";
  const operand = expr.exprKind === "unary" ? expr.operand : expr;
  if (operand.exprKind !== "literal" || operand.literal.litKind !== "int") {
    return undefined;
  }

  const bounds = integerRange(ctx.arena.get(type));
  if (!bounds) return undefined;

  const value = operand.literal.value;
  const overflows = negated ? value > bounds.max + 1n : value > bounds.max;
  if (!overflows) return undefined;

  return patternError({
    ctx,
    error: "literal-overflow",
    code: "LW0003",
    params: {
      kind: "literal-out-of-range",
      typeName: formatType(ctx.arena, type, ctx.items),
      min: bounds.min.toString(),
      max: bounds.max.toString(),
    },
    span: expr.span,
  });
};

const boundOrExtremum = (
  bound: PatConst | undefined,
  extremum: "min" | "max",
  type: TypeId,
  span: SourceSpan,
  ctx: PatternLoweringContext
): LoweringResult<PatConst> => {
  if (bound) {
    return { ok: true, value: bound };
  }
  const scalar =
    extremum === "min"
      ? numericMinValue(ctx.arena, type)
      : numericMaxValue(ctx.arena, type);
  if (!scalar) {
    return {
      ok: false,
      error: invariant(ctx, `half-open range on non-numeric type ${type}`, span),
    };
  }
  return { ok: true, value: tyConstValue(type, leaf(scalar.bits, scalar.size)) };
};

type LowerPatternRangeParams = {
  lo?: HirExpr;
  hi?: HirExpr;
  end: RangeEnd;
  type: TypeId;
  span: SourceSpan;
  ctx: PatternLoweringContext;
};

/**
 * Lowers `lo..hi` and `lo..=hi`. Missing bounds take the type's extrema.
 * The result is a non-empty `range`, or a `constant` for `x..=x`.
 * Ascriptions on either endpoint wrap the result, the lower bound's innermost.
 */
export const lowerPatternRange = ({
  lo: loExpr,
  hi: hiExpr,
  end,
  type,
  span,
  ctx,
}: LowerPatternRangeParams): LoweringResult<PatternKind> => {
  if (!loExpr && !hiExpr) {
    return {
      ok: false,
      error: invariant(ctx, "twice-open range pattern", span),
    };
  }

  const loEndpoint = lowerRangeEndpoint(loExpr, ctx);
  if (!loEndpoint.ok) return loEndpoint;
  const hiEndpoint = lowerRangeEndpoint(hiExpr, ctx);
  if (!hiEndpoint.ok) return hiEndpoint;

  const lo = boundOrExtremum(loEndpoint.value.value, "min", type, span, ctx);
  if (!lo.ok) return lo;
  const hi = boundOrExtremum(hiEndpoint.value.value, "max", type, span, ctx);
  if (!hi.ok) return hi;

  if (constType(lo.value) !== type || constType(hi.value) !== type) {
    return {
      ok: false,
      error: invariant(ctx, "range endpoint type differs from the pattern type", span),
    };
  }

  const ordering = compareConstValues(lo.value, hi.value, ctx);
  let kind: PatternKind;
  if (end === "excluded" && ordering === -1) {
    kind = { kind: "range", range: { lo: lo.value, hi: hi.value, end } };
  } else if (end === "included" && ordering === 0) {
    kind = { kind: "constant", value: lo.value };
  } else if (end === "included" && ordering === -1) {
    kind = { kind: "range", range: { lo: lo.value, hi: hi.value, end } };
  } else {
    const overflow =
      literalOverflowError(loExpr, type, ctx) ??
      literalOverflowError(hiExpr, type, ctx);
    if (overflow) {
      return { ok: false, error: overflow };
    }
    return {
      ok: false,
      error:
        end === "included"
          ? patternError({
              ctx,
              error: "malformed-range",
              code: "LW0002",
              params: { kind: "lower-bound-greater-than-upper" },
              span,
            })
          : patternError({
              ctx,
              error: "malformed-range",
              code: "LW0001",
              params: { kind: "lower-bound-not-less-than-upper" },
              span,
            }),
    };
  }

  for (const ascription of [loEndpoint.value.ascription, hiEndpoint.value.ascription]) {
    if (ascription) {
      kind = {
        kind: "ascribe-user-type",
        ascription,
        subpattern: { type, span: { ...span }, kind },
      };
    }
  }
  return { ok: true, value: kind };
};
