import type { SourceSpan, TypeId } from "../../ids.js";
import type { HirPattern, HirPatternKind, Res } from "../../hir/nodes.js";
import { variantOfRes, type AdtDef } from "../../items.js";
import {
  errorKind,
  type FieldPattern,
  type Mutability,
  type Pattern,
  type PatternBindingMode,
  type PatternKind,
} from "../../patterns/nodes.js";
import { printPattern } from "../../patterns/printer.js";
import {
  incrementPatternPerfCounter,
  tracePatternLowering,
} from "../../../perf.js";
import type { PatternLoweringContext } from "./context.js";
import { invariant, patternError, PatternLoweringBug } from "./errors.js";
import { lowerLit, lowerPath } from "./literals.js";
import { lowerPatternRange } from "./range.js";
import { lowerVariantOrLeaf } from "./variants.js";

type HirPatternOf<K extends HirPatternKind["kind"]> = Extract<
  HirPattern,
  { kind: K }
>;

/**
 * Field indices for `count` positional patterns matched against `expectedLength`
 * fields, where a `..` at `dotDotPos` stands for the fields that are skipped.
 */
export const enumerateAndAdjust = (
  count: number,
  expectedLength: number,
  dotDotPos?: number
): number[] => {
  const gap = dotDotPos ?? count;
  const skipped = Math.max(expectedLength - count, 0);
  return Array.from({ length: count }, (_, index) =>
    index < gap ? index : index + skipped
  );
};

const lowerTupleSubpatterns = (
  patterns: readonly HirPattern[],
  expectedLength: number,
  dotDotPos: number | undefined,
  ctx: PatternLoweringContext
): FieldPattern[] => {
  const fields = enumerateAndAdjust(patterns.length, expectedLength, dotDotPos);
  return patterns.map((pattern, index) => ({
    field: fields[index] ?? index,
    pattern: lowerPattern(pattern, ctx),
  }));
};

export const lowerPatterns = (
  patterns: readonly HirPattern[],
  ctx: PatternLoweringContext
): Pattern[] => patterns.map((pattern) => lowerPattern(pattern, ctx));

const erroneousType = (ctx: PatternLoweringContext, span: SourceSpan): PatternKind =>
  errorKind(
    patternError({
      ctx,
      error: "erroneous-type",
      code: "LW0011",
      params: { kind: "erroneous-pattern-type" },
      span,
    })
  );

const lowerSliceOrArray = (
  pattern: HirPatternOf<"slice">,
  type: TypeId,
  ctx: PatternLoweringContext
): PatternKind => {
  const prefix = lowerPatterns(pattern.prefix, ctx);
  const middle = pattern.middle ? lowerPattern(pattern.middle, ctx) : undefined;
  const suffix = lowerPatterns(pattern.suffix, ctx);
  const rest = middle ? { middle } : {};

  const desc = ctx.arena.get(type);
  switch (desc.kind) {
    case "slice":
      return { kind: "slice", prefix, ...rest, suffix };
    case "array":
      if (desc.length < prefix.length + suffix.length) {
        throw new PatternLoweringBug(
          `array pattern has ${prefix.length + suffix.length} elements but the array has ${desc.length}`,
          pattern.span
        );
      }
      return { kind: "array", prefix, ...rest, suffix };
    case "error":
      return erroneousType(ctx, pattern.span);
    default:
      return errorKind(invariant(ctx, `bad slice pattern type ${type}`, pattern.span));
  }
};

/** Binding spans stop at the identifier, leaving out any `@` subpattern. */
const bindingSpan = (span: SourceSpan, ident: SourceSpan): SourceSpan =>
  ident.file === span.file && ident.start >= span.start && ident.end <= span.end
    ? { ...span, end: ident.end }
    : { ...span };

const lowerBinding = (
  pattern: HirPatternOf<"binding">,
  type: TypeId,
  ctx: PatternLoweringContext
): Pattern => {
  const span = bindingSpan(pattern.span, pattern.ident.span);
  const annotation = ctx.typeck.patBindingMode(pattern.hirId);
  if (!annotation) {
    throw new PatternLoweringBug(`missing binding mode for ${pattern.ident.name}`, pattern.span);
  }

  const [mutability, mode]: [Mutability, PatternBindingMode] =
    annotation.kind === "by-value"
      ? [annotation.mutable ? "mut" : "not", { kind: "by-value" }]
      : ["not", { kind: "by-ref", borrow: annotation.mutable ? "mut" : "shared" }];

  // `ref x` has the reference type; the node matches the referent.
  let nodeType = type;
  if (annotation.kind === "by-ref") {
    const desc = ctx.arena.get(type);
    if (desc.kind !== "ref") {
      return {
        type,
        span,
        kind: errorKind(
          invariant(ctx, `\`ref ${pattern.ident.name}\` has non-reference type ${type}`, span)
        ),
      };
    }
    nodeType = desc.referent;
  }

  const subpattern = pattern.subpattern
    ? lowerPattern(pattern.subpattern, ctx)
    : undefined;
  return {
    type: nodeType,
    span,
    kind: {
      kind: "binding",
      mutability,
      mode,
      name: pattern.ident.name,
      var: pattern.varId,
      varType: type,
      ...(subpattern ? { subpattern } : {}),
      isPrimary: pattern.varId === pattern.hirId,
    },
  };
};

const constructorLikeDefKinds = new Set([
  "variant",
  "ctor-variant",
  "ctor-struct",
  "struct",
  "union",
  "ty-alias",
  "assoc-ty",
]);

/** Field count of the constructor `res` names, if it names one. */
const constructorFieldCount = (adt: AdtDef, res: Res): number | undefined => {
  const constructorLike =
    (res.kind === "def" && constructorLikeDefKinds.has(res.defKind)) ||
    res.kind === "self-ty-param" ||
    res.kind === "self-ty-alias" ||
    res.kind === "self-ctor";
  return constructorLike ? variantOfRes(adt, res).fields.length : undefined;
};

const lowerTupleStruct = (
  pattern: HirPatternOf<"tuple-struct">,
  type: TypeId,
  ctx: PatternLoweringContext
): PatternKind => {
  const res = ctx.typeck.qpathRes(pattern.qpath, pattern.hirId);
  const desc = ctx.arena.get(type);
  if (desc.kind === "error") {
    return erroneousType(ctx, pattern.span);
  }
  if (desc.kind !== "adt") {
    return errorKind(
      invariant(ctx, `tuple struct pattern not applied to an ADT (${type})`, pattern.span)
    );
  }

  const expectedLength =
    constructorFieldCount(ctx.items.adtDef(desc.adt), res) ?? pattern.patterns.length;
  const subpatterns = lowerTupleSubpatterns(
    pattern.patterns,
    expectedLength,
    pattern.dotDotPos,
    ctx
  );
  return lowerVariantOrLeaf({
    res,
    hirId: pattern.hirId,
    span: pattern.span,
    type,
    subpatterns,
    ctx,
  });
};

/** Lowers one pattern without the dereferences the type checker inserted around it. */
export const lowerPatternUnadjusted = (
  pattern: HirPattern,
  ctx: PatternLoweringContext
): Pattern => {
  const type = ctx.typeck.nodeType(pattern.hirId);
  const build = (kind: PatternKind): Pattern => ({
    type,
    span: { ...pattern.span },
    kind,
  });

  switch (pattern.kind) {
    case "wild":
      return build({ kind: "wild" });
    case "literal":
      return build(lowerLit(pattern.expr, ctx));
    case "range": {
      const result = lowerPatternRange({
        lo: pattern.lo,
        hi: pattern.hi,
        end: pattern.end,
        type,
        span: pattern.span,
        ctx,
      });
      return build(result.ok ? result.value : errorKind(result.error));
    }
    case "path":
      return lowerPath({
        qpath: pattern.qpath,
        hirId: pattern.hirId,
        span: pattern.span,
        ctx,
      });
    case "ref":
    case "box":
      return build({
        kind: "deref",
        subpattern: lowerPattern(pattern.subpattern, ctx),
      });
    case "slice":
      return build(lowerSliceOrArray(pattern, type, ctx));
    case "tuple": {
      const desc = ctx.arena.get(type);
      if (desc.kind === "error") {
        return build(erroneousType(ctx, pattern.span));
      }
      if (desc.kind !== "tuple") {
        return build(
          errorKind(invariant(ctx, `unexpected type ${type} for tuple pattern`, pattern.span))
        );
      }
      return build({
        kind: "leaf",
        subpatterns: lowerTupleSubpatterns(
          pattern.patterns,
          desc.elements.length,
          pattern.dotDotPos,
          ctx
        ),
      });
    }
    case "binding":
      return lowerBinding(pattern, type, ctx);
    case "tuple-struct":
      return build(lowerTupleStruct(pattern, type, ctx));
    case "struct": {
      const res = ctx.typeck.qpathRes(pattern.qpath, pattern.hirId);
      const subpatterns = pattern.fields.map(
        (field): FieldPattern => ({
          field: ctx.typeck.fieldIndex(field.hirId),
          pattern: lowerPattern(field.pattern, ctx),
        })
      );
      return build(
        lowerVariantOrLeaf({
          res,
          hirId: pattern.hirId,
          span: pattern.span,
          type,
          subpatterns,
          ctx,
        })
      );
    }
    case "or":
      return build({ kind: "or", patterns: lowerPatterns(pattern.patterns, ctx) });
  }
};

/**
 * Lowers a pattern and wraps it in one `deref` per implicit dereference. The
 * adjustments are consumed in reverse, so the outermost `deref` carries the
 * least dereferenced type.
 */
export const lowerPattern = (
  pattern: HirPattern,
  ctx: PatternLoweringContext
): Pattern => {
  const unadjusted = lowerPatternUnadjusted(pattern, ctx);
  const adjustments = ctx.typeck.patAdjustments(pattern.hirId) ?? [];
  return adjustments.reduceRight<Pattern>(
    (inner, referenceType) => ({
      type: referenceType,
      span: { ...inner.span },
      kind: { kind: "deref", subpattern: inner },
    }),
    unadjusted
  );
};

/** Entry point for one top-level pattern, e.g. a match arm. */
export const patternFromHir = (
  pattern: HirPattern,
  ctx: PatternLoweringContext
): Pattern => {
  incrementPatternPerfCounter("patterns.lowered");
  const lowered = lowerPattern(pattern, ctx);
  tracePatternLowering("patternFromHir", () => ({
    hirId: pattern.hirId,
    result: printPattern(lowered, ctx),
  }));
  return lowered;
};
