import type { HirId, SourceSpan, TypeId } from "../../ids.js";
import type { Res } from "../../hir/nodes.js";
import { isEnum, variantIndexWithId } from "../../items.js";
import {
  errorKind,
  type FieldPattern,
  type PatternKind,
} from "../../patterns/nodes.js";
import type { PatternLoweringContext } from "./context.js";
import { invariant, patternError } from "./errors.js";

type LowerVariantOrLeafParams = {
  res: Res;
  hirId: HirId;
  span: SourceSpan;
  type: TypeId;
  subpatterns: readonly FieldPattern[];
  ctx: PatternLoweringContext;
};

/** Variant constructors resolve to the variant that owns them. */
const normalizeCtorRes = (res: Res, ctx: PatternLoweringContext): Res =>
  res.kind === "def" && res.defKind === "ctor-variant"
    ? { kind: "def", defKind: "variant", def: ctx.items.parent(res.def) }
    : res;

const lowerUnascribed = ({
  res,
  span,
  type,
  subpatterns,
  ctx,
}: LowerVariantOrLeafParams): PatternKind | { skipAscription: PatternKind } => {
  if (res.kind === "def") {
    switch (res.defKind) {
      case "variant": {
        const adt = ctx.items.adtDef(ctx.items.parent(res.def));
        if (!isEnum(adt)) {
          return { kind: "leaf", subpatterns };
        }
        const desc = ctx.arena.get(type);
        if (desc.kind === "error") {
          return {
            skipAscription: errorKind(
              patternError({
                ctx,
                error: "erroneous-type",
                code: "LW0011",
                params: { kind: "erroneous-pattern-type" },
                span,
              })
            ),
          };
        }
        if (desc.kind !== "adt" && desc.kind !== "fn-def") {
          return {
            skipAscription: errorKind(
              invariant(ctx, `inappropriate type ${type} for variant ${adt.name}`, span)
            ),
          };
        }
        return {
          kind: "variant",
          adt,
          args: desc.args,
          variantIndex: variantIndexWithId(adt, res.def),
          subpatterns,
        };
      }
      case "struct":
      case "ctor-struct":
      case "union":
      case "ty-alias":
      case "assoc-ty":
        return { kind: "leaf", subpatterns };
      case "const-param":
        return errorKind(
          patternError({
            ctx,
            error: "const-param-in-pattern",
            code: "LW0004",
            params: { kind: "const-param-in-pattern" },
            span,
          })
        );
      case "static":
        return errorKind(
          patternError({
            ctx,
            error: "static-in-pattern",
            code: "LW0005",
            params: { kind: "static-in-pattern" },
            span,
          })
        );
      default:
        break;
    }
  }

  if (
    res.kind === "self-ty-param" ||
    res.kind === "self-ty-alias" ||
    res.kind === "self-ctor"
  ) {
    return { kind: "leaf", subpatterns };
  }

  return errorKind(
    patternError({
      ctx,
      error: "non-const-path",
      code: "LW0006",
      params: { kind: "non-const-path" },
      span,
    })
  );
};

/**
 * Builds the node for a resolved path with field subpatterns: a `variant`
 * for enum variants, a `leaf` for anything with a single shape, or an error
 * for paths that cannot appear in patterns. A user-written type on the node
 * becomes a covariant ascription around the result.
 */
export const lowerVariantOrLeaf = (
  params: LowerVariantOrLeafParams
): PatternKind => {
  const { hirId, span, type, ctx } = params;
  const lowered = lowerUnascribed({
    ...params,
    res: normalizeCtorRes(params.res, ctx),
  });
  if ("skipAscription" in lowered) {
    return lowered.skipAscription;
  }

  const userType = ctx.typeck.userProvidedType(hirId);
  if (!userType) {
    return lowered;
  }
  return {
    kind: "ascribe-user-type",
    subpattern: { type, span: { ...span }, kind: lowered },
    ascription: {
      annotation: {
        userType,
        span: { ...span },
        inferredType: ctx.typeck.nodeType(hirId),
      },
      variance: "covariant",
    },
  };
};
