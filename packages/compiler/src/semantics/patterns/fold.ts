import type { TypeId } from "../ids.js";
import type { PatConst } from "../consts/values.js";
import type { FieldPattern, Pattern, PatternKind } from "./nodes.js";

/**
 * Structural rewrite over pattern trees. Subclasses override the hooks they
 * care about and call `superFoldPattern` / `superFoldPatternKind` to keep the
 * default recursion for everything else. Folding always builds a new tree.
 */
export class PatternFolder {
  foldPattern(pattern: Pattern): Pattern {
    return superFoldPattern(pattern, this);
  }

  foldPatternKind(kind: PatternKind): PatternKind {
    return superFoldPatternKind(kind, this);
  }

  foldType(type: TypeId): TypeId {
    return type;
  }

  foldConst(value: PatConst): PatConst {
    return superFoldConst(value, this);
  }
}

export const foldPatternWith = (
  pattern: Pattern,
  folder: PatternFolder
): Pattern => folder.foldPattern(pattern);

export const superFoldPattern = (
  pattern: Pattern,
  folder: PatternFolder
): Pattern => ({
  type: folder.foldType(pattern.type),
  span: { ...pattern.span },
  kind: folder.foldPatternKind(pattern.kind),
});

/** Folds the types a constant mentions; the value itself is left as is. */
export const superFoldConst = (
  value: PatConst,
  folder: PatternFolder
): PatConst => {
  if (value.kind === "val") {
    return { kind: "val", value: value.value, type: folder.foldType(value.type) };
  }
  const { type, kind } = value.value;
  return {
    kind: "ty",
    value: {
      type: folder.foldType(type),
      kind:
        kind.kind === "unevaluated"
          ? { ...kind, args: kind.args.map((arg) => folder.foldType(arg)) }
          : kind,
    },
  };
};

const foldPatterns = (
  patterns: readonly Pattern[],
  folder: PatternFolder
): Pattern[] => patterns.map((pattern) => folder.foldPattern(pattern));

const foldOptionalPattern = (
  pattern: Pattern | undefined,
  folder: PatternFolder
): Pattern | undefined => (pattern ? folder.foldPattern(pattern) : undefined);

const foldFieldPatterns = (
  fields: readonly FieldPattern[],
  folder: PatternFolder
): FieldPattern[] =>
  fields.map((field) => ({
    field: field.field,
    pattern: folder.foldPattern(field.pattern),
  }));

export const superFoldPatternKind = (
  kind: PatternKind,
  folder: PatternFolder
): PatternKind => {
  switch (kind.kind) {
    case "wild":
      return { kind: "wild" };
    case "error":
      return {
        kind: "error",
        error: kind.error,
        diagnostic: kind.diagnostic,
      };
    case "ascribe-user-type":
      return {
        kind: "ascribe-user-type",
        subpattern: folder.foldPattern(kind.subpattern),
        ascription: {
          annotation: {
            userType: kind.ascription.annotation.userType,
            span: { ...kind.ascription.annotation.span },
            inferredType: folder.foldType(
              kind.ascription.annotation.inferredType
            ),
          },
          variance: kind.ascription.variance,
        },
      };
    case "binding": {
      const subpattern = foldOptionalPattern(kind.subpattern, folder);
      return {
        kind: "binding",
        mutability: kind.mutability,
        mode: { ...kind.mode },
        name: kind.name,
        var: kind.var,
        varType: folder.foldType(kind.varType),
        ...(subpattern ? { subpattern } : {}),
        isPrimary: kind.isPrimary,
      };
    }
    case "variant":
      return {
        kind: "variant",
        adt: kind.adt,
        args: kind.args.map((arg) => folder.foldType(arg)),
        variantIndex: kind.variantIndex,
        subpatterns: foldFieldPatterns(kind.subpatterns, folder),
      };
    case "leaf":
      return {
        kind: "leaf",
        subpatterns: foldFieldPatterns(kind.subpatterns, folder),
      };
    case "deref":
      return { kind: "deref", subpattern: folder.foldPattern(kind.subpattern) };
    case "constant":
      return { kind: "constant", value: folder.foldConst(kind.value) };
    case "range":
      return {
        kind: "range",
        range: {
          lo: folder.foldConst(kind.range.lo),
          hi: folder.foldConst(kind.range.hi),
          end: kind.range.end,
        },
      };
    case "slice":
    case "array": {
      const middle = foldOptionalPattern(kind.middle, folder);
      return {
        kind: kind.kind,
        prefix: foldPatterns(kind.prefix, folder),
        ...(middle ? { middle } : {}),
        suffix: foldPatterns(kind.suffix, folder),
      };
    }
    case "or":
      return { kind: "or", patterns: foldPatterns(kind.patterns, folder) };
  }
};
