import type {
  Diagnostic,
  FieldIndex,
  LocalVarId,
  SourceSpan,
  TypeId,
  VariantIndex,
} from "../ids.js";
import type { RangeEnd } from "../hir/nodes.js";
import type { AdtDef } from "../items.js";
import type { PatConst } from "../consts/values.js";
import type { CanonicalUserType } from "../typing/typeck-results.js";

export type Mutability = "not" | "mut";

export type PatternBindingMode =
  | { kind: "by-value" }
  | { kind: "by-ref"; borrow: "shared" | "mut" };

export type Variance = "covariant" | "contravariant" | "invariant";

export interface UserTypeAnnotation {
  userType: CanonicalUserType;
  span: SourceSpan;
  inferredType: TypeId;
}

/**
 * `variance` gives the direction in which the inferred type must relate to
 * the annotation: covariant when the annotation constrains the scrutinee,
 * contravariant when it describes a constant that flows into the pattern.
 */
export interface Ascription {
  annotation: UserTypeAnnotation;
  variance: Variance;
}

export interface PatternRange {
  lo: PatConst;
  hi: PatConst;
  end: RangeEnd;
}

export interface FieldPattern {
  field: FieldIndex;
  pattern: Pattern;
}

export type PatternErrorKind =
  | "malformed-range"
  | "literal-overflow"
  | "const-param-in-pattern"
  | "static-in-pattern"
  | "non-const-path"
  | "assoc-const-unresolved"
  | "const-eval-too-generic"
  | "const-eval-failed"
  | "literal-rejected"
  | "erroneous-type"
  | "internal";

export interface PatternError {
  error: PatternErrorKind;
  diagnostic: Diagnostic;
}

export type PatternKind =
  | { kind: "wild" }
  | {
      kind: "ascribe-user-type";
      subpattern: Pattern;
      ascription: Ascription;
    }
  | {
      kind: "binding";
      mutability: Mutability;
      mode: PatternBindingMode;
      name: string;
      var: LocalVarId;
      /** Type of the bound variable; differs from the node type for `ref` bindings. */
      varType: TypeId;
      subpattern?: Pattern;
      isPrimary: boolean;
    }
  | {
      kind: "variant";
      adt: AdtDef;
      args: readonly TypeId[];
      variantIndex: VariantIndex;
      subpatterns: readonly FieldPattern[];
    }
  | { kind: "leaf"; subpatterns: readonly FieldPattern[] }
  | { kind: "deref"; subpattern: Pattern }
  | { kind: "constant"; value: PatConst }
  | { kind: "range"; range: PatternRange }
  | {
      kind: "slice";
      prefix: readonly Pattern[];
      middle?: Pattern;
      suffix: readonly Pattern[];
    }
  | {
      kind: "array";
      prefix: readonly Pattern[];
      middle?: Pattern;
      suffix: readonly Pattern[];
    }
  | { kind: "or"; patterns: readonly Pattern[] }
  | ({ kind: "error" } & PatternError);

export interface Pattern {
  type: TypeId;
  span: SourceSpan;
  kind: PatternKind;
}

export const errorKind = (error: PatternError): PatternKind => ({
  kind: "error",
  ...error,
});

export const isWildcardPattern = (pattern: Pattern): boolean =>
  pattern.kind.kind === "wild";
