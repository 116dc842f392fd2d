import type { DefId, HirId, LocalVarId, SourceSpan } from "../ids.js";

export type DefKind =
  | "struct"
  | "union"
  | "enum"
  | "variant"
  | "ctor-struct"
  | "ctor-variant"
  | "ty-alias"
  | "assoc-ty"
  | "const"
  | "assoc-const"
  | "inline-const"
  | "const-param"
  | "static"
  | "fn";

/** Name resolution result attached to a path. */
export type Res =
  | { kind: "def"; defKind: DefKind; def: DefId }
  | { kind: "self-ty-param"; trait: DefId }
  | { kind: "self-ty-alias"; impl: DefId }
  | { kind: "self-ctor"; impl: DefId }
  | { kind: "local"; var: LocalVarId }
  | { kind: "err" };

export type HirQPath =
  | { kind: "resolved"; segments: readonly string[]; res: Res }
  /** `<Type>::segment`, resolved by the typing results of the owning node. */
  | { kind: "type-relative"; selfType: string; segment: string };

export interface HirNodeBase {
  hirId: HirId;
  span: SourceSpan;
}

export type RangeEnd = "included" | "excluded";

export interface HirIdent {
  name: string;
  span: SourceSpan;
}

export interface HirPatField {
  hirId: HirId;
  name: string;
  pattern: HirPattern;
  span: SourceSpan;
}

export type HirPatternKind =
  | { kind: "wild" }
  | {
      kind: "binding";
      varId: LocalVarId;
      ident: HirIdent;
      subpattern?: HirPattern;
    }
  | {
      kind: "struct";
      qpath: HirQPath;
      fields: readonly HirPatField[];
      hasRest: boolean;
    }
  | {
      kind: "tuple-struct";
      qpath: HirQPath;
      patterns: readonly HirPattern[];
      /** Position of `..` among `patterns`, if present. */
      dotDotPos?: number;
    }
  | { kind: "or"; patterns: readonly HirPattern[] }
  | { kind: "path"; qpath: HirQPath }
  | { kind: "tuple"; patterns: readonly HirPattern[]; dotDotPos?: number }
  | { kind: "box"; subpattern: HirPattern }
  | { kind: "ref"; subpattern: HirPattern; mutable: boolean }
  | { kind: "literal"; expr: HirExpr }
  | { kind: "range"; lo?: HirExpr; hi?: HirExpr; end: RangeEnd }
  | {
      kind: "slice";
      prefix: readonly HirPattern[];
      middle?: HirPattern;
      suffix: readonly HirPattern[];
    };

export type HirPattern = HirNodeBase & HirPatternKind;

export type HirLiteral = { span: SourceSpan } & (
  | { litKind: "int"; value: bigint }
  | { litKind: "float"; text: string }
  | { litKind: "bool"; value: boolean }
  | { litKind: "char"; value: string }
  | { litKind: "str"; value: string }
  | { litKind: "byte"; value: number }
);

export interface HirConstBlock {
  hirId: HirId;
  def: DefId;
  body: HirExpr;
}

export type HirExpr = HirNodeBase &
  (
    | { exprKind: "literal"; literal: HirLiteral }
    | { exprKind: "unary"; op: "neg"; operand: HirExpr }
    | { exprKind: "path"; qpath: HirQPath }
    | { exprKind: "const-block"; block: HirConstBlock }
  );
