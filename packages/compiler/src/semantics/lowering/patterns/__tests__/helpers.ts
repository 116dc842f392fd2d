import { DiagnosticEmitter } from "../../../../diagnostics/index.js";
import type { PatternLoweringOptions } from "../../../../config.js";
import type { DefId, HirId, SourceSpan, TypeId } from "../../../ids.js";
import type {
  DefKind,
  HirExpr,
  HirLiteral,
  HirPattern,
  HirPatternKind,
  HirQPath,
  Res,
} from "../../../hir/nodes.js";
import { ProgramItems, type AdtDef } from "../../../items.js";
import { ConstTable } from "../../../consts/evaluator.js";
import { createTypeArena } from "../../../typing/type-arena.js";
import {
  TypeckTable,
  type BindingAnnotation,
} from "../../../typing/typeck-results.js";
import {
  createPatternLoweringContext,
  type PatternLoweringContext,
} from "../context.js";

export const FILE = "arms.src";

export const spanAt = (start: number, end: number): SourceSpan => ({
  file: FILE,
  start,
  end,
});

export const ctorOf = (adt: AdtDef, variantIndex: number): DefId => {
  const ctor = adt.variants[variantIndex]?.ctor;
  if (ctor === undefined) {
    throw new Error(`${adt.name} variant ${variantIndex} has no constructor`);
  }
  return ctor;
};

export const defRes = (defKind: DefKind, def: DefId): Res => ({
  kind: "def",
  defKind,
  def,
});

export const resolved = (res: Res, ...segments: string[]): HirQPath => ({
  kind: "resolved",
  segments,
  res,
});

/**
 * Tables for one body: `Option<T>` (`None`, `Some(T)`) and
 * `Point { x: i32, y: i32 }` are declared up front.
 */
export const createLoweringWorld = (
  options: Partial<PatternLoweringOptions> = { strictInvariants: true }
) => {
  const arena = createTypeArena();
  const items = new ProgramItems(arena);
  const typeck = new TypeckTable();
  const consts = new ConstTable(items);
  const diagnostics = new DiagnosticEmitter();

  const contextWith = ({
    genericArgs = [],
    strictInvariants = options.strictInvariants,
  }: {
    genericArgs?: readonly TypeId[];
    strictInvariants?: boolean;
  } = {}): PatternLoweringContext =>
    createPatternLoweringContext({
      arena,
      items,
      typeck,
      consts,
      diagnostics,
      genericArgs,
      options: { strictInvariants },
    });

  const types = {
    i8: arena.internInt("i8"),
    i32: arena.internInt("i32"),
    u8: arena.internUint("u8"),
    u32: arena.internUint("u32"),
    f64: arena.internFloat("f64"),
    bool: arena.internBool(),
    char: arena.internChar(),
    str: arena.internStr(),
    error: arena.internError(),
    T: arena.internParam(0, "T"),
  };

  const option = items.declareAdt({
    name: "Option",
    kind: "enum",
    generics: ["T"],
    variants: [
      { name: "None", ctorKind: "const", fields: [] },
      { name: "Some", ctorKind: "fn", fields: [{ name: "0", type: types.T }] },
    ],
  });
  const point = items.declareAdt({
    name: "Point",
    kind: "struct",
    variants: [
      {
        name: "Point",
        ctorKind: "none",
        fields: [
          { name: "x", type: types.i32 },
          { name: "y", type: types.i32 },
        ],
      },
    ],
  });

  let nextHirId: HirId = 0;
  const node = (type: TypeId, span: SourceSpan): { hirId: HirId; span: SourceSpan } => {
    const hirId = nextHirId++;
    typeck.recordType(hirId, type);
    return { hirId, span };
  };

  const pattern = (
    type: TypeId,
    kind: HirPatternKind,
    span: SourceSpan = spanAt(0, 1)
  ): HirPattern => ({ ...node(type, span), ...kind });

  const wild = (type: TypeId): HirPattern => pattern(type, { kind: "wild" });

  const binding = (
    name: string,
    type: TypeId,
    {
      annotation = { kind: "by-value", mutable: false },
      span = spanAt(0, 1),
      identSpan = span,
      subpattern,
    }: {
      annotation?: BindingAnnotation;
      span?: SourceSpan;
      identSpan?: SourceSpan;
      subpattern?: HirPattern;
    } = {}
  ): HirPattern => {
    const base = node(type, span);
    typeck.recordBindingMode(base.hirId, annotation);
    return {
      ...base,
      kind: "binding",
      varId: base.hirId,
      ident: { name, span: identSpan },
      ...(subpattern ? { subpattern } : {}),
    };
  };

  const literalExpr = (
    type: TypeId,
    literal: HirLiteral,
    span: SourceSpan = literal.span
  ): HirExpr => ({ ...node(type, span), exprKind: "literal", literal });

  const intExpr = (type: TypeId, value: bigint, span: SourceSpan = spanAt(0, 1)): HirExpr =>
    value < 0n
      ? {
          ...node(type, span),
          exprKind: "unary",
          op: "neg",
          operand: literalExpr(type, { span, litKind: "int", value: -value }),
        }
      : literalExpr(type, { span, litKind: "int", value });

  const pathExpr = (type: TypeId, res: Res, span: SourceSpan = spanAt(0, 1)): HirExpr => ({
    ...node(type, span),
    exprKind: "path",
    qpath: resolved(res),
  });

  const literal = (type: TypeId, expr: HirExpr): HirPattern =>
    pattern(type, { kind: "literal", expr }, expr.span);

  return {
    arena,
    items,
    typeck,
    consts,
    diagnostics,
    ctx: contextWith(),
    contextWith,
    types,
    option,
    point,
    optionOf: (type: TypeId): TypeId => arena.internAdt(option.def, [type]),
    pattern,
    wild,
    binding,
    literalExpr,
    intExpr,
    pathExpr,
    literal,
  };
};

export type LoweringWorld = ReturnType<typeof createLoweringWorld>;
