import type { SourceSpan, TypeId } from "../ids.js";
import type { TypeArena } from "../typing/type-arena.js";
import { floatFromBits, scalarSize } from "../typing/numeric.js";
import { incrementPatternPerfCounter } from "../../perf.js";
import type { ConstEvaluator } from "./evaluator.js";
import {
  constType,
  type PatConst,
  type ScalarInt,
  type TyConstKind,
  type ValTree,
} from "./values.js";

export type Ordering = -1 | 0 | 1;

export type ConstEvalContext = {
  arena: TypeArena;
  consts: ConstEvaluator;
};

const unknownSpan: SourceSpan = { file: "<unknown>", start: 0, end: 0 };

const compareNumbers = (a: bigint | number, b: bigint | number): Ordering =>
  a < b ? -1 : a > b ? 1 : 0;

const compareScalars = (a: ScalarInt, b: ScalarInt): Ordering =>
  compareNumbers(a.bits, b.bits) || compareNumbers(a.size, b.size);

const compareLists = <T>(
  a: readonly T[],
  b: readonly T[],
  compare: (left: T, right: T) => Ordering
): Ordering => {
  const shared = Math.min(a.length, b.length);
  for (let index = 0; index < shared; index += 1) {
    const ordering = compare(a[index], b[index]);
    if (ordering !== 0) return ordering;
  }
  return compareNumbers(a.length, b.length);
};

const compareValTrees = (a: ValTree, b: ValTree): Ordering => {
  if (a.kind === "leaf" && b.kind === "leaf") {
    return compareScalars(a.scalar, b.scalar);
  }
  if (a.kind === "branch" && b.kind === "branch") {
    return compareLists(a.children, b.children, compareValTrees);
  }
  return a.kind === "leaf" ? -1 : 1;
};

const tyConstKindRank: Record<TyConstKind["kind"], number> = {
  param: 0,
  unevaluated: 1,
  value: 2,
  error: 3,
};

/** Total structural order over type-level constants. */
export const compareTyConstKinds = (a: TyConstKind, b: TyConstKind): Ordering => {
  if (a.kind === "param" && b.kind === "param") {
    return compareNumbers(a.index, b.index);
  }
  if (a.kind === "unevaluated" && b.kind === "unevaluated") {
    return (
      compareNumbers(a.def, b.def) ||
      compareLists(a.args, b.args, compareNumbers)
    );
  }
  if (a.kind === "value" && b.kind === "value") {
    return compareValTrees(a.valtree, b.valtree);
  }
  return compareNumbers(tyConstKindRank[a.kind], tyConstKindRank[b.kind]);
};

const bitsOfValTree = (valtree: ValTree | undefined): bigint | undefined =>
  valtree?.kind === "leaf" ? valtree.scalar.bits : undefined;

/** Evaluates a scalar constant to its raw, zero-extended bits. */
export const evalBits = (
  value: PatConst,
  ctx: ConstEvalContext,
  span: SourceSpan = unknownSpan
): bigint => {
  const type = constType(value);
  const size = scalarSize(ctx.arena.get(type));
  const checkSize = (actual: number): void => {
    if (size !== undefined && actual !== size) {
      throw new Error(`expected ${size}-byte scalar for type ${type}, got ${actual} bytes`);
    }
  };

  if (value.kind === "val") {
    if (value.value.kind !== "scalar") {
      throw new Error(`expected bits of type ${type}, got ${value.value.kind} value`);
    }
    checkSize(value.value.scalar.size);
    return value.value.scalar.bits;
  }

  const kind = value.value.kind;
  if (kind.kind === "value" && kind.valtree.kind === "leaf") {
    checkSize(kind.valtree.scalar.size);
    return kind.valtree.scalar.bits;
  }
  if (kind.kind === "unevaluated") {
    incrementPatternPerfCounter("consts.evaluated");
    const result = ctx.consts.evaluateToValTree(
      { def: kind.def, args: kind.args },
      span
    );
    const bits = result.ok ? bitsOfValTree(result.value) : undefined;
    if (bits !== undefined) {
      return bits;
    }
  }
  throw new Error(`expected bits of type ${type}, got ${kind.kind} constant`);
};

const sameType = (a: PatConst, b: PatConst): TypeId => {
  const type = constType(a);
  if (type !== constType(b)) {
    throw new Error(
      `cannot compare constants of different types ${type} and ${constType(b)}`
    );
  }
  return type;
};

/**
 * Three-way comparison of two constants of the same type. Returns `undefined`
 * when the values are unordered (a NaN operand).
 */
export const compareConstValues = (
  a: PatConst,
  b: PatConst,
  ctx: ConstEvalContext
): Ordering | undefined => {
  incrementPatternPerfCounter("consts.compared");
  const type = sameType(a, b);
  const desc = ctx.arena.get(type);

  // Hot for matches with many ranges: raw comparisons are enough unless
  // the type needs sign or float handling.
  if (desc.kind !== "float" && desc.kind !== "int") {
    if (
      a.kind === "val" &&
      b.kind === "val" &&
      a.value.kind === "scalar" &&
      b.value.kind === "scalar"
    ) {
      return compareScalars(a.value.scalar, b.value.scalar);
    }
    if (a.kind === "ty" && b.kind === "ty" && a.value.kind.kind === b.value.kind.kind) {
      return compareTyConstKinds(a.value.kind, b.value.kind);
    }
  }

  const aBits = evalBits(a, ctx);
  const bBits = evalBits(b, ctx);
  const size = scalarSize(desc) ?? 16;

  switch (desc.kind) {
    case "float": {
      const aFloat = floatFromBits(aBits, size);
      const bFloat = floatFromBits(bBits, size);
      if (Number.isNaN(aFloat) || Number.isNaN(bFloat)) {
        return undefined;
      }
      return compareNumbers(aFloat, bFloat);
    }
    case "int":
      return compareNumbers(
        BigInt.asIntN(size * 8, aBits),
        BigInt.asIntN(size * 8, bBits)
      );
    default:
      return compareNumbers(aBits, bBits);
  }
};
