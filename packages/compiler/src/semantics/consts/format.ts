import type { TypeId } from "../ids.js";
import type { TypeArena } from "../typing/type-arena.js";
import { floatFromBits, scalarSize } from "../typing/numeric.js";
import {
  constType,
  valTreeBytes,
  type ConstValue,
  type PatConst,
  type ScalarInt,
  type ValTree,
} from "./values.js";

const textDecoder = new TextDecoder();

const formatScalar = (
  scalar: ScalarInt,
  type: TypeId,
  arena: TypeArena
): string => {
  const desc = arena.get(type);
  switch (desc.kind) {
    case "int":
      return BigInt.asIntN(scalar.size * 8, scalar.bits).toString();
    case "bool":
      return scalar.bits === 0n ? "false" : "true";
    case "char":
      return `'${String.fromCodePoint(Number(scalar.bits))}'`;
    case "float":
      return String(floatFromBits(scalar.bits, scalarSize(desc) ?? scalar.size));
    default:
      return scalar.bits.toString();
  }
};

const isStrRef = (type: TypeId, arena: TypeArena): boolean => {
  const desc = arena.get(type);
  return desc.kind === "ref" && arena.get(desc.referent).kind === "str";
};

const formatBytes = (bytes: readonly number[], type: TypeId, arena: TypeArena) =>
  isStrRef(type, arena)
    ? JSON.stringify(textDecoder.decode(Uint8Array.from(bytes)))
    : `[${bytes.join(", ")}]`;

const formatValTree = (valtree: ValTree, type: TypeId, arena: TypeArena): string => {
  if (valtree.kind === "leaf") {
    return formatScalar(valtree.scalar, type, arena);
  }
  const bytes = valTreeBytes(valtree);
  if (bytes && isStrRef(type, arena)) {
    return formatBytes(bytes, type, arena);
  }
  return `{${valtree.children
    .map((child) =>
      child.kind === "leaf" ? child.scalar.bits.toString() : formatValTree(child, type, arena)
    )
    .join(", ")}}`;
};

const formatConstValue = (
  value: ConstValue,
  type: TypeId,
  arena: TypeArena
): string => {
  switch (value.kind) {
    case "scalar":
      return formatScalar(value.scalar, type, arena);
    case "zero-sized":
      return "()";
    case "slice":
      return formatBytes(value.bytes, type, arena);
    case "indirect":
      return `<alloc${value.allocId}+${value.offset}>`;
  }
};

/** Source-like rendering of a constant, used by the pattern printer. */
export const formatConst = (value: PatConst, arena: TypeArena): string => {
  const type = constType(value);
  if (value.kind === "val") {
    return formatConstValue(value.value, type, arena);
  }
  const kind = value.value.kind;
  switch (kind.kind) {
    case "value":
      return formatValTree(kind.valtree, type, arena);
    case "unevaluated":
      return `<const#${kind.def}>`;
    case "param":
      return kind.name;
    case "error":
      return "{const error}";
  }
};
