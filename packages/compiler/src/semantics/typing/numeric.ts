import type { TypeId } from "../ids.js";
import { scalarInt, type ScalarInt } from "../consts/values.js";
import type { TypeArena, TypeDescriptor } from "./type-arena.js";

const POINTER_SIZE = 8;

const intSizes = {
  i8: 1,
  i16: 2,
  i32: 4,
  i64: 8,
  i128: 16,
  isize: POINTER_SIZE,
  u8: 1,
  u16: 2,
  u32: 4,
  u64: 8,
  u128: 16,
  usize: POINTER_SIZE,
} as const;

/** Size in bytes of a scalar type, or `undefined` for non-scalar types. */
export const scalarSize = (desc: Readonly<TypeDescriptor>): number | undefined => {
  switch (desc.kind) {
    case "int":
    case "uint":
      return intSizes[desc.name];
    case "float":
      return desc.name === "f32" ? 4 : 8;
    case "bool":
      return 1;
    case "char":
      return 4;
    default:
      return undefined;
  }
};

/** Inclusive value range of an integer type. */
export const integerRange = (
  desc: Readonly<TypeDescriptor>
): { min: bigint; max: bigint } | undefined => {
  if (desc.kind !== "int" && desc.kind !== "uint") {
    return undefined;
  }
  const bits = BigInt(intSizes[desc.name] * 8);
  if (desc.kind === "int") {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
};

const CHAR_MAX = 0x10ffffn;

const floatInfinityBits = {
  f32: { negative: 0xff800000n, positive: 0x7f800000n },
  f64: { negative: 0xfff0000000000000n, positive: 0x7ff0000000000000n },
} as const;

export const numericMinValue = (
  arena: TypeArena,
  type: TypeId
): ScalarInt | undefined => {
  const desc = arena.get(type);
  const size = scalarSize(desc);
  if (size === undefined) return undefined;
  switch (desc.kind) {
    case "int":
    case "uint": {
      const range = integerRange(desc);
      return range ? scalarInt(range.min, size) : undefined;
    }
    case "char":
      return scalarInt(0n, size);
    case "float":
      return scalarInt(floatInfinityBits[desc.name].negative, size);
    default:
      return undefined;
  }
};

export const numericMaxValue = (
  arena: TypeArena,
  type: TypeId
): ScalarInt | undefined => {
  const desc = arena.get(type);
  const size = scalarSize(desc);
  if (size === undefined) return undefined;
  switch (desc.kind) {
    case "int":
    case "uint": {
      const range = integerRange(desc);
      return range ? scalarInt(range.max, size) : undefined;
    }
    case "char":
      return scalarInt(CHAR_MAX, size);
    case "float":
      return scalarInt(floatInfinityBits[desc.name].positive, size);
    default:
      return undefined;
  }
};

const floatView = new DataView(new ArrayBuffer(8));

export const floatFromBits = (bits: bigint, size: number): number => {
  if (size === 4) {
    floatView.setUint32(0, Number(BigInt.asUintN(32, bits)));
    return floatView.getFloat32(0);
  }
  floatView.setBigUint64(0, BigInt.asUintN(64, bits));
  return floatView.getFloat64(0);
};

export const floatToBits = (value: number, size: number): bigint => {
  if (size === 4) {
    floatView.setFloat32(0, value);
    return BigInt(floatView.getUint32(0));
  }
  floatView.setFloat64(0, value);
  return floatView.getBigUint64(0);
};
