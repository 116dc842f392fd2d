import type { DefId, TypeId } from "../ids.js";

/** Raw bits of a scalar, zero-extended, together with its size in bytes. */
export interface ScalarInt {
  bits: bigint;
  size: number;
}

export type ValTree =
  | { kind: "leaf"; scalar: ScalarInt }
  | { kind: "branch"; children: readonly ValTree[] };

export type TyConstKind =
  | { kind: "value"; valtree: ValTree }
  | { kind: "unevaluated"; def: DefId; args: readonly TypeId[] }
  | { kind: "param"; index: number; name: string }
  | { kind: "error" };

/** A type-level constant: either a structured value or a reference to one. */
export interface TyConst {
  type: TypeId;
  kind: TyConstKind;
}

/** An opaque, byte-level constant value. */
export type ConstValue =
  | { kind: "scalar"; scalar: ScalarInt }
  | { kind: "zero-sized" }
  | { kind: "slice"; bytes: readonly number[] }
  | { kind: "indirect"; allocId: number; offset: number };

export type PatConst =
  | { kind: "ty"; value: TyConst }
  | { kind: "val"; value: ConstValue; type: TypeId };

export interface Instance {
  def: DefId;
  args: readonly TypeId[];
}

export const scalarInt = (bits: bigint, size: number): ScalarInt => ({
  bits: BigInt.asUintN(size * 8, bits),
  size,
});

export const leaf = (bits: bigint, size: number): ValTree => ({
  kind: "leaf",
  scalar: scalarInt(bits, size),
});

export const branch = (children: readonly ValTree[]): ValTree => ({
  kind: "branch",
  children: [...children],
});

export const tyConstValue = (type: TypeId, valtree: ValTree): PatConst => ({
  kind: "ty",
  value: { type, kind: { kind: "value", valtree } },
});

export const tyConstUnevaluated = (
  type: TypeId,
  def: DefId,
  args: readonly TypeId[]
): PatConst => ({
  kind: "ty",
  value: { type, kind: { kind: "unevaluated", def, args: [...args] } },
});

export const valConst = (type: TypeId, value: ConstValue): PatConst => ({
  kind: "val",
  value,
  type,
});

export const scalarValConst = (
  type: TypeId,
  bits: bigint,
  size: number
): PatConst => valConst(type, { kind: "scalar", scalar: scalarInt(bits, size) });

export const constType = (value: PatConst): TypeId =>
  value.kind === "ty" ? value.value.type : value.type;

export const valTreeFromBytes = (bytes: readonly number[]): ValTree =>
  branch(bytes.map((byte) => leaf(BigInt(byte), 1)));

export const valTreeBytes = (valtree: ValTree): number[] | undefined => {
  if (valtree.kind !== "branch") {
    return undefined;
  }
  const bytes: number[] = [];
  for (const child of valtree.children) {
    if (child.kind !== "leaf" || child.scalar.size !== 1) {
      return undefined;
    }
    bytes.push(Number(child.scalar.bits));
  }
  return bytes;
};
