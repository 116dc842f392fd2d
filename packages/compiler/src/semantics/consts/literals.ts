import { diagnosticFromCode } from "../../diagnostics/index.js";
import type { Diagnostic, TypeId } from "../ids.js";
import type { HirLiteral } from "../hir/nodes.js";
import type { TypeArena } from "../typing/type-arena.js";
import { floatToBits, scalarSize } from "../typing/numeric.js";
import { leaf, valTreeFromBytes, type TyConst, type ValTree } from "./values.js";

export interface LitToConstInput {
  literal: HirLiteral;
  type: TypeId;
  /** Set for `-lit`, so the negation happens before truncation. */
  negated: boolean;
}

export type LitToConstError =
  /** Carries a diagnostic that has not been reported yet. */
  | { kind: "invalid"; diagnostic: Diagnostic }
  /** The literal does not fit the expected type; typing should have caught this. */
  | { kind: "type-error" };

export type LitToConstResult =
  | { ok: true; value: TyConst }
  | { ok: false; error: LitToConstError };

const typeError = (): LitToConstResult => ({
  ok: false,
  error: { kind: "type-error" },
});

const textEncoder = new TextEncoder();

export const literalToConst = (
  arena: TypeArena,
  { literal, type, negated }: LitToConstInput
): LitToConstResult => {
  const desc = arena.get(type);
  const ok = (valtree: ValTree): LitToConstResult => ({
    ok: true,
    value: { type, kind: { kind: "value", valtree } },
  });

  if (desc.kind === "error") {
    return {
      ok: false,
      error: {
        kind: "invalid",
        diagnostic: diagnosticFromCode({
          code: "LW0010",
          params: { kind: "erroneous-literal-type" },
          span: literal.span,
        }),
      },
    };
  }

  if (negated && literal.litKind !== "int" && literal.litKind !== "float") {
    return typeError();
  }

  switch (literal.litKind) {
    case "int": {
      if (desc.kind !== "int" && desc.kind !== "uint") return typeError();
      const size = scalarSize(desc);
      if (size === undefined) return typeError();
      // Truncation wraps out-of-range literals; range lowering checks for overflow.
      return ok(leaf(negated ? -literal.value : literal.value, size));
    }
    case "float": {
      if (desc.kind !== "float") return typeError();
      const size = scalarSize(desc) ?? 8;
      const text = literal.text.replace(/_/g, "").replace(/f(32|64)$/, "");
      const parsed = text.trim() === "" ? Number.NaN : Number(text);
      if (Number.isNaN(parsed)) {
        return {
          ok: false,
          error: {
            kind: "invalid",
            diagnostic: diagnosticFromCode({
              code: "LW0010",
              params: {
                kind: "unparsable-float",
                text: literal.text,
                typeName: desc.name,
              },
              span: literal.span,
            }),
          },
        };
      }
      return ok(leaf(floatToBits(negated ? -parsed : parsed, size), size));
    }
    case "bool":
      return desc.kind === "bool"
        ? ok(leaf(literal.value ? 1n : 0n, 1))
        : typeError();
    case "char": {
      const codePoint = literal.value.codePointAt(0);
      if (desc.kind !== "char" || codePoint === undefined) return typeError();
      return ok(leaf(BigInt(codePoint), 4));
    }
    case "byte":
      return desc.kind === "uint" && desc.name === "u8"
        ? ok(leaf(BigInt(literal.value), 1))
        : typeError();
    case "str": {
      if (desc.kind !== "ref" || arena.get(desc.referent).kind !== "str") {
        return typeError();
      }
      return ok(valTreeFromBytes(Array.from(textEncoder.encode(literal.value))));
    }
  }
};
