import { describe, expect, it } from "vitest";
import { ProgramItems } from "../../items.js";
import { printPattern } from "../../patterns/printer.js";
import { createTypeArena } from "../../typing/type-arena.js";
import { decomposeConst } from "../const-to-pattern.js";
import {
  branch,
  leaf,
  tyConstUnevaluated,
  tyConstValue,
  valTreeFromBytes,
  type ValTree,
} from "../values.js";

const span = { file: "const.src", start: 0, end: 5 };

const setup = () => {
  const arena = createTypeArena();
  const items = new ProgramItems(arena);
  const T = arena.internParam(0, "T");
  const u8 = arena.internUint("u8");
  const i32 = arena.internInt("i32");
  const option = items.declareAdt({
    name: "Option",
    kind: "enum",
    generics: ["T"],
    variants: [
      { name: "None", ctorKind: "const", fields: [] },
      { name: "Some", ctorKind: "fn", fields: [{ name: "0", type: T }] },
    ],
  });
  const point = items.declareAdt({
    name: "Point",
    kind: "struct",
    variants: [
      {
        name: "Point",
        fields: [
          { name: "x", type: i32 },
          { name: "y", type: i32 },
        ],
      },
    ],
  });
  const bits = items.declareAdt({
    name: "Bits",
    kind: "union",
    variants: [{ name: "Bits", fields: [{ name: "raw", type: u8 }] }],
  });
  const decompose = (type: number, valtree: ValTree) =>
    decomposeConst({ value: tyConstValue(type, valtree), span, arena, items });
  const print = (type: number, valtree: ValTree) =>
    printPattern(decompose(type, valtree), { arena, items });
  return { arena, items, u8, i32, option, point, bits, decompose, print };
};

describe("decomposeConst", () => {
  it("splits tuples into positional leaves", () => {
    const { arena, u8, print } = setup();
    const pair = arena.internTuple([u8, arena.internBool()]);
    expect(print(pair, branch([leaf(7n, 1), leaf(1n, 1)]))).toBe("(7, true)");
  });

  it("dereferences references to arrays and slices", () => {
    const { arena, u8, decompose, print } = setup();
    const bytes = arena.internRef(arena.internSlice(u8));
    const pattern = decompose(bytes, valTreeFromBytes([1, 2]));
    expect(pattern.kind.kind).toBe("deref");
    expect(print(bytes, valTreeFromBytes([1, 2]))).toBe("&[1, 2]");
  });

  it("keeps string constants whole", () => {
    const { arena, decompose } = setup();
    const refStr = arena.internRef(arena.internStr());
    const valtree = valTreeFromBytes([111, 107]);
    expect(decompose(refStr, valtree).kind).toEqual({
      kind: "constant",
      value: tyConstValue(refStr, valtree),
    });
  });

  it("selects the enum variant from the leading discriminant", () => {
    const { arena, u8, option, decompose, print } = setup();
    const optionU8 = arena.internAdt(option.def, [u8]);
    expect(print(optionU8, branch([leaf(0n, 4)]))).toBe("None");

    const some = decompose(optionU8, branch([leaf(1n, 4), leaf(9n, 1)]));
    expect(some.kind).toMatchObject({ kind: "variant", variantIndex: 1, args: [u8] });
    if (some.kind.kind !== "variant") return;
    expect(some.kind.subpatterns[0]?.pattern.type).toBe(u8);
    expect(some.span).toEqual(span);
  });

  it("rejects malformed enum values", () => {
    const { arena, u8, option, decompose } = setup();
    const optionU8 = arena.internAdt(option.def, [u8]);
    expect(() => decompose(optionU8, branch([]))).toThrow(
      "enum constant of Option has no variant index"
    );
    expect(() => decompose(optionU8, branch([leaf(5n, 4)]))).toThrow("Option has no variant 5");
    expect(() => decompose(optionU8, branch([leaf(1n, 4)]))).toThrow(
      "constant has 0 fields, expected 1"
    );
  });

  it("spells out every struct field", () => {
    const { arena, point, print } = setup();
    expect(print(arena.internAdt(point.def), branch([leaf(1n, 4), leaf(-2n, 4)]))).toBe(
      "Point { x: 1, y: -2 }"
    );
  });

  it("leaves unions and unevaluated constants as constants", () => {
    const { arena, items, u8, bits, decompose } = setup();
    const union = arena.internAdt(bits.def);
    expect(decompose(union, leaf(3n, 1)).kind.kind).toBe("constant");

    const limit = items.declareConst({ name: "LIMIT", type: u8 });
    const pattern = decomposeConst({
      value: tyConstUnevaluated(u8, limit, []),
      span,
      arena,
      items,
    });
    expect(pattern.kind).toEqual({ kind: "constant", value: tyConstUnevaluated(u8, limit, []) });
  });

  it("rejects scalar values for aggregate types", () => {
    const { arena, u8, decompose } = setup();
    const pair = arena.internTuple([u8, u8]);
    expect(() => decompose(pair, leaf(1n, 1))).toThrow(
      `expected a branch value for type ${pair} at 0`
    );
  });
});
