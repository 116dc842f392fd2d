import { describe, expect, it } from "vitest";
import type { Res } from "../../../hir/nodes.js";
import { PatternFolder, foldPatternWith } from "../../../patterns/fold.js";
import { printPattern } from "../../../patterns/printer.js";
import { walkPattern } from "../../../patterns/walk.js";
import {
  enumerateAndAdjust,
  lowerPattern,
  patternFromHir,
} from "../lower.js";
import { PatternLoweringBug } from "../errors.js";
import {
  createLoweringWorld,
  ctorOf,
  defRes,
  FILE,
  resolved,
  spanAt,
} from "./helpers.js";

describe("enumerateAndAdjust", () => {
  it("keeps indices when nothing is skipped", () => {
    expect(enumerateAndAdjust(3, 3)).toEqual([0, 1, 2]);
  });

  it("shifts the indices after `..` past the skipped fields", () => {
    expect(enumerateAndAdjust(2, 4, 1)).toEqual([0, 3]);
    expect(enumerateAndAdjust(2, 5, 0)).toEqual([3, 4]);
  });

  it("never shifts backwards when there are more patterns than fields", () => {
    expect(enumerateAndAdjust(3, 2, 1)).toEqual([0, 1, 2]);
  });
});

describe("pattern lowering", () => {
  it("wraps implicit dereferences outermost-first", () => {
    const world = createLoweringWorld();
    const { arena, types, option, typeck, ctx } = world;
    const optionI32 = world.optionOf(types.i32);
    const refOption = arena.internRef(optionI32);
    const refRefOption = arena.internRef(refOption);

    const n = world.binding("n", types.i32);
    const some = world.pattern(optionI32, {
      kind: "tuple-struct",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 1)), "Some"),
      patterns: [n],
    });
    typeck.recordAdjustments(some.hirId, [refRefOption, refOption]);

    const lowered = patternFromHir(some, ctx);
    expect(lowered.type).toBe(refRefOption);
    expect(lowered.kind.kind).toBe("deref");
    if (lowered.kind.kind !== "deref") return;
    const inner = lowered.kind.subpattern;
    expect(inner.type).toBe(refOption);
    expect(inner.kind.kind).toBe("deref");
    if (inner.kind.kind !== "deref") return;
    expect(inner.kind.subpattern.type).toBe(optionI32);
    expect(inner.kind.subpattern.kind).toEqual({
      kind: "variant",
      adt: option,
      args: [types.i32],
      variantIndex: 1,
      subpatterns: [
        {
          field: 0,
          pattern: {
            type: types.i32,
            span: spanAt(0, 1),
            kind: {
              kind: "binding",
              mutability: "not",
              mode: { kind: "by-value" },
              name: "n",
              var: n.hirId,
              varType: types.i32,
              isPrimary: true,
            },
          },
        },
      ],
    });
    expect(printPattern(lowered, ctx)).toBe("&&Some(n)");
  });

  it("lowers `ref mut` bindings to the referent type", () => {
    const world = createLoweringWorld();
    const { arena, types, ctx } = world;
    const refMutI32 = arena.internRef(types.i32, true);
    const x = world.binding("x", refMutI32, {
      annotation: { kind: "by-ref", mutable: true },
    });

    const lowered = lowerPattern(x, ctx);
    expect(lowered.type).toBe(types.i32);
    expect(lowered.kind).toMatchObject({
      kind: "binding",
      mutability: "not",
      mode: { kind: "by-ref", borrow: "mut" },
      varType: refMutI32,
    });
    expect(printPattern(lowered, ctx)).toBe("ref mut x");
  });

  it("keeps `mut` on by-value bindings", () => {
    const world = createLoweringWorld();
    const x = world.binding("x", world.types.u8, {
      annotation: { kind: "by-value", mutable: true },
    });
    const lowered = lowerPattern(x, world.ctx);
    expect(lowered.kind).toMatchObject({ mutability: "mut", mode: { kind: "by-value" } });
    expect(printPattern(lowered, world.ctx)).toBe("mut x");
  });

  it("ends a binding's span at its identifier", () => {
    const world = createLoweringWorld();
    const x = world.binding("x", world.types.u8, {
      span: spanAt(10, 22),
      identSpan: spanAt(10, 11),
      subpattern: world.wild(world.types.u8),
    });

    const lowered = lowerPattern(x, world.ctx);
    expect(lowered.span).toEqual({ file: FILE, start: 10, end: 11 });
    expect(printPattern(lowered, world.ctx)).toBe("x @ _");
  });

  it("fails loudly when the binding mode is missing", () => {
    const world = createLoweringWorld({ strictInvariants: false });
    const x = world.pattern(world.types.u8, {
      kind: "binding",
      varId: 99,
      ident: { name: "x", span: spanAt(0, 1) },
    });
    expect(() => lowerPattern(x, world.ctx)).toThrow(PatternLoweringBug);
  });

  it("reports `ref` bindings on non-reference types as internal errors when lenient", () => {
    const world = createLoweringWorld({ strictInvariants: false });
    const x = world.binding("x", world.types.u8, {
      annotation: { kind: "by-ref", mutable: false },
    });

    const lowered = lowerPattern(x, world.ctx);
    expect(lowered.kind).toMatchObject({ kind: "error", error: "internal" });
    expect(world.diagnostics.diagnostics.map((d) => d.code)).toEqual(["LW9999"]);
  });

  it("throws on `ref` bindings on non-reference types when strict", () => {
    const world = createLoweringWorld({ strictInvariants: true });
    const x = world.binding("x", world.types.u8, {
      annotation: { kind: "by-ref", mutable: false },
    });
    expect(() => lowerPattern(x, world.ctx)).toThrow(PatternLoweringBug);
  });

  it("places tuple fields after `..` at the end of the tuple", () => {
    const world = createLoweringWorld();
    const { arena, types, ctx } = world;
    const tuple = arena.internTuple([types.i32, types.i32, types.i32, types.i32]);
    const pattern = world.pattern(tuple, {
      kind: "tuple",
      patterns: [world.binding("a", types.i32), world.binding("b", types.i32)],
      dotDotPos: 1,
    });

    const lowered = lowerPattern(pattern, ctx);
    expect(lowered.kind.kind).toBe("leaf");
    if (lowered.kind.kind !== "leaf") return;
    expect(lowered.kind.subpatterns.map((field) => field.field)).toEqual([0, 3]);
    expect(printPattern(lowered, ctx)).toBe("(a, _, _, b)");
  });

  it("lowers slice patterns on arrays and slices", () => {
    const world = createLoweringWorld();
    const { arena, types, ctx } = world;
    const array = arena.internArray(types.u8, 4);
    const onArray = world.pattern(array, {
      kind: "slice",
      prefix: [world.binding("first", types.u8)],
      middle: world.wild(arena.internArray(types.u8, 2)),
      suffix: [world.binding("last", types.u8)],
    });
    const slice = arena.internSlice(types.u8);
    const onSlice = world.pattern(slice, {
      kind: "slice",
      prefix: [world.binding("a", types.u8)],
      middle: world.binding("rest", slice),
      suffix: [],
    });

    const loweredArray = lowerPattern(onArray, ctx);
    const loweredSlice = lowerPattern(onSlice, ctx);
    expect(loweredArray.kind.kind).toBe("array");
    expect(loweredSlice.kind.kind).toBe("slice");
    expect(printPattern(loweredArray, ctx)).toBe("[first, .., last]");
    expect(printPattern(loweredSlice, ctx)).toBe("[a, rest @ ..]");
  });

  it("rejects array patterns longer than the array even when lenient", () => {
    const world = createLoweringWorld({ strictInvariants: false });
    const { arena, types } = world;
    const pattern = world.pattern(arena.internArray(types.u8, 1), {
      kind: "slice",
      prefix: [world.wild(types.u8), world.wild(types.u8)],
      suffix: [],
    });

    expect(() => lowerPattern(pattern, world.ctx)).toThrow(
      "array pattern has 2 elements but the array has 1 (arms.src:0-1)"
    );
  });

  it("turns patterns of erroneous types into error nodes", () => {
    const world = createLoweringWorld();
    const { types, ctx } = world;
    const pattern = world.pattern(types.error, {
      kind: "slice",
      prefix: [world.wild(types.error)],
      suffix: [],
    });

    const lowered = lowerPattern(pattern, ctx);
    expect(lowered.kind).toMatchObject({ kind: "error", error: "erroneous-type" });
    expect(world.diagnostics.diagnostics.map((d) => d.code)).toEqual(["LW0011"]);
  });

  it("lowers struct patterns by field index", () => {
    const world = createLoweringWorld();
    const { types, typeck, point, ctx } = world;
    const pointType = world.arena.internAdt(point.def);
    const zero = world.literal(types.i32, world.intExpr(types.i32, 0n));
    const fieldHirId = 1000;
    typeck.recordFieldIndex(fieldHirId, 1);

    const pattern = world.pattern(pointType, {
      kind: "struct",
      qpath: resolved(defRes("struct", point.def), "Point"),
      fields: [{ hirId: fieldHirId, name: "y", pattern: zero, span: zero.span }],
      hasRest: true,
    });

    const lowered = lowerPattern(pattern, ctx);
    expect(lowered.kind.kind).toBe("leaf");
    if (lowered.kind.kind !== "leaf") return;
    expect(lowered.kind.subpatterns[0]?.field).toBe(1);
    expect(printPattern(lowered, ctx)).toBe("Point { y: 0, .. }");
  });

  it("lowers or-patterns of unit and tuple variants", () => {
    const world = createLoweringWorld();
    const { types, option, ctx } = world;
    const optionU8 = world.optionOf(types.u8);
    const none = world.pattern(optionU8, {
      kind: "path",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 0)), "None"),
    });
    const someZero = world.pattern(optionU8, {
      kind: "tuple-struct",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 1)), "Some"),
      patterns: [world.literal(types.u8, world.intExpr(types.u8, 0n))],
    });
    const pattern = world.pattern(optionU8, { kind: "or", patterns: [none, someZero] });

    const lowered = lowerPattern(pattern, ctx);
    expect(printPattern(lowered, ctx)).toBe("None | Some(0)");
    expect(world.diagnostics.diagnostics).toEqual([]);
  });

  it("lowers `box` and `&` subpatterns to derefs", () => {
    const world = createLoweringWorld();
    const { arena, types, ctx } = world;
    const refU8 = arena.internRef(types.u8);
    const pattern = world.pattern(refU8, {
      kind: "ref",
      subpattern: world.binding("v", types.u8),
      mutable: false,
    });
    const lowered = lowerPattern(pattern, ctx);
    expect(lowered.kind.kind).toBe("deref");
    expect(printPattern(lowered, ctx)).toBe("&v");
  });

  it("keeps lowering siblings of a failed subpattern", () => {
    const world = createLoweringWorld();
    const { arena, items, types, ctx } = world;
    const limit = items.declareAssocConst({ name: "LIMIT", type: types.u8 });
    const tuple = arena.internTuple([types.u8, types.u8]);
    const unresolved = world.pattern(types.u8, {
      kind: "path",
      qpath: resolved(defRes("assoc-const", limit), "Self", "LIMIT"),
    });
    const one = world.literal(types.u8, world.intExpr(types.u8, 1n));
    const pattern = world.pattern(tuple, { kind: "tuple", patterns: [unresolved, one] });

    const lowered = lowerPattern(pattern, ctx);
    expect(printPattern(lowered, ctx)).toBe("(<error: assoc-const-unresolved>, 1)");
    expect(world.diagnostics.diagnostics.map((d) => d.code)).toEqual(["LW0007"]);
    if (lowered.kind.kind !== "leaf") throw new Error("expected a leaf");
    const first = lowered.kind.subpatterns[0]?.pattern.kind;
    expect(first?.kind === "error" ? first.diagnostic : undefined).toBe(
      world.diagnostics.diagnostics[0]
    );
  });

  it("reports tuple patterns on non-tuple types as LW9999 when lenient", () => {
    const world = createLoweringWorld({ strictInvariants: false });
    const pattern = world.pattern(world.types.i32, { kind: "tuple", patterns: [] });

    const lowered = lowerPattern(pattern, world.ctx);
    expect(lowered.kind).toMatchObject({ kind: "error", error: "internal" });
    const [diagnostic] = world.diagnostics.diagnostics;
    expect(diagnostic?.code).toBe("LW9999");
    expect(diagnostic?.message).toMatch(/^internal invariant violated: unexpected type \d+ for tuple pattern$/);
  });

  it("throws on tuple patterns on non-tuple types when strict", () => {
    const world = createLoweringWorld({ strictInvariants: true });
    const pattern = world.pattern(world.types.i32, { kind: "tuple", patterns: [] });
    expect(() => lowerPattern(pattern, world.ctx)).toThrow(PatternLoweringBug);
    expect(world.diagnostics.diagnostics).toEqual([]);
  });

  it("wraps a user-written type on a variant pattern in a covariant ascription", () => {
    const world = createLoweringWorld();
    const { types, option, typeck, ctx } = world;
    const optionU8 = world.optionOf(types.u8);
    const none = world.pattern(optionU8, {
      kind: "path",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 0)), "Option", "None"),
    });
    typeck.recordUserType(none.hirId, { kind: "ty", type: optionU8 });

    const lowered = lowerPattern(none, ctx);
    expect(lowered.kind.kind).toBe("ascribe-user-type");
    if (lowered.kind.kind !== "ascribe-user-type") return;
    expect(lowered.kind.ascription).toEqual({
      annotation: {
        userType: { kind: "ty", type: optionU8 },
        span: spanAt(0, 1),
        inferredType: optionU8,
      },
      variance: "covariant",
    });
    expect(lowered.kind.subpattern.kind).toMatchObject({ kind: "variant", variantIndex: 0 });
  });

  it("reports paths that cannot appear in patterns", () => {
    const world = createLoweringWorld();
    const { items, types, ctx } = world;
    const cases: { res: Res; code: string }[] = [
      { res: defRes("static", items.declareStatic("COUNTER")), code: "LW0005" },
      { res: defRes("const-param", items.declareConstParam("N")), code: "LW0004" },
      { res: defRes("fn", items.declareFn("helper")), code: "LW0006" },
      { res: { kind: "local", var: 3 }, code: "LW0006" },
    ];

    cases.forEach(({ res }) =>
      lowerPattern(world.pattern(types.u8, { kind: "path", qpath: resolved(res) }), ctx)
    );
    expect(world.diagnostics.diagnostics.map((d) => d.code)).toEqual(
      cases.map(({ code }) => code)
    );
  });
});

describe("tuple-struct patterns with `..`", () => {
  const createTripleWorld = () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const triple = world.items.declareAdt({
      name: "Triple",
      kind: "struct",
      variants: [
        {
          name: "Triple",
          ctorKind: "fn",
          fields: [
            { name: "0", type: u8 },
            { name: "1", type: u8 },
            { name: "2", type: u8 },
          ],
        },
      ],
    });
    return { world, triple, tripleType: world.arena.internAdt(triple.def) };
  };

  const resolutions: { name: string; res: (world: ReturnType<typeof createTripleWorld>) => Res }[] = [
    { name: "struct constructor", res: ({ triple }) => defRes("ctor-struct", ctorOf(triple, 0)) },
    { name: "Self constructor", res: ({ triple }) => ({ kind: "self-ctor", impl: triple.def }) },
    { name: "Self type alias", res: ({ triple }) => ({ kind: "self-ty-alias", impl: triple.def }) },
    { name: "type alias", res: ({ triple }) => defRes("ty-alias", triple.def) },
    { name: "associated type", res: ({ triple }) => defRes("assoc-ty", triple.def) },
  ];

  resolutions.forEach(({ name, res }) => {
    it(`skips the middle field through a ${name}`, () => {
      const tripleWorld = createTripleWorld();
      const { world, tripleType } = tripleWorld;
      const { u8 } = world.types;
      const pattern = world.pattern(tripleType, {
        kind: "tuple-struct",
        qpath: resolved(res(tripleWorld), "Triple"),
        patterns: [world.binding("a", u8), world.binding("c", u8)],
        dotDotPos: 1,
      });

      const lowered = lowerPattern(pattern, world.ctx);
      expect(lowered.kind.kind).toBe("leaf");
      if (lowered.kind.kind !== "leaf") return;
      expect(lowered.kind.subpatterns.map((field) => field.field)).toEqual([0, 2]);
      expect(printPattern(lowered, world.ctx)).toBe("Triple(a, _, c)");
      expect(world.diagnostics.diagnostics).toEqual([]);
    });
  });

  it("lowers `Some(..)` to a variant without subpatterns", () => {
    const world = createLoweringWorld();
    const { types, option, ctx } = world;
    const optionU8 = world.optionOf(types.u8);
    const pattern = world.pattern(optionU8, {
      kind: "tuple-struct",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 1)), "Some"),
      patterns: [],
      dotDotPos: 0,
    });

    const lowered = lowerPattern(pattern, ctx);
    expect(lowered.kind).toEqual({
      kind: "variant",
      adt: option,
      args: [types.u8],
      variantIndex: 1,
      subpatterns: [],
    });
    expect(printPattern(lowered, ctx)).toBe("Some(_)");
  });
});

describe("folding lowered patterns", () => {
  it("rebuilds a strictly equal tree from every node kind with the default folder", () => {
    const world = createLoweringWorld();
    const { arena, items, types, option, typeck, ctx } = world;
    const { u8 } = types;
    const optionU8 = world.optionOf(u8);
    const arrayType = arena.internArray(u8, 3);
    const tupleType = arena.internTuple([arrayType, u8, u8, optionU8]);

    const array = world.pattern(arrayType, {
      kind: "slice",
      prefix: [world.binding("x", u8, { subpattern: world.literal(u8, world.intExpr(u8, 3n)) })],
      middle: world.binding("r", arena.internArray(u8, 1)),
      suffix: [world.wild(u8)],
    });
    const range = world.pattern(u8, {
      kind: "range",
      lo: world.intExpr(u8, 0n),
      hi: world.intExpr(u8, 9n),
      end: "excluded",
    });
    const counter = world.pattern(u8, {
      kind: "path",
      qpath: resolved(defRes("static", items.declareStatic("COUNTER")), "COUNTER"),
    });
    const none = world.pattern(optionU8, {
      kind: "path",
      qpath: resolved(defRes("ctor-variant", ctorOf(option, 0)), "None"),
    });
    typeck.recordUserType(none.hirId, { kind: "ty", type: optionU8 });
    const tuple = world.pattern(tupleType, {
      kind: "tuple",
      patterns: [array, range, counter, none],
    });
    const pattern = world.pattern(tupleType, {
      kind: "or",
      patterns: [tuple, world.wild(tupleType)],
    });

    const lowered = lowerPattern(pattern, ctx);
    const kinds = new Set<string>();
    walkPattern({ pattern: lowered, onEnterPattern: (current) => void kinds.add(current.kind.kind) });
    expect([...kinds].sort()).toEqual([
      "array",
      "ascribe-user-type",
      "binding",
      "constant",
      "error",
      "leaf",
      "or",
      "range",
      "variant",
      "wild",
    ]);

    const folded = foldPatternWith(lowered, new PatternFolder());
    expect(folded).toStrictEqual(lowered);
    expect(folded).not.toBe(lowered);
  });
});
