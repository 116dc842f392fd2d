import { describe, expect, it } from "vitest";
import { leaf } from "../../../consts/values.js";
import { printPattern } from "../../../patterns/printer.js";
import type { PatternKind } from "../../../patterns/nodes.js";
import { lowerPatternRange } from "../range.js";
import { PatternLoweringBug } from "../errors.js";
import { createLoweringWorld, defRes, spanAt, type LoweringWorld } from "./helpers.js";

const RANGE_SPAN = spanAt(20, 30);

const printed = (world: LoweringWorld, kind: PatternKind, type: number): string =>
  printPattern({ type, span: RANGE_SPAN, kind }, world.ctx);

describe("range pattern lowering", () => {
  it("lowers an inclusive range with lo < hi", () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const result = lowerPatternRange({
      lo: world.intExpr(u8, 0n),
      hi: world.intExpr(u8, 5n),
      end: "included",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.kind).toBe("range");
    expect(printed(world, result.value, u8)).toBe("0..=5");
  });

  it("collapses `x..=x` into a constant", () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const result = lowerPatternRange({
      lo: world.intExpr(u8, 5n),
      hi: world.intExpr(u8, 5n),
      end: "included",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok && result.value.kind).toBe("constant");
    if (!result.ok) return;
    expect(printed(world, result.value, u8)).toBe("5");
  });

  it("rejects empty exclusive ranges", () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const result = lowerPatternRange({
      lo: world.intExpr(u8, 5n),
      hi: world.intExpr(u8, 5n),
      end: "excluded",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error).toBe("malformed-range");
    expect(result.error.diagnostic).toMatchObject({
      code: "LW0001",
      message: "lower range bound must be less than upper",
      span: RANGE_SPAN,
    });
  });

  it("rejects inverted inclusive ranges with a hint", () => {
    const world = createLoweringWorld();
    const { i32 } = world.types;
    const result = lowerPatternRange({
      lo: world.intExpr(i32, 10n),
      hi: world.intExpr(i32, -3n),
      end: "included",
      type: i32,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.diagnostic.code).toBe("LW0002");
    expect(result.error.diagnostic.hints?.[0]?.message).toContain("both end-points");
    expect(world.diagnostics.diagnostics).toHaveLength(1);
  });

  it("compares signed bounds after sign extension", () => {
    const world = createLoweringWorld();
    const { i8 } = world.types;
    const result = lowerPatternRange({
      lo: world.intExpr(i8, -128n),
      hi: world.intExpr(i8, 127n),
      end: "included",
      type: i8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(printed(world, result.value, i8)).toBe("-128..=127");
  });

  it("reports an overflowing literal instead of an inverted range", () => {
    const world = createLoweringWorld();
    const { i8 } = world.types;
    const loSpan = spanAt(20, 25);
    const result = lowerPatternRange({
      lo: world.intExpr(i8, -130n, loSpan),
      hi: world.intExpr(i8, 2n, spanAt(27, 30)),
      end: "excluded",
      type: i8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error).toBe("literal-overflow");
    expect(result.error.diagnostic).toMatchObject({
      code: "LW0003",
      message: "literal out of range for i8; the type's range is -128..=127",
      span: loSpan,
    });
    expect(world.diagnostics.diagnostics).toHaveLength(1);
  });

  it("checks the upper bound for overflow too", () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const hiSpan = spanAt(26, 29);
    const result = lowerPatternRange({
      lo: world.intExpr(u8, 10n),
      hi: world.intExpr(u8, 256n, hiSpan),
      end: "included",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.diagnostic).toMatchObject({
      code: "LW0003",
      message: "literal out of range for u8; the type's range is 0..=255",
      span: hiSpan,
    });
  });

  it("fills missing bounds with the type's extrema", () => {
    const world = createLoweringWorld();
    const { u8, i8, char } = world.types;
    const upTo = lowerPatternRange({
      hi: world.intExpr(u8, 9n),
      end: "included",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });
    const from = lowerPatternRange({
      lo: world.intExpr(i8, -5n),
      end: "included",
      type: i8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });
    const fromChar = lowerPatternRange({
      lo: world.literalExpr(char, { span: spanAt(0, 3), litKind: "char", value: "a" }),
      end: "included",
      type: char,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(upTo.ok && printed(world, upTo.value, u8)).toBe("0..=9");
    expect(from.ok && printed(world, from.value, i8)).toBe("-5..=127");
    expect(fromChar.ok && printed(world, fromChar.value, char)).toBe("'a'..='\u{10ffff}'");
  });

  it("orders float bounds numerically", () => {
    const world = createLoweringWorld();
    const { f64 } = world.types;
    const float = (text: string) =>
      world.literalExpr(f64, { span: spanAt(0, text.length), litKind: "float", text });
    const result = lowerPatternRange({
      lo: float("-0.5"),
      hi: float("1.5"),
      end: "excluded",
      type: f64,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok && printed(world, result.value, f64)).toBe("-0.5..1.5");
  });

  it("treats a twice-open range as an internal error", () => {
    const lenient = createLoweringWorld({ strictInvariants: false });
    const result = lowerPatternRange({
      end: "excluded",
      type: lenient.types.u8,
      span: RANGE_SPAN,
      ctx: lenient.ctx,
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error).toBe("internal");
    expect(result.error.diagnostic.message).toBe(
      "internal invariant violated: twice-open range pattern"
    );

    const strict = createLoweringWorld({ strictInvariants: true });
    expect(() =>
      lowerPatternRange({
        end: "excluded",
        type: strict.types.u8,
        span: RANGE_SPAN,
        ctx: strict.ctx,
      })
    ).toThrow(PatternLoweringBug);
  });

  it("propagates the error of a failed endpoint without reporting twice", () => {
    const world = createLoweringWorld();
    const { u8 } = world.types;
    const counter = world.items.declareStatic("COUNTER");
    const result = lowerPatternRange({
      lo: world.pathExpr(u8, defRes("static", counter)),
      hi: world.intExpr(u8, 9n),
      end: "included",
      type: u8,
      span: RANGE_SPAN,
      ctx: world.ctx,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error).toBe("static-in-pattern");
    expect(world.diagnostics.diagnostics.map((d) => d.code)).toEqual(["LW0005"]);
  });

  it("keeps both endpoint ascriptions, the lower bound's innermost", () => {
    const world = createLoweringWorld();
    const { items, typeck, types } = world;
    const { u8, u32 } = types;
    const min = items.declareAssocConst({ name: "MIN", type: u8 });
    const max = items.declareAssocConst({ name: "MAX", type: u8 });
    items.declareImplConst(min, u32, { type: u8, body: { kind: "valtree", valtree: leaf(1n, 1) } });
    items.declareImplConst(max, u32, { type: u8, body: { kind: "valtree", valtree: leaf(9n, 1) } });

    const lo = world.pathExpr(u8, defRes("assoc-const", min), spanAt(20, 23));
    const hi = world.pathExpr(u8, defRes("assoc-const", max), spanAt(26, 29));
    typeck.recordNodeArgs(lo.hirId, [u32]);
    typeck.recordNodeArgs(hi.hirId, [u32]);
    typeck.recordUserType(lo.hirId, { kind: "ty", type: u8 });
    typeck.recordUserType(hi.hirId, { kind: "type-of", def: max, args: [u32] });

    const result = lowerPatternRange({ lo, hi, end: "included", type: u8, span: RANGE_SPAN, ctx: world.ctx });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const outer = result.value;
    expect(outer.kind).toBe("ascribe-user-type");
    if (outer.kind !== "ascribe-user-type") return;
    expect(outer.ascription.annotation.userType).toEqual({ kind: "type-of", def: max, args: [u32] });
    expect(outer.ascription.variance).toBe("contravariant");
    expect(outer.subpattern.type).toBe(u8);
    expect(outer.subpattern.span).toEqual(RANGE_SPAN);

    const inner = outer.subpattern.kind;
    expect(inner.kind).toBe("ascribe-user-type");
    if (inner.kind !== "ascribe-user-type") return;
    expect(inner.ascription.annotation.userType).toEqual({ kind: "ty", type: u8 });
    expect(inner.ascription.annotation.span).toEqual(spanAt(20, 23));
    expect(inner.subpattern.kind.kind).toBe("range");
    expect(printed(world, outer, u8)).toBe("1..=9");
    expect(world.diagnostics.diagnostics).toEqual([]);
  });
});
