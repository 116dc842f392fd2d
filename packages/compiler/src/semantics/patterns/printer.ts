import type { ItemTable, VariantDef } from "../items.js";
import type { TypeArena } from "../typing/type-arena.js";
import { formatConst } from "../consts/format.js";
import type { FieldPattern, Pattern } from "./nodes.js";

export type PrintPatternContext = {
  arena: TypeArena;
  items: ItemTable;
};

const positional = (
  count: number,
  subpatterns: readonly FieldPattern[],
  print: (pattern: Pattern) => string
): string[] => {
  const fields = Array.from({ length: count }, () => "_");
  subpatterns.forEach(({ field, pattern }) => {
    fields[field] = print(pattern);
  });
  return fields;
};

const printVariant = (
  variant: VariantDef,
  subpatterns: readonly FieldPattern[],
  print: (pattern: Pattern) => string
): string => {
  switch (variant.ctorKind) {
    case "const":
      return variant.name;
    case "fn":
      return `${variant.name}(${positional(
        variant.fields.length,
        subpatterns,
        print
      ).join(", ")})`;
    case "none": {
      const fields = subpatterns.map(
        ({ field, pattern }) =>
          `${variant.fields[field]?.name ?? field}: ${print(pattern)}`
      );
      if (subpatterns.length < variant.fields.length) {
        fields.push("..");
      }
      return fields.length > 0
        ? `${variant.name} { ${fields.join(", ")} }`
        : `${variant.name} {}`;
    }
  }
};

/**
 * Renders a lowered pattern close to source syntax, e.g. `&&Some(n)`,
 * `0..=5` or `[a, .., b]`. Ascriptions are transparent.
 */
export const printPattern = (
  pattern: Pattern,
  ctx: PrintPatternContext
): string => {
  const print = (child: Pattern): string => printPattern(child, ctx);
  const { kind } = pattern;

  switch (kind.kind) {
    case "wild":
      return "_";
    case "binding": {
      const prefix =
        kind.mode.kind === "by-ref"
          ? kind.mode.borrow === "mut"
            ? "ref mut "
            : "ref "
          : kind.mutability === "mut"
          ? "mut "
          : "";
      const suffix = kind.subpattern ? ` @ ${print(kind.subpattern)}` : "";
      return `${prefix}${kind.name}${suffix}`;
    }
    case "variant": {
      const variant = kind.adt.variants[kind.variantIndex];
      return variant
        ? printVariant(variant, kind.subpatterns, print)
        : `${kind.adt.name}::<variant ${kind.variantIndex}>`;
    }
    case "leaf": {
      const desc = ctx.arena.get(pattern.type);
      if (desc.kind === "adt") {
        const variant = ctx.items.adtDef(desc.adt).variants[0];
        if (variant) {
          return printVariant(variant, kind.subpatterns, print);
        }
      }
      const count = desc.kind === "tuple" ? desc.elements.length : kind.subpatterns.length;
      const fields = positional(count, kind.subpatterns, print);
      return count === 1 ? `(${fields.join("")},)` : `(${fields.join(", ")})`;
    }
    case "deref": {
      const desc = ctx.arena.get(pattern.type);
      if (desc.kind === "ref") {
        return `&${desc.mutable ? "mut " : ""}${print(kind.subpattern)}`;
      }
      return `box ${print(kind.subpattern)}`;
    }
    case "constant":
      return formatConst(kind.value, ctx.arena);
    case "range":
      return `${formatConst(kind.range.lo, ctx.arena)}${
        kind.range.end === "included" ? "..=" : ".."
      }${formatConst(kind.range.hi, ctx.arena)}`;
    case "slice":
    case "array": {
      const elements = kind.prefix.map(print);
      if (kind.middle) {
        elements.push(
          kind.middle.kind.kind === "wild" ? ".." : `${print(kind.middle)} @ ..`
        );
      }
      elements.push(...kind.suffix.map(print));
      return `[${elements.join(", ")}]`;
    }
    case "or":
      return kind.patterns.map(print).join(" | ");
    case "ascribe-user-type":
      return print(kind.subpattern);
    case "error":
      return `<error: ${kind.error}>`;
  }
};
