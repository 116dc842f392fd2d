import type { SourceSpan, TypeId } from "../ids.js";
import type { ItemTable } from "../items.js";
import type { FieldPattern, Pattern, PatternKind } from "../patterns/nodes.js";
import type { TypeArena } from "../typing/type-arena.js";
import { constType, tyConstValue, type PatConst, type ValTree } from "./values.js";

export type DecomposeConstInput = {
  value: PatConst;
  span: SourceSpan;
  arena: TypeArena;
  items: ItemTable;
};

/** Turns an evaluated constant into the structural pattern that matches it. */
export type ConstDecomposer = (input: DecomposeConstInput) => Pattern;

type DecomposeState = Omit<DecomposeConstInput, "value">;

const branchChildren = (
  valtree: ValTree,
  type: TypeId,
  state: DecomposeState
): readonly ValTree[] => {
  if (valtree.kind !== "branch") {
    throw new Error(
      `expected a branch value for type ${type} at ${state.span.start}`
    );
  }
  return valtree.children;
};

const fieldPatterns = (
  children: readonly ValTree[],
  types: readonly TypeId[],
  state: DecomposeState
): FieldPattern[] => {
  if (children.length !== types.length) {
    throw new Error(
      `constant has ${children.length} fields, expected ${types.length}`
    );
  }
  return children.map((child, field) => {
    const type = types[field];
    if (type === undefined) {
      throw new Error(`missing type for field ${field}`);
    }
    return { field, pattern: decomposeValTree(child, type, state) };
  });
};

const decomposeValTree = (
  valtree: ValTree,
  type: TypeId,
  state: DecomposeState
): Pattern => {
  const { arena, items, span } = state;
  const desc = arena.get(type);
  const build = (kind: PatternKind): Pattern => ({ type, span: { ...span }, kind });
  const constant = (): Pattern =>
    build({ kind: "constant", value: tyConstValue(type, valtree) });

  switch (desc.kind) {
    case "int":
    case "uint":
    case "float":
    case "bool":
    case "char":
      return constant();
    case "ref": {
      const referent = arena.get(desc.referent);
      // String constants are compared as a whole.
      if (referent.kind === "str") {
        return constant();
      }
      return build({
        kind: "deref",
        subpattern: decomposeValTree(valtree, desc.referent, state),
      });
    }
    case "tuple":
      return build({
        kind: "leaf",
        subpatterns: fieldPatterns(
          branchChildren(valtree, type, state),
          desc.elements,
          state
        ),
      });
    case "array":
    case "slice": {
      const element = desc.element;
      const children = branchChildren(valtree, type, state);
      return build({
        kind: desc.kind,
        prefix: children.map((child) => decomposeValTree(child, element, state)),
        suffix: [],
      });
    }
    case "adt": {
      const adt = items.adtDef(desc.adt);
      if (adt.kind === "union") {
        return constant();
      }
      const children = branchChildren(valtree, type, state);
      if (adt.kind === "enum") {
        const [discriminant, ...fields] = children;
        if (discriminant?.kind !== "leaf") {
          throw new Error(`enum constant of ${adt.name} has no variant index`);
        }
        const variantIndex = Number(discriminant.scalar.bits);
        const variant = adt.variants[variantIndex];
        if (!variant) {
          throw new Error(`${adt.name} has no variant ${variantIndex}`);
        }
        return build({
          kind: "variant",
          adt,
          args: desc.args,
          variantIndex,
          subpatterns: fieldPatterns(
            fields,
            variant.fields.map((field) => arena.substitute(field.type, desc.args)),
            state
          ),
        });
      }
      const variant = adt.variants[0];
      return build({
        kind: "leaf",
        subpatterns: fieldPatterns(
          children,
          (variant?.fields ?? []).map((field) =>
            arena.substitute(field.type, desc.args)
          ),
          state
        ),
      });
    }
    default:
      return constant();
  }
};

/**
 * Default decomposer. Structured constants become nested patterns; opaque and
 * not yet evaluated constants stay `constant` nodes.
 */
export const decomposeConst: ConstDecomposer = ({ value, ...state }) => {
  const type = constType(value);
  if (value.kind === "ty" && value.value.kind.kind === "value") {
    return decomposeValTree(value.value.kind.valtree, type, state);
  }
  return { type, span: { ...state.span }, kind: { kind: "constant", value } };
};
