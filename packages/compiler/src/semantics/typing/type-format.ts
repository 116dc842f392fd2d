import type { TypeId } from "../ids.js";
import type { ItemTable } from "../items.js";
import type { TypeArena } from "./type-arena.js";

type DefNames = Pick<ItemTable, "defName">;

export const formatType = (
  arena: TypeArena,
  type: TypeId,
  names?: DefNames
): string => {
  const format = (id: TypeId): string => formatType(arena, id, names);
  const formatArgs = (args: readonly TypeId[]): string =>
    args.length > 0 ? `<${args.map(format).join(", ")}>` : "";
  const defName = (def: number): string => names?.defName(def) ?? `#${def}`;

  const desc = arena.get(type);
  switch (desc.kind) {
    case "int":
    case "uint":
    case "float":
      return desc.name;
    case "bool":
    case "char":
    case "str":
      return desc.kind;
    case "ref":
      return `&${desc.mutable ? "mut " : ""}${format(desc.referent)}`;
    case "adt":
      return `${defName(desc.adt)}${formatArgs(desc.args)}`;
    case "tuple": {
      const [only, ...rest] = desc.elements;
      return only !== undefined && rest.length === 0
        ? `(${format(only)},)`
        : `(${desc.elements.map(format).join(", ")})`;
    }
    case "array":
      return `[${format(desc.element)}; ${desc.length}]`;
    case "slice":
      return `[${format(desc.element)}]`;
    case "fn-def":
      return `fn ${defName(desc.def)}${formatArgs(desc.args)}`;
    case "param":
      return desc.name;
    case "error":
      return "{error}";
  }
};
