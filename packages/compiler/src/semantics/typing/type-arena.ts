import type { DefId, TypeId } from "../ids.js";

export type IntTypeName = "i8" | "i16" | "i32" | "i64" | "i128" | "isize";
export type UintTypeName = "u8" | "u16" | "u32" | "u64" | "u128" | "usize";
export type FloatTypeName = "f32" | "f64";

export type TypeDescriptor =
  | IntType
  | UintType
  | FloatType
  | BoolType
  | CharType
  | StrType
  | RefType
  | AdtType
  | TupleType
  | ArrayType
  | SliceType
  | FnDefType
  | ParamType
  | ErrorType;

export interface IntType {
  kind: "int";
  name: IntTypeName;
}

export interface UintType {
  kind: "uint";
  name: UintTypeName;
}

export interface FloatType {
  kind: "float";
  name: FloatTypeName;
}

export interface BoolType {
  kind: "bool";
}

export interface CharType {
  kind: "char";
}

export interface StrType {
  kind: "str";
}

export interface RefType {
  kind: "ref";
  mutable: boolean;
  referent: TypeId;
}

export interface AdtType {
  kind: "adt";
  adt: DefId;
  args: readonly TypeId[];
}

export interface TupleType {
  kind: "tuple";
  elements: readonly TypeId[];
}

export interface ArrayType {
  kind: "array";
  element: TypeId;
  length: number;
}

export interface SliceType {
  kind: "slice";
  element: TypeId;
}

/** The type of a constructor function, e.g. a tuple variant used as a value. */
export interface FnDefType {
  kind: "fn-def";
  def: DefId;
  args: readonly TypeId[];
}

export interface ParamType {
  kind: "param";
  index: number;
  name: string;
}

export interface ErrorType {
  kind: "error";
}

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  internInt(name: IntTypeName): TypeId;
  internUint(name: UintTypeName): TypeId;
  internFloat(name: FloatTypeName): TypeId;
  internBool(): TypeId;
  internChar(): TypeId;
  internStr(): TypeId;
  internRef(referent: TypeId, mutable?: boolean): TypeId;
  internAdt(adt: DefId, args?: readonly TypeId[]): TypeId;
  internTuple(elements: readonly TypeId[]): TypeId;
  internArray(element: TypeId, length: number): TypeId;
  internSlice(element: TypeId): TypeId;
  internFnDef(def: DefId, args?: readonly TypeId[]): TypeId;
  internParam(index: number, name: string): TypeId;
  internError(): TypeId;
  /** Replaces `param` types by the argument at their index. */
  substitute(type: TypeId, args: readonly TypeId[]): TypeId;
  /** True when the type mentions a `param` type anywhere. */
  hasTypeParams(type: TypeId): boolean;
}

export const createTypeArena = (): TypeArena => {
  let nextTypeId: TypeId = 0;

  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();

  const keyFor = (desc: TypeDescriptor): string => JSON.stringify(desc);

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = nextTypeId++;
    descriptors[id] = desc;
    descriptorCache.set(key, id);
    return id;
  };

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const internRef = (referent: TypeId, mutable = false): TypeId =>
    storeDescriptor({ kind: "ref", mutable, referent });

  const internAdt = (adt: DefId, args: readonly TypeId[] = []): TypeId =>
    storeDescriptor({ kind: "adt", adt, args: [...args] });

  const internTuple = (elements: readonly TypeId[]): TypeId =>
    storeDescriptor({ kind: "tuple", elements: [...elements] });

  const internArray = (element: TypeId, length: number): TypeId => {
    if (!Number.isInteger(length) || length < 0) {
      throw new Error(`invalid array length ${length}`);
    }
    return storeDescriptor({ kind: "array", element, length });
  };

  const internSlice = (element: TypeId): TypeId =>
    storeDescriptor({ kind: "slice", element });

  const internFnDef = (def: DefId, args: readonly TypeId[] = []): TypeId =>
    storeDescriptor({ kind: "fn-def", def, args: [...args] });

  const substitute = (type: TypeId, args: readonly TypeId[]): TypeId => {
    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "param": {
        const replacement = args[desc.index];
        return typeof replacement === "number" ? replacement : type;
      }
      case "ref": {
        const referent = substitute(desc.referent, args);
        return referent === desc.referent
          ? type
          : internRef(referent, desc.mutable);
      }
      case "adt":
        return internAdt(
          desc.adt,
          desc.args.map((arg) => substitute(arg, args))
        );
      case "fn-def":
        return internFnDef(
          desc.def,
          desc.args.map((arg) => substitute(arg, args))
        );
      case "tuple":
        return internTuple(
          desc.elements.map((element) => substitute(element, args))
        );
      case "array":
        return internArray(substitute(desc.element, args), desc.length);
      case "slice":
        return internSlice(substitute(desc.element, args));
      default:
        return type;
    }
  };

  const hasTypeParams = (type: TypeId): boolean => {
    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "param":
        return true;
      case "ref":
        return hasTypeParams(desc.referent);
      case "adt":
      case "fn-def":
        return desc.args.some(hasTypeParams);
      case "tuple":
        return desc.elements.some(hasTypeParams);
      case "array":
      case "slice":
        return hasTypeParams(desc.element);
      default:
        return false;
    }
  };

  return {
    get: getDescriptor,
    internInt: (name) => storeDescriptor({ kind: "int", name }),
    internUint: (name) => storeDescriptor({ kind: "uint", name }),
    internFloat: (name) => storeDescriptor({ kind: "float", name }),
    internBool: () => storeDescriptor({ kind: "bool" }),
    internChar: () => storeDescriptor({ kind: "char" }),
    internStr: () => storeDescriptor({ kind: "str" }),
    internRef,
    internAdt,
    internTuple,
    internArray,
    internSlice,
    internFnDef,
    internParam: (index, name) =>
      storeDescriptor({ kind: "param", index, name }),
    internError: () => storeDescriptor({ kind: "error" }),
    substitute,
    hasTypeParams,
  };
};
