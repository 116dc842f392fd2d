import type { DefId, TypeId, VariantIndex } from "./ids.js";
import type { DefKind, Res } from "./hir/nodes.js";
import type { ConstValue, Instance, ValTree } from "./consts/values.js";
import type { TypeArena } from "./typing/type-arena.js";

/** `fn`: tuple-like constructor, `const`: unit-like, `none`: braced fields only. */
export type CtorKind = "fn" | "const" | "none";

export interface FieldDef {
  name: string;
  /** May mention `param` types of the owning ADT. */
  type: TypeId;
}

export interface VariantDef {
  def: DefId;
  ctor?: DefId;
  ctorKind: CtorKind;
  name: string;
  fields: readonly FieldDef[];
}

export interface AdtDef {
  def: DefId;
  name: string;
  kind: "enum" | "struct" | "union";
  variants: readonly VariantDef[];
  generics: readonly string[];
  isBox: boolean;
}

export const isEnum = (adt: AdtDef): boolean => adt.kind === "enum";

export const variantIndexWithId = (adt: AdtDef, def: DefId): VariantIndex => {
  const index = adt.variants.findIndex((variant) => variant.def === def);
  if (index < 0) {
    throw new Error(`${adt.name} has no variant with id ${def}`);
  }
  return index;
};

export const variantWithCtorId = (adt: AdtDef, ctor: DefId): VariantDef => {
  const variant = adt.variants.find((candidate) => candidate.ctor === ctor);
  if (!variant) {
    throw new Error(`${adt.name} has no variant with constructor ${ctor}`);
  }
  return variant;
};

export const nonEnumVariant = (adt: AdtDef): VariantDef => {
  const variant = adt.variants[0];
  if (adt.kind === "enum" || !variant) {
    throw new Error(`${adt.name} is not a struct or union`);
  }
  return variant;
};

/** The variant a resolved path or constructor refers to within `adt`. */
export const variantOfRes = (adt: AdtDef, res: Res): VariantDef => {
  if (res.kind === "def") {
    switch (res.defKind) {
      case "variant": {
        const variant = adt.variants[variantIndexWithId(adt, res.def)];
        if (variant) return variant;
        break;
      }
      case "ctor-variant":
      case "ctor-struct":
        return variantWithCtorId(adt, res.def);
      case "struct":
      case "union":
      case "ty-alias":
      case "assoc-ty":
        return nonEnumVariant(adt);
      default:
        break;
    }
  }
  if (
    res.kind === "self-ty-param" ||
    res.kind === "self-ty-alias" ||
    res.kind === "self-ctor"
  ) {
    return nonEnumVariant(adt);
  }
  throw new Error(`unexpected resolution ${res.kind} for ${adt.name}`);
};

export type InstanceResolution =
  | { kind: "resolved"; instance: Instance }
  /** An associated constant with no concrete implementation for `Self`. */
  | { kind: "unresolved" }
  | { kind: "error" };

export interface ItemTable {
  defKind(def: DefId): DefKind;
  defName(def: DefId): string;
  parent(def: DefId): DefId;
  adtDef(def: DefId): AdtDef;
  resolveInstance(def: DefId, args: readonly TypeId[]): InstanceResolution;
}

export type ConstBody =
  | { kind: "valtree"; valtree: ValTree }
  /** Evaluates, but cannot be represented structurally. */
  | { kind: "opaque"; value: ConstValue }
  | { kind: "fails"; reason: string };

export interface ConstItem {
  def: DefId;
  name: string;
  type: TypeId;
  body?: ConstBody;
  /** Evaluation is too generic while the instance arguments mention type parameters. */
  genericDependent: boolean;
}

type DefEntry = {
  kind: DefKind;
  name: string;
  parent?: DefId;
};

type AdtDeclaration = {
  name: string;
  kind: AdtDef["kind"];
  generics?: readonly string[];
  isBox?: boolean;
  variants: readonly {
    name: string;
    ctorKind?: CtorKind;
    fields: readonly FieldDef[];
  }[];
};

type ConstDeclaration = {
  name: string;
  type: TypeId;
  body?: ConstBody;
  genericDependent?: boolean;
};

export class ProgramItems implements ItemTable {
  readonly arena: TypeArena;
  #nextDefId: DefId = 0;
  #defs = new Map<DefId, DefEntry>();
  #adts = new Map<DefId, AdtDef>();
  #consts = new Map<DefId, ConstItem>();
  #impls = new Map<DefId, Map<TypeId, DefId>>();

  constructor(arena: TypeArena) {
    this.arena = arena;
  }

  #declare(entry: DefEntry): DefId {
    const def = this.#nextDefId++;
    this.#defs.set(def, entry);
    return def;
  }

  #entry(def: DefId): DefEntry {
    const entry = this.#defs.get(def);
    if (!entry) {
      throw new Error(`unknown DefId ${def}`);
    }
    return entry;
  }

  declareAdt(declaration: AdtDeclaration): AdtDef {
    const adtId = this.#declare({
      kind: declaration.kind,
      name: declaration.name,
    });
    const variants = declaration.variants.map((variant): VariantDef => {
      const ctorKind = variant.ctorKind ?? "none";
      const variantId =
        declaration.kind === "enum"
          ? this.#declare({
              kind: "variant",
              name: variant.name,
              parent: adtId,
            })
          : adtId;
      const ctor =
        ctorKind === "none"
          ? undefined
          : this.#declare({
              kind: declaration.kind === "enum" ? "ctor-variant" : "ctor-struct",
              name: variant.name,
              parent: variantId,
            });
      return {
        def: variantId,
        ctor,
        ctorKind,
        name: variant.name,
        fields: variant.fields.map((field) => ({ ...field })),
      };
    });

    const adt: AdtDef = {
      def: adtId,
      name: declaration.name,
      kind: declaration.kind,
      variants,
      generics: [...(declaration.generics ?? [])],
      isBox: declaration.isBox ?? false,
    };
    this.#adts.set(adtId, adt);
    return adt;
  }

  declareConst(declaration: ConstDeclaration): DefId {
    return this.#declareConstItem("const", declaration);
  }

  declareInlineConst(
    declaration: Omit<ConstDeclaration, "name"> & { parent?: DefId }
  ): DefId {
    return this.#declareConstItem(
      "inline-const",
      { ...declaration, name: "{inline const}" },
      declaration.parent
    );
  }

  /** Declares an associated constant of a trait, optionally with a default value. */
  declareAssocConst(declaration: ConstDeclaration): DefId {
    const def = this.#declareConstItem("assoc-const", declaration);
    this.#impls.set(def, new Map());
    return def;
  }

  /** Implements the associated constant `traitConst` for `selfType`. */
  declareImplConst(
    traitConst: DefId,
    selfType: TypeId,
    declaration: Omit<ConstDeclaration, "name">
  ): DefId {
    const impls = this.#impls.get(traitConst);
    if (!impls) {
      throw new Error(`${this.defName(traitConst)} is not an associated constant`);
    }
    const def = this.#declareConstItem(
      "assoc-const",
      { ...declaration, name: this.defName(traitConst) },
      traitConst
    );
    impls.set(selfType, def);
    return def;
  }

  declareStatic(name: string): DefId {
    return this.#declare({ kind: "static", name });
  }

  declareConstParam(name: string): DefId {
    return this.#declare({ kind: "const-param", name });
  }

  declareTypeAlias(name: string): DefId {
    return this.#declare({ kind: "ty-alias", name });
  }

  declareFn(name: string): DefId {
    return this.#declare({ kind: "fn", name });
  }

  #declareConstItem(
    kind: DefKind,
    declaration: ConstDeclaration,
    parent?: DefId
  ): DefId {
    const def = this.#declare({ kind, name: declaration.name, parent });
    this.#consts.set(def, {
      def,
      name: declaration.name,
      type: declaration.type,
      body: declaration.body,
      genericDependent: declaration.genericDependent ?? false,
    });
    return def;
  }

  constItem(def: DefId): ConstItem | undefined {
    return this.#consts.get(def);
  }

  defKind(def: DefId): DefKind {
    return this.#entry(def).kind;
  }

  defName(def: DefId): string {
    return this.#entry(def).name;
  }

  parent(def: DefId): DefId {
    const parent = this.#entry(def).parent;
    if (parent === undefined) {
      throw new Error(`${this.defName(def)} has no parent`);
    }
    return parent;
  }

  adtDef(def: DefId): AdtDef {
    const adt = this.#adts.get(def);
    if (!adt) {
      throw new Error(`${this.defName(def)} is not an ADT`);
    }
    return adt;
  }

  resolveInstance(def: DefId, args: readonly TypeId[]): InstanceResolution {
    const kind = this.defKind(def);
    if (kind === "const" || kind === "inline-const") {
      return { kind: "resolved", instance: { def, args: [...args] } };
    }
    if (kind !== "assoc-const") {
      return { kind: "error" };
    }

    const impls = this.#impls.get(def);
    if (!impls) {
      // Already an impl item.
      return { kind: "resolved", instance: { def, args: [...args] } };
    }

    const selfType = args[0];
    if (selfType === undefined) {
      return { kind: "unresolved" };
    }
    if (this.arena.get(selfType).kind === "error") {
      return { kind: "error" };
    }
    const impl = impls.get(selfType);
    if (impl !== undefined) {
      return { kind: "resolved", instance: { def: impl, args: args.slice(1) } };
    }
    if (this.arena.hasTypeParams(selfType)) {
      return { kind: "unresolved" };
    }
    return this.constItem(def)?.body
      ? { kind: "resolved", instance: { def, args: [...args] } }
      : { kind: "unresolved" };
  }
}
