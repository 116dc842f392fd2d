import type { DefId, FieldIndex, HirId, TypeId } from "../ids.js";
import type { HirQPath, Res } from "../hir/nodes.js";

export type BindingAnnotation =
  | { kind: "by-value"; mutable: boolean }
  | { kind: "by-ref"; mutable: boolean };

/** A type written by the user on a path or constant pattern. */
export type CanonicalUserType =
  | { kind: "ty"; type: TypeId }
  | { kind: "type-of"; def: DefId; args: readonly TypeId[] };

/**
 * Read-only view of the typing phase's results for one body, keyed by the
 * HIR id of the node they describe.
 */
export interface TypeckResults {
  nodeType(id: HirId): TypeId;
  /** Implicit dereferences of a pattern, outermost (least dereferenced) first. */
  patAdjustments(id: HirId): readonly TypeId[] | undefined;
  patBindingMode(id: HirId): BindingAnnotation | undefined;
  userProvidedType(id: HirId): CanonicalUserType | undefined;
  fieldIndex(id: HirId): FieldIndex;
  qpathRes(qpath: HirQPath, id: HirId): Res;
  nodeArgs(id: HirId): readonly TypeId[];
}

export class TypeckTable implements TypeckResults {
  #nodeTypes = new Map<HirId, TypeId>();
  #adjustments = new Map<HirId, readonly TypeId[]>();
  #bindingModes = new Map<HirId, BindingAnnotation>();
  #userTypes = new Map<HirId, CanonicalUserType>();
  #fieldIndices = new Map<HirId, FieldIndex>();
  #typeDependentDefs = new Map<HirId, Res>();
  #nodeArgs = new Map<HirId, readonly TypeId[]>();

  recordType(id: HirId, type: TypeId): this {
    this.#nodeTypes.set(id, type);
    return this;
  }

  recordAdjustments(id: HirId, adjustments: readonly TypeId[]): this {
    this.#adjustments.set(id, [...adjustments]);
    return this;
  }

  recordBindingMode(id: HirId, mode: BindingAnnotation): this {
    this.#bindingModes.set(id, mode);
    return this;
  }

  recordUserType(id: HirId, userType: CanonicalUserType): this {
    this.#userTypes.set(id, userType);
    return this;
  }

  recordFieldIndex(id: HirId, index: FieldIndex): this {
    this.#fieldIndices.set(id, index);
    return this;
  }

  recordTypeDependentDef(id: HirId, res: Res): this {
    this.#typeDependentDefs.set(id, res);
    return this;
  }

  recordNodeArgs(id: HirId, args: readonly TypeId[]): this {
    this.#nodeArgs.set(id, [...args]);
    return this;
  }

  nodeType(id: HirId): TypeId {
    const type = this.#nodeTypes.get(id);
    if (type === undefined) {
      throw new Error(`missing type for HIR node ${id}`);
    }
    return type;
  }

  patAdjustments(id: HirId): readonly TypeId[] | undefined {
    return this.#adjustments.get(id);
  }

  patBindingMode(id: HirId): BindingAnnotation | undefined {
    return this.#bindingModes.get(id);
  }

  userProvidedType(id: HirId): CanonicalUserType | undefined {
    return this.#userTypes.get(id);
  }

  fieldIndex(id: HirId): FieldIndex {
    const index = this.#fieldIndices.get(id);
    if (index === undefined) {
      throw new Error(`missing field index for HIR node ${id}`);
    }
    return index;
  }

  qpathRes(qpath: HirQPath, id: HirId): Res {
    if (qpath.kind === "resolved") {
      return qpath.res;
    }
    return this.#typeDependentDefs.get(id) ?? { kind: "err" };
  }

  nodeArgs(id: HirId): readonly TypeId[] {
    return this.#nodeArgs.get(id) ?? [];
  }
}
