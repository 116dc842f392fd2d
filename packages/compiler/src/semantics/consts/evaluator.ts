import { diagnosticFromCode } from "../../diagnostics/index.js";
import type { Diagnostic, SourceSpan } from "../ids.js";
import type { ProgramItems } from "../items.js";
import type { TypeArena } from "../typing/type-arena.js";
import {
  literalToConst,
  type LitToConstInput,
  type LitToConstResult,
} from "./literals.js";
import {
  scalarInt,
  valTreeBytes,
  type ConstValue,
  type Instance,
  type ValTree,
} from "./values.js";

export type EvalError =
  /** The value depends on a generic parameter that is not known yet. */
  | { kind: "too-generic" }
  /** Evaluation failed; the diagnostic has not been reported yet. */
  | { kind: "failed"; diagnostic: Diagnostic };

export type EvalResult<T> = { ok: true; value: T } | { ok: false; error: EvalError };

export interface ConstEvaluator {
  /**
   * Evaluates to a structured value. Resolves to `undefined` when the constant
   * evaluates but has no structured representation.
   */
  evaluateToValTree(
    instance: Instance,
    span: SourceSpan
  ): EvalResult<ValTree | undefined>;
  evaluateToValue(instance: Instance, span: SourceSpan): EvalResult<ConstValue>;
  litToConst(input: LitToConstInput): LitToConstResult;
}

const valueFromValTree = (valtree: ValTree, allocId: number): ConstValue => {
  if (valtree.kind === "leaf") {
    return {
      kind: "scalar",
      scalar: scalarInt(valtree.scalar.bits, valtree.scalar.size),
    };
  }
  if (valtree.children.length === 0) {
    return { kind: "zero-sized" };
  }
  const bytes = valTreeBytes(valtree);
  return bytes ? { kind: "slice", bytes } : { kind: "indirect", allocId, offset: 0 };
};

/** Evaluates the constants declared in a `ProgramItems` table. */
export class ConstTable implements ConstEvaluator {
  readonly #items: ProgramItems;
  readonly #arena: TypeArena;

  constructor(items: ProgramItems) {
    this.#items = items;
    this.#arena = items.arena;
  }

  evaluateToValTree(
    instance: Instance,
    span: SourceSpan
  ): EvalResult<ValTree | undefined> {
    const item = this.#items.constItem(instance.def);
    if (!item) {
      return this.#failed(instance, span, "not a constant item");
    }
    if (
      item.genericDependent &&
      instance.args.some((arg) => this.#arena.hasTypeParams(arg))
    ) {
      return { ok: false, error: { kind: "too-generic" } };
    }
    const body = item.body;
    if (!body) {
      return this.#failed(instance, span, "the constant has no value");
    }
    switch (body.kind) {
      case "valtree":
        return { ok: true, value: body.valtree };
      case "opaque":
        return { ok: true, value: undefined };
      case "fails":
        return this.#failed(instance, span, body.reason);
    }
  }

  evaluateToValue(instance: Instance, span: SourceSpan): EvalResult<ConstValue> {
    const item = this.#items.constItem(instance.def);
    if (item?.body?.kind === "opaque") {
      return { ok: true, value: item.body.value };
    }
    const valtree = this.evaluateToValTree(instance, span);
    if (!valtree.ok) {
      return valtree;
    }
    if (!valtree.value) {
      return this.#failed(instance, span, "the constant has no value");
    }
    return { ok: true, value: valueFromValTree(valtree.value, instance.def) };
  }

  litToConst(input: LitToConstInput): LitToConstResult {
    return literalToConst(this.#arena, input);
  }

  #failed(
    instance: Instance,
    span: SourceSpan,
    reason: string
  ): { ok: false; error: EvalError } {
    return {
      ok: false,
      error: {
        kind: "failed",
        diagnostic: diagnosticFromCode({
          code: "CE0001",
          params: {
            kind: "evaluation-failed",
            constName: this.#items.defName(instance.def),
            reason,
          },
          span,
        }),
      },
    };
  }
}
