import { DiagnosticEmitter } from "../../../diagnostics/index.js";
import {
  resolveLoweringOptions,
  type PatternLoweringOptions,
} from "../../../config.js";
import type { TypeId } from "../../ids.js";
import type { ItemTable } from "../../items.js";
import type { ConstEvaluator } from "../../consts/evaluator.js";
import {
  decomposeConst,
  type ConstDecomposer,
} from "../../consts/const-to-pattern.js";
import type { TypeArena } from "../../typing/type-arena.js";
import type { TypeckResults } from "../../typing/typeck-results.js";

/**
 * Everything pattern lowering reads. Only `diagnostics` changes while a
 * pattern is lowered.
 */
export interface PatternLoweringContext {
  readonly arena: TypeArena;
  readonly items: ItemTable;
  readonly typeck: TypeckResults;
  readonly consts: ConstEvaluator;
  readonly decompose: ConstDecomposer;
  readonly diagnostics: DiagnosticEmitter;
  /** Generic arguments of the enclosing item; inline constants are instantiated with them. */
  readonly genericArgs: readonly TypeId[];
  readonly options: PatternLoweringOptions;
}

export type PatternLoweringInputs = {
  arena: TypeArena;
  items: ItemTable;
  typeck: TypeckResults;
  consts: ConstEvaluator;
  decompose?: ConstDecomposer;
  diagnostics?: DiagnosticEmitter;
  genericArgs?: readonly TypeId[];
  options?: Partial<PatternLoweringOptions>;
};

export const createPatternLoweringContext = ({
  arena,
  items,
  typeck,
  consts,
  decompose,
  diagnostics,
  genericArgs,
  options,
}: PatternLoweringInputs): PatternLoweringContext => ({
  arena,
  items,
  typeck,
  consts,
  decompose: decompose ?? decomposeConst,
  diagnostics: diagnostics ?? new DiagnosticEmitter(),
  genericArgs: [...(genericArgs ?? [])],
  options: resolveLoweringOptions(options),
});
