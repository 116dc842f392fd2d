export * from "./diagnostics/index.js";
export {
  resolveLoweringOptions,
  parseFlag,
  STRICT_INVARIANTS_ENV,
} from "./config.js";
export type { Environment, PatternLoweringOptions } from "./config.js";
export {
  enablePatternPerf,
  incrementPatternPerfCounter,
  isPatternPerfEnabled,
  logPatternPerfSummary,
  resetPatternPerfCounters,
  snapshotPatternPerfCounters,
  tracePatternLowering,
} from "./perf.js";

export type {
  DefId,
  FieldIndex,
  HirId,
  LocalVarId,
  TypeId,
  VariantIndex,
} from "./semantics/ids.js";
export * from "./semantics/hir/nodes.js";
export * from "./semantics/items.js";
export * from "./semantics/typing/type-arena.js";
export * from "./semantics/typing/typeck-results.js";
export * from "./semantics/typing/numeric.js";
export { formatType } from "./semantics/typing/type-format.js";

export * from "./semantics/consts/values.js";
export * from "./semantics/consts/literals.js";
export * from "./semantics/consts/evaluator.js";
export * from "./semantics/consts/compare.js";
export * from "./semantics/consts/const-to-pattern.js";
export { formatConst } from "./semantics/consts/format.js";

export * from "./semantics/patterns/nodes.js";
export * from "./semantics/patterns/fold.js";
export * from "./semantics/patterns/walk.js";
export * from "./semantics/patterns/transforms.js";
export * from "./semantics/patterns/printer.js";

export * from "./semantics/lowering/patterns/index.js";
