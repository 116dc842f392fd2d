export {
  createPatternLoweringContext,
  type PatternLoweringContext,
  type PatternLoweringInputs,
} from "./context.js";
export {
  invariant,
  PatternLoweringBug,
  type LoweringResult,
} from "./errors.js";
export {
  enumerateAndAdjust,
  lowerPattern,
  lowerPatterns,
  lowerPatternUnadjusted,
  patternFromHir,
} from "./lower.js";
export { lowerInlineConst, lowerLit, lowerPath } from "./literals.js";
export { lowerPatternRange } from "./range.js";
export { lowerVariantOrLeaf } from "./variants.js";
