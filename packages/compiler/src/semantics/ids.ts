/**
 * Shared identifier aliases consumed by the typing tables, the item table and
 * pattern lowering. These are intentionally opaque so downstream code cannot
 * depend on their underlying representation.
 */
export type HirId = number;
export type DefId = number;
export type LocalVarId = HirId;
export type TypeId = number;
export type FieldIndex = number;
export type VariantIndex = number;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "../diagnostics/index.js";
