export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./types.js";
import {
  diagnosticsRegistry,
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const isRegisteredCode = (code: string): code is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, code);

/**
 * Registered codes carry their own phase; anything else falls back to the
 * code prefix (`LW` lowering, `CE` constant evaluation).
 */
const inferPhase = (code: string): DiagnosticPhase | undefined => {
  if (isRegisteredCode(code)) {
    const definition: { phase?: DiagnosticPhase } = getDiagnosticDefinition(code);
    if (definition.phase) return definition.phase;
  }
  switch (code.slice(0, 2).toUpperCase()) {
    case "LW":
      return "lowering";
    case "CE":
      return "const-eval";
    default:
      return undefined;
  }
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  /** Diagnostics of the collaborator whose failure caused this one. */
  related?: readonly Diagnostic[];
  severity?: DiagnosticSeverity;
  hints?: readonly DiagnosticHint[];
};

/** Builds a registry diagnostic without recording it anywhere. */
export const diagnosticFromCode = <K extends DiagnosticCode>({
  code,
  params,
  span,
  related,
  severity,
  hints,
}: RegistryDiagnosticOptions<K>): Diagnostic => {
  const definition: { severity?: DiagnosticSeverity; hints?: readonly DiagnosticHint[] } =
    getDiagnosticDefinition(code);
  return createDiagnostic({
    code,
    message: formatDiagnosticMessage(code, params),
    span,
    related,
    severity: severity ?? definition.severity,
    hints: hints ?? definition.hints,
  });
};

type DiagnosticsCarrier = DiagnosticEmitter | { diagnostics: DiagnosticEmitter };

export type ReportDiagnosticOptions<K extends DiagnosticCode> =
  RegistryDiagnosticOptions<K> & { ctx: DiagnosticsCarrier };

/** Records a registry diagnostic and returns it so callers can attach it to IR. */
export const reportDiagnostic = <K extends DiagnosticCode>({
  ctx,
  ...options
}: ReportDiagnosticOptions<K>): Diagnostic => {
  const emitter = ctx instanceof DiagnosticEmitter ? ctx : ctx.diagnostics;
  return emitter.report(diagnosticFromCode(options));
};

export const formatSpan = (span: SourceSpan): string =>
  `${span.file}:${span.start}-${span.end}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${formatSpan(diagnostic.span)} ${diagnostic.severity.toUpperCase()} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

/** The diagnostic's line, then an indented `note:` line for each related diagnostic. */
export const formatDiagnosticWithNotes = (diagnostic: Diagnostic, depth = 0): string[] => [
  `${"  ".repeat(depth)}${depth > 0 ? "note: " : ""}${formatDiagnostic(diagnostic)}`,
  ...(diagnostic.related ?? []).flatMap((related) =>
    formatDiagnosticWithNotes(related, depth + 1)
  ),
];

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  count(severity: DiagnosticSeverity): number {
    return this.#diagnostics.filter((diagnostic) => diagnostic.severity === severity).length;
  }

  get errorCount(): number {
    return this.count("error");
  }
}
