import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const inclusiveRangeHint: DiagnosticHint = {
  message:
    "Range patterns include both end-points, so the start of the range must be less than or equal to the end of the range.",
};

type DiagnosticParamsMap = {
  CE0001: { kind: "evaluation-failed"; constName: string; reason: string };
  LW0001: { kind: "lower-bound-not-less-than-upper" };
  LW0002: { kind: "lower-bound-greater-than-upper" };
  LW0003: {
    kind: "literal-out-of-range";
    typeName: string;
    min: string;
    max: string;
  };
  LW0004: { kind: "const-param-in-pattern" };
  LW0005: { kind: "static-in-pattern" };
  LW0006: { kind: "non-const-path" };
  LW0007: { kind: "assoc-const-in-pattern" };
  LW0008: { kind: "const-depends-on-generic-parameter" };
  LW0009: { kind: "could-not-eval-const-pattern" };
  LW0010:
    | { kind: "unparsable-float"; text: string; typeName: string }
    | { kind: "erroneous-literal-type" };
  LW0011: { kind: "erroneous-pattern-type" };
  LW9999: { kind: "internal-invariant"; message: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  CE0001: {
    code: "CE0001",
    message: (params) =>
      `evaluation of constant ${params.constName} failed: ${params.reason}`,
    severity: "error",
    phase: "const-eval",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CE0001"]>,
  LW0001: {
    code: "LW0001",
    message: () => "lower range bound must be less than upper",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0001"]>,
  LW0002: {
    code: "LW0002",
    message: () => "lower range bound must be less than or equal to upper",
    severity: "error",
    hints: [inclusiveRangeHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0002"]>,
  LW0003: {
    code: "LW0003",
    message: (params) =>
      `literal out of range for ${params.typeName}; the type's range is ${params.min}..=${params.max}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0003"]>,
  LW0004: {
    code: "LW0004",
    message: () => "const parameters cannot be referenced in patterns",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0004"]>,
  LW0005: {
    code: "LW0005",
    message: () => "statics cannot be referenced in patterns",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0005"]>,
  LW0006: {
    code: "LW0006",
    message: () => "runtime values cannot be referenced in patterns",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0006"]>,
  LW0007: {
    code: "LW0007",
    message: () =>
      "associated consts cannot be referenced in patterns unless they resolve to a concrete implementation",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0007"]>,
  LW0008: {
    code: "LW0008",
    message: () => "constant pattern depends on a generic parameter",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0008"]>,
  LW0009: {
    code: "LW0009",
    message: () => "could not evaluate constant pattern",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0009"]>,
  LW0010: {
    code: "LW0010",
    message: (params) => {
      switch (params.kind) {
        case "unparsable-float":
          return `could not evaluate float literal ${params.text} as ${params.typeName}`;
        case "erroneous-literal-type":
          return "literal pattern has an erroneous type";
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0010"]>,
  LW0011: {
    code: "LW0011",
    message: () => "pattern type contains errors reported earlier",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0011"]>,
  LW9999: {
    code: "LW9999",
    message: (params) => `internal invariant violated: ${params.message}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW9999"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];

const exhaustive = (_value: never): never => _value;
