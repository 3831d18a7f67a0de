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

const singleUnderscoreHint: DiagnosticHint = {
  message: "Separate words with a single underscore (my_name, not my__name).",
};

type DiagnosticParamsMap = {
  ID0001: { kind: "ident-issue"; problems: readonly string[] };
  ID0002: { kind: "capacity-exceeded"; limit: number };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  ID0001: {
    code: "ID0001",
    message: (params) =>
      `identifier has style issues: ${params.problems.join(", ")}`,
    severity: "warning",
    phase: "parser",
    hints: [singleUnderscoreHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ID0001"]>,
  ID0002: {
    code: "ID0002",
    message: (params) =>
      `too many identifiers in one compilation unit (limit ${params.limit})`,
    severity: "error",
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ID0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(
  code: K
): DiagnosticDefinition<DiagnosticParams<K>> => diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;
