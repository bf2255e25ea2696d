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

const letShadowHint: DiagnosticHint = {
  message: "Names declared in a let or generator hide global declarations.",
};

type DiagnosticParamsMap = {
  SX0001:
    | { kind: "unexpected-token"; expected: string; found: string }
    | { kind: "unterminated"; what: string }
    | { kind: "invalid-token"; text: string };
  SC0001:
    | { kind: "duplicate-declaration"; name: string; previousKind: string }
    | { kind: "duplicate-overload"; name: string; signature: string }
    | { kind: "previous-declaration" };
  SC0002: { kind: "unresolved-include"; path: string };
  SC0003: { kind: "cyclic-alias"; name: string };
  RS0001: { kind: "unknown-identifier"; name: string; callee: boolean };
  RS0002: { kind: "ambiguous-reference"; name: string; count: number };
  RS0003:
    | { kind: "no-overload"; name: string; argumentTypes: string }
    | { kind: "candidate"; signature: string; reason: string };
  RS0004:
    | { kind: "ambiguous-overload"; name: string; argumentTypes: string }
    | { kind: "candidate"; signature: string };
  RS0005: { kind: "not-callable"; name: string; declKind: string };
  ST0001: {
    kind: "stale-version";
    file: string;
    requested: number;
    current: number;
  };
  ST0002:
    | { kind: "unknown-file"; file: string }
    | { kind: "unknown-node"; file: string; node: number };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  SX0001: {
    code: "SX0001",
    message: (params) => {
      switch (params.kind) {
        case "unexpected-token":
          return `syntax error: expected ${params.expected}, found ${params.found}`;
        case "unterminated":
          return `syntax error: unterminated ${params.what}`;
        case "invalid-token":
          return `syntax error: invalid token ${params.text}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "syntax",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SX0001"]>,
  SC0001: {
    code: "SC0001",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-declaration":
          return `${params.name} is already declared as a ${params.previousKind}`;
        case "duplicate-overload":
          return `${params.name} already defines ${params.signature}`;
        case "previous-declaration":
          return "previous declaration is here";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "scope",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SC0001"]>,
  SC0002: {
    code: "SC0002",
    message: (params) => `cannot resolve include "${params.path}"`,
    severity: "error",
    phase: "scope",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SC0002"]>,
  SC0003: {
    code: "SC0003",
    message: (params) => `type alias ${params.name} is defined in terms of itself`,
    severity: "error",
    phase: "scope",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SC0003"]>,
  RS0001: {
    code: "RS0001",
    message: (params) =>
      params.callee
        ? `no function or predicate named ${params.name} is in scope`
        : `unknown identifier ${params.name}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) =>
      `${params.name} refers to ${params.count} declarations; use it as a call to select one`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    message: (params) =>
      params.kind === "no-overload"
        ? `no overload of ${params.name} accepts (${params.argumentTypes})`
        : `${params.signature}: ${params.reason}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    message: (params) =>
      params.kind === "ambiguous-overload"
        ? `call to ${params.name} with (${params.argumentTypes}) is ambiguous`
        : `candidate ${params.signature}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  RS0005: {
    code: "RS0005",
    message: (params) =>
      `${params.name} is a ${params.declKind} and cannot be called`,
    severity: "error",
    phase: "resolution",
    hints: [letShadowHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0005"]>,
  ST0001: {
    code: "ST0001",
    message: (params) =>
      `${params.file} version ${params.requested} is stale (current version ${params.current})`,
    severity: "error",
    phase: "store",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0001"]>,
  ST0002: {
    code: "ST0002",
    message: (params) =>
      params.kind === "unknown-file"
        ? `${params.file} is not part of the workspace`
        : `${params.file} has no node #${params.node}`,
    severity: "error",
    phase: "store",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["ST0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  Object.hasOwn(diagnosticsRegistry, code);

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const exhaustive = (_value: never): never => _value;
