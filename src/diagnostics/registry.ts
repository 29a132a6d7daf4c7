import { exhaustive } from "../lib/helpers.js";
import type { DiagnosticCategory, DiagnosticSeverity } from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  category?: DiagnosticCategory;
};

type DiagnosticParamsMap = {
  RD0001: { kind: "type" | "function"; name: string };
  RD0002: { kind: "field" | "variable" | "parameter"; name: string };
  UN0001: { kind: "type" | "function" | "variable"; name: string };
  UN0002: { kind: "unknown-field"; typeName: string; field: string };
  CF0001: { kind: "break" | "continue" };
  TY0001: { kind: "void-outside-return" } | { kind: "primitive-allocation" };
  TY0002:
    | { kind: "function"; name: string; expected: number; actual: number }
    | { kind: "constructor"; name: string; expected: number; actual: number };
  TY0003: { kind: "argument-mismatch"; argType: string; paramType: string };
  TY0004:
    | { kind: "numeric-operand"; type: string }
    | { kind: "boolean-operand"; type: string }
    | { kind: "numeric-lvalue" }
    | { kind: "reference-operand"; type: string };
  TY0005:
    | { kind: "numeric-operands" }
    | { kind: "integral-operands" }
    | { kind: "boolean-operands" }
    | { kind: "comparable-operands" }
    | { kind: "equality-operands" }
    | { kind: "primitive-operands" }
    | { kind: "void-or-null-operand"; side: "lhs" | "rhs" }
    | { kind: "boolean-needs-string"; side: "lhs" | "rhs" };
  TY0006:
    | { kind: "invalid-receiver"; type: string }
    | { kind: "non-array-index"; type: string }
    | { kind: "non-int-index"; type: string };
  TY0007:
    | { kind: "assign-incompatible" }
    | { kind: "assign-not-lvalue" }
    | { kind: "not-array"; op: string }
    | { kind: "push-incompatible" }
    | { kind: "pop-target" }
    | { kind: "pop-incompatible" };
  TY0008:
    | { kind: "non-boolean-test"; statement: string; type: string }
    | { kind: "void-return-value" }
    | { kind: "missing-return-value"; expected: string }
    | { kind: "return-mismatch"; expected: string; actual: string };
  TY0009: { kind: "incompatible-join"; left: string; right: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const otherSide = (side: "lhs" | "rhs") => (side === "lhs" ? "rhs" : "lhs");

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  RD0001: {
    code: "RD0001",
    message: (params) => `redefinition of ${params.kind} ${params.name}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RD0001"]>,
  RD0002: {
    code: "RD0002",
    message: (params) => `redeclaration of ${params.kind} ${params.name}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RD0002"]>,
  UN0001: {
    code: "UN0001",
    message: (params) => `undefined ${params.kind} ${params.name}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UN0001"]>,
  UN0002: {
    code: "UN0002",
    message: (params) => `type ${params.typeName} has no field ${params.field}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UN0002"]>,
  CF0001: {
    code: "CF0001",
    message: (params) => `${params.kind} statement must occur within a loop`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CF0001"]>,
  TY0001: {
    code: "TY0001",
    message: (params) =>
      params.kind === "void-outside-return"
        ? "void can only be used as return type"
        : "simple allocations of primitives are not allowed",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    message: (params) =>
      params.kind === "function"
        ? `function ${params.name} expected ${params.expected} argument(s), but got ${params.actual}`
        : `constructor of type ${params.name} expected 0 or ${params.expected} argument(s), but got ${params.actual}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    message: (params) =>
      `type ${params.argType} of argument is not compatible with parameter of type ${params.paramType}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    message: (params) => {
      switch (params.kind) {
        case "numeric-operand":
          return `subexpression given is of type ${params.type}, but must be numeric`;
        case "boolean-operand":
          return `subexpression given is of type ${params.type}, but must be boolean`;
        case "numeric-lvalue":
          return "subexpression must be a numeric l-value";
        case "reference-operand":
          return `subexpression was of type ${params.type}, but must be of reference type`;
      }
      return exhaustive(params);
    },
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    message: (params) => {
      switch (params.kind) {
        case "numeric-operands":
          return "lhs and rhs must be of numeric type";
        case "integral-operands":
          return "lhs and rhs must be of type int or long";
        case "boolean-operands":
          return "lhs and rhs operands must be of type boolean";
        case "comparable-operands":
          return "lhs and rhs must be both numeric or both strings";
        case "equality-operands":
          return "lhs and rhs cannot be compared";
        case "primitive-operands":
          return "lhs and rhs operands must be primitive types";
        case "void-or-null-operand":
          return `${params.side} operand cannot be of type void or null`;
        case "boolean-needs-string":
          return `${params.side} operand is of type boolean, so ${otherSide(params.side)} operand must be of type string`;
      }
      return exhaustive(params);
    },
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    message: (params) => {
      switch (params.kind) {
        case "invalid-receiver":
          return `receiver must be user-defined type or array type, but was ${params.type}`;
        case "non-array-index":
          return `cannot index into non-array type ${params.type}`;
        case "non-int-index":
          return `array index expects type int, but got type ${params.type}`;
      }
      return exhaustive(params);
    },
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  TY0007: {
    code: "TY0007",
    message: (params) => {
      switch (params.kind) {
        case "assign-incompatible":
          return "rhs operand must be implicitly convertible to lhs operand";
        case "assign-not-lvalue":
          return "lhs operand must produce l-value";
        case "not-array":
          return `lhs operand of ${params.op} must be of array type`;
        case "push-incompatible":
          return "rhs operand is not implicitly convertible to the element type of lhs operand";
        case "pop-target":
          return "rhs operand must be null or l-value";
        case "pop-incompatible":
          return "element type of lhs operand must be implicitly convertible to rhs operand";
      }
      return exhaustive(params);
    },
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0007"]>,
  TY0008: {
    code: "TY0008",
    message: (params) => {
      switch (params.kind) {
        case "non-boolean-test":
          return `type of ${params.statement} test expression must be boolean, but was given ${params.type}`;
        case "void-return-value":
          return "function should not have a return expression as its return type is void";
        case "missing-return-value":
          return `function requires return type ${params.expected} but got no return value`;
        case "return-mismatch":
          return `function requires return type ${params.expected} but got ${params.actual}`;
      }
      return exhaustive(params);
    },
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0008"]>,
  TY0009: {
    code: "TY0009",
    message: (params) =>
      `cannot combine types ${params.left} and ${params.right}`,
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0009"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry) as DiagnosticCode[];
