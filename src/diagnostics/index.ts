export * from "./types.js";
export * from "./registry.js";

import type {
  Diagnostic,
  DiagnosticCategory,
  DiagnosticInput,
  DiagnosticSink,
  Position,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codeCategoryPrefixes: Record<string, DiagnosticCategory> = {
  RD: "RedefinitionError",
  UN: "UndefinedNameError",
  TY: "TypeError",
  CF: "ControlFlowError",
};

const inferCategory = (code: string): DiagnosticCategory =>
  codeCategoryPrefixes[code.slice(0, 2).toUpperCase()] ?? "TypeError";

export const createDiagnostic = ({
  severity,
  category,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  category: category ?? inferCategory(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  phase: number;
  position: Position;
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    phase: options.phase,
    position: options.position,
    severity: definition.severity,
    category: definition.category,
  });
};

type DiagnosticsCarrier = DiagnosticSink | { diagnostics: DiagnosticSink };

export type EmitDiagnosticOptions<K extends DiagnosticCode> =
  RegistryDiagnosticOptions<K> & { ctx: DiagnosticsCarrier };

const getSink = (carrier: DiagnosticsCarrier): DiagnosticSink =>
  "report" in carrier ? carrier : carrier.diagnostics;

/**
 * Reports a registry diagnostic and hands it back. Reporting never aborts
 * the caller; it is expected to continue with a recovery value.
 */
export const emitDiagnostic = <K extends DiagnosticCode>(
  options: EmitDiagnosticOptions<K>
): Diagnostic => {
  const { ctx, ...rest } = options;
  return getSink(ctx).report(diagnosticFromCode(rest));
};

export const formatDiagnostic = (diagnostic: Diagnostic): string =>
  `Error (${diagnostic.phase}) at line ${diagnostic.position}: ${diagnostic.message}`;

export class DiagnosticEmitter implements DiagnosticSink {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  get hasErrors(): boolean {
    return this.#diagnostics.some((d) => d.severity === "error");
  }

  /** Diagnostics reported by the given phase, in report order */
  forPhase(phase: number): Diagnostic[] {
    return this.#diagnostics.filter((d) => d.phase === phase);
  }
}
