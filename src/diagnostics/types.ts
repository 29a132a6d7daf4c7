/** A source position supplied by the upstream parser (1-based line number). */
export type Position = number;

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticCategory =
  | "RedefinitionError"
  | "UndefinedNameError"
  | "TypeError"
  | "ControlFlowError";

export type Diagnostic = {
  code: string;
  category: DiagnosticCategory;
  /** The compiler phase (1-6) that reported the diagnostic */
  phase: number;
  position: Position;
  message: string;
  severity: DiagnosticSeverity;
};

export type DiagnosticInput = Omit<Diagnostic, "severity" | "category"> & {
  severity?: DiagnosticSeverity;
  category?: DiagnosticCategory;
};

export interface DiagnosticSink {
  report(input: DiagnosticInput): Diagnostic;
}
