import { DiagnosticEmitter } from "../diagnostics/index.js";
import { popPhase, pushPhase } from "../diagnostics/phase-debug.js";
import type { Program } from "../syntax-objects/declarations.js";
import { advancedControl } from "./advanced-control.js";
import { basicControl } from "./basic-control.js";
import { checkNames } from "./check-names.js";
import { checkTypes } from "./check-types/check-types.js";
import { findDecls } from "./find-decls.js";
import { GlobalEnv } from "./global-env.js";
import { PhaseContext } from "./phase-context.js";
import { resolveCalls } from "./resolve-calls.js";
import { resolveTypes } from "./resolve-types.js";
import type { PhaseVisitor } from "./walk.js";

export type SemanticPhase = {
  /** Number reported with this phase's diagnostics */
  phase: number;
  label: string;
  visit: PhaseVisitor;
};

/** Each phase relies on attributes set by the ones before it */
export const semanticPhases: readonly SemanticPhase[] = [
  { phase: 1, label: "find declarations", visit: findDecls },
  { phase: 2, label: "resolve types", visit: resolveTypes },
  { phase: 3, label: "resolve calls", visit: resolveCalls },
  { phase: 4, label: "check names", visit: checkNames },
  { phase: 5, label: "basic control flow", visit: basicControl },
  { phase: 5, label: "advanced control flow", visit: advancedControl },
  { phase: 6, label: "check types", visit: checkTypes },
];

export type SemanticsResult = {
  globalEnv: GlobalEnv;
  diagnostics: DiagnosticEmitter;
};

export type ProcessSemanticsOptions = {
  diagnostics?: DiagnosticEmitter;
  /** Continue from an earlier run over the same program */
  resume?: SemanticsResult;
  /** Stop after the phases numbered up to this one */
  lastPhase?: number;
};

/**
 * Runs the analysis phases over `program` in order. Errors never stop a
 * phase or the pipeline; they are collected in `diagnostics`.
 */
export const processSemantics = (
  program: Program,
  options: ProcessSemanticsOptions = {}
): SemanticsResult => {
  const diagnostics =
    options.resume?.diagnostics ?? options.diagnostics ?? new DiagnosticEmitter();
  const globalEnv = options.resume?.globalEnv ?? new GlobalEnv(diagnostics);
  const lastPhase = options.lastPhase ?? 6;

  semanticPhases
    .filter(({ phase }) => phase <= lastPhase)
    .forEach(({ phase, label, visit }) => {
      pushPhase(`${phase} ${label}`);
      visit(program, new PhaseContext({ phase, globalEnv }));
      popPhase(`${phase} ${label}`, diagnostics.forPhase(phase).length);
    });

  return { globalEnv, diagnostics };
};

export { GlobalEnv } from "./global-env.js";
export { VarEnv } from "./var-env.js";
export { PhaseContext } from "./phase-context.js";
export * from "./types.js";
export * from "./functions.js";
export * from "./type-relations.js";
