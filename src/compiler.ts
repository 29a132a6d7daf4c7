import { readFile } from "node:fs/promises";
import { decodeProgram } from "./ast-json/decode.js";
import { generateCode } from "./codegen.js";
import type { Diagnostic, DiagnosticEmitter } from "./diagnostics/index.js";
import { logPhase } from "./diagnostics/phase-debug.js";
import { processSemantics } from "./semantics/index.js";
import type { GlobalEnv } from "./semantics/global-env.js";
import type { Program } from "./syntax-objects/declarations.js";

export type CompileOptions = {
  /** Last analysis phase to run. Code is only generated after all six. */
  frontendPhase?: number;
  codegen?: boolean;
  /** Last lowering pass to emit */
  backendPhase?: number;
  diagnostics?: DiagnosticEmitter;
};

export type CompileResult = {
  program: Program;
  globalEnv: GlobalEnv;
  diagnostics: readonly Diagnostic[];
  /** Present when code generation was requested and the front end reported nothing */
  code?: string;
};

export const compileProgram = (
  program: Program,
  options: CompileOptions = {}
): CompileResult => {
  const frontendPhase = options.frontendPhase ?? 6;
  const { globalEnv, diagnostics } = processSemantics(program, {
    lastPhase: frontendPhase,
    diagnostics: options.diagnostics,
  });

  const lower = options.codegen && frontendPhase >= 6 && !diagnostics.hasErrors;
  if (options.codegen && !lower) {
    logPhase(
      `codegen skipped (frontend phase ${frontendPhase}, ${diagnostics.diagnostics.length} diagnostic(s))`
    );
  }
  const code = lower
    ? generateCode(program, globalEnv, { lastPass: options.backendPhase })
    : undefined;

  return { program, globalEnv, diagnostics: diagnostics.diagnostics, code };
};

export const compileJson = (json: unknown, options?: CompileOptions) =>
  compileProgram(decodeProgram(json), options);

/** Compiles the JSON AST stored at `path` */
export const compilePath = async (path: string, options?: CompileOptions) => {
  const json: unknown = JSON.parse(await readFile(path, "utf8"));
  return compileJson(json, options);
};
