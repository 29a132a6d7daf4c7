export * from "./syntax-objects/index.js";
export * from "./diagnostics/index.js";
export {
  processSemantics,
  semanticPhases,
  type ProcessSemanticsOptions,
  type SemanticPhase,
  type SemanticsResult,
} from "./semantics/index.js";
export { GlobalEnv } from "./semantics/global-env.js";
export { VarEnv, type VariableKind } from "./semantics/var-env.js";
export { PhaseContext, type OutputSink } from "./semantics/phase-context.js";
export * from "./semantics/types.js";
export * from "./semantics/functions.js";
export * from "./semantics/type-relations.js";
export {
  codegenPasses,
  compileExpression,
  generateCode,
  type GenerateCodeOptions,
} from "./codegen.js";
export { decodeProgram, AstDecodeError } from "./ast-json/decode.js";
export { writeTypes } from "./tools/write-types.js";
export { graphGen } from "./tools/graph-gen.js";
export {
  compileProgram,
  compileJson,
  compilePath,
  type CompileOptions,
  type CompileResult,
} from "./compiler.js";
