export type UccConfig = {
  /** JSON AST file to compile */
  input: string;
  /** Write generated code here instead of stdout */
  out?: string;
  /** Lower the program once the front end reports nothing */
  codegen: boolean;
  /** Last analysis phase to run, 1 to 6 */
  frontendPhase: number;
  /** Last lowering pass to emit, 1 to 4 */
  backendPhase: number;
  /** Print the typed AST */
  emitTypes: boolean;
  /** Print the AST as a Graphviz digraph */
  emitGraph: boolean;
};
