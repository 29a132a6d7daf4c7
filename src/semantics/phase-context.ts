import type { DiagnosticSink } from "../diagnostics/index.js";
import type { GlobalEnv } from "./global-env.js";
import type { Type } from "./types.js";
import type { VarEnv } from "./var-env.js";

/** Destination of generated text */
export interface OutputSink {
  write(text: string): void;
}

type ScopeState = {
  /** Fields or parameters and locals of the enclosing declaration */
  localEnv?: VarEnv;
  /** Declared return type of the enclosing function */
  returnType?: Type;
  inLoop: boolean;
  /** Only a function's return type may name void */
  isReturnPosition: boolean;
  out?: OutputSink;
  /** Current indentation, in spaces */
  indent: number;
};

export type PhaseContextOptions = Partial<ScopeState> & {
  phase: number;
  globalEnv: GlobalEnv;
};

/**
 * State threaded through one traversal. Contexts are never mutated;
 * entering a scope derives a child context with `with`.
 */
export class PhaseContext {
  readonly phase: number;
  readonly globalEnv: GlobalEnv;
  readonly localEnv?: VarEnv;
  readonly returnType?: Type;
  readonly inLoop: boolean;
  readonly isReturnPosition: boolean;
  readonly out?: OutputSink;
  readonly indent: number;

  constructor(opts: PhaseContextOptions) {
    this.phase = opts.phase;
    this.globalEnv = opts.globalEnv;
    this.localEnv = opts.localEnv;
    this.returnType = opts.returnType;
    this.inLoop = opts.inLoop ?? false;
    this.isReturnPosition = opts.isReturnPosition ?? false;
    this.out = opts.out;
    this.indent = opts.indent ?? 0;
  }

  get diagnostics(): DiagnosticSink {
    return this.globalEnv.diagnostics;
  }

  with(overrides: Partial<ScopeState>): PhaseContext {
    return new PhaseContext({
      phase: this.phase,
      globalEnv: this.globalEnv,
      localEnv: this.localEnv,
      returnType: this.returnType,
      inLoop: this.inLoop,
      isReturnPosition: this.isReturnPosition,
      out: this.out,
      indent: this.indent,
      ...overrides,
    });
  }

  /** A context nested `by` more spaces */
  indented(by = 2): PhaseContext {
    return this.with({ indent: this.indent + by });
  }

  get resolvedLocalEnv(): VarEnv {
    if (!this.localEnv) {
      throw new Error(`phase ${this.phase}: no local scope in context`);
    }
    return this.localEnv;
  }

  get resolvedReturnType(): Type {
    if (!this.returnType) {
      throw new Error(`phase ${this.phase}: no enclosing function in context`);
    }
    return this.returnType;
  }

  print(...text: string[]): void {
    if (!this.out) throw new Error(`phase ${this.phase} has no output sink`);
    const out = this.out;
    text.forEach((chunk) => out.write(chunk));
  }

  /** Prints `text` at the current indentation */
  printIndented(...text: string[]): void {
    this.print(" ".repeat(this.indent), ...text);
  }
}
