import { emitDiagnostic, type Position } from "../diagnostics/index.js";
import type { Node } from "../syntax-objects/node.js";
import type { GlobalEnv } from "./global-env.js";
import type { Type } from "./types.js";

export type VariableKind = "field" | "variable" | "parameter";

type Binding = { type: Type; declaredBy?: Node };

/**
 * The flat scope of one declaration: the fields of a struct, or the
 * parameters and locals of a function.
 */
export class VarEnv {
  readonly globalEnv: GlobalEnv;
  #bindings = new Map<string, Binding>();

  constructor(globalEnv: GlobalEnv) {
    this.globalEnv = globalEnv;
  }

  /**
   * Binds `name`, reporting a redeclaration when it is already bound.
   * Binding again from the same declaring node is silent.
   */
  addVariable(
    phase: number,
    position: Position,
    name: string,
    type: Type,
    kind: VariableKind,
    declaredBy?: Node
  ): void {
    const existing = this.#bindings.get(name);
    if (existing) {
      if (!declaredBy || existing.declaredBy !== declaredBy) {
        emitDiagnostic({
          ctx: this.globalEnv,
          code: "RD0002",
          params: { kind, name },
          phase,
          position,
        });
      }
      return;
    }
    this.#bindings.set(name, { type, declaredBy });
  }

  contains(name: string): boolean {
    return this.#bindings.has(name);
  }

  /** Type bound to `name`, or int after reporting it undefined */
  getType(phase: number, position: Position, name: string): Type {
    const binding = this.#bindings.get(name);
    if (binding) return binding.type;

    emitDiagnostic({
      ctx: this.globalEnv,
      code: "UN0001",
      params: { kind: "variable", name },
      phase,
      position,
    });
    return this.globalEnv.primitive("int");
  }

  get names(): string[] {
    return [...this.#bindings.keys()];
  }
}
