import {
  emitDiagnostic,
  type DiagnosticSink,
  type Position,
} from "../diagnostics/index.js";
import type { FunctionDecl, StructDecl } from "../syntax-objects/declarations.js";
import { addBuiltinFunctions, UserFunction, type UcFunction } from "./functions.js";
import {
  addBuiltinTypes,
  UserType,
  type Primitive,
  type PrimitiveType,
  type Type,
} from "./types.js";

/** Program-wide registry of types and functions, seeded with the builtins */
export class GlobalEnv {
  readonly diagnostics: DiagnosticSink;
  #types = new Map<string, Type>();
  #functions = new Map<string, UcFunction>();

  constructor(diagnostics: DiagnosticSink) {
    this.diagnostics = diagnostics;
    addBuiltinTypes(this.#types);
    addBuiltinFunctions(this.#functions, (name) => this.primitive(name));
  }

  get types(): ReadonlyMap<string, Type> {
    return this.#types;
  }

  get functions(): ReadonlyMap<string, UcFunction> {
    return this.#functions;
  }

  /** A builtin primitive. These are registered first and can't be redefined. */
  primitive(name: Primitive): PrimitiveType {
    const type = this.#types.get(name);
    if (!type?.isPrimitiveType()) {
      throw new Error(`primitive type ${name} is not registered`);
    }
    return type;
  }

  /**
   * Registers a struct as a type. On a clash, reports and returns the
   * existing type. Registering the same declaration again is silent.
   */
  addType(
    phase: number,
    position: Position,
    name: string,
    decl: StructDecl
  ): Type {
    const existing = this.#types.get(name);
    if (existing) {
      if (!existing.isUserType() || existing.decl !== decl) {
        emitDiagnostic({
          ctx: this,
          code: "RD0001",
          params: { kind: "type", name },
          phase,
          position,
        });
      }
      return existing;
    }

    const type = new UserType(name, decl);
    this.#types.set(name, type);
    return type;
  }

  addFunction(
    phase: number,
    position: Position,
    name: string,
    decl: FunctionDecl
  ): UcFunction {
    const existing = this.#functions.get(name);
    if (existing) {
      if (!existing.isUserFunction() || existing.decl !== decl) {
        emitDiagnostic({
          ctx: this,
          code: "RD0001",
          params: { kind: "function", name },
          phase,
          position,
        });
      }
      return existing;
    }

    const fn = new UserFunction(name, decl);
    this.#functions.set(name, fn);
    return fn;
  }

  lookupType(phase: number, position: Position, name: string): Type;
  lookupType(
    phase: number,
    position: Position,
    name: string,
    strict: false
  ): Type | undefined;
  /** When `strict`, a missing type is reported and resolves to int */
  lookupType(
    phase: number,
    position: Position,
    name: string,
    strict = true
  ): Type | undefined {
    const type = this.#types.get(name);
    if (type || !strict) return type;

    emitDiagnostic({
      ctx: this,
      code: "UN0001",
      params: { kind: "type", name },
      phase,
      position,
    });
    return this.primitive("int");
  }

  lookupFunction(phase: number, position: Position, name: string): UcFunction;
  lookupFunction(
    phase: number,
    position: Position,
    name: string,
    strict: false
  ): UcFunction | undefined;
  /** When `strict`, a missing function is reported and resolves to string_to_int */
  lookupFunction(
    phase: number,
    position: Position,
    name: string,
    strict = true
  ): UcFunction | undefined {
    const fn = this.#functions.get(name);
    if (fn || !strict) return fn;

    emitDiagnostic({
      ctx: this,
      code: "UN0001",
      params: { kind: "function", name },
      phase,
      position,
    });
    return this.recoveryFunction();
  }

  private recoveryFunction(): UcFunction {
    const fn = this.#functions.get("string_to_int");
    if (!fn) throw new Error("builtin string_to_int is not registered");
    return fn;
  }
}
