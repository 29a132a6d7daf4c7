import { emitDiagnostic, type Position } from "../diagnostics/index.js";
import type { FunctionDecl } from "../syntax-objects/declarations.js";
import type { Expression } from "../syntax-objects/expressions.js";
import type { GlobalEnv } from "./global-env.js";
import { checkArgumentTypes, type Primitive, type Type } from "./types.js";

export type UcFunction = PrimitiveFunction | UserFunction;

abstract class BaseFunction {
  abstract readonly kindOfFn: "primitive" | "user";
  readonly name: string;
  returnType?: Type;
  paramTypes: Type[] = [];

  constructor(name: string) {
    this.name = name;
  }

  get resolvedReturnType(): Type {
    if (!this.returnType) {
      throw new Error(`return type of function ${this.name} is not resolved`);
    }
    return this.returnType;
  }

  mangle(): string {
    return `UC_FUNCTION(${this.name})`;
  }

  /** Reports an arity mismatch, or otherwise every incompatible argument */
  checkArgs(
    phase: number,
    position: Position,
    args: readonly Expression[],
    env: GlobalEnv
  ): void {
    if (args.length !== this.paramTypes.length) {
      emitDiagnostic({
        ctx: env,
        code: "TY0002",
        params: {
          kind: "function",
          name: this.name,
          expected: this.paramTypes.length,
          actual: args.length,
        },
        phase,
        position,
      });
      return;
    }
    checkArgumentTypes(phase, position, args, this.paramTypes, env);
  }

  isUserFunction(): this is UserFunction {
    return this.kindOfFn === "user";
  }

  toString() {
    return this.name;
  }
}

/** A built-in, implemented by the runtime library */
export class PrimitiveFunction extends BaseFunction {
  readonly kindOfFn = "primitive";

  constructor(opts: { name: string; returnType: Type; paramTypes: Type[] }) {
    super(opts.name);
    this.returnType = opts.returnType;
    this.paramTypes = opts.paramTypes;
  }
}

/**
 * A function declared in the program. Registered while collecting
 * declarations; its signature is filled in during type resolution.
 */
export class UserFunction extends BaseFunction {
  readonly kindOfFn = "user";
  readonly decl: FunctionDecl;

  constructor(name: string, decl: FunctionDecl) {
    super(name);
    this.decl = decl;
  }

  resetParamTypes(): void {
    this.paramTypes = [];
  }

  addParamTypes(types: Type[]): void {
    this.paramTypes.push(...types);
  }
}

type BuiltinSignature = readonly [
  name: string,
  returns: Primitive,
  params: readonly Primitive[]
];

const convertible: readonly Primitive[] = ["int", "long", "float", "string"];

const conversions = (): BuiltinSignature[] => [
  ...convertible.flatMap((from) =>
    convertible
      .filter((to) => to !== from)
      .map((to): BuiltinSignature => [`${from}_to_${to}`, to, [from]])
  ),
  ["boolean_to_string", "string", ["boolean"]],
  ["string_to_boolean", "boolean", ["string"]],
];

const intrinsics: readonly BuiltinSignature[] = [
  ["length", "int", ["string"]],
  ["substr", "string", ["string", "int", "int"]],
  ["ordinal", "int", ["string"]],
  ["character", "string", ["int"]],
  ["pow", "float", ["float", "float"]],
  ["sqrt", "float", ["float"]],
  ["ceil", "float", ["float"]],
  ["floor", "float", ["float"]],
  ["print", "void", ["string"]],
  ["println", "void", ["string"]],
  ["peekchar", "string", []],
  ["readchar", "string", []],
  ["readline", "string", []],
];

/** Seeds `functions` with the runtime library. Primitive types must already be present. */
export const addBuiltinFunctions = (
  functions: Map<string, UcFunction>,
  primitive: (name: Primitive) => Type
): void => {
  [...conversions(), ...intrinsics].forEach(([name, returns, params]) => {
    functions.set(
      name,
      new PrimitiveFunction({
        name,
        returnType: primitive(returns),
        paramTypes: params.map(primitive),
      })
    );
  });
};
