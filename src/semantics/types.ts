import { emitDiagnostic, type Position } from "../diagnostics/index.js";
import type { StructDecl } from "../syntax-objects/declarations.js";
import type { Expression } from "../syntax-objects/expressions.js";
import type { GlobalEnv } from "./global-env.js";
import { isCompatible } from "./type-relations.js";

export type Primitive =
  | "int"
  | "long"
  | "float"
  | "string"
  | "boolean"
  | "void"
  | "null";

export const primitiveNames: readonly Primitive[] = [
  "int",
  "long",
  "float",
  "string",
  "boolean",
  "void",
  "null",
];

export type Type = PrimitiveType | ArrayType | UserType;

export abstract class BaseType {
  abstract readonly kindOfType: "primitive" | "array" | "user";
  readonly name: string;
  #arrayType?: ArrayType;

  constructor(name: string) {
    this.name = name;
  }

  /** The name used for this type in generated code */
  abstract mangle(): string;

  /** Type of the named field. Reports and recovers to int when absent. */
  abstract lookupField(
    phase: number,
    position: Position,
    name: string,
    env: GlobalEnv
  ): Type;

  /** Checks arguments given to an allocation of this type */
  abstract checkArgs(
    phase: number,
    position: Position,
    args: readonly Expression[],
    env: GlobalEnv
  ): void;

  protected arrayOf(self: Type): ArrayType {
    if (!this.#arrayType) this.#arrayType = new ArrayType(self);
    return this.#arrayType;
  }

  isPrimitiveType(): this is PrimitiveType {
    return this.kindOfType === "primitive";
  }

  isArrayType(): this is ArrayType {
    return this.kindOfType === "array";
  }

  isUserType(): this is UserType {
    return this.kindOfType === "user";
  }

  is(name: Primitive): boolean {
    return this.isPrimitiveType() && this.name === name;
  }

  toString() {
    return this.name;
  }
}

export class PrimitiveType extends BaseType {
  readonly kindOfType = "primitive";

  /** The array type whose elements are this type. Always the same instance. */
  get arrayType(): ArrayType {
    return this.arrayOf(this);
  }

  mangle(): string {
    return `UC_PRIMITIVE(${this.name})`;
  }

  lookupField(
    phase: number,
    position: Position,
    name: string,
    env: GlobalEnv
  ): Type {
    emitDiagnostic({
      ctx: env,
      code: "UN0002",
      params: { kind: "unknown-field", typeName: this.name, field: name },
      phase,
      position,
    });
    return env.primitive("int");
  }

  /** Accepts no argument or a single convertible one */
  checkArgs(
    phase: number,
    position: Position,
    args: readonly Expression[],
    env: GlobalEnv
  ): void {
    if (args.length > 1) {
      emitDiagnostic({
        ctx: env,
        code: "TY0002",
        params: {
          kind: "constructor",
          name: this.name,
          expected: 1,
          actual: args.length,
        },
        phase,
        position,
      });
      return;
    }
    checkArgumentTypes(phase, position, args, [this], env);
  }
}

export class ArrayType extends BaseType {
  readonly kindOfType = "array";
  readonly elemType: Type;

  constructor(elemType: Type) {
    super(`${elemType.name}[]`);
    this.elemType = elemType;
  }

  get arrayType(): ArrayType {
    return this.arrayOf(this);
  }

  mangle(): string {
    return `UC_ARRAY(${this.elemType.mangle()})`;
  }

  /** Arrays only expose their `length` */
  lookupField(
    phase: number,
    position: Position,
    name: string,
    env: GlobalEnv
  ): Type {
    if (name === "length") return env.primitive("int");
    emitDiagnostic({
      ctx: env,
      code: "UN0002",
      params: { kind: "unknown-field", typeName: this.name, field: name },
      phase,
      position,
    });
    return env.primitive("int");
  }

  /** Every argument is an initial element */
  checkArgs(
    phase: number,
    position: Position,
    args: readonly Expression[],
    env: GlobalEnv
  ): void {
    checkArgumentTypes(
      phase,
      position,
      args,
      args.map(() => this.elemType),
      env
    );
  }
}

export class UserType extends BaseType {
  readonly kindOfType = "user";
  readonly decl: StructDecl;

  constructor(name: string, decl: StructDecl) {
    super(name);
    this.decl = decl;
  }

  get arrayType(): ArrayType {
    return this.arrayOf(this);
  }

  /** Declared field types, in declaration order */
  get fieldTypes(): Type[] {
    return this.decl.fields.map((field) => field.typeExpr.resolvedType);
  }

  mangle(): string {
    return `UC_REFERENCE(${this.name})`;
  }

  /** Name of the generated record backing this type */
  mangleTypedef(): string {
    return `UC_TYPEDEF(${this.name})`;
  }

  lookupField(
    phase: number,
    position: Position,
    name: string,
    env: GlobalEnv
  ): Type {
    const field = this.decl.fields.find((f) => f.name.raw === name);
    if (field) return field.typeExpr.resolvedType;

    emitDiagnostic({
      ctx: env,
      code: "UN0002",
      params: { kind: "unknown-field", typeName: this.name, field: name },
      phase,
      position,
    });
    return env.primitive("int");
  }

  /** Accepts no arguments, or exactly one per field */
  checkArgs(
    phase: number,
    position: Position,
    args: readonly Expression[],
    env: GlobalEnv
  ): void {
    if (!args.length) return;

    const fieldTypes = this.fieldTypes;
    if (args.length !== fieldTypes.length) {
      emitDiagnostic({
        ctx: env,
        code: "TY0002",
        params: {
          kind: "constructor",
          name: this.name,
          expected: fieldTypes.length,
          actual: args.length,
        },
        phase,
        position,
      });
      return;
    }

    checkArgumentTypes(phase, position, args, fieldTypes, env);
  }
}

/**
 * Reports every argument whose type does not convert to its parameter.
 * Callers have already checked the arity.
 */
export const checkArgumentTypes = (
  phase: number,
  position: Position,
  args: readonly Expression[],
  paramTypes: readonly Type[],
  env: GlobalEnv
): void => {
  args.forEach((arg, index) => {
    const paramType = paramTypes[index];
    const argType = arg.resolvedType;
    if (!paramType || isCompatible(argType, paramType)) return;
    emitDiagnostic({
      ctx: env,
      code: "TY0003",
      params: {
        kind: "argument-mismatch",
        argType: argType.name,
        paramType: paramType.name,
      },
      phase,
      position,
    });
  });
};

export const addBuiltinTypes = (types: Map<string, Type>): void => {
  primitiveNames.forEach((name) => types.set(name, new PrimitiveType(name)));
};
