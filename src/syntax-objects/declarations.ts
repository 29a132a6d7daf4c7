import type { Type } from "../semantics/types.js";
import type { UcFunction } from "../semantics/functions.js";
import type { VarEnv } from "../semantics/var-env.js";
import type { Block } from "./statements.js";
import { Syntax, type ChildEntry, type SyntaxMetadata } from "./syntax.js";

export class Program extends Syntax {
  readonly syntaxType = "program";
  decls: Decl[];

  constructor(opts: SyntaxMetadata & { decls: Decl[] }) {
    super(opts);
    this.decls = opts.decls;
  }

  childEntries(): ChildEntry[] {
    return [["decls", this.decls]];
  }
}

export class Name extends Syntax {
  readonly syntaxType = "name";
  /** The identifier exactly as written */
  readonly raw: string;

  constructor(opts: SyntaxMetadata & { raw: string }) {
    super(opts);
    this.raw = opts.raw;
  }

  childEntries(): ChildEntry[] {
    return [["raw", this.raw]];
  }

  toString() {
    return this.raw;
  }
}

/** A reference to a type by name. `type` is populated by type resolution. */
export class TypeName extends Syntax {
  readonly syntaxType = "type-name";
  name: Name;
  type?: Type;

  constructor(opts: SyntaxMetadata & { name: Name }) {
    super(opts);
    this.name = opts.name;
  }

  get resolvedType(): Type {
    return this.resolved(this.type, "type");
  }

  childEntries(): ChildEntry[] {
    return [["name", this.name]];
  }
}

export class ArrayTypeName extends Syntax {
  readonly syntaxType = "array-type-name";
  elemTypeExpr: TypeExpr;
  type?: Type;

  constructor(opts: SyntaxMetadata & { elemTypeExpr: TypeExpr }) {
    super(opts);
    this.elemTypeExpr = opts.elemTypeExpr;
  }

  get resolvedType(): Type {
    return this.resolved(this.type, "type");
  }

  childEntries(): ChildEntry[] {
    return [["elemTypeExpr", this.elemTypeExpr]];
  }
}

export type TypeExpr = TypeName | ArrayTypeName;

type VariableOpts = SyntaxMetadata & { typeExpr: TypeExpr; name: Name };

/** A field of a struct or a local variable of a function */
export class VarDecl extends Syntax {
  readonly syntaxType = "var-decl";
  typeExpr: TypeExpr;
  name: Name;

  constructor(opts: VariableOpts) {
    super(opts);
    this.typeExpr = opts.typeExpr;
    this.name = opts.name;
  }

  childEntries(): ChildEntry[] {
    return [
      ["typeExpr", this.typeExpr],
      ["name", this.name],
    ];
  }
}

export class Parameter extends Syntax {
  readonly syntaxType = "parameter";
  typeExpr: TypeExpr;
  name: Name;

  constructor(opts: VariableOpts) {
    super(opts);
    this.typeExpr = opts.typeExpr;
    this.name = opts.name;
  }

  childEntries(): ChildEntry[] {
    return [
      ["typeExpr", this.typeExpr],
      ["name", this.name],
    ];
  }
}

export class StructDecl extends Syntax {
  readonly syntaxType = "struct-decl";
  name: Name;
  fields: VarDecl[];
  /** Registered while collecting declarations */
  type?: Type;
  /** Field scope, built while checking names */
  localEnv?: VarEnv;

  constructor(opts: SyntaxMetadata & { name: Name; fields: VarDecl[] }) {
    super(opts);
    this.name = opts.name;
    this.fields = opts.fields;
  }

  get resolvedType(): Type {
    return this.resolved(this.type, "type");
  }

  get resolvedLocalEnv(): VarEnv {
    return this.resolved(this.localEnv, "localEnv");
  }

  childEntries(): ChildEntry[] {
    return [
      ["name", this.name],
      ["fields", this.fields],
    ];
  }
}

export class FunctionDecl extends Syntax {
  readonly syntaxType = "function-decl";
  returnTypeExpr: TypeExpr;
  name: Name;
  params: Parameter[];
  vars: VarDecl[];
  body: Block;
  /** Registered while collecting declarations, signature filled during type resolution */
  fn?: UcFunction;
  /** Parameter and local scope, built while checking names */
  localEnv?: VarEnv;

  constructor(
    opts: SyntaxMetadata & {
      returnTypeExpr: TypeExpr;
      name: Name;
      params: Parameter[];
      vars: VarDecl[];
      body: Block;
    }
  ) {
    super(opts);
    this.returnTypeExpr = opts.returnTypeExpr;
    this.name = opts.name;
    this.params = opts.params;
    this.vars = opts.vars;
    this.body = opts.body;
  }

  get resolvedFn(): UcFunction {
    return this.resolved(this.fn, "fn");
  }

  get resolvedLocalEnv(): VarEnv {
    return this.resolved(this.localEnv, "localEnv");
  }

  childEntries(): ChildEntry[] {
    return [
      ["returnTypeExpr", this.returnTypeExpr],
      ["name", this.name],
      ["params", this.params],
      ["vars", this.vars],
      ["body", this.body],
    ];
  }
}

export type Decl = StructDecl | FunctionDecl;
