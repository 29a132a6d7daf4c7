import type { Type } from "../semantics/types.js";
import type { UcFunction } from "../semantics/functions.js";
import type { Name, TypeExpr } from "./declarations.js";
import { Syntax, type ChildEntry, type SyntaxMetadata } from "./syntax.js";

/** Base for every expression. `type` is computed during type checking. */
export abstract class ExpressionBase extends Syntax {
  type?: Type;

  get resolvedType(): Type {
    return this.resolved(this.type, "type");
  }
}

type LiteralOpts = SyntaxMetadata & { text: string };

export abstract class LiteralBase extends ExpressionBase {
  /** Source text, emitted verbatim by code generation */
  readonly text: string;

  constructor(opts: LiteralOpts) {
    super(opts);
    this.text = opts.text;
  }

  childEntries(): ChildEntry[] {
    return [["text", this.text]];
  }
}

/** An int literal, or a long one when the text ends in `l` or `L` */
export class IntLiteral extends LiteralBase {
  readonly syntaxType = "int-literal";

  get isLong(): boolean {
    return /[lL]$/.test(this.text);
  }
}

export class FloatLiteral extends LiteralBase {
  readonly syntaxType = "float-literal";
}

/** `text` includes the surrounding quotes */
export class StringLiteral extends LiteralBase {
  readonly syntaxType = "string-literal";
}

export class BooleanLiteral extends LiteralBase {
  readonly syntaxType = "boolean-literal";
}

export class NullLiteral extends LiteralBase {
  readonly syntaxType = "null-literal";

  constructor(opts: SyntaxMetadata & { text?: string }) {
    super({ ...opts, text: opts.text ?? "nullptr" });
  }
}

export type Literal =
  | IntLiteral
  | FloatLiteral
  | StringLiteral
  | BooleanLiteral
  | NullLiteral;

export class NameExpr extends ExpressionBase {
  readonly syntaxType = "name-expr";
  name: Name;

  constructor(opts: SyntaxMetadata & { name: Name }) {
    super(opts);
    this.name = opts.name;
  }

  childEntries(): ChildEntry[] {
    return [["name", this.name]];
  }
}

export class Call extends ExpressionBase {
  readonly syntaxType = "call";
  name: Name;
  args: Expression[];
  /** Populated by call resolution */
  fn?: UcFunction;

  constructor(opts: SyntaxMetadata & { name: Name; args: Expression[] }) {
    super(opts);
    this.name = opts.name;
    this.args = opts.args;
  }

  get resolvedFn(): UcFunction {
    return this.resolved(this.fn, "fn");
  }

  childEntries(): ChildEntry[] {
    return [
      ["name", this.name],
      ["args", this.args],
    ];
  }
}

/** `new T(args)`. `type` is already set by type resolution. */
export class NewObject extends ExpressionBase {
  readonly syntaxType = "new-object";
  name: Name;
  args: Expression[];

  constructor(opts: SyntaxMetadata & { name: Name; args: Expression[] }) {
    super(opts);
    this.name = opts.name;
    this.args = opts.args;
  }

  childEntries(): ChildEntry[] {
    return [
      ["name", this.name],
      ["args", this.args],
    ];
  }
}

/** `new T[](args)`. `type` is already set by type resolution. */
export class NewArray extends ExpressionBase {
  readonly syntaxType = "new-array";
  elemTypeExpr: TypeExpr;
  args: Expression[];

  constructor(
    opts: SyntaxMetadata & { elemTypeExpr: TypeExpr; args: Expression[] }
  ) {
    super(opts);
    this.elemTypeExpr = opts.elemTypeExpr;
    this.args = opts.args;
  }

  childEntries(): ChildEntry[] {
    return [
      ["elemTypeExpr", this.elemTypeExpr],
      ["args", this.args],
    ];
  }
}

export class FieldAccess extends ExpressionBase {
  readonly syntaxType = "field-access";
  receiver: Expression;
  field: Name;

  constructor(opts: SyntaxMetadata & { receiver: Expression; field: Name }) {
    super(opts);
    this.receiver = opts.receiver;
    this.field = opts.field;
  }

  childEntries(): ChildEntry[] {
    return [
      ["receiver", this.receiver],
      ["field", this.field],
    ];
  }
}

export class ArrayIndex extends ExpressionBase {
  readonly syntaxType = "array-index";
  receiver: Expression;
  index: Expression;

  constructor(
    opts: SyntaxMetadata & { receiver: Expression; index: Expression }
  ) {
    super(opts);
    this.receiver = opts.receiver;
    this.index = opts.index;
  }

  childEntries(): ChildEntry[] {
    return [
      ["receiver", this.receiver],
      ["index", this.index],
    ];
  }
}

/** `#` yields the identity of a reference as a long */
export type PrefixOperator = "+" | "-" | "!" | "++" | "--" | "#";

export class PrefixOp extends ExpressionBase {
  readonly syntaxType = "prefix";
  op: PrefixOperator;
  operand: Expression;

  constructor(
    opts: SyntaxMetadata & { op: PrefixOperator; operand: Expression }
  ) {
    super(opts);
    this.op = opts.op;
    this.operand = opts.operand;
  }

  childEntries(): ChildEntry[] {
    return [
      ["operand", this.operand],
      ["op", this.op],
    ];
  }
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type LogicalOperator = "||" | "&&";
export type RelationalOperator = "<" | "<=" | ">" | ">=";
export type EqualityOperator = "==" | "!=";
/** `<<` pushes onto an array, `>>` pops from one */
export type ArrayOperator = "<<" | ">>";

export type BinaryOperator =
  | ArithmeticOperator
  | LogicalOperator
  | RelationalOperator
  | EqualityOperator
  | ArrayOperator
  | "=";

export class BinaryOp extends ExpressionBase {
  readonly syntaxType = "binary";
  op: BinaryOperator;
  lhs: Expression;
  rhs: Expression;

  constructor(
    opts: SyntaxMetadata & {
      op: BinaryOperator;
      lhs: Expression;
      rhs: Expression;
    }
  ) {
    super(opts);
    this.op = opts.op;
    this.lhs = opts.lhs;
    this.rhs = opts.rhs;
  }

  childEntries(): ChildEntry[] {
    return [
      ["lhs", this.lhs],
      ["rhs", this.rhs],
      ["op", this.op],
    ];
  }
}

export type Expression =
  | Literal
  | NameExpr
  | Call
  | NewObject
  | NewArray
  | FieldAccess
  | ArrayIndex
  | PrefixOp
  | BinaryOp;
