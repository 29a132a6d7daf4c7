import type { Position } from "../diagnostics/index.js";
import { SyntaxArena } from "./arena.js";
import {
  ArrayTypeName,
  FunctionDecl,
  Name,
  Parameter,
  Program,
  StructDecl,
  TypeName,
  VarDecl,
  type Decl,
  type TypeExpr,
} from "./declarations.js";
import {
  ArrayIndex,
  BinaryOp,
  BooleanLiteral,
  Call,
  FieldAccess,
  FloatLiteral,
  IntLiteral,
  NameExpr,
  NewArray,
  NewObject,
  NullLiteral,
  PrefixOp,
  StringLiteral,
  type BinaryOperator,
  type Expression,
  type PrefixOperator,
} from "./expressions.js";
import {
  Block,
  BreakStmt,
  ContinueStmt,
  ExpressionStmt,
  ForStmt,
  IfStmt,
  ReturnStmt,
  WhileStmt,
  type Statement,
} from "./statements.js";

type NameLike = string | Name;

/**
 * Creates nodes for one compilation. Every node is registered with the
 * builder's arena, so ids are sequential in creation order.
 */
export class AstBuilder {
  readonly arena: SyntaxArena;

  constructor(arena: SyntaxArena = new SyntaxArena()) {
    this.arena = arena;
  }

  private meta(position: Position) {
    return { arena: this.arena, position };
  }

  private toName(position: Position, name: NameLike): Name {
    return typeof name === "string" ? this.name(position, name) : name;
  }

  program(position: Position, decls: Decl[]): Program {
    return new Program({ ...this.meta(position), decls });
  }

  name(position: Position, raw: string): Name {
    return new Name({ ...this.meta(position), raw });
  }

  typeName(position: Position, name: NameLike): TypeName {
    return new TypeName({
      ...this.meta(position),
      name: this.toName(position, name),
    });
  }

  arrayType(position: Position, elemTypeExpr: TypeExpr): ArrayTypeName {
    return new ArrayTypeName({ ...this.meta(position), elemTypeExpr });
  }

  varDecl(position: Position, typeExpr: TypeExpr, name: NameLike): VarDecl {
    return new VarDecl({
      ...this.meta(position),
      typeExpr,
      name: this.toName(position, name),
    });
  }

  param(position: Position, typeExpr: TypeExpr, name: NameLike): Parameter {
    return new Parameter({
      ...this.meta(position),
      typeExpr,
      name: this.toName(position, name),
    });
  }

  struct(position: Position, name: NameLike, fields: VarDecl[]): StructDecl {
    return new StructDecl({
      ...this.meta(position),
      name: this.toName(position, name),
      fields,
    });
  }

  fn(
    position: Position,
    opts: {
      returnTypeExpr: TypeExpr;
      name: NameLike;
      params?: Parameter[];
      vars?: VarDecl[];
      body: Block;
    }
  ): FunctionDecl {
    return new FunctionDecl({
      ...this.meta(position),
      returnTypeExpr: opts.returnTypeExpr,
      name: this.toName(position, opts.name),
      params: opts.params ?? [],
      vars: opts.vars ?? [],
      body: opts.body,
    });
  }

  int(position: Position, text: string): IntLiteral {
    return new IntLiteral({ ...this.meta(position), text });
  }

  float(position: Position, text: string): FloatLiteral {
    return new FloatLiteral({ ...this.meta(position), text });
  }

  /** `text` is the literal as written, quotes included */
  string(position: Position, text: string): StringLiteral {
    return new StringLiteral({ ...this.meta(position), text });
  }

  boolean(position: Position, value: boolean): BooleanLiteral {
    return new BooleanLiteral({ ...this.meta(position), text: `${value}` });
  }

  null(position: Position): NullLiteral {
    return new NullLiteral(this.meta(position));
  }

  nameExpr(position: Position, name: NameLike): NameExpr {
    return new NameExpr({
      ...this.meta(position),
      name: this.toName(position, name),
    });
  }

  call(position: Position, name: NameLike, args: Expression[] = []): Call {
    return new Call({
      ...this.meta(position),
      name: this.toName(position, name),
      args,
    });
  }

  newObject(
    position: Position,
    name: NameLike,
    args: Expression[] = []
  ): NewObject {
    return new NewObject({
      ...this.meta(position),
      name: this.toName(position, name),
      args,
    });
  }

  newArray(
    position: Position,
    elemTypeExpr: TypeExpr,
    args: Expression[] = []
  ): NewArray {
    return new NewArray({ ...this.meta(position), elemTypeExpr, args });
  }

  field(position: Position, receiver: Expression, field: NameLike): FieldAccess {
    return new FieldAccess({
      ...this.meta(position),
      receiver,
      field: this.toName(position, field),
    });
  }

  index(position: Position, receiver: Expression, index: Expression): ArrayIndex {
    return new ArrayIndex({ ...this.meta(position), receiver, index });
  }

  prefix(position: Position, op: PrefixOperator, operand: Expression): PrefixOp {
    return new PrefixOp({ ...this.meta(position), op, operand });
  }

  binary(
    position: Position,
    op: BinaryOperator,
    lhs: Expression,
    rhs: Expression
  ): BinaryOp {
    return new BinaryOp({ ...this.meta(position), op, lhs, rhs });
  }

  block(position: Position, statements: Statement[] = []): Block {
    return new Block({ ...this.meta(position), statements });
  }

  ifStmt(
    position: Position,
    test: Expression,
    thenBlock: Block,
    elseBlock?: Block
  ): IfStmt {
    return new IfStmt({
      ...this.meta(position),
      test,
      thenBlock,
      elseBlock: elseBlock ?? this.block(position),
    });
  }

  whileStmt(position: Position, test: Expression, body: Block): WhileStmt {
    return new WhileStmt({ ...this.meta(position), test, body });
  }

  forStmt(
    position: Position,
    clauses: { init?: Expression; test?: Expression; update?: Expression },
    body: Block
  ): ForStmt {
    return new ForStmt({ ...this.meta(position), ...clauses, body });
  }

  breakStmt(position: Position): BreakStmt {
    return new BreakStmt(this.meta(position));
  }

  continueStmt(position: Position): ContinueStmt {
    return new ContinueStmt(this.meta(position));
  }

  returnStmt(position: Position, expr?: Expression): ReturnStmt {
    return new ReturnStmt({ ...this.meta(position), expr });
  }

  exprStmt(position: Position, expr: Expression): ExpressionStmt {
    return new ExpressionStmt({ ...this.meta(position), expr });
  }
}
