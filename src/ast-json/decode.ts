import type { Position } from "../diagnostics/index.js";
import { AstBuilder } from "../syntax-objects/builder.js";
import type { Decl, Parameter, Program, TypeExpr, VarDecl } from "../syntax-objects/declarations.js";
import type {
  BinaryOperator,
  Expression,
  PrefixOperator,
} from "../syntax-objects/expressions.js";
import type { Block, Statement } from "../syntax-objects/statements.js";

/** Malformed AST input. `path` locates the offending value, e.g. `$.decls[0].name`. */
export class AstDecodeError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "AstDecodeError";
    this.path = path;
  }
}

const prefixOperators: readonly PrefixOperator[] = ["+", "-", "!", "++", "--", "#"];

const binaryOperators: readonly BinaryOperator[] = [
  "+", "-", "*", "/", "%",
  "||", "&&",
  "<", "<=", ">", ">=",
  "==", "!=",
  "<<", ">>",
  "=",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** A JSON object together with its path from the document root */
class JsonNode {
  readonly path: string;
  readonly value: Record<string, unknown>;

  constructor(value: unknown, path: string) {
    if (!isRecord(value)) throw new AstDecodeError(path, "expected an object");
    this.value = value;
    this.path = path;
  }

  get kind(): string {
    return this.string("kind");
  }

  get position(): Position {
    const position = this.value.position;
    if (typeof position !== "number" || !Number.isInteger(position)) {
      throw new AstDecodeError(`${this.path}.position`, "expected an integer");
    }
    return position;
  }

  has(key: string): boolean {
    return this.value[key] !== undefined && this.value[key] !== null;
  }

  string(key: string): string {
    const value = this.value[key];
    if (typeof value !== "string") {
      throw new AstDecodeError(`${this.path}.${key}`, "expected a string");
    }
    return value;
  }

  node(key: string): JsonNode {
    return new JsonNode(this.value[key], `${this.path}.${key}`);
  }

  optionalNode(key: string): JsonNode | undefined {
    return this.has(key) ? this.node(key) : undefined;
  }

  list(key: string): JsonNode[] {
    const value = this.value[key] ?? [];
    if (!Array.isArray(value)) {
      throw new AstDecodeError(`${this.path}.${key}`, "expected an array");
    }
    return value.map((item, i) => new JsonNode(item, `${this.path}.${key}[${i}]`));
  }

  expectKind(...kinds: string[]): string {
    const kind = this.kind;
    if (!kinds.includes(kind)) {
      throw new AstDecodeError(
        `${this.path}.kind`,
        `expected ${kinds.join(" or ")}, got ${kind}`
      );
    }
    return kind;
  }

  unknownKind(category: string): AstDecodeError {
    return new AstDecodeError(`${this.path}.kind`, `unknown ${category} kind ${this.kind}`);
  }
}

/**
 * Builds a program from its JSON form. Every object carries `kind` (a
 * syntax type such as `"struct-decl"`) and `position`; names are plain
 * strings.
 */
export const decodeProgram = (
  json: unknown,
  builder: AstBuilder = new AstBuilder()
): Program => new ProgramDecoder(builder).program(new JsonNode(json, "$"));

class ProgramDecoder {
  readonly #b: AstBuilder;

  constructor(builder: AstBuilder) {
    this.#b = builder;
  }

  program(json: JsonNode): Program {
    json.expectKind("program");
    return this.#b.program(
      json.position,
      json.list("decls").map((decl) => this.decl(decl))
    );
  }

  decl(json: JsonNode): Decl {
    switch (json.kind) {
      case "struct-decl":
        return this.#b.struct(
          json.position,
          this.name(json, "name"),
          json.list("fields").map((field) => this.varDecl(field))
        );
      case "function-decl":
        return this.#b.fn(json.position, {
          returnTypeExpr: this.typeExpr(json.node("returnTypeExpr")),
          name: this.name(json, "name"),
          params: json.list("params").map((param) => this.param(param)),
          vars: json.list("vars").map((local) => this.varDecl(local)),
          body: this.block(json.node("body")),
        });
      default:
        throw json.unknownKind("declaration");
    }
  }

  name(json: JsonNode, key: string) {
    return this.#b.name(json.position, json.string(key));
  }

  typeExpr(json: JsonNode): TypeExpr {
    switch (json.kind) {
      case "type-name":
        return this.#b.typeName(json.position, this.name(json, "name"));
      case "array-type-name":
        return this.#b.arrayType(
          json.position,
          this.typeExpr(json.node("elemTypeExpr"))
        );
      default:
        throw json.unknownKind("type");
    }
  }

  varDecl(json: JsonNode): VarDecl {
    json.expectKind("var-decl");
    return this.#b.varDecl(
      json.position,
      this.typeExpr(json.node("typeExpr")),
      this.name(json, "name")
    );
  }

  param(json: JsonNode): Parameter {
    json.expectKind("parameter");
    return this.#b.param(
      json.position,
      this.typeExpr(json.node("typeExpr")),
      this.name(json, "name")
    );
  }

  block(json: JsonNode): Block {
    json.expectKind("block");
    return this.#b.block(
      json.position,
      json.list("statements").map((stmt) => this.statement(stmt))
    );
  }

  optionalExpr(json: JsonNode, key: string): Expression | undefined {
    const node = json.optionalNode(key);
    return node ? this.expr(node) : undefined;
  }

  statement(json: JsonNode): Statement {
    const pos = json.position;
    switch (json.kind) {
      case "if": {
        const elseBlock = json.optionalNode("elseBlock");
        return this.#b.ifStmt(
          pos,
          this.expr(json.node("test")),
          this.block(json.node("thenBlock")),
          elseBlock ? this.block(elseBlock) : undefined
        );
      }
      case "while":
        return this.#b.whileStmt(
          pos,
          this.expr(json.node("test")),
          this.block(json.node("body"))
        );
      case "for":
        return this.#b.forStmt(
          pos,
          {
            init: this.optionalExpr(json, "init"),
            test: this.optionalExpr(json, "test"),
            update: this.optionalExpr(json, "update"),
          },
          this.block(json.node("body"))
        );
      case "break":
        return this.#b.breakStmt(pos);
      case "continue":
        return this.#b.continueStmt(pos);
      case "return":
        return this.#b.returnStmt(pos, this.optionalExpr(json, "expr"));
      case "expression-statement":
        return this.#b.exprStmt(pos, this.expr(json.node("expr")));
      default:
        throw json.unknownKind("statement");
    }
  }

  expr(json: JsonNode): Expression {
    const pos = json.position;
    const args = () => json.list("args").map((arg) => this.expr(arg));
    switch (json.kind) {
      case "int-literal":
        return this.#b.int(pos, json.string("text"));
      case "float-literal":
        return this.#b.float(pos, json.string("text"));
      case "string-literal":
        return this.#b.string(pos, json.string("text"));
      case "boolean-literal":
        return this.#b.boolean(pos, this.booleanText(json));
      case "null-literal":
        return this.#b.null(pos);
      case "name-expr":
        return this.#b.nameExpr(pos, this.name(json, "name"));
      case "call":
        return this.#b.call(pos, this.name(json, "name"), args());
      case "new-object":
        return this.#b.newObject(pos, this.name(json, "name"), args());
      case "new-array":
        return this.#b.newArray(
          pos,
          this.typeExpr(json.node("elemTypeExpr")),
          args()
        );
      case "field-access":
        return this.#b.field(
          pos,
          this.expr(json.node("receiver")),
          this.name(json, "field")
        );
      case "array-index":
        return this.#b.index(
          pos,
          this.expr(json.node("receiver")),
          this.expr(json.node("index"))
        );
      case "prefix":
        return this.#b.prefix(
          pos,
          this.operator(json, prefixOperators),
          this.expr(json.node("operand"))
        );
      case "binary":
        return this.#b.binary(
          pos,
          this.operator(json, binaryOperators),
          this.expr(json.node("lhs")),
          this.expr(json.node("rhs"))
        );
      default:
        throw json.unknownKind("expression");
    }
  }

  booleanText(json: JsonNode): boolean {
    const text = json.string("text");
    if (text !== "true" && text !== "false") {
      throw new AstDecodeError(`${json.path}.text`, "expected true or false");
    }
    return text === "true";
  }

  operator<Op extends string>(json: JsonNode, operators: readonly Op[]): Op {
    const text = json.string("op");
    const op = operators.find((candidate) => candidate === text);
    if (!op) {
      throw new AstDecodeError(`${json.path}.op`, `unknown operator ${text}`);
    }
    return op;
  }
}
