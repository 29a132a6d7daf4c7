import { describe, expect, test } from "vitest";
import { processSemantics } from "../../semantics/index.js";
import { AstBuilder } from "../../syntax-objects/builder.js";
import { graphGen } from "../graph-gen.js";
import { writeTypes } from "../write-types.js";

describe("typed tree dump", () => {
  test("writes each node with its type", () => {
    const b = new AstBuilder();
    const program = b.program(1, [
      b.fn(1, {
        returnTypeExpr: b.typeName(1, "int"),
        name: "one",
        body: b.block(1, [b.returnStmt(2, b.int(2, "1"))]),
      }),
    ]);
    processSemantics(program);

    expect(writeTypes(program)).toBe(
      [
        "program {",
        "  function-decl {",
        "    type-name: int {",
        "      name {",
        "        int",
        "      }",
        "    }",
        "    name {",
        "      one",
        "    }",
        "    block {",
        "      return {",
        "        int-literal: int {",
        "          1",
        "        }",
        "      }",
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  test("marks types that are not resolved yet", () => {
    const b = new AstBuilder();
    expect(writeTypes(b.typeName(3, "Foo"))).toBe(
      "type-name: <unresolved> {\n  name {\n    Foo\n  }\n}\n"
    );
  });
});

describe("graph dump", () => {
  test("writes a digraph with labelled edges", () => {
    const b = new AstBuilder();
    const program = b.program(1, [
      b.struct(1, "P", [b.varDecl(2, b.typeName(2, "int"), "x")]),
    ]);
    processSemantics(program);

    expect(graphGen(program)).toBe(
      [
        "digraph {",
        '  program -> {programL0 [label="[list]"]} [label="decls"]',
        '  programL0 -> {N5 [label="struct-decl (P)"]} [label="0"]',
        '  N5 -> {N4 [label="name"]} [label="name"]',
        '  N4 -> {N4T0 [label="P"]} [label="raw"]',
        '  N5 -> {N5L1 [label="[list]"]} [label="fields"]',
        '  N5L1 -> {N3 [label="var-decl"]} [label="0"]',
        '  N3 -> {N1 [label="type-name (int)"]} [label="typeExpr"]',
        '  N1 -> {N0 [label="name"]} [label="name"]',
        '  N0 -> {N0T0 [label="int"]} [label="raw"]',
        '  N3 -> {N2 [label="name"]} [label="name"]',
        '  N2 -> {N2T0 [label="x"]} [label="raw"]',
        "}",
        "",
      ].join("\n")
    );
  });

  test("escapes quotes in terminal labels", () => {
    const b = new AstBuilder();
    expect(graphGen(b.string(1, '"hi"'))).toBe(
      'digraph {\n  string-literal -> {string-literalT0 [label="\\"hi\\""]} [label="text"]\n}\n'
    );
  });
});
