import { describe, expect, test } from "vitest";
import { generateCode } from "../../codegen.js";
import { compileProgram } from "../../compiler.js";
import { AstBuilder } from "../../syntax-objects/builder.js";
import type { Decl } from "../../syntax-objects/declarations.js";
import type { Expression } from "../../syntax-objects/expressions.js";
import {
  local,
  mainDecl,
  pointDecl,
} from "../../__tests__/fixtures/programs.js";

const lines = (...text: string[]) => text.map((line) => `${line}\n`).join("");

const header = lines(
  '#include "defs.h"',
  '#include "ref.h"',
  '#include "array.h"',
  '#include "library.h"',
  '#include "expr.h"',
  "",
  "namespace uc {",
  ""
);

const footer = lines(
  "} // namespace uc",
  "",
  "int main(int argc, char **argv) {",
  "  uc::UC_ARRAY(uc::UC_PRIMITIVE(string)) args = uc::uc_make_array_of<uc::UC_PRIMITIVE(string)>();",
  "  for (int i = 1; i < argc; i++) {",
  "    uc::uc_array_push(args, uc::UC_PRIMITIVE(string)(argv[i]));",
  "  }",
  "  uc::UC_FUNCTION(main)(args);",
  "  return 0;",
  "}"
);

const compile = (decls: Decl[], backendPhase?: number) => {
  const b = new AstBuilder();
  const result = compileProgram(b.program(1, decls), { codegen: true, backendPhase });
  expect(result.diagnostics).toEqual([]);
  return result.code ?? "";
};

/** Text of the last pass, up to the footer */
const functionDefinitions = (code: string) =>
  code.slice(
    code.indexOf("  // Full function definitions"),
    code.indexOf("} // namespace uc")
  );

describe("code generation", () => {
  test("lowers a struct and an empty main", () => {
    const b = new AstBuilder();
    const code = compileProgram(b.program(1, [pointDecl(b), mainDecl(b)]), {
      codegen: true,
    }).code;

    expect(code).toBe(
      header +
        lines(
          "  // Forward type declarations",
          "",
          "  struct UC_TYPEDEF(Point);",
          "",
          "  // Forward function declarations",
          "",
          "  UC_PRIMITIVE(void)",
          "    UC_FUNCTION(main)(UC_ARRAY(UC_PRIMITIVE(string)) UC_VAR(args));",
          "",
          "  // Full type definitions",
          "",
          "  struct UC_TYPEDEF(Point) {",
          "    UC_PRIMITIVE(int) UC_VAR(x);",
          "    UC_PRIMITIVE(int) UC_VAR(y);",
          "    UC_TYPEDEF(Point)() = default;",
          "    UC_TYPEDEF(Point)(const UC_PRIMITIVE(int) &var0, const UC_PRIMITIVE(int) &var1) {",
          "      UC_VAR(x) = var0;",
          "      UC_VAR(y) = var1;",
          "    }",
          "    UC_PRIMITIVE(boolean) operator==(const UC_TYPEDEF(Point) &rhs) const {",
          "      return UC_VAR(x) == rhs.UC_VAR(x) && UC_VAR(y) == rhs.UC_VAR(y);",
          "    }",
          "    UC_PRIMITIVE(boolean) operator!=(const UC_TYPEDEF(Point) &rhs) const {",
          "      return !((*this)==rhs);",
          "    }",
          "  };",
          "",
          "  // Full function definitions",
          "",
          "  UC_PRIMITIVE(void)",
          "    UC_FUNCTION(main)(UC_ARRAY(UC_PRIMITIVE(string)) UC_VAR(args)) {",
          "  }"
        ) +
        footer
    );
  });

  test("stops after the requested pass", () => {
    const b = new AstBuilder();
    const add = b.fn(1, {
      returnTypeExpr: b.typeName(1, "int"),
      name: "add",
      params: [
        b.param(1, b.typeName(1, "int"), "a"),
        b.param(1, b.typeName(1, "long"), "b"),
      ],
      body: b.block(1, [b.returnStmt(2, b.int(2, "0"))]),
    });

    expect(compile([add], 2)).toBe(
      header +
        lines(
          "  // Forward type declarations",
          "",
          "",
          "  // Forward function declarations",
          "",
          "  UC_PRIMITIVE(int)",
          "    UC_FUNCTION(add)(UC_PRIMITIVE(int) UC_VAR(a),UC_PRIMITIVE(long) UC_VAR(b));",
          ""
        ) +
        footer
    );
  });

  test("a struct without fields compares equal", () => {
    const b = new AstBuilder();
    const code = compile([b.struct(1, "Empty", [])], 3);

    expect(code.slice(code.indexOf("  // Full type definitions"))).toBe(
      lines(
        "  // Full type definitions",
        "",
        "  struct UC_TYPEDEF(Empty) {",
        "    UC_TYPEDEF(Empty)() = default;",
        "    UC_PRIMITIVE(boolean) operator==(const UC_TYPEDEF(Empty) &rhs) const {",
        "      return true;",
        "    }",
        "    UC_PRIMITIVE(boolean) operator!=(const UC_TYPEDEF(Empty) &rhs) const {",
        "      return !((*this)==rhs);",
        "    }",
        "  };",
        ""
      ) + footer
    );
  });

  test("lowers statements", () => {
    const b = new AstBuilder();
    const name = (id: string) => b.nameExpr(2, id);
    const sum = b.fn(1, {
      returnTypeExpr: b.typeName(1, "int"),
      name: "sum",
      params: [b.param(1, b.arrayType(1, b.typeName(1, "int")), "xs")],
      vars: [local(b, "int", "i"), local(b, "int", "total")],
      body: b.block(1, [
        b.exprStmt(2, b.binary(2, "=", name("total"), b.int(2, "0"))),
        b.forStmt(
          3,
          {
            init: b.binary(3, "=", name("i"), b.int(3, "0")),
            test: b.binary(3, "<", name("i"), b.field(3, name("xs"), "length")),
            update: b.prefix(3, "++", name("i")),
          },
          b.block(3, [
            b.exprStmt(
              4,
              b.binary(
                4,
                "=",
                name("total"),
                b.binary(4, "+", name("total"), b.index(4, name("xs"), name("i")))
              )
            ),
          ])
        ),
        b.ifStmt(
          6,
          b.binary(6, ">", name("total"), b.int(6, "10")),
          b.block(6, [b.exprStmt(7, b.call(7, "println", [b.string(7, '"big"')]))])
        ),
        b.whileStmt(9, b.boolean(9, true), b.block(9, [b.breakStmt(10)])),
        b.forStmt(11, {}, b.block(11, [b.continueStmt(12)])),
        b.returnStmt(13, name("total")),
      ]),
    });

    expect(functionDefinitions(compile([sum]))).toBe(
      lines(
        "  // Full function definitions",
        "",
        "  UC_PRIMITIVE(int)",
        "    UC_FUNCTION(sum)(UC_ARRAY(UC_PRIMITIVE(int)) UC_VAR(xs)) {",
        "      UC_PRIMITIVE(int) UC_VAR(i);",
        "      UC_PRIMITIVE(int) UC_VAR(total);",
        "      UC_VAR(total) = 0;",
        "      for (UC_VAR(i) = 0; (UC_VAR(i)) < (uc_length_field(UC_VAR(xs))); ++(UC_VAR(i))) {",
        "        UC_VAR(total) = uc_add(UC_VAR(total), uc_array_index(UC_VAR(xs), UC_VAR(i)));",
        "      }",
        "      if ((UC_VAR(total)) > (10)) {",
        '        UC_FUNCTION(println)("big"s);',
        "      } else {",
        "      }",
        "      while (true) {",
        "        break;",
        "      }",
        "      for (; ; ) {",
        "        continue;",
        "      }",
        "      return UC_VAR(total);",
        "  }"
      )
    );
  });

  test("lowers allocations, members and operators", () => {
    const b = new AstBuilder();
    const name = (id: string) => b.nameExpr(2, id);
    const assign = (lhs: string, rhs: Expression) =>
      b.exprStmt(2, b.binary(2, "=", name(lhs), rhs));
    const demo = b.fn(5, {
      returnTypeExpr: b.typeName(5, "void"),
      name: "demo",
      params: [b.param(5, b.typeName(5, "Point"), "p")],
      vars: [
        local(b, "Point", "q"),
        local(b, "int[]", "a"),
        local(b, "long", "id"),
        local(b, "int", "n"),
        local(b, "boolean", "ok"),
      ],
      body: b.block(5, [
        assign("q", b.newObject(2, "Point", [b.int(2, "1"), b.int(2, "2")])),
        assign("a", b.newArray(2, b.typeName(2, "int"), [b.int(2, "3"), b.int(2, "4")])),
        assign("n", b.prefix(2, "-", b.field(2, name("p"), "x"))),
        assign("id", b.prefix(2, "#", name("q"))),
        b.exprStmt(2, b.binary(2, "<<", name("a"), name("n"))),
        b.exprStmt(2, b.binary(2, ">>", name("a"), b.null(2))),
        assign(
          "ok",
          b.binary(
            2,
            "&&",
            b.binary(2, "==", name("p"), name("q")),
            b.prefix(2, "!", name("ok"))
          )
        ),
        assign("id", b.int(2, "5L")),
        assign("q", b.null(2)),
        b.returnStmt(3),
      ]),
    });

    expect(functionDefinitions(compile([pointDecl(b), demo]))).toBe(
      lines(
        "  // Full function definitions",
        "",
        "  UC_PRIMITIVE(void)",
        "    UC_FUNCTION(demo)(UC_REFERENCE(Point) UC_VAR(p)) {",
        "      UC_REFERENCE(Point) UC_VAR(q);",
        "      UC_ARRAY(UC_PRIMITIVE(int)) UC_VAR(a);",
        "      UC_PRIMITIVE(long) UC_VAR(id);",
        "      UC_PRIMITIVE(int) UC_VAR(n);",
        "      UC_PRIMITIVE(boolean) UC_VAR(ok);",
        "      UC_VAR(q) = uc_make_object<UC_REFERENCE(Point)>(1, 2);",
        "      UC_VAR(a) = uc_make_array_of<UC_PRIMITIVE(int)>(3, 4);",
        "      UC_VAR(n) = -(UC_VAR(p)->UC_VAR(x));",
        "      UC_VAR(id) = uc_id(UC_VAR(q));",
        "      uc_array_push(UC_VAR(a), UC_VAR(n));",
        "      uc_array_pop(UC_VAR(a), nullptr);",
        "      UC_VAR(ok) = ((UC_VAR(p)) == (UC_VAR(q))) && (!(UC_VAR(ok)));",
        "      UC_VAR(id) = 5L;",
        "      UC_VAR(q) = nullptr;",
        "      return ;",
        "  }"
      )
    );
  });

  test("a struct field named length is an ordinary member", () => {
    const b = new AstBuilder();
    const rope = b.struct(1, "Rope", [local(b, "int", "length", 2)]);
    const measure = b.fn(4, {
      returnTypeExpr: b.typeName(4, "int"),
      name: "measure",
      params: [b.param(4, b.typeName(4, "Rope"), "r")],
      body: b.block(4, [b.returnStmt(5, b.field(5, b.nameExpr(5, "r"), "length"))]),
    });

    expect(functionDefinitions(compile([rope, measure]))).toContain(
      "      return UC_VAR(r)->UC_VAR(length);\n"
    );
  });

  test("code is withheld when analysis reports errors", () => {
    const b = new AstBuilder();
    const program = b.program(1, [mainDecl(b, { body: [b.breakStmt(2)] })]);

    const result = compileProgram(program, { codegen: true });
    expect(result.code).toBeUndefined();
    expect(result.diagnostics).toHaveLength(1);

    // The lowering itself still handles the stray break
    expect(functionDefinitions(generateCode(program, result.globalEnv))).toContain(
      "    UC_FUNCTION(main)(UC_ARRAY(UC_PRIMITIVE(string)) UC_VAR(args)) {\n      break;\n  }\n"
    );
  });
});
