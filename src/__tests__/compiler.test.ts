import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { compileJson, compilePath, compileProgram } from "../compiler.js";
import { formatDiagnostic } from "../diagnostics/index.js";
import { AstBuilder } from "../syntax-objects/builder.js";
import { mainDecl } from "./fixtures/programs.js";

const fixturePath = fileURLToPath(
  new URL("./fixtures/point.ast.json", import.meta.url)
);

describe("compiler", () => {
  test("compiles a JSON AST file to C++", async () => {
    const { diagnostics, code } = await compilePath(fixturePath, { codegen: true });

    expect(diagnostics).toEqual([]);
    expect(code?.startsWith('#include "defs.h"\n')).toBe(true);
    expect(code).toContain(
      [
        "    UC_FUNCTION(main)(UC_ARRAY(UC_PRIMITIVE(string)) UC_VAR(args)) {",
        "      UC_REFERENCE(Point) UC_VAR(p);",
        "      UC_VAR(p) = uc_make_object<UC_REFERENCE(Point)>(3, 4);",
        "      if ((UC_VAR(p)->UC_VAR(x)) > (0)) {",
        "        UC_FUNCTION(println)(UC_FUNCTION(int_to_string)(UC_VAR(p)->UC_VAR(x)));",
        "      } else {",
        "      }",
        "  }",
        "",
      ].join("\n")
    );
  });

  test("analysis alone produces no code", async () => {
    const { diagnostics, code, globalEnv } = await compilePath(fixturePath);

    expect(diagnostics).toEqual([]);
    expect(code).toBeUndefined();
    expect(globalEnv.lookupType(1, 1, "Point", false)?.name).toBe("Point");
  });

  test("stopping the front end early skips code generation", async () => {
    const { code, program } = await compilePath(fixturePath, {
      codegen: true,
      frontendPhase: 3,
    });

    expect(code).toBeUndefined();
    const [point] = program.decls;
    expect(point?.syntaxType === "struct-decl" && point.localEnv).toBeUndefined();
  });

  test("diagnostics withhold code", () => {
    const b = new AstBuilder();
    const program = b.program(1, [
      mainDecl(b, { body: [b.exprStmt(2, b.call(2, "print", [b.int(2, "1")]))] }),
    ]);

    const { diagnostics, code } = compileProgram(program, { codegen: true });

    expect(code).toBeUndefined();
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "Error (6) at line 2: type int of argument is not compatible with parameter of type string",
    ]);
  });

  test("compiles an in-memory JSON AST", () => {
    const { diagnostics, code } = compileJson(
      { kind: "program", position: 1, decls: [] },
      { codegen: true, backendPhase: 1 }
    );

    expect(diagnostics).toEqual([]);
    expect(code).toContain("  // Forward type declarations\n\n\n} // namespace uc\n");
  });
});
