import { describe, expect, test } from "vitest";
import { DiagnosticEmitter } from "../../diagnostics/index.js";
import { AstBuilder } from "../../syntax-objects/builder.js";
import { local, messages } from "../../__tests__/fixtures/programs.js";
import { GlobalEnv } from "../global-env.js";
import { VarEnv } from "../var-env.js";

const setup = () => {
  const diagnostics = new DiagnosticEmitter();
  return { diagnostics, env: new GlobalEnv(diagnostics), b: new AstBuilder() };
};

describe("global environment", () => {
  test("is seeded with the primitive types", () => {
    const { env } = setup();
    expect([...env.types.keys()]).toEqual([
      "int",
      "long",
      "float",
      "string",
      "boolean",
      "void",
      "null",
    ]);
  });

  test("is seeded with conversions and library functions", () => {
    const { env } = setup();
    expect(env.functions.size).toBe(27);

    const substr = env.lookupFunction(3, 1, "substr");
    expect(substr.paramTypes.map(String)).toEqual(["string", "int", "int"]);
    expect(substr.resolvedReturnType.name).toBe("string");

    const widen = env.lookupFunction(3, 1, "long_to_float");
    expect(widen.paramTypes.map(String)).toEqual(["long"]);
    expect(widen.resolvedReturnType.name).toBe("float");

    expect(env.lookupFunction(3, 1, "readline").paramTypes).toEqual([]);
    expect(env.lookupFunction(3, 1, "println").resolvedReturnType.name).toBe("void");
    expect(env.lookupFunction(3, 1, "sqrt").mangle()).toBe("UC_FUNCTION(sqrt)");
  });

  test("reports redefinitions and keeps the first entry", () => {
    const { env, diagnostics, b } = setup();
    const first = b.struct(1, "Point", []);
    const point = env.addType(1, 1, "Point", first);

    expect(env.addType(1, 7, "Point", b.struct(7, "Point", []))).toBe(point);
    expect(env.addType(1, 9, "int", b.struct(9, "int", []))).toBe(env.primitive("int"));

    const printDecl = b.fn(11, {
      returnTypeExpr: b.typeName(11, "void"),
      name: "print",
      body: b.block(11),
    });
    expect(env.addFunction(1, 11, "print", printDecl)).toBe(
      env.lookupFunction(1, 11, "print")
    );

    expect(messages(diagnostics)).toEqual([
      "Error (1) at line 7: redefinition of type Point",
      "Error (1) at line 9: redefinition of type int",
      "Error (1) at line 11: redefinition of function print",
    ]);
  });

  test("registering the same declaration again is silent", () => {
    const { env, diagnostics, b } = setup();
    const decl = b.struct(1, "Point", []);
    const point = env.addType(1, 1, "Point", decl);
    expect(env.addType(1, 1, "Point", decl)).toBe(point);
    expect(diagnostics.diagnostics).toEqual([]);
  });

  test("failed lookups report and recover", () => {
    const { env, diagnostics } = setup();
    expect(env.lookupType(2, 4, "Foo")).toBe(env.primitive("int"));
    expect(env.lookupFunction(3, 5, "foo")).toBe(
      env.lookupFunction(3, 5, "string_to_int")
    );
    expect(messages(diagnostics)).toEqual([
      "Error (2) at line 4: undefined type Foo",
      "Error (3) at line 5: undefined function foo",
    ]);
  });

  test("non-strict lookups are silent", () => {
    const { env, diagnostics } = setup();
    expect(env.lookupType(2, 4, "Foo", false)).toBeUndefined();
    expect(env.lookupFunction(3, 5, "foo", false)).toBeUndefined();
    expect(diagnostics.diagnostics).toEqual([]);
  });
});

describe("variable environment", () => {
  test("rejects a second binding of a name", () => {
    const { env, diagnostics } = setup();
    const vars = new VarEnv(env);
    const int = env.primitive("int");

    vars.addVariable(4, 2, "x", int, "parameter");
    vars.addVariable(4, 3, "x", env.primitive("string"), "variable");

    expect(vars.getType(4, 3, "x")).toBe(int);
    expect(vars.contains("x")).toBe(true);
    expect(vars.contains("y")).toBe(false);
    expect(vars.names).toEqual(["x"]);
    expect(messages(diagnostics)).toEqual([
      "Error (4) at line 3: redeclaration of variable x",
    ]);
  });

  test("unknown names recover to int", () => {
    const { env, diagnostics } = setup();
    const vars = new VarEnv(env);
    expect(vars.getType(6, 8, "y")).toBe(env.primitive("int"));
    expect(messages(diagnostics)).toEqual([
      "Error (6) at line 8: undefined variable y",
    ]);
  });

  test("binding again from the same declaration is silent", () => {
    const { env, diagnostics, b } = setup();
    const vars = new VarEnv(env);
    const decl = local(b, "int", "count");
    const int = env.primitive("int");

    vars.addVariable(4, 1, "count", int, "variable", decl);
    vars.addVariable(4, 1, "count", int, "variable", decl);
    expect(vars.names).toEqual(["count"]);
    expect(diagnostics.diagnostics).toEqual([]);
  });
});
