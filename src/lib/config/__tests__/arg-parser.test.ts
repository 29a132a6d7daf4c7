import { describe, expect, test } from "vitest";
import { getConfigFromCli } from "../arg-parser.js";

describe("command line config", () => {
  test("defaults to a full front end without code generation", () => {
    expect(getConfigFromCli(["node", "ucc", "prog.json"])).toEqual({
      input: "prog.json",
      out: undefined,
      codegen: false,
      frontendPhase: 6,
      backendPhase: 4,
      emitTypes: false,
      emitGraph: false,
    });
  });

  test("reads every option", () => {
    const config = getConfigFromCli([
      "node",
      "ucc",
      "-C",
      "--frontend-phase",
      "6",
      "--backend-phase",
      "2",
      "-o",
      "prog.cpp",
      "-T",
      "-G",
      "prog.json",
    ]);

    expect(config).toEqual({
      input: "prog.json",
      out: "prog.cpp",
      codegen: true,
      frontendPhase: 6,
      backendPhase: 2,
      emitTypes: true,
      emitGraph: true,
    });
  });

  test("long flags match the short ones", () => {
    const config = getConfigFromCli([
      "node",
      "ucc",
      "prog.json",
      "--codegen",
      "--emit-types",
      "--out",
      "a.cpp",
      "--frontend-phase",
      "3",
    ]);

    expect(config.codegen).toBe(true);
    expect(config.emitTypes).toBe(true);
    expect(config.emitGraph).toBe(false);
    expect(config.out).toBe("a.cpp");
    expect(config.frontendPhase).toBe(3);
  });
});
