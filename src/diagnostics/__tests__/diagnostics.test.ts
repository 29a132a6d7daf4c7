import { describe, expect, test } from "vitest";
import {
  DiagnosticEmitter,
  diagnosticCodes,
  diagnosticFromCode,
  emitDiagnostic,
  formatDiagnostic,
} from "../index.js";

describe("diagnostics", () => {
  test("builds messages from registered codes", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0002",
      params: { kind: "function", name: "add", expected: 2, actual: 3 },
      phase: 6,
      position: 10,
    });

    expect(diagnostic).toEqual({
      code: "TY0002",
      message: "function add expected 2 argument(s), but got 3",
      phase: 6,
      position: 10,
      severity: "error",
      category: "TypeError",
    });
  });

  test("infers the category from the code prefix", () => {
    const at = { phase: 1, position: 1 };
    const redefinition = diagnosticFromCode({
      ...at,
      code: "RD0001",
      params: { kind: "type", name: "T" },
    });
    const undefinedName = diagnosticFromCode({
      ...at,
      code: "UN0001",
      params: { kind: "function", name: "f" },
    });
    const stray = diagnosticFromCode({
      ...at,
      code: "CF0001",
      params: { kind: "break" },
    });

    expect(redefinition.category).toBe("RedefinitionError");
    expect(undefinedName.category).toBe("UndefinedNameError");
    expect(stray.category).toBe("ControlFlowError");
  });

  test("formats with phase and line", () => {
    const diagnostic = diagnosticFromCode({
      code: "TY0008",
      params: { kind: "non-boolean-test", statement: "if", type: "int" },
      phase: 6,
      position: 2,
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "Error (6) at line 2: type of if test expression must be boolean, but was given int"
    );
  });

  test("the emitter collects reports in order and by phase", () => {
    const emitter = new DiagnosticEmitter();
    expect(emitter.hasErrors).toBe(false);

    emitDiagnostic({
      ctx: emitter,
      code: "UN0002",
      params: { kind: "unknown-field", typeName: "Point", field: "z" },
      phase: 6,
      position: 4,
    });
    emitDiagnostic({
      ctx: { diagnostics: emitter },
      code: "CF0001",
      params: { kind: "continue" },
      phase: 5,
      position: 9,
    });

    expect(emitter.hasErrors).toBe(true);
    expect(emitter.diagnostics.map((d) => d.code)).toEqual(["UN0002", "CF0001"]);
    expect(emitter.forPhase(5).map(formatDiagnostic)).toEqual([
      "Error (5) at line 9: continue statement must occur within a loop",
    ]);
  });

  test("every code is registered", () => {
    expect(diagnosticCodes()).toEqual([
      "RD0001",
      "RD0002",
      "UN0001",
      "UN0002",
      "CF0001",
      "TY0001",
      "TY0002",
      "TY0003",
      "TY0004",
      "TY0005",
      "TY0006",
      "TY0007",
      "TY0008",
      "TY0009",
    ]);
  });
});
