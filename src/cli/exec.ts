import { writeFile } from "node:fs/promises";
import { stdout } from "process";
import { compilePath } from "../compiler.js";
import { formatDiagnostic } from "../diagnostics/index.js";
import { getConfig } from "../lib/config/index.js";
import { graphGen } from "../tools/graph-gen.js";
import { writeTypes } from "../tools/write-types.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const result = await compilePath(config.input, {
    frontendPhase: config.frontendPhase,
    backendPhase: config.backendPhase,
    codegen: config.codegen,
  });

  if (config.emitTypes) stdout.write(writeTypes(result.program));
  if (config.emitGraph) stdout.write(graphGen(result.program));

  result.diagnostics.forEach((diagnostic) =>
    console.error(formatDiagnostic(diagnostic))
  );
  if (result.diagnostics.length) process.exitCode = 1;

  if (result.code === undefined) return;
  if (config.out) {
    await writeFile(config.out, result.code);
    return;
  }
  stdout.write(result.code);
}

function errorHandler(error: Error) {
  console.error(error);
  process.exit(1);
}
