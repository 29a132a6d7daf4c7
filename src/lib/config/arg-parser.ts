import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { UccConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../../package.json") as { version: string };

type CliOptions = {
  out?: string;
  codegen?: boolean;
  frontendPhase?: number;
  backendPhase?: number;
  emitTypes?: boolean;
  emitGraph?: boolean;
};

const phaseNumber =
  (last: number) =>
  (value: string): number => {
    const phase = Number(value);
    if (!Number.isInteger(phase) || phase < 1 || phase > last) {
      throw new InvalidArgumentError(`Expected a number from 1 to ${last}.`);
    }
    return phase;
  };

/** `argv` is in process.argv form: the runtime and script come first */
export const getConfigFromCli = (argv: string[] = process.argv): UccConfig => {
  const program = new Command();

  program
    .name("ucc")
    .description("uC compiler: checks a JSON AST and lowers it to C++")
    .version(version, "-v, --version", "display the current version")
    .argument("<input>", "JSON AST of the program to compile")
    .option("-o, --out <file>", "write generated code to a file")
    .option("-C, --codegen", "generate code after a clean front end")
    .option(
      "--frontend-phase <n>",
      "stop semantic analysis after phase n (1-6)",
      phaseNumber(6)
    )
    .option(
      "--backend-phase <n>",
      "emit lowering passes 1 through n (1-4)",
      phaseNumber(4)
    )
    .option("-T, --emit-types", "write the typed AST to stdout")
    .option("-G, --emit-graph", "write the AST as a Graphviz graph to stdout")
    .helpOption("-h, --help", "display help for command");

  program.parse(argv);
  const opts = program.opts<CliOptions>();
  const [input] = program.args;
  if (!input) program.error("error: missing required argument 'input'");

  return {
    input,
    out: opts.out,
    codegen: opts.codegen ?? false,
    frontendPhase: opts.frontendPhase ?? 6,
    backendPhase: opts.backendPhase ?? 4,
    emitTypes: opts.emitTypes ?? false,
    emitGraph: opts.emitGraph ?? false,
  };
};
