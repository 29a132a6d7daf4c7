import type { PhaseContext } from "../semantics/phase-context.js";

const includes = ["defs.h", "ref.h", "array.h", "library.h", "expr.h"];

/** Runtime library includes, then opens the uc namespace */
export const genHeader = (ctx: PhaseContext): void => {
  includes.forEach((file) => ctx.print(`#include "${file}"\n`));
  ctx.print("\n", "namespace uc {\n", "\n");
};

/**
 * Closes the namespace and adds the process entry point, which passes the
 * command line arguments to the program's main as a string array.
 */
export const genFooter = (ctx: PhaseContext): void => {
  [
    "} // namespace uc",
    "",
    "int main(int argc, char **argv) {",
    "  uc::UC_ARRAY(uc::UC_PRIMITIVE(string)) args = uc::uc_make_array_of<uc::UC_PRIMITIVE(string)>();",
    "  for (int i = 1; i < argc; i++) {",
    "    uc::uc_array_push(args, uc::UC_PRIMITIVE(string)(argv[i]));",
    "  }",
    "  uc::UC_FUNCTION(main)(args);",
    "  return 0;",
    "}",
  ].forEach((line) => ctx.print(line, "\n"));
};
