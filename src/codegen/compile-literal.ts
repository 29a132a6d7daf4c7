import type { Literal } from "../syntax-objects/expressions.js";

/** Literals print as written. Strings gain the `s` suffix that makes them std::string. */
export const compile = (literal: Literal): string => {
  switch (literal.syntaxType) {
    case "string-literal":
      return `${literal.text}s`;
    case "null-literal":
      return "nullptr";
    default:
      return literal.text;
  }
};
