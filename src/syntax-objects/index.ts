export * from "./syntax.js";
export * from "./arena.js";
export * from "./declarations.js";
export * from "./expressions.js";
export * from "./statements.js";
export * from "./node.js";
export * from "./builder.js";
