export * from "./ast.js";
export * from "./token.js";
