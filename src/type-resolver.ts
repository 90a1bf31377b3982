import { type Token, typeKeywords, type VarType } from "./types/index.js";

export const typeKeywordToVar = (name: string): VarType => {
  const match = typeKeywords.find((keyword) => keyword === name);
  return match ?? null;
};

/**
 * Integer literals carry no type of their own: they return null and pick up
 * the type of the context they are parsed in.
 */
export const tokenKindToVar = (token: Token): VarType => {
  if (token.type === "float") return "double";
  if (token.type === "bool") return "bool";
  return null;
};
