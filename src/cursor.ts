import { ERROR_CODES, ParseError, type ParseErrorCode } from "./errors.js";
import type { Punctuation, Token, TokenType } from "./types/index.js";

/** Operator lexeme, binding power. Higher binds tighter */
export type PrecedenceTable = Readonly<Record<string, number>>;

export const defaultPrecedence: PrecedenceTable = {
  "=": 2,
  "<": 10,
  ">": 10,
  "<=": 10,
  ">=": 10,
  "==": 10,
  "!=": 10,
  "+": 20,
  "-": 20,
  "*": 40,
  "/": 40,
};

/**
 * Position of one parse over its token stream. Every parse gets its own
 * cursor, the precedence table is shared and never written to.
 */
export interface TokenCursor {
  readonly tokens: readonly Token[];
  index: number;
  readonly precedence: ReadonlyMap<string, number>;
}

export const createCursor = (
  tokens: readonly Token[],
  precedence: PrecedenceTable = defaultPrecedence
): TokenCursor => ({
  tokens,
  index: 0,
  precedence: new Map(Object.entries(precedence)),
});

export const current = (cursor: TokenCursor): Token => peek(cursor, 0);

export const peek = (cursor: TokenCursor, offset: number): Token => {
  const token = cursor.tokens[cursor.index + offset];
  if (token) return token;
  return endOfInput(cursor);
};

export const advance = (cursor: TokenCursor): Token => {
  const token = current(cursor);
  if (cursor.index < cursor.tokens.length) cursor.index += 1;
  return token;
};

export const atEnd = (cursor: TokenCursor): boolean => current(cursor).type === "eof";

/** -1 when the current token is not a binary operator */
export const currentPrecedence = (cursor: TokenCursor): number => {
  const precedence = cursor.precedence.get(current(cursor).lexeme);
  if (precedence === undefined || precedence <= 0) return -1;
  return precedence;
};

export const isTokenType = <T extends TokenType>(
  token: Token,
  type: T
): token is Extract<Token, { type: T }> => token.type === type;

export const isPunctuation = (token: Token, value: Punctuation): boolean =>
  token.type === "punctuation" && token.value === value;

export const isOperator = (token: Token, value: string): boolean =>
  token.type === "operator" && token.value === value;

/** Consumes the current token if it is the given punctuation, throws otherwise */
export const expectPunctuation = (
  cursor: TokenCursor,
  value: Punctuation,
  code: ParseErrorCode = ERROR_CODES.UNEXPECTED_TOKEN
): Token => {
  const token = current(cursor);
  if (!isPunctuation(token, value)) throw unexpected(token, `'${value}'`, code);
  return advance(cursor);
};

export const expectType = <T extends TokenType>(
  cursor: TokenCursor,
  type: T,
  code: ParseErrorCode = ERROR_CODES.UNEXPECTED_TOKEN
): Extract<Token, { type: T }> => {
  const token = current(cursor);
  if (!isTokenType(token, type)) throw unexpected(token, type, code);
  advance(cursor);
  return token;
};

export const unexpected = (
  token: Token,
  expected: string,
  code: ParseErrorCode = ERROR_CODES.UNEXPECTED_TOKEN
): ParseError => new ParseError(code, `Expected ${expected}, got ${describe(token)}`, token);

export const describe = (token: Token): string => {
  if (token.type === "eof") return "end of input";
  return `'${token.lexeme}'`;
};

const endOfInput = (cursor: TokenCursor): Token => {
  const last = cursor.tokens[cursor.tokens.length - 1];
  const position = last ? last.position : { line: 1, column: 1, offset: 0 };
  return { type: "eof", lexeme: "", position };
};
