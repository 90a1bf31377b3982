import type { Position, Token } from "./types/index.js";

export const ERROR_CODES = {
  LEX_UNKNOWN_CHARACTER: "LEX_UNKNOWN_CHARACTER",
  LEX_UNTERMINATED_STRING: "LEX_UNTERMINATED_STRING",
  UNEXPECTED_TOKEN: "UNEXPECTED_TOKEN",
  UNKNOWN_TYPE: "UNKNOWN_TYPE",
  MALFORMED_PROTOTYPE: "MALFORMED_PROTOTYPE",
  MALFORMED_IF: "MALFORMED_IF",
  UNKNOWN_VARIABLE: "UNKNOWN_VARIABLE",
  UNKNOWN_FUNCTION: "UNKNOWN_FUNCTION",
  ARGUMENT_COUNT: "ARGUMENT_COUNT",
  INVALID_OPERATOR: "INVALID_OPERATOR",
  INVALID_TYPE: "INVALID_TYPE",
  DUPLICATE_DEFINITION: "DUPLICATE_DEFINITION",
  IMPORT_NOT_FOUND: "IMPORT_NOT_FOUND",
  INVALID_MODULE: "INVALID_MODULE",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type ParseErrorCode =
  | typeof ERROR_CODES.UNEXPECTED_TOKEN
  | typeof ERROR_CODES.UNKNOWN_TYPE
  | typeof ERROR_CODES.MALFORMED_PROTOTYPE
  | typeof ERROR_CODES.MALFORMED_IF;

/**
 * Base class of every error the compiler throws.
 * message carries a " at line:column" suffix when the position is known,
 * detail holds the message without it.
 */
export class KeelError extends Error {
  readonly code: ErrorCode;
  readonly detail: string;
  readonly position?: Position;

  constructor(code: ErrorCode, detail: string, position?: Position) {
    super(position ? `${detail} at ${position.line}:${position.column}` : detail);
    this.name = "KeelError";
    this.code = code;
    this.detail = detail;
    this.position = position;
  }
}

export class LexError extends KeelError {
  constructor(code: ErrorCode, detail: string, position: Position) {
    super(code, detail, position);
    this.name = "LexError";
  }
}

export class ParseError extends KeelError {
  readonly token: Token;

  constructor(code: ParseErrorCode, detail: string, token: Token) {
    super(code, detail, token.position);
    this.name = "ParseError";
    this.token = token;
  }
}

export class CompileError extends KeelError {
  constructor(code: ErrorCode, detail: string, position?: Position) {
    super(code, detail, position);
    this.name = "CompileError";
  }
}
