export const typeKeywords = ["i64", "i32", "i16", "i8", "float", "double", "bool", "void"] as const;

export type TypeKeyword = (typeof typeKeywords)[number];

export const keywords = ["fn", "return", "if", "import"] as const;

export type Keyword = (typeof keywords)[number];

export type Punctuation = "(" | ")" | "{" | "}" | "," | ";" | "->";

export const comparisonOperators = ["<", ">", "<=", ">=", "==", "!="] as const;

export type ComparisonOperator = (typeof comparisonOperators)[number];

export type LogicalOperator = "&&" | "||";

export type Operator = "=" | "+" | "-" | "*" | "/" | ComparisonOperator | LogicalOperator;

/** 1-based line and column, 0-based character offset */
export type Position = { line: number; column: number; offset: number };

type TokenBase = { lexeme: string; position: Position };

/** A whole number with no type annotation. Its type comes from the surrounding context */
export type IntToken = TokenBase & { type: "int"; value: number };

/** A number with a fractional part */
export type FloatToken = TokenBase & { type: "float"; value: number };

/** `true` or `false` */
export type BoolToken = TokenBase & { type: "bool"; value: boolean };

/** A double quoted string literal, value holds the unescaped text */
export type StringToken = TokenBase & { type: "string"; value: string };

export type IdentifierToken = TokenBase & { type: "identifier"; value: string };

/** One of the primitive type names, i.e. i32 or double */
export type TypeKeywordToken = TokenBase & { type: "type-keyword"; value: TypeKeyword };

export type KeywordToken = TokenBase & { type: "keyword"; value: Keyword };

export type PunctuationToken = TokenBase & { type: "punctuation"; value: Punctuation };

export type OperatorToken = TokenBase & { type: "operator"; value: Operator };

/** Always the last token the lexer produces */
export type EofToken = TokenBase & { type: "eof" };

export type Token =
  | IntToken
  | FloatToken
  | BoolToken
  | StringToken
  | IdentifierToken
  | TypeKeywordToken
  | KeywordToken
  | PunctuationToken
  | OperatorToken
  | EofToken;

export type TokenType = Token["type"];
