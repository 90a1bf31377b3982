import { ERROR_CODES, LexError } from "./errors.js";
import {
  type Keyword,
  keywords,
  type Operator,
  type Position,
  type Punctuation,
  type Token,
  type TypeKeyword,
  typeKeywords,
} from "./types/index.js";

interface LexerState {
  chars: string[];
  line: number;
  column: number;
  offset: number;
}

export const lex = (input: string): Token[] => {
  const state: LexerState = { chars: input.split(""), line: 1, column: 1, offset: 0 };
  const tokens: Token[] = [];

  while (state.chars.length) {
    skipWhitespaceAndComments(state);
    if (!state.chars.length) break;
    tokens.push(consumeToken(state));
  }

  tokens.push({ type: "eof", lexeme: "", position: positionOf(state) });
  return tokens;
};

const consumeToken = (state: LexerState): Token => {
  const position = positionOf(state);
  const char = state.chars[0];

  if (char === '"') return consumeString(state, position);

  if (isDigit(char)) {
    const word = consumeWhile(state, (c) => isDigit(c) || c === ".");
    return identifyNumber(word, position);
  }

  if (isIdentifierStart(char)) {
    const word = consumeWhile(state, isIdentifierPart);
    return identifyWord(word, position);
  }

  // Longest match first so that "<=" is not read as "<" followed by "="
  const pair = state.chars.slice(0, 2).join("");
  if (pair.length === 2 && (isOperator(pair) || isPunctuation(pair))) {
    advance(state, 2);
    return symbolToken(pair, position);
  }

  if (isOperator(char) || isPunctuation(char)) {
    advance(state, 1);
    return symbolToken(char, position);
  }

  throw new LexError(ERROR_CODES.LEX_UNKNOWN_CHARACTER, `Unknown character: ${char}`, position);
};

const identifyNumber = (word: string, position: Position): Token => {
  if (isInt(word)) return { type: "int", value: parseInt(word, 10), lexeme: word, position };
  if (isFloat(word)) return { type: "float", value: parseFloat(word), lexeme: word, position };
  throw new LexError(ERROR_CODES.LEX_UNKNOWN_CHARACTER, `Malformed number: ${word}`, position);
};

const identifyWord = (word: string, position: Position): Token => {
  if (isTypeKeyword(word)) return { type: "type-keyword", value: word, lexeme: word, position };
  if (isKeyword(word)) return { type: "keyword", value: word, lexeme: word, position };
  if (word === "true" || word === "false") {
    return { type: "bool", value: word === "true", lexeme: word, position };
  }
  return { type: "identifier", value: word, lexeme: word, position };
};

const symbolToken = (symbol: Operator | Punctuation, position: Position): Token => {
  if (isPunctuation(symbol)) return { type: "punctuation", value: symbol, lexeme: symbol, position };
  return { type: "operator", value: symbol, lexeme: symbol, position };
};

const consumeString = (state: LexerState, position: Position): Token => {
  const raw: string[] = ['"'];
  const value: string[] = [];
  advance(state, 1); // Opening quote

  while (state.chars.length) {
    const char = state.chars[0];

    if (char === '"') {
      raw.push(char);
      advance(state, 1);
      return { type: "string", value: value.join(""), lexeme: raw.join(""), position };
    }

    if (char === "\n") break;

    if (char === "\\") {
      const escaped = state.chars[1];
      const replacement = escaped === undefined ? undefined : escapes[escaped];
      if (replacement === undefined) {
        throw new LexError(
          ERROR_CODES.LEX_UNKNOWN_CHARACTER,
          `Unknown escape sequence: \\${escaped ?? ""}`,
          positionOf(state)
        );
      }
      raw.push(char, escaped);
      value.push(replacement);
      advance(state, 2);
      continue;
    }

    raw.push(char);
    value.push(char);
    advance(state, 1);
  }

  throw new LexError(ERROR_CODES.LEX_UNTERMINATED_STRING, "Unterminated string", position);
};

const escapes: Record<string, string | undefined> = {
  n: "\n",
  t: "\t",
  '"': '"',
  "\\": "\\",
};

const skipWhitespaceAndComments = (state: LexerState) => {
  while (state.chars.length) {
    const char = state.chars[0];

    if (isWhitespace(char)) {
      advance(state, 1);
      continue;
    }

    // Line comments run to the end of the line
    if (char === "/" && state.chars[1] === "/") {
      consumeWhile(state, (c) => c !== "\n");
      continue;
    }

    break;
  }
};

const consumeWhile = (state: LexerState, predicate: (char: string) => boolean): string => {
  const word: string[] = [];
  while (state.chars.length && predicate(state.chars[0])) {
    word.push(state.chars[0]);
    advance(state, 1);
  }
  return word.join("");
};

const advance = (state: LexerState, count: number) => {
  for (let i = 0; i < count && state.chars.length; i++) {
    const char = state.chars.shift();
    state.offset += 1;
    if (char === "\n") {
      state.line += 1;
      state.column = 1;
    } else {
      state.column += 1;
    }
  }
};

const positionOf = (state: LexerState): Position => ({
  line: state.line,
  column: state.column,
  offset: state.offset,
});

const operators: ReadonlyArray<string> = [
  "=",
  "+",
  "-",
  "*",
  "/",
  "<",
  ">",
  "<=",
  ">=",
  "==",
  "!=",
  "&&",
  "||",
];

const punctuation: ReadonlyArray<string> = ["(", ")", "{", "}", ",", ";", "->"];

const isInt = (word: string) => /^[0-9]+$/.test(word);

const isFloat = (word: string) => /^[0-9]+\.[0-9]+$/.test(word);

const isDigit = (char: string) => /^[0-9]$/.test(char);

const isIdentifierStart = (char: string) => /^[a-zA-Z_]$/.test(char);

const isIdentifierPart = (char: string) => /^[a-zA-Z0-9_]$/.test(char);

const isKeyword = (word: string): word is Keyword => keywords.some((keyword) => keyword === word);

const isTypeKeyword = (word: string): word is TypeKeyword =>
  typeKeywords.some((keyword) => keyword === word);

const isOperator = (word: string): word is Operator => operators.includes(word);

const isPunctuation = (word: string): word is Punctuation => punctuation.includes(word);

const isWhitespace = (char: string) =>
  char === " " || char === "\n" || char === "\t" || char === "\r";
