import { describe, expect, it } from "vitest";
import { LexError } from "../src/errors.js";
import { lex } from "../src/lexer.js";

describe("lex", () => {
  it("splits a function declaration into tokens", () => {
    const tokens = lex("fn add(i32 a) -> i32 { return a <= 10; }");

    expect(tokens.map((token) => [token.type, token.lexeme])).toEqual([
      ["keyword", "fn"],
      ["identifier", "add"],
      ["punctuation", "("],
      ["type-keyword", "i32"],
      ["identifier", "a"],
      ["punctuation", ")"],
      ["punctuation", "->"],
      ["type-keyword", "i32"],
      ["punctuation", "{"],
      ["keyword", "return"],
      ["identifier", "a"],
      ["operator", "<="],
      ["int", "10"],
      ["punctuation", ";"],
      ["punctuation", "}"],
      ["eof", ""],
    ]);
  });

  it("reads literal values", () => {
    const [int, float, yes, no] = lex("42 3.25 true false");

    expect(int).toMatchObject({ type: "int", value: 42 });
    expect(float).toMatchObject({ type: "float", value: 3.25 });
    expect(yes).toMatchObject({ type: "bool", value: true });
    expect(no).toMatchObject({ type: "bool", value: false });
  });

  it("unescapes strings and keeps the raw lexeme", () => {
    const [token] = lex('"a\\"b\\n"');

    expect(token).toMatchObject({ type: "string", value: 'a"b\n', lexeme: '"a\\"b\\n"' });
  });

  it("tracks line, column and offset", () => {
    const tokens = lex("i32 x\n  = 1;");

    expect(tokens[2]).toMatchObject({ lexeme: "=", position: { line: 2, column: 3, offset: 8 } });
  });

  it("separates operators that share a first character", () => {
    const tokens = lex("a=b==c->d-e");

    expect(tokens.map((token) => token.lexeme)).toEqual([
      "a", "=", "b", "==", "c", "->", "d", "-", "e", "",
    ]);
  });

  it("skips line comments", () => {
    const tokens = lex("// header\ni32 x = 1; // trailing\n");

    expect(tokens.map((token) => token.lexeme)).toEqual(["i32", "x", "=", "1", ";", ""]);
  });

  it("ends with a single eof token", () => {
    const tokens = lex("   ");

    expect(tokens).toEqual([{ type: "eof", lexeme: "", position: { line: 1, column: 4, offset: 3 } }]);
  });

  it("rejects unterminated strings", () => {
    expect(() => lex('"open')).toThrow(LexError);
    expect(() => lex('"open')).toThrow("Unterminated string at 1:1");
  });

  it("rejects unknown characters", () => {
    try {
      lex("i32 x = @;");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LexError);
      expect(error).toMatchObject({ code: "LEX_UNKNOWN_CHARACTER", position: { line: 1, column: 9 } });
    }
  });
});
