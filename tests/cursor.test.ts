import { describe, expect, it } from "vitest";
import { advance, atEnd, createCursor, current, currentPrecedence, peek } from "../src/cursor.js";
import { lex } from "../src/lexer.js";
import { tokenKindToVar, typeKeywordToVar } from "../src/type-resolver.js";

describe("token cursor", () => {
  it("walks the token stream", () => {
    const cursor = createCursor(lex("a + b"));

    expect(current(cursor).lexeme).toBe("a");
    expect(peek(cursor, 2).lexeme).toBe("b");
    advance(cursor);
    expect(current(cursor).lexeme).toBe("+");
  });

  it("does not move past the end", () => {
    const cursor = createCursor(lex("a"));

    advance(cursor);
    advance(cursor);
    advance(cursor);

    expect(cursor.index).toBe(2);
    expect(atEnd(cursor)).toBe(true);
    expect(current(cursor).type).toBe("eof");
  });

  it("looks up the precedence of the current operator", () => {
    const cursor = createCursor(lex("a = b * c && d"));
    const precedences: number[] = [];

    while (!atEnd(cursor)) {
      precedences.push(currentPrecedence(cursor));
      advance(cursor);
    }

    expect(precedences).toEqual([-1, 2, -1, 40, -1, -1, -1]);
  });

  it("treats non-positive table entries as not an operator", () => {
    const cursor = createCursor(lex("+"), { "+": 0 });

    expect(currentPrecedence(cursor)).toBe(-1);
  });

  it("reports end of input for an empty stream", () => {
    const cursor = createCursor([]);

    expect(current(cursor)).toEqual({ type: "eof", lexeme: "", position: { line: 1, column: 1, offset: 0 } });
  });
});

describe("type resolver", () => {
  it("maps every type keyword", () => {
    const names = ["i64", "i32", "i16", "i8", "float", "double", "bool", "void"];

    expect(names.map(typeKeywordToVar)).toEqual(names);
  });

  it("maps anything else to null", () => {
    expect(typeKeywordToVar("string")).toBeNull();
    expect(typeKeywordToVar("I32")).toBeNull();
  });

  it("types literal tokens", () => {
    const [int, float, bool, identifier] = lex("1 1.5 true x");

    expect(tokenKindToVar(int)).toBeNull();
    expect(tokenKindToVar(float)).toBe("double");
    expect(tokenKindToVar(bool)).toBe("bool");
    expect(tokenKindToVar(identifier)).toBeNull();
  });
});
