import { describe, expect, it } from "vitest";
import { print } from "../src/printer.js";
import { parse, withoutPositions } from "./helpers.js";

describe("print", () => {
  it("prints a declaration", () => {
    expect(print(parse("i32 x = 1 + 2 * 3;"))).toBe("i32 x = 1 + 2 * 3;\n");
  });

  it("indents function and if bodies", () => {
    const program = parse("fn f(i32 a) -> i32 { if (a < 1) { return 0; } return a; }");

    expect(print(program)).toBe(
      ["fn f(i32 a) -> i32 {", "  if (a < 1) {", "    return 0;", "  }", "  return a;", "}", ""].join("\n")
    );
  });

  it("uses the given indent", () => {
    expect(print(parse("fn f() -> void { g(); }"), { indent: "\t" })).toBe("fn f() -> void {\n\tg();\n}\n");
  });

  it("parenthesizes operands that would regroup", () => {
    expect(print(parse("a - (b - c);"))).toBe("a - (b - c);\n");
    expect(print(parse("(a - b) - c;"))).toBe("a - b - c;\n");
    expect(print(parse("(a + b) * c;"))).toBe("(a + b) * c;\n");
    expect(print(parse("y = (x = 2) + 1;"))).toBe("y = (x = 2) + 1;\n");
  });

  it("writes literals so they keep their type", () => {
    expect(print(parse("float f = 2.0;"))).toBe("float f = 2.0;\n");
    expect(print(parse("double d = 2.5;"))).toBe("double d = 2.5;\n");
    expect(print(parse("bool b = false;"))).toBe("bool b = false;\n");
    expect(print(parse("i64 n = 7;"))).toBe("i64 n = 7;\n");
  });

  it("writes very small and very large literals without exponents", () => {
    expect(print(parse("double d = 0.0000001;"))).toBe("double d = 0.0000001;\n");
    expect(print(parse("double d = 0.00000025;"))).toBe("double d = 0.00000025;\n");
    expect(print(parse("i64 n = 1000000000000000000000;"))).toBe("i64 n = 1000000000000000000000;\n");
    expect(print(parse("float f = 1000000000000000000000.0;"))).toBe("float f = 1000000000000000000000.0;\n");
  });

  it("reads extreme literals back as the same values", () => {
    const program = parse(`
      double tiny = 0.0000001;
      double small = 0.00000123;
      i64 huge = 1000000000000000000000;
      float wide = 123456789012345678901234.0;
    `);

    expect(withoutPositions(parse(print(program)))).toEqual(withoutPositions(program));
  });

  it("prints externs, imports and escaped strings", () => {
    const source = ['import "lib.keel";', "fn puts(i32 s) -> void;", 'puts("a\\"b\\n");', ""].join("\n");

    expect(print(parse(source))).toBe(source);
  });

  it("reads back as the same program", () => {
    const program = parse(`
      import "lib.keel";
      fn puts(i32 s) -> void;
      i64 big = 1 + 2;
      fn f(i32 a, double b) -> double {
        if (a + 1 < 2 * a || b >= 1.5) {
          return b * (a - 1);
        }
        i8 small = a = 3;
        return double(a) / 2.0;
      }
      f(1, 2.5);
      bool flag = true;
      puts("tab\\there");
    `);

    expect(withoutPositions(parse(print(program)))).toEqual(withoutPositions(program));
  });
});
