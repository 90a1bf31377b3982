import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { main, parseArgs, USAGE } from "../src/cli.js";

describe("parseArgs", () => {
  it("defaults to printing text", () => {
    expect(parseArgs(["main.keel"])).toEqual({
      mode: "compile",
      file: "main.keel",
      emit: "wat",
      optimize: false,
      dumpTokens: false,
      dumpAst: false,
    });
  });

  it("reads every option", () => {
    const args = parseArgs(["a.keel", "--emit", "wasm", "--out", "out.wasm", "--optimize", "--tokens", "--ast"]);

    expect(args).toEqual({
      mode: "compile",
      file: "a.keel",
      emit: "wasm",
      out: "out.wasm",
      optimize: true,
      dumpTokens: true,
      dumpAst: true,
    });
  });

  it("asks for help", () => {
    expect(parseArgs(["--help"])).toEqual({ mode: "help" });
    expect(parseArgs(["main.keel", "-h"])).toEqual({ mode: "help" });
  });

  it("rejects bad arguments", () => {
    expect(() => parseArgs(["--emit", "exe", "a.keel"])).toThrow("Invalid --emit value: exe");
    expect(() => parseArgs(["a.keel", "--out"])).toThrow("Missing value for --out");
    expect(() => parseArgs(["a.keel", "b.keel"])).toThrow("Unexpected argument: b.keel");
    expect(() => parseArgs(["--verbose", "a.keel"])).toThrow("Unknown option: --verbose");
    expect(() => parseArgs([])).toThrow("Missing file argument");
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "keelc-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, source: string) => {
    const path = join(dir, name);
    writeFileSync(path, source);
    return path;
  };

  it("exits with 2 on a usage error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(main([])).toBe(2);
    expect(error).toHaveBeenCalledWith("Missing file argument");
  });

  it("prints usage", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(main(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it("prints the text format", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const file = write("add.keel", "fn add(i32 a, i32 b) -> i32 { return a + b; }");

    expect(main([file])).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('(export "add"'));
  });

  it("writes a binary next to the source", () => {
    const file = write("one.keel", "fn one() -> i32 { return 1; }");

    expect(main([file, "--emit", "wasm"])).toBe(0);

    const output = join(dir, "one.wasm");
    expect(existsSync(output)).toBe(true);
    expect([...readFileSync(output).subarray(0, 4)]).toEqual([0, 97, 115, 109]);
  });

  it("exits with 1 on a compile error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const file = write("bad.keel", "fn f() -> i32 { return y; }");

    expect(main([file])).toBe(1);
    expect(error).toHaveBeenCalledWith("Unrecognized identifier y at 1:24");
  });
});
