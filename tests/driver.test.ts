import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, posix } from "path";
import { describe, expect, it } from "vitest";
import { collectImports, compileFile, link, type SourceHost } from "../src/driver.js";
import { CompileError } from "../src/errors.js";
import type { Program } from "../src/types/index.js";
import { exported, parse } from "./helpers.js";

const memoryHost = (files: Record<string, string>): SourceHost => ({
  resolve: (from, path) => posix.join(posix.dirname(from), path),
  canonical: (path) => posix.normalize(path),
  read: (path) => {
    const source = files[path];
    if (source === undefined) throw new Error(`No such file ${path}`);
    return source;
  },
});

const functionNames = (program: Program) =>
  program.flatMap((node) => (node.type === "function" ? [node.prototype.name] : []));

describe("driver", () => {
  const files = {
    "main.keel": 'import "lib/math.keel";\nfn run(i32 x) -> i32 { return inc(square(x)); }',
    "lib/math.keel": 'import "util.keel";\nfn square(i32 x) -> i32 { return x * x; }',
    "lib/util.keel": 'import "math.keel";\nfn inc(i32 x) -> i32 { return x + 1; }',
  };

  it("places imported files before their importers", () => {
    const program = link(files["main.keel"], "main.keel", { host: memoryHost(files) });

    expect(functionNames(program)).toEqual(["inc", "square", "run"]);
  });

  it("includes a file imported twice once", () => {
    const diamond = {
      "main.keel": 'import "a.keel";\nimport "b.keel";\nfn m() -> i32 { return a() + b(); }',
      "a.keel": 'import "shared.keel";\nfn a() -> i32 { return s(); }',
      "b.keel": 'import "shared.keel";\nfn b() -> i32 { return s(); }',
      "shared.keel": "fn s() -> i32 { return 1; }",
    };

    const program = link(diamond["main.keel"], "main.keel", { host: memoryHost(diamond) });

    expect(functionNames(program)).toEqual(["s", "a", "b", "m"]);
  });

  it("compiles a file with its imports", () => {
    const { module } = compileFile("main.keel", { host: memoryHost(files) });
    const binary = new Uint8Array(module.emitBinary());
    module.dispose();

    const instance = new WebAssembly.Instance(new WebAssembly.Module(binary));
    expect(exported(instance, "run")(3)).toBe(10);
  });

  it("does not include the entry file again when an import leads back to it", () => {
    const cycle = {
      "a.keel": 'import "b.keel";\nfn a() -> i32 { return b(); }',
      "b.keel": 'import "a.keel";\nfn b() -> i32 { return 1; }',
    };
    const host = memoryHost(cycle);

    expect(functionNames(link(cycle["a.keel"], "./a.keel", { host }))).toEqual(["b", "a"]);

    const { module } = compileFile("./a.keel", { host });
    const binary = new Uint8Array(module.emitBinary());
    module.dispose();

    const instance = new WebAssembly.Instance(new WebAssembly.Module(binary));
    expect(exported(instance, "a")()).toBe(1);
  });

  it("matches the entry file on disk against imports of it", () => {
    const dir = mkdtempSync(join(tmpdir(), "keelc-"));
    try {
      writeFileSync(join(dir, "a.keel"), 'import "b.keel";\nfn a() -> i32 { return b() + 1; }');
      writeFileSync(join(dir, "b.keel"), 'import "a.keel";\nfn b() -> i32 { return 1; }');

      const { module, program } = compileFile(`${dir}/./a.keel`);
      module.dispose();

      expect(functionNames(program)).toEqual(["b", "a"]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports imports that cannot be read", () => {
    const host = memoryHost({ "main.keel": 'import "missing.keel";' });

    try {
      compileFile("main.keel", { host });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CompileError);
      expect(error).toMatchObject({
        code: "IMPORT_NOT_FOUND",
        message: "Cannot import missing.keel: No such file missing.keel at 1:1",
      });
    }
  });

  it("finds imports inside function and if bodies", () => {
    const program = parse(`
      fn f() -> void {
        import "a.keel";
        if (x < 1) { import "b.keel"; }
      }
      import "c.keel";
    `);

    expect(collectImports(program).map((node) => node.path)).toEqual(["a.keel", "b.keel", "c.keel"]);
  });
});
