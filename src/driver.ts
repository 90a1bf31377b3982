import type binaryen from "binaryen";
import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { compile, type CompileOptions } from "./compiler.js";
import { CompileError, ERROR_CODES } from "./errors.js";
import { lex } from "./lexer.js";
import { parseTokens, type ParseOptions } from "./parser.js";
import type { ImportNode, Node, Program } from "./types/index.js";

/** Where source files come from. The CLI reads from disk, tests use a map */
export interface SourceHost {
  /** Path of an imported file, relative paths are taken from the importing file */
  resolve(from: string, path: string): string;
  /** The form resolve gives a path, used for the file a compile starts from */
  canonical(path: string): string;
  read(path: string): string;
}

export const nodeHost: SourceHost = {
  resolve: (from, path) => resolve(dirname(from), path),
  canonical: (path) => resolve(path),
  read: (path) => readFileSync(path, "utf8"),
};

export interface DriverOptions extends CompileOptions, ParseOptions {
  host?: SourceHost;
  /** Run binaryen's optimizer over the finished module */
  optimize?: boolean;
}

export interface CompileResult {
  module: binaryen.Module;
  /** Every linked unit, imported files before the files importing them */
  program: Program;
}

export const parseSource = (source: string, options: ParseOptions = {}): Program =>
  parseTokens(lex(source), options);

export const compileFile = (path: string, options: DriverOptions = {}): CompileResult => {
  const host = options.host ?? nodeHost;
  const entry = host.canonical(path);
  return compileSource(host.read(entry), { ...options, path: entry });
};

export const compileSource = (
  source: string,
  options: DriverOptions & { path?: string } = {}
): CompileResult => {
  const program = link(source, options.path ?? "main.keel", options);
  const module = compile(program, options);

  if (!module.validate()) {
    module.dispose();
    throw new CompileError(ERROR_CODES.INVALID_MODULE, "Generated module failed validation");
  }

  if (options.optimize) module.optimize();
  return { module, program };
};

/** Parses a unit and, depth first, every file it imports. Each file is included once */
export const link = (source: string, path: string, options: DriverOptions = {}): Program => {
  const host = options.host ?? nodeHost;
  const included = new Set<string>();
  const program: Node[] = [];

  const include = (unitSource: string, unitPath: string) => {
    included.add(unitPath);
    const nodes = parseSource(unitSource, options);

    collectImports(nodes).forEach((node) => {
      const importPath = host.resolve(unitPath, node.path);
      if (included.has(importPath)) return;
      include(readImport(host, importPath, node), importPath);
    });

    program.push(...nodes);
  };

  include(source, host.canonical(path));
  return program;
};

const readImport = (host: SourceHost, path: string, node: ImportNode): string => {
  try {
    return host.read(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CompileError(
      ERROR_CODES.IMPORT_NOT_FOUND,
      `Cannot import ${node.path}: ${reason}`,
      node.position
    );
  }
};

export const collectImports = (nodes: Node[]): ImportNode[] => {
  return nodes.flatMap((node): ImportNode[] => {
    if (node.type === "function") return collectImports(node.body);
    if (node.type !== "expression") return [];
    if (node.expression.type === "import") return [node.expression];
    if (node.expression.type === "if") return collectImports(node.expression.body);
    return [];
  });
};
