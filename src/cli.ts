import { readFileSync, writeFileSync } from "fs";
import { compileFile, parseSource } from "./driver.js";
import { lex } from "./lexer.js";

export type CliArgs =
  | { mode: "help" }
  | {
      mode: "compile";
      file: string;
      emit: "wat" | "wasm";
      out?: string;
      optimize: boolean;
      dumpTokens: boolean;
      dumpAst: boolean;
    };

export const USAGE = `Usage: keelc <file> [options]

Options:
  --emit <wat|wasm>  Output format (default: wat)
  --out <path>       Write output to a file. wasm defaults to <file>.wasm
  --optimize         Run the binaryen optimizer
  --tokens           Print the token stream
  --ast              Print the parsed program
  -h, --help         Show this message`;

/**
 * @param argv - Command line arguments without the node and script paths
 */
export const parseArgs = (argv: string[]): CliArgs => {
  if (argv.includes("--help") || argv.includes("-h")) return { mode: "help" };

  let file: string | undefined;
  let emit: "wat" | "wasm" = "wat";
  let out: string | undefined;
  let optimize = false;
  let dumpTokens = false;
  let dumpAst = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--emit") {
      const value = argv[++i];
      if (value !== "wat" && value !== "wasm") throw new Error(`Invalid --emit value: ${value ?? ""}`);
      emit = value;
      continue;
    }

    if (arg === "--out") {
      const value = argv[++i];
      if (!value) throw new Error("Missing value for --out");
      out = value;
      continue;
    }

    if (arg === "--optimize") optimize = true;
    else if (arg === "--tokens") dumpTokens = true;
    else if (arg === "--ast") dumpAst = true;
    else if (arg.startsWith("-")) throw new Error(`Unknown option: ${arg}`);
    else if (file) throw new Error(`Unexpected argument: ${arg}`);
    else file = arg;
  }

  if (!file) throw new Error("Missing file argument");
  return { mode: "compile", file, emit, out, optimize, dumpTokens, dumpAst };
};

/** Returns the process exit code: 0 success, 1 compile error, 2 usage error */
export const main = (argv: string[]): number => {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  if (args.mode === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    if (args.dumpTokens || args.dumpAst) {
      const source = readFileSync(args.file, "utf8");
      if (args.dumpTokens) console.log(JSON.stringify(lex(source), undefined, 2));
      if (args.dumpAst) console.log(JSON.stringify(parseSource(source), undefined, 2));
    }

    const { module } = compileFile(args.file, { optimize: args.optimize });

    if (args.emit === "wat") {
      const text = module.emitText();
      if (args.out) writeFileSync(args.out, text);
      else console.log(text);
    } else {
      writeFileSync(args.out ?? wasmPath(args.file), module.emitBinary());
    }

    module.dispose();
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
};

const wasmPath = (file: string) => `${file.replace(/\.[^./\\]+$/, "")}.wasm`;
