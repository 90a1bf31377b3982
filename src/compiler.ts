import binaryen from "binaryen";
import { CompileError, ERROR_CODES } from "./errors.js";
import type {
  AssignmentNode,
  BinaryNode,
  CallNode,
  Condition,
  Expression,
  FunctionNode,
  IfNode,
  Node,
  NumberNode,
  Position,
  Program,
  ResolvedType,
  ReturnNode,
  VariableDeclarationNode,
  VariableNode,
} from "./types/index.js";

export interface CompileOptions {
  /** Export every function under its own name. Defaults to true */
  exportFunctions?: boolean;
}

/** A lowered expression and the source level type of its result */
interface Value {
  ref: binaryen.ExpressionRef;
  type: ResolvedType;
}

/** Function name, signature */
type FunctionMap = Map<string, { argTypes: ResolvedType[]; returnType: ResolvedType }>;

/** Global name, type */
type GlobalMap = Map<string, ResolvedType>;

/**
 * Codegen state of the function being lowered. Each parameter and declared
 * variable owns a local, the return slot is an unnamed local.
 */
interface FunctionEnv {
  locals: Map<string, { index: number; type: ResolvedType }>;
  varTypes: binaryen.Type[];
  paramCount: number;
  returnType: ResolvedType;
  returnSlot?: number;
}

interface CompileOpts {
  mod: binaryen.Module;
  functionMap: FunctionMap;
  globals: GlobalMap;
  strings: StringPool;
  env: FunctionEnv;
  exportFunctions: boolean;
}

const END_LABEL = "end";
const START_FUNCTION = "__start";
const STRING_BASE = 8;
const PAGE_SIZE = 65536;

export const compile = (program: Program, options: CompileOptions = {}): binaryen.Module => {
  const mod = new binaryen.Module();
  const functionMap = generateFunctionMap(program);
  const globals = generateGlobalMap(program);
  const strings = new StringPool(STRING_BASE);

  registerHostFunctions(mod, program);
  globals.forEach((type, name) => {
    mod.addGlobal(name, wasmType(type), true, zero(mod, type));
  });

  const opts: CompileOpts = {
    mod,
    functionMap,
    globals,
    strings,
    env: createEnv([], [], "void"),
    exportFunctions: options.exportFunctions ?? true,
  };

  // Everything outside a function runs once, from the start function
  const startBody = program.map((node) => {
    if (node.type === "variable-declaration") return compileGlobalInitializer(opts, node);
    return compileNode(opts, node);
  });

  const startStatements = program.filter((node) => node.type !== "function" && node.type !== "prototype");
  if (startStatements.length) {
    const start = mod.addFunction(
      START_FUNCTION,
      binaryen.none,
      binaryen.none,
      opts.env.varTypes,
      mod.block(END_LABEL, startBody, binaryen.none)
    );
    mod.setStart(start);
  }

  setMemory(mod, strings);
  return mod;
};

const compileNode = (opts: CompileOpts, node: Node): binaryen.ExpressionRef => {
  const { mod } = opts;
  if (node.type === "expression") return discard(mod, compileExpression(opts, node.expression));
  if (node.type === "call") return discard(mod, compileCall(opts, node));
  if (node.type === "variable-declaration") return compileVariableDeclaration(opts, node);
  if (node.type === "return") return compileReturn(opts, node);
  if (node.type === "function") return compileFunction(opts, node);

  // Prototypes were registered as host imports up front
  return mod.nop();
};

const compileFunction = (opts: CompileOpts, node: FunctionNode): binaryen.ExpressionRef => {
  const { mod } = opts;
  const { name, argNames, returnType } = node.prototype;
  const env = createEnv(argNames, node.argTypes, returnType);
  const fnOpts = { ...opts, env };

  const statements = node.body.map((child) => compileNode(fnOpts, child));
  const children = [mod.block(END_LABEL, statements, binaryen.none)];
  if (env.returnSlot !== undefined) {
    children.push(mod.local.get(env.returnSlot, wasmType(returnType)));
  }

  const params = binaryen.createType(node.argTypes.map(wasmType));
  const body = mod.block(null, children, wasmType(returnType));
  mod.addFunction(name, params, wasmType(returnType), env.varTypes, body);
  if (opts.exportFunctions) mod.addFunctionExport(name, name);
  return mod.nop();
};

const compileVariableDeclaration = (
  opts: CompileOpts,
  node: VariableDeclarationNode
): binaryen.ExpressionRef => {
  const { mod, env } = opts;
  const value = convert(mod, compileExpression(opts, node.value), node.varType, node);
  const index = addLocal(env, node.varType);
  env.locals.set(node.name, { index, type: node.varType });
  return mod.local.set(index, value.ref);
};

const compileGlobalInitializer = (
  opts: CompileOpts,
  node: VariableDeclarationNode
): binaryen.ExpressionRef => {
  const { mod } = opts;
  const value = convert(mod, compileExpression(opts, node.value), node.varType, node);
  return mod.global.set(node.name, value.ref);
};

const compileReturn = (opts: CompileOpts, node: ReturnNode): binaryen.ExpressionRef => {
  const { mod, env } = opts;
  const value = compileExpression(opts, node.value);

  if (env.returnSlot === undefined) {
    return mod.block(null, [discard(mod, value), mod.br(END_LABEL)], binaryen.none);
  }

  const converted = convert(mod, value, env.returnType, node);
  return mod.block(
    null,
    [mod.local.set(env.returnSlot, converted.ref), mod.br(END_LABEL)],
    binaryen.none
  );
};

const compileExpression = (opts: CompileOpts, expression: Expression): Value => {
  const { mod } = opts;
  if (expression.type === "number") return compileNumber(mod, expression);
  if (expression.type === "variable") return compileVariable(opts, expression);
  if (expression.type === "binary") return compileBinary(opts, expression);
  if (expression.type === "call") return compileCall(opts, expression);
  if (expression.type === "assignment") return compileAssignment(opts, expression);
  if (expression.type === "if") return compileIf(opts, expression);
  if (expression.type === "string") {
    return { ref: mod.i32.const(opts.strings.intern(expression.value)), type: "i32" };
  }
  if (expression.type === "type-cast") {
    return convert(mod, compileExpression(opts, expression.value), expression.target, expression);
  }

  // The driver has already linked imported files into the program
  return { ref: mod.nop(), type: "void" };
};

const compileNumber = (mod: binaryen.Module, node: NumberNode): Value => {
  const { value, varType } = node;
  if (varType === "void") {
    throw new CompileError(ERROR_CODES.INVALID_TYPE, "A number cannot be void", node.position);
  }
  if (!Number.isFinite(value)) {
    throw new CompileError(ERROR_CODES.INVALID_TYPE, `Number literal out of range for ${varType}`, node.position);
  }
  if (varType === "float") return { ref: mod.f32.const(value), type: varType };
  if (varType === "double") return { ref: mod.f64.const(value), type: varType };
  if (varType === "i64") return { ref: i64Const(mod, value), type: varType };

  const int = Math.trunc(value) | 0;
  if (varType === "i8") return { ref: mod.i32.const((int << 24) >> 24), type: varType };
  if (varType === "i16") return { ref: mod.i32.const((int << 16) >> 16), type: varType };
  return { ref: mod.i32.const(int), type: varType };
};

const compileVariable = (opts: CompileOpts, node: VariableNode): Value => {
  const { mod, env, globals } = opts;
  const local = env.locals.get(node.name);
  if (local) return { ref: mod.local.get(local.index, wasmType(local.type)), type: local.type };

  const global = globals.get(node.name);
  if (global) return { ref: mod.global.get(node.name, wasmType(global)), type: global };

  throw new CompileError(
    ERROR_CODES.UNKNOWN_VARIABLE,
    `Unrecognized identifier ${node.name}`,
    node.position
  );
};

const compileAssignment = (opts: CompileOpts, node: AssignmentNode): Value => {
  const { mod, env, globals } = opts;
  const local = env.locals.get(node.name);
  if (local) {
    const value = convert(mod, compileExpression(opts, node.value), local.type, node);
    return { ref: mod.local.tee(local.index, value.ref, wasmType(local.type)), type: local.type };
  }

  const global = globals.get(node.name);
  if (global) {
    const value = convert(mod, compileExpression(opts, node.value), global, node);
    const ref = mod.block(
      null,
      [mod.global.set(node.name, value.ref), mod.global.get(node.name, wasmType(global))],
      wasmType(global)
    );
    return { ref, type: global };
  }

  throw new CompileError(
    ERROR_CODES.UNKNOWN_VARIABLE,
    `Cannot assign to unknown variable ${node.name}`,
    node.position
  );
};

const compileBinary = (opts: CompileOpts, node: BinaryNode): Value => {
  const { mod } = opts;

  if (node.op === "=") {
    if (node.lhs.type !== "variable") {
      throw new CompileError(ERROR_CODES.INVALID_OPERATOR, "Can only assign to a variable", node.position);
    }
    return compileAssignment(opts, {
      type: "assignment",
      name: node.lhs.name,
      value: node.rhs,
      position: node.position,
    });
  }

  const lhs = compileExpression(opts, node.lhs);
  const rhs = compileExpression(opts, node.rhs);
  const comparison = isComparison(node.op);

  // bool only survives comparisons, arithmetic on it happens in i32
  let type = widerType(lhs.type, rhs.type, node);
  if (type === "bool" && !comparison) type = "i32";

  const operator = binaryOperators(mod, representation(type))[node.op];
  if (!operator) {
    throw new CompileError(ERROR_CODES.INVALID_OPERATOR, `Unknown operator ${node.op}`, node.position);
  }

  const ref = operator(convert(mod, lhs, type, node).ref, convert(mod, rhs, type, node).ref);
  if (comparison) return { ref, type: "bool" };
  return { ref: narrow(mod, ref, type), type };
};

const compileCall = (opts: CompileOpts, node: CallNode): Value => {
  const { mod, functionMap } = opts;
  const info = functionMap.get(node.callee);
  if (!info) {
    throw new CompileError(ERROR_CODES.UNKNOWN_FUNCTION, `Function ${node.callee} not found`, node.position);
  }

  if (info.argTypes.length !== node.args.length) {
    throw new CompileError(
      ERROR_CODES.ARGUMENT_COUNT,
      `Function ${node.callee} takes ${info.argTypes.length} arguments, got ${node.args.length}`,
      node.position
    );
  }

  // Arguments are lowered left to right
  const args = node.args.map((arg, index) => {
    return convert(mod, compileExpression(opts, arg), info.argTypes[index], node).ref;
  });

  return { ref: mod.call(node.callee, args, wasmType(info.returnType)), type: info.returnType };
};

const compileIf = (opts: CompileOpts, node: IfNode): Value => {
  const { mod } = opts;
  const [first, ...rest] = node.conditions.map((condition) => compileCondition(opts, condition, node));
  if (first === undefined || rest.length !== node.separators.length) {
    throw new CompileError(ERROR_CODES.INVALID_OPERATOR, "Malformed condition list", node.position);
  }

  // Joiners fold left to right, the right operand only runs when it can change the result
  const condition = rest.reduce((acc, next, index) => {
    if (node.separators[index] === "&&") return mod.if(acc, next, mod.i32.const(0));
    return mod.if(acc, mod.i32.const(1), next);
  }, first);

  const body = node.body.map((child) => compileNode(opts, child));
  return { ref: mod.if(condition, mod.block(null, body, binaryen.none)), type: "void" };
};

const compileCondition = (opts: CompileOpts, condition: Condition, node: IfNode): binaryen.ExpressionRef => {
  const { mod } = opts;
  const lhs = compileExpression(opts, condition.lhs);
  const rhs = compileExpression(opts, condition.rhs);
  const type = widerType(lhs.type, rhs.type, node);
  const operator = binaryOperators(mod, representation(type))[condition.op];
  if (!operator) {
    throw new CompileError(ERROR_CODES.INVALID_OPERATOR, `Unknown comparison ${condition.op}`, node.position);
  }
  return operator(convert(mod, lhs, type, node).ref, convert(mod, rhs, type, node).ref);
};

type Representation = "i32" | "i64" | "f32" | "f64" | "none";

type BinaryOperator = (left: binaryen.ExpressionRef, right: binaryen.ExpressionRef) => binaryen.ExpressionRef;

const binaryOperators = (
  mod: binaryen.Module,
  repr: Representation
): Partial<Record<string, BinaryOperator>> => {
  if (repr === "i32") {
    const { i32 } = mod;
    return {
      "+": i32.add,
      "-": i32.sub,
      "*": i32.mul,
      "/": i32.div_s,
      "<": i32.lt_s,
      ">": i32.gt_s,
      "<=": i32.le_s,
      ">=": i32.ge_s,
      "==": i32.eq,
      "!=": i32.ne,
    };
  }

  if (repr === "i64") {
    const { i64 } = mod;
    return {
      "+": i64.add,
      "-": i64.sub,
      "*": i64.mul,
      "/": i64.div_s,
      "<": i64.lt_s,
      ">": i64.gt_s,
      "<=": i64.le_s,
      ">=": i64.ge_s,
      "==": i64.eq,
      "!=": i64.ne,
    };
  }

  if (repr === "f32" || repr === "f64") {
    const ops = repr === "f32" ? mod.f32 : mod.f64;
    return {
      "+": ops.add,
      "-": ops.sub,
      "*": ops.mul,
      "/": ops.div,
      "<": ops.lt,
      ">": ops.gt,
      "<=": ops.le,
      ">=": ops.ge,
      "==": ops.eq,
      "!=": ops.ne,
    };
  }

  return {};
};

const typeRank: Record<ResolvedType, number> = {
  bool: 0,
  i8: 1,
  i16: 2,
  i32: 3,
  i64: 4,
  float: 5,
  double: 6,
  void: -1,
};

const widerType = (a: ResolvedType, b: ResolvedType, node: { position: Position }): ResolvedType => {
  if (a === "void" || b === "void") {
    throw new CompileError(ERROR_CODES.INVALID_TYPE, "A void value cannot be used as an operand", node.position);
  }
  return typeRank[a] >= typeRank[b] ? a : b;
};

/**
 * Converts a value to another type: sign extension, wrapping, int <-> float,
 * promotion and demotion. Anything converts to bool by comparing with zero.
 */
const convert = (
  mod: binaryen.Module,
  value: Value,
  to: ResolvedType,
  node: { position: Position }
): Value => {
  const from = value.type;
  if (from === to) return value;

  if (from === "void" || to === "void") {
    throw new CompileError(ERROR_CODES.INVALID_TYPE, `Cannot convert ${from} to ${to}`, node.position);
  }

  if (to === "bool") return { ref: notZero(mod, value), type: to };

  let ref = changeRepresentation(mod, value.ref, representation(from), representation(to));
  if (typeRank[from] > typeRank[to]) ref = narrow(mod, ref, to);
  return { ref, type: to };
};

const changeRepresentation = (
  mod: binaryen.Module,
  ref: binaryen.ExpressionRef,
  from: Representation,
  to: Representation
): binaryen.ExpressionRef => {
  if (from === to) return ref;

  if (to === "i32") {
    if (from === "i64") return mod.i32.wrap(ref);
    if (from === "f32") return mod.i32.trunc_s.f32(ref);
    if (from === "f64") return mod.i32.trunc_s.f64(ref);
  }

  if (to === "i64") {
    if (from === "i32") return mod.i64.extend_s(ref);
    if (from === "f32") return mod.i64.trunc_s.f32(ref);
    if (from === "f64") return mod.i64.trunc_s.f64(ref);
  }

  if (to === "f32") {
    if (from === "i32") return mod.f32.convert_s.i32(ref);
    if (from === "i64") return mod.f32.convert_s.i64(ref);
    if (from === "f64") return mod.f32.demote(ref);
  }

  if (to === "f64") {
    if (from === "i32") return mod.f64.convert_s.i32(ref);
    if (from === "i64") return mod.f64.convert_s.i64(ref);
    if (from === "f32") return mod.f64.promote(ref);
  }

  throw new CompileError(ERROR_CODES.INVALID_TYPE, `Cannot convert ${from} to ${to}`);
};

/** i8 and i16 live in an i32, keep the value sign extended from its low bits */
const narrow = (mod: binaryen.Module, ref: binaryen.ExpressionRef, type: ResolvedType) => {
  const bits = type === "i8" ? 8 : type === "i16" ? 16 : undefined;
  if (bits === undefined) return ref;
  const shift = mod.i32.const(32 - bits);
  return mod.i32.shr_s(mod.i32.shl(ref, shift), mod.i32.const(32 - bits));
};

const notZero = (mod: binaryen.Module, value: Value): binaryen.ExpressionRef => {
  const repr = representation(value.type);
  if (repr === "i64") return mod.i64.ne(value.ref, mod.i64.const(0, 0));
  if (repr === "f32") return mod.f32.ne(value.ref, mod.f32.const(0));
  if (repr === "f64") return mod.f64.ne(value.ref, mod.f64.const(0));
  return mod.i32.ne(value.ref, mod.i32.const(0));
};

const zero = (mod: binaryen.Module, type: ResolvedType): binaryen.ExpressionRef => {
  const repr = representation(type);
  if (repr === "i64") return mod.i64.const(0, 0);
  if (repr === "f32") return mod.f32.const(0);
  if (repr === "f64") return mod.f64.const(0);
  return mod.i32.const(0);
};

const i64Const = (mod: binaryen.Module, value: number): binaryen.ExpressionRef => {
  const bits = BigInt.asUintN(64, BigInt(Math.trunc(value)));
  const low = Number(bits & 0xffffffffn) | 0;
  const high = Number(bits >> 32n) | 0;
  return mod.i64.const(low, high);
};

const discard = (mod: binaryen.Module, value: Value): binaryen.ExpressionRef => {
  if (value.type === "void") return value.ref;
  return mod.drop(value.ref);
};

const representation = (type: ResolvedType): Representation => {
  if (type === "i64") return "i64";
  if (type === "float") return "f32";
  if (type === "double") return "f64";
  if (type === "void") return "none";
  return "i32";
};

const wasmType = (type: ResolvedType): binaryen.Type => {
  const repr = representation(type);
  if (repr === "i64") return binaryen.i64;
  if (repr === "f32") return binaryen.f32;
  if (repr === "f64") return binaryen.f64;
  if (repr === "none") return binaryen.none;
  return binaryen.i32;
};

const isComparison = (op: string) => ["<", ">", "<=", ">=", "==", "!="].includes(op);

const createEnv = (
  argNames: string[],
  argTypes: ResolvedType[],
  returnType: ResolvedType
): FunctionEnv => {
  const env: FunctionEnv = {
    locals: new Map(argNames.map((name, index) => [name, { index, type: argTypes[index] }])),
    varTypes: [],
    paramCount: argNames.length,
    returnType,
  };
  if (returnType !== "void") env.returnSlot = addLocal(env, returnType);
  return env;
};

const addLocal = (env: FunctionEnv, type: ResolvedType): number => {
  env.varTypes.push(wasmType(type));
  return env.paramCount + env.varTypes.length - 1;
};

/** Declares every extern prototype as an import from the host's "env" module */
const registerHostFunctions = (mod: binaryen.Module, program: Program) => {
  program.forEach((node) => {
    if (node.type !== "prototype") return;
    mod.addFunctionImport(
      node.name,
      "env",
      node.name,
      binaryen.createType(node.argTypes.map(wasmType)),
      wasmType(node.returnType)
    );
  });
};

const generateFunctionMap = (nodes: Node[]): FunctionMap => {
  return nodes.reduce((map: FunctionMap, node) => {
    const prototype = node.type === "function" ? node.prototype : node.type === "prototype" ? node : undefined;

    if (prototype) {
      if (map.has(prototype.name)) {
        throw new CompileError(
          ERROR_CODES.DUPLICATE_DEFINITION,
          `Function ${prototype.name} is already defined`,
          prototype.position
        );
      }
      map.set(prototype.name, { argTypes: prototype.argTypes, returnType: prototype.returnType });
    }

    // Scan bodies for nested function definitions
    nestedBodies(node).forEach((body) => {
      generateFunctionMap(body).forEach((info, name) => {
        if (map.has(name)) {
          throw new CompileError(ERROR_CODES.DUPLICATE_DEFINITION, `Function ${name} is already defined`);
        }
        map.set(name, info);
      });
    });

    return map;
  }, new Map());
};

const nestedBodies = (node: Node): Node[][] => {
  if (node.type === "function") return [node.body];
  if (node.type === "expression" && node.expression.type === "if") return [node.expression.body];
  return [];
};

const generateGlobalMap = (program: Program): GlobalMap => {
  const globals: GlobalMap = new Map();
  program.forEach((node) => {
    if (node.type !== "variable-declaration") return;
    if (node.varType === "void") {
      throw new CompileError(ERROR_CODES.INVALID_TYPE, `Variable ${node.name} cannot be void`, node.position);
    }
    if (globals.has(node.name)) {
      throw new CompileError(
        ERROR_CODES.DUPLICATE_DEFINITION,
        `Variable ${node.name} is already defined`,
        node.position
      );
    }
    globals.set(node.name, node.varType);
  });
  return globals;
};

const setMemory = (mod: binaryen.Module, strings: StringPool) => {
  const pages = Math.max(1, Math.ceil(strings.end / PAGE_SIZE));
  const segments = strings.segments().map(({ offset, data }) => ({
    name: `string.${offset}`,
    offset: mod.i32.const(offset),
    data,
    passive: false,
  }));
  mod.setMemory(pages, pages, "memory", segments);
};

/** NUL terminated string constants laid out in linear memory */
class StringPool {
  private readonly offsets = new Map<string, number>();
  private readonly encoder = new TextEncoder();
  private readonly data: { offset: number; data: Uint8Array }[] = [];
  end: number;

  constructor(base: number) {
    this.end = base;
  }

  intern(value: string): number {
    const existing = this.offsets.get(value);
    if (existing !== undefined) return existing;

    const bytes = this.encoder.encode(value);
    const data = new Uint8Array(bytes.length + 1);
    data.set(bytes);

    const offset = this.end;
    this.offsets.set(value, offset);
    this.data.push({ offset, data });
    this.end += data.length;
    return offset;
  }

  segments() {
    return this.data;
  }
}
