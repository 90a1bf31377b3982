import { defaultPrecedence, type PrecedenceTable } from "./cursor.js";
import type {
  Condition,
  Expression,
  IfNode,
  Node,
  NumberNode,
  Program,
  PrototypeNode,
  ResolvedType,
} from "./types/index.js";

export interface PrintOptions {
  precedence?: PrecedenceTable;
  indent?: string;
}

interface PrintContext {
  precedence: PrecedenceTable;
  indent: string;
  depth: number;
  /** Return type of the enclosing function, decides how literals in a return read back */
  returnType: ResolvedType;
}

/**
 * Renders a program as source. Parsing the output gives back the same tree,
 * literal types included: a literal is written so that the context it lands
 * in gives it the type it has.
 */
export const print = (program: Program, options: PrintOptions = {}): string => {
  const ctx: PrintContext = {
    precedence: options.precedence ?? defaultPrecedence,
    indent: options.indent ?? "  ",
    depth: 0,
    returnType: "i32",
  };
  return program.map((node) => printNode(ctx, node)).join("\n") + "\n";
};

const printNode = (ctx: PrintContext, node: Node): string => {
  const pad = ctx.indent.repeat(ctx.depth);

  if (node.type === "variable-declaration") {
    return `${pad}${node.varType} ${node.name} = ${printExpression(ctx, node.value, node.varType)};`;
  }

  if (node.type === "return") {
    const contextType = ctx.returnType === "void" ? "i32" : ctx.returnType;
    return `${pad}return ${printExpression(ctx, node.value, contextType)};`;
  }

  if (node.type === "prototype") return `${pad}${printPrototype(node)};`;

  if (node.type === "function") {
    const bodyCtx = { ...ctx, depth: ctx.depth + 1, returnType: node.prototype.returnType };
    const body = node.body.map((child) => printNode(bodyCtx, child));
    return [`${pad}${printPrototype(node.prototype)} {`, ...body, `${pad}}`].join("\n");
  }

  if (node.type === "call") return `${pad}${printExpression(ctx, node, "i32")};`;

  // An if at the start of a statement takes no semicolon
  if (node.expression.type === "if") return `${pad}${printIf(ctx, node.expression, "i32")}`;
  return `${pad}${printExpression(ctx, node.expression, "i32")};`;
};

const printPrototype = (node: PrototypeNode): string => {
  const params = node.argNames.map((name, index) => `${node.argTypes[index]} ${name}`);
  return `fn ${node.name}(${params.join(", ")}) -> ${node.returnType}`;
};

const printExpression = (ctx: PrintContext, expression: Expression, contextType: ResolvedType): string => {
  switch (expression.type) {
    case "number":
      return printNumber(expression, contextType);
    case "variable":
      return expression.name;
    case "string":
      return `"${escape(expression.value)}"`;
    case "import":
      return `import "${escape(expression.path)}"`;
    case "call": {
      const args = expression.args.map((arg) => printExpression(ctx, arg, "i32"));
      return `${expression.callee}(${args.join(", ")})`;
    }
    case "type-cast":
      return `${expression.target}(${printExpression(ctx, expression.value, "i32")})`;
    case "assignment":
      return `${expression.name} = ${printExpression(ctx, expression.value, contextType)}`;
    case "if":
      return printIf(ctx, expression, contextType);
    case "binary": {
      const precedence = precedenceOf(ctx, expression.op);
      const lhs = printOperand(ctx, expression.lhs, contextType, (inner) => inner < precedence);
      const rhs = printOperand(ctx, expression.rhs, contextType, (inner) => inner <= precedence);
      return `${lhs} ${expression.op} ${rhs}`;
    }
  }
};

/** Wraps operands in parentheses where the parser would otherwise group them differently */
const printOperand = (
  ctx: PrintContext,
  operand: Expression,
  contextType: ResolvedType,
  needsParens: (precedence: number) => boolean
): string => {
  const text = printExpression(ctx, operand, contextType);
  if (operand.type === "assignment" || operand.type === "if") return `(${text})`;
  if (operand.type === "binary" && needsParens(precedenceOf(ctx, operand.op))) return `(${text})`;
  return text;
};

const printIf = (ctx: PrintContext, node: IfNode, contextType: ResolvedType): string => {
  const pad = ctx.indent.repeat(ctx.depth);
  const conditions = node.conditions.map((condition, index) => {
    const text = printCondition(ctx, condition, contextType);
    return index === 0 ? text : `${node.separators[index - 1]} ${text}`;
  });

  const bodyCtx = { ...ctx, depth: ctx.depth + 1 };
  const body = node.body.map((child) => printNode(bodyCtx, child));
  return [`if (${conditions.join(" ")}) {`, ...body, `${pad}}`].join("\n");
};

const printCondition = (ctx: PrintContext, condition: Condition, contextType: ResolvedType): string => {
  const ceiling = Math.max(
    0,
    ...["<", ">", "<=", ">=", "==", "!="].map((op) => ctx.precedence[op] ?? 0)
  );
  const operand = (expression: Expression) =>
    printOperand(ctx, expression, contextType, (inner) => inner <= ceiling);
  return `${operand(condition.lhs)} ${condition.op} ${operand(condition.rhs)}`;
};

const printNumber = (node: NumberNode, contextType: ResolvedType): string => {
  const { value, varType } = node;

  if (varType === "bool" && (value === 0 || value === 1)) return value ? "true" : "false";

  // Untyped integer literals take the type of their context
  if (varType === contextType) return positional(value);
  if (varType === "double") return Number.isInteger(value) ? `${positional(value)}.0` : positional(value);
  return `${varType}(${positional(value)})`;
};

/** Digits and at most one ".", the lexer reads no exponents */
const positional = (value: number): string => {
  if (Number.isInteger(value)) return BigInt(value).toString();

  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/.exec(text);
  if (!match) return text;

  // Fractions only use exponents below 1e-6, larger magnitudes are integers
  const [, sign, lead, rest = "", exponent] = match;
  return `${sign}0.${"0".repeat(Number(exponent) - 1)}${lead}${rest}`;
};

const precedenceOf = (ctx: PrintContext, op: string): number => ctx.precedence[op] ?? 0;

const escape = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n").replace(/\t/g, "\\t");
