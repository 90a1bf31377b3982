import {
  advance,
  atEnd,
  createCursor,
  current,
  currentPrecedence,
  describe,
  expectPunctuation,
  expectType,
  isOperator,
  isPunctuation,
  peek,
  type PrecedenceTable,
  type TokenCursor,
  unexpected,
} from "./cursor.js";
import { ERROR_CODES, ParseError } from "./errors.js";
import { tokenKindToVar, typeKeywordToVar } from "./type-resolver.js";
import type {
  BoolToken,
  ComparisonOperator,
  Condition,
  Expression,
  FloatToken,
  FunctionNode,
  IfNode,
  ImportNode,
  IntToken,
  LogicalOperator,
  Node,
  NumberNode,
  Program,
  PrototypeNode,
  ResolvedType,
  ReturnNode,
  StringToken,
  Token,
  VariableDeclarationNode,
  VarType,
} from "./types/index.js";
import { comparisonOperators } from "./types/index.js";

export interface ParseOptions {
  precedence?: PrecedenceTable;
}

interface ParserContext {
  cursor: TokenCursor;
  /** Return type of the function whose body is being parsed, i32 at the top level */
  returnType: ResolvedType;
}

const DEFAULT_CONTEXT_TYPE: ResolvedType = "i32";

export const parseTokens = (tokens: readonly Token[], options: ParseOptions = {}): Program => {
  const ctx: ParserContext = {
    cursor: createCursor(tokens, options.precedence),
    returnType: DEFAULT_CONTEXT_TYPE,
  };
  const nodes: Program = [];

  while (!atEnd(ctx.cursor)) {
    nodes.push(parseNode(ctx));
  }

  return nodes;
};

const parseNode = (ctx: ParserContext): Node => {
  const { cursor } = ctx;
  const token = current(cursor);

  if (isKeyword(token, "fn")) return parseFnDeclaration(ctx);
  if (isKeyword(token, "return")) return parseReturnStatement(ctx);

  // A type keyword followed by ( starts a typecast, not a declaration
  if (token.type === "type-keyword" && !isPunctuation(peek(cursor, 1), "(")) {
    return parseVariableDeclaration(ctx);
  }

  if (isKeyword(token, "if")) {
    return { type: "expression", expression: parseIf(ctx, DEFAULT_CONTEXT_TYPE), position: token.position };
  }

  const expression = parseExpression(ctx, true);
  if (expression.type === "call") return expression;
  return { type: "expression", expression, position: expression.position };
};

const parseFnDeclaration = (ctx: ParserContext): FunctionNode | PrototypeNode => {
  const { cursor } = ctx;
  const prototype = parsePrototype(ctx);

  // No body: the function is provided by the host
  if (isPunctuation(current(cursor), ";")) {
    advance(cursor);
    return prototype;
  }

  expectPunctuation(cursor, "{");
  const enclosingReturnType = ctx.returnType;
  ctx.returnType = prototype.returnType;
  const body = parseFnBody(ctx);
  ctx.returnType = enclosingReturnType;

  return {
    type: "function",
    prototype,
    body,
    argTypes: prototype.argTypes,
    position: prototype.position,
  };
};

const parsePrototype = (ctx: ParserContext): PrototypeNode => {
  const { cursor } = ctx;
  const fnToken = advance(cursor);
  const name = expectType(cursor, "identifier", ERROR_CODES.MALFORMED_PROTOTYPE).value;
  const argNames: string[] = [];
  const argTypes: ResolvedType[] = [];

  expectPunctuation(cursor, "(", ERROR_CODES.MALFORMED_PROTOTYPE);
  if (!isPunctuation(current(cursor), ")")) {
    while (true) {
      argTypes.push(parseTypeKeyword(cursor));
      argNames.push(expectType(cursor, "identifier", ERROR_CODES.MALFORMED_PROTOTYPE).value);
      if (!isPunctuation(current(cursor), ",")) break;
      advance(cursor);
    }
  }
  expectPunctuation(cursor, ")", ERROR_CODES.MALFORMED_PROTOTYPE);
  expectPunctuation(cursor, "->", ERROR_CODES.MALFORMED_PROTOTYPE);
  const returnType = parseTypeKeyword(cursor);

  return { type: "prototype", name, argNames, argTypes, returnType, position: fnToken.position };
};

/** Parses nodes up to and including the closing brace. The opening brace is already consumed */
const parseFnBody = (ctx: ParserContext): Node[] => {
  const { cursor } = ctx;
  const body: Node[] = [];

  while (!isPunctuation(current(cursor), "}")) {
    if (atEnd(cursor)) throw unexpected(current(cursor), "'}'");
    body.push(parseNode(ctx));
  }

  advance(cursor);
  return body;
};

const parseVariableDeclaration = (ctx: ParserContext): VariableDeclarationNode => {
  const { cursor } = ctx;
  const position = current(cursor).position;
  const varType = parseTypeKeyword(cursor);
  const name = expectType(cursor, "identifier").value;

  if (!isOperator(current(cursor), "=")) throw unexpected(current(cursor), "'='");
  advance(cursor);

  const value = parseExpression(ctx, true, varType);
  return { type: "variable-declaration", name, varType, value, position };
};

const parseReturnStatement = (ctx: ParserContext): ReturnNode => {
  const { cursor } = ctx;
  const position = advance(cursor).position;
  const contextType = ctx.returnType === "void" ? DEFAULT_CONTEXT_TYPE : ctx.returnType;
  const value = parseExpression(ctx, true, contextType);
  return { type: "return", value, position };
};

const parseExpression = (
  ctx: ParserContext,
  needsSemicolon: boolean,
  contextType: ResolvedType = DEFAULT_CONTEXT_TYPE
): Expression => {
  const lhs = parsePrimary(ctx, contextType);
  const expression = parseBinOpRhs(ctx, 0, lhs, contextType);
  if (needsSemicolon) expectPunctuation(ctx.cursor, ";");
  return expression;
};

const parsePrimary = (ctx: ParserContext, contextType: ResolvedType): Expression => {
  const { cursor } = ctx;
  const token = current(cursor);

  if (token.type === "int" || token.type === "float" || token.type === "bool") {
    return parseNumberExpression(ctx, token, tokenKindToVar(token), contextType);
  }

  if (token.type === "identifier") return parseIdentifierExpression(ctx, contextType);
  if (isPunctuation(token, "(")) return parseParenExpression(ctx, contextType);
  if (token.type === "type-keyword" && isPunctuation(peek(cursor, 1), "(")) {
    return parseTypecastExpression(ctx);
  }
  if (isKeyword(token, "if")) return parseIf(ctx, contextType);
  if (isKeyword(token, "import")) return parseImport(ctx);
  if (token.type === "string") return parseStringExpression(ctx, token);

  throw new ParseError(
    ERROR_CODES.UNEXPECTED_TOKEN,
    `Unknown token in expression: ${describe(token)}`,
    token
  );
};

const parseNumberExpression = (
  ctx: ParserContext,
  token: IntToken | FloatToken | BoolToken,
  varType: VarType,
  contextType: ResolvedType
): NumberNode => {
  advance(ctx.cursor);
  const value = token.type === "bool" ? Number(token.value) : token.value;
  return { type: "number", value, varType: varType ?? contextType, position: token.position };
};

const parseIdentifierExpression = (ctx: ParserContext, contextType: ResolvedType): Expression => {
  const { cursor } = ctx;
  const token = expectType(cursor, "identifier");
  const name = token.value;
  const position = token.position;

  if (isPunctuation(current(cursor), "(")) {
    advance(cursor);
    const args: Expression[] = [];
    if (!isPunctuation(current(cursor), ")")) {
      while (true) {
        args.push(parseExpression(ctx, false));
        if (!isPunctuation(current(cursor), ",")) break;
        advance(cursor);
      }
    }
    expectPunctuation(cursor, ")");
    return { type: "call", callee: name, args, position };
  }

  if (isOperator(current(cursor), "=")) {
    advance(cursor);
    const value = parseExpression(ctx, false, contextType);
    return { type: "assignment", name, value, position };
  }

  return { type: "variable", name, position };
};

const parseParenExpression = (ctx: ParserContext, contextType: ResolvedType): Expression => {
  const { cursor } = ctx;
  advance(cursor);
  const expression = parseExpression(ctx, false, contextType);
  expectPunctuation(cursor, ")");
  return expression;
};

const parseTypecastExpression = (ctx: ParserContext): Expression => {
  const { cursor } = ctx;
  const position = current(cursor).position;
  const target = parseTypeKeyword(cursor);
  expectPunctuation(cursor, "(");
  const value = parseExpression(ctx, false);
  expectPunctuation(cursor, ")");
  return { type: "type-cast", value, target, position };
};

const parseStringExpression = (ctx: ParserContext, token: StringToken): Expression => {
  advance(ctx.cursor);
  return { type: "string", value: token.value, position: token.position };
};

const parseImport = (ctx: ParserContext): ImportNode => {
  const { cursor } = ctx;
  const position = advance(cursor).position;
  const path = expectType(cursor, "string").value;
  return { type: "import", path, position };
};

const parseIf = (ctx: ParserContext, contextType: ResolvedType): IfNode => {
  const { cursor } = ctx;
  const position = advance(cursor).position;
  const conditions: Condition[] = [];
  const separators: LogicalOperator[] = [];

  expectPunctuation(cursor, "(");
  conditions.push(parseCondition(ctx, contextType));

  let separator = logicalOperator(current(cursor));
  while (separator) {
    advance(cursor);
    separators.push(separator);
    conditions.push(parseCondition(ctx, contextType));
    separator = logicalOperator(current(cursor));
  }

  expectPunctuation(cursor, ")", ERROR_CODES.MALFORMED_IF);
  expectPunctuation(cursor, "{", ERROR_CODES.MALFORMED_IF);
  const body = parseFnBody(ctx);

  return { type: "if", conditions, separators, body, position };
};

const parseCondition = (ctx: ParserContext, contextType: ResolvedType): Condition => {
  const { cursor } = ctx;
  const lhs = parseConditionOperand(ctx, contextType);

  const token = current(cursor);
  const op = comparisonOperator(token);
  if (!op) throw unexpected(token, "a comparison operator", ERROR_CODES.MALFORMED_IF);
  advance(cursor);

  const rhs = parseConditionOperand(ctx, contextType);
  return { lhs, op, rhs };
};

/**
 * Operands of a condition only take operators that bind tighter than every
 * comparison, which leaves the comparison itself for the condition.
 */
const parseConditionOperand = (ctx: ParserContext, contextType: ResolvedType): Expression => {
  const { cursor } = ctx;
  const ceiling = Math.max(
    0,
    ...comparisonOperators.map((op) => cursor.precedence.get(op) ?? 0)
  );
  const lhs = parsePrimary(ctx, contextType);
  return parseBinOpRhs(ctx, ceiling + 1, lhs, contextType);
};

/** Precedence climbing: folds operators of at least minPrecedence into lhs */
const parseBinOpRhs = (
  ctx: ParserContext,
  minPrecedence: number,
  lhs: Expression,
  contextType: ResolvedType
): Expression => {
  const { cursor } = ctx;

  while (true) {
    const precedence = currentPrecedence(cursor);
    if (precedence < minPrecedence) return lhs;

    const op = advance(cursor).lexeme;
    let rhs = parsePrimary(ctx, contextType);

    // Operator after rhs binds tighter, let it take rhs as its lhs
    if (precedence < currentPrecedence(cursor)) {
      rhs = parseBinOpRhs(ctx, precedence + 1, rhs, contextType);
    }

    lhs = { type: "binary", op, lhs, rhs, position: lhs.position };
  }
};

const parseTypeKeyword = (cursor: TokenCursor): ResolvedType => {
  const token = current(cursor);

  if (token.type === "identifier") {
    throw new ParseError(ERROR_CODES.UNKNOWN_TYPE, `Unknown type ${describe(token)}`, token);
  }

  if (token.type !== "type-keyword") throw unexpected(token, "a type");

  const varType = typeKeywordToVar(token.value);
  if (!varType) {
    throw new ParseError(ERROR_CODES.UNKNOWN_TYPE, `Unknown type ${describe(token)}`, token);
  }

  advance(cursor);
  return varType;
};

const isKeyword = (token: Token, keyword: string): boolean =>
  token.type === "keyword" && token.value === keyword;

const comparisonOperator = (token: Token): ComparisonOperator | undefined => {
  if (token.type !== "operator") return undefined;
  const value = token.value;
  return comparisonOperators.find((op) => op === value);
};

const logicalOperator = (token: Token): LogicalOperator | undefined => {
  if (token.type !== "operator") return undefined;
  if (token.value === "&&" || token.value === "||") return token.value;
  return undefined;
};
