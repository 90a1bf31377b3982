import type { ComparisonOperator, LogicalOperator, Position, TypeKeyword } from "./token.js";

/** Primitive type of a value. null means "not annotated, take the type of the context" */
export type VarType = TypeKeyword | null;

/** A VarType that has been resolved */
export type ResolvedType = TypeKeyword;

export type Program = Node[];

export type Node =
  | ExpressionStatementNode
  | VariableDeclarationNode
  | FunctionNode
  | PrototypeNode
  | ReturnNode
  | CallNode;

export type Expression =
  | NumberNode
  | VariableNode
  | BinaryNode
  | CallNode
  | TypeCastNode
  | AssignmentNode
  | StringNode
  | IfNode
  | ImportNode;

type NodeBase = { position: Position };

export type NumberNode = NodeBase & {
  type: "number";
  value: number;
  varType: ResolvedType;
};

/** A reference to a local, parameter or global by name */
export type VariableNode = NodeBase & {
  type: "variable";
  name: string;
};

export type BinaryNode = NodeBase & {
  type: "binary";
  op: string;
  lhs: Expression;
  rhs: Expression;
};

export type CallNode = NodeBase & {
  type: "call";
  callee: string;
  args: Expression[];
};

export type TypeCastNode = NodeBase & {
  type: "type-cast";
  value: Expression;
  target: ResolvedType;
};

export type AssignmentNode = NodeBase & {
  type: "assignment";
  name: string;
  value: Expression;
};

export type StringNode = NodeBase & {
  type: "string";
  value: string;
};

export type Condition = {
  lhs: Expression;
  op: ComparisonOperator;
  rhs: Expression;
};

/**
 * Conditions and the && / || joiners between them are kept in source order.
 * separators.length is always conditions.length - 1
 */
export type IfNode = NodeBase & {
  type: "if";
  conditions: Condition[];
  separators: LogicalOperator[];
  body: Node[];
};

export type ImportNode = NodeBase & {
  type: "import";
  path: string;
};

export type ExpressionStatementNode = NodeBase & {
  type: "expression";
  expression: Expression;
};

export type VariableDeclarationNode = NodeBase & {
  type: "variable-declaration";
  name: string;
  varType: ResolvedType;
  value: Expression;
};

/** A function signature. On its own it declares a function provided by the host */
export type PrototypeNode = NodeBase & {
  type: "prototype";
  name: string;
  argNames: string[];
  argTypes: ResolvedType[];
  returnType: ResolvedType;
};

export type FunctionNode = NodeBase & {
  type: "function";
  prototype: PrototypeNode;
  body: Node[];
  argTypes: ResolvedType[];
};

export type ReturnNode = NodeBase & {
  type: "return";
  value: Expression;
};
