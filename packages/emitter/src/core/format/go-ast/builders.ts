/**
 * Builders for Go AST nodes.
 */

import type {
  GoAssignmentAst,
  GoBlockAst,
  GoCallAst,
  GoExpressionAst,
  GoExpressionStatementAst,
  GoIdentifierAst,
  GoIfAst,
  GoRangeLoopAst,
  GoReturnAst,
  GoStatementAst,
  GoTypeAst,
  GoVarDeclarationAst,
} from "./types.js";

export const identifier = (name: string): GoIdentifierAst => ({
  kind: "identifier",
  name,
});

export const nil = identifier("nil");

export const selector = (
  operand: GoExpressionAst,
  name: string
): GoExpressionAst => ({ kind: "selector", operand, name });

export const index = (
  operand: GoExpressionAst,
  key: GoExpressionAst
): GoExpressionAst => ({ kind: "index", operand, index: key });

export const dereference = (operand: GoExpressionAst): GoExpressionAst => ({
  kind: "unary",
  operator: "*",
  operand,
});

export const addressOf = (operand: GoExpressionAst): GoExpressionAst => ({
  kind: "unary",
  operator: "&",
  operand,
});

export const notNil = (operand: GoExpressionAst): GoExpressionAst => ({
  kind: "binary",
  operator: "!=",
  left: operand,
  right: nil,
});

export const call = (
  callee: GoExpressionAst | string,
  ...args: readonly (GoExpressionAst | GoTypeAst)[]
): GoCallAst => ({
  kind: "call",
  callee: typeof callee === "string" ? identifier(callee) : callee,
  arguments: args.map(toExpression),
});

export const methodCall = (
  receiver: GoExpressionAst,
  name: string
): GoCallAst => ({
  kind: "call",
  callee: selector(receiver, name),
  arguments: [],
});

const isTypeAst = (node: GoExpressionAst | GoTypeAst): node is GoTypeAst =>
  node.kind.endsWith("Type");

const toExpression = (node: GoExpressionAst | GoTypeAst): GoExpressionAst =>
  isTypeAst(node) ? { kind: "typeExpression", type: node } : node;

export const assign = (
  left: GoExpressionAst,
  right: GoExpressionAst
): GoAssignmentAst => ({ kind: "assignment", left, right, define: false });

export const define = (
  name: string,
  right: GoExpressionAst
): GoAssignmentAst => ({
  kind: "assignment",
  left: identifier(name),
  right,
  define: true,
});

export const varDeclaration = (
  name: string,
  type: GoTypeAst
): GoVarDeclarationAst => ({ kind: "varDeclaration", name, type });

export const ifStatement = (
  condition: GoExpressionAst,
  body: readonly GoStatementAst[]
): GoIfAst => ({ kind: "if", condition, body });

export const rangeLoop = (
  key: string,
  value: string | undefined,
  range: GoExpressionAst,
  body: readonly GoStatementAst[]
): GoRangeLoopAst => ({ kind: "rangeLoop", key, value, range, body });

export const block = (body: readonly GoStatementAst[]): GoBlockAst => ({
  kind: "block",
  body,
});

export const expressionStatement = (
  expression: GoExpressionAst
): GoExpressionStatementAst => ({ kind: "expressionStatement", expression });

export const returnStatement = (expression: GoExpressionAst): GoReturnAst => ({
  kind: "return",
  expression,
});
