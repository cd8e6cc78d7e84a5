// =============================================================================
// AST Model
// Closed node union produced by the builders and walked by the evaluator
// =============================================================================

import type { SourcePosition } from '../errors';
import { IDENTIFIER_START, KEYWORDS } from './token-types';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '^';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = '&&' | '||';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;
export type UnaryOperator = '-' | '+' | '!';

export interface NumberNode {
  readonly type: 'number';
  readonly value: number;
}

export interface BooleanNode {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface VariableNode {
  readonly type: 'variable';
  readonly name: string;
  readonly position?: SourcePosition;
}

export interface UnaryNode {
  readonly type: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: AstNode;
  readonly position?: SourcePosition;
}

export interface BinaryNode {
  readonly type: 'binary';
  readonly operator: BinaryOperator;
  readonly left: AstNode;
  readonly right: AstNode;
  readonly position?: SourcePosition;
}

export interface FunctionCallNode {
  readonly type: 'call';
  readonly name: string;
  readonly args: readonly AstNode[];
  readonly position?: SourcePosition;
}

export interface ConditionalNode {
  readonly type: 'conditional';
  readonly condition: AstNode;
  readonly whenTrue: AstNode;
  readonly whenFalse: AstNode;
  readonly position?: SourcePosition;
}

export type AstNode =
  | NumberNode
  | BooleanNode
  | VariableNode
  | UnaryNode
  | BinaryNode
  | FunctionCallNode
  | ConditionalNode;

// ── Traversal ──

export function childrenOf(node: AstNode): readonly AstNode[] {
  switch (node.type) {
    case 'number':
    case 'boolean':
    case 'variable':
      return [];
    case 'unary':
      return [node.operand];
    case 'binary':
      return [node.left, node.right];
    case 'call':
      return node.args;
    case 'conditional':
      return [node.condition, node.whenTrue, node.whenFalse];
  }
}

/** Depth of the tree; a leaf has depth 1. */
export function astDepth(node: AstNode): number {
  let deepest = 0;
  for (const child of childrenOf(node)) deepest = Math.max(deepest, astDepth(child));
  return deepest + 1;
}

/** Variable names in first-appearance order, without duplicates. */
export function collectVariables(node: AstNode): string[] {
  const names = new Set<string>();
  visit(node, (n) => {
    if (n.type === 'variable') names.add(n.name);
  });
  return [...names];
}

/** Upper-cased function names in first-appearance order, without duplicates. */
export function collectFunctions(node: AstNode): string[] {
  const names = new Set<string>();
  visit(node, (n) => {
    if (n.type === 'call') names.add(n.name.toUpperCase());
  });
  return [...names];
}

function visit(node: AstNode, fn: (node: AstNode) => void): void {
  fn(node);
  for (const child of childrenOf(node)) visit(child, fn);
}

// ── Formatting ──

const BINARY_PRECEDENCE: Record<BinaryOperator, number> = {
  '||': 1,
  '&&': 2,
  '==': 3, '!=': 3, '<': 3, '<=': 3, '>': 3, '>=': 3,
  '+': 4, '-': 4,
  '*': 5, '/': 5, '%': 5,
  '^': 6,
};
const UNARY_PRECEDENCE = 7;
const ATOM_PRECEDENCE = 8;

function precedenceOf(node: AstNode): number {
  switch (node.type) {
    case 'binary':
      return BINARY_PRECEDENCE[node.operator];
    case 'unary':
      return UNARY_PRECEDENCE;
    case 'number':
      return node.value < 0 || Object.is(node.value, -0) ? UNARY_PRECEDENCE : ATOM_PRECEDENCE;
    default:
      return ATOM_PRECEDENCE;
  }
}

/**
 * Print an AST back to formula text with the fewest parentheses that
 * still parse to the same tree.
 */
export function formatExpression(node: AstNode): string {
  switch (node.type) {
    case 'number':
      return Object.is(node.value, -0) ? '-0' : String(node.value);
    case 'boolean':
      return node.value ? 'true' : 'false';
    case 'variable':
      return KEYWORDS.has(node.name.toLowerCase()) || !IDENTIFIER_START.test(node.name[0])
        ? `{${node.name}}`
        : node.name;
    case 'unary':
      return node.operator + wrap(node.operand, UNARY_PRECEDENCE);
    case 'binary': {
      const precedence = BINARY_PRECEDENCE[node.operator];
      // ^ is right-associative and its left operand must be a primary
      const [leftMin, rightMin] = node.operator === '^'
        ? [UNARY_PRECEDENCE, precedence]
        : [precedence, precedence + 1];
      return `${wrap(node.left, leftMin)} ${node.operator} ${wrap(node.right, rightMin)}`;
    }
    case 'call':
      return `${node.name}(${node.args.map(formatExpression).join(', ')})`;
    case 'conditional':
      return `IF(${formatExpression(node.condition)}, ${formatExpression(node.whenTrue)}, ${formatExpression(node.whenFalse)})`;
  }
}

function wrap(node: AstNode, minPrecedence: number): string {
  const text = formatExpression(node);
  return precedenceOf(node) < minPrecedence ? `(${text})` : text;
}
