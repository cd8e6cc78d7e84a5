// =============================================================================
// Constant Folding
// Collapses variable-free subtrees into literals before evaluation
// =============================================================================

import type { AstNode } from './ast';
import { toBoolean } from './coercion';
import type { EvaluationContext } from './evaluation-context';
import type { Evaluator } from './evaluator';

function isLiteral(node: AstNode): boolean {
  return node.type === 'number' || node.type === 'boolean';
}

function literal(value: unknown): AstNode | undefined {
  if (typeof value === 'number') return { type: 'number', value };
  if (typeof value === 'boolean') return { type: 'boolean', value };
  return undefined;
}

export class ConstantFolder {
  /**
   * `ctx` carries the mode and limits to fold under; its variables are
   * ignored because only variable-free subtrees are folded.
   */
  constructor(
    private readonly evaluator: Evaluator,
    private readonly ctx: EvaluationContext,
  ) {}

  /**
   * Return an equivalent tree with constant subtrees replaced by literals.
   * A subtree whose evaluation fails is kept as is so the error surfaces
   * when the formula is evaluated.
   */
  fold(node: AstNode): AstNode {
    switch (node.type) {
      case 'number':
      case 'boolean':
      case 'variable':
        return node;

      case 'unary': {
        const operand = this.fold(node.operand);
        const next = operand === node.operand ? node : { ...node, operand };
        return isLiteral(operand) ? this.tryEvaluate(next) : next;
      }

      case 'binary': {
        const left = this.fold(node.left);
        const right = this.fold(node.right);
        const next = left === node.left && right === node.right ? node : { ...node, left, right };

        if (isLiteral(left) && isLiteral(right)) return this.tryEvaluate(next);

        // false && x, true || x
        if ((node.operator === '&&' || node.operator === '||') && (left.type === 'number' || left.type === 'boolean')) {
          const truthy = toBoolean(left.value, this.ctx.strictMode);
          if (!truthy && node.operator === '&&') return { type: 'boolean', value: false };
          if (truthy && node.operator === '||') return { type: 'boolean', value: true };
        }
        return next;
      }

      case 'call': {
        const original = node.args;
        const args = original.map((arg) => this.fold(arg));
        const changed = args.some((arg, i) => arg !== original[i]);
        const next = changed ? { ...node, args } : node;
        return args.every(isLiteral) ? this.tryEvaluate(next) : next;
      }

      case 'conditional': {
        const condition = this.fold(node.condition);
        if (condition.type === 'number' || condition.type === 'boolean') {
          return this.fold(toBoolean(condition.value, this.ctx.strictMode) ? node.whenTrue : node.whenFalse);
        }
        return {
          ...node,
          condition,
          whenTrue: this.fold(node.whenTrue),
          whenFalse: this.fold(node.whenFalse),
        };
      }
    }
  }

  private tryEvaluate(node: AstNode): AstNode {
    const result = this.evaluator.evaluate(node, this.ctx);
    if (!result.success) return node;
    return literal(result.value) ?? node;
  }
}
