// =============================================================================
// AST Builders
// One builder per grammar production, applied by the parser on every reduce
// =============================================================================

import { AstBuildError, GrammarError } from '../errors';
import type { AstNode, BinaryOperator, UnaryOperator } from './ast';
import type { Grammar, Production } from './grammar';
import type { Token } from './token-types';

/** A value on the parser's semantic stack. */
export type ChildNode =
  | { readonly kind: 'token'; readonly token: Token }
  | { readonly kind: 'node'; readonly node: AstNode }
  | { readonly kind: 'args'; readonly args: readonly AstNode[] };

export type BuiltValue = Exclude<ChildNode, { kind: 'token' }>;

export interface AstBuilder {
  readonly name: string;
  /** Number of children the builder takes; must equal the production's rhs length. */
  readonly arity: number;
  build(children: readonly ChildNode[]): BuiltValue;
}

// ── Child access ──

function checkArity(builder: string, expected: number, children: readonly ChildNode[]): void {
  if (children.length !== expected) {
    throw new AstBuildError(
      'ChildCountMismatch',
      `${builder} expects ${expected} children, got ${children.length}`,
      { details: { builder, expected, actual: children.length } },
    );
  }
}

function mismatch(builder: string, index: number, expected: ChildNode['kind'], child: ChildNode): AstBuildError {
  return new AstBuildError(
    'ChildTypeMismatch',
    `${builder} expects a ${expected} at child ${index}, got a ${child.kind}`,
    { details: { builder, index, expected, actual: child.kind } },
  );
}

function tokenAt(builder: string, children: readonly ChildNode[], index: number): Token {
  const child = children[index];
  if (child.kind !== 'token') throw mismatch(builder, index, 'token', child);
  return child.token;
}

function nodeAt(builder: string, children: readonly ChildNode[], index: number): AstNode {
  const child = children[index];
  if (child.kind !== 'node') throw mismatch(builder, index, 'node', child);
  return child.node;
}

function argsAt(builder: string, children: readonly ChildNode[], index: number): readonly AstNode[] {
  const child = children[index];
  if (child.kind !== 'args') throw mismatch(builder, index, 'args', child);
  return child.args;
}

function defineBuilder(name: string, arity: number, build: (children: readonly ChildNode[]) => BuiltValue): AstBuilder {
  return {
    name,
    arity,
    build(children) {
      checkArity(name, arity, children);
      return build(children);
    },
  };
}

const node = (value: AstNode): BuiltValue => ({ kind: 'node', node: value });

// ── Builders ──

/** A → B: pass the single child through. */
export const identity: AstBuilder = defineBuilder('identity', 1, (children) => node(nodeAt('identity', children, 0)));

/** ( Expr ) */
export const parenthesized: AstBuilder = defineBuilder('parenthesized', 3, (children) => {
  tokenAt('parenthesized', children, 0);
  tokenAt('parenthesized', children, 2);
  return node(nodeAt('parenthesized', children, 1));
});

export function binaryOp(operator: BinaryOperator): AstBuilder {
  const name = `binary(${operator})`;
  return defineBuilder(name, 3, (children) => {
    const token = tokenAt(name, children, 1);
    return node({
      type: 'binary',
      operator,
      left: nodeAt(name, children, 0),
      right: nodeAt(name, children, 2),
      position: token.position,
    });
  });
}

export function unaryOp(operator: UnaryOperator, operandIndex = 1): AstBuilder {
  const name = `unary(${operator})`;
  const operatorIndex = operandIndex === 0 ? 1 : 0;
  return defineBuilder(name, 2, (children) => {
    const token = tokenAt(name, children, operatorIndex);
    return node({ type: 'unary', operator, operand: nodeAt(name, children, operandIndex), position: token.position });
  });
}

export const numberLiteral: AstBuilder = defineBuilder('number', 1, (children) => {
  const token = tokenAt('number', children, 0);
  return node({ type: 'number', value: Number(token.value) });
});

/** Both `{name}` and a bare identifier become a variable reference. */
export const variable: AstBuilder = defineBuilder('variable', 1, (children) => {
  const token = tokenAt('variable', children, 0);
  return node({ type: 'variable', name: token.value, position: token.position });
});

export function booleanLiteral(value: boolean): AstBuilder {
  return defineBuilder(`boolean(${value})`, 1, (children) => {
    tokenAt(`boolean(${value})`, children, 0);
    return node({ type: 'boolean', value });
  });
}

/** IDENTIFIER ( Args ) */
export const functionCall: AstBuilder = defineBuilder('functionCall', 4, (children) => {
  const name = tokenAt('functionCall', children, 0);
  return node({ type: 'call', name: name.value, args: argsAt('functionCall', children, 2), position: name.position });
});

/** IDENTIFIER ( ) */
export const functionCallEmpty: AstBuilder = defineBuilder('functionCallEmpty', 3, (children) => {
  const name = tokenAt('functionCallEmpty', children, 0);
  return node({ type: 'call', name: name.value, args: [], position: name.position });
});

/** IF ( Expr , Expr , Expr ) */
export const conditional: AstBuilder = defineBuilder('conditional', 8, (children) => {
  const keyword = tokenAt('conditional', children, 0);
  return node({
    type: 'conditional',
    condition: nodeAt('conditional', children, 2),
    whenTrue: nodeAt('conditional', children, 4),
    whenFalse: nodeAt('conditional', children, 6),
    position: keyword.position,
  });
});

export const argsSingle: AstBuilder = defineBuilder('argsSingle', 1, (children) => ({
  kind: 'args',
  args: [nodeAt('argsSingle', children, 0)],
}));

export const argsMultiple: AstBuilder = defineBuilder('argsMultiple', 3, (children) => ({
  kind: 'args',
  args: [...argsAt('argsMultiple', children, 0), nodeAt('argsMultiple', children, 2)],
}));

// =============================================================================
// Registry
// =============================================================================

export class AstBuilderRegistry {
  private builders: Map<number, AstBuilder> = new Map();

  register(productionId: number, builder: AstBuilder): void {
    if (this.builders.has(productionId)) {
      throw new GrammarError('InvalidGrammar', `Production ${productionId} already has a builder`, {
        details: { productionId },
      });
    }
    this.builders.set(productionId, builder);
  }

  get(productionId: number): AstBuilder | undefined {
    return this.builders.get(productionId);
  }

  has(productionId: number): boolean {
    return this.builders.has(productionId);
  }

  get size(): number {
    return this.builders.size;
  }

  /**
   * Apply the builder registered for a production.
   */
  build(production: Production, children: readonly ChildNode[]): BuiltValue {
    const builder = this.builders.get(production.id);
    if (!builder) {
      throw new GrammarError('InvalidGrammar', `No AST builder for production ${production.id}`, {
        details: { productionId: production.id },
      });
    }
    return builder.build(children);
  }

  /**
   * Check that every production of the grammar, and nothing else, has a
   * builder whose arity matches the production's right-hand side.
   */
  validate(grammar: Grammar): void {
    const problems: string[] = [];
    const ids = new Set(grammar.productions.map((p) => p.id));

    for (const production of grammar.productions) {
      const builder = this.builders.get(production.id);
      if (!builder) {
        problems.push(`production ${production.id} (${production.lhs}) has no builder`);
      } else if (builder.arity !== production.rhs.length) {
        problems.push(
          `builder "${builder.name}" for production ${production.id} takes ${builder.arity} children, production has ${production.rhs.length}`,
        );
      }
    }
    for (const id of this.builders.keys()) {
      if (!ids.has(id)) problems.push(`builder registered for unknown production ${id}`);
    }

    if (problems.length > 0) {
      throw new GrammarError('InvalidGrammar', `AST builder registry does not match grammar: ${problems.join('; ')}`, {
        details: { problems },
      });
    }
  }
}
