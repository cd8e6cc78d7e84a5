// =============================================================================
// Grammar Model
// Symbols, productions and the derived FIRST/nullable sets for table building
// =============================================================================

import { GrammarError } from '../errors';
import { TokenType } from './token-types';

export const AUGMENTED_START = 'START';
export const AUGMENTED_PRODUCTION_ID = -1;

export interface Production {
  readonly id: number;
  readonly lhs: string;
  readonly rhs: readonly string[];
}

export interface GrammarDefinition {
  terminals: Iterable<string>;
  nonTerminals: Iterable<string>;
  startSymbol: string;
  productions: readonly Production[];
  /** Defaults to EOF. Added to the terminal set automatically. */
  endMarker?: string;
}

export class Grammar {
  readonly terminals: ReadonlySet<string>;
  readonly nonTerminals: ReadonlySet<string>;
  readonly startSymbol: string;
  readonly endMarker: string;
  readonly augmentedProduction: Production;

  private readonly productionList: readonly Production[];
  private readonly byId = new Map<number, Production>();
  private readonly byLhs = new Map<string, Production[]>();
  private readonly nullable = new Set<string>();
  private readonly firstSets = new Map<string, Set<string>>();

  constructor(definition: GrammarDefinition) {
    this.endMarker = definition.endMarker ?? TokenType.EOF;
    this.startSymbol = definition.startSymbol;
    this.terminals = new Set([...definition.terminals, this.endMarker]);
    this.nonTerminals = new Set(definition.nonTerminals);
    this.productionList = definition.productions.map((p) => Object.freeze({ id: p.id, lhs: p.lhs, rhs: Object.freeze([...p.rhs]) }));

    this.validate();

    for (const production of this.productionList) {
      this.byId.set(production.id, production);
      const group = this.byLhs.get(production.lhs) ?? [];
      group.push(production);
      this.byLhs.set(production.lhs, group);
    }

    this.augmentedProduction = Object.freeze({
      id: AUGMENTED_PRODUCTION_ID,
      lhs: AUGMENTED_START,
      rhs: Object.freeze([this.startSymbol, this.endMarker]),
    });
    this.byId.set(AUGMENTED_PRODUCTION_ID, this.augmentedProduction);

    this.computeNullable();
    this.computeFirstSets();
  }

  get productions(): readonly Production[] {
    return this.productionList;
  }

  /**
   * Look up a production by id; -1 is the augmented start production.
   */
  production(id: number): Production {
    const production = this.byId.get(id);
    if (!production) {
      throw new GrammarError('InvalidGrammar', `Unknown production id ${id}`, { details: { id } });
    }
    return production;
  }

  productionsFor(nonTerminal: string): readonly Production[] {
    if (nonTerminal === AUGMENTED_START) return [this.augmentedProduction];
    return this.byLhs.get(nonTerminal) ?? [];
  }

  isTerminal(symbol: string): boolean {
    return this.terminals.has(symbol);
  }

  isNonTerminal(symbol: string): boolean {
    return symbol === AUGMENTED_START || this.nonTerminals.has(symbol);
  }

  /** Productions of the form A → A α. */
  leftRecursiveProductions(): Production[] {
    return this.productionList.filter((p) => p.rhs.length > 0 && p.rhs[0] === p.lhs);
  }

  epsilonProductions(): Production[] {
    return this.productionList.filter((p) => p.rhs.length === 0);
  }

  isNullable(symbol: string): boolean {
    return this.nullable.has(symbol);
  }

  first(symbol: string): ReadonlySet<string> {
    if (this.terminals.has(symbol)) return new Set([symbol]);
    return this.firstSets.get(symbol) ?? new Set();
  }

  /**
   * FIRST of a symbol sequence. `nullable` tells whether the whole
   * sequence can derive the empty string.
   */
  firstOfSequence(symbols: readonly string[]): { first: Set<string>; nullable: boolean } {
    const first = new Set<string>();
    for (const symbol of symbols) {
      for (const terminal of this.first(symbol)) first.add(terminal);
      if (!this.nullable.has(symbol)) return { first, nullable: false };
    }
    return { first, nullable: true };
  }

  /**
   * Render the grammar in BNF, one line per nonterminal.
   */
  toBNF(label: (symbol: string) => string = (symbol) => symbol): string {
    const lines: string[] = [];
    for (const [lhs, productions] of this.byLhs) {
      const alternatives = productions.map((p) => (p.rhs.length === 0 ? 'ε' : p.rhs.map(label).join(' ')));
      lines.push(`${lhs} ::= ${alternatives.join(' | ')}`);
    }
    return lines.join('\n');
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  private validate(): void {
    const problems: string[] = [];

    for (const symbol of this.nonTerminals) {
      if (this.terminals.has(symbol)) problems.push(`"${symbol}" is declared as both terminal and nonterminal`);
    }
    if (this.nonTerminals.has(AUGMENTED_START) || this.terminals.has(AUGMENTED_START)) {
      problems.push(`"${AUGMENTED_START}" is reserved for the augmented start production`);
    }
    if (!this.nonTerminals.has(this.startSymbol)) {
      problems.push(`Start symbol "${this.startSymbol}" is not a declared nonterminal`);
    }

    const ids = new Set<number>();
    const defined = new Set<string>();
    for (const production of this.productionList) {
      if (!Number.isInteger(production.id) || production.id < 0) {
        problems.push(`Production id ${production.id} must be a non-negative integer`);
      } else if (ids.has(production.id)) {
        problems.push(`Duplicate production id ${production.id}`);
      }
      ids.add(production.id);

      if (!this.nonTerminals.has(production.lhs)) {
        problems.push(`Production ${production.id}: left-hand side "${production.lhs}" is not a nonterminal`);
      }
      defined.add(production.lhs);

      for (const symbol of production.rhs) {
        if (symbol === this.endMarker) {
          problems.push(`Production ${production.id}: end marker "${symbol}" may not appear on a right-hand side`);
        } else if (!this.terminals.has(symbol) && !this.nonTerminals.has(symbol)) {
          problems.push(`Production ${production.id}: undeclared symbol "${symbol}"`);
        }
      }
    }

    for (const symbol of this.nonTerminals) {
      if (!defined.has(symbol)) problems.push(`Nonterminal "${symbol}" has no productions`);
    }

    if (problems.length > 0) {
      throw new GrammarError('InvalidGrammar', `Invalid grammar: ${problems.join('; ')}`, {
        details: { problems },
      });
    }
  }

  private computeNullable(): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const production of this.productionList) {
        if (this.nullable.has(production.lhs)) continue;
        if (production.rhs.every((symbol) => this.nullable.has(symbol))) {
          this.nullable.add(production.lhs);
          changed = true;
        }
      }
    }
  }

  private computeFirstSets(): void {
    for (const symbol of this.nonTerminals) this.firstSets.set(symbol, new Set());

    let changed = true;
    while (changed) {
      changed = false;
      for (const production of this.productionList) {
        const target = this.firstSets.get(production.lhs);
        if (!target) continue;
        const before = target.size;
        for (const terminal of this.firstOfSequence(production.rhs).first) target.add(terminal);
        if (target.size !== before) changed = true;
      }
    }
  }
}
