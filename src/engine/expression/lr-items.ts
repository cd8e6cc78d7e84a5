// =============================================================================
// LR Items
// LR(1) items, lookahead-free state cores and the LALR merge check
// =============================================================================

import { GrammarError } from '../errors';
import type { Production } from './grammar';

export class LRItem {
  /** Identity of the item: production, dot and lookahead. */
  readonly key: string;
  /** Identity without the lookahead. */
  readonly coreKey: string;

  constructor(
    readonly production: Production,
    readonly dot: number,
    readonly lookahead: string,
  ) {
    if (!Number.isInteger(dot) || dot < 0 || dot > production.rhs.length) {
      throw new GrammarError('InvalidGrammar', `Dot position ${dot} is outside production ${production.id}`, {
        details: { productionId: production.id, dot },
      });
    }
    this.coreKey = `${production.id}:${dot}`;
    this.key = `${this.coreKey}:${lookahead}`;
  }

  get nextSymbol(): string | undefined {
    return this.production.rhs[this.dot];
  }

  get isComplete(): boolean {
    return this.dot === this.production.rhs.length;
  }

  /** Symbols after the one following the dot. */
  get rest(): readonly string[] {
    return this.production.rhs.slice(this.dot + 1);
  }

  advance(): LRItem {
    return new LRItem(this.production, this.dot + 1, this.lookahead);
  }

  equals(other: LRItem): boolean {
    return this.key === other.key;
  }

  toString(): string {
    const rhs = [...this.production.rhs];
    rhs.splice(this.dot, 0, '•');
    return `[${this.production.lhs} → ${rhs.join(' ')}, ${this.lookahead}]`;
  }
}

/** Deterministic item order: production id, then dot, then lookahead. */
export function compareItems(a: LRItem, b: LRItem): number {
  return a.production.id - b.production.id
    || a.dot - b.dot
    || (a.lookahead < b.lookahead ? -1 : a.lookahead > b.lookahead ? 1 : 0);
}

export function itemSetKey(items: readonly LRItem[]): string {
  return [...items].sort(compareItems).map((item) => item.key).join('|');
}

// =============================================================================
// Compressed state
// =============================================================================

export interface CoreItem {
  readonly production: Production;
  readonly dot: number;
}

/**
 * The lookahead-free core of an LR(1) state. Two states with the same
 * signature are LALR merge candidates.
 */
export class CompressedLRState {
  readonly coreItems: readonly CoreItem[];
  readonly signature: string;
  private built = false;

  constructor(coreItems: readonly CoreItem[]) {
    if (coreItems.length === 0) {
      throw new GrammarError('EmptyCoreItems', 'A compressed LR state needs at least one core item');
    }

    const unique = new Map<string, CoreItem>();
    for (const item of coreItems) unique.set(`${item.production.id}:${item.dot}`, item);

    this.coreItems = Object.freeze([...unique.values()]);
    this.signature = [...unique.keys()].sort().join('|');
  }

  static fromItems(items: Iterable<LRItem>): CompressedLRState {
    return new CompressedLRState([...items].map((item) => ({ production: item.production, dot: item.dot })));
  }

  get isBuilt(): boolean {
    return this.built;
  }

  /** Transitions out of this state have been computed. */
  markAsBuilt(): void {
    this.built = true;
  }

  hasSameCore(other: CompressedLRState): boolean {
    return this.signature === other.signature;
  }
}

// =============================================================================
// Conflicts & merging
// =============================================================================

export interface ItemConflict {
  symbol: string;
  kind: 'shift-reduce' | 'reduce-reduce';
  /** Ids of the productions that would be reduced. */
  productions: number[];
}

/**
 * Conflicts visible inside one item set. Lookaheads are always terminals,
 * so a shift conflicts with a reduce exactly when the symbol after the dot
 * equals the reduce item's lookahead.
 */
export function findItemConflicts(items: Iterable<LRItem>): ItemConflict[] {
  const reduces = new Map<string, Set<number>>();
  const shifts = new Set<string>();

  for (const item of items) {
    const next = item.nextSymbol;
    if (next === undefined) {
      const set = reduces.get(item.lookahead) ?? new Set<number>();
      set.add(item.production.id);
      reduces.set(item.lookahead, set);
    } else {
      shifts.add(next);
    }
  }

  const conflicts: ItemConflict[] = [];
  for (const [symbol, productions] of reduces) {
    const ids = [...productions].sort((a, b) => a - b);
    if (ids.length > 1) conflicts.push({ symbol, kind: 'reduce-reduce', productions: ids });
    if (shifts.has(symbol)) conflicts.push({ symbol, kind: 'shift-reduce', productions: ids });
  }
  return conflicts;
}

function conflictKeys(items: Iterable<LRItem>): Set<string> {
  return new Set(findItemConflicts(items).map((c) => `${c.symbol}:${c.kind}:${c.productions.join(',')}`));
}

/**
 * Two LR(1) item sets may be merged when they share a core and the union
 * has no conflict that neither of them had on its own.
 */
export function canMergeLALR(a: readonly LRItem[], b: readonly LRItem[]): boolean {
  if (a.length === 0 || b.length === 0) return false;
  if (!CompressedLRState.fromItems(a).hasSameCore(CompressedLRState.fromItems(b))) return false;

  const existing = new Set([...conflictKeys(a), ...conflictKeys(b)]);
  for (const key of conflictKeys([...a, ...b])) {
    if (!existing.has(key)) return false;
  }
  return true;
}
