// =============================================================================
// Parse Table Builder
// Canonical LR(1) collection, LALR(1) state merging and ACTION/GOTO tables
// =============================================================================

import { GrammarError } from '../errors';
import { AUGMENTED_PRODUCTION_ID, Grammar } from './grammar';
import { CompressedLRState, LRItem, canMergeLALR, compareItems, itemSetKey } from './lr-items';

export type ParseAction =
  | { readonly type: 'shift'; readonly state: number }
  | { readonly type: 'reduce'; readonly production: number }
  | { readonly type: 'accept' }
  | { readonly type: 'error' };

export interface TableConflict {
  state: number;
  symbol: string;
  kind: 'shift-reduce' | 'reduce-reduce';
  actions: ParseAction[];
}

export interface LR1State {
  readonly id: number;
  readonly items: readonly LRItem[];
  readonly core: CompressedLRState;
  /** symbol → target state id */
  readonly transitions: ReadonlyMap<string, number>;
}

export interface ParseTableStats {
  canonicalStateCount: number;
  stateCount: number;
  /** Same-core merges refused because they would have added a conflict. */
  rejectedMerges: number;
  buildTimeMs: number;
}

export interface ParseTableJSON {
  states: Array<{
    actions: Record<string, ParseAction>;
    gotos: Record<string, number>;
  }>;
}

export interface ParseTableBuilderOptions {
  /** Merge same-core states (LALR). When false the canonical LR(1) table is emitted. */
  lalr?: boolean;
}

const ERROR_ACTION: ParseAction = Object.freeze({ type: 'error' });

// =============================================================================
// ParseTable
// =============================================================================

export class ParseTable {
  constructor(
    private readonly actions: ReadonlyArray<ReadonlyMap<string, ParseAction>>,
    private readonly gotos: ReadonlyArray<ReadonlyMap<string, number>>,
    readonly stats: Readonly<ParseTableStats>,
  ) {}

  get stateCount(): number {
    return this.actions.length;
  }

  action(state: number, terminal: string): ParseAction {
    return this.actions[state]?.get(terminal) ?? ERROR_ACTION;
  }

  goto(state: number, nonTerminal: string): number | undefined {
    return this.gotos[state]?.get(nonTerminal);
  }

  /** Terminals with a non-error action in the given state, sorted. */
  expectedTerminals(state: number): string[] {
    return [...(this.actions[state]?.keys() ?? [])].sort();
  }

  toJSON(): ParseTableJSON {
    return {
      states: this.actions.map((row, state) => ({
        actions: Object.fromEntries([...row].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
        gotos: Object.fromEntries([...(this.gotos[state] ?? new Map<string, number>())].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
      })),
    };
  }
}

// =============================================================================
// Builder
// =============================================================================

export class ParseTableBuilder {
  private readonly grammar: Grammar;
  private readonly lalr: boolean;
  private readonly lookaheadCache = new Map<string, readonly string[]>();
  private rejectedMerges = 0;

  constructor(grammar: Grammar, options: ParseTableBuilderOptions = {}) {
    this.grammar = grammar;
    this.lalr = options.lalr ?? true;
  }

  /**
   * Build the ACTION/GOTO table. Throws GrammarConflict listing every
   * conflicting cell when the grammar is not LALR(1).
   */
  build(): ParseTable {
    const startedAt = Date.now();
    this.rejectedMerges = 0;

    const canonical = this.buildCanonicalCollection();
    const states = this.lalr ? this.mergeStates(canonical) : canonical;

    const actions: Array<Map<string, ParseAction>> = [];
    const gotos: Array<Map<string, number>> = [];
    const conflicts: TableConflict[] = [];

    for (const state of states) {
      const row = new Map<string, ParseAction>();
      const cells = new Map<string, ParseAction[]>();

      const put = (symbol: string, action: ParseAction) => {
        const existing = cells.get(symbol) ?? [];
        if (!existing.some((a) => sameAction(a, action))) existing.push(action);
        cells.set(symbol, existing);
      };

      for (const item of state.items) {
        const next = item.nextSymbol;
        if (next === undefined) {
          put(item.lookahead, { type: 'reduce', production: item.production.id });
        } else if (next === this.grammar.endMarker && item.production.id === AUGMENTED_PRODUCTION_ID) {
          put(next, { type: 'accept' });
        } else if (this.grammar.isTerminal(next)) {
          const target = state.transitions.get(next);
          if (target !== undefined) put(next, { type: 'shift', state: target });
        }
      }

      for (const [symbol, cellActions] of cells) {
        if (cellActions.length > 1) {
          conflicts.push({
            state: state.id,
            symbol,
            kind: cellActions.every((a) => a.type === 'reduce') ? 'reduce-reduce' : 'shift-reduce',
            actions: cellActions,
          });
        }
        row.set(symbol, Object.freeze(cellActions[0]));
      }

      const gotoRow = new Map<string, number>();
      for (const [symbol, target] of state.transitions) {
        if (this.grammar.isNonTerminal(symbol)) gotoRow.set(symbol, target);
      }

      actions.push(row);
      gotos.push(gotoRow);
    }

    if (conflicts.length > 0) {
      const summary = conflicts
        .map((c) => `state ${c.state} on ${c.symbol}: ${c.kind} (${c.actions.map(describeAction).join(' / ')})`)
        .join('; ');
      throw new GrammarError('GrammarConflict', `Grammar is not LALR(1): ${summary}`, {
        details: { conflicts },
      });
    }

    return new ParseTable(actions, gotos, Object.freeze({
      canonicalStateCount: canonical.length,
      stateCount: states.length,
      rejectedMerges: this.rejectedMerges,
      buildTimeMs: Date.now() - startedAt,
    }));
  }

  /**
   * Canonical LR(1) collection, numbered in breadth-first discovery order
   * starting from the closure of [START → • S $, $].
   */
  buildCanonicalCollection(): LR1State[] {
    const start = this.closure([new LRItem(this.grammar.augmentedProduction, 0, this.grammar.endMarker)]);

    const states: Array<{ id: number; items: LRItem[]; core: CompressedLRState; transitions: Map<string, number> }> = [];
    const index = new Map<string, number>();

    const intern = (items: LRItem[]): number => {
      const key = itemSetKey(items);
      const known = index.get(key);
      if (known !== undefined) return known;
      const id = states.length;
      states.push({ id, items, core: CompressedLRState.fromItems(items), transitions: new Map() });
      index.set(key, id);
      return id;
    };

    intern(start);

    for (let i = 0; i < states.length; i++) {
      const state = states[i];
      for (const symbol of nextSymbols(state.items)) {
        if (symbol === this.grammar.endMarker) continue;
        const target = intern(this.goto(state.items, symbol));
        state.transitions.set(symbol, target);
      }
      state.core.markAsBuilt();
    }

    return states;
  }

  // ===========================================================================
  // Closure & GOTO
  // ===========================================================================

  private closure(kernel: readonly LRItem[]): LRItem[] {
    const items = new Map<string, LRItem>();
    const pending = [...kernel];

    while (pending.length > 0) {
      const item = pending.pop();
      if (!item || items.has(item.key)) continue;
      items.set(item.key, item);

      const next = item.nextSymbol;
      if (next === undefined || !this.grammar.isNonTerminal(next)) continue;

      const lookaheads = this.lookaheadsAfter(item);
      for (const production of this.grammar.productionsFor(next)) {
        for (const lookahead of lookaheads) {
          const candidate = new LRItem(production, 0, lookahead);
          if (!items.has(candidate.key)) pending.push(candidate);
        }
      }
    }

    return [...items.values()].sort(compareItems);
  }

  /** FIRST(β a) for an item [A → α • B β, a]. */
  private lookaheadsAfter(item: LRItem): readonly string[] {
    const key = item.key;
    const cached = this.lookaheadCache.get(key);
    if (cached) return cached;

    const { first, nullable } = this.grammar.firstOfSequence(item.rest);
    if (nullable) first.add(item.lookahead);
    const result = [...first].sort();
    this.lookaheadCache.set(key, result);
    return result;
  }

  private goto(items: readonly LRItem[], symbol: string): LRItem[] {
    const kernel = items.filter((item) => item.nextSymbol === symbol).map((item) => item.advance());
    return this.closure(kernel);
  }

  // ===========================================================================
  // LALR merging
  // ===========================================================================

  private mergeStates(canonical: readonly LR1State[]): LR1State[] {
    // 1. Greedy merge inside each core group
    const block = new Array<number>(canonical.length);
    const buckets: Array<{ members: number[]; items: LRItem[] }> = [];
    const bucketsByCore = new Map<string, number[]>();

    for (const state of canonical) {
      const candidates = bucketsByCore.get(state.core.signature) ?? [];
      let placed = false;
      for (const bucketId of candidates) {
        const bucket = buckets[bucketId];
        if (canMergeLALR(bucket.items, state.items)) {
          bucket.members.push(state.id);
          bucket.items = unionItems(bucket.items, state.items);
          block[state.id] = bucketId;
          placed = true;
          break;
        }
      }
      if (!placed) {
        if (candidates.length > 0) this.rejectedMerges++;
        const bucketId = buckets.length;
        buckets.push({ members: [state.id], items: [...state.items] });
        candidates.push(bucketId);
        bucketsByCore.set(state.core.signature, candidates);
        block[state.id] = bucketId;
      }
    }

    // 2. Split blocks whose members disagree on where a symbol leads
    let blockCount = buckets.length;
    let changed = true;
    while (changed) {
      changed = false;
      const next = new Array<number>(canonical.length);
      const signatures = new Map<string, number>();
      let count = 0;
      for (const state of canonical) {
        const targets = [...state.transitions].map(([symbol, target]) => `${symbol}>${block[target]}`).sort();
        const signature = `${block[state.id]}#${targets.join(',')}`;
        let id = signatures.get(signature);
        if (id === undefined) {
          id = count++;
          signatures.set(signature, id);
        }
        next[state.id] = id;
      }
      if (count !== blockCount) {
        changed = true;
        blockCount = count;
      }
      for (let i = 0; i < next.length; i++) block[i] = next[i];
    }

    // 3. Renumber blocks by their lowest canonical state so state 0 stays the start
    const order = new Map<number, number>();
    for (const state of canonical) {
      if (!order.has(block[state.id])) order.set(block[state.id], order.size);
    }

    const merged: Array<{ id: number; items: LRItem[]; members: LR1State[] }> = [];
    for (const state of canonical) {
      const id = order.get(block[state.id]) ?? 0;
      if (!merged[id]) merged[id] = { id, items: [], members: [] };
      merged[id].items = unionItems(merged[id].items, state.items);
      merged[id].members.push(state);
    }

    return merged.map((entry) => {
      const transitions = new Map<string, number>();
      for (const [symbol, target] of entry.members[0].transitions) {
        transitions.set(symbol, order.get(block[target]) ?? 0);
      }
      const core = CompressedLRState.fromItems(entry.items);
      core.markAsBuilt();
      return { id: entry.id, items: entry.items, core, transitions };
    });
  }
}

// ── Helpers ──

function nextSymbols(items: readonly LRItem[]): string[] {
  const symbols: string[] = [];
  for (const item of items) {
    const next = item.nextSymbol;
    if (next !== undefined && !symbols.includes(next)) symbols.push(next);
  }
  return symbols;
}

function unionItems(a: readonly LRItem[], b: readonly LRItem[]): LRItem[] {
  const items = new Map<string, LRItem>();
  for (const item of a) items.set(item.key, item);
  for (const item of b) items.set(item.key, item);
  return [...items.values()].sort(compareItems);
}

function sameAction(a: ParseAction, b: ParseAction): boolean {
  if (a.type === 'shift' && b.type === 'shift') return a.state === b.state;
  if (a.type === 'reduce' && b.type === 'reduce') return a.production === b.production;
  return a.type === b.type;
}

export function describeAction(action: ParseAction): string {
  switch (action.type) {
    case 'shift':
      return `shift ${action.state}`;
    case 'reduce':
      return `reduce ${action.production}`;
    case 'accept':
      return 'accept';
    case 'error':
      return 'error';
  }
}
