import { IMMEDIATE_BUCKET } from './buckets';
import { ConfigurationError } from './errors';

export interface PlanEntry {
  readonly queryName: string;
  readonly bucketName: string;
}

export interface PlanDispatch {
  entry: PlanEntry;
  /** Cursor value consumed by this dispatch, starting at 0. */
  index: number;
  /** Offset of `entry` within the query's entries. */
  position: number;
  /** Number of completed passes over the entries before this dispatch. */
  cycle: number;
}

export interface ExecutionPlanOptions {
  queryNames: readonly string[];
  hasBucket: (name: string) => boolean;
}

/**
 * Infinite view over one query's plan entries. The cursor only moves
 * forward; the event loop serialises `next()` calls, so concurrent workers
 * sharing a sequence each receive a distinct index.
 */
export class PlanSequence implements Iterable<PlanDispatch> {
  readonly queryName: string;
  private readonly entries: readonly PlanEntry[];
  private cursor = 0;

  constructor(queryName: string, entries: readonly PlanEntry[]) {
    if (entries.length === 0) {
      throw new ConfigurationError(`Execution plan has no entries for query '${queryName}'`);
    }
    this.queryName = queryName;
    this.entries = entries;
  }

  get length(): number {
    return this.entries.length;
  }

  /** Number of entries handed out so far. */
  get dispatched(): number {
    return this.cursor;
  }

  peek(): PlanEntry {
    return this.entries[this.cursor % this.entries.length];
  }

  next(): PlanDispatch {
    const index = this.cursor;
    this.cursor += 1;
    const position = index % this.entries.length;
    return {
      entry: this.entries[position],
      index,
      position,
      cycle: Math.floor(index / this.entries.length)
    };
  }

  *[Symbol.iterator](): Iterator<PlanDispatch> {
    while (true) {
      yield this.next();
    }
  }
}

export class ExecutionPlan {
  private readonly byQuery: ReadonlyMap<string, readonly PlanEntry[]>;
  readonly entries: readonly PlanEntry[];

  private constructor(entries: readonly PlanEntry[], byQuery: ReadonlyMap<string, readonly PlanEntry[]>) {
    this.entries = entries;
    this.byQuery = byQuery;
  }

  /**
   * Splits the global plan into per-query lists, preserving order. Every
   * problem is collected and reported together.
   */
  static fromEntries(entries: readonly PlanEntry[], options: ExecutionPlanOptions): ExecutionPlan {
    const issues: string[] = [];
    const byQuery = new Map<string, PlanEntry[]>();
    const normalized: PlanEntry[] = [];
    for (const name of options.queryNames) {
      byQuery.set(name, []);
    }

    entries.forEach((raw, index) => {
      const entry: PlanEntry = Object.freeze({ queryName: raw.queryName.trim(), bucketName: raw.bucketName.trim() });
      const target = byQuery.get(entry.queryName);
      if (!target) {
        issues.push(`executionPlan[${index}] references undefined query '${entry.queryName}'`);
        return;
      }
      if (entry.bucketName !== IMMEDIATE_BUCKET && !options.hasBucket(entry.bucketName)) {
        issues.push(`executionPlan[${index}] references undefined time bucket '${entry.bucketName}'`);
        return;
      }
      target.push(entry);
      normalized.push(entry);
    });

    for (const [queryName, list] of byQuery) {
      if (list.length === 0) {
        issues.push(`query '${queryName}' has no execution plan entries`);
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid execution plan', issues);
    }
    return new ExecutionPlan(Object.freeze(normalized), byQuery);
  }

  queryNames(): string[] {
    return [...this.byQuery.keys()];
  }

  entriesFor(queryName: string): readonly PlanEntry[] {
    const list = this.byQuery.get(queryName);
    if (!list) {
      throw new Error(`Query '${queryName}' is not part of the execution plan`);
    }
    return list;
  }

  /** Counts of entries per bucket for one query. */
  distribution(queryName: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const entry of this.entriesFor(queryName)) {
      counts.set(entry.bucketName, (counts.get(entry.bucketName) ?? 0) + 1);
    }
    return counts;
  }

  /** Returns a fresh sequence; each executor owns exactly one. */
  sequence(queryName: string): PlanSequence {
    return new PlanSequence(queryName, this.entriesFor(queryName));
  }
}
