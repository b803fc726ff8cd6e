import type { NodeResult } from "./types.js";

interface CacheEntry {
  readonly identity: string;
  readonly stamp: string;
  readonly generation: number;
  readonly result: NodeResult;
}

/** Runtime statistics exposed by the cache for diagnostics and tests. */
export interface EvaluationCacheStats {
  size: number;
  generation: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface RekeyOutcome {
  retained: number;
  evicted: number;
}

/**
 * Memoises node results keyed by identity path. An entry answers a lookup
 * only while its version stamp matches the node's current stamp; a new
 * generation keeps every entry whose identity still exists and evicts the
 * rest. The executor is the single writer.
 */
export class EvaluationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /** Returns the cached result when the stored stamp matches. */
  get(identity: string, stamp: string): NodeResult | undefined {
    const entry = this.entries.get(identity);
    if (!entry || entry.stamp !== stamp) {
      this.misses += 1;
      return undefined;
    }
    this.hits += 1;
    return entry.result;
  }

  /** Reads an entry without touching the counters. */
  peek(identity: string): { stamp: string; generation: number; result: NodeResult } | undefined {
    const entry = this.entries.get(identity);
    return entry ? { stamp: entry.stamp, generation: entry.generation, result: entry.result } : undefined;
  }

  /** Stores a result for the current generation, replacing any previous one. */
  set(identity: string, stamp: string, result: NodeResult): void {
    this.entries.set(identity, { identity, stamp, generation: this.generation, result });
  }

  /**
   * Moves the cache to a new generation. Entries whose identity disappeared
   * from the new proto graph are evicted; the others are carried over and
   * keep answering as long as their stamps still match.
   */
  rekey(generation: number, identities: ReadonlySet<string>): RekeyOutcome {
    let retained = 0;
    let evicted = 0;
    for (const [identity, entry] of Array.from(this.entries)) {
      if (identities.has(identity)) {
        this.entries.set(identity, { ...entry, generation });
        retained += 1;
      } else {
        this.entries.delete(identity);
        evicted += 1;
      }
    }
    this.generation = generation;
    this.evictions += evicted;
    return { retained, evicted };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): EvaluationCacheStats {
    return {
      size: this.entries.size,
      generation: this.generation,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
