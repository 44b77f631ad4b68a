import type { Filter } from "../cache/filter.js";
import { intersectRanges } from "../cache/range.js";
import type { BlockRange } from "../types/index.js";

export interface InFlightFetch {
  identity: string;
  filter: Filter;
  range: BlockRange;
  /** Settles (never rejects) once the owner committed or gave up */
  settled: Promise<void>;
}

export interface Claim {
  readonly fetch: InFlightFetch;
  release(): void;
}

/**
 * Gap fetches currently running, per identity.
 *
 * Two fetches conflict when their ranges overlap and their filters are
 * comparable under subsumption; disjoint filters and other identities never wait.
 */
export class InFlightRegistry {
  private readonly byIdentity = new Map<string, Set<InFlightFetch>>();

  conflicts(identity: string, filter: Filter, range: BlockRange): InFlightFetch[] {
    const running = this.byIdentity.get(identity);
    if (!running) return [];
    return [...running].filter(
      (other) =>
        intersectRanges(other.range, range) !== null && other.filter.comparableWith(filter),
    );
  }

  /**
   * Registers a fetch. Callers check `conflicts` first, with no await in between.
   */
  claim(identity: string, filter: Filter, range: BlockRange): Claim {
    let settle: () => void = () => {};
    const settled = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const fetch: InFlightFetch = { identity, filter, range: { ...range }, settled };

    let running = this.byIdentity.get(identity);
    if (!running) {
      running = new Set();
      this.byIdentity.set(identity, running);
    }
    running.add(fetch);

    let released = false;
    return {
      fetch,
      release: () => {
        if (released) return;
        released = true;
        const set = this.byIdentity.get(identity);
        set?.delete(fetch);
        if (set?.size === 0) this.byIdentity.delete(identity);
        settle();
      },
    };
  }

  get size(): number {
    let total = 0;
    for (const running of this.byIdentity.values()) total += running.size;
    return total;
  }
}
