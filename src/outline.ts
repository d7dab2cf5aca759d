export const MAX_DEPTH = 9;

/**
 * Outline numbering counters, one per depth level.
 *
 * Counter 0 starts at 1, so `advance` reports the number a header holds
 * before its own increment: the first depth-1 header reads "1".
 */
export class OutlinePosition {
  private counters: number[] = [];

  constructor() {
    this.reset();
  }

  reset(): void {
    this.counters = new Array<number>(MAX_DEPTH).fill(0);
    this.counters[0] = 1;
  }

  /**
   * Return the ordinal for a header at `depth` (1-based), then bump the
   * counter at `depth - 1` and clear everything deeper.
   */
  advance(depth: number): string {
    if (!Number.isInteger(depth) || depth < 1 || depth > MAX_DEPTH) {
      throw new RangeError(`Outline depth must be between 1 and ${MAX_DEPTH}, got ${depth}`);
    }

    const ordinal = this.ordinal(depth);

    this.counters[depth - 1] += 1;
    for (let i = depth; i < MAX_DEPTH; i++) {
      this.counters[i] = 0;
    }

    return ordinal;
  }

  /** Current counters, copied */
  snapshot(): number[] {
    return [...this.counters];
  }

  private ordinal(depth: number): string {
    const parts: number[] = [];
    for (let i = 0; i < depth; i++) {
      if (this.counters[i] === 0) break;
      parts.push(this.counters[i]);
    }
    return parts.join('.');
  }
}
