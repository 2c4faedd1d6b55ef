/**
 * Frequency counter that remembers the order in which keys were first seen.
 * Ties are always resolved in favour of the earlier key.
 */
export class Tally<K> {
    private readonly counts = new Map<K, number>();

    add(key: K): void {
        this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    }

    /** Entries in first-seen order. */
    entries(): [K, number][] {
        return [...this.counts.entries()];
    }

    /** Highest count, first-seen key on ties. Undefined when empty. */
    mostCommon(): [K, number] | undefined {
        let best: [K, number] | undefined;
        for (const [key, count] of this.counts) {
            if (!best || count > best[1]) best = [key, count];
        }
        return best;
    }

    /** Count descending; Array#sort is stable so ties keep first-seen order. */
    ranked(): [K, number][] {
        return this.entries().sort((a, b) => b[1] - a[1]);
    }
}
