/**
 * SortedKeySet - Ordered set backed by a sorted array
 * Membership and insertion use binary search; iteration is always in key order.
 */
export class SortedKeySet<T> implements Iterable<T> {
    private readonly items: T[] = [];

    constructor(
        private readonly compare: (a: T, b: T) => number,
        initial: Iterable<T> = [],
    ) {
        for (const item of initial) {
            this.add(item);
        }
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Insert a key; returns false if an equal key is already present
     */
    add(item: T): boolean {
        const index = this.lowerBound(item);
        if (index < this.items.length && this.compare(this.items[index], item) === 0) {
            return false;
        }
        this.items.splice(index, 0, item);
        return true;
    }

    has(item: T): boolean {
        const index = this.lowerBound(item);
        return index < this.items.length && this.compare(this.items[index], item) === 0;
    }

    values(): T[] {
        return [...this.items];
    }

    [Symbol.iterator](): Iterator<T> {
        return this.items[Symbol.iterator]();
    }

    private lowerBound(item: T): number {
        let low = 0;
        let high = this.items.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (this.compare(this.items[mid], item) < 0) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }
}
