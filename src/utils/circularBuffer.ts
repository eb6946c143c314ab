/**
 * Fixed-capacity ring buffer. Pushing into a full buffer evicts the oldest item.
 */
export class CircularBuffer<T> {
    private readonly buffer: Array<T | undefined>;
    private head = 0;
    private size = 0;

    constructor(private readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(
                `CircularBuffer capacity must be a positive integer, got ${capacity}`
            );
        }
        this.buffer = new Array<T | undefined>(capacity);
    }

    /**
     * Append an item. Returns the evicted oldest item when the buffer was full.
     */
    push(item: T): T | undefined {
        let evicted: T | undefined;
        if (this.size === this.capacity) {
            evicted = this.buffer[this.head];
            this.buffer[this.head] = undefined;
            this.head = (this.head + 1) % this.capacity;
            this.size--;
        }

        this.buffer[(this.head + this.size) % this.capacity] = item;
        this.size++;
        return evicted;
    }

    /**
     * Remove and return the oldest item.
     */
    shift(): T | undefined {
        if (this.size === 0) return undefined;
        const item = this.buffer[this.head];
        this.buffer[this.head] = undefined;
        this.head = (this.head + 1) % this.capacity;
        this.size--;
        return item;
    }

    /**
     * Random-access by relative index (0 = oldest, length-1 = newest).
     */
    at(index: number): T | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            return undefined;
        }
        return this.buffer[(this.head + index) % this.capacity];
    }

    newest(): T | undefined {
        return this.at(this.size - 1);
    }

    toArray(): T[] {
        const result: T[] = [];
        for (let i = 0; i < this.size; i++) {
            const item = this.at(i);
            if (item !== undefined) result.push(item);
        }
        return result;
    }

    clear(): void {
        this.buffer.fill(undefined);
        this.head = 0;
        this.size = 0;
    }

    get length(): number {
        return this.size;
    }

    get isFull(): boolean {
        return this.size === this.capacity;
    }
}
