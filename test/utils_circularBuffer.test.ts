import { describe, it, expect } from "vitest";
import { CircularBuffer } from "../src/utils/circularBuffer.js";

describe("utils/CircularBuffer", () => {
    it("keeps items oldest first until full", () => {
        const buffer = new CircularBuffer<number>(3);
        buffer.push(1);
        buffer.push(2);

        expect(buffer.length).toBe(2);
        expect(buffer.isFull).toBe(false);
        expect(buffer.toArray()).toEqual([1, 2]);
        expect(buffer.at(0)).toBe(1);
        expect(buffer.newest()).toBe(2);
    });

    it("evicts the oldest item when pushing into a full buffer", () => {
        const buffer = new CircularBuffer<number>(3);
        buffer.push(1);
        buffer.push(2);
        buffer.push(3);

        const evicted = buffer.push(4);

        expect(evicted).toBe(1);
        expect(buffer.toArray()).toEqual([2, 3, 4]);
        expect(buffer.length).toBe(3);
    });

    it("returns undefined from push while there is room", () => {
        const buffer = new CircularBuffer<string>(2);
        expect(buffer.push("a")).toBeUndefined();
    });

    it("shifts in FIFO order across the wrap point", () => {
        const buffer = new CircularBuffer<number>(2);
        buffer.push(1);
        buffer.push(2);
        buffer.push(3);

        expect(buffer.shift()).toBe(2);
        buffer.push(4);
        expect(buffer.shift()).toBe(3);
        expect(buffer.shift()).toBe(4);
        expect(buffer.shift()).toBeUndefined();
        expect(buffer.length).toBe(0);
    });

    it("indexes relative to the oldest item", () => {
        const buffer = new CircularBuffer<number>(3);
        for (const value of [10, 20, 30, 40]) buffer.push(value);

        expect(buffer.at(0)).toBe(20);
        expect(buffer.at(2)).toBe(40);
        expect(buffer.at(3)).toBeUndefined();
        expect(buffer.at(-1)).toBeUndefined();
        expect(buffer.at(0.5)).toBeUndefined();
    });

    it("clears all items", () => {
        const buffer = new CircularBuffer<number>(2);
        buffer.push(1);
        buffer.clear();

        expect(buffer.length).toBe(0);
        expect(buffer.toArray()).toEqual([]);
        expect(buffer.newest()).toBeUndefined();
    });

    it("rejects non-positive capacities", () => {
        expect(() => new CircularBuffer<number>(0)).toThrow(RangeError);
        expect(() => new CircularBuffer<number>(1.5)).toThrow(RangeError);
    });
});
