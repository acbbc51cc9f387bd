import { describe, expect, it } from "vitest";
import {
	createRandomSource,
	mulberry32,
	sampleWithoutReplacement,
} from "../lib/random";

const items = ["a", "b", "c", "d", "e", "f"];

describe("mulberry32", () => {
	it("repeats the same sequence for the same seed", () => {
		const first = mulberry32(42);
		const second = mulberry32(42);
		const a = [first(), first(), first()];
		const b = [second(), second(), second()];
		expect(a).toEqual(b);
	});

	it("stays within [0, 1)", () => {
		const random = mulberry32(7);
		for (let i = 0; i < 1000; i++) {
			const value = random();
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});

	it("falls back to Math.random without a seed", () => {
		expect(createRandomSource()).toBe(Math.random);
	});
});

describe("sampleWithoutReplacement", () => {
	it("returns every item in order when there are not more than requested", () => {
		expect(sampleWithoutReplacement(items.slice(0, 5), 5, () => 0.5)).toEqual(
			["a", "b", "c", "d", "e"],
		);
		expect(sampleWithoutReplacement(["x"], 5, () => 0.5)).toEqual(["x"]);
		expect(sampleWithoutReplacement([], 5, () => 0.5)).toEqual([]);
	});

	it("takes the leading items when the source always returns 0", () => {
		expect(sampleWithoutReplacement(items, 5, () => 0)).toEqual([
			"a",
			"b",
			"c",
			"d",
			"e",
		]);
	});

	it("swaps from the tail when the source returns values near 1", () => {
		expect(sampleWithoutReplacement(items, 5, () => 0.999999)).toEqual([
			"f",
			"a",
			"b",
			"c",
			"d",
		]);
	});

	it("draws distinct members of the input and leaves the input untouched", () => {
		const source = Array.from({ length: 20 }, (_, i) => `artist-${i}`);
		const snapshot = [...source];
		for (let seed = 1; seed <= 50; seed++) {
			const sample = sampleWithoutReplacement(source, 5, mulberry32(seed));
			expect(sample).toHaveLength(5);
			expect(new Set(sample).size).toBe(5);
			for (const picked of sample) {
				expect(source).toContain(picked);
			}
		}
		expect(source).toEqual(snapshot);
	});
});
