/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

export function createRandomSource(seed?: number): RandomSource {
	return seed === undefined ? Math.random : mulberry32(seed);
}

/**
 * Uniform sample of `count` items without replacement (partial
 * Fisher-Yates). When there are no more than `count` items the input is
 * returned unchanged, in its original order.
 */
export function sampleWithoutReplacement<T>(
	items: readonly T[],
	count: number,
	random: RandomSource,
): T[] {
	if (items.length <= count) return [...items];

	const pool = [...items];
	for (let i = 0; i < count; i++) {
		const j = i + Math.floor(random() * (pool.length - i));
		const picked = pool[j];
		pool[j] = pool[i];
		pool[i] = picked;
	}
	return pool.slice(0, count);
}
