export type Rng = () => number;

export function mulberry32(seed: number): Rng {
	let t = seed >>> 0;
	return function () {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

function pickIndex(length: number, rng: Rng): number {
	const idx = Math.floor(rng() * length);
	return Math.min(Math.max(idx, 0), length - 1);
}

export function pickOne<T>(arr: readonly T[], rng: Rng): T {
	const item = arr[pickIndex(arr.length, rng)];
	if (item === undefined) throw new Error("pickOne called with empty array");
	return item;
}

/**
 * Random permutation built by drawing without replacement: each draw takes
 * `floor(rng() * remaining)` from what is left, so `() => 0` keeps the input
 * order and `() => 0.999` reverses it.
 */
export function shuffle<T>(arr: readonly T[], rng: Rng): T[] {
	const pool = [...arr];
	const out: T[] = [];
	while (pool.length > 0) {
		const [item] = pool.splice(pickIndex(pool.length, rng), 1);
		if (item !== undefined) out.push(item);
	}
	return out;
}
