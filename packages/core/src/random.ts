/**
 * Injectable random sources.
 *
 * Pool selection, latency jitter and simulated timings all draw from a
 * {@link RandomSource}; a fixed seed makes every reply and every agent
 * cadence reproducible.
 */

export interface RandomSource {
	/** Next pseudo-random number in [0, 1). */
	next(): number;
}

/**
 * Xorshift32 PRNG. Not cryptographic, only reproducible.
 */
export class Xorshift32 implements RandomSource {
	private state: number;

	constructor(seed: number) {
		this.state = seed | 0 || 1; // zero is a fixed point
	}

	next(): number {
		let x = this.state;
		x ^= x << 13;
		x ^= x >> 17;
		x ^= x << 5;
		this.state = x;
		return (x >>> 0) / 0x1_0000_0000;
	}
}

/** The platform generator. */
export const mathRandom: RandomSource = {
	next: () => Math.random(),
};

/**
 * Replay a fixed list of values, cycling when exhausted. Meant for tests
 * that need to steer every random decision.
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
	let i = 0;
	return {
		next() {
			if (values.length === 0) return 0;
			const value = values[i % values.length];
			i++;
			return value;
		},
	};
}

/** Create a seeded source when a seed is given, the platform one otherwise. */
export function createRandom(seed?: number): RandomSource {
	return seed === undefined ? mathRandom : new Xorshift32(seed);
}

/** Uniform float in [min, max). */
export function uniform(random: RandomSource, min: number, max: number): number {
	return min + (max - min) * random.next();
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
	return min + Math.floor(random.next() * (max - min + 1));
}

/** True with probability `p`. */
export function chance(random: RandomSource, p: number): boolean {
	return random.next() < p;
}

/**
 * Pick one element uniformly. The pool must not be empty.
 */
export function pick<T>(random: RandomSource, pool: readonly [T, ...T[]]): T {
	const index = Math.min(pool.length - 1, Math.floor(random.next() * pool.length));
	return pool[index] ?? pool[0];
}
