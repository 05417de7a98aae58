import { CENTER, CORNERS, type CellIndex, EDGES } from "@noughts/engine";
import { type Rng, shuffle } from "../rng";
import type { Strategy } from "../types";

export type WeightedStrategy = Strategy & {
	/** Remaining queue, front first. */
	pending: () => readonly CellIndex[];
	/** Rebuilds after the initial seed. */
	reseeds: () => number;
};

/**
 * Plays cells by fixed priority: center, then corners, then edges. Cells of
 * the same tier are shuffled once per seed. The queue is consumed front to
 * back and indices that were taken in the meantime are dropped, so a cell is
 * never offered twice per seed; an exhausted queue is rebuilt.
 */
export function makeWeightedStrategy(rng: Rng): WeightedStrategy {
	let queue: CellIndex[] = [];
	let reseedCount = 0;

	const seed = () => {
		queue = [CENTER, ...shuffle(CORNERS, rng), ...shuffle(EDGES, rng)];
	};

	const reseed = () => {
		seed();
		reseedCount++;
	};

	seed();

	return {
		name: "weighted",
		chooseMove: (board) => {
			if (board.legalMoves().length === 0) return null;
			for (;;) {
				let next = queue.shift();
				while (next !== undefined) {
					if (board.isLegal(next)) return next;
					next = queue.shift();
				}
				reseed();
			}
		},
		pending: () => [...queue],
		reseeds: () => reseedCount,
	};
}
