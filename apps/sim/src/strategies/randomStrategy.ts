import { pickOne, type Rng } from "../rng";
import type { Strategy } from "../types";

export function makeRandomStrategy(rng: Rng): Strategy {
	return {
		name: "random",
		chooseMove: (board) => {
			const legal = board.legalMoves();
			return legal.length > 0 ? pickOne(legal, rng) : null;
		},
	};
}
