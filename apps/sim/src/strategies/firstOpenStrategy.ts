import { CELL_COUNT } from "@noughts/engine";
import type { Strategy } from "../types";

export function makeFirstOpenStrategy(): Strategy {
	return {
		name: "first-open",
		chooseMove: (board) => {
			for (let i = 0; i < CELL_COUNT; i++) {
				if (board.isLegal(i)) return i;
			}
			return null;
		},
	};
}
