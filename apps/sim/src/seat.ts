import type { InputSource, Mark, Seat, Strategy } from "./types";

export function makeStrategySeat(
	mark: Mark,
	strategy: Strategy,
	label = `${mark} (${strategy.name})`,
): Seat {
	return {
		mark,
		label,
		kind: "strategy",
		takeTurn: (board) => strategy.chooseMove(board),
	};
}

export function makeHumanSeat(
	mark: Mark,
	input: InputSource,
	label = `${mark} (human)`,
): Seat {
	return {
		mark,
		label,
		kind: "human",
		takeTurn: (board) => input.requestMove(board, mark),
	};
}
