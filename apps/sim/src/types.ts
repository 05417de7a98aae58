import type { BoardView, CellIndex, Mark } from "@noughts/engine";

export type { BoardView, CellIndex, Mark } from "@noughts/engine";

export type StrategyName = "first-open" | "random" | "weighted";
export type SeatType = "human" | StrategyName;

/** `null` means the board has no legal move left. */
export type Strategy = {
	name: StrategyName;
	chooseMove: (board: BoardView) => CellIndex | null;
};

/** Source of human moves; must only ever resolve to a legal index. */
export type InputSource = {
	requestMove: (board: BoardView, mark: Mark) => Promise<CellIndex>;
};

export type Seat = {
	mark: Mark;
	label: string;
	kind: "human" | "strategy";
	takeTurn: (
		board: BoardView,
	) => CellIndex | null | Promise<CellIndex | null>;
};

export type MatchStatus =
	| { state: "ongoing" }
	| { state: "won"; mark: Mark }
	| { state: "drawn" };

export type TerminalStatus = Exclude<MatchStatus, { state: "ongoing" }>;

export type TurnRejection = "illegal_move" | "no_legal_move" | "terminal";

export type TurnResult =
	| { ok: true; mark: Mark; move: CellIndex; status: MatchStatus }
	| {
			ok: false;
			mark: Mark;
			move: CellIndex | null;
			reason: TurnRejection;
			error: string;
	  };

export type MoveRecord = { turn: number; mark: Mark; move: CellIndex };

export type MatchObserver = {
	onTurn?: (event: {
		record: MoveRecord;
		board: BoardView;
		status: MatchStatus;
	}) => void;
	onEnd?: (event: {
		status: TerminalStatus;
		board: BoardView;
	}) => void;
};

export type MatchLog = {
	seed: number;
	marks: [Mark, Mark];
	moves: CellIndex[];
	/** Present once the match finished */
	status?: TerminalStatus;
};

export type MatchResult = {
	seed: number;
	turns: number;
	winner: Mark | null;
	outcome: "won" | "drawn" | "illegal";
	illegalMoves: number;
	log?: MatchLog;
};
