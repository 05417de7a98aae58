import {
	Board,
	type BoardView,
	CellIndexSchema,
	EngineError,
	MarkSchema,
} from "@noughts/engine";
import { z } from "zod";
import { type Logger, silentLogger } from "./obs/log";
import { mulberry32 } from "./rng";
import { makeStrategySeat } from "./seat";
import { createStrategy } from "./strategies";
import type {
	CellIndex,
	Mark,
	MatchObserver,
	MatchResult,
	MatchStatus,
	MoveRecord,
	Seat,
	StrategyName,
	TerminalStatus,
	TurnResult,
} from "./types";

/**
 * One game between two seats. The match is the only writer of its board:
 * seats see it through `BoardView` and hand back an index, which is checked
 * and applied here. An illegal or missing move aborts the turn and leaves
 * both the board and the turn order untouched.
 */
export class Match {
	private readonly grid: Board;
	private readonly seats: readonly [Seat, Seat];
	private turnIndex: 0 | 1 = 0;
	private current: MatchStatus = { state: "ongoing" };
	private readonly history: MoveRecord[] = [];

	constructor(seats: readonly Seat[], board: Board = new Board()) {
		const [first, second] = seats;
		if (seats.length !== 2 || !first || !second) {
			throw new EngineError(
				"malformed_setup",
				"A match requires exactly two seats.",
				{ seats: seats.length },
			);
		}
		if (first.mark === second.mark) {
			throw new EngineError(
				"malformed_setup",
				`Both seats use mark ${first.mark}.`,
				{ mark: first.mark },
			);
		}
		if (!board.isEmpty()) {
			throw new EngineError(
				"malformed_setup",
				"A match must start on an empty board.",
				{ marks: board.markCount() },
			);
		}
		this.seats = [first, second];
		this.grid = board;
	}

	get board(): BoardView {
		return this.grid;
	}

	get status(): MatchStatus {
		return this.current;
	}

	get activeSeat(): Seat {
		return this.seats[this.turnIndex];
	}

	get moves(): readonly MoveRecord[] {
		return this.history;
	}

	isOver(): boolean {
		return this.current.state !== "ongoing";
	}

	/** Detached copy for observers; later turns do not show through it. */
	snapshot(): BoardView {
		return Board.fromCells(this.grid.cells());
	}

	/** Applies a move for the active seat. */
	commit(move: CellIndex | null): TurnResult {
		const mark = this.activeSeat.mark;
		if (this.isOver()) {
			return {
				ok: false,
				mark,
				move,
				reason: "terminal",
				error: "Match already ended.",
			};
		}
		if (move === null) {
			return {
				ok: false,
				mark,
				move,
				reason: "no_legal_move",
				error: `${this.activeSeat.label} produced no move.`,
			};
		}
		if (!this.grid.isLegal(move)) {
			return {
				ok: false,
				mark,
				move,
				reason: "illegal_move",
				error: `${this.activeSeat.label} chose illegal cell ${String(move)}.`,
			};
		}

		this.grid.apply(move, mark);
		this.history.push({ turn: this.history.length + 1, mark, move });

		const winner = this.grid.winner();
		if (winner) {
			this.current = { state: "won", mark: winner };
		} else if (this.grid.isFull()) {
			this.current = { state: "drawn" };
		} else {
			this.turnIndex = this.turnIndex === 0 ? 1 : 0;
		}
		return { ok: true, mark, move, status: this.current };
	}

	async playTurn(): Promise<TurnResult> {
		if (this.isOver()) return this.commit(null);
		const move = await this.activeSeat.takeTurn(this.grid);
		return this.commit(move);
	}

	/** Plays to the end; a rejected turn is fatal here. */
	async play(observer?: MatchObserver): Promise<TerminalStatus> {
		for (;;) {
			const status = this.current;
			if (status.state !== "ongoing") {
				observer?.onEnd?.({ status, board: this.snapshot() });
				return status;
			}
			const result = await this.playTurn();
			if (!result.ok) {
				throw new EngineError(result.reason, result.error, {
					mark: result.mark,
					move: result.move,
				});
			}
			const record = this.history[this.history.length - 1];
			if (record) {
				observer?.onTurn?.({
					record,
					board: this.snapshot(),
					status: result.status,
				});
			}
		}
	}
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export type SeatSpec = StrategyName | Seat;

export async function playMatch(opts: {
	seed: number;
	seats: [SeatSpec, SeatSpec];
	marks?: [Mark, Mark];
	record?: boolean;
	logger?: Logger;
}): Promise<MatchResult> {
	const logger = opts.logger ?? silentLogger;
	const rng = mulberry32(opts.seed);
	const marks: [Mark, Mark] = opts.marks ?? ["X", "O"];
	const toSeat = (spec: SeatSpec, mark: Mark): Seat =>
		typeof spec === "string"
			? makeStrategySeat(mark, createStrategy(spec, rng))
			: spec;
	const match = new Match([
		toSeat(opts.seats[0], marks[0]),
		toSeat(opts.seats[1], marks[1]),
	]);
	let illegalMoves = 0;

	const complete = (
		winner: Mark | null,
		outcome: MatchResult["outcome"],
	): MatchResult => {
		const status = match.status;
		const result: MatchResult = {
			seed: opts.seed,
			turns: match.moves.length,
			winner,
			outcome,
			illegalMoves,
			log: opts.record
				? {
						seed: opts.seed,
						marks: [...marks],
						moves: match.moves.map((m) => m.move),
						...(status.state === "ongoing" ? {} : { status }),
					}
				: undefined,
		};
		logger.log("info", "match complete", {
			seed: result.seed,
			turns: result.turns,
			winner: result.winner,
			outcome: result.outcome,
		});
		return result;
	};

	while (match.status.state === "ongoing") {
		const seat = match.activeSeat;
		const result = await match.playTurn();
		if (!result.ok) {
			illegalMoves++;
			logger.log("warn", "turn rejected", {
				seat: seat.label,
				move: result.move,
				reason: result.reason,
			});
			return complete(null, "illegal");
		}
		logger.log("debug", "turn", {
			turn: match.moves.length,
			seat: seat.label,
			move: result.move,
		});
	}

	const status = match.status;
	return status.state === "won"
		? complete(status.mark, "won")
		: complete(null, "drawn");
}

// ---------------------------------------------------------------------------
// Replay
// ---------------------------------------------------------------------------

const TerminalStatusSchema = z.discriminatedUnion("state", [
	z.object({ state: z.literal("won"), mark: MarkSchema }),
	z.object({ state: z.literal("drawn") }),
]);

export const MatchLogSchema = z
	.object({
		seed: z.number().int(),
		marks: z.tuple([MarkSchema, MarkSchema]),
		moves: z.array(CellIndexSchema).max(9),
		status: TerminalStatusSchema.optional(),
	})
	.refine((log) => log.marks[0] !== log.marks[1], {
		message: "Seats must use different marks.",
		path: ["marks"],
	});

export type ReplayResult =
	| { ok: true; status: TerminalStatus; turns: number }
	| { ok: false; failedAt?: number; error: string };

function replaySeat(mark: Mark): Seat {
	return {
		mark,
		label: `${mark} (replay)`,
		kind: "strategy",
		takeTurn: () => null,
	};
}

function sameStatus(a: TerminalStatus, b: TerminalStatus): boolean {
	if (a.state === "won" && b.state === "won") return a.mark === b.mark;
	return a.state === b.state;
}

/**
 * Re-applies a recorded log to a fresh board. The moves must reach a
 * finished match; its status is checked against `expected`, or against the
 * status stored in the log when no `expected` is given.
 */
export function replayMatch(
	input: unknown,
	expected?: TerminalStatus,
): ReplayResult {
	const parsed = MatchLogSchema.safeParse(input);
	if (!parsed.success) {
		return {
			ok: false,
			error: `Invalid match log: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
		};
	}
	const log = parsed.data;
	const match = new Match(log.marks.map(replaySeat));

	for (let i = 0; i < log.moves.length; i++) {
		const result = match.commit(log.moves[i] ?? null);
		if (!result.ok) {
			return { ok: false, failedAt: i, error: result.error };
		}
	}

	const status = match.status;
	if (status.state === "ongoing") {
		return { ok: false, error: "Match log ends before the match is over." };
	}
	const want = expected ?? log.status;
	if (want && !sameStatus(want, status)) {
		return { ok: false, error: "Final status mismatch." };
	}
	return { ok: true, status, turns: match.moves.length };
}
