import { z } from "zod";
import { EngineError } from "./errors";

export { EngineError, isEngineError, type EngineErrorCode } from "./errors";

// 3x3 grid, cells indexed row-major 0..8

export type Mark = "X" | "O";
export type Cell = Mark | null;
export type CellIndex = number;
export type Line = readonly [CellIndex, CellIndex, CellIndex];

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CELL_COUNT = 9;

export const WIN_LINES: readonly Line[] = [
	[0, 1, 2],
	[3, 4, 5],
	[6, 7, 8], // rows
	[0, 3, 6],
	[1, 4, 7],
	[2, 5, 8], // cols
	[0, 4, 8],
	[2, 4, 6], // diagonals
];

export const CENTER: CellIndex = 4;
export const CORNERS: readonly CellIndex[] = [0, 2, 6, 8];
export const EDGES: readonly CellIndex[] = [1, 3, 5, 7];

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const MarkSchema = z.enum(["X", "O"]);
export const CellSchema = MarkSchema.nullable();
export const CellIndexSchema = z
	.number()
	.int()
	.min(0)
	.max(CELL_COUNT - 1);
export const BoardCellsSchema = z.array(CellSchema).length(CELL_COUNT);

export function otherMark(mark: Mark): Mark {
	return mark === "X" ? "O" : "X";
}

// ---------------------------------------------------------------------------
// Board
// ---------------------------------------------------------------------------

/** Read-only surface handed to seats and strategies. */
export interface BoardView {
	isLegal(index: CellIndex): boolean;
	legalMoves(): CellIndex[];
	cell(index: CellIndex): Cell;
	cells(): readonly Cell[];
	isFull(): boolean;
	isEmpty(): boolean;
	markCount(): number;
	winner(): Mark | null;
	winningLine(): Line | null;
}

export class Board implements BoardView {
	private readonly grid: Cell[];

	constructor() {
		this.grid = Array.from({ length: CELL_COUNT }, (): Cell => null);
	}

	static fromCells(cells: readonly unknown[]): Board {
		const parsed = BoardCellsSchema.safeParse(cells);
		if (!parsed.success) {
			throw new EngineError(
				"invalid_board",
				`Board needs ${CELL_COUNT} cells of "X", "O" or null.`,
				{ issues: parsed.error.issues.map((i) => i.message) },
			);
		}
		const board = new Board();
		parsed.data.forEach((cell, i) => {
			board.grid[i] = cell;
		});
		return board;
	}

	isLegal(index: CellIndex): boolean {
		if (!Number.isInteger(index)) return false;
		if (index < 0 || index >= CELL_COUNT) return false;
		return this.grid[index] === null;
	}

	apply(index: CellIndex, mark: Mark): void {
		if (!this.isLegal(index)) {
			throw new EngineError(
				"illegal_move",
				`Cell ${String(index)} is not a legal move.`,
				{ index, mark },
			);
		}
		this.grid[index] = mark;
	}

	legalMoves(): CellIndex[] {
		const moves: CellIndex[] = [];
		for (let i = 0; i < CELL_COUNT; i++) {
			if (this.grid[i] === null) moves.push(i);
		}
		return moves;
	}

	cell(index: CellIndex): Cell {
		return this.grid[index] ?? null;
	}

	cells(): readonly Cell[] {
		return [...this.grid];
	}

	isFull(): boolean {
		return this.grid.every((c) => c !== null);
	}

	isEmpty(): boolean {
		return this.grid.every((c) => c === null);
	}

	markCount(): number {
		return this.grid.filter((c) => c !== null).length;
	}

	winner(): Mark | null {
		const line = this.winningLine();
		return line ? this.cell(line[0]) : null;
	}

	winningLine(): Line | null {
		for (const line of WIN_LINES) {
			const [a, b, c] = line;
			const v = this.grid[a];
			if (v && v === this.grid[b] && v === this.grid[c]) return line;
		}
		return null;
	}
}

// ---------------------------------------------------------------------------
// Render
// ---------------------------------------------------------------------------

export function renderBoard(
	board: BoardView,
	opts?: { showIndices?: boolean },
): string {
	const lines: string[] = [];
	for (let row = 0; row < 3; row++) {
		const cells: string[] = [];
		for (let col = 0; col < 3; col++) {
			const index = row * 3 + col;
			const mark = board.cell(index);
			cells.push(` ${mark ?? (opts?.showIndices ? String(index) : " ")} `);
		}
		lines.push(cells.join("|"));
		if (row < 2) lines.push("-----------");
	}
	return lines.join("\n");
}
