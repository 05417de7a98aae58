import { createInterface } from "node:readline/promises";
import { CellIndexSchema } from "@noughts/engine";
import type { CellIndex, InputSource } from "./types";

export type Ask = (prompt: string) => Promise<string>;

export function parseMoveInput(text: string): CellIndex | null {
	const trimmed = text.trim();
	if (!/^-?\d+$/.test(trimmed)) return null;
	const parsed = CellIndexSchema.safeParse(Number(trimmed));
	return parsed.success ? parsed.data : null;
}

/**
 * Keeps asking until the answer names an open cell, so the seat only ever
 * sees legal indices.
 */
export function makePromptInput(
	ask: Ask,
	say: (line: string) => void = console.log,
): InputSource {
	return {
		requestMove: async (board, mark) => {
			for (;;) {
				const answer = await ask(`Enter your move (${mark}): `);
				const move = parseMoveInput(answer);
				if (move !== null && board.isLegal(move)) return move;
				say("Invalid move. Try again.");
			}
		},
	};
}

export function createConsoleInput(): InputSource & { close: () => void } {
	const rl = createInterface({ input: process.stdin, output: process.stdout });
	const input = makePromptInput((prompt) => rl.question(prompt));
	return { ...input, close: () => rl.close() };
}
