import type { Logger } from "./obs/log";
import { playMatch } from "./match";
import type { Mark, MatchResult, StrategyName } from "./types";

export type TournamentSummary = {
	games: number;
	seed: number;
	wins: Record<string, number>;
	draws: number;
	/** Games cut short by an illegal or missing move */
	illegal: number;
	avgTurns: number;
};

/**
 * Plays `games` matches seeded `seed + i`. Each strategy keeps its mark; with
 * `swapSeats` the second strategy moves first in odd-numbered games.
 */
export async function runTournament(opts: {
	games: number;
	seed: number;
	seats: [StrategyName, StrategyName];
	marks?: [Mark, Mark];
	swapSeats?: boolean;
	logger?: Logger;
}): Promise<{ summary: TournamentSummary; results: MatchResult[] }> {
	const [first, second] = opts.seats;
	const marks: [Mark, Mark] = opts.marks ?? ["X", "O"];
	const [firstMark, secondMark] = marks;
	const labelFor = (mark: Mark): string =>
		mark === firstMark
			? `${firstMark} (${first})`
			: `${secondMark} (${second})`;

	const results: MatchResult[] = [];
	for (let i = 0; i < opts.games; i++) {
		const matchSeed = (opts.seed + i) >>> 0;
		const swapped = opts.swapSeats === true && i % 2 === 1;
		const r = await playMatch({
			seed: matchSeed,
			seats: swapped ? [second, first] : [first, second],
			marks: swapped ? [secondMark, firstMark] : [firstMark, secondMark],
			logger: opts.logger,
		});
		results.push(r);
	}

	const summary = summarizeResults(results, {
		seed: opts.seed,
		labels: [labelFor(firstMark), labelFor(secondMark)],
		labelFor,
	});
	return { summary, results };
}

/** Tallies finished games; an `illegal` outcome is neither a win nor a draw. */
export function summarizeResults(
	results: readonly MatchResult[],
	opts: {
		seed: number;
		labels: readonly string[];
		labelFor: (mark: Mark) => string;
	},
): TournamentSummary {
	const wins: Record<string, number> = {};
	for (const label of opts.labels) wins[label] = 0;
	let draws = 0;
	let illegal = 0;
	let totalTurns = 0;

	for (const r of results) {
		totalTurns += r.turns;
		if (r.outcome === "illegal") illegal++;
		else if (r.winner == null) draws++;
		else {
			const label = opts.labelFor(r.winner);
			wins[label] = (wins[label] ?? 0) + 1;
		}
	}

	return {
		games: results.length,
		seed: opts.seed,
		wins,
		draws,
		illegal,
		avgTurns: Number((totalTurns / Math.max(1, results.length)).toFixed(2)),
	};
}
