import { readFileSync, writeFileSync } from "node:fs";
import { renderBoard } from "@noughts/engine";
import minimist from "minimist";
import { type Args, type CliOptions, loadCliOptions } from "./config";
import { createConsoleInput } from "./humanInput";
import { Match, playMatch, replayMatch } from "./match";
import { createLogger, type Logger } from "./obs/log";
import { mulberry32 } from "./rng";
import { makeHumanSeat, makeStrategySeat } from "./seat";
import { createStrategy } from "./strategies";
import { runTournament } from "./tournament";
import type { Mark, SeatType } from "./types";

function printUsageAndExit(error?: string): never {
	if (error) {
		console.error(error);
		console.error("");
	}
	console.error("Usage:");
	console.error("  tsx src/cli.ts play    --x human --o weighted --seed 1");
	console.error("  tsx src/cli.ts single  --x weighted --o random --seed 1 --log match.json");
	console.error("  tsx src/cli.ts tourney --games 100 --seed 1 --swap");
	console.error("  tsx src/cli.ts replay  --file match.json");
	console.error("");
	console.error("Seat types: human (play only), first-open, random, weighted");
	console.error("  --logLevel L  debug, info, warn, error (or NOUGHTS_LOG_LEVEL)");
	process.exit(1);
}

type OptionsFor<C extends CliOptions["command"]> = Extract<
	CliOptions,
	{ command: C }
>;

async function handlePlayCommand(options: OptionsFor<"play">): Promise<void> {
	const rng = mulberry32(options.seed);
	const consoleInput =
		options.x === "human" || options.o === "human"
			? createConsoleInput()
			: undefined;
	const seatFor = (mark: Mark, type: SeatType) => {
		if (type !== "human") {
			return makeStrategySeat(mark, createStrategy(type, rng));
		}
		if (!consoleInput) throw new Error("Console input is not open.");
		return makeHumanSeat(mark, consoleInput);
	};

	const match = new Match([seatFor("X", options.x), seatFor("O", options.o)]);
	console.log(renderBoard(match.board, { showIndices: true }));
	try {
		const status = await match.play({
			onTurn: ({ record, board }) => {
				console.log("");
				console.log(`${record.mark} -> ${record.move}`);
				console.log(renderBoard(board));
			},
		});
		console.log("");
		console.log(status.state === "won" ? `${status.mark} wins!` : "It's a draw!");
	} finally {
		consoleInput?.close();
	}
}

async function handleSingleCommand(
	options: OptionsFor<"single">,
	logger: Logger,
): Promise<void> {
	const result = await playMatch({
		seed: options.seed,
		seats: [options.x, options.o],
		record: options.log !== undefined,
		logger,
	});
	if (options.log && result.log) {
		writeFileSync(options.log, `${JSON.stringify(result.log, null, 2)}\n`);
		logger.log("info", "match log written", { file: options.log });
	}
	const { log: _, ...printable } = result;
	console.log(JSON.stringify(printable, null, 2));
}

async function handleTourneyCommand(
	options: OptionsFor<"tourney">,
	logger: Logger,
): Promise<void> {
	const { summary } = await runTournament({
		games: options.games,
		seed: options.seed,
		seats: [options.x, options.o],
		swapSeats: options.swap,
		logger,
	});
	console.log(JSON.stringify(summary, null, 2));
}

function handleReplayCommand(file: string): void {
	const payload: unknown = JSON.parse(readFileSync(file, "utf-8"));
	const verdict = replayMatch(payload);
	console.log(JSON.stringify(verdict, null, 2));
	if (!verdict.ok) process.exit(1);
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), { boolean: ["swap"] });
	const loaded = loadCliOptions(argv);
	if (!loaded.ok) printUsageAndExit(loaded.error);
	const options = loaded.options;
	const logger = createLogger(options.logLevel);

	switch (options.command) {
		case "play":
			await handlePlayCommand(options);
			return;
		case "single":
			await handleSingleCommand(options, logger);
			return;
		case "tourney":
			await handleTourneyCommand(options, logger);
			return;
		case "replay":
			handleReplayCommand(options.file);
			return;
	}
}

main().catch((e) => {
	console.error(e);
	process.exit(1);
});
