import type minimist from "minimist";
import { z } from "zod";
import { LogLevelSchema } from "./obs/log";
import { STRATEGY_NAMES } from "./strategies";

export const StrategyNameSchema = z.enum(STRATEGY_NAMES);
export const SeatTypeSchema = z.union([z.literal("human"), StrategyNameSchema]);

/** Seat for the automated commands, where a human cannot sit. */
const automatedSeat = (key: "x" | "o") =>
	z.enum(STRATEGY_NAMES, {
		errorMap: (_issue, ctx) => ({
			message:
				ctx.data === "human"
					? `--${key} human is only available for play`
					: ctx.defaultError,
		}),
	});

const BaseOptionsSchema = z.object({
	/** Seat that plays X and moves first */
	x: automatedSeat("x"),
	/** Seat that plays O */
	o: automatedSeat("o"),
	seed: z.coerce.number().int(),
	games: z.coerce.number().int().positive(),
	swap: z.boolean(),
	/** Write the single-match log to this file */
	log: z.string().min(1).optional(),
	/** Match log to replay */
	file: z.string().min(1).optional(),
	logLevel: LogLevelSchema,
});

export const CliOptionsSchema = z.discriminatedUnion("command", [
	BaseOptionsSchema.extend({
		command: z.literal("play"),
		x: SeatTypeSchema,
		o: SeatTypeSchema,
	}),
	BaseOptionsSchema.extend({ command: z.literal("single") }),
	BaseOptionsSchema.extend({ command: z.literal("tourney") }),
	BaseOptionsSchema.extend({
		command: z.literal("replay"),
		file: z.string({ required_error: "--file is required for replay" }).min(1),
	}),
]);

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type Args = ReturnType<typeof minimist>;

function stringArg(argv: Args, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = argv[key];
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
}

export function loadCliOptions(
	argv: Args,
	env: NodeJS.ProcessEnv = process.env,
):
	| { ok: true; options: CliOptions }
	| { ok: false; error: string } {
	const command = argv._[0];
	const interactive = command === "play";
	const parsed = CliOptionsSchema.safeParse({
		command,
		x: stringArg(argv, "x") ?? (interactive ? "human" : "weighted"),
		o: stringArg(argv, "o") ?? (interactive ? "first-open" : "random"),
		seed: argv.seed ?? 1,
		games: argv.games ?? 100,
		swap: argv.swap === true,
		log: stringArg(argv, "log"),
		file: stringArg(argv, "file"),
		logLevel: stringArg(argv, "logLevel") ?? env.NOUGHTS_LOG_LEVEL ?? "info",
	});
	if (!parsed.success) {
		return {
			ok: false,
			error: parsed.error.issues
				.map((issue) =>
					issue.path.length > 0
						? `${issue.path.join(".")}: ${issue.message}`
						: issue.message,
				)
				.join("\n"),
		};
	}
	return { ok: true, options: parsed.data };
}
