import minimist from "minimist";
import { describe, expect, test } from "vitest";
import { loadCliOptions } from "../src/config";

const load = (args: string[], env: NodeJS.ProcessEnv = {}) =>
	loadCliOptions(minimist(args, { boolean: ["swap"] }), env);

describe("loadCliOptions", () => {
	test("automated commands default to weighted against random", () => {
		expect(load(["single"])).toEqual({
			ok: true,
			options: {
				command: "single",
				x: "weighted",
				o: "random",
				seed: 1,
				games: 100,
				swap: false,
				log: undefined,
				file: undefined,
				logLevel: "info",
			},
		});
	});

	test("play defaults to a human against first-open", () => {
		const loaded = load(["play"]);
		expect(loaded.ok && loaded.options.x).toBe("human");
		expect(loaded.ok && loaded.options.o).toBe("first-open");
	});

	test("reads numbers, flags and the log level", () => {
		const loaded = load(
			["tourney", "--games", "25", "--seed", "7", "--swap", "--logLevel", "debug"],
		);
		expect(loaded.ok).toBe(true);
		if (!loaded.ok) return;
		expect(loaded.options.games).toBe(25);
		expect(loaded.options.seed).toBe(7);
		expect(loaded.options.swap).toBe(true);
		expect(loaded.options.logLevel).toBe("debug");
	});

	test("falls back to NOUGHTS_LOG_LEVEL", () => {
		const loaded = load(["single"], { NOUGHTS_LOG_LEVEL: "warn" });
		expect(loaded.ok && loaded.options.logLevel).toBe("warn");
	});

	test("rejects human seats outside play", () => {
		expect(load(["tourney", "--x", "human"])).toEqual({
			ok: false,
			error: "x: --x human is only available for play",
		});
	});

	test("only play seats humans", () => {
		expect(load(["single", "--o", "human"])).toEqual({
			ok: false,
			error: "o: --o human is only available for play",
		});
		const loaded = load(["play", "--x", "random", "--o", "human"]);
		expect(loaded.ok && loaded.options.x).toBe("random");
		expect(loaded.ok && loaded.options.o).toBe("human");
	});

	test("replay needs a file", () => {
		expect(load(["replay"])).toEqual({
			ok: false,
			error: "file: --file is required for replay",
		});
		const loaded = load(["replay", "--file", "match.json"]);
		expect(loaded.ok && loaded.options.file).toBe("match.json");
	});

	test("rejects unknown commands and seat types", () => {
		expect(load(["bogus"]).ok).toBe(false);
		expect(load(["single", "--o", "minimax"]).ok).toBe(false);
		expect(load(["tourney", "--games", "0"]).ok).toBe(false);
	});
});
