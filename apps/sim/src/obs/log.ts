import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export type Logger = {
	log: (level: LogLevel, message: string, fields?: Record<string, unknown>) => void;
};

export const createLogger = (level: LogLevel = "info"): Logger => ({
	log: (msgLevel, message, fields) => {
		if (LEVEL_RANK[msgLevel] < LEVEL_RANK[level]) return;
		const payload = {
			timestamp: new Date().toISOString(),
			level: msgLevel,
			message,
			...(fields ?? {}),
		};

		// eslint-disable-next-line no-console
		console[msgLevel](JSON.stringify(payload));
	},
});

export const silentLogger: Logger = {
	log: () => {},
};
