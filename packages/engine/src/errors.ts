/**
 * Engine-level errors. Thrown only when a caller breaks a precondition
 * (applying an illegal move, building a match from a bad setup); ordinary
 * rejections travel as `{ ok: false, reason }` results instead.
 */

export type EngineErrorCode =
	| "illegal_move"
	| "no_legal_move"
	| "malformed_setup"
	| "invalid_board"
	| "terminal";

export class EngineError extends Error {
	readonly code: EngineErrorCode;
	readonly context?: Record<string, unknown>;

	constructor(
		code: EngineErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.name = "EngineError";
		this.code = code;
		this.context = context;
	}
}

export function isEngineError(
	err: unknown,
	code?: EngineErrorCode,
): err is EngineError {
	if (!(err instanceof EngineError)) return false;
	return code === undefined || err.code === code;
}
