/**
 * Typed error hierarchy for mimicode.
 *
 * Every error raised by a mimicode package extends {@link MimicodeError} and
 * carries a machine-readable `code` next to the human-readable message.
 * The completion and chat engines never throw: these errors belong to the
 * surrounding plumbing (settings, scripts, queues).
 */

/**
 * Base error class for all mimicode errors.
 */
export class MimicodeError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "MimicodeError";
		this.code = code;
	}
}

/**
 * Configuration error (unreadable settings file, invalid JSON, failed validation).
 */
export class ConfigError extends MimicodeError {
	/** Individual problems, one per failing settings path. */
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * A goal script that cannot be read or does not describe valid goals.
 */
export class ScriptError extends MimicodeError {
	readonly scriptPath: string;
	readonly issues: string[];

	constructor(message: string, scriptPath: string, issues: string[] = [], cause?: Error) {
		super(message, "SCRIPT_ERROR", cause);
		this.name = "ScriptError";
		this.scriptPath = scriptPath;
		this.issues = issues;
	}
}

/**
 * The operation was cancelled (queued request cancelled, model disposed).
 */
export class AbortError extends MimicodeError {
	constructor(message = "Operation aborted") {
		super(message, "ABORT_ERROR");
		this.name = "AbortError";
	}
}

/**
 * Misuse of a request queue, such as enqueueing after it was destroyed.
 */
export class QueueError extends MimicodeError {
	constructor(message: string) {
		super(message, "QUEUE_ERROR");
		this.name = "QueueError";
	}
}

/** Normalise an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
