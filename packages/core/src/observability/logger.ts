/**
 * Structured, pluggable logging for mimicode.
 *
 * Level filtering, swappable transports, child loggers and contextual
 * metadata. Entries below the threshold are dropped before any formatting
 * work is done.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
};

const LEVEL_BY_NAME: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
};

/** Level names accepted by settings and the `LOG_LEVEL` variable. */
export type LogLevelName = "debug" | "info" | "warn" | "error";

/** Parse a level name (case-insensitive). Returns undefined for unknown names. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	return LEVEL_BY_NAME[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context merged from the logger and the call site. */
	context: Record<string, unknown>;
	/** Logger name, e.g. "model:chat". */
	logger: string;
	error?: { name: string; message: string; stack?: string };
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to a single ConsoleTransport. */
	transports?: LogTransport[];
	/** Context merged into every entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
};

/**
 * Human-readable single-line output on stderr, coloured when attached to a TTY.
 * Logs go to stderr so they never mix with command output on stdout.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;
	private readonly stream: NodeJS.WritableStream;

	constructor(opts?: { colors?: boolean; stream?: NodeJS.WritableStream }) {
		this.useColors = opts?.colors ?? (process.stderr.isTTY ?? false);
		this.stream = opts?.stream ?? process.stderr;
	}

	write(entry: LogEntry): void {
		const ts = entry.timestamp.slice(11, 23);
		const lvl = entry.levelName.padEnd(5);
		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET} [${entry.logger}] ${entry.message}`
			: `${ts} ${lvl} [${entry.logger}] ${entry.message}`;

		const keys = Object.keys(entry.context);
		if (keys.length > 0) {
			line += " " + keys.map((k) => `${k}=${JSON.stringify(entry.context[k])}`).join(" ");
		}
		if (entry.error) {
			line += `\n  ${entry.error.name}: ${entry.error.message}`;
		}
		this.stream.write(line + "\n");
	}
}

/**
 * One JSON object per line, for piping into log tooling.
 */
export class JsonTransport implements LogTransport {
	private readonly stream: NodeJS.WritableStream;

	constructor(opts?: { stream?: NodeJS.WritableStream }) {
		this.stream = opts?.stream ?? process.stderr;
	}

	write(entry: LogEntry): void {
		this.stream.write(JSON.stringify({
			timestamp: entry.timestamp,
			level: entry.levelName,
			logger: entry.logger,
			message: entry.message,
			...(Object.keys(entry.context).length > 0 ? { context: entry.context } : {}),
			...(entry.error ? { error: entry.error } : {}),
		}) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return LogLevel.WARN;
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports
			?? globalConfig.transports
			?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	/** Log an ERROR message with an optional thrown value. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child` sharing transports and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/** Return a new logger with extra context merged in. */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	private emit(level: LogLevel, message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.level) return;

		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LEVEL_NAMES[level],
			message,
			context: { ...this.context, ...(ctx ?? {}) },
			logger: this.name,
		};

		if (error !== undefined) {
			entry.error = error instanceof Error
				? { name: error.name, message: error.message, stack: error.stack }
				: { name: "Error", message: String(error) };
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch {
				// transport failures never propagate
			}
		}
	}
}

/**
 * Create a named logger with the global defaults.
 *
 * @param name - Module identifier, e.g. "model:completion" or "agent:runner".
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
