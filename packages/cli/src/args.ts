/**
 * @mimicode/cli: Argument parser.
 *
 * Simple CLI argument parser with no external dependencies. Problems with
 * flag values are collected in `errors` rather than thrown, so `main` can
 * report every one of them with a usage exit code.
 */

import type { LogLevelName } from "@mimicode/core";

export type CommandName = "complete" | "chat" | "agent" | "status";

export interface ParsedArgs {
	command?: CommandName;
	/** Positional arguments after the command. */
	positionals: string[];
	context?: string;
	goals?: number;
	script?: string;
	seed?: number;
	instant?: boolean;
	jsonLogs?: boolean;
	logLevel?: LogLevelName;
	help?: boolean;
	version?: boolean;
	errors: string[];
}

const COMMANDS: readonly CommandName[] = ["complete", "chat", "agent", "status"];

function isCommand(value: string): value is CommandName {
	return COMMANDS.some((c) => c === value);
}

function toLogLevelName(value: string): LogLevelName | undefined {
	const lower = value.trim().toLowerCase();
	return lower === "debug" || lower === "info" || lower === "warn" || lower === "error" ? lower : undefined;
}

function parseInteger(raw: string | undefined): number | undefined {
	if (raw === undefined || !/^-?\d+$/.test(raw)) return undefined;
	return Number.parseInt(raw, 10);
}

/**
 * Parse argv (without the leading `node` and script entries).
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = { positionals: [], errors: [] };

	let i = 0;
	const takeValue = (flag: string): string | undefined => {
		const value = argv[i + 1];
		if (value === undefined || (value.startsWith("-") && value.length > 1 && !/^-\d/.test(value))) {
			result.errors.push(`${flag} requires a value`);
			i++;
			return undefined;
		}
		i += 2;
		return value;
	};

	while (i < argv.length) {
		const arg = argv[i];

		// ─── Flags with values ──────────────────────────────────────────
		if (arg === "--context") {
			result.context = takeValue(arg);
			continue;
		}

		if (arg === "--script") {
			result.script = takeValue(arg);
			continue;
		}

		if (arg === "--goals") {
			const raw = takeValue(arg);
			if (raw === undefined) continue;
			const goals = parseInteger(raw);
			if (goals === undefined || goals < 1) {
				result.errors.push(`--goals expects a positive integer, got "${raw}"`);
			} else {
				result.goals = goals;
			}
			continue;
		}

		if (arg === "--seed") {
			const raw = takeValue(arg);
			if (raw === undefined) continue;
			const seed = parseInteger(raw);
			if (seed === undefined) {
				result.errors.push(`--seed expects an integer, got "${raw}"`);
			} else {
				result.seed = seed;
			}
			continue;
		}

		if (arg === "--log-level") {
			const raw = takeValue(arg);
			if (raw === undefined) continue;
			const level = toLogLevelName(raw);
			if (level === undefined) {
				result.errors.push(`--log-level expects debug, info, warn or error, got "${raw}"`);
			} else {
				result.logLevel = level;
			}
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--instant") {
			result.instant = true;
			i++;
			continue;
		}

		if (arg === "--json-logs") {
			result.jsonLogs = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		if (arg.startsWith("-") && arg.length > 1) {
			result.errors.push(`Unknown option: ${arg}`);
			i++;
			continue;
		}

		// ─── Command and positionals ────────────────────────────────────
		if (result.command === undefined && result.positionals.length === 0) {
			if (isCommand(arg)) {
				result.command = arg;
			} else {
				result.errors.push(`Unknown command: ${arg}`);
			}
		} else {
			result.positionals.push(arg);
		}
		i++;
	}

	return result;
}

export const HELP_TEXT = `
mimicode — a rule-driven fake language model for editor simulations

Usage:
  mimicode complete <line> [--context <file>]    Print completion candidates, one per line
  mimicode chat [message] [--context <file>]     One-shot reply, or a REPL without a message
  mimicode agent [--goals <n>] [--script <file>] Run the autonomous goal runner (Ctrl+C stops)
  mimicode status                                Print the model status as JSON

Options:
  --context <file>     Code the engines see as the editor buffer
  --goals <n>          Stop the agent after n completed goals
  --script <file>      Goal script (JSON) replacing the bundled goals
  --seed <n>           Seed every random decision
  --instant            Skip all simulated latency
  --json-logs          Write logs to stderr as JSON lines
  --log-level <level>  debug, info, warn or error
  -h, --help           Show this help
  -v, --version        Show the version

REPL commands:
  /status    Model status
  /history   Conversation so far
  /exit      Leave the REPL
`;
