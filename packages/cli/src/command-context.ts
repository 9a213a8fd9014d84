import { MimicodeError } from "@mimicode/core";
import type { DelayPolicy, Logger, MimicodeSettings, RandomSource } from "@mimicode/core";
import type { ParsedArgs } from "./args.js";
import type { ConsoleWriter } from "./console-host.js";

/** Streams and hooks `main` runs against; the binary passes the process's own. */
export interface CliIO {
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
	/** Read by the chat REPL. */
	stdin?: NodeJS.ReadableStream;
	/** Directory holding `mimicode.json`; relative paths resolve against it. */
	cwd?: string;
	/** Aborting it stops a running agent or REPL. */
	signal?: AbortSignal;
	/** Delay policy when `--instant` is absent. Defaults to real timers. */
	delay?: DelayPolicy;
	colors?: boolean;
}

export interface CommandContext {
	args: ParsedArgs;
	io: CliIO;
	cwd: string;
	settings: MimicodeSettings;
	delay: DelayPolicy;
	random: RandomSource;
	out: ConsoleWriter;
	log: Logger;
}

export type CommandHandler = (ctx: CommandContext) => Promise<number>;

/** Bad invocation; `main` exits with code 2. */
export class UsageError extends MimicodeError {
	constructor(message: string) {
		super(message, "USAGE_ERROR");
		this.name = "UsageError";
	}
}
