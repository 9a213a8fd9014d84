/**
 * @mimicode/cli: Main orchestration.
 *
 * `main()` parses arguments, loads layered settings, configures logging and
 * routes to a command. It never exits the process itself; the returned
 * number is the exit code:
 *
 *   - 0 on success
 *   - 1 on a {@link MimicodeError} (settings, goal script, context file)
 *   - 2 on a usage error
 */

import {
	ConsoleTransport,
	JsonTransport,
	MimicodeError,
	configureLogging,
	createLogger,
	createRandom,
	instantDelay,
	loadSettings,
	parseLogLevel,
	realDelay,
	resetLoggingConfig,
} from "@mimicode/core";
import { HELP_TEXT, parseArgs } from "./args.js";
import type { CommandName } from "./args.js";
import { UsageError } from "./command-context.js";
import type { CliIO, CommandContext, CommandHandler } from "./command-context.js";
import * as agentCommand from "./commands/agent.js";
import * as chatCommand from "./commands/chat.js";
import * as completeCommand from "./commands/complete.js";
import * as statusCommand from "./commands/status.js";
import { ConsoleWriter } from "./console-host.js";

export const VERSION = "0.1.0";

const HANDLERS: Record<CommandName, CommandHandler> = {
	complete: completeCommand.run,
	chat: chatCommand.run,
	agent: agentCommand.run,
	status: statusCommand.run,
};

function usage(io: CliIO, problems: string[]): number {
	for (const problem of problems) {
		io.stderr.write(`Error: ${problem}\n`);
	}
	io.stderr.write("Run `mimicode --help` for usage information.\n");
	return 2;
}

/**
 * Run the CLI against `io`.
 *
 * @param argv - Arguments without the leading `node` and script entries.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
	const args = parseArgs(argv);

	if (args.version) {
		io.stdout.write(`mimicode v${VERSION}\n`);
		return 0;
	}

	if (args.help) {
		io.stdout.write(HELP_TEXT);
		return 0;
	}

	if (args.errors.length > 0) return usage(io, args.errors);
	if (!args.command) return usage(io, ["No command given"]);

	const cwd = io.cwd ?? process.cwd();
	try {
		const settings = loadSettings({
			projectPath: cwd,
			overrides: { seed: args.seed, logLevel: args.logLevel },
		});

		configureLogging({
			level: parseLogLevel(settings.logLevel),
			transports: [
				args.jsonLogs
					? new JsonTransport({ stream: io.stderr })
					: new ConsoleTransport({ stream: io.stderr, colors: io.colors ?? false }),
			],
		});

		const ctx: CommandContext = {
			args,
			io,
			cwd,
			settings,
			delay: args.instant ? instantDelay : (io.delay ?? realDelay),
			random: createRandom(settings.seed),
			out: new ConsoleWriter(io.stdout, io.colors ?? false),
			log: createLogger("cli"),
		};
		ctx.log.debug("Running command", { command: args.command, seed: settings.seed });

		return await HANDLERS[args.command](ctx);
	} catch (err) {
		if (err instanceof UsageError) return usage(io, [err.message]);
		if (err instanceof MimicodeError) {
			io.stderr.write(`Error: ${err.message}\n`);
			return 1;
		}
		throw err;
	} finally {
		resetLoggingConfig();
	}
}
