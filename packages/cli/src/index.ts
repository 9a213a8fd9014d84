/**
 * @mimicode/cli: Public API re-exports.
 *
 * The package primarily serves as the `mimicode` binary. These exports let
 * other hosts drive the same commands programmatically.
 */

export { parseArgs, HELP_TEXT } from "./args.js";
export type { CommandName, ParsedArgs } from "./args.js";
export { main, VERSION } from "./main.js";
export { UsageError } from "./command-context.js";
export type { CliIO, CommandContext, CommandHandler } from "./command-context.js";
export {
	ConsoleChat,
	ConsoleEditor,
	ConsolePopup,
	ConsoleTerminal,
	ConsoleWriter,
	formatCandidate,
} from "./console-host.js";
export { loadCodeContext } from "./context-files.js";
