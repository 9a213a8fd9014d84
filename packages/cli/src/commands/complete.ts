/**
 * `mimicode complete <line>`: Print completion candidates, one per line.
 */

import { createModel } from "@mimicode/model";
import { UsageError } from "../command-context.js";
import type { CommandContext } from "../command-context.js";
import { ConsolePopup } from "../console-host.js";
import { loadCodeContext } from "../context-files.js";

export async function run(ctx: CommandContext): Promise<number> {
	if (ctx.args.positionals.length === 0) {
		throw new UsageError("complete needs the line to complete, e.g. mimicode complete \"import ma\"");
	}
	const currentLine = ctx.args.positionals.join(" ");
	const fullContext = loadCodeContext(ctx.args.context, ctx.cwd);
	const lineNumber = fullContext === "" ? 0 : fullContext.split("\n").length - 1;

	const model = createModel({
		settings: ctx.settings,
		delay: ctx.delay,
		random: ctx.random,
		logger: ctx.log.child("model"),
	});
	try {
		const candidates = await model.complete({
			fullContext,
			currentLine,
			cursor: { line: lineNumber, column: currentLine.length },
		});
		new ConsolePopup(ctx.out).showCandidates(candidates);
		return 0;
	} finally {
		model.dispose();
	}
}
