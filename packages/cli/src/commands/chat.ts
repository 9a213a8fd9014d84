/**
 * `mimicode chat [message]`: One-shot reply, or a line-based REPL.
 *
 * REPL commands: `/status`, `/history`, `/exit`. Anything else is sent to
 * the chat engine with the `--context` file as code context.
 */

import readline from "node:readline";
import { createModel } from "@mimicode/model";
import type { MimicModel } from "@mimicode/model";
import type { CommandContext } from "../command-context.js";
import { ConsoleChat } from "../console-host.js";
import { loadCodeContext } from "../context-files.js";

export async function run(ctx: CommandContext): Promise<number> {
	const codeContext = loadCodeContext(ctx.args.context, ctx.cwd);
	const model = createModel({
		settings: ctx.settings,
		delay: ctx.delay,
		random: ctx.random,
		logger: ctx.log.child("model"),
	});
	const chat = new ConsoleChat(ctx.out);

	try {
		if (ctx.args.positionals.length > 0) {
			const reply = await model.chat(ctx.args.positionals.join(" "), codeContext);
			ctx.out.line(reply);
			return 0;
		}
		await repl(ctx, model, chat, codeContext);
		return 0;
	} finally {
		model.dispose();
	}
}

async function repl(ctx: CommandContext, model: MimicModel, chat: ConsoleChat, codeContext: string): Promise<void> {
	const input = ctx.io.stdin ?? process.stdin;
	const rl = readline.createInterface({ input, terminal: false });
	const onAbort = () => rl.close();
	ctx.io.signal?.addEventListener("abort", onAbort, { once: true });

	try {
		for await (const raw of rl) {
			const line = raw.trim();
			if (line === "") continue;

			if (line === "/exit") break;

			if (line === "/status") {
				ctx.out.line(JSON.stringify(model.getStatus()));
				continue;
			}

			if (line === "/history") {
				for (const turn of model.getHistory()) {
					ctx.out.line(`${turn.role}: ${turn.content}`);
				}
				continue;
			}

			chat.postMessage("assistant", await model.chat(line, codeContext));
		}
	} finally {
		ctx.io.signal?.removeEventListener("abort", onAbort);
		rl.close();
	}
}
