/**
 * `mimicode agent`: Run the goal runner against console collaborators.
 */

import { AgentGoalRunner, getDefaultGoals, loadGoalScript } from "@mimicode/agent";
import path from "node:path";
import type { CommandContext } from "../command-context.js";
import { ConsoleChat, ConsoleEditor, ConsoleTerminal } from "../console-host.js";

export async function run(ctx: CommandContext): Promise<number> {
	const goals = ctx.args.script
		? loadGoalScript(path.resolve(ctx.cwd, ctx.args.script))
		: getDefaultGoals();

	const editor = new ConsoleEditor(ctx.out);
	const terminal = new ConsoleTerminal(ctx.out);
	const chat = new ConsoleChat(ctx.out);

	const runner = new AgentGoalRunner({
		editor,
		terminal,
		chat,
		goals,
		timings: ctx.settings.agent,
		delay: ctx.delay,
		random: ctx.random,
		logger: ctx.log.child("agent"),
		maxGoals: ctx.args.goals,
	});

	const signal = ctx.io.signal;
	if (signal?.aborted) return 0;
	const onAbort = () => runner.stop();
	signal?.addEventListener("abort", onAbort, { once: true });

	terminal.logRaw("Agent terminal initialized...");
	chat.postMessage("assistant", "Agent initialized. Ready to code.");

	try {
		await runner.start();
	} finally {
		signal?.removeEventListener("abort", onAbort);
	}

	const { goalsCompleted } = runner.getState();
	ctx.out.line(ctx.out.paint.dim(`Agent stopped after ${goalsCompleted} goal${goalsCompleted === 1 ? "" : "s"}.`));
	return 0;
}
