/**
 * `mimicode status`: Print the model status as JSON.
 */

import { createModel } from "@mimicode/model";
import type { CommandContext } from "../command-context.js";

export async function run(ctx: CommandContext): Promise<number> {
	const model = createModel({
		settings: ctx.settings,
		delay: ctx.delay,
		random: ctx.random,
		logger: ctx.log.child("model"),
	});
	const { temperature, topP, windowLimit } = ctx.settings.model;
	ctx.out.line(JSON.stringify({ ...model.getStatus(), windowLimit, temperature, topP }, null, 2));
	model.dispose();
	return 0;
}
