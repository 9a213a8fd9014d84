/**
 * @mimicode/model: Model metadata and the conversation history.
 *
 * The history is append-only and owned here; the chat engine is its only
 * writer. The context window is a *view* over the most recent turns, so
 * nothing is ever trimmed.
 */

import type { ModelSettings } from "@mimicode/core";
import type { ChatTurn, ModelStatus } from "./types.js";

/** Rough token estimate of a string: one token per four characters. */
export function estimateTokens(text: string): number {
	return Math.ceil(text.length / 4);
}

export class ContextState {
	readonly modelId: string;
	readonly windowLimit: number;
	readonly temperature: number;
	readonly topP: number;

	private readonly history: ChatTurn[] = [];
	private inFlight = 0;

	constructor(model: ModelSettings) {
		this.modelId = model.id;
		this.windowLimit = model.windowLimit;
		this.temperature = model.temperature;
		this.topP = model.topP;
	}

	append(turn: ChatTurn): void {
		this.history.push({ role: turn.role, content: turn.content });
	}

	/** Copy of the full history, oldest first. */
	getHistory(): ChatTurn[] {
		return this.history.map((turn) => ({ ...turn }));
	}

	get historyLength(): number {
		return this.history.length;
	}

	// ─── Thinking ───────────────────────────────────────────────────────

	/** Mark one more request in flight. Pair with {@link endThinking}. */
	beginThinking(): void {
		this.inFlight++;
	}

	endThinking(): void {
		this.inFlight = Math.max(0, this.inFlight - 1);
	}

	get thinking(): boolean {
		return this.inFlight > 0;
	}

	/**
	 * Run `work` with the thinking flag raised, lowering it however `work`
	 * settles.
	 */
	async whileThinking<T>(work: () => Promise<T>): Promise<T> {
		this.beginThinking();
		try {
			return await work();
		} finally {
			this.endThinking();
		}
	}

	// ─── Window ─────────────────────────────────────────────────────────

	/**
	 * The longest suffix of history whose estimated token total fits in
	 * `windowLimit`. A single turn larger than the window yields an empty view.
	 */
	windowTurns(): ChatTurn[] {
		let budget = this.windowLimit;
		let start = this.history.length;
		while (start > 0) {
			const cost = estimateTokens(this.history[start - 1].content);
			if (cost > budget) break;
			budget -= cost;
			start--;
		}
		return this.history.slice(start).map((turn) => ({ ...turn }));
	}

	getStatus(): ModelStatus {
		const windowTokens = this.windowTurns()
			.reduce((sum, turn) => sum + estimateTokens(turn.content), 0);
		return {
			modelId: this.modelId,
			historyLength: this.history.length,
			thinking: this.thinking,
			windowTokens,
		};
	}
}
