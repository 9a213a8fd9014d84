/**
 * @mimicode/model: Rule-based chat engine.
 *
 * `classifyMessage` and `generateReply` are pure. {@link ChatRuleEngine}
 * adds the conversation history, the thinking flag and simulated latency,
 * and serialises requests through a single-worker {@link RequestQueue}.
 */

import {
	AbortError,
	createLogger,
	instantDelay,
	mathRandom,
	pick,
	toError,
	uniform,
} from "@mimicode/core";
import type { DelayPolicy, LatencyRange, Logger, RandomSource } from "@mimicode/core";
import { CHAT_RULES, FALLBACK_REPLIES } from "./chat-rules.js";
import type { ChatRule } from "./chat-rules.js";
import type { ContextState } from "./context-state.js";
import { RequestQueue } from "./request-queue.js";
import type { ChatIntent, ChatReply } from "./types.js";

function normalise(message: unknown): string {
	return typeof message === "string" ? message.toLowerCase() : "";
}

function findRule(text: string, rules: readonly ChatRule[]): ChatRule | undefined {
	return rules.find((rule) => rule.matches(text));
}

/** Intent of `message` by the ordered chat rules. */
export function classifyMessage(message: string, rules: readonly ChatRule[] = CHAT_RULES): ChatIntent {
	return findRule(normalise(message), rules)?.intent ?? "fallback";
}

export interface GenerateReplyOptions {
	rules?: readonly ChatRule[];
	/** Called when a rule throws; the reply then comes from the fallback pool. */
	onRuleError?: (intent: ChatIntent, error: unknown) => void;
}

/**
 * Reply to `message`. Never throws: a failing rule degrades to the
 * fallback pool.
 */
export function generateReply(
	message: string,
	codeContext: string,
	random: RandomSource,
	options: GenerateReplyOptions = {},
): ChatReply {
	const text = normalise(message);
	const rule = findRule(text, options.rules ?? CHAT_RULES);
	if (rule) {
		try {
			const reply = rule.reply({
				text,
				codeContext: typeof codeContext === "string" ? codeContext : "",
				random,
			});
			return { intent: rule.intent, reply };
		} catch (err) {
			options.onRuleError?.(rule.intent, err);
		}
	}
	return { intent: "fallback", reply: pick(random, FALLBACK_REPLIES) };
}

// ─── Engine ─────────────────────────────────────────────────────────────────

export interface ChatRuleEngineOptions {
	state: ContextState;
	latency?: LatencyRange;
	delay?: DelayPolicy;
	random?: RandomSource;
	logger?: Logger;
	rules?: readonly ChatRule[];
}

export class ChatRuleEngine {
	private readonly state: ContextState;
	private readonly latency: LatencyRange;
	private readonly delay: DelayPolicy;
	private readonly random: RandomSource;
	private readonly log: Logger;
	private readonly rules: readonly ChatRule[];
	private readonly queue = new RequestQueue({ concurrency: 1 });

	constructor(options: ChatRuleEngineOptions) {
		this.state = options.state;
		this.latency = options.latency ?? { minMs: 0, maxMs: 0 };
		this.delay = options.delay ?? instantDelay;
		this.random = options.random ?? mathRandom;
		this.log = options.logger ?? createLogger("model:chat");
		this.rules = options.rules ?? CHAT_RULES;
	}

	/**
	 * Answer `message`, recording the (user, assistant) pair in history.
	 * Requests are answered one at a time in call order.
	 *
	 * @throws {AbortError} If the engine is disposed before the reply is ready.
	 */
	respond(message: string, codeContext = ""): Promise<string> {
		if (this.queue.isDestroyed()) {
			return Promise.reject(new AbortError("Chat engine disposed"));
		}
		const handle = this.queue.enqueue((signal) => this.run(message, codeContext, signal));
		return handle.promise;
	}

	/** Resolve once every queued request has settled. */
	drain(): Promise<void> {
		return this.queue.drain();
	}

	/** Cancel queued and running requests. Later calls reject with AbortError. */
	dispose(): void {
		this.queue.destroy();
	}

	private async run(message: string, codeContext: string, signal: AbortSignal): Promise<string> {
		const content = typeof message === "string" ? message : "";

		const reply = await this.state.whileThinking(async () => {
			await this.delay.wait(uniform(this.random, this.latency.minMs, this.latency.maxMs), signal);
			return generateReply(content, codeContext, this.random, {
				rules: this.rules,
				onRuleError: (intent, err) =>
					this.log.warn("Chat rule failed, using fallback", { intent, error: toError(err).message }),
			});
		});

		// A cancelled request leaves history untouched.
		if (signal.aborted) throw new AbortError("Chat request cancelled");

		this.state.append({ role: "user", content });
		this.state.append({ role: "assistant", content: reply.reply });
		this.log.debug("Chat reply", { intent: reply.intent, historyLength: this.state.historyLength });
		return reply.reply;
	}
}
