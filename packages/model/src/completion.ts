/**
 * @mimicode/model: Code completion engine.
 *
 * Matches the trimmed current line against the {@link PatternRegistry} and
 * falls back to keyword / built-in prefix matching when nothing applies.
 * `completeLine` is pure; `complete` adds the thinking flag and simulated
 * inference latency.
 */

import {
	createLogger,
	instantDelay,
	mathRandom,
	toError,
	uniform,
} from "@mimicode/core";
import type { DelayPolicy, LatencyRange, Logger, RandomSource } from "@mimicode/core";
import type { ContextState } from "./context-state.js";
import { PatternRegistry } from "./completion-rules.js";
import type { Lexicon } from "./lexicon.js";
import { getDefaultLexicon } from "./lexicon.js";
import type { CompletionRequest } from "./types.js";
import { MAX_CANDIDATES } from "./types.js";

export interface CompletionEngineOptions {
	registry?: PatternRegistry;
	lexicon?: Lexicon;
	/** Shared state whose thinking flag `complete` raises. */
	state?: ContextState;
	latency?: LatencyRange;
	delay?: DelayPolicy;
	random?: RandomSource;
	logger?: Logger;
}

/**
 * Keywords, then built-in functions (suffixed with `(`), starting with the
 * last whitespace-delimited token of `line`. Case-insensitive.
 */
export function genericCompletions(line: string, lexicon: Lexicon): string[] {
	const tokens = line.split(/\s+/).filter(Boolean);
	const word = (tokens[tokens.length - 1] ?? "").toLowerCase();
	const keywords = lexicon.keywords.filter((kw) => kw.toLowerCase().startsWith(word));
	const builtins = lexicon.builtins
		.filter((b) => b.name.toLowerCase().startsWith(word))
		.map((b) => `${b.name}(`);
	return [...keywords, ...builtins];
}

export class CompletionEngine {
	private readonly registry: PatternRegistry;
	private readonly lexicon: Lexicon;
	private readonly state?: ContextState;
	private readonly latency: LatencyRange;
	private readonly delay: DelayPolicy;
	private readonly random: RandomSource;
	private readonly log: Logger;

	constructor(options: CompletionEngineOptions = {}) {
		this.registry = options.registry ?? new PatternRegistry();
		this.lexicon = options.lexicon ?? getDefaultLexicon();
		this.state = options.state;
		this.latency = options.latency ?? { minMs: 0, maxMs: 0 };
		this.delay = options.delay ?? instantDelay;
		this.random = options.random ?? mathRandom;
		this.log = options.logger ?? createLogger("model:completion");
	}

	/**
	 * Candidates for `currentLine`, at most {@link MAX_CANDIDATES}. Never throws.
	 */
	completeLine(fullContext: string, currentLine: string): string[] {
		const line = typeof currentLine === "string" ? currentLine.trim() : "";
		const context = typeof fullContext === "string" ? fullContext : "";

		let candidates: string[] = [];
		const found = this.registry.match(line);
		if (found) {
			try {
				candidates = found.rule.handler(found.match, { fullContext: context, lexicon: this.lexicon });
				this.log.debug("Rule matched", { rule: found.rule.id, count: candidates.length });
			} catch (err) {
				this.log.warn("Completion rule failed, using generic fallback", {
					rule: found.rule.id,
					error: toError(err).message,
				});
				candidates = [];
			}
		}

		if (candidates.length === 0) {
			candidates = genericCompletions(line, this.lexicon);
			this.log.debug("Generic fallback", { line, count: candidates.length });
		}

		return candidates.slice(0, MAX_CANDIDATES);
	}

	/**
	 * {@link completeLine} behind the thinking flag and simulated latency.
	 */
	async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string[]> {
		const run = async () => {
			await this.delay.wait(uniform(this.random, this.latency.minMs, this.latency.maxMs), signal);
			return this.completeLine(request.fullContext, request.currentLine);
		};
		return this.state ? this.state.whileThinking(run) : run();
	}
}
