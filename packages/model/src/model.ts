/**
 * @mimicode/model: Model facade.
 *
 * `createModel` wires one engine instance: its own settings, context state,
 * random source, delay policy and logger. There is no process-wide model.
 */

import { DEFAULT_SETTINGS, createLogger, createRandom, realDelay } from "@mimicode/core";
import type { DelayPolicy, Logger, MimicodeSettings, RandomSource } from "@mimicode/core";
import { ChatRuleEngine } from "./chat.js";
import { CompletionEngine } from "./completion.js";
import { PatternRegistry } from "./completion-rules.js";
import { ContextState } from "./context-state.js";
import type { Lexicon } from "./lexicon.js";
import { getDefaultLexicon } from "./lexicon.js";
import type { ChatTurn, CompletionRequest, ModelStatus } from "./types.js";

export interface CreateModelOptions {
	settings?: MimicodeSettings;
	/** Defaults to real timers. */
	delay?: DelayPolicy;
	/** Defaults to a source seeded from `settings.seed`, if any. */
	random?: RandomSource;
	logger?: Logger;
	lexicon?: Lexicon;
	registry?: PatternRegistry;
}

export interface MimicModel {
	readonly settings: MimicodeSettings;
	readonly completion: CompletionEngine;
	readonly chatEngine: ChatRuleEngine;
	complete(request: CompletionRequest): Promise<string[]>;
	chat(message: string, codeContext?: string): Promise<string>;
	getStatus(): ModelStatus;
	getHistory(): ChatTurn[];
	isThinking(): boolean;
	/** Cancel pending chat requests; later chat calls reject with AbortError. */
	dispose(): void;
}

export function createModel(options: CreateModelOptions = {}): MimicModel {
	const settings = options.settings ?? DEFAULT_SETTINGS;
	const delay = options.delay ?? realDelay;
	const random = options.random ?? createRandom(settings.seed);
	const log = options.logger ?? createLogger("model");
	const lexicon = options.lexicon ?? getDefaultLexicon();
	const state = new ContextState(settings.model);

	const completion = new CompletionEngine({
		registry: options.registry ?? new PatternRegistry(),
		lexicon,
		state,
		latency: settings.latency.completion,
		delay,
		random,
		logger: log.child("completion"),
	});

	const chatEngine = new ChatRuleEngine({
		state,
		latency: settings.latency.chat,
		delay,
		random,
		logger: log.child("chat"),
	});

	log.debug("Model created", { modelId: state.modelId, seeded: settings.seed !== undefined });

	return {
		settings,
		completion,
		chatEngine,
		complete: (request) => completion.complete(request),
		chat: (message, codeContext = "") => chatEngine.respond(message, codeContext),
		getStatus: () => state.getStatus(),
		getHistory: () => state.getHistory(),
		isThinking: () => state.thinking,
		dispose: () => chatEngine.dispose(),
	};
}
