// @mimicode/model: Completion, chat and context engines
export * from "./types.js";
export { createLexicon, getDefaultLexicon } from "./lexicon.js";
export type { Lexicon, LexiconData } from "./lexicon.js";
export {
	COMPLETION_RULES,
	FUNCTION_BODIES,
	GENERIC_FUNCTION_BODIES,
	PatternRegistry,
	functionBodiesFor,
} from "./completion-rules.js";
export type { RuleMatch } from "./completion-rules.js";
export { CompletionEngine, genericCompletions } from "./completion.js";
export type { CompletionEngineOptions } from "./completion.js";
export { ContextState, estimateTokens } from "./context-state.js";
export { explainCode, EXPLAIN_EMPTY, EXPLAIN_LINE_LIMIT } from "./explain.js";
export {
	CHAT_RULES,
	CONCEPTS,
	DEBUG_CHECKLIST,
	ERROR_HELP,
	FALLBACK_REPLIES,
	GENERATE_CLARIFY,
	GENERATE_SNIPPETS,
	GREETINGS,
	HOW_TO_CLARIFY,
	HOW_TO_SNIPPETS,
	PERSONA_EMOJI,
} from "./chat-rules.js";
export type { ChatRule, ChatRuleInput } from "./chat-rules.js";
export { ChatRuleEngine, classifyMessage, generateReply } from "./chat.js";
export type { ChatRuleEngineOptions, GenerateReplyOptions } from "./chat.js";
export { RequestQueue, DEFAULT_QUEUE_CONFIG } from "./request-queue.js";
export type { QueueStats, RequestHandle, RequestQueueConfig } from "./request-queue.js";
export { CompletionSession, shouldTrigger } from "./completion-session.js";
export type {
	CompletionSessionOptions,
	CompletionSessionStats,
	CompletionSource,
} from "./completion-session.js";
export { createModel } from "./model.js";
export type { CreateModelOptions, MimicModel } from "./model.js";
