/**
 * @mimicode/model: Shared types.
 */

import type { ChatRole, Position } from "@mimicode/core";
import type { Lexicon } from "./lexicon.js";

/** Hard ceiling on the number of completion candidates. */
export const MAX_CANDIDATES = 8;

// ─── Completion ─────────────────────────────────────────────────────────────

export interface CompletionRequest {
	/** Whole buffer text. */
	fullContext: string;
	/** Text of the line holding the cursor. */
	currentLine: string;
	cursor: Position;
}

/** What a rule handler sees besides its own match. */
export interface RuleContext {
	fullContext: string;
	lexicon: Lexicon;
}

/**
 * One entry of the completion dispatch table: the first rule whose trigger
 * matches the trimmed line produces the candidates.
 */
export interface CompletionRule {
	readonly id: string;
	readonly trigger: RegExp;
	handler(match: RegExpMatchArray, context: RuleContext): string[];
}

// ─── Chat ───────────────────────────────────────────────────────────────────

export interface ChatTurn {
	role: ChatRole;
	content: string;
}

/** The intent categories of the chat rules, in evaluation order. */
export type ChatIntent =
	| "greeting"
	| "error_help"
	| "concept"
	| "explain_code"
	| "debug_checklist"
	| "how_to"
	| "generate"
	| "fallback";

export interface ChatReply {
	intent: ChatIntent;
	reply: string;
}

// ─── Status ─────────────────────────────────────────────────────────────────

export interface ModelStatus {
	modelId: string;
	historyLength: number;
	thinking: boolean;
	/** Estimated tokens of the turns that fit in the context window. */
	windowTokens: number;
}
