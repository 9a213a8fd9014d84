/**
 * @mimicode/model: Chat intent rules and reply templates.
 *
 * Rules are evaluated in declaration order against the lowercased message;
 * the first one whose keywords appear (as plain substrings) answers.
 * Everything here is canned text: no rule looks at history.
 */

import { pick } from "@mimicode/core";
import type { RandomSource } from "@mimicode/core";
import { explainCode } from "./explain.js";
import type { ChatIntent } from "./types.js";

export const PERSONA_EMOJI = "🦜";

// ─── Pools ──────────────────────────────────────────────────────────────────

export const GREETINGS: readonly [string, ...string[]] = [
	"Squawk! 🦜 How can I help you code today?",
	"Hey there! Mimicode perched and ready to help!",
	"*ruffles feathers* Ready to repeat some great code!",
	"Rawk! What are we building today?",
	"🦜 Mimicode online! Let's code something awesome!",
];

export const FALLBACK_REPLIES: readonly [string, ...string[]] = [
	"🦜 Tell me more about what you're building!",
	"🦜 I can help with code completion, explanations, and debugging!",
	"🦜 What would you like to code today?",
];

// ─── Tables ─────────────────────────────────────────────────────────────────

/** Error name → guidance. Checked in this order. */
export const ERROR_HELP: readonly (readonly [string, string])[] = [
	["SyntaxError", "Check colons, parentheses, quotes, and indentation!"],
	["NameError", "Variable/function not defined. Check spelling or imports."],
	["TypeError", "Wrong type. Check if mixing strings/numbers."],
	["IndexError", "Index out of range. Lists start at 0!"],
	["KeyError", "Key not in dict. Use `.get(key, default)`."],
	["AttributeError", "Object doesn't have that attribute/method."],
	["ImportError", "Module not found. Check name and installation."],
	["IndentationError", "Use consistent indentation (4 spaces)."],
];

/** Concept keyword → one-line explanation. Checked in this order. */
export const CONCEPTS: readonly (readonly [string, string])[] = [
	["function", "A function is a reusable block of code. Define with `def name(args):`"],
	["class", "A class bundles data and methods. Define with `class Name:`"],
	["loop", "Loops repeat code. `for` iterates, `while` repeats until false."],
	["list", "Lists are ordered collections. Create with `[]`, access by index."],
	["dict", "Dicts store key-value pairs. Create with `{}`, access by key."],
	["exception", "Handle errors with `try/except` to avoid crashes."],
	["import", "Imports bring in external code. `import x` or `from x import y`"],
];

export const DEBUG_CHECKLIST = `🦜 Quick debugging checklist:

1. Balanced parentheses/brackets?
2. Correct indentation (4 spaces)?
3. Variables defined before use?
4. Typos in names?
5. Right data types?

Paste your error message for specific help! 🦜`;

/** Secondary how-to topics: every keyword must appear. */
export const HOW_TO_SNIPPETS: readonly { keywords: readonly string[]; reply: string }[] = [
	{
		keywords: ["read", "file"],
		reply: "🦜 Read a file:\n\n```python\nwith open('file.txt', 'r') as f:\n    content = f.read()\n```",
	},
	{
		keywords: ["write", "file"],
		reply: "🦜 Write a file:\n\n```python\nwith open('file.txt', 'w') as f:\n    f.write('Hello!')\n```",
	},
	{
		keywords: ["list"],
		reply: "🦜 Lists:\n\n```python\nmy_list = [1, 2, 3]\nmy_list.append(4)\nmy_list[0]  # First item\n```",
	},
	{
		keywords: ["dict"],
		reply: "🦜 Dicts:\n\n```python\nd = {'key': 'value'}\nd['new'] = 'item'\nd.get('key', 'default')\n```",
	},
	{
		keywords: ["loop"],
		reply:
			"🦜 Loops:\n\n```python\nfor item in collection:\n    print(item)\n\n" +
			"for i, item in enumerate(collection):\n    print(i, item)\n```",
	},
];

export const HOW_TO_CLARIFY = "🦜 What specifically would you like to know how to do?";

export const GENERATE_SNIPPETS: readonly { keywords: readonly string[]; reply: string }[] = [
	{
		keywords: ["hello"],
		reply: '🦜 Here you go:\n\n```python\nprint("Hello, World!")\n```',
	},
	{
		keywords: ["game"],
		reply: [
			"🦜 Simple game:",
			"",
			"```python",
			"import random",
			"",
			"number = random.randint(1, 100)",
			"while True:",
			'    guess = int(input("Guess: "))',
			"    if guess == number:",
			'        print("You win! 🎉")',
			"        break",
			'    print("Higher!" if guess < number else "Lower!")',
			"```",
		].join("\n"),
	},
];

export const GENERATE_CLARIFY = "🦜 Tell me more about what you want to build!";

// ─── Rules ──────────────────────────────────────────────────────────────────

export interface ChatRuleInput {
	/** Lowercased message. */
	text: string;
	codeContext: string;
	random: RandomSource;
}

export interface ChatRule {
	readonly intent: Exclude<ChatIntent, "fallback">;
	matches(text: string): boolean;
	reply(input: ChatRuleInput): string;
}

const containsAny = (text: string, words: readonly string[]) => words.some((w) => text.includes(w));
const containsAll = (text: string, words: readonly string[]) => words.every((w) => text.includes(w));

function firstSnippet(
	text: string,
	snippets: readonly { keywords: readonly string[]; reply: string }[],
	otherwise: string,
): string {
	return snippets.find((s) => containsAll(text, s.keywords))?.reply ?? otherwise;
}

function errorHelpFor(text: string): string | undefined {
	const entry = ERROR_HELP.find(([name]) => text.includes(name.toLowerCase()));
	return entry && `${PERSONA_EMOJI} ${entry[0]}? ${entry[1]}`;
}

function conceptFor(text: string): string | undefined {
	const entry = CONCEPTS.find(([concept]) => text.includes(concept));
	return entry && `${PERSONA_EMOJI} ${entry[1]}`;
}

// reply() is only called after matches(); the chat engine turns this into a fallback reply
function unmatched(intent: ChatIntent): never {
	throw new Error(`Chat rule "${intent}" has no reply for this message`);
}

const GREETING_WORDS = ["hello", "hi", "hey", "squawk", "sup"];
const DEBUG_WORDS = ["fix", "help", "error", "bug"];
const HOW_TO_WORDS = ["how to", "how do"];
const GENERATE_WORDS = ["write", "create", "make", "generate"];

export const CHAT_RULES: readonly ChatRule[] = [
	{
		intent: "greeting",
		matches: (text) => containsAny(text, GREETING_WORDS),
		reply: ({ random }) => pick(random, GREETINGS),
	},
	{
		intent: "error_help",
		matches: (text) => errorHelpFor(text) !== undefined,
		reply: ({ text }) => errorHelpFor(text) ?? unmatched("error_help"),
	},
	{
		intent: "concept",
		matches: (text) => conceptFor(text) !== undefined,
		reply: ({ text }) => conceptFor(text) ?? unmatched("concept"),
	},
	{
		intent: "explain_code",
		matches: (text) => text.includes("explain") || text.includes("what does"),
		reply: ({ codeContext }) => explainCode(codeContext),
	},
	{
		intent: "debug_checklist",
		matches: (text) => containsAny(text, DEBUG_WORDS),
		reply: () => DEBUG_CHECKLIST,
	},
	{
		intent: "how_to",
		matches: (text) => containsAny(text, HOW_TO_WORDS),
		reply: ({ text }) => firstSnippet(text, HOW_TO_SNIPPETS, HOW_TO_CLARIFY),
	},
	{
		intent: "generate",
		matches: (text) => containsAny(text, GENERATE_WORDS),
		reply: ({ text }) => firstSnippet(text, GENERATE_SNIPPETS, GENERATE_CLARIFY),
	},
];
