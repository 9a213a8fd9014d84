import { loadGoalScript } from "./goal-script.js";
import type { Goal } from "./types.js";

/** Status-bar musings shown during `think` steps. */
export const THOUGHTS: readonly [string, ...string[]] = [
	"Analyzing dependency graph...",
	"Checking for off-by-one errors...",
	"Considering edge cases...",
	"Reading the docs (for once)...",
	"Weighing readability against speed...",
	"Tracing the call stack...",
	"Wondering who wrote this...",
	"Planning the next commit...",
];

const DEFAULT_GOALS_URL = new URL("../data/default-goals.json", import.meta.url);

let defaultGoals: readonly Goal[] | null = null;

/** The bundled goal script, loaded once. */
export function getDefaultGoals(): readonly Goal[] {
	defaultGoals ??= Object.freeze(loadGoalScript(DEFAULT_GOALS_URL));
	return defaultGoals;
}

const COMMENT_PREFIXES: Record<string, string> = {
	py: "#",
	rb: "#",
	sh: "#",
	yaml: "#",
	yml: "#",
	toml: "#",
	sql: "--",
	lua: "--",
	hs: "--",
};

/**
 * Placeholder text for a freshly opened file: a single comment line in the
 * file's language. Unknown extensions use `//`.
 */
export function placeholderFor(path: string): string {
	const slash = Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\"));
	const base = path.slice(slash + 1);
	const dot = base.lastIndexOf(".");
	const ext = dot > 0 ? base.slice(dot + 1).toLowerCase() : "";

	if (ext === "html" || ext === "xml" || ext === "md") return "<!-- File opened by agent -->\n";
	if (ext === "css") return "/* File opened by agent */\n";
	const prefix = Object.prototype.hasOwnProperty.call(COMMENT_PREFIXES, ext) ? COMMENT_PREFIXES[ext] : "//";
	return `${prefix} File opened by agent\n`;
}
