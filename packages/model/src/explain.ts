/** Lines considered by {@link explainCode}. */
export const EXPLAIN_LINE_LIMIT = 8;

export const EXPLAIN_EMPTY = "🦜 Paste some code and I'll explain it!";
const EXPLAIN_HEADER = "🦜 Here's what I see:\n\n";
const EXPLAIN_FOOTER = "\nAsk me about any part! 🦜";

/** Bullet for one trimmed line, or null when the line is not recognised. */
function describeLine(line: string): string | null {
	const def = /^def\s+(\w+)/.exec(line);
	if (def) return `• Function \`${def[1]}\``;
	const cls = /^class\s+(\w+)/.exec(line);
	if (cls) return `• Class \`${cls[1]}\``;
	if (line.startsWith("import ") || line.startsWith("from ")) return `• Import: \`${line}\``;
	if (line.startsWith("if ")) return "• Conditional";
	if (line.startsWith("for ") || line.startsWith("while ")) return "• Loop";
	if (line.startsWith("return ")) return "• Return statement";
	return null;
}

/**
 * Structural summary of the first few non-empty lines of `code`: one bullet
 * per definition, import, conditional, loop or return.
 */
export function explainCode(code: string): string {
	if (typeof code !== "string" || code.trim() === "") return EXPLAIN_EMPTY;

	const bullets = code
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line !== "")
		.slice(0, EXPLAIN_LINE_LIMIT)
		.map(describeLine)
		.filter((bullet): bullet is string => bullet !== null);

	return EXPLAIN_HEADER + bullets.map((b) => `${b}\n`).join("") + EXPLAIN_FOOTER;
}
