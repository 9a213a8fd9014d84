/**
 * @mimicode/cli: Console implementations of the collaborator interfaces.
 *
 * Editor, terminal, chat and popup all write to one output stream through a
 * shared {@link ConsoleWriter}, which tracks whether the cursor sits at the
 * start of a line so character-by-character typing and whole-line messages
 * interleave cleanly.
 */

import type {
	ChatCollaborator,
	ChatRole,
	CompletionPopup,
	EditorCollaborator,
	Position,
	TerminalCollaborator,
} from "@mimicode/core";
import { palette } from "./ansi.js";
import type { Palette } from "./ansi.js";

export class ConsoleWriter {
	readonly paint: Palette;
	private atLineStart = true;

	constructor(private readonly stream: NodeJS.WritableStream, colors = false) {
		this.paint = palette(colors);
	}

	/** Write raw text as-is. */
	write(text: string): void {
		if (text.length === 0) return;
		this.stream.write(text);
		this.atLineStart = text.endsWith("\n");
	}

	/** Write `text` on a line of its own. */
	line(text: string): void {
		this.write(`${this.atLineStart ? "" : "\n"}${text}\n`);
	}
}

export class ConsoleEditor implements EditorCollaborator {
	private buffer = "";
	private path: string | null = null;

	constructor(private readonly out: ConsoleWriter) {}

	displayFile(path: string, initialText: string): void {
		this.path = path;
		this.buffer = initialText;
		this.out.line(this.out.paint.bold(`── ${path} ──`));
		this.out.write(initialText);
	}

	appendText(text: string): void {
		this.buffer += text;
		this.out.write(text);
	}

	getAllText(): string {
		return this.buffer;
	}

	getCurrentLineAndCursor(): { lineText: string; position: Position } {
		const lines = this.buffer.split("\n");
		const lineText = lines[lines.length - 1] ?? "";
		return { lineText, position: { line: lines.length - 1, column: lineText.length } };
	}

	setStatus(text: string): void {
		this.out.line(this.out.paint.dim(`[status] ${text}`));
	}

	getPath(): string | null {
		return this.path;
	}
}

export class ConsoleTerminal implements TerminalCollaborator {
	constructor(private readonly out: ConsoleWriter) {}

	logCommand(text: string): void {
		this.out.line(this.out.paint.green(`$ ${text}`));
	}

	logRaw(text: string): void {
		this.out.line(this.out.paint.gray(text));
	}
}

export class ConsoleChat implements ChatCollaborator {
	constructor(private readonly out: ConsoleWriter) {}

	postMessage(role: ChatRole, text: string): void {
		const sender = role === "assistant" ? this.out.paint.magenta("[mimicode]") : this.out.paint.cyan("[you]");
		this.out.line(`${sender} ${text}`);
	}
}

/** Render a candidate on one line, showing embedded newlines as `\n`. */
export function formatCandidate(candidate: string): string {
	return candidate.replace(/\n/g, "\\n");
}

export class ConsolePopup implements CompletionPopup {
	constructor(private readonly out: ConsoleWriter) {}

	showCandidates(candidates: readonly string[]): void {
		for (const candidate of candidates) {
			this.out.line(formatCandidate(candidate));
		}
	}
}
