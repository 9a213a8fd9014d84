/**
 * Interfaces of the host surfaces the engines talk to.
 *
 * The engines never render anything; a host (a GUI, a terminal, a test)
 * implements these and receives plain text.
 */

/** Zero-based line / column of the editing cursor. */
export interface Position {
	line: number;
	column: number;
}

export type ChatRole = "user" | "assistant";

export interface EditorCollaborator {
	/** Show `path` in the editor, replacing the buffer with `initialText`. */
	displayFile(path: string, initialText: string): void;
	/** Append text at the end of the buffer. */
	appendText(text: string): void;
	getAllText(): string;
	getCurrentLineAndCursor(): { lineText: string; position: Position };
	/** Show a one-line status message. */
	setStatus(text: string): void;
}

export interface TerminalCollaborator {
	/** Log a command as if typed at a prompt. */
	logCommand(text: string): void;
	/** Log raw output. */
	logRaw(text: string): void;
}

export interface ChatCollaborator {
	postMessage(role: ChatRole, text: string): void;
}

export interface CompletionPopup {
	showCandidates(candidates: readonly string[]): void;
}
