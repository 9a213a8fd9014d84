/**
 * @mimicode/model: Keystroke-driven completion handoff.
 *
 * Sits between an editor and a {@link CompletionEngine}: debounces trigger
 * characters, snapshots the editor, and shows only the newest request's
 * candidates. Results that arrive after a newer request was issued are
 * discarded.
 */

import { AbortError, DEFAULT_SETTINGS, createLogger, instantDelay } from "@mimicode/core";
import type { CompletionPopup, DelayPolicy, EditorCollaborator, Logger } from "@mimicode/core";
import type { CompletionRequest } from "./types.js";

/** Anything that can answer a completion request. */
export interface CompletionSource {
	complete(request: CompletionRequest): Promise<string[]>;
}

export interface CompletionSessionOptions {
	editor: EditorCollaborator;
	popup: CompletionPopup;
	source: CompletionSource;
	delay?: DelayPolicy;
	debounceMs?: number;
	popupSize?: number;
	logger?: Logger;
}

export interface CompletionSessionStats {
	requested: number;
	shown: number;
	stale: number;
}

/** Characters that open the completion popup. */
export function shouldTrigger(char: string): boolean {
	return char.length === 1 && /^[A-Za-z0-9._]$/.test(char);
}

export class CompletionSession {
	private readonly editor: EditorCollaborator;
	private readonly popup: CompletionPopup;
	private readonly source: CompletionSource;
	private readonly delay: DelayPolicy;
	private readonly debounceMs: number;
	private readonly popupSize: number;
	private readonly log: Logger;

	private sequence = 0;
	private pendingKey: AbortController | null = null;
	private readonly stats: CompletionSessionStats = { requested: 0, shown: 0, stale: 0 };

	constructor(options: CompletionSessionOptions) {
		this.editor = options.editor;
		this.popup = options.popup;
		this.source = options.source;
		this.delay = options.delay ?? instantDelay;
		this.debounceMs = options.debounceMs ?? DEFAULT_SETTINGS.session.debounceMs;
		this.popupSize = options.popupSize ?? DEFAULT_SETTINGS.session.popupSize;
		this.log = options.logger ?? createLogger("model:session");
	}

	/**
	 * Notify the session of a typed character. Trigger characters start a
	 * debounced request; a newer keystroke cancels the pending one.
	 *
	 * @returns Whether candidates were shown for this keystroke.
	 */
	async keyTyped(char: string): Promise<boolean> {
		if (!shouldTrigger(char)) return false;

		this.pendingKey?.abort();
		const controller = new AbortController();
		this.pendingKey = controller;

		try {
			await this.delay.wait(this.debounceMs, controller.signal);
		} catch (err) {
			if (err instanceof AbortError) return false;
			throw err;
		}
		if (this.pendingKey === controller) this.pendingKey = null;

		return this.request();
	}

	/**
	 * Request completions for the editor's current line right away.
	 *
	 * @returns Whether candidates were shown.
	 */
	async request(): Promise<boolean> {
		const seq = ++this.sequence;
		this.stats.requested++;

		const { lineText, position } = this.editor.getCurrentLineAndCursor();
		const candidates = await this.source.complete({
			fullContext: this.editor.getAllText(),
			currentLine: lineText,
			cursor: position,
		});

		if (seq !== this.sequence) {
			this.stats.stale++;
			this.log.debug("Discarded stale completion", { seq, latest: this.sequence });
			return false;
		}
		if (candidates.length === 0) return false;

		this.popup.showCandidates(candidates.slice(0, this.popupSize));
		this.stats.shown++;
		return true;
	}

	/** Cancel a pending debounced keystroke. */
	cancel(): void {
		this.pendingKey?.abort();
		this.pendingKey = null;
	}

	getStats(): CompletionSessionStats {
		return { ...this.stats };
	}
}
