/**
 * Language knowledge the completion rules draw from: keywords, built-in
 * functions, the module → symbol table and the receiver → attribute table.
 *
 * The default lexicon ships as `data/lexicon.json` and is validated once on
 * first use. Table order is meaningful: it is the order candidates come out.
 */

import fs from "node:fs";
import { assertValid, v } from "@mimicode/core";
import type { Infer } from "@mimicode/core";

const LEXICON_SCHEMA = v.object({
	language: v.string().min(1),
	keywords: v.array(v.string().min(1)),
	builtins: v.array(v.object({
		name: v.string().min(1),
		signature: v.string(),
		summary: v.string(),
	})),
	modules: v.record(v.array(v.string())),
	receivers: v.record(v.array(v.string())),
	unknownReceiverAttributes: v.array(v.string()),
	commentTags: v.array(v.string()),
});

export type LexiconData = Infer<typeof LEXICON_SCHEMA>;

/** A validated, frozen lexicon. */
export interface Lexicon {
	readonly language: string;
	readonly keywords: readonly string[];
	readonly builtins: readonly { readonly name: string; readonly signature: string; readonly summary: string }[];
	/** Module name → importable symbols, in declaration order. */
	readonly modules: Readonly<Record<string, readonly string[]>>;
	/** Lowercased receiver → attribute completions. */
	readonly receivers: Readonly<Record<string, readonly string[]>>;
	readonly unknownReceiverAttributes: readonly string[];
	readonly commentTags: readonly string[];
}

function freezeTable(table: Record<string, string[]>): Readonly<Record<string, readonly string[]>> {
	const frozen: Record<string, readonly string[]> = {};
	for (const [key, values] of Object.entries(table)) {
		frozen[key] = Object.freeze([...values]);
	}
	return Object.freeze(frozen);
}

/**
 * Validate raw lexicon data and freeze it.
 *
 * @throws {ConfigError} If the data does not match the lexicon schema.
 */
export function createLexicon(value: unknown, label = "lexicon"): Lexicon {
	const data = assertValid(LEXICON_SCHEMA, value, label);
	return Object.freeze({
		language: data.language,
		keywords: Object.freeze([...data.keywords]),
		builtins: Object.freeze(data.builtins.map((b) => Object.freeze({ ...b }))),
		modules: freezeTable(data.modules),
		receivers: freezeTable(data.receivers),
		unknownReceiverAttributes: Object.freeze([...data.unknownReceiverAttributes]),
		commentTags: Object.freeze([...data.commentTags]),
	});
}

const DEFAULT_LEXICON_URL = new URL("../data/lexicon.json", import.meta.url);

let defaultLexicon: Lexicon | null = null;

/** The bundled Python lexicon, loaded lazily and shared. */
export function getDefaultLexicon(): Lexicon {
	if (!defaultLexicon) {
		const raw = fs.readFileSync(DEFAULT_LEXICON_URL, "utf-8");
		defaultLexicon = createLexicon(JSON.parse(raw), "lexicon.json");
	}
	return defaultLexicon;
}
