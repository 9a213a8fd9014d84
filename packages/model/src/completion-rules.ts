/**
 * @mimicode/model: Completion dispatch table.
 *
 * An ordered list of (trigger, handler) pairs tested against the trimmed
 * current line. Declaration order IS priority order: the first trigger that
 * matches wins and later rules are never consulted.
 */

import type { CompletionRule, RuleContext } from "./types.js";

function hasOwn<T>(table: Readonly<Record<string, T>>, key: string): boolean {
	return Object.prototype.hasOwnProperty.call(table, key);
}

// ─── Function Bodies ────────────────────────────────────────────────────────

/**
 * Bodies offered after `def name(`, keyed by substrings of the lowercased
 * name. Entries are checked in order, so `get_settings` gets the getter.
 */
export const FUNCTION_BODIES: readonly { keys: readonly string[]; bodies: readonly string[] }[] = [
	{
		keys: ["init"],
		bodies: [
			"self):\n        pass",
			"self, name, value):\n        self.name = name\n        self.value = value",
		],
	},
	{ keys: ["get"], bodies: ["self, key):\n        return self._data.get(key)"] },
	{ keys: ["set"], bodies: ["self, key, value):\n        self._data[key] = value"] },
	{ keys: ["is_", "has_"], bodies: ["self):\n        return bool(self._value)"] },
	{ keys: ["load"], bodies: ["filename):\n        with open(filename, 'r') as f:\n            return f.read()"] },
	{ keys: ["save"], bodies: ["data, filename):\n        with open(filename, 'w') as f:\n            f.write(data)"] },
	{ keys: ["main"], bodies: ["):\n        print('Hello, World!')\n\n\nif __name__ == '__main__':\n    main()"] },
];

export const GENERIC_FUNCTION_BODIES: readonly string[] = [
	"):\n        pass",
	"arg1, arg2):\n        return arg1 + arg2",
	"*args, **kwargs):\n        pass",
];

/** Pick the canned bodies for a function name. */
export function functionBodiesFor(name: string): string[] {
	const lower = name.toLowerCase();
	const entry = FUNCTION_BODIES.find((e) => e.keys.some((key) => lower.includes(key)));
	return [...(entry?.bodies ?? GENERIC_FUNCTION_BODIES)];
}

// ─── Rule Table ─────────────────────────────────────────────────────────────

export const COMPLETION_RULES: readonly CompletionRule[] = [
	{
		id: "function-def",
		trigger: /^def\s+(\w+)\s*\($/,
		handler: (match) => functionBodiesFor(match[1] ?? "func"),
	},
	{
		id: "class-def",
		trigger: /^class\s+(\w+)/,
		handler(match) {
			const name = match[1] ?? "MyClass";
			return [
				`:\n    """A ${name} class."""\n    \n    def __init__(self):\n        pass`,
				`:\n    def __init__(self, name):\n        self.name = name\n    \n    def __repr__(self):\n        return f"${name}({self.name})"`,
			];
		},
	},
	{
		id: "import",
		trigger: /^import\s+(\w*)$/,
		handler(match, { lexicon }: RuleContext) {
			const prefix = match[1] ?? "";
			return Object.keys(lexicon.modules).filter((module) => module.startsWith(prefix));
		},
	},
	{
		id: "from-import",
		trigger: /^from\s+(\w+)\s+import\s*(\w*)$/,
		handler(match, { lexicon }: RuleContext) {
			const module = match[1] ?? "";
			const prefix = match[2] ?? "";
			if (!hasOwn(lexicon.modules, module)) return [];
			return lexicon.modules[module].filter((symbol) => symbol.startsWith(prefix));
		},
	},
	{
		id: "if",
		trigger: /^if\s+/,
		handler: () => [
			"condition:\n        pass",
			"x is not None:\n        pass",
			"len(items) > 0:\n        pass",
		],
	},
	{
		id: "for",
		trigger: /^for\s+(\w+)\s+in\s+/,
		handler(match) {
			const variable = match[1] ?? "item";
			return [`\n        print(${variable})`, `\n        result.append(${variable})`];
		},
	},
	{
		id: "while",
		trigger: /^while\s+/,
		handler: () => ["True:\n        pass", "condition:\n        break"],
	},
	{
		id: "try",
		trigger: /^try:\s*$/,
		handler: () => ['\n        pass\n    except Exception as e:\n        print(f"Error: {e}")'],
	},
	{
		id: "with",
		trigger: /^with\s+/,
		handler: () => ["open(filename, 'r') as f:\n        content = f.read()"],
	},
	{
		id: "print",
		trigger: /^print\($/,
		handler: () => ['"Hello, World!")', 'f"Value: {value}")', '*args, sep=", ")'],
	},
	{
		id: "attribute",
		trigger: /(\w+)\.\s*$/,
		handler(match, { lexicon }: RuleContext) {
			const receiver = (match[1] ?? "").toLowerCase();
			return hasOwn(lexicon.receivers, receiver)
				? [...lexicon.receivers[receiver]]
				: [...lexicon.unknownReceiverAttributes];
		},
	},
	{
		id: "comment",
		trigger: /^#\s*/,
		handler: (_match, { lexicon }: RuleContext) => [...lexicon.commentTags],
	},
];

// ─── Registry ───────────────────────────────────────────────────────────────

export interface RuleMatch {
	rule: CompletionRule;
	match: RegExpMatchArray;
}

/**
 * Immutable, ordered rule table with first-match lookup.
 *
 * @example
 * ```ts
 * const registry = new PatternRegistry(COMPLETION_RULES);
 * registry.match("def load_config(")?.rule.id; // "function-def"
 * ```
 */
export class PatternRegistry {
	private readonly rules: readonly CompletionRule[];

	constructor(rules: readonly CompletionRule[] = COMPLETION_RULES) {
		const seen = new Set<string>();
		for (const rule of rules) {
			if (rule.trigger.global || rule.trigger.sticky) {
				throw new TypeError(`Completion rule "${rule.id}" must not use the g or y flag`);
			}
			if (seen.has(rule.id)) {
				throw new TypeError(`Duplicate completion rule id "${rule.id}"`);
			}
			seen.add(rule.id);
		}
		this.rules = Object.freeze([...rules]);
	}

	/** First rule whose trigger matches `line`, or null. */
	match(line: string): RuleMatch | null {
		for (const rule of this.rules) {
			const match = line.match(rule.trigger);
			if (match) return { rule, match };
		}
		return null;
	}

	/** Rule ids in priority order. */
	ids(): string[] {
		return this.rules.map((r) => r.id);
	}

	get size(): number {
		return this.rules.length;
	}
}
