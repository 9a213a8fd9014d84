import { describe, it, expect } from "vitest";
import { AbortError, LogLevel, Logger, recordingDelay, scriptedRandom } from "@mimicode/core";
import type { LogEntry, LogTransport } from "@mimicode/core";
import {
	CHAT_RULES,
	ChatRuleEngine,
	ContextState,
	DEBUG_CHECKLIST,
	EXPLAIN_EMPTY,
	FALLBACK_REPLIES,
	GENERATE_CLARIFY,
	GREETINGS,
	HOW_TO_CLARIFY,
	classifyMessage,
	generateReply,
} from "@mimicode/model";
import type { ChatRule } from "@mimicode/model";

const MODEL = { id: "mimic-test", windowLimit: 4096, temperature: 0.7, topP: 0.9 };

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
}

describe("classifyMessage", () => {
	it("should follow rule order", () => {
		expect(classifyMessage("Hello!")).toBe("greeting");
		expect(classifyMessage("I got a KeyError")).toBe("error_help");
		expect(classifyMessage("what is a class")).toBe("concept");
		expect(classifyMessage("explain please")).toBe("explain_code");
		expect(classifyMessage("there is a bug")).toBe("debug_checklist");
		expect(classifyMessage("how do I read a file")).toBe("how_to");
		expect(classifyMessage("generate a game")).toBe("generate");
		expect(classifyMessage("bananas")).toBe("fallback");
	});

	it("should match greeting words as substrings", () => {
		// "this" contains "hi"
		expect(classifyMessage("what does this do")).toBe("greeting");
	});

	it("should let earlier intents shadow later ones", () => {
		expect(classifyMessage("fix my TypeError")).toBe("error_help");
		expect(classifyMessage("help with this TypeError")).toBe("greeting");
	});
});

describe("generateReply", () => {
	const first = scriptedRandom([0]);

	it("should fall back when a lookup rule is asked about a message it did not match", () => {
		const lookupRules = CHAT_RULES.filter((rule) => rule.intent === "error_help" || rule.intent === "concept");
		const input = { text: "bananas", codeContext: "", random: scriptedRandom([0]) };

		expect(lookupRules.map((rule) => rule.matches(input.text))).toEqual([false, false]);
		for (const rule of lookupRules) {
			expect(() => rule.reply(input)).toThrow(`Chat rule "${rule.intent}" has no reply for this message`);
		}

		const errors: string[] = [];
		const always = lookupRules.map((rule) => ({ ...rule, matches: () => true }));
		expect(generateReply("bananas", "", scriptedRandom([0]), { rules: always, onRuleError: (intent) => errors.push(intent) }))
			.toEqual({ intent: "fallback", reply: FALLBACK_REPLIES[0] });
		expect(errors).toEqual(["error_help"]);
	});

	it("should pick greetings from the pool", () => {
		expect(generateReply("hey", "", scriptedRandom([0]))).toEqual({ intent: "greeting", reply: GREETINGS[0] });
		expect(generateReply("hey", "", scriptedRandom([0.99])).reply).toBe(GREETINGS[4]);
	});

	it("should name the first matching error", () => {
		expect(generateReply("NameError and TypeError", "", first).reply).toBe(
			"🦜 NameError? Variable/function not defined. Check spelling or imports.",
		);
	});

	it("should quote the guidance for a named error", () => {
		expect(generateReply("Why a KeyError here?", "", first)).toEqual({
			intent: "error_help",
			reply: "🦜 KeyError? Key not in dict. Use `.get(key, default)`.",
		});
	});

	it("should explain a concept", () => {
		expect(generateReply("loop", "", first).reply).toBe(
			"🦜 Loops repeat code. `for` iterates, `while` repeats until false.",
		);
	});

	it("should explain the code context", () => {
		const reply = generateReply("explain", "import os\n\ndef main():\n    return 0\n", first);
		expect(reply).toEqual({
			intent: "explain_code",
			reply: "🦜 Here's what I see:\n\n• Import: `import os`\n• Function `main`\n• Return statement\n\nAsk me about any part! 🦜",
		});
		expect(generateReply("explain", "   ", first).reply).toBe(EXPLAIN_EMPTY);
	});

	it("should return the debugging checklist", () => {
		expect(generateReply("there is a bug", "", first).reply).toBe(DEBUG_CHECKLIST);
	});

	it("should answer how-to topics or ask for detail", () => {
		expect(generateReply("how to write to a file", "", first).reply).toBe(
			"🦜 Write a file:\n\n```python\nwith open('file.txt', 'w') as f:\n    f.write('Hello!')\n```",
		);
		expect(generateReply("how do I sort", "", first).reply).toBe(HOW_TO_CLARIFY);
	});

	it("should generate snippets or ask for detail", () => {
		expect(generateReply("make a game", "", first).reply.split("\n")[0]).toBe("🦜 Simple game:");
		expect(generateReply("create an app", "", first).reply).toBe(GENERATE_CLARIFY);
	});

	it("should fall back to the pool", () => {
		expect(generateReply("bananas", "", scriptedRandom([0.5]))).toEqual({
			intent: "fallback",
			reply: FALLBACK_REPLIES[1],
		});
	});

	it("should fall back when a rule throws", () => {
		const errors: string[] = [];
		const rules: ChatRule[] = [
			{
				intent: "concept",
				matches: () => true,
				reply: () => {
					throw new Error("no table");
				},
			},
		];
		const reply = generateReply("anything", "", scriptedRandom([0]), {
			rules,
			onRuleError: (intent) => errors.push(intent),
		});
		expect(reply).toEqual({ intent: "fallback", reply: FALLBACK_REPLIES[0] });
		expect(errors).toEqual(["concept"]);
	});

	it("should keep the default rules in evaluation order", () => {
		expect(CHAT_RULES.map((r) => r.intent)).toEqual([
			"greeting",
			"error_help",
			"concept",
			"explain_code",
			"debug_checklist",
			"how_to",
			"generate",
		]);
	});
});

describe("ChatRuleEngine", () => {
	it("should record the user and assistant turns", async () => {
		const state = new ContextState(MODEL);
		const engine = new ChatRuleEngine({ state, random: scriptedRandom([0]) });

		const reply = await engine.respond("sup");
		expect(reply).toBe(GREETINGS[0]);
		expect(state.getHistory()).toEqual([
			{ role: "user", content: "sup" },
			{ role: "assistant", content: GREETINGS[0] },
		]);
	});

	it("should answer overlapping calls in order with adjacent pairs", async () => {
		const state = new ContextState(MODEL);
		const engine = new ChatRuleEngine({
			state,
			random: scriptedRandom([0]),
			delay: recordingDelay(),
			latency: { minMs: 150, maxMs: 400 },
		});

		const replies = await Promise.all([engine.respond("bananas"), engine.respond("bug")]);
		expect(replies).toEqual([FALLBACK_REPLIES[0], DEBUG_CHECKLIST]);
		expect(state.getHistory().map((t) => `${t.role}:${t.content.slice(0, 10)}`)).toEqual([
			"user:bananas",
			`assistant:${FALLBACK_REPLIES[0].slice(0, 10)}`,
			"user:bug",
			`assistant:${DEBUG_CHECKLIST.slice(0, 10)}`,
		]);
	});

	it("should raise the thinking flag while waiting", async () => {
		const state = new ContextState(MODEL);
		const seen: boolean[] = [];
		const delay = recordingDelay((ms) => seen.push(ms === 275 && state.thinking));
		const engine = new ChatRuleEngine({
			state,
			delay,
			random: scriptedRandom([0.5]),
			latency: { minMs: 150, maxMs: 400 },
		});

		await engine.respond("hello");
		expect(seen).toEqual([true]);
		expect(state.thinking).toBe(false);
	});

	it("should log and fall back when a rule fails", async () => {
		const transport = new TestTransport();
		const engine = new ChatRuleEngine({
			state: new ContextState(MODEL),
			random: scriptedRandom([0]),
			logger: new Logger("test", { level: LogLevel.WARN, transports: [transport] }),
			rules: [
				{
					intent: "generate",
					matches: () => true,
					reply: () => {
						throw new Error("template missing");
					},
				},
			],
		});

		expect(await engine.respond("make it")).toBe(FALLBACK_REPLIES[0]);
		expect(transport.entries.map((e) => e.context)).toEqual([{ intent: "generate", error: "template missing" }]);
	});

	it("should reject pending and later calls after dispose", async () => {
		const state = new ContextState(MODEL);
		const engine = new ChatRuleEngine({ state, random: scriptedRandom([0]) });

		const first = engine.respond("hello");
		const second = engine.respond("hello again");
		engine.dispose();

		await expect(first).rejects.toBeInstanceOf(AbortError);
		await expect(second).rejects.toThrow("Request cancelled");
		await expect(engine.respond("hi")).rejects.toThrow("Chat engine disposed");
		await new Promise((resolve) => setTimeout(resolve, 0));
		expect(state.getHistory()).toEqual([]);
	});

	it("should leave history untouched when disposed mid-wait", async () => {
		const state = new ContextState(MODEL);
		let engine: ChatRuleEngine | undefined;
		const delay = recordingDelay(() => engine?.dispose());
		engine = new ChatRuleEngine({ state, delay, random: scriptedRandom([0]) });

		await expect(engine.respond("hello")).rejects.toBeInstanceOf(AbortError);
		await new Promise((resolve) => setTimeout(resolve, 0));
		expect(state.getHistory()).toEqual([]);
		expect(state.thinking).toBe(false);
	});

	it("should resolve drain once the queue is empty", async () => {
		const engine = new ChatRuleEngine({ state: new ContextState(MODEL), random: scriptedRandom([0]) });
		const reply = engine.respond("hello");
		await engine.drain();
		await expect(reply).resolves.toBe(GREETINGS[0]);
	});
});
