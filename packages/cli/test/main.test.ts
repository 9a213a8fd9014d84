import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable, Writable } from "node:stream";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEBUG_CHECKLIST, GREETINGS } from "@mimicode/model";
import { recordingDelay } from "@mimicode/core";
import { HELP_TEXT, VERSION, main } from "@mimicode/cli";
import type { CliIO } from "@mimicode/cli";

interface Captured {
	io: CliIO;
	stdout: () => string;
	stderr: () => string;
}

function sink(): { stream: Writable; text: () => string } {
	let text = "";
	const stream = new Writable({
		write(chunk: Buffer | string, _encoding, callback) {
			text += chunk.toString();
			callback();
		},
	});
	return { stream, text: () => text };
}

function capture(cwd: string, extra: Partial<CliIO> = {}): Captured {
	const out = sink();
	const err = sink();
	return {
		io: { stdout: out.stream, stderr: err.stream, cwd, colors: false, ...extra },
		stdout: out.text,
		stderr: err.text,
	};
}

describe("main", () => {
	let cwd: string;

	beforeEach(() => {
		cwd = fs.mkdtempSync(path.join(os.tmpdir(), "mimicode-cli-"));
	});

	afterEach(() => {
		fs.rmSync(cwd, { recursive: true, force: true });
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Usage
	// ═══════════════════════════════════════════════════════════════════════

	describe("usage", () => {
		it("should print the version", async () => {
			const run = capture(cwd);
			expect(await main(["--version"], run.io)).toBe(0);
			expect(run.stdout()).toBe(`mimicode v${VERSION}\n`);
		});

		it("should print help", async () => {
			const run = capture(cwd);
			expect(await main(["-h"], run.io)).toBe(0);
			expect(run.stdout()).toBe(HELP_TEXT);
		});

		it("should exit 2 without a command", async () => {
			const run = capture(cwd);
			expect(await main([], run.io)).toBe(2);
			expect(run.stderr()).toBe("Error: No command given\nRun `mimicode --help` for usage information.\n");
		});

		it("should report every argument problem", async () => {
			const run = capture(cwd);
			expect(await main(["frob", "--goals", "x"], run.io)).toBe(2);
			expect(run.stderr()).toBe(
				"Error: Unknown command: frob\n" +
					'Error: --goals expects a positive integer, got "x"\n' +
					"Run `mimicode --help` for usage information.\n",
			);
		});

		it("should exit 2 when complete has no line", async () => {
			const run = capture(cwd);
			expect(await main(["complete"], run.io)).toBe(2);
			expect(run.stderr()).toBe(
				'Error: complete needs the line to complete, e.g. mimicode complete "import ma"\n' +
					"Run `mimicode --help` for usage information.\n",
			);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Commands
	// ═══════════════════════════════════════════════════════════════════════

	describe("complete", () => {
		it("should print candidates one per line", async () => {
			const run = capture(cwd);
			expect(await main(["complete", "import ma", "--instant"], run.io)).toBe(0);
			expect(run.stdout()).toBe("math\n");
		});

		it("should escape newlines in candidates", async () => {
			const run = capture(cwd);
			expect(await main(["complete", "def", "save_notes(", "--instant"], run.io)).toBe(0);
			expect(run.stdout()).toBe("data, filename):\\n        with open(filename, 'w') as f:\\n            f.write(data)\n");
		});
	});

	describe("chat", () => {
		it("should print a one-shot reply", async () => {
			const run = capture(cwd);
			expect(await main(["chat", "there", "is", "a", "bug", "--instant"], run.io)).toBe(0);
			expect(run.stdout()).toBe(`${DEBUG_CHECKLIST}\n`);
		});

		it("should explain the context file", async () => {
			fs.writeFileSync(path.join(cwd, "calc.py"), "def add(a, b):\n    return a + b\n");
			const run = capture(cwd);
			expect(await main(["chat", "explain", "--context", "calc.py", "--instant"], run.io)).toBe(0);
			expect(run.stdout()).toBe(
				"🦜 Here's what I see:\n\n• Function `add`\n• Return statement\n\nAsk me about any part! 🦜\n",
			);
		});

		it("should exit 1 for an unreadable context file", async () => {
			const run = capture(cwd);
			expect(await main(["chat", "explain", "--context", "missing.py", "--instant"], run.io)).toBe(1);
			expect(run.stderr()).toBe("Error: Cannot read context file missing.py\n");
		});

		it("should run a REPL over stdin", async () => {
			const run = capture(cwd, { stdin: Readable.from(["bug\n/status\n", "/history\n/exit\nhello\n"]) });
			expect(await main(["chat", "--instant"], run.io)).toBe(0);

			const status = { modelId: "mimic-14b-distill-v1", historyLength: 2, thinking: false, windowTokens: 56 };
			expect(run.stdout()).toBe(
				`[mimicode] ${DEBUG_CHECKLIST}\n` +
					`${JSON.stringify(status)}\n` +
					"user: bug\n" +
					`assistant: ${DEBUG_CHECKLIST}\n`,
			);
		});

		it("should answer greetings from the pool", async () => {
			const run = capture(cwd);
			expect(await main(["chat", "hello", "--instant", "--seed", "9"], run.io)).toBe(0);
			expect(GREETINGS).toContain(run.stdout().trimEnd());
		});
	});

	describe("status", () => {
		it("should merge project settings into the report", async () => {
			fs.writeFileSync(path.join(cwd, "mimicode.json"), JSON.stringify({ model: { temperature: 0.2 } }));
			const run = capture(cwd);
			expect(await main(["status"], run.io)).toBe(0);
			expect(JSON.parse(run.stdout())).toEqual({
				modelId: "mimic-14b-distill-v1",
				historyLength: 0,
				thinking: false,
				windowTokens: 0,
				windowLimit: 4096,
				temperature: 0.2,
				topP: 0.9,
			});
		});

		it("should exit 1 for invalid settings", async () => {
			fs.writeFileSync(path.join(cwd, "mimicode.json"), JSON.stringify({ session: { popupSize: 0 } }));
			const run = capture(cwd);
			expect(await main(["status"], run.io)).toBe(1);
			expect(run.stderr()).toBe(
				"Error: Invalid settings: settings.session.popupSize: Number 0 is below minimum 1\n",
			);
		});
	});

	describe("agent", () => {
		const script = {
			goals: [
				{
					name: "Ship",
					steps: [
						{ kind: "chat", message: "Shipping." },
						{ kind: "open", path: "notes.md" },
					],
				},
			],
		};

		it("should run a goal script for the requested number of goals", async () => {
			fs.writeFileSync(path.join(cwd, "goals.json"), JSON.stringify(script));
			const run = capture(cwd);
			expect(await main(["agent", "--script", "goals.json", "--goals", "1", "--instant"], run.io)).toBe(0);
			expect(run.stdout()).toBe(
				[
					"Agent terminal initialized...",
					"[mimicode] Agent initialized. Ready to code.",
					"[status] Agent: Ship",
					"[mimicode] Shipping.",
					"[status] Agent: Opening notes.md...",
					"── notes.md ──",
					"<!-- File opened by agent -->",
					"$ opening notes.md",
					"[mimicode] Completed: Ship. Taking a quick break.",
					"Agent stopped after 1 goal.",
					"",
				].join("\n"),
			);
			expect(run.stderr()).toBe("");
		});

		it("should write JSON logs to stderr", async () => {
			fs.writeFileSync(path.join(cwd, "goals.json"), JSON.stringify(script));
			const run = capture(cwd);
			const args = ["agent", "--script", "goals.json", "--goals", "1", "--instant", "--json-logs", "--log-level", "info"];
			expect(await main(args, run.io)).toBe(0);

			const entries: unknown[] = run.stderr().trim().split("\n").map((line) => JSON.parse(line));
			expect(entries).toEqual([
				expect.objectContaining({
					level: "INFO",
					logger: "cli:agent",
					message: "Goal completed",
					context: { goal: "Ship", goalsCompleted: 1 },
				}),
			]);
		});

		it("should stop the bundled goals when the signal aborts", async () => {
			const controller = new AbortController();
			const delay = recordingDelay((_ms, index) => {
				if (index === 2) controller.abort();
			});
			const run = capture(cwd, { signal: controller.signal, delay });

			expect(await main(["agent"], run.io)).toBe(0);
			expect(run.stdout()).toBe(
				[
					"Agent terminal initialized...",
					"[mimicode] Agent initialized. Ready to code.",
					"[status] Agent: Refactor auth to JWT",
					"[mimicode] Session cookies are getting messy. Moving auth over to signed tokens.",
					"Agent stopped after 0 goals.",
					"",
				].join("\n"),
			);
		});

		it("should exit 1 for an invalid goal script", async () => {
			fs.writeFileSync(path.join(cwd, "goals.json"), JSON.stringify({ goals: [] }));
			const run = capture(cwd);
			expect(await main(["agent", "--script", "goals.json", "--instant"], run.io)).toBe(1);
			expect(run.stderr()).toBe(
				`Error: Invalid goal script ${path.join(cwd, "goals.json")}: $.goals: Array length 0 is below minimum 1\n`,
			);
		});
	});
});
