import { Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import {
	ConsoleChat,
	ConsoleEditor,
	ConsolePopup,
	ConsoleTerminal,
	ConsoleWriter,
	formatCandidate,
} from "@mimicode/cli";

function capture(): { stream: Writable; text: () => string } {
	let text = "";
	const stream = new Writable({
		write(chunk: Buffer | string, _encoding, callback) {
			text += chunk.toString();
			callback();
		},
	});
	return { stream, text: () => text };
}

describe("ConsoleWriter", () => {
	it("should start a new line only when mid-line", () => {
		const out = capture();
		const writer = new ConsoleWriter(out.stream);
		writer.write("abc");
		writer.line("next");
		writer.line("again");
		expect(out.text()).toBe("abc\nnext\nagain\n");
	});

	it("should colour through the palette when enabled", () => {
		const out = capture();
		new ConsoleTerminal(new ConsoleWriter(out.stream, true)).logCommand("make");
		expect(out.text()).toBe("\x1b[32m$ make\x1b[0m\n");
	});
});

describe("console collaborators", () => {
	it("should render an agent session as plain lines", () => {
		const out = capture();
		const writer = new ConsoleWriter(out.stream);
		const editor = new ConsoleEditor(writer);
		const terminal = new ConsoleTerminal(writer);
		const chat = new ConsoleChat(writer);

		editor.setStatus("Agent: Writing code...");
		editor.displayFile("app.py", "# File opened by agent\n");
		editor.appendText("x = 1");
		chat.postMessage("assistant", "Done.");
		chat.postMessage("user", "Thanks");
		terminal.logRaw("... Executing ...");

		expect(out.text()).toBe(
			"[status] Agent: Writing code...\n" +
				"── app.py ──\n" +
				"# File opened by agent\n" +
				"x = 1\n" +
				"[mimicode] Done.\n" +
				"[you] Thanks\n" +
				"... Executing ...\n",
		);
		expect(editor.getAllText()).toBe("# File opened by agent\nx = 1");
		expect(editor.getCurrentLineAndCursor()).toEqual({ lineText: "x = 1", position: { line: 1, column: 5 } });
		expect(editor.getPath()).toBe("app.py");
	});

	it("should print candidates one per line with escaped newlines", () => {
		const out = capture();
		new ConsolePopup(new ConsoleWriter(out.stream)).showCandidates(["math", "self):\n        pass"]);
		expect(out.text()).toBe("math\nself):\\n        pass\n");
		expect(formatCandidate("a\nb\n")).toBe("a\\nb\\n");
	});
});
