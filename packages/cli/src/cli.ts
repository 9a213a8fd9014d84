#!/usr/bin/env node

/**
 * @mimicode/cli: Entry point.
 *
 * Binds `main()` to the process: its streams, its working directory and
 * Ctrl+C, which stops a running agent or REPL instead of killing it mid-line.
 */

import { main } from "./main.js";

const controller = new AbortController();
let interrupted = false;

process.on("SIGINT", () => {
	if (interrupted) process.exit(130);
	interrupted = true;
	controller.abort();
});

main(process.argv.slice(2), {
	stdout: process.stdout,
	stderr: process.stderr,
	stdin: process.stdin,
	cwd: process.cwd(),
	signal: controller.signal,
	colors: process.stdout.isTTY ?? false,
})
	.then((code) => {
		process.exit(code);
	})
	.catch((error: unknown) => {
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`\nFatal error: ${message}\n\n`);
		process.exit(1);
	});
