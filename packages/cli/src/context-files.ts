/**
 * @mimicode/cli: Code context loader.
 *
 * `--context <file>` names a source file whose text the engines see as the
 * editor buffer: the completion `fullContext` and the chat `codeContext`.
 */

import fs from "node:fs";
import path from "node:path";
import { MimicodeError, toError } from "@mimicode/core";

/**
 * Read the code context file, resolved against `cwd`.
 *
 * @returns The file text, or `""` when no file was given.
 * @throws {MimicodeError} With code `CONTEXT_ERROR` if the file cannot be read.
 */
export function loadCodeContext(file: string | undefined, cwd: string): string {
	if (file === undefined) return "";
	const resolved = path.resolve(cwd, file);
	try {
		return fs.readFileSync(resolved, "utf-8");
	} catch (err) {
		throw new MimicodeError(`Cannot read context file ${file}`, "CONTEXT_ERROR", toError(err));
	}
}
