/**
 * @mimicode/agent: Goal script loading.
 *
 * A goal script is a JSON document `{ "goals": Goal[] }`. Steps are
 * validated per kind, so a typo in `kind` reports the allowed kinds rather
 * than every field of every step shape.
 */

import fs from "node:fs";
import { ScriptError, Validator, formatValidationErrors, toError, v } from "@mimicode/core";
import type { ValidationError } from "@mimicode/core";
import type { Goal, Step, StepKind } from "./types.js";

const STEP_SHAPES: Record<StepKind, Validator<unknown>> = {
	chat: v.object({ message: v.string().min(1) }),
	open: v.object({ path: v.string().min(1) }),
	edit: v.object({ content: v.string() }),
	run: v.object({ command: v.string().min(1) }),
	think: v.object({ durationSeconds: v.number().min(0) }),
};

function isStepKind(value: unknown): value is StepKind {
	return typeof value === "string" && Object.prototype.hasOwnProperty.call(STEP_SHAPES, value);
}

class StepValidator extends Validator<Step> {
	check(value: unknown, path: string): ValidationError[] {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return [{ path, message: "Expected step object", received: value }];
		}
		const kind: unknown = "kind" in value ? value.kind : undefined;
		if (!isStepKind(kind)) {
			const kinds = Object.keys(STEP_SHAPES).map((k) => JSON.stringify(k)).join(", ");
			return [{ path: `${path}.kind`, message: `Expected one of ${kinds}`, received: kind }];
		}
		return STEP_SHAPES[kind].check(value, path);
	}
}

/** Shape of a goal script before steps are normalised. */
export interface GoalScriptDocument {
	goals: { name: string; steps: Step[] }[];
}

export const GOAL_SCRIPT_SCHEMA: Validator<GoalScriptDocument> = v.object({
	goals: v.array(v.object({
		name: v.string().min(1),
		steps: v.array(new StepValidator()).min(1),
	})).min(1),
});

/** Copy only the fields a step kind declares. */
function normaliseStep(step: Step): Step {
	switch (step.kind) {
		case "chat":
			return { kind: "chat", message: step.message };
		case "open":
			return { kind: "open", path: step.path };
		case "edit":
			return { kind: "edit", content: step.content };
		case "run":
			return { kind: "run", command: step.command };
		case "think":
			return { kind: "think", durationSeconds: step.durationSeconds };
	}
}

/**
 * Validate a parsed goal script.
 *
 * @param scriptPath - Used in error messages.
 * @throws {ScriptError} Listing every failing path.
 */
export function parseGoalScript(value: unknown, scriptPath = "<inline>"): Goal[] {
	if (!GOAL_SCRIPT_SCHEMA.is(value)) {
		const issues = formatValidationErrors(GOAL_SCRIPT_SCHEMA.check(value, "$"));
		throw new ScriptError(`Invalid goal script ${scriptPath}: ${issues.join("; ")}`, scriptPath, issues);
	}
	return value.goals.map((goal) => ({
		name: goal.name,
		steps: goal.steps.map(normaliseStep),
	}));
}

/**
 * Read and validate a goal script file.
 *
 * @throws {ScriptError} If the file is missing, is not JSON, or is invalid.
 */
export function loadGoalScript(scriptPath: string | URL): Goal[] {
	const label = scriptPath instanceof URL ? scriptPath.pathname : scriptPath;
	let raw: string;
	try {
		raw = fs.readFileSync(scriptPath, "utf-8");
	} catch (err) {
		throw new ScriptError(`Cannot read goal script ${label}`, label, [], toError(err));
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err) {
		throw new ScriptError(`Goal script ${label} is not valid JSON: ${toError(err).message}`, label, [], toError(err));
	}
	return parseGoalScript(parsed, label);
}
