/**
 * @mimicode/agent: Goal, step and runner types.
 */

// ─── Steps ──────────────────────────────────────────────────────────────────

/** Post a message to the chat panel. */
export interface ChatStep {
	kind: "chat";
	message: string;
}

/** Open a file in the editor with a placeholder comment. */
export interface OpenStep {
	kind: "open";
	path: string;
}

/** Type `content` into the editor one character at a time. */
export interface EditStep {
	kind: "edit";
	content: string;
}

/** Echo a command in the terminal and fake its execution. */
export interface RunStep {
	kind: "run";
	command: string;
}

/** Show a random thought and pause. */
export interface ThinkStep {
	kind: "think";
	durationSeconds: number;
}

export type Step = ChatStep | OpenStep | EditStep | RunStep | ThinkStep;

export type StepKind = Step["kind"];

export interface Goal {
	name: string;
	steps: Step[];
}

// ─── Runner ─────────────────────────────────────────────────────────────────

export type RunnerPhase = "idle" | "running" | "stopping" | "stopped";

export interface AgentRunState {
	running: boolean;
	phase: RunnerPhase;
	/** Index of the goal that runs next (or is running). */
	currentGoalIndex: number;
	goalName?: string;
	stepIndex?: number;
	goalsCompleted: number;
}

export interface AgentEvents {
	"runner:start": { goalCount: number };
	"goal:start": { goal: Goal; goalIndex: number };
	"step:start": { step: Step; goalIndex: number; stepIndex: number };
	"step:done": { step: Step; goalIndex: number; stepIndex: number };
	"goal:complete": { goal: Goal; goalIndex: number; goalsCompleted: number };
	"runner:stop": { goalsCompleted: number; reason: "stopped" | "max-goals" };
}
