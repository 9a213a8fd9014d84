/**
 * @mimicode/agent: Autonomous goal runner.
 *
 * Replays scripted goals against editor, terminal and chat collaborators,
 * cycling through them until stopped. Every pause goes through the injected
 * {@link DelayPolicy} with the runner's abort signal, so `stop()` interrupts
 * a pause immediately instead of waiting it out.
 *
 * The running flag is checked before every step, after every pause and
 * before every typed character. Once it is observed cleared, no further
 * effect reaches a collaborator; an interrupted goal neither posts its
 * completion message nor advances the goal index.
 */

import {
	AbortError,
	DEFAULT_AGENT_TIMINGS,
	chance,
	createEventBus,
	createLogger,
	mathRandom,
	pick,
	randomInt,
	realDelay,
	toError,
	uniform,
} from "@mimicode/core";
import type {
	AgentTimings,
	ChatCollaborator,
	DelayPolicy,
	EditorCollaborator,
	EventBus,
	Logger,
	RandomSource,
	TerminalCollaborator,
} from "@mimicode/core";
import { THOUGHTS, getDefaultGoals, placeholderFor } from "./goals.js";
import type { AgentEvents, AgentRunState, Goal, RunnerPhase, Step } from "./types.js";

export interface AgentGoalRunnerOptions {
	editor: EditorCollaborator;
	terminal: TerminalCollaborator;
	chat: ChatCollaborator;
	/** Defaults to the bundled goal script. */
	goals?: readonly Goal[];
	timings?: AgentTimings;
	delay?: DelayPolicy;
	random?: RandomSource;
	logger?: Logger;
	/** Stop by itself after this many completed goals. */
	maxGoals?: number;
	thoughts?: readonly [string, ...string[]];
}

export class AgentGoalRunner {
	readonly events: EventBus<AgentEvents>;

	private readonly editor: EditorCollaborator;
	private readonly terminal: TerminalCollaborator;
	private readonly chat: ChatCollaborator;
	private readonly goals: readonly Goal[];
	private readonly timings: AgentTimings;
	private readonly delay: DelayPolicy;
	private readonly random: RandomSource;
	private readonly log: Logger;
	private readonly maxGoals?: number;
	private readonly thoughts: readonly [string, ...string[]];

	private running = false;
	private phase: RunnerPhase = "idle";
	private currentGoalIndex = 0;
	private goalsCompleted = 0;
	private goalName?: string;
	private stepIndex?: number;
	private abort: AbortController | null = null;
	private loop: Promise<void> | null = null;

	constructor(options: AgentGoalRunnerOptions) {
		const goals = options.goals ?? getDefaultGoals();
		if (goals.length === 0) {
			throw new TypeError("AgentGoalRunner needs at least one goal");
		}
		this.editor = options.editor;
		this.terminal = options.terminal;
		this.chat = options.chat;
		this.goals = goals;
		this.timings = options.timings ?? DEFAULT_AGENT_TIMINGS;
		this.delay = options.delay ?? realDelay;
		this.random = options.random ?? mathRandom;
		this.log = options.logger ?? createLogger("agent:runner");
		this.maxGoals = options.maxGoals;
		this.thoughts = options.thoughts ?? THOUGHTS;
		this.events = createEventBus<AgentEvents>((event, err) => {
			this.log.warn("Event handler failed", { event: String(event), error: toError(err).message });
		});
	}

	/**
	 * Start cycling through the goals. Resolves when the runner stops, either
	 * through {@link stop} or after `maxGoals` goals. Calling `start` while
	 * running returns the same promise.
	 */
	start(): Promise<void> {
		if (this.loop) return this.loop;
		this.running = true;
		this.phase = "running";
		this.abort = new AbortController();
		this.loop = this.runLoop().finally(() => {
			this.loop = null;
			this.abort = null;
		});
		return this.loop;
	}

	/** Clear the running flag and interrupt the current pause. */
	stop(): void {
		if (!this.running) return;
		this.running = false;
		this.phase = "stopping";
		this.abort?.abort();
		this.log.debug("Stop requested", { goal: this.goalName, step: this.stepIndex });
	}

	isRunning(): boolean {
		return this.running;
	}

	getState(): AgentRunState {
		return {
			running: this.running,
			phase: this.phase,
			currentGoalIndex: this.currentGoalIndex,
			goalName: this.goalName,
			stepIndex: this.stepIndex,
			goalsCompleted: this.goalsCompleted,
		};
	}

	// ─── Loop ───────────────────────────────────────────────────────────

	private async runLoop(): Promise<void> {
		let reason: "stopped" | "max-goals" = "stopped";
		this.events.emit("runner:start", { goalCount: this.goals.length });
		try {
			while (this.running) {
				if (this.reachedMaxGoals()) {
					reason = "max-goals";
					break;
				}
				const completed = await this.runGoal(this.goals[this.currentGoalIndex], this.currentGoalIndex);
				if (!completed) break;
			}
		} finally {
			this.running = false;
			this.phase = "stopped";
			this.goalName = undefined;
			this.stepIndex = undefined;
			this.events.emit("runner:stop", { goalsCompleted: this.goalsCompleted, reason });
			this.log.debug("Runner stopped", { reason, goalsCompleted: this.goalsCompleted });
		}
	}

	private reachedMaxGoals(): boolean {
		return this.maxGoals !== undefined && this.goalsCompleted >= this.maxGoals;
	}

	/** Run one goal. Returns false if the runner was stopped part-way. */
	private async runGoal(goal: Goal, goalIndex: number): Promise<boolean> {
		this.goalName = goal.name;
		this.stepIndex = undefined;
		this.editor.setStatus(`Agent: ${goal.name}`);
		this.events.emit("goal:start", { goal, goalIndex });
		this.log.debug("Goal started", { goal: goal.name, goalIndex });

		for (const [stepIndex, step] of goal.steps.entries()) {
			if (!this.running) return false;
			this.stepIndex = stepIndex;
			this.events.emit("step:start", { step, goalIndex, stepIndex });
			this.log.debug("Step started", { kind: step.kind, stepIndex });

			if (!(await this.runStep(step))) return false;
			this.events.emit("step:done", { step, goalIndex, stepIndex });

			if (!(await this.pause(this.timings.interStepMs))) return false;
		}

		if (!this.running) return false;
		this.chat.postMessage("assistant", `Completed: ${goal.name}. Taking a quick break.`);
		this.currentGoalIndex = (goalIndex + 1) % this.goals.length;
		this.goalsCompleted++;
		this.events.emit("goal:complete", { goal, goalIndex, goalsCompleted: this.goalsCompleted });
		this.log.info("Goal completed", { goal: goal.name, goalsCompleted: this.goalsCompleted });

		if (this.reachedMaxGoals()) return true;
		await this.pause(this.timings.goalBreakMs);
		return true;
	}

	/** Apply one step's effects. Returns false if stopped mid-step. */
	private async runStep(step: Step): Promise<boolean> {
		const { timings } = this;
		switch (step.kind) {
			case "chat":
				if (!(await this.pause(timings.chatPauseMs))) return false;
				this.chat.postMessage("assistant", step.message);
				return true;

			case "open":
				if (!(await this.pause(timings.openPauseMs))) return false;
				this.editor.setStatus(`Agent: Opening ${step.path}...`);
				this.editor.displayFile(step.path, placeholderFor(step.path));
				this.terminal.logCommand(`opening ${step.path}`);
				return true;

			case "edit":
				this.editor.setStatus("Agent: Writing code...");
				return this.typeCode(step.content);

			case "run": {
				this.editor.setStatus("Agent: Running commands...");
				if (!(await this.pause(timings.run.preMs))) return false;
				this.terminal.logCommand(step.command);
				if (!(await this.pause(timings.run.echoMs))) return false;
				this.terminal.logRaw("... Executing ...");
				if (!(await this.pause(timings.run.execMs))) return false;
				const elapsed = randomInt(this.random, timings.run.elapsedMinMs, timings.run.elapsedMaxMs);
				this.terminal.logRaw(`Process finished with exit code 0 (${elapsed}ms)`);
				return true;
			}

			case "think":
				this.editor.setStatus(`Agent: ${pick(this.random, this.thoughts)}`);
				return this.pause(step.durationSeconds * 1000);
		}
	}

	/** Type `content` character by character with jittered cadence. */
	private async typeCode(content: string): Promise<boolean> {
		const { typing } = this.timings;
		for (const char of content) {
			if (!this.running) return false;
			this.editor.appendText(char);
			if (!(await this.pause(uniform(this.random, typing.minMs, typing.maxMs)))) return false;
			if (chance(this.random, typing.hesitationChance) && !(await this.pause(typing.hesitationMs))) {
				return false;
			}
		}
		return true;
	}

	/**
	 * Wait `ms` unless stopped. Returns whether the runner is still running
	 * afterwards.
	 */
	private async pause(ms: number): Promise<boolean> {
		if (!this.running) return false;
		try {
			await this.delay.wait(ms, this.abort?.signal);
		} catch (err) {
			if (err instanceof AbortError) return false;
			throw err;
		}
		return this.running;
	}
}
