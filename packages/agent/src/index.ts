// @mimicode/agent: Scripted autonomous goal runner
export * from "./types.js";
export { AgentGoalRunner } from "./goal-runner.js";
export type { AgentGoalRunnerOptions } from "./goal-runner.js";
export { THOUGHTS, getDefaultGoals, placeholderFor } from "./goals.js";
export { GOAL_SCRIPT_SCHEMA, loadGoalScript, parseGoalScript } from "./goal-script.js";
export type { GoalScriptDocument } from "./goal-script.js";
