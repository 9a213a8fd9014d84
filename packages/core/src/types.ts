import type { LogLevelName } from "./observability/logger.js";

// ─── Settings ────────────────────────────────────────────────────────────────

/** Inclusive-exclusive range of simulated latency, in milliseconds. */
export interface LatencyRange {
	minMs: number;
	maxMs: number;
}

/** Identity and sampling metadata the fake model reports about itself. */
export interface ModelSettings {
	id: string;
	/** Token budget of the context window view (history itself is never trimmed). */
	windowLimit: number;
	temperature: number;
	topP: number;
}

/** Host-side completion popup behaviour. */
export interface SessionSettings {
	/** Quiet period after a keystroke before completion is requested. */
	debounceMs: number;
	/** Maximum candidates shown in the popup. */
	popupSize: number;
}

/** Simulated timings of the goal runner. */
export interface AgentTimings {
	chatPauseMs: number;
	openPauseMs: number;
	interStepMs: number;
	goalBreakMs: number;
	typing: {
		minMs: number;
		maxMs: number;
		/** Probability of an extra pause after a character. */
		hesitationChance: number;
		hesitationMs: number;
	};
	run: {
		preMs: number;
		echoMs: number;
		execMs: number;
		elapsedMinMs: number;
		elapsedMaxMs: number;
	};
}

export interface MimicodeSettings {
	model: ModelSettings;
	latency: {
		completion: LatencyRange;
		chat: LatencyRange;
	};
	session: SessionSettings;
	agent: AgentTimings;
	/** Seed for every random decision; unseeded runs use Math.random. */
	seed?: number;
	logLevel: LogLevelName;
}

export const DEFAULT_AGENT_TIMINGS: AgentTimings = {
	chatPauseMs: 1000,
	openPauseMs: 1000,
	interStepMs: 1000,
	goalBreakMs: 3000,
	typing: {
		minMs: 10,
		maxMs: 80,
		hesitationChance: 0.05,
		hesitationMs: 300,
	},
	run: {
		preMs: 1000,
		echoMs: 500,
		execMs: 1500,
		elapsedMinMs: 100,
		elapsedMaxMs: 900,
	},
};

export const DEFAULT_SETTINGS: MimicodeSettings = {
	model: {
		id: "mimic-14b-distill-v1",
		windowLimit: 4096,
		temperature: 0.7,
		topP: 0.9,
	},
	latency: {
		completion: { minMs: 30, maxMs: 100 },
		chat: { minMs: 150, maxMs: 400 },
	},
	session: {
		debounceMs: 80,
		popupSize: 6,
	},
	agent: DEFAULT_AGENT_TIMINGS,
	logLevel: "warn",
};

/** Recursive partial, used for programmatic overrides. */
export type DeepPartial<T> = {
	[K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
