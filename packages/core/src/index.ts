// @mimicode/core: Foundation
export * from "./types.js";
export * from "./errors.js";
export * from "./collaborators.js";
export { createEventBus } from "./events.js";
export type { EventBus, EventHandler } from "./events.js";
export {
	SETTINGS_SCHEMA,
	PROJECT_CONFIG_FILE,
	getMimicodeHome,
	loadSettings,
	mergeLayers,
	readJsonLayer,
	resolveSettings,
} from "./config.js";
export type { LoadSettingsOptions } from "./config.js";

// Validation
export {
	v,
	validate,
	assertValid,
	formatValidationErrors,
	Validator,
	StringValidator,
	NumberValidator,
	BooleanValidator,
	LiteralValidator,
	ArrayValidator,
	RecordValidator,
	ObjectValidator,
	OptionalValidator,
	UnionValidator,
} from "./validation.js";
export type { Infer, InferShape, Shape, ValidationError, ValidationResult } from "./validation.js";

// Timing & randomness
export { sleep, realDelay, instantDelay, recordingDelay } from "./timing.js";
export type { DelayPolicy, RecordingDelay } from "./timing.js";
export {
	Xorshift32,
	mathRandom,
	scriptedRandom,
	createRandom,
	uniform,
	randomInt,
	chance,
	pick,
} from "./random.js";
export type { RandomSource } from "./random.js";

// Observability
export * from "./observability/index.js";
