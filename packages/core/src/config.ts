import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, toError } from "./errors.js";
import type { DeepPartial, MimicodeSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { assertValid, v } from "./validation.js";
import type { Validator } from "./validation.js";

/** File name of the per-project settings layer. */
export const PROJECT_CONFIG_FILE = "mimicode.json";

const range = () => v.object({ minMs: v.number().min(0), maxMs: v.number().min(0) });
const duration = () => v.number().min(0);

/** Schema of a fully merged settings object. */
export const SETTINGS_SCHEMA: Validator<MimicodeSettings> = v.object({
	model: v.object({
		id: v.string().min(1),
		windowLimit: v.number().integer().min(1),
		temperature: v.number().min(0).max(2),
		topP: v.number().min(0).max(1),
	}),
	latency: v.object({
		completion: range(),
		chat: range(),
	}),
	session: v.object({
		debounceMs: duration(),
		popupSize: v.number().integer().min(1).max(8),
	}),
	agent: v.object({
		chatPauseMs: duration(),
		openPauseMs: duration(),
		interStepMs: duration(),
		goalBreakMs: duration(),
		typing: v.object({
			minMs: duration(),
			maxMs: duration(),
			hesitationChance: v.number().min(0).max(1),
			hesitationMs: duration(),
		}),
		run: v.object({
			preMs: duration(),
			echoMs: duration(),
			execMs: duration(),
			elapsedMinMs: v.number().integer().min(0),
			elapsedMaxMs: v.number().integer().min(0),
		}),
	}),
	seed: v.optional(v.number().integer()),
	logLevel: v.literal("debug", "info", "warn", "error"),
});

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge `layer` over `base`. Plain objects are merged key by key; arrays and
 * scalars replace; `undefined` in the layer keeps the base value.
 */
export function mergeLayers(base: unknown, layer: unknown): unknown {
	if (layer === undefined) return base;
	if (!isRecord(base) || !isRecord(layer)) return layer;
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(layer)) {
		merged[key] = mergeLayers(base[key], value);
	}
	return merged;
}

/**
 * Get the mimicode home directory (`~/.mimicode`).
 *
 * Honors `MIMICODE_HOME` when set.
 */
export function getMimicodeHome(): string {
	const override = process.env.MIMICODE_HOME?.trim();
	if (override) return override;
	return path.join(os.homedir(), ".mimicode");
}

/**
 * Read and parse a JSON settings layer.
 *
 * @returns The parsed value, or `undefined` when the file does not exist.
 * @throws {ConfigError} If the file exists but cannot be read or parsed.
 */
export function readJsonLayer(filePath: string): unknown {
	if (!fs.existsSync(filePath)) return undefined;
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, "utf-8");
	} catch (err) {
		throw new ConfigError(`Failed to read ${filePath}`, [], toError(err));
	}
	try {
		return JSON.parse(raw);
	} catch (err) {
		throw new ConfigError(`Failed to parse ${filePath}: ${toError(err).message}`, [], toError(err));
	}
}

/**
 * Merge layers over {@link DEFAULT_SETTINGS} (later layers win) and validate.
 *
 * @throws {ConfigError} When the merged settings fail validation.
 */
export function resolveSettings(...layers: unknown[]): MimicodeSettings {
	let merged: unknown = DEFAULT_SETTINGS;
	for (const layer of layers) {
		if (layer !== undefined && !isRecord(layer)) {
			throw new ConfigError("Settings layer must be a JSON object", [`$: Expected object`]);
		}
		merged = mergeLayers(merged, layer);
	}
	return assertValid(SETTINGS_SCHEMA, merged, "settings");
}

export interface LoadSettingsOptions {
	/** Directory holding an optional `mimicode.json`. */
	projectPath?: string;
	/** Programmatic layer applied last (e.g. CLI flags). */
	overrides?: DeepPartial<MimicodeSettings>;
}

/**
 * Load settings from every layer:
 * defaults → `$MIMICODE_HOME/settings.json` → `<projectPath>/mimicode.json` → overrides.
 */
export function loadSettings(options: LoadSettingsOptions = {}): MimicodeSettings {
	const globalLayer = readJsonLayer(path.join(getMimicodeHome(), "settings.json"));
	const projectLayer = options.projectPath
		? readJsonLayer(path.join(options.projectPath, PROJECT_CONFIG_FILE))
		: undefined;
	return resolveSettings(globalLayer, projectLayer, options.overrides);
}
