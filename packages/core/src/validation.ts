/**
 * Runtime validation for settings files and goal scripts.
 *
 * A fluent builder in the spirit of Zod, kept dependency-free. Every
 * validator is a type guard, so a successful check narrows `unknown` to the
 * inferred shape without casts:
 *
 * ```ts
 * const schema = v.object({ name: v.string().min(1), retries: v.number().integer() });
 * const value = assertValid(schema, JSON.parse(raw), "settings");
 * value.retries; // number
 * ```
 */

import { ConfigError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/** Base class of all validators. `T` is the type a passing value has. */
export abstract class Validator<T> {
	/** Type-level marker only; never assigned. */
	declare readonly _output: T;

	/** Collect every problem with `value`, reporting paths under `path`. */
	abstract check(value: unknown, path: string): ValidationError[];

	is(value: unknown): value is T {
		return this.check(value, "$").length === 0;
	}
}

/** The type a validator accepts. */
export type Infer<V> = V extends { readonly _output: infer T } ? T : never;

export type Shape = Record<string, Validator<unknown>>;
export type InferShape<S extends Shape> = { [K in keyof S]: Infer<S[K]> };

function fail(path: string, message: string, received: unknown): ValidationError[] {
	return [{ path, message, received }];
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Validators ──────────────────────────────────────────────────────────────

export class StringValidator extends Validator<string> {
	private minLen?: number;
	private patternRe?: RegExp;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	pattern(re: RegExp): this {
		this.patternRe = re;
		return this;
	}

	check(value: unknown, path: string): ValidationError[] {
		if (typeof value !== "string") return fail(path, `Expected string, received ${describe(value)}`, value);
		if (this.minLen !== undefined && value.length < this.minLen) {
			return fail(path, `String length ${value.length} is below minimum ${this.minLen}`, value);
		}
		if (this.patternRe && !this.patternRe.test(value)) {
			return fail(path, `String does not match pattern ${this.patternRe}`, value);
		}
		return [];
	}
}

export class NumberValidator extends Validator<number> {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	check(value: unknown, path: string): ValidationError[] {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return fail(path, `Expected number, received ${describe(value)}`, value);
		}
		if (this.intOnly && !Number.isInteger(value)) return fail(path, `Expected integer, received ${value}`, value);
		if (this.minVal !== undefined && value < this.minVal) {
			return fail(path, `Number ${value} is below minimum ${this.minVal}`, value);
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return fail(path, `Number ${value} exceeds maximum ${this.maxVal}`, value);
		}
		return [];
	}
}

export class BooleanValidator extends Validator<boolean> {
	check(value: unknown, path: string): ValidationError[] {
		return typeof value === "boolean" ? [] : fail(path, `Expected boolean, received ${describe(value)}`, value);
	}
}

export class LiteralValidator<T extends string> extends Validator<T> {
	constructor(private readonly options: readonly T[]) {
		super();
	}

	check(value: unknown, path: string): ValidationError[] {
		if (typeof value === "string" && this.options.some((o) => o === value)) return [];
		return fail(path, `Expected one of ${this.options.map((o) => JSON.stringify(o)).join(", ")}`, value);
	}
}

export class ArrayValidator<T> extends Validator<T[]> {
	private minLen?: number;

	constructor(private readonly item: Validator<T>) {
		super();
	}

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	check(value: unknown, path: string): ValidationError[] {
		if (!Array.isArray(value)) return fail(path, `Expected array, received ${describe(value)}`, value);
		if (this.minLen !== undefined && value.length < this.minLen) {
			return fail(path, `Array length ${value.length} is below minimum ${this.minLen}`, value);
		}
		return value.flatMap((entry, i) => this.item.check(entry, `${path}[${i}]`));
	}
}

export class RecordValidator<T> extends Validator<Record<string, T>> {
	constructor(private readonly entry: Validator<T>) {
		super();
	}

	check(value: unknown, path: string): ValidationError[] {
		if (!isRecord(value)) return fail(path, `Expected object, received ${describe(value)}`, value);
		return Object.entries(value).flatMap(([key, entry]) => this.entry.check(entry, `${path}.${key}`));
	}
}

export class ObjectValidator<S extends Shape> extends Validator<InferShape<S>> {
	constructor(private readonly shape: S) {
		super();
	}

	check(value: unknown, path: string): ValidationError[] {
		if (!isRecord(value)) return fail(path, `Expected object, received ${describe(value)}`, value);
		return Object.entries(this.shape).flatMap(([key, validator]) => validator.check(value[key], `${path}.${key}`));
	}
}

export class OptionalValidator<T> extends Validator<T | undefined> {
	constructor(private readonly inner: Validator<T>) {
		super();
	}

	check(value: unknown, path: string): ValidationError[] {
		return value === undefined ? [] : this.inner.check(value, path);
	}
}

export class UnionValidator<A, B> extends Validator<A | B> {
	constructor(private readonly left: Validator<A>, private readonly right: Validator<B>) {
		super();
	}

	check(value: unknown, path: string): ValidationError[] {
		const leftErrors = this.left.check(value, path);
		if (leftErrors.length === 0) return [];
		const rightErrors = this.right.check(value, path);
		if (rightErrors.length === 0) return [];
		return leftErrors.length <= rightErrors.length ? leftErrors : rightErrors;
	}
}

// ─── Builder ─────────────────────────────────────────────────────────────────

export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	literal: <T extends string>(...options: T[]) => new LiteralValidator<T>(options),
	array: <T>(item: Validator<T>) => new ArrayValidator<T>(item),
	record: <T>(entry: Validator<T>) => new RecordValidator<T>(entry),
	object: <S extends Shape>(shape: S) => new ObjectValidator<S>(shape),
	optional: <T>(inner: Validator<T>) => new OptionalValidator<T>(inner),
	union: <A, B>(left: Validator<A>, right: Validator<B>) => new UnionValidator<A, B>(left, right),
};

// ─── Entry Points ────────────────────────────────────────────────────────────

/**
 * Validate `value`, returning every error instead of throwing.
 */
export function validate<T>(validator: Validator<T>, value: unknown, root = "$"): ValidationResult<T> {
	if (validator.is(value)) return { valid: true, errors: [], value };
	return { valid: false, errors: validator.check(value, root) };
}

/** Render errors as `path: message` lines. */
export function formatValidationErrors(errors: ValidationError[]): string[] {
	return errors.map((e) => `${e.path}: ${e.message}`);
}

/**
 * Validate `value` or throw a {@link ConfigError} listing every failing path.
 *
 * @param label - Root path used in messages, e.g. the settings file name.
 */
export function assertValid<T>(validator: Validator<T>, value: unknown, label = "$"): T {
	if (validator.is(value)) return value;
	const issues = formatValidationErrors(validator.check(value, label));
	throw new ConfigError(`Invalid ${label}: ${issues.join("; ")}`, issues);
}
