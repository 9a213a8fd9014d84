import { describe, it, expect } from "vitest";
import {
	v,
	validate,
	assertValid,
	formatValidationErrors,
	ArrayValidator,
	ConfigError,
	NumberValidator,
	ObjectValidator,
	RecordValidator,
	StringValidator,
} from "@mimicode/core";
import type { Infer } from "@mimicode/core";

// ─── Scalars ─────────────────────────────────────────────────────────────────

describe("string", () => {
	it("should accept strings and reject other types", () => {
		expect(v.string().is("hello")).toBe(true);
		expect(v.string().check(42, "$.name")).toEqual([
			{ path: "$.name", message: "Expected string, received number", received: 42 },
		]);
	});

	it("should enforce min length", () => {
		const validator = v.string().min(3);
		expect(validator.is("ab")).toBe(false);
		expect(validator.check("ab", "$")[0].message).toBe("String length 2 is below minimum 3");
		expect(validator.is("abc")).toBe(true);
	});

	it("should enforce a pattern", () => {
		const validator = v.string().pattern(/^[a-z]+$/);
		expect(validator.is("abc")).toBe(true);
		expect(validator.is("ABC")).toBe(false);
	});
});

describe("number", () => {
	it("should reject NaN", () => {
		expect(v.number().is(Number.NaN)).toBe(false);
	});

	it("should enforce bounds and integers", () => {
		const validator = v.number().integer().min(1).max(8);
		expect(validator.is(6)).toBe(true);
		expect(validator.check(0, "$")[0].message).toBe("Number 0 is below minimum 1");
		expect(validator.check(9, "$")[0].message).toBe("Number 9 exceeds maximum 8");
		expect(validator.check(2.5, "$")[0].message).toBe("Expected integer, received 2.5");
	});
});

describe("boolean and literal", () => {
	it("should accept only booleans", () => {
		expect(v.boolean().is(false)).toBe(true);
		expect(v.boolean().is("false")).toBe(false);
	});

	it("should accept only the listed literals", () => {
		const level = v.literal("debug", "info");
		expect(level.is("info")).toBe(true);
		expect(level.check("trace", "$.logLevel")[0].message).toBe('Expected one of "debug", "info"');
	});
});

// ─── Composites ──────────────────────────────────────────────────────────────

describe("object, array and record", () => {
	const schema = v.object({
		name: v.string().min(1),
		steps: v.array(v.number()).min(1),
		tags: v.record(v.string()),
		seed: v.optional(v.number().integer()),
	});

	it("should accept a matching value", () => {
		expect(schema.is({ name: "x", steps: [1], tags: { a: "b" } })).toBe(true);
	});

	it("should report every failing path", () => {
		const errors = schema.check({ name: "", steps: [1, "two"], tags: { a: 1 }, seed: 1.5 }, "$");
		expect(formatValidationErrors(errors)).toEqual([
			"$.name: String length 0 is below minimum 1",
			"$.steps[1]: Expected number, received string",
			"$.tags.a: Expected string, received number",
			"$.seed: Expected integer, received 1.5",
		]);
	});

	it("should reject arrays below the minimum length", () => {
		expect(schema.check({ name: "x", steps: [], tags: {} }, "$")[0].message).toBe(
			"Array length 0 is below minimum 1",
		);
	});

	it("should reject arrays where objects are expected", () => {
		expect(schema.check([], "$")[0].message).toBe("Expected object, received array");
	});
});

describe("union", () => {
	it("should accept either side", () => {
		const validator = v.union(v.string(), v.number());
		expect(validator.is("a")).toBe(true);
		expect(validator.is(1)).toBe(true);
		expect(validator.is(true)).toBe(false);
	});
});

// ─── Entry Points ────────────────────────────────────────────────────────────

describe("builder", () => {
	it("should build instances of the exported validator classes", () => {
		const schema = v.object({ tags: v.array(v.string()), limits: v.record(v.number()) });
		const value: Infer<typeof schema> = { tags: ["a"], limits: { max: 3 } };

		expect(schema).toBeInstanceOf(ObjectValidator);
		expect(v.array(v.string())).toBeInstanceOf(ArrayValidator);
		expect(v.record(v.number())).toBeInstanceOf(RecordValidator);
		expect(v.string().min(1)).toBeInstanceOf(StringValidator);
		expect(v.number().integer()).toBeInstanceOf(NumberValidator);
		expect(schema.is(value)).toBe(true);
	});
});

describe("validate", () => {
	it("should return the value when valid", () => {
		expect(validate(v.number(), 4)).toEqual({ valid: true, errors: [], value: 4 });
	});

	it("should return errors when invalid", () => {
		const result = validate(v.number(), "4");
		expect(result.valid).toBe(false);
		expect(result.value).toBeUndefined();
		expect(result.errors).toHaveLength(1);
	});
});

describe("assertValid", () => {
	it("should return the typed value", () => {
		const value = assertValid(v.object({ id: v.string() }), { id: "mimic" });
		expect(value.id).toBe("mimic");
	});

	it("should throw ConfigError listing each issue under the label", () => {
		try {
			assertValid(v.object({ id: v.string(), size: v.number() }), { id: 1, size: "big" }, "settings");
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ConfigError);
			if (!(err instanceof ConfigError)) return;
			expect(err.issues).toEqual([
				"settings.id: Expected string, received number",
				"settings.size: Expected number, received string",
			]);
			expect(err.message).toBe(
				"Invalid settings: settings.id: Expected string, received number; settings.size: Expected number, received string",
			);
		}
	});
});
