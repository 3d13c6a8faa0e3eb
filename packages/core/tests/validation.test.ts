import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { type PropertyDef, TypeDescriptor } from "../src/types/schema-types.js";
import { validateProperty } from "../src/validation/validate-property.js";
import {
	builtinPredicates,
	makeValidatorRegistryLayer,
	ValidatorRegistryLive,
} from "../src/validation/validator-registry.js";

const property = (overrides: Partial<PropertyDef> = {}): PropertyDef => ({
	storedName: "value",
	fieldName: "value",
	type: TypeDescriptor.untyped,
	required: false,
	validations: [],
	visibility: "public",
	reference: false,
	annotations: [],
	...overrides,
});

const check = (value: unknown, definition: PropertyDef) =>
	Effect.runPromise(
		validateProperty("Item", "value", value, definition).pipe(
			Effect.either,
			Effect.provide(ValidatorRegistryLive),
		),
	);

describe("validateProperty", () => {
	it("rejects empty values of required properties", async () => {
		const required = property({ required: true });
		for (const empty of [undefined, null, "", []]) {
			const result = await check(empty, required);
			expect(result._tag).toBe("Left");
			if (result._tag === "Left") {
				expect(result.left).toMatchObject({
					_tag: "ValidationError",
					kind: "MissingRequired",
					message: "Unexpected empty value for property value",
				});
			}
		}
		expect((await check(0, required))._tag).toBe("Right");
		expect((await check(false, required))._tag).toBe("Right");
	});

	it("runs predicates in order and reports the first failure", async () => {
		const definition = property({
			validations: [
				{ predicate: "isString", args: [] },
				{ predicate: "minLength", args: [3] },
			],
		});
		const result = await check("ab", definition);
		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toMatchObject({
				kind: "PredicateFailed",
				predicate: "minLength",
				value: "ab",
				message: 'Invalid value for value ("ab")',
			});
		}
	});

	it("skips predicates for absent values", async () => {
		const definition = property({ validations: [{ predicate: "isEmail", args: [] }] });
		expect((await check(undefined, definition))._tag).toBe("Right");
		expect((await check(null, definition))._tag).toBe("Right");
	});

	it("reports unknown predicates as configuration errors", async () => {
		const result = await check("x", property({ validations: [{ predicate: "isShiny", args: [] }] }));
		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toMatchObject({
				_tag: "ConfigurationError",
				reason: "unknown-predicate",
				message: "Unknown validation predicate 'isShiny' on Item.value",
			});
		}
	});

	it("uses custom predicates ahead of built-ins", async () => {
		const result = await Effect.runPromise(
			validateProperty(
				"Item",
				"value",
				"anything",
				property({ validations: [{ predicate: "isEmail", args: [] }] }),
			).pipe(
				Effect.either,
				Effect.provide(makeValidatorRegistryLayer({ isEmail: () => true })),
			),
		);
		expect(result._tag).toBe("Right");
	});
});

describe("builtinPredicates", () => {
	it("checks emails", () => {
		expect(builtinPredicates.isEmail?.("ann@example.com", [])).toBe(true);
		expect(builtinPredicates.isEmail?.("ann@", [])).toBe(false);
	});

	it("checks ranges and lengths", () => {
		expect(builtinPredicates.between?.(5, [0, 10])).toBe(true);
		expect(builtinPredicates.between?.(11, [0, 10])).toBe(false);
		expect(builtinPredicates.minLength?.("abc", [3])).toBe(true);
		expect(builtinPredicates.maxLength?.([1, 2, 3], [2])).toBe(false);
	});

	it("checks patterns and choices", () => {
		expect(builtinPredicates.matches?.("A-12", ["^[A-Z]-\\d+$"])).toBe(true);
		expect(builtinPredicates.oneOf?.("red", ["red", "green"])).toBe(true);
		expect(builtinPredicates.oneOf?.("blue", ["red", "green"])).toBe(false);
	});
});
