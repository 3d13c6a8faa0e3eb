import { Effect, Option } from "effect";
import {
	ConfigurationError,
	ValidationError,
} from "../errors/mapping-errors.js";
import type { PropertyDef } from "../types/schema-types.js";
import { ValidatorRegistry } from "./validator-registry.js";

const isEmpty = (value: unknown): boolean =>
	value === undefined ||
	value === null ||
	value === "" ||
	(Array.isArray(value) && value.length === 0);

const describeValue = (value: unknown): string => {
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		return String(value);
	}
};

/**
 * Checks one property value: required-ness first, then every predicate in
 * declaration order. Predicates only see present (non-null) values.
 */
export const validateProperty = (
	typeName: string,
	fieldName: string,
	value: unknown,
	property: PropertyDef,
): Effect.Effect<void, ValidationError | ConfigurationError, ValidatorRegistry> =>
	Effect.gen(function* () {
		if (property.required && isEmpty(value)) {
			return yield* Effect.fail(
				new ValidationError({
					kind: "MissingRequired",
					typeName,
					field: fieldName,
					message: `Unexpected empty value for property ${fieldName}`,
				}),
			);
		}
		if (value === undefined || value === null || property.validations.length === 0) {
			return;
		}

		const registry = yield* ValidatorRegistry;
		for (const rule of property.validations) {
			const predicate = registry.lookup(rule.predicate);
			if (Option.isNone(predicate)) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "unknown-predicate",
						message: `Unknown validation predicate '${rule.predicate}' on ${typeName}.${fieldName}`,
					}),
				);
			}
			if (!predicate.value(value, rule.args)) {
				return yield* Effect.fail(
					new ValidationError({
						kind: "PredicateFailed",
						typeName,
						field: fieldName,
						value,
						predicate: rule.predicate,
						message: `Invalid value for ${fieldName} (${describeValue(value)})`,
					}),
				);
			}
		}
	});
