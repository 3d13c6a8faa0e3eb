/**
 * Named validation predicates, looked up by the names used in `validate(...)`
 * annotations.
 */

import { Context, Layer, Option } from "effect";
import type { AnnotationArg } from "../types/annotation-types.js";

export type Predicate = (
	value: unknown,
	args: ReadonlyArray<AnnotationArg>,
) => boolean;

// ============================================================================
// Built-in predicates
// ============================================================================

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const lengthOf = (value: unknown): number | undefined =>
	typeof value === "string" || Array.isArray(value) ? value.length : undefined;

const numberArg = (args: ReadonlyArray<AnnotationArg>, i: number): number => {
	const arg = args[i];
	return typeof arg === "number" ? arg : Number(arg);
};

const isEmail: Predicate = (value) =>
	typeof value === "string" && EMAIL_PATTERN.test(value);
const isInteger: Predicate = (value) => Number.isInteger(value);
const isString: Predicate = (value) => typeof value === "string";
const isNumber: Predicate = (value) =>
	typeof value === "number" && Number.isFinite(value);

export const builtinPredicates: Readonly<Record<string, Predicate>> = {
	isEmail,
	is_email: isEmail,
	isInteger,
	is_integer: isInteger,
	isString,
	is_string: isString,
	isNumber,
	is_numeric: isNumber,
	between: (value, args) =>
		typeof value === "number" &&
		value >= numberArg(args, 0) &&
		value <= numberArg(args, 1),
	minLength: (value, args) => (lengthOf(value) ?? -1) >= numberArg(args, 0),
	maxLength: (value, args) => {
		const length = lengthOf(value);
		return length !== undefined && length <= numberArg(args, 0);
	},
	matches: (value, args) =>
		typeof value === "string" && new RegExp(String(args[0] ?? "")).test(value),
	oneOf: (value, args) => args.some((arg) => arg === value),
};

// ============================================================================
// ValidatorRegistry Effect Service
// ============================================================================

export interface ValidatorRegistryShape {
	readonly lookup: (name: string) => Option.Option<Predicate>;
}

export class ValidatorRegistry extends Context.Tag("ValidatorRegistry")<
	ValidatorRegistry,
	ValidatorRegistryShape
>() {}

/**
 * Registry holding the built-ins plus `custom` predicates; custom entries
 * replace built-ins of the same name.
 */
export const makeValidatorRegistryLayer = (
	custom: Readonly<Record<string, Predicate>> = {},
): Layer.Layer<ValidatorRegistry> => {
	const predicates = new Map<string, Predicate>([
		...Object.entries(builtinPredicates),
		...Object.entries(custom),
	]);
	return Layer.succeed(ValidatorRegistry, {
		lookup: (name) => Option.fromNullable(predicates.get(name)),
	});
};

export const ValidatorRegistryLive: Layer.Layer<ValidatorRegistry> =
	makeValidatorRegistryLayer();
