/**
 * Builders for the annotation vocabulary recognized by the schema extractor.
 *
 * @example
 * ```ts
 * catalog.declare(User, {
 *   annotations: [collection("people")],
 *   properties: {
 *     email: [unique(), validate("isEmail")],
 *     age: [int(), validate(predicate("between", 0, 130))],
 *   },
 * })
 * ```
 */

import type { Annotation, AnnotationArg } from "../types/annotation-types.js";

export const annotation = (
	name: string,
	args: ReadonlyArray<AnnotationArg> = [],
	options: Readonly<Record<string, AnnotationArg>> = {},
): Annotation => ({ _tag: "Annotation", name, args, options });

// ============================================================================
// Collection
// ============================================================================

export const collection = (name: string): Annotation =>
	annotation("collection", [name]);
export const table = (name: string): Annotation => annotation("table", [name]);
export const persist = (name: string): Annotation =>
	annotation("persist", [name]);
export const singleCollection = (): Annotation =>
	annotation("singlecollection");

// ============================================================================
// Properties
// ============================================================================

export const field = (storedName: string): Annotation =>
	annotation("field", [storedName]);
export const id = (): Annotation => annotation("id");
export const required = (): Annotation => annotation("required");

/** A named predicate with arguments, for use inside `validate`. */
export const predicate = (
	name: string,
	...args: ReadonlyArray<AnnotationArg>
): Annotation => annotation(name, args);

export const validate = (
	...predicates: ReadonlyArray<string | Annotation>
): Annotation => annotation("validate", predicates);

export const reference = (
	options: { readonly with?: ReadonlyArray<string> } = {},
): Annotation =>
	annotation("reference", [], options.with ? { with: options.with } : {});

export interface IndexAnnotationOptions {
	readonly asc?: boolean;
	readonly desc?: boolean;
	readonly sparse?: boolean;
}

const indexOptions = (
	options: IndexAnnotationOptions,
): Record<string, AnnotationArg> => {
	const result: Record<string, AnnotationArg> = {};
	if (options.asc !== undefined) result.asc = options.asc;
	if (options.desc !== undefined) result.desc = options.desc;
	if (options.sparse !== undefined) result.sparse = options.sparse;
	return result;
};

export const index = (options: IndexAnnotationOptions = {}): Annotation =>
	annotation("index", [], indexOptions(options));
export const unique = (options: IndexAnnotationOptions = {}): Annotation =>
	annotation("unique", [], indexOptions(options));

// ============================================================================
// Value Types
// ============================================================================

export const int = (): Annotation => annotation("int");
export const integer = (): Annotation => annotation("integer");
export const float = (): Annotation => annotation("float");
export const double = (): Annotation => annotation("double");
export const bool = (): Annotation => annotation("bool");
export const boolean = (): Annotation => annotation("boolean");
export const string = (): Annotation => annotation("string");
export const object = (): Annotation => annotation("object");
export const array = (element?: Annotation): Annotation =>
	annotation("array", element ? [element] : []);
export const classOf = (typeName: string): Annotation =>
	annotation("class", [typeName]);
export const type = (options: {
	readonly type: string;
	readonly class?: string;
}): Annotation =>
	annotation(
		"type",
		[],
		options.class !== undefined
			? { type: options.type, class: options.class }
			: { type: options.type },
	);

// ============================================================================
// Lifecycle Hooks
// ============================================================================

/**
 * Marks a method as a lifecycle hook. `alias` is any recognized event alias
 * (`beforeSave`, `after_create`, `retrieved`, ...).
 */
export const on = (
	alias: string,
	...args: ReadonlyArray<AnnotationArg>
): Annotation => annotation(alias, args);
