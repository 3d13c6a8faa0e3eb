/**
 * Object → stored document.
 *
 * Every declared property is serialized through its type descriptor, then
 * any undeclared instance fields are merged in by their raw name. Embedded
 * mapped objects recurse through their own SchemaDefinition; properties
 * declared as references collapse to `{ $ref, $id, __cache? }` pointers.
 */

import { ObjectId } from "bson";
import { Array as Arr, Effect, Option } from "effect";
import { MapperConfig } from "../config/mapper-config.js";
import type { DocumentMapperError } from "../errors/index.js";
import { ConfigurationError } from "../errors/mapping-errors.js";
import {
	MetadataRegistry,
	type MetadataRegistryShape,
} from "../metadata/metadata-registry.js";
import type { StoredDocument, StoredValue } from "../types/document-types.js";
import {
	type ReferenceSpec,
	type SchemaDefinition,
	TypeDescriptor,
} from "../types/schema-types.js";
import { isPlainRecord, isStoreNative } from "../utils/stored-values.js";
import { validateProperty } from "../validation/validate-property.js";
import { ValidatorRegistry } from "../validation/validator-registry.js";
import {
	hasField,
	idProperty,
	isMissingId,
	readField,
	readId,
	writeField,
	writeId,
} from "./property-access.js";
import { Reference } from "./reference.js";

/**
 * Persists a referenced object before the pointer to it is taken. Supplied by
 * the mapper on save paths; snapshots never persist references.
 */
export type PersistReference = (
	target: object,
) => Effect.Effect<void, DocumentMapperError>;

export interface SerializeOptions {
	readonly validate: boolean;
	readonly generateId: boolean;
	readonly persistReference?: PersistReference;
}

export type SerializeRequirements = MetadataRegistry | ValidatorRegistry | MapperConfig;

interface SerializeContext {
	readonly validate: boolean;
	readonly persistReference: PersistReference | undefined;
	readonly prefix: string;
	readonly registry: MetadataRegistryShape;
	/** Objects currently being serialized; a revisit means an embedded cycle. */
	readonly inProgress: Set<object>;
}

type Serialized = Effect.Effect<
	Option.Option<StoredValue>,
	DocumentMapperError,
	ValidatorRegistry
>;

// ============================================================================
// Value helpers
// ============================================================================

const isRuntimeResource = (value: unknown): boolean =>
	typeof value === "function" ||
	typeof value === "symbol" ||
	value instanceof Promise ||
	value instanceof WeakMap ||
	value instanceof WeakSet ||
	(typeof value === "object" &&
		value !== null &&
		"pipe" in value &&
		"on" in value &&
		typeof value.on === "function");

const toNumber = (value: string | number | boolean): number => {
	const n = Number(value);
	return Number.isNaN(n) ? 0 : n;
};

/**
 * Coerces primitives to a declared scalar kind. `null`, `undefined` and
 * objects are left alone, except that an array type wraps a lone value.
 */
const coerce = (descriptor: TypeDescriptor, value: unknown): unknown => {
	if (descriptor._tag === "Array") {
		return value === undefined || value === null || Array.isArray(value)
			? value
			: [value];
	}
	if (
		descriptor._tag !== "Scalar" ||
		(typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean")
	) {
		return value;
	}
	switch (descriptor.kind) {
		case "int":
			return Math.trunc(toNumber(value));
		case "float":
			return toNumber(value);
		case "bool":
			return Boolean(value);
		case "string":
			return String(value);
		case "object":
			return value;
	}
};

const configurationError = (typeName: string, reason: string, message: string) =>
	new ConfigurationError({ typeName, reason, message });

// ============================================================================
// Recursive serialization
// ============================================================================

const serializeValue = (
	ctx: SerializeContext,
	value: unknown,
	descriptor: TypeDescriptor,
	reference: ReferenceSpec,
): Serialized => {
	if (value === undefined || isRuntimeResource(value)) {
		return Effect.succeed(Option.none());
	}
	if (value instanceof Reference) {
		return serializeExistingReference(ctx, value);
	}
	if (isStoreNative(value)) {
		return Effect.succeed(Option.some(value));
	}

	const coerced = coerce(descriptor, value);
	if (
		coerced === null ||
		typeof coerced === "string" ||
		typeof coerced === "number" ||
		typeof coerced === "boolean"
	) {
		return Effect.succeed(Option.some(coerced));
	}
	if (coerced instanceof Date) {
		return Effect.succeed(Option.some(new Date(coerced.getTime())));
	}
	if (Array.isArray(coerced)) {
		const element = descriptor._tag === "Array" ? descriptor.element : TypeDescriptor.untyped;
		const items: ReadonlyArray<unknown> = coerced;
		return Effect.forEach(items, (item) =>
			serializeValue(ctx, item, element, reference),
		).pipe(Effect.map((serialized) => Option.some(Arr.getSomes(serialized))));
	}
	if (typeof coerced === "object" && coerced !== null) {
		return reference === false
			? serializeObject(ctx, coerced, descriptor)
			: makeReference(ctx, coerced, reference.withFields);
	}
	return Effect.succeed(Option.none());
};

const serializeExistingReference = (
	ctx: SerializeContext,
	reference: Reference,
): Serialized =>
	Effect.gen(function* () {
		const target = reference.target;
		if (ctx.persistReference !== undefined && Option.isSome(target)) {
			yield* ctx.persistReference(target.value);
		}
		return Option.some<StoredValue>(reference.toPointer());
	});

const makeReference = (
	ctx: SerializeContext,
	target: object,
	withFields: ReadonlyArray<string>,
): Serialized =>
	Effect.gen(function* () {
		const definition = yield* ctx.registry.ofObject(target);
		if (ctx.persistReference !== undefined) {
			yield* ctx.persistReference(target);
		}

		const id = readId(definition, target);
		if (isMissingId(id) && ctx.validate) {
			return yield* Effect.fail(
				configurationError(
					definition.typeName,
					"unsaved-reference",
					`Cannot reference an unsaved ${definition.typeName}`,
				),
			);
		}
		const storedId = yield* serializeValue(ctx, id, TypeDescriptor.untyped, false);

		const cache: Record<string, StoredValue> = {};
		for (const field of withFields) {
			const property =
				definition.propertiesByFieldName.get(field) ??
				definition.propertiesByStoredName.get(field);
			const raw = readField(target, property?.fieldName ?? field);
			const cached = yield* serializeValue(ctx, raw, TypeDescriptor.untyped, false);
			cache[field] = Option.getOrElse(cached, () => null);
		}

		return Option.some<StoredValue>(
			new Reference(
				{
					collection: definition.collectionName,
					id: Option.getOrElse(storedId, () => null),
					...(withFields.length > 0 ? { cachedFields: cache } : {}),
				},
				target,
			).toPointer(),
		);
	});

const serializeObject = (
	ctx: SerializeContext,
	value: object,
	descriptor: TypeDescriptor,
): Serialized =>
	Option.match(ctx.registry.typeNameOf(value), {
		onNone: () =>
			isPlainRecord(value)
				? serializeRecord(ctx, value)
				: Effect.fail(
						configurationError(
							value.constructor.name,
							"unmapped-object",
							`Objects of class ${value.constructor.name} are not mapped`,
						),
					),
		onSome: (typeName) =>
			Effect.gen(function* () {
				const definition = yield* ctx.registry.of(typeName);
				const document = yield* serializeMapped(ctx, definition, value, false);
				const declared =
					descriptor._tag === "ClassType" && descriptor.typeName === typeName;
				return Option.some<StoredValue>(
					declared || !definition.hasOwnCollection
						? document
						: { ...document, __type: { class: typeName } },
				);
			}),
	});

/** Plain records keep their own enumerable fields, serialized untyped. */
const serializeRecord = (ctx: SerializeContext, value: object): Serialized =>
	guardCycle(ctx, value, "Object", () =>
		Effect.gen(function* () {
			const document: Record<string, StoredValue> = {};
			for (const [key, field] of Object.entries(value)) {
				if (key.startsWith(ctx.prefix)) {
					continue;
				}
				const serialized = yield* serializeValue(ctx, field, TypeDescriptor.untyped, false);
				if (Option.isSome(serialized)) {
					document[key] = serialized.value;
				}
			}
			return Option.some<StoredValue>(document);
		}),
	);

const guardCycle = <A, E, R>(
	ctx: SerializeContext,
	value: object,
	typeName: string,
	body: () => Effect.Effect<A, E, R>,
): Effect.Effect<A, E | ConfigurationError, R> =>
	Effect.suspend((): Effect.Effect<A, E | ConfigurationError, R> => {
		if (ctx.inProgress.has(value)) {
			return Effect.fail(
				configurationError(
					typeName,
					"cyclic-graph",
					`Cannot serialize a cyclic graph of embedded ${typeName} objects`,
				),
			);
		}
		ctx.inProgress.add(value);
		return body().pipe(Effect.ensuring(Effect.sync(() => ctx.inProgress.delete(value))));
	});

/**
 * Gives the object a fresh ObjectId and returns a function that puts the
 * previous identifier back.
 */
const assignId = (definition: SchemaDefinition, object: object): (() => void) => {
	const property = idProperty(definition);
	if (property === undefined) {
		return () => undefined;
	}
	const existed = hasField(object, property);
	const previous = readField(object, property.fieldName);
	writeId(definition, object, new ObjectId());
	return () => {
		if (existed) {
			writeField(object, property.fieldName, previous, property);
		} else {
			Reflect.deleteProperty(object, property.fieldName);
		}
	};
};

/**
 * A generated id is assigned before the properties are serialized, so that
 * references back to this object can point at it, and is taken back if
 * serialization fails.
 */
const serializeMapped = (
	ctx: SerializeContext,
	definition: SchemaDefinition,
	object: object,
	generateId: boolean,
): Effect.Effect<StoredDocument, DocumentMapperError, ValidatorRegistry> =>
	Effect.suspend(() => {
		if (!generateId || !isMissingId(readId(definition, object))) {
			return serializeProperties(ctx, definition, object);
		}
		const restore = assignId(definition, object);
		return serializeProperties(ctx, definition, object).pipe(
			Effect.tapError(() => Effect.sync(restore)),
		);
	});

const serializeProperties = (
	ctx: SerializeContext,
	definition: SchemaDefinition,
	object: object,
): Effect.Effect<StoredDocument, DocumentMapperError, ValidatorRegistry> =>
	guardCycle(ctx, object, definition.typeName, () =>
		Effect.gen(function* () {
			const document: Record<string, StoredValue> = {};

			for (const property of definition.propertiesByFieldName.values()) {
				if (property.fieldName.startsWith(ctx.prefix)) {
					continue;
				}
				const serialized = hasField(object, property)
					? yield* serializeValue(
							ctx,
							readField(object, property.fieldName),
							property.type,
							property.reference,
						)
					: Option.none<StoredValue>();
				if (ctx.validate) {
					yield* validateProperty(
						definition.typeName,
						property.fieldName,
						Option.getOrUndefined(serialized),
						property,
					);
				}
				if (Option.isSome(serialized)) {
					document[property.storedName] = serialized.value;
				}
			}

			for (const [key, value] of Object.entries(object)) {
				if (
					key.startsWith(ctx.prefix) ||
					definition.propertiesByFieldName.has(key) ||
					definition.propertiesByStoredName.has(key)
				) {
					continue;
				}
				const serialized = yield* serializeValue(ctx, value, TypeDescriptor.untyped, false);
				if (Option.isSome(serialized)) {
					document[key] = serialized.value;
				}
			}

			if (!definition.hasOwnCollection) {
				document.__type = { class: definition.typeName };
			}
			return document;
		}),
	);

// ============================================================================
// Public API
// ============================================================================

/**
 * Serializes a mapped object. With `validate` the first violated property
 * fails the whole call; without it serialization only fails on cycles.
 * `generateId` assigns a fresh ObjectId to the object when it has none.
 */
export const toDocument = (
	definition: SchemaDefinition,
	object: object,
	options: SerializeOptions,
): Effect.Effect<StoredDocument, DocumentMapperError, SerializeRequirements> =>
	Effect.gen(function* () {
		const config = yield* MapperConfig;
		const registry = yield* MetadataRegistry;
		const ctx: SerializeContext = {
			validate: options.validate,
			persistReference: options.persistReference,
			prefix: config.internalPrefix,
			registry,
			inProgress: new Set(),
		};
		return yield* serializeMapped(ctx, definition, object, options.generateId);
	});

/**
 * Serializes loose values for a partial update. Keys may be field or stored
 * names; the result is keyed by stored name. Declared properties are coerced
 * and validated, undeclared keys are serialized untyped, internal and
 * `undefined` values are dropped.
 */
export const toFieldValues = (
	definition: SchemaDefinition,
	values: Readonly<Record<string, unknown>>,
): Effect.Effect<StoredDocument, DocumentMapperError, SerializeRequirements> =>
	Effect.gen(function* () {
		const config = yield* MapperConfig;
		const registry = yield* MetadataRegistry;
		const ctx: SerializeContext = {
			validate: true,
			persistReference: undefined,
			prefix: config.internalPrefix,
			registry,
			inProgress: new Set(),
		};
		const document: Record<string, StoredValue> = {};
		for (const [key, value] of Object.entries(values)) {
			if (key.startsWith(ctx.prefix) || value === undefined) {
				continue;
			}
			const property =
				definition.propertiesByFieldName.get(key) ??
				definition.propertiesByStoredName.get(key);
			if (property === undefined) {
				const serialized = yield* serializeValue(ctx, value, TypeDescriptor.untyped, false);
				if (Option.isSome(serialized)) {
					document[key] = serialized.value;
				}
				continue;
			}
			const serialized = yield* serializeValue(ctx, value, property.type, property.reference);
			yield* validateProperty(
				definition.typeName,
				property.fieldName,
				Option.getOrUndefined(serialized),
				property,
			);
			if (Option.isSome(serialized)) {
				document[property.storedName] = serialized.value;
			}
		}
		return document;
	});
