/**
 * Stored document → object.
 *
 * Instances are built without running their constructor. Each document key
 * is matched to a property by stored name first, then by field name; keys
 * with no property are assigned as plain public fields. Values holding a
 * `{ $ref, $id }` pointer become lazy References, embedded documents become
 * nested instances of their declared or recorded (`__type`) class.
 */

import { Effect, Option } from "effect";
import { MapperConfig } from "../config/mapper-config.js";
import { snapshot } from "../diff/snapshot.js";
import type { DocumentMapperError } from "../errors/index.js";
import { triggerEvent } from "../events/event-dispatcher.js";
import {
	MetadataRegistry,
	type MetadataRegistryShape,
	type RegistryError,
} from "../metadata/metadata-registry.js";
import type { StoredDocument, StoredValue } from "../types/document-types.js";
import { type SchemaDefinition, TypeDescriptor } from "../types/schema-types.js";
import { isStoredDocument } from "../utils/stored-values.js";
import { writeField } from "./property-access.js";
import { Reference } from "./reference.js";
import type { SerializeRequirements } from "./serializer.js";

const TYPE_FIELD = "__type";

/** Class name recorded in a document's `__type` discriminator. */
export const recordedTypeName = (document: StoredDocument): Option.Option<string> => {
	const discriminator = document[TYPE_FIELD];
	if (discriminator === undefined || !isStoredDocument(discriminator)) {
		return Option.none();
	}
	const name = discriminator.class;
	return typeof name === "string" && name.length > 0 ? Option.some(name) : Option.none();
};

interface HydrateContext {
	readonly registry: MetadataRegistryShape;
	readonly prefix: string;
}

const hydrateValue = (
	ctx: HydrateContext,
	descriptor: TypeDescriptor,
	value: StoredValue,
): Effect.Effect<unknown, RegistryError> => {
	if (Array.isArray(value)) {
		const element = descriptor._tag === "Array" ? descriptor.element : TypeDescriptor.untyped;
		const items: ReadonlyArray<StoredValue> = value;
		return Effect.forEach(items, (item) => hydrateValue(ctx, element, item));
	}
	if (value === null || typeof value !== "object" || !isStoredDocument(value)) {
		return Effect.succeed(value);
	}

	const document: StoredDocument = value;
	const reference = Reference.fromDocument(document);
	if (Option.isSome(reference)) {
		return Effect.succeed(reference.value);
	}
	if (descriptor._tag === "ClassType") {
		return Effect.flatMap(ctx.registry.of(descriptor.typeName), (definition) =>
			build(ctx, definition, document),
		);
	}
	const recorded = recordedTypeName(document);
	if (Option.isSome(recorded)) {
		return Effect.flatMap(ctx.registry.of(recorded.value), (definition) =>
			build(ctx, definition, document),
		);
	}

	return Effect.gen(function* () {
		const record: Record<string, unknown> = {};
		for (const [key, field] of Object.entries(document)) {
			record[key] = yield* hydrateValue(ctx, TypeDescriptor.untyped, field);
		}
		return record;
	});
};

const build = (
	ctx: HydrateContext,
	definition: SchemaDefinition,
	document: StoredDocument,
): Effect.Effect<object, RegistryError> =>
	Effect.gen(function* () {
		const recorded = recordedTypeName(document);
		const concrete =
			Option.isSome(recorded) && recorded.value !== definition.typeName
				? yield* ctx.registry.of(recorded.value)
				: definition;

		const object = concrete.instantiate();
		for (const [key, value] of Object.entries(document)) {
			if (key === TYPE_FIELD) {
				continue;
			}
			const property =
				concrete.propertiesByStoredName.get(key) ??
				concrete.propertiesByFieldName.get(key);
			if (property === undefined && key.startsWith(ctx.prefix)) {
				continue;
			}
			const hydrated = yield* hydrateValue(
				ctx,
				property?.type ?? TypeDescriptor.untyped,
				value,
			);
			writeField(object, property?.fieldName ?? key, hydrated, property);
		}
		return object;
	});

/**
 * Builds an object of the document's concrete type. Top-level instances are
 * snapshotted and fire `retrieved`; nested ones do neither.
 */
export const newInstance = (
	definition: SchemaDefinition,
	document: StoredDocument,
	isNested: boolean,
): Effect.Effect<object, DocumentMapperError, SerializeRequirements> =>
	Effect.gen(function* () {
		const registry = yield* MetadataRegistry;
		const config = yield* MapperConfig;
		const ctx: HydrateContext = { registry, prefix: config.internalPrefix };

		const object = yield* build(ctx, definition, document);
		if (isNested) {
			return object;
		}

		const concrete = yield* registry.ofObject(object);
		yield* snapshot(concrete, object);
		yield* triggerEvent(concrete, object, "retrieved");
		return object;
	});
