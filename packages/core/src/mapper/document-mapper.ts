/**
 * Repository service over mapped types.
 *
 * Persisting: lifecycle pre-hooks and serialization (getSaveCommand), one
 * transport command, post-hooks, then a new snapshot. Loading: transport
 * documents are hydrated into top-level instances, each snapshotted and
 * announced with `retrieved`.
 *
 * Types are addressed by the names the TypeIntrospector knows them by.
 */

import { ObjectId } from "bson";
import { Chunk, Context, Effect, Layer, Option, Stream } from "effect";
import { isEmptyUpdate } from "../diff/document-diff.js";
import { getSaveCommand } from "../diff/save-command.js";
import { snapshot } from "../diff/snapshot.js";
import type { DocumentMapperError } from "../errors/index.js";
import {
	ConfigurationError,
	DocumentNotFoundError,
	HookError,
	ReferenceResolutionError,
} from "../errors/mapping-errors.js";
import { registerObserver, triggerEvent } from "../events/event-dispatcher.js";
import { TypeIntrospector } from "../introspection/type-introspector.js";
import { newInstance, recordedTypeName } from "../mapping/hydrator.js";
import { writeField } from "../mapping/property-access.js";
import { Reference } from "../mapping/reference.js";
import {
	type SerializeRequirements,
	toDocument as serialize,
	toFieldValues,
} from "../mapping/serializer.js";
import {
	clearSnapshot,
	lastPersistedDocument,
} from "../mapping/snapshot-store.js";
import { MetadataRegistry } from "../metadata/metadata-registry.js";
import { isQueryFilter, QueryFilter } from "../query/query-filter.js";
import { DocumentTransport } from "../transport/document-transport.js";
import type {
	Selector,
	StoredDocument,
	StoredValue,
} from "../types/document-types.js";
import type { Observer, SchemaDefinition } from "../types/schema-types.js";
import { storedValuesEqual } from "../utils/stored-values.js";

export type Criteria = Selector | QueryFilter;

export interface BulkOptions {
	/** Affect every match rather than the first one. Defaults to true. */
	readonly multi?: boolean;
}

// ============================================================================
// DocumentMapper Effect Service
// ============================================================================

export interface DocumentMapperShape {
	/** Creates or updates the object; referenced objects are saved first. */
	readonly save: <A extends object>(object: A) => Effect.Effect<A, DocumentMapperError>;
	readonly delete: (object: object) => Effect.Effect<void, DocumentMapperError>;
	/** Constructs an instance, assigns `data` by field or stored name, and saves it. */
	readonly create: (
		typeName: string,
		data: Readonly<Record<string, unknown>>,
	) => Effect.Effect<object, DocumentMapperError>;
	readonly stream: (
		typeName: string,
		criteria?: Criteria,
	) => Stream.Stream<object, DocumentMapperError>;
	readonly find: (
		typeName: string,
		criteria?: Criteria,
	) => Effect.Effect<ReadonlyArray<object>, DocumentMapperError>;
	readonly findOne: (
		typeName: string,
		criteria?: Criteria,
	) => Effect.Effect<Option.Option<object>, DocumentMapperError>;
	readonly findById: (
		typeName: string,
		id: StoredValue,
	) => Effect.Effect<Option.Option<object>, DocumentMapperError>;
	readonly findOrFail: (
		typeName: string,
		criteria: Criteria,
	) => Effect.Effect<object, DocumentMapperError>;
	/** First match, or a new unsaved instance carrying the query values. */
	readonly firstOrNew: (
		typeName: string,
		query: Selector,
	) => Effect.Effect<object, DocumentMapperError>;
	readonly firstOrCreate: (
		typeName: string,
		query: Selector,
	) => Effect.Effect<object, DocumentMapperError>;
	readonly count: (
		typeName: string,
		criteria?: Criteria,
	) => Effect.Effect<number, DocumentMapperError>;
	/** Runs the type's `scope<Name>` method against a fresh QueryFilter. */
	readonly scope: (
		typeName: string,
		name: string,
		...args: ReadonlyArray<unknown>
	) => Effect.Effect<QueryFilter, DocumentMapperError>;
	readonly observe: (
		typeName: string,
		observer: Observer | string,
	) => Effect.Effect<Observer, DocumentMapperError>;
	readonly createIndexes: (typeName: string) => Effect.Effect<void, DocumentMapperError>;
	/**
	 * Sets `values` (by field or stored name) on the documents matching
	 * `criteria` without loading them. Returns the number of documents changed.
	 */
	readonly updateWhere: (
		typeName: string,
		criteria: Criteria,
		values: Readonly<Record<string, unknown>>,
		options?: BulkOptions,
	) => Effect.Effect<number, DocumentMapperError>;
	/** Deletes the documents matching `criteria` without loading them or firing hooks. */
	readonly deleteWhere: (
		typeName: string,
		criteria: Criteria,
		options?: BulkOptions,
	) => Effect.Effect<number, DocumentMapperError>;
	/** Removes every document of the type's collection. */
	readonly truncate: (typeName: string) => Effect.Effect<number, DocumentMapperError>;
	/** Field name of the identifier property. */
	readonly keyName: (typeName: string) => Effect.Effect<string, DocumentMapperError>;
	readonly isDirty: (object: object) => Effect.Effect<boolean, DocumentMapperError>;
	/** Current state as a document, without validation. */
	readonly toDocument: (object: object) => Effect.Effect<StoredDocument, DocumentMapperError>;
	readonly toJSON: (object: object) => Effect.Effect<string, DocumentMapperError>;
	/** Loads (once) and returns the object a reference points to. */
	readonly resolve: (reference: Reference) => Effect.Effect<object, DocumentMapperError>;
}

export class DocumentMapper extends Context.Tag("DocumentMapper")<
	DocumentMapper,
	DocumentMapperShape
>() {}

// ============================================================================
// Helpers
// ============================================================================

const jsonReplacer = (_key: string, value: unknown): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (value instanceof Uint8Array) {
		return Array.from(value);
	}
	return value;
};

const describeId = (id: StoredValue): string =>
	id instanceof ObjectId
		? id.toHexString()
		: typeof id === "string"
			? id
			: JSON.stringify(id, jsonReplacer);

/**
 * Rewrites selector keys given as field names to stored names. Descendants
 * stored in a shared collection are narrowed by their discriminator.
 */
const selectorFor = (definition: SchemaDefinition, criteria: Criteria | undefined): Selector => {
	const raw: Selector = criteria === undefined ? {} : isQueryFilter(criteria) ? criteria.toSelector() : criteria;
	const selector: Record<string, StoredValue> = {};
	for (const [key, value] of Object.entries(raw)) {
		const property = definition.propertiesByFieldName.get(key);
		selector[property?.storedName ?? key] = value;
	}
	if (!definition.hasOwnCollection) {
		selector.__type = { class: definition.typeName };
	}
	return selector;
};

const assignFields = (
	definition: SchemaDefinition,
	object: object,
	data: Readonly<Record<string, unknown>>,
): void => {
	for (const [key, value] of Object.entries(data)) {
		const property =
			definition.propertiesByFieldName.get(key) ??
			definition.propertiesByStoredName.get(key);
		writeField(object, property?.fieldName ?? key, value, property);
	}
};

// ============================================================================
// Construction
// ============================================================================

type MapperRequirements = SerializeRequirements | DocumentTransport | TypeIntrospector;

export const makeDocumentMapper: Effect.Effect<
	DocumentMapperShape,
	never,
	MapperRequirements
> = Effect.gen(function* () {
	const registry = yield* MetadataRegistry;
	const transport = yield* DocumentTransport;
	const context = yield* Effect.context<MapperRequirements>();

	/** Objects whose save is running; a reference back to one is not saved again. */
	const saving = new Set<object>();

	const provided = <A, E>(
		effect: Effect.Effect<A, E, MapperRequirements>,
	): Effect.Effect<A, E> => Effect.provide(effect, context);

	const construct = (definition: SchemaDefinition): Effect.Effect<object, ConfigurationError> =>
		definition.prototypeInstance === null
			? Effect.fail(
					new ConfigurationError({
						typeName: definition.typeName,
						reason: "abstract-type",
						message: `Cannot instantiate abstract type ${definition.typeName}`,
					}),
				)
			: Effect.try({
					try: () => definition.construct(),
					catch: (cause) =>
						new ConfigurationError({
							typeName: definition.typeName,
							reason: "constructor-failed",
							message: `Cannot construct ${definition.typeName}: ${cause instanceof Error ? cause.message : String(cause)}`,
						}),
				});

	const save = <A extends object>(object: A): Effect.Effect<A, DocumentMapperError> =>
		Effect.suspend((): Effect.Effect<A, DocumentMapperError> => {
			if (saving.has(object)) {
				return Effect.succeed(object);
			}
			saving.add(object);
			return Effect.gen(function* () {
				const definition = yield* registry.ofObject(object);
				const command = yield* provided(
					getSaveCommand(definition, object, (target) => Effect.asVoid(save(target))),
				);
				const { collection, namespace } = command.target;

				if (command.command === "create") {
					yield* transport.execute({ _tag: "Insert", collection, namespace, documents: [command.document] });
					yield* triggerEvent(definition, object, "created");
				} else {
					if (!isEmptyUpdate(command.document)) {
						yield* transport.execute({
							_tag: "Update",
							collection,
							namespace,
							updates: [
								{ selector: command.selector, update: command.document, upsert: false, multi: false },
							],
							ordered: true,
						});
					}
					yield* triggerEvent(definition, object, "updated");
				}
				yield* triggerEvent(definition, object, "saved");
				yield* provided(snapshot(definition, object));

				yield* Effect.logDebug("document saved").pipe(
					Effect.annotateLogs({ typeName: definition.typeName, collection, command: command.command }),
				);
				return object;
			}).pipe(Effect.ensuring(Effect.sync(() => saving.delete(object))));
		});

	const remove = (object: object): Effect.Effect<void, DocumentMapperError> =>
		Effect.gen(function* () {
			const definition = yield* registry.ofObject(object);
			yield* triggerEvent(definition, object, "deleting");

			const baseline = lastPersistedDocument(object);
			const current = Option.isSome(baseline)
				? baseline.value
				: yield* provided(serialize(definition, object, { validate: false, generateId: false }));
			const id = current._id;
			if (id === undefined || id === null) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName: definition.typeName,
						reason: "unsaved-document",
						message: `Cannot delete an unsaved ${definition.typeName}`,
					}),
				);
			}

			yield* transport.execute({
				_tag: "Delete",
				collection: definition.collectionName,
				namespace: registry.namespaceOf(definition),
				deletes: [{ selector: { _id: id }, limit: 1 }],
			});
			yield* triggerEvent(definition, object, "deleted");
			clearSnapshot(object);

			yield* Effect.logDebug("document deleted").pipe(
				Effect.annotateLogs({ typeName: definition.typeName, collection: definition.collectionName }),
			);
		});

	const stream = (typeName: string, criteria?: Criteria): Stream.Stream<object, DocumentMapperError> =>
		Stream.unwrap(
			Effect.map(registry.of(typeName), (definition) =>
				transport
					.find(definition.collectionName, selectorFor(definition, criteria))
					.pipe(Stream.mapEffect((document) => provided(newInstance(definition, document, false)))),
			),
		);

	const find = (typeName: string, criteria?: Criteria) =>
		Effect.map(Stream.runCollect(stream(typeName, criteria)), Chunk.toReadonlyArray);

	const findOne = (typeName: string, criteria?: Criteria) =>
		Stream.runHead(stream(typeName, criteria).pipe(Stream.take(1)));

	const firstOrNew = (typeName: string, query: Selector): Effect.Effect<object, DocumentMapperError> =>
		Effect.gen(function* () {
			const found = yield* findOne(typeName, query);
			if (Option.isSome(found)) {
				return found.value;
			}
			const definition = yield* registry.of(typeName);
			const object = yield* construct(definition);
			assignFields(definition, object, query);
			return object;
		});

	const scope = (
		typeName: string,
		name: string,
		...args: ReadonlyArray<unknown>
	): Effect.Effect<QueryFilter, DocumentMapperError> =>
		Effect.gen(function* () {
			const definition = yield* registry.of(typeName);
			const ref = definition.scopes.get(name.toLowerCase());
			if (ref === undefined) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "unknown-scope",
						message: `Unknown scope '${name}' on ${typeName}`,
					}),
				);
			}
			if (args.length !== ref.arity) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "scope-arity",
						message: `Scope '${name}' on ${typeName} takes ${ref.arity} argument(s), got ${args.length}`,
					}),
				);
			}
			const receiver = definition.prototypeInstance;
			const method: unknown = receiver === null ? undefined : Reflect.get(receiver, ref.method);
			if (receiver === null || typeof method !== "function") {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "unknown-scope",
						message: `Scope '${name}' on ${typeName} cannot be invoked`,
					}),
				);
			}
			const result: unknown = yield* Effect.try({
				try: () => Reflect.apply(method, receiver, [new QueryFilter(), ...args]),
				catch: (cause) =>
					new HookError({
						event: "scope",
						method: ref.method,
						typeName,
						reason: "scope-failed",
						message: `Scope ${typeName}.${ref.method} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
						cause,
					}),
			});
			if (!isQueryFilter(result)) {
				return yield* Effect.fail(
					new ConfigurationError({
						typeName,
						reason: "invalid-scope-result",
						message: `Scope ${typeName}.${ref.method} must return a QueryFilter`,
					}),
				);
			}
			return result;
		});

	const toDocument = (object: object): Effect.Effect<StoredDocument, DocumentMapperError> =>
		Effect.flatMap(registry.ofObject(object), (definition) =>
			provided(serialize(definition, object, { validate: false, generateId: false })),
		);

	const resolve = (reference: Reference): Effect.Effect<object, DocumentMapperError> =>
		Option.match(reference.target, {
			onSome: (target) => Effect.succeed(target),
			onNone: () =>
				Effect.gen(function* () {
					const found = yield* Stream.runHead(
						transport.find(reference.collection, { _id: reference.id }).pipe(Stream.take(1)),
					);
					if (Option.isNone(found)) {
						return yield* Effect.fail(
							new ReferenceResolutionError({
								collection: reference.collection,
								id: describeId(reference.id),
								message: `Cannot find object ${describeId(reference.id)} in collection ${reference.collection}`,
							}),
						);
					}
					const document = found.value;
					const mapped = yield* registry.ofCollectionName(reference.collection);
					const definition = Option.isSome(mapped)
						? mapped.value
						: yield* Option.match(recordedTypeName(document), {
								onSome: (typeName) => registry.of(typeName),
								onNone: () =>
									Effect.fail(
										new ConfigurationError({
											typeName: reference.collection,
											reason: "unmapped-collection",
											message: `No type is mapped to collection ${reference.collection}`,
										}),
									),
							});
					const target = yield* provided(newInstance(definition, document, false));
					reference.attach(target);
					return target;
				}),
		});

	return {
		save,
		delete: remove,
		create: (typeName, data) =>
			Effect.gen(function* () {
				const definition = yield* registry.of(typeName);
				const object = yield* construct(definition);
				assignFields(definition, object, data);
				return yield* save(object);
			}),
		stream,
		find,
		findOne,
		findById: (typeName, id) => findOne(typeName, { _id: id }),
		findOrFail: (typeName, criteria) =>
			Effect.flatMap(findOne(typeName, criteria), (found) =>
				Option.isSome(found)
					? Effect.succeed(found.value)
					: Effect.flatMap(registry.of(typeName), (definition) => {
							const selector = JSON.stringify(selectorFor(definition, criteria), jsonReplacer);
							return Effect.fail(
								new DocumentNotFoundError({
									collection: definition.collectionName,
									selector,
									message: `No ${typeName} matches ${selector}`,
								}),
							);
						}),
			),
		firstOrNew,
		firstOrCreate: (typeName, query) => Effect.flatMap(firstOrNew(typeName, query), save),
		count: (typeName, criteria) =>
			Effect.flatMap(registry.of(typeName), (definition) =>
				Stream.runCount(transport.find(definition.collectionName, selectorFor(definition, criteria))),
			),
		scope,
		observe: (typeName, observer) =>
			Effect.flatMap(registry.of(typeName), (definition) =>
				provided(registerObserver(definition, observer)),
			),
		createIndexes: (typeName) => Effect.flatMap(registry.of(typeName), registry.createIndexes),
		updateWhere: (typeName, criteria, values, options = {}) =>
			Effect.gen(function* () {
				const definition = yield* registry.of(typeName);
				const $set = yield* provided(toFieldValues(definition, values));
				if (Object.keys($set).length === 0) {
					return 0;
				}
				const multi = options.multi ?? true;
				const result = yield* transport.execute({
					_tag: "Update",
					collection: definition.collectionName,
					namespace: registry.namespaceOf(definition),
					updates: [
						{ selector: selectorFor(definition, criteria), update: { $set }, upsert: false, multi },
					],
					ordered: true,
				});
				yield* Effect.logDebug("documents updated").pipe(
					Effect.annotateLogs({ typeName, collection: definition.collectionName, n: result.n }),
				);
				return result.n;
			}),
		deleteWhere: (typeName, criteria, options = {}) =>
			Effect.gen(function* () {
				const definition = yield* registry.of(typeName);
				const result = yield* transport.execute({
					_tag: "Delete",
					collection: definition.collectionName,
					namespace: registry.namespaceOf(definition),
					deletes: [
						{ selector: selectorFor(definition, criteria), limit: (options.multi ?? true) ? 0 : 1 },
					],
				});
				yield* Effect.logDebug("documents deleted").pipe(
					Effect.annotateLogs({ typeName, collection: definition.collectionName, n: result.n }),
				);
				return result.n;
			}),
		truncate: (typeName) =>
			Effect.gen(function* () {
				const definition = yield* registry.of(typeName);
				const result = yield* transport.execute({
					_tag: "Delete",
					collection: definition.collectionName,
					namespace: registry.namespaceOf(definition),
					deletes: [{ selector: selectorFor(definition, undefined), limit: 0 }],
				});
				return result.n;
			}),
		keyName: (typeName) => Effect.map(registry.of(typeName), (definition) => definition.idPropertyKey),
		isDirty: (object) =>
			Effect.map(toDocument(object), (current) =>
				Option.match(lastPersistedDocument(object), {
					onNone: () => true,
					onSome: (previous) => !storedValuesEqual(current, previous),
				}),
			),
		toDocument,
		toJSON: (object) =>
			Effect.map(toDocument(object), (document) => JSON.stringify(document, jsonReplacer)),
		resolve,
	};
});

export const DocumentMapperLive: Layer.Layer<DocumentMapper, never, MapperRequirements> =
	Layer.effect(DocumentMapper, makeDocumentMapper);
