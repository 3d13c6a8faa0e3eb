/**
 * Process-wide registry of SchemaDefinitions.
 *
 * Construction for a type name is single-flight: the first caller builds
 * through the MetadataCache while concurrent callers await the same Deferred.
 * A freshly built definition has its indexes submitted to the transport.
 */

import { Context, Deferred, Effect, Layer, Option, Ref } from "effect";
import { MapperConfig } from "../config/mapper-config.js";
import { MetadataCache } from "../cache/metadata-cache.js";
import { ConfigurationError } from "../errors/mapping-errors.js";
import type { TransportError } from "../errors/transport-errors.js";
import { TypeIntrospector } from "../introspection/type-introspector.js";
import { DocumentTransport } from "../transport/document-transport.js";
import type { SchemaDefinition } from "../types/schema-types.js";
import { toIndexSpec } from "./index-definition.js";
import { extractSchema } from "./schema-extractor.js";

export type RegistryError = ConfigurationError | TransportError;

type PendingDefinition = Deferred.Deferred<SchemaDefinition, RegistryError>;
type PendingMap = ReadonlyMap<string, PendingDefinition>;

// ============================================================================
// MetadataRegistry Effect Service
// ============================================================================

export interface MetadataRegistryShape {
	readonly of: (typeName: string) => Effect.Effect<SchemaDefinition, RegistryError>;
	/** Definition of the mapped type of a live object. */
	readonly ofObject: (value: object) => Effect.Effect<SchemaDefinition, RegistryError>;
	readonly ofCollectionName: (
		collectionName: string,
	) => Effect.Effect<Option.Option<SchemaDefinition>, RegistryError>;
	readonly registerCollection: (
		collectionName: string,
		typeName: string,
	) => Effect.Effect<void>;
	readonly typeNameOf: (value: object) => Option.Option<string>;
	readonly createIndexes: (
		definition: SchemaDefinition,
	) => Effect.Effect<void, TransportError>;
	/** Namespace (`<database>.<collection>`) of a definition's collection. */
	readonly namespaceOf: (definition: SchemaDefinition) => string;
}

export class MetadataRegistry extends Context.Tag("MetadataRegistry")<
	MetadataRegistry,
	MetadataRegistryShape
>() {}

// ============================================================================
// Construction
// ============================================================================

const CACHE_PREFIX = "docmapper:";

export const makeMetadataRegistry: Effect.Effect<
	MetadataRegistryShape,
	never,
	TypeIntrospector | MetadataCache | DocumentTransport | MapperConfig
> = Effect.gen(function* () {
	const introspector = yield* TypeIntrospector;
	const cache = yield* MetadataCache;
	const transport = yield* DocumentTransport;
	const config = yield* MapperConfig;
	const context = yield* Effect.context<TypeIntrospector | MapperConfig>();

	const inFlight = yield* Ref.make<PendingMap>(new Map());
	const collections = yield* Ref.make(new Map<string, string>());

	const namespaceOf = (definition: SchemaDefinition): string =>
		`${config.database}.${definition.collectionName}`;

	const createIndexes = (
		definition: SchemaDefinition,
	): Effect.Effect<void, TransportError> => {
		if (definition.indexes.length === 0) {
			return Effect.void;
		}
		return transport
			.execute({
				_tag: "CreateIndexes",
				collection: definition.collectionName,
				namespace: namespaceOf(definition),
				indexes: definition.indexes.map(toIndexSpec),
			})
			.pipe(
				Effect.tap(() =>
					Effect.logDebug("indexes submitted").pipe(
						Effect.annotateLogs({
							typeName: definition.typeName,
							collection: definition.collectionName,
							indexes: definition.indexes.map((index) => index.name).join(","),
						}),
					),
				),
				Effect.asVoid,
			);
	};

	const build = (typeName: string): Effect.Effect<SchemaDefinition, RegistryError> =>
		cache
			.cached(
				CACHE_PREFIX + typeName,
				Effect.gen(function* () {
					const definition = yield* extractSchema(typeName, of);
					if (config.createIndexes) {
						yield* createIndexes(definition);
					}
					return { value: definition, watch: [...definition.watchedSources] };
				}),
			)
			.pipe(
				Effect.provide(context),
				Effect.tap((definition) =>
					definition.hasOwnCollection
						? Ref.update(collections, (map) =>
								new Map(map).set(definition.collectionName, definition.typeName),
							)
						: Effect.void,
				),
			);

	const of = (typeName: string): Effect.Effect<SchemaDefinition, RegistryError> =>
		Effect.gen(function* () {
			const deferred = yield* Deferred.make<SchemaDefinition, RegistryError>();
			const [pending, owner] = yield* Ref.modify(
				inFlight,
				(map): readonly [readonly [PendingDefinition, boolean], PendingMap] => {
					const current = map.get(typeName);
					if (current) {
						return [[current, false], map];
					}
					return [[deferred, true], new Map(map).set(typeName, deferred)];
				},
			);
			if (!owner) {
				return yield* Deferred.await(pending);
			}
			const exit = yield* Effect.exit(build(typeName));
			yield* Ref.update(inFlight, (map) => {
				const next = new Map(map);
				next.delete(typeName);
				return next;
			});
			yield* Deferred.done(deferred, exit);
			return yield* exit;
		});

	const typeNameOf = (value: object): Option.Option<string> =>
		introspector.typeNameOf(value);

	return {
		of,
		ofObject: (value) =>
			Option.match(typeNameOf(value), {
				onNone: () =>
					Effect.fail(
						new ConfigurationError({
							typeName: value.constructor.name,
							reason: "unmapped-object",
							message: `Objects of class ${value.constructor.name} are not mapped`,
						}),
					),
				onSome: of,
			}),
		ofCollectionName: (collectionName) =>
			Effect.flatMap(Ref.get(collections), (map) => {
				const typeName = map.get(collectionName);
				return typeName === undefined
					? Effect.succeed(Option.none())
					: Effect.map(of(typeName), Option.some);
			}),
		registerCollection: (collectionName, typeName) =>
			Ref.update(collections, (map) => new Map(map).set(collectionName, typeName)),
		typeNameOf,
		createIndexes,
		namespaceOf,
	};
});

export const MetadataRegistryLive: Layer.Layer<
	MetadataRegistry,
	never,
	TypeIntrospector | MetadataCache | DocumentTransport | MapperConfig
> = Layer.effect(MetadataRegistry, makeMetadataRegistry);
