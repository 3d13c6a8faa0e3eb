/**
 * Metadata cache contract plus an in-memory Layer.
 *
 * A producer returns the value together with the source artifacts it was
 * derived from. The cache hands back the stored value until one of those
 * artifacts changes.
 */

import { Context, Effect, Layer, Ref } from "effect";
import type { SchemaDefinition } from "../types/schema-types.js";

// ============================================================================
// MetadataCache Effect Service
// ============================================================================

export interface Cacheable {
	readonly value: SchemaDefinition;
	readonly watch: ReadonlyArray<string>;
}

export interface MetadataCacheShape {
	readonly cached: <E, R>(
		key: string,
		producer: Effect.Effect<Cacheable, E, R>,
	) => Effect.Effect<SchemaDefinition, E, R>;
}

export class MetadataCache extends Context.Tag("MetadataCache")<
	MetadataCache,
	MetadataCacheShape
>() {}

// ============================================================================
// In-memory implementation
// ============================================================================

interface InMemoryEntry {
	readonly value: SchemaDefinition;
	/** Version of each watched source at the time the value was stored. */
	readonly versions: ReadonlyMap<string, number>;
}

/**
 * Handle for signalling source changes to an in-memory cache.
 */
export interface InMemoryMetadataCache extends MetadataCacheShape {
	/** Marks a source artifact as changed; dependent entries are rebuilt on next access. */
	readonly touch: (source: string) => Effect.Effect<void>;
	readonly size: Effect.Effect<number>;
}

export const makeInMemoryMetadataCache: Effect.Effect<InMemoryMetadataCache> =
	Effect.gen(function* () {
		const entries = yield* Ref.make(new Map<string, InMemoryEntry>());
		const versions = yield* Ref.make(new Map<string, number>());

		const isFresh = (entry: InMemoryEntry, current: ReadonlyMap<string, number>) =>
			[...entry.versions].every(
				([source, version]) => (current.get(source) ?? 0) === version,
			);

		return {
			cached: <E, R>(
				key: string,
				producer: Effect.Effect<Cacheable, E, R>,
			): Effect.Effect<SchemaDefinition, E, R> =>
				Effect.gen(function* () {
					const current = yield* Ref.get(versions);
					const entry = (yield* Ref.get(entries)).get(key);
					if (entry && isFresh(entry, current)) {
						return entry.value;
					}
					const produced = yield* producer;
					const snapshot = new Map(
						produced.watch.map((source) => [source, current.get(source) ?? 0]),
					);
					yield* Ref.update(entries, (map) =>
						new Map(map).set(key, { value: produced.value, versions: snapshot }),
					);
					return produced.value;
				}),
			touch: (source: string) =>
				Ref.update(versions, (map) =>
					new Map(map).set(source, (map.get(source) ?? 0) + 1),
				),
			size: Effect.map(Ref.get(entries), (map) => map.size),
		};
	});

export const makeInMemoryMetadataCacheLayer = (
	cache?: InMemoryMetadataCache,
): Layer.Layer<MetadataCache> =>
	cache
		? Layer.succeed(MetadataCache, cache)
		: Layer.effect(MetadataCache, makeInMemoryMetadataCache);

/**
 * Default in-memory cache with no stored entries.
 */
export const InMemoryMetadataCacheLayer: Layer.Layer<MetadataCache> =
	makeInMemoryMetadataCacheLayer();
