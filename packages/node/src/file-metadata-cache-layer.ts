/**
 * MetadataCache keyed on file modification times. Watched sources are file
 * paths; an entry is rebuilt once any of them has a different mtime than
 * when it was stored. Sources that cannot be stat'ed count as unchanged
 * while they stay missing.
 */

import { promises as fs } from "node:fs";
import {
	type Cacheable,
	MetadataCache,
	type MetadataCacheShape,
	type SchemaDefinition,
} from "@docmapper/core";
import { Effect, Layer, Option, Ref } from "effect";

interface FileEntry {
	readonly value: SchemaDefinition;
	readonly mtimes: ReadonlyMap<string, number | null>;
}

const mtimeOf = (path: string): Effect.Effect<number | null> =>
	Effect.tryPromise(() => fs.stat(path)).pipe(
		Effect.map((stats) => stats.mtimeMs),
		Effect.orElseSucceed(() => null),
	);

const mtimesOf = (paths: ReadonlyArray<string>) =>
	Effect.map(
		Effect.forEach(paths, (path) => Effect.map(mtimeOf(path), (mtime) => [path, mtime] as const)),
		(entries): ReadonlyMap<string, number | null> => new Map(entries),
	);

const isFresh = (entry: FileEntry): Effect.Effect<boolean> =>
	Effect.map(mtimesOf([...entry.mtimes.keys()]), (current) =>
		[...entry.mtimes].every(([path, mtime]) => current.get(path) === mtime),
	);

export interface FileMetadataCache extends MetadataCacheShape {
	/** Drops every entry. */
	readonly clear: Effect.Effect<void>;
}

export const makeFileMetadataCache: Effect.Effect<FileMetadataCache> = Effect.gen(
	function* () {
		const entries = yield* Ref.make<ReadonlyMap<string, FileEntry>>(new Map());

		const lookup = (key: string) =>
			Effect.flatMap(Ref.get(entries), (map) => {
				const entry = map.get(key);
				return entry === undefined
					? Effect.succeed(Option.none<SchemaDefinition>())
					: Effect.map(isFresh(entry), (fresh) =>
							fresh ? Option.some(entry.value) : Option.none(),
						);
			});

		return {
			cached: <E, R>(
				key: string,
				producer: Effect.Effect<Cacheable, E, R>,
			): Effect.Effect<SchemaDefinition, E, R> =>
				Effect.gen(function* () {
					const hit = yield* lookup(key);
					if (Option.isSome(hit)) {
						return hit.value;
					}
					const produced = yield* producer;
					const mtimes = yield* mtimesOf(produced.watch);
					yield* Ref.update(entries, (map) =>
						new Map(map).set(key, { value: produced.value, mtimes }),
					);
					yield* Effect.logDebug("metadata cached").pipe(
						Effect.annotateLogs({ key, sources: produced.watch.join(",") }),
					);
					return produced.value;
				}),
			clear: Ref.set(entries, new Map()),
		};
	},
);

export const makeFileMetadataCacheLayer = (
	cache?: FileMetadataCache,
): Layer.Layer<MetadataCache> =>
	cache
		? Layer.succeed(MetadataCache, cache)
		: Layer.effect(MetadataCache, makeFileMetadataCache);

export const FileMetadataCacheLayer: Layer.Layer<MetadataCache> =
	makeFileMetadataCacheLayer();
