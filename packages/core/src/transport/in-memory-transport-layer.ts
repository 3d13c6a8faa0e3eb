/**
 * In-memory implementation of DocumentTransport as an Effect Layer.
 * Intended for testing: collections are Maps keyed by the hex/string form of
 * `_id`, and every executed command is recorded for inspection.
 */

import { ObjectId } from "bson";
import { Effect, Layer, Ref, Stream } from "effect";
import { TransportError } from "../errors/transport-errors.js";
import type {
	CommandResult,
	IndexSpec,
	Selector,
	StoredDocument,
	StoredValue,
	TransportCommand,
	UpdateDocument,
} from "../types/document-types.js";
import {
	cloneDocument,
	cloneStoredValue,
	storedValuesEqual,
} from "../utils/stored-values.js";
import {
	DocumentTransport,
	type DocumentTransportShape,
} from "./document-transport.js";

// ============================================================================
// Helpers
// ============================================================================

type Collections = ReadonlyMap<string, ReadonlyMap<string, StoredDocument>>;

const keyOf = (id: StoredValue | undefined): string =>
	id instanceof ObjectId ? id.toHexString() : JSON.stringify(id ?? null);

const matches = (document: StoredDocument, selector: Selector): boolean =>
	Object.entries(selector).every(([field, expected]) => {
		const actual = document[field];
		return actual !== undefined && storedValuesEqual(actual, expected);
	});

const applyUpdate = (
	document: StoredDocument,
	update: UpdateDocument,
): StoredDocument => {
	const next: Record<string, StoredValue> = { ...document };
	for (const [field, value] of Object.entries(update.$set ?? {})) {
		next[field] = cloneStoredValue(value);
	}
	for (const field of Object.keys(update.$unset ?? {})) {
		delete next[field];
	}
	return next;
};

const commandName = (command: TransportCommand): string => {
	switch (command._tag) {
		case "CreateIndexes":
			return "createIndexes";
		case "Insert":
			return "insert";
		case "Update":
			return "update";
		case "Delete":
			return "delete";
	}
};

// ============================================================================
// In-memory transport
// ============================================================================

export interface InMemoryTransport extends DocumentTransportShape {
	/** Every command executed, in order. */
	readonly commands: Effect.Effect<ReadonlyArray<TransportCommand>>;
	readonly documents: (
		collection: string,
	) => Effect.Effect<ReadonlyArray<StoredDocument>>;
	readonly indexes: (collection: string) => Effect.Effect<ReadonlyArray<IndexSpec>>;
	/** Seeds a collection directly, bypassing command recording. */
	readonly seed: (
		collection: string,
		documents: ReadonlyArray<StoredDocument>,
	) => Effect.Effect<void>;
}

export const makeInMemoryTransport: Effect.Effect<InMemoryTransport> = Effect.gen(
	function* () {
		const collections = yield* Ref.make<Collections>(new Map());
		const indexes = yield* Ref.make<ReadonlyMap<string, ReadonlyArray<IndexSpec>>>(
			new Map(),
		);
		const log = yield* Ref.make<ReadonlyArray<TransportCommand>>([]);

		const insertInto = (
			state: Collections,
			collection: string,
			documents: ReadonlyArray<StoredDocument>,
		): Collections | string => {
			const target = new Map<string, StoredDocument>(state.get(collection) ?? []);
			for (const document of documents) {
				const key = keyOf(document._id);
				if (target.has(key)) {
					return `Duplicate key ${key} in ${collection}`;
				}
				target.set(key, cloneDocument(document));
			}
			return new Map(state).set(collection, target);
		};

		const run = (
			command: TransportCommand,
		): Effect.Effect<CommandResult, TransportError> =>
			Ref.modify(
				collections,
				(state): readonly [CommandResult | string, Collections] => {
					switch (command._tag) {
						case "CreateIndexes":
							return [{ ok: true, n: command.indexes.length }, state];
						case "Insert": {
							const next = insertInto(state, command.collection, command.documents);
							return typeof next === "string"
								? [next, state]
								: [{ ok: true, n: command.documents.length }, next];
						}
						case "Update": {
							const target = new Map<string, StoredDocument>(state.get(command.collection) ?? []);
							let n = 0;
							for (const statement of command.updates) {
								for (const [key, document] of target) {
									if (!matches(document, statement.selector)) {
										continue;
									}
									target.set(key, applyUpdate(document, statement.update));
									n++;
									if (!statement.multi) {
										break;
									}
								}
							}
							return [{ ok: true, n }, new Map(state).set(command.collection, target)];
						}
						case "Delete": {
							const target = new Map<string, StoredDocument>(state.get(command.collection) ?? []);
							let n = 0;
							for (const statement of command.deletes) {
								for (const [key, document] of [...target]) {
									if (!matches(document, statement.selector)) {
										continue;
									}
									target.delete(key);
									n++;
									if (statement.limit === 1) {
										break;
									}
								}
							}
							return [{ ok: true, n }, new Map(state).set(command.collection, target)];
						}
					}
				},
			).pipe(
				Effect.flatMap((result) =>
					typeof result === "string"
						? Effect.fail(
								new TransportError({
									command: commandName(command),
									reason: "duplicate-key",
									message: result,
								}),
							)
						: Effect.succeed(result),
				),
			);

		return {
			execute: (command) =>
				Effect.gen(function* () {
					yield* Ref.update(log, (entries) => [...entries, command]);
					if (command._tag === "CreateIndexes") {
						const { collection, indexes: declared } = command;
						yield* Ref.update(indexes, (map) =>
							new Map(map).set(collection, [
								...(map.get(collection) ?? []),
								...declared,
							]),
						);
					}
					return yield* run(command);
				}),
			find: (collection, selector) =>
				Stream.unwrap(
					Effect.map(Ref.get(collections), (state) =>
						Stream.fromIterable(
							[...(state.get(collection)?.values() ?? [])]
								.filter((document) => matches(document, selector))
								.map(cloneDocument),
						),
					),
				),
			commands: Ref.get(log),
			documents: (collection) =>
				Effect.map(Ref.get(collections), (state) => [
					...(state.get(collection)?.values() ?? []),
				]),
			indexes: (collection) =>
				Effect.map(Ref.get(indexes), (map) => map.get(collection) ?? []),
			seed: (collection, documents) =>
				Ref.update(collections, (state) => {
					const target = new Map<string, StoredDocument>(state.get(collection) ?? []);
					for (const document of documents) {
						target.set(keyOf(document._id), cloneDocument(document));
					}
					return new Map(state).set(collection, target);
				}),
		};
	},
);

// ============================================================================
// Layer construction
// ============================================================================

/**
 * Creates an InMemoryTransportLayer. Pass your own transport to inspect
 * executed commands and stored documents in tests.
 */
export const makeInMemoryTransportLayer = (
	transport?: InMemoryTransport,
): Layer.Layer<DocumentTransport> =>
	transport
		? Layer.succeed(DocumentTransport, transport)
		: Layer.effect(DocumentTransport, makeInMemoryTransport);
