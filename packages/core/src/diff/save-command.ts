/**
 * Builds the command that persists an object.
 *
 * Objects without a baseline are created: `saving` and `creating` fire, and
 * the full validated document (with a generated id when needed) is sent.
 * Objects with a baseline are updated: `saving` and `updating` fire, and only
 * the top-level diff against the baseline is sent, selected by the baseline's
 * `_id`.
 */

import { Effect, Option } from "effect";
import { MapperConfig } from "../config/mapper-config.js";
import type { DocumentMapperError } from "../errors/index.js";
import { triggerEvent } from "../events/event-dispatcher.js";
import { lastPersistedDocument } from "../mapping/snapshot-store.js";
import {
	type PersistReference,
	type SerializeRequirements,
	toDocument,
} from "../mapping/serializer.js";
import { MetadataRegistry } from "../metadata/metadata-registry.js";
import type { CommandTarget, SaveCommand } from "../types/document-types.js";
import type { SchemaDefinition } from "../types/schema-types.js";
import { diff } from "./document-diff.js";

export const commandTarget = (
	definition: SchemaDefinition,
): Effect.Effect<CommandTarget, never, MapperConfig | MetadataRegistry> =>
	Effect.gen(function* () {
		const config = yield* MapperConfig;
		const registry = yield* MetadataRegistry;
		return {
			connection: config.connection,
			namespace: registry.namespaceOf(definition),
			collection: definition.collectionName,
		};
	});

export const getSaveCommand = (
	definition: SchemaDefinition,
	object: object,
	persistReference?: PersistReference,
): Effect.Effect<SaveCommand, DocumentMapperError, SerializeRequirements> =>
	Effect.gen(function* () {
		const target = yield* commandTarget(definition);
		const previous = lastPersistedDocument(object);

		yield* triggerEvent(definition, object, "saving");

		if (Option.isNone(previous)) {
			yield* triggerEvent(definition, object, "creating");
			const document = yield* toDocument(definition, object, {
				validate: true,
				generateId: true,
				persistReference,
			});
			return { command: "create", target, document } satisfies SaveCommand;
		}

		yield* triggerEvent(definition, object, "updating");
		const current = yield* toDocument(definition, object, {
			validate: true,
			generateId: false,
			persistReference,
		});
		return {
			command: "update",
			target,
			selector: { _id: previous.value._id ?? null },
			document: diff(current, previous.value),
		} satisfies SaveCommand;
	});
