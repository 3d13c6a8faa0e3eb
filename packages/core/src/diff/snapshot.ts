import { Effect } from "effect";
import type { DocumentMapperError } from "../errors/index.js";
import { recordSnapshot } from "../mapping/snapshot-store.js";
import { type SerializeRequirements, toDocument } from "../mapping/serializer.js";
import type { StoredDocument } from "../types/document-types.js";
import type { SchemaDefinition } from "../types/schema-types.js";

/**
 * Records the object's current state as its persisted baseline. Runs without
 * validation or id generation.
 */
export const snapshot = (
	definition: SchemaDefinition,
	object: object,
): Effect.Effect<StoredDocument, DocumentMapperError, SerializeRequirements> =>
	toDocument(definition, object, { validate: false, generateId: false }).pipe(
		Effect.tap((document) => Effect.sync(() => recordSnapshot(object, document))),
	);
