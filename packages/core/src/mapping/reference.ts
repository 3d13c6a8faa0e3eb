/**
 * Lazy pointer to a document in another collection.
 *
 * Wire shape: `{ $ref: collection, $id: identifier, __cache?: { field: value } }`.
 * The target is loaded on the first `DocumentMapper.resolve` and then held.
 */

import { Option } from "effect";
import type { StoredDocument, StoredValue } from "../types/document-types.js";
import { isStoredDocument } from "../utils/stored-values.js";
import { isMissingId } from "./property-access.js";

export interface ReferencePointer {
	readonly collection: string;
	readonly id: StoredValue;
	readonly cachedFields?: StoredDocument;
}

export class Reference {
	readonly collection: string;
	readonly id: StoredValue;
	readonly cachedFields: StoredDocument | undefined;
	#target: object | undefined;

	constructor(pointer: ReferencePointer, target?: object) {
		this.collection = pointer.collection;
		this.id = pointer.id;
		this.cachedFields = pointer.cachedFields;
		this.#target = target;
	}

	static fromDocument(document: StoredDocument): Option.Option<Reference> {
		if (!isReferenceShape(document)) {
			return Option.none();
		}
		const collection = document.$ref;
		const id = document.$id;
		const cache = document.__cache;
		if (typeof collection !== "string" || id === undefined) {
			return Option.none();
		}
		return Option.some(
			new Reference({
				collection,
				id,
				...(cache !== undefined && isStoredDocument(cache) ? { cachedFields: cache } : {}),
			}),
		);
	}

	get isResolved(): boolean {
		return this.#target !== undefined;
	}

	get target(): Option.Option<object> {
		return Option.fromNullable(this.#target);
	}

	attach(target: object): void {
		this.#target = target;
	}

	/** Value captured at serialization time, without loading the target. */
	cached(field: string): Option.Option<StoredValue> {
		return Option.fromNullable(this.cachedFields?.[field]);
	}

	toPointer(): StoredDocument {
		return this.cachedFields === undefined
			? { $ref: this.collection, $id: this.id }
			: { $ref: this.collection, $id: this.id, __cache: this.cachedFields };
	}

	toJSON(): StoredDocument {
		return this.toPointer();
	}
}

export const isReferenceShape = (document: StoredDocument): boolean => {
	const collection = document.$ref;
	return (
		typeof collection === "string" &&
		collection.length > 0 &&
		!isMissingId(document.$id)
	);
};
