import type {
	StoredDocument,
	StoredValue,
	UpdateDocument,
} from "../types/document-types.js";
import { cloneStoredValue, storedValuesEqual } from "../utils/stored-values.js";

/**
 * Top-level partial update turning `previous` into `current`.
 *
 * New and changed keys go under `$set`, removed keys under `$unset`.
 * Nested documents and arrays are compared structurally but replaced whole.
 * Operators that would be empty are omitted, so identical documents diff
 * to `{}`.
 */
export const diff = (current: StoredDocument, previous: StoredDocument): UpdateDocument => {
	const $set: Record<string, StoredValue> = {};
	const $unset: Record<string, ""> = {};

	for (const [key, value] of Object.entries(current)) {
		const before = previous[key];
		if (!Object.hasOwn(previous, key) || before === undefined || !storedValuesEqual(value, before)) {
			$set[key] = cloneStoredValue(value);
		}
	}
	for (const key of Object.keys(previous)) {
		if (!Object.hasOwn(current, key)) {
			$unset[key] = "";
		}
	}

	return {
		...(Object.keys($set).length > 0 ? { $set } : {}),
		...(Object.keys($unset).length > 0 ? { $unset } : {}),
	};
};

export const isEmptyUpdate = (update: UpdateDocument): boolean =>
	update.$set === undefined && update.$unset === undefined;

/**
 * Applies a top-level update the way the store would.
 */
export const applyDiff = (previous: StoredDocument, update: UpdateDocument): StoredDocument => {
	const next: Record<string, StoredValue> = { ...previous };
	for (const key of Object.keys(update.$unset ?? {})) {
		delete next[key];
	}
	for (const [key, value] of Object.entries(update.$set ?? {})) {
		next[key] = cloneStoredValue(value);
	}
	return next;
};
