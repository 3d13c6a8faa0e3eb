/**
 * Helpers over stored document values.
 */

import { ObjectId } from "bson";
import type { StoredDocument, StoredValue } from "../types/document-types.js";

export const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
};

export const isStoredDocument = (value: StoredValue): value is StoredDocument =>
	isPlainRecord(value);

/**
 * Values with a store-native representation, kept as-is by the serializer.
 */
export const isStoreNative = (
	value: unknown,
): value is ObjectId | Uint8Array | bigint =>
	value instanceof ObjectId ||
	value instanceof Uint8Array ||
	typeof value === "bigint";

/**
 * Structural equality. Key order of documents is not significant; array
 * order is.
 */
export const storedValuesEqual = (left: StoredValue, right: StoredValue): boolean => {
	if (left === right) {
		return true;
	}
	if (left instanceof ObjectId || right instanceof ObjectId) {
		return (
			left instanceof ObjectId &&
			right instanceof ObjectId &&
			left.equals(right)
		);
	}
	if (left instanceof Date || right instanceof Date) {
		return (
			left instanceof Date &&
			right instanceof Date &&
			left.getTime() === right.getTime()
		);
	}
	if (left instanceof Uint8Array || right instanceof Uint8Array) {
		if (!(left instanceof Uint8Array) || !(right instanceof Uint8Array)) {
			return false;
		}
		const bytes: Uint8Array = right;
		return (
			left.length === bytes.length && left.every((byte, i) => byte === bytes[i])
		);
	}
	if (Array.isArray(left) || Array.isArray(right)) {
		if (!Array.isArray(left) || !Array.isArray(right)) {
			return false;
		}
		const l: ReadonlyArray<StoredValue> = left;
		const r: ReadonlyArray<StoredValue> = right;
		return l.length === r.length && l.every((item, i) => {
			const other = r[i];
			return other !== undefined && storedValuesEqual(item, other);
		});
	}
	if (
		left !== null &&
		right !== null &&
		typeof left === "object" &&
		typeof right === "object"
	) {
		if (!isStoredDocument(left) || !isStoredDocument(right)) {
			return false;
		}
		const a: StoredDocument = left;
		const b: StoredDocument = right;
		const keys = Object.keys(a);
		if (keys.length !== Object.keys(b).length) {
			return false;
		}
		return keys.every((key) => {
			const l = a[key];
			const r = b[key];
			return (
				l !== undefined &&
				r !== undefined &&
				Object.hasOwn(b, key) &&
				storedValuesEqual(l, r)
			);
		});
	}
	return false;
};

/**
 * Deep copy of a stored value; store-native identifiers are immutable and shared.
 */
export const cloneStoredValue = (value: StoredValue): StoredValue => {
	if (value instanceof Date) {
		return new Date(value.getTime());
	}
	if (value instanceof Uint8Array) {
		return Uint8Array.from(value);
	}
	if (Array.isArray(value)) {
		const items: ReadonlyArray<StoredValue> = value;
		return items.map(cloneStoredValue);
	}
	if (value !== null && typeof value === "object" && isStoredDocument(value)) {
		return cloneDocument(value);
	}
	return value;
};

export const cloneDocument = (document: StoredDocument): StoredDocument => {
	const copy: Record<string, StoredValue> = {};
	for (const [key, value] of Object.entries(document)) {
		copy[key] = cloneStoredValue(value);
	}
	return copy;
};
