import { Option } from "effect";
import type { StoredDocument } from "../types/document-types.js";

/**
 * Last persisted document per live object. Keys are held weakly, so an
 * object that goes out of scope takes its baseline with it.
 */
const baselines = new WeakMap<object, StoredDocument>();

export const lastPersistedDocument = (object: object): Option.Option<StoredDocument> =>
	Option.fromNullable(baselines.get(object));

export const recordSnapshot = (object: object, document: StoredDocument): void => {
	baselines.set(object, document);
};

export const clearSnapshot = (object: object): void => {
	baselines.delete(object);
};
