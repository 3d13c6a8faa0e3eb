/**
 * Stored document shapes, save commands and transport commands.
 */

import type { ObjectId } from "bson";

// ============================================================================
// Stored Values
// ============================================================================

export type StoredValue =
	| null
	| string
	| number
	| boolean
	| bigint
	| Date
	| ObjectId
	| Uint8Array
	| ReadonlyArray<StoredValue>
	| StoredDocument;

export interface StoredDocument {
	readonly [key: string]: StoredValue;
}

/**
 * Partial update produced by the diff engine. Both operators are omitted
 * when they would be empty.
 */
export interface UpdateDocument {
	readonly $set?: StoredDocument;
	readonly $unset?: Readonly<Record<string, "">>;
}

export type Selector = StoredDocument;

// ============================================================================
// Save Commands
// ============================================================================

export interface CommandTarget {
	readonly connection: string;
	readonly namespace: string;
	readonly collection: string;
}

export interface CreateCommand {
	readonly command: "create";
	readonly target: CommandTarget;
	readonly document: StoredDocument;
}

export interface UpdateCommand {
	readonly command: "update";
	readonly target: CommandTarget;
	readonly selector: Selector;
	readonly document: UpdateDocument;
}

export type SaveCommand = CreateCommand | UpdateCommand;

// ============================================================================
// Transport Commands
// ============================================================================

export interface IndexSpec {
	readonly key: Readonly<Record<string, 1 | -1>>;
	readonly name: string;
	readonly unique: boolean;
	readonly sparse: boolean;
	readonly background: boolean;
}

export interface UpdateStatement {
	readonly selector: Selector;
	readonly update: UpdateDocument;
	readonly upsert: boolean;
	readonly multi: boolean;
}

export interface DeleteStatement {
	readonly selector: Selector;
	/** 0 removes every match, 1 at most one. */
	readonly limit: 0 | 1;
}

export type TransportCommand =
	| {
			readonly _tag: "CreateIndexes";
			readonly collection: string;
			readonly namespace: string;
			readonly indexes: ReadonlyArray<IndexSpec>;
	  }
	| {
			readonly _tag: "Insert";
			readonly collection: string;
			readonly namespace: string;
			readonly documents: ReadonlyArray<StoredDocument>;
	  }
	| {
			readonly _tag: "Update";
			readonly collection: string;
			readonly namespace: string;
			readonly updates: ReadonlyArray<UpdateStatement>;
			readonly ordered: true;
	  }
	| {
			readonly _tag: "Delete";
			readonly collection: string;
			readonly namespace: string;
			readonly deletes: ReadonlyArray<DeleteStatement>;
	  };

export interface CommandResult {
	readonly ok: boolean;
	/** Documents inserted, matched for update, or removed. */
	readonly n: number;
}
