import type { EventKind } from "../types/schema-types.js";

/**
 * Canonical lifecycle events and the annotation/method names that map to them.
 */
export const EVENT_ALIASES: Readonly<Record<EventKind, ReadonlyArray<string>>> = {
	retrieved: ["retrieved"],
	creating: ["creating", "before_create", "beforeCreate"],
	created: ["created", "after_create", "afterCreate"],
	updating: ["updating", "before_update", "beforeUpdate"],
	updated: ["updated", "after_update", "afterUpdate"],
	saving: ["saving", "before_save", "beforeSave"],
	saved: ["saved", "after_save", "afterSave"],
	deleting: ["deleting", "before_delete", "beforeDelete"],
	deleted: ["deleted", "after_delete", "afterDelete"],
};

export const EVENT_KINDS: ReadonlyArray<EventKind> = [
	"retrieved",
	"creating",
	"created",
	"updating",
	"updated",
	"saving",
	"saved",
	"deleting",
	"deleted",
];

const byAlias: ReadonlyMap<string, EventKind> = new Map(
	EVENT_KINDS.flatMap((kind) =>
		EVENT_ALIASES[kind].map((alias) => [alias.toLowerCase(), kind] as const),
	),
);

/** Case-insensitive alias lookup. */
export const eventKindOf = (alias: string): EventKind | undefined =>
	byAlias.get(alias.toLowerCase());
