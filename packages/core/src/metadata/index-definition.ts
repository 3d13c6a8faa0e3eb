import type {
	IndexDef,
	IndexKey,
} from "../types/schema-types.js";
import type { IndexSpec } from "../types/document-types.js";

/**
 * Deterministic index name: `unique` or `index`, then `<field>_<asc|desc>`
 * for each key entry, joined by `_`.
 */
export const indexName = (key: ReadonlyArray<IndexKey>, unique: boolean): string =>
	[
		unique ? "unique" : "index",
		...key.map(({ field, direction }) => `${field}_${direction}`),
	].join("_");

export const defineIndex = (options: {
	readonly key: ReadonlyArray<IndexKey>;
	readonly unique: boolean;
	readonly sparse: boolean;
	readonly background: boolean;
}): IndexDef => ({
	...options,
	name: indexName(options.key, options.unique),
});

/** Wire form used by the `createIndexes` command. */
export const toIndexSpec = (index: IndexDef): IndexSpec => {
	const key: Record<string, 1 | -1> = {};
	for (const { field, direction } of index.key) {
		key[field] = direction === "asc" ? 1 : -1;
	}
	return {
		key,
		name: index.name,
		unique: index.unique,
		sparse: index.sparse,
		background: index.background,
	};
};
