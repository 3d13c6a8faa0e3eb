import type { Selector, StoredValue } from "../types/document-types.js";

/**
 * Equality-only selector builder handed to scopes and finders. Each `where`
 * returns a new filter; later conditions on the same field win.
 */
export class QueryFilter {
	readonly #conditions: ReadonlyMap<string, StoredValue>;

	constructor(conditions: ReadonlyMap<string, StoredValue> = new Map()) {
		this.#conditions = conditions;
	}

	static from(selector: Selector): QueryFilter {
		return new QueryFilter(new Map(Object.entries(selector)));
	}

	where(field: string, value: StoredValue): QueryFilter {
		return new QueryFilter(new Map(this.#conditions).set(field, value));
	}

	get fields(): ReadonlyArray<string> {
		return [...this.#conditions.keys()];
	}

	toSelector(): Selector {
		return Object.fromEntries(this.#conditions);
	}
}

export const isQueryFilter = (value: unknown): value is QueryFilter =>
	value instanceof QueryFilter;
