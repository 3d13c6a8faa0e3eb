import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	defaultMapperConfig,
	MapperConfig,
	makeMapperConfigLayer,
	resolveMapperConfig,
} from "../src/config/mapper-config.js";
import { makeInMemoryMetadataCache } from "../src/cache/metadata-cache.js";
import { makeTypeCatalogLayer } from "../src/introspection/type-catalog.js";
import { extractSchema } from "../src/metadata/schema-extractor.js";
import { makeCatalog } from "./fixtures/models.js";

describe("resolveMapperConfig", () => {
	it("returns the defaults without overrides", async () => {
		expect(await Effect.runPromise(resolveMapperConfig())).toEqual({
			connection: "default",
			database: "app",
			internalPrefix: "__",
			createIndexes: true,
		});
	});

	it("layers overrides on the defaults and ignores undefined keys", async () => {
		const config = await Effect.runPromise(
			resolveMapperConfig({ database: "shop", connection: undefined }),
		);
		expect(config).toEqual({ ...defaultMapperConfig, database: "shop" });
	});

	it("rejects values of the wrong type", async () => {
		const result = await Effect.runPromise(
			Effect.either(resolveMapperConfig({ createIndexes: "yes" })),
		);
		expect(result._tag).toBe("Left");
	});

	it("rejects an empty internal prefix", async () => {
		const result = await Effect.runPromise(Effect.either(resolveMapperConfig({ internalPrefix: "" })));
		expect(result._tag).toBe("Left");
	});

	it("provides the resolved config as a service", async () => {
		const database = await Effect.runPromise(
			Effect.map(MapperConfig, (config) => config.database).pipe(
				Effect.provide(makeMapperConfigLayer({ database: "shop" })),
			),
		);
		expect(database).toBe("shop");
	});

	it("changes which properties count as internal", async () => {
		const fields = await Effect.runPromise(
			extractSchema("Account", () => Effect.die("no ancestors")).pipe(
				Effect.map((definition) => [...definition.propertiesByFieldName.keys()]),
				Effect.provide(makeTypeCatalogLayer(makeCatalog())),
				Effect.provide(makeMapperConfigLayer({ internalPrefix: "bal" })),
			),
		);
		expect(fields).toEqual(["owner", "__audit", "id"]);
	});
});

describe("InMemoryMetadataCache", () => {
	it("rebuilds an entry after one of its sources is touched", async () => {
		const result = await Effect.runPromise(
			Effect.gen(function* () {
				const cache = yield* makeInMemoryMetadataCache;
				const definition = yield* extractSchema("Memo", () => Effect.die("no ancestors")).pipe(
					Effect.provide(makeTypeCatalogLayer(makeCatalog())),
					Effect.provide(makeMapperConfigLayer()),
				);
				let builds = 0;
				const producer = Effect.sync(() => {
					builds++;
					return { value: definition, watch: ["models/memo.ts"] };
				});
				yield* cache.cached("memo", producer);
				yield* cache.cached("memo", producer);
				yield* cache.touch("models/other.ts");
				yield* cache.cached("memo", producer);
				const beforeTouch = builds;
				yield* cache.touch("models/memo.ts");
				yield* cache.cached("memo", producer);
				return { beforeTouch, afterTouch: builds, size: yield* cache.size };
			}),
		);
		expect(result).toEqual({ beforeTouch: 1, afterTouch: 2, size: 1 });
	});
});
