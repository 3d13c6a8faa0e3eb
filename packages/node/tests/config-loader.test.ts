import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	Annotations,
	DocumentMapper,
	makeInMemoryTransport,
	makeInMemoryTransportLayer,
	makeTypeCatalogLayer,
	MapperConfig,
	TypeCatalog,
} from "@docmapper/core";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadMapperConfig, makeMapperConfigFileLayer } from "../src/config-loader.js";
import { makeNodeDocumentMapperLayer } from "../src/node-mapper-layer.js";

class Memo {
	name = "";
}

const makeTempDir = () =>
	join(tmpdir(), `docmapper-config-${randomBytes(8).toString("hex")}`);

describe("loadMapperConfig", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = makeTempDir();
		await fs.mkdir(tempDir, { recursive: true });
	});

	afterEach(async () => {
		await fs.rm(tempDir, { recursive: true, force: true });
	});

	const writeConfig = async (content: string) => {
		const configPath = join(tempDir, "docmapper.json");
		await fs.writeFile(configPath, content);
		return configPath;
	};

	it("layers the file on top of the defaults", async () => {
		const configPath = await writeConfig(JSON.stringify({ database: "shop", createIndexes: false }));
		const config = await Effect.runPromise(loadMapperConfig(configPath));
		expect(config).toEqual({
			connection: "default",
			database: "shop",
			internalPrefix: "__",
			createIndexes: false,
		});
	});

	it("fails with ConfigLoadError for a missing file", async () => {
		const error = await Effect.runPromise(
			Effect.flip(loadMapperConfig(join(tempDir, "absent.json"))),
		);
		expect(error._tag).toBe("ConfigLoadError");
		expect(error.reason).toMatch(/^Failed to read config: /);
	});

	it("fails with ConfigLoadError for invalid JSON", async () => {
		const configPath = await writeConfig("{ database: ");
		const error = await Effect.runPromise(Effect.flip(loadMapperConfig(configPath)));
		expect(error._tag).toBe("ConfigLoadError");
		expect(error.reason).toMatch(/^Failed to parse JSON config: /);
	});

	it("fails with ConfigValidationError when the file is not an object", async () => {
		const configPath = await writeConfig("[1, 2]");
		const error = await Effect.runPromise(Effect.flip(loadMapperConfig(configPath)));
		expect(error).toMatchObject({
			_tag: "ConfigValidationError",
			configPath,
			reason: "Config must be an object",
			message: `Invalid config in ${configPath}: Config must be an object, got array`,
		});
	});

	it("fails with ConfigValidationError for a field of the wrong type", async () => {
		const configPath = await writeConfig(JSON.stringify({ createIndexes: "yes" }));
		const error = await Effect.runPromise(Effect.flip(loadMapperConfig(configPath)));
		expect(error._tag).toBe("ConfigValidationError");
		expect(error.reason).toContain("createIndexes");
	});

	it("provides the loaded config as a service", async () => {
		const configPath = await writeConfig(JSON.stringify({ connection: "replica" }));
		const connection = await Effect.runPromise(
			Effect.map(MapperConfig, (config) => config.connection).pipe(
				Effect.provide(makeMapperConfigFileLayer(configPath)),
			),
		);
		expect(connection).toBe("replica");
	});

	it("configures a node document mapper", async () => {
		const configPath = await writeConfig(JSON.stringify({ database: "shop" }));
		const inserts = await Effect.runPromise(
			Effect.gen(function* () {
				const transport = yield* makeInMemoryTransport;
				const layer = makeNodeDocumentMapperLayer({
					configPath,
					introspector: makeTypeCatalogLayer(
						new TypeCatalog().declare(Memo, { properties: { name: [Annotations.string()] } }),
					),
					transport: makeInMemoryTransportLayer(transport),
				});
				yield* Effect.flatMap(DocumentMapper, (mapper) =>
					mapper.save(Object.assign(new Memo(), { name: "a" })),
				).pipe(Effect.provide(layer));
				const commands = yield* transport.commands;
				return commands.flatMap((command) =>
					command._tag === "Insert" ? [command.namespace] : [],
				);
			}),
		);
		expect(inserts).toEqual(["shop.memos"]);
	});
});
