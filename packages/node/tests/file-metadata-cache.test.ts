import { randomBytes } from "node:crypto";
import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	Annotations,
	extractSchema,
	makeMapperConfigLayer,
	makeTypeCatalogLayer,
	TypeCatalog,
} from "@docmapper/core";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeFileMetadataCache } from "../src/file-metadata-cache-layer.js";

class Note {
	text = "";
}

const makeTempDir = () =>
	join(tmpdir(), `docmapper-cache-${randomBytes(8).toString("hex")}`);

const definitionOf = (source: string) =>
	extractSchema("Note", () => Effect.die("no ancestors")).pipe(
		Effect.provide(
			makeTypeCatalogLayer(
				new TypeCatalog().declare(Note, {
					source,
					properties: { text: [Annotations.string()] },
				}),
			),
		),
		Effect.provide(makeMapperConfigLayer()),
	);

describe("FileMetadataCache", () => {
	let tempDir: string;
	let source: string;

	beforeEach(async () => {
		tempDir = makeTempDir();
		await fs.mkdir(tempDir, { recursive: true });
		source = join(tempDir, "note.ts");
		await fs.writeFile(source, "export class Note {}\n");
	});

	afterEach(async () => {
		await fs.rm(tempDir, { recursive: true, force: true });
	});

	const countingProducer = (counter: { builds: number }) =>
		Effect.flatMap(
			Effect.sync(() => {
				counter.builds++;
			}),
			() => Effect.map(definitionOf(source), (value) => ({ value, watch: [source] })),
		);

	it("serves the stored definition while the source is unchanged", async () => {
		const counter = { builds: 0 };
		const [first, second] = await Effect.runPromise(
			Effect.gen(function* () {
				const cache = yield* makeFileMetadataCache;
				const first = yield* cache.cached("Note", countingProducer(counter));
				const second = yield* cache.cached("Note", countingProducer(counter));
				return [first, second] as const;
			}),
		);
		expect(counter.builds).toBe(1);
		expect(second).toBe(first);
		expect(first.collectionName).toBe("notes");
	});

	it("rebuilds once the source modification time changes", async () => {
		const counter = { builds: 0 };
		await Effect.runPromise(
			Effect.gen(function* () {
				const cache = yield* makeFileMetadataCache;
				yield* cache.cached("Note", countingProducer(counter));
				yield* Effect.promise(() =>
					fs.utimes(source, new Date("2020-01-01T00:00:00Z"), new Date("2020-01-01T00:00:00Z")),
				);
				yield* cache.cached("Note", countingProducer(counter));
				yield* cache.cached("Note", countingProducer(counter));
			}),
		);
		expect(counter.builds).toBe(2);
	});

	it("rebuilds when a watched source disappears", async () => {
		const counter = { builds: 0 };
		await Effect.runPromise(
			Effect.gen(function* () {
				const cache = yield* makeFileMetadataCache;
				yield* cache.cached("Note", countingProducer(counter));
				yield* Effect.promise(() => fs.rm(source));
				yield* cache.cached("Note", countingProducer(counter));
				yield* cache.cached("Note", countingProducer(counter));
			}),
		);
		expect(counter.builds).toBe(2);
	});

	it("drops every entry on clear", async () => {
		const counter = { builds: 0 };
		await Effect.runPromise(
			Effect.gen(function* () {
				const cache = yield* makeFileMetadataCache;
				yield* cache.cached("Note", countingProducer(counter));
				yield* cache.clear;
				yield* cache.cached("Note", countingProducer(counter));
			}),
		);
		expect(counter.builds).toBe(2);
	});
});
