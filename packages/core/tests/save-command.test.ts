import { ObjectId } from "bson";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { getSaveCommand } from "../src/diff/save-command.js";
import { snapshot } from "../src/diff/snapshot.js";
import { newInstance } from "../src/mapping/hydrator.js";
import { MetadataRegistry } from "../src/metadata/metadata-registry.js";
import { Memo, Order, runWithMapper, Shiny, User } from "./fixtures/models.js";

const commandFor = (object: object) =>
	Effect.flatMap(MetadataRegistry, (registry) =>
		Effect.flatMap(registry.ofObject(object), (definition) =>
			getSaveCommand(definition, object),
		),
	);

/** Loads `document` as a Memo, so that it has a baseline. */
const loadedMemo = (document: { readonly _id: number; readonly name: string }) =>
	Effect.flatMap(MetadataRegistry, (registry) =>
		Effect.flatMap(registry.of("Memo"), (definition) =>
			newInstance(definition, document, false),
		),
	);

describe("getSaveCommand", () => {
	it("creates an object without a baseline", async () => {
		const memo = Object.assign(new Memo(), { name: "a" });
		const command = await runWithMapper(() => commandFor(memo));
		const id: unknown = Reflect.get(memo, "id");
		expect(id).toBeInstanceOf(ObjectId);
		expect(command).toEqual({
			command: "create",
			target: { connection: "default", namespace: "app.memos", collection: "memos" },
			document: { name: "a", _id: id },
		});
	});

	it("updates only the changed fields of a loaded object", async () => {
		const command = await runWithMapper(() =>
			Effect.gen(function* () {
				const memo = yield* loadedMemo({ _id: 1, name: "a" });
				Reflect.set(memo, "name", "b");
				return yield* commandFor(memo);
			}),
		);
		expect(command).toEqual({
			command: "update",
			target: { connection: "default", namespace: "app.memos", collection: "memos" },
			selector: { _id: 1 },
			document: { $set: { name: "b" } },
		});
	});

	it("unsets removed fields", async () => {
		const command = await runWithMapper(() =>
			Effect.gen(function* () {
				const memo = yield* loadedMemo({ _id: 1, name: "a" });
				Reflect.deleteProperty(memo, "name");
				return yield* commandFor(memo);
			}),
		);
		expect(command.command).toBe("update");
		expect(command.document).toEqual({ $unset: { name: "" } });
	});

	it("produces an empty update for an unchanged object", async () => {
		const command = await runWithMapper(() =>
			Effect.flatMap(loadedMemo({ _id: 1, name: "a" }), commandFor),
		);
		expect(command.command).toBe("update");
		expect(command.document).toEqual({});
	});

	it("names the configured connection and database", async () => {
		const command = await runWithMapper(() => commandFor(Object.assign(new Memo(), { name: "a" })), {
			config: { connection: "replica", database: "shop" },
		});
		expect(command.target).toEqual({
			connection: "replica",
			namespace: "shop.memos",
			collection: "memos",
		});
	});

	it("fires saving and creating for a new object", async () => {
		const order = Object.assign(new Order(), { total: 10 });
		await runWithMapper(() => commandFor(order));
		expect(order.__calls).toEqual(["saving", "creating"]);
	});

	it("fires saving and updating for an object with a baseline", async () => {
		const order = Object.assign(new Order(), { total: 10 });
		const command = await runWithMapper(() =>
			Effect.gen(function* () {
				const registry = yield* MetadataRegistry;
				yield* snapshot(yield* registry.ofObject(order), order);
				order.total = 12;
				return yield* commandFor(order);
			}),
		);
		expect(order.__calls).toEqual(["saving", "updating"]);
		expect(command).toMatchObject({ command: "update", document: { $set: { total: 12 } } });
	});

	it("validates before building an update", async () => {
		const error = await runWithMapper(() =>
			Effect.gen(function* () {
				const registry = yield* MetadataRegistry;
				const definition = yield* registry.of("User");
				const user = yield* newInstance(definition, { _id: 1, email: "ann@example.com" }, false);
				Reflect.set(user, "email", "broken");
				return yield* Effect.flip(getSaveCommand(definition, user));
			}),
		);
		expect(error._tag).toBe("ValidationError");
		expect(error.message).toBe('Invalid value for email ("broken")');
	});

	it("takes a generated identifier back when the document is invalid", async () => {
		const user = Object.assign(new User(), { email: "broken" });
		const shiny = Object.assign(new Shiny(), { value: "gold" });
		const errors = await runWithMapper(() =>
			Effect.all([Effect.flip(commandFor(user)), Effect.flip(commandFor(shiny))]),
		);
		expect(errors.map((error) => error._tag)).toEqual(["ValidationError", "ConfigurationError"]);
		expect(user.id).toBeUndefined();
		expect(Object.hasOwn(shiny, "id")).toBe(false);
	});

	it("keeps an identifier the object already had when the document is invalid", async () => {
		const user = Object.assign(new User(), { id: 7, email: "broken" });
		await runWithMapper(() => Effect.flip(commandFor(user)));
		expect(user.id).toBe(7);
	});

	it("does not assign an identifier when updating", async () => {
		const user = Object.assign(new User(), { email: "ann@example.com" });
		const command = await runWithMapper(() =>
			Effect.gen(function* () {
				const registry = yield* MetadataRegistry;
				yield* snapshot(yield* registry.ofObject(user), user);
				return yield* commandFor(user);
			}),
		);
		expect(user.id).toBeUndefined();
		expect(command).toMatchObject({ command: "update", selector: { _id: null } });
	});
});
