import { ObjectId } from "bson";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { Reference } from "../src/mapping/reference.js";
import { type SerializeOptions, toDocument } from "../src/mapping/serializer.js";
import { MetadataRegistry } from "../src/metadata/metadata-registry.js";
import {
	Account,
	Address,
	Customer,
	Dog,
	LinkedNode,
	Memo,
	Post,
	runWithMapper,
	Sample,
	User,
} from "./fixtures/models.js";

const lenient: SerializeOptions = { validate: false, generateId: false };
const strict: SerializeOptions = { validate: true, generateId: false };

const serialize = (object: object, options: SerializeOptions = lenient) =>
	Effect.flatMap(MetadataRegistry, (registry) =>
		Effect.flatMap(registry.ofObject(object), (definition) =>
			toDocument(definition, object, options),
		),
	);

const documentOf = (object: object, options?: SerializeOptions) =>
	runWithMapper(() => serialize(object, options));

const failureOf = (object: object, options?: SerializeOptions) =>
	runWithMapper(() => Effect.flip(serialize(object, options)));

const makeUser = (fields: Partial<User>): User => Object.assign(new User(), fields);

describe("scalar coercion", () => {
	it("coerces primitives to the declared kind", async () => {
		const sample = Object.assign(new Sample(), {
			count: "7.9",
			ratio: "0.5",
			active: 1,
			label: 12,
		});
		expect(await documentOf(sample)).toEqual({
			count: 7,
			ratio: 0.5,
			active: true,
			label: "12",
		});
	});

	it("coerces unparsable numbers to zero", async () => {
		const sample = Object.assign(new Sample(), { count: "many", ratio: "n/a" });
		const document = await documentOf(sample);
		expect(document.count).toBe(0);
		expect(document.ratio).toBe(0);
	});

	it("keeps null and copies dates", async () => {
		const createdAt = new Date(86_400_000);
		const sample = Object.assign(new Sample(), { label: null, createdAt });
		const document = await documentOf(sample);
		expect(document.label).toBeNull();
		expect(document.createdAt).toEqual(createdAt);
		expect(document.createdAt).not.toBe(createdAt);
	});

	it("wraps a lone value declared as an array and coerces its elements", async () => {
		const single = Object.assign(new Post(), { title: "T", tags: "solo" });
		expect((await documentOf(single)).tags).toEqual(["solo"]);

		const numbers = Object.assign(new Post(), { title: "T", tags: [1, 2] });
		expect((await documentOf(numbers)).tags).toEqual(["1", "2"]);
	});
});

describe("document shape", () => {
	it("omits absent properties and the unassigned identifier", async () => {
		expect(await documentOf(makeUser({ email: "ann@example.com", name: "Ann" }))).toEqual({
			email: "ann@example.com",
			name: "Ann",
		});
	});

	it("uses stored names", async () => {
		const user = makeUser({ id: 7, email: "ann@example.com", name: "Ann" });
		expect(await documentOf(user)).toEqual({ _id: 7, email: "ann@example.com", name: "Ann" });
	});

	it("merges undeclared fields and drops internal ones and runtime resources", async () => {
		const memo = Object.assign(new Memo(), {
			name: "a",
			extra: "kept",
			__scratch: "dropped",
			callback: () => 1,
			pending: Promise.resolve(1),
		});
		expect(await documentOf(memo)).toEqual({ name: "a", extra: "kept" });
	});

	it("serializes private properties", async () => {
		const account = Object.assign(new Account(), { owner: "ann" });
		expect(await documentOf(account)).toEqual({ owner: "ann", balance: 0 });
	});

	it("records the concrete class of a shared-collection descendant", async () => {
		const dog = Object.assign(new Dog(), { name: "Rex", breed: "lab" });
		expect(await documentOf(dog)).toEqual({
			name: "Rex",
			breed: "lab",
			__type: { class: "Dog" },
		});
	});
});

describe("identifier generation", () => {
	it("assigns an ObjectId before serializing", async () => {
		const memo = Object.assign(new Memo(), { name: "a" });
		const document = await documentOf(memo, { validate: false, generateId: true });
		const id: unknown = Reflect.get(memo, "id");
		expect(id).toBeInstanceOf(ObjectId);
		expect(document._id).toBe(id);
	});

	it("keeps an existing identifier", async () => {
		const user = makeUser({ id: 3, email: "ann@example.com" });
		const document = await documentOf(user, { validate: false, generateId: true });
		expect(document._id).toBe(3);
		expect(user.id).toBe(3);
	});
});

describe("validation", () => {
	it("fails on a missing required property", async () => {
		const error = await failureOf(makeUser({ email: "" }), strict);
		expect(error._tag).toBe("ValidationError");
		expect(error.message).toBe("Unexpected empty value for property email");
	});

	it("fails on the first failing predicate", async () => {
		const error = await failureOf(makeUser({ email: "not-an-email" }), strict);
		expect(error._tag).toBe("ValidationError");
		expect(error.message).toBe('Invalid value for email ("not-an-email")');
	});

	it("checks predicates with arguments", async () => {
		const error = await failureOf(makeUser({ email: "ann@example.com", age: 200 }), strict);
		expect(error.message).toBe("Invalid value for age (200)");
	});

	it("accepts a valid object", async () => {
		const user = makeUser({ email: "ann@example.com", age: 30 });
		expect(await documentOf(user, strict)).toEqual({ email: "ann@example.com", name: "", age: 30 });
	});

	it("does not validate without the flag", async () => {
		expect(await documentOf(makeUser({ email: "" }))).toEqual({ email: "", name: "" });
	});
});

describe("references", () => {
	it("collapses a referenced object to a pointer with cached fields", async () => {
		const author = makeUser({ id: 5, email: "x@y" });
		const post = Object.assign(new Post(), { title: "Hello", author, tags: ["a"] });
		expect(await documentOf(post)).toEqual({
			title: "Hello",
			author: { $ref: "users", $id: 5, __cache: { email: "x@y" } },
			tags: ["a"],
		});
	});

	it("refuses to reference an unsaved object when validating", async () => {
		const post = Object.assign(new Post(), { title: "Hello", author: makeUser({ email: "x@y" }) });
		const error = await failureOf(post, strict);
		expect(error._tag).toBe("ConfigurationError");
		expect(error.message).toBe("Cannot reference an unsaved User");
	});

	it("points at a null id when not validating", async () => {
		const post = Object.assign(new Post(), { title: "Hello", author: makeUser({ email: "x@y" }) });
		expect((await documentOf(post)).author).toEqual({
			$ref: "users",
			$id: null,
			__cache: { email: "x@y" },
		});
	});

	it("writes an existing reference back as its pointer", async () => {
		const post = Object.assign(new Post(), {
			title: "Hello",
			author: new Reference({ collection: "users", id: 9 }),
		});
		expect((await documentOf(post)).author).toEqual({ $ref: "users", $id: 9 });
	});
});

describe("embedded objects", () => {
	it("serializes a declared class without a discriminator", async () => {
		const customer = Object.assign(new Customer(), {
			address: Object.assign(new Address(), { city: "Oslo", zip: "0150" }),
		});
		expect(await documentOf(customer)).toEqual({ address: { city: "Oslo", zip: "0150" } });
	});

	it("records the class of a mapped object in an untyped property", async () => {
		const customer = Object.assign(new Customer(), {
			billing: Object.assign(new Address(), { city: "Rome", zip: "00100" }),
		});
		expect((await documentOf(customer)).billing).toEqual({
			city: "Rome",
			zip: "00100",
			__type: { class: "Address" },
		});
	});

	it("serializes unmapped objects as plain documents", async () => {
		const customer = Object.assign(new Customer(), {
			billing: { card: "test-card", __secret: "x", notify: () => undefined },
		});
		expect((await documentOf(customer)).billing).toEqual({ card: "test-card" });
	});

	it("rejects objects that are neither mapped nor plain records", async () => {
		const memo = Object.assign(new Memo(), { name: "a", extra: new Map([["k", 1]]) });
		const error = await failureOf(memo, strict);
		expect(error).toMatchObject({
			_tag: "ConfigurationError",
			typeName: "Map",
			reason: "unmapped-object",
			message: "Objects of class Map are not mapped",
		});

		class Counter {
			#count = 3;
			get count(): number {
				return this.#count;
			}
		}
		const customer = Object.assign(new Customer(), { billing: new Counter() });
		expect(await failureOf(customer)).toMatchObject({
			reason: "unmapped-object",
			message: "Objects of class Counter are not mapped",
		});
	});

	it("keeps records without a prototype", async () => {
		const billing: Record<string, unknown> = Object.create(null);
		billing.card = "test-card";
		const customer = Object.assign(new Customer(), { billing });
		expect((await documentOf(customer)).billing).toEqual({ card: "test-card" });
	});

	it("serializes a chain of embedded objects", async () => {
		const tail = Object.assign(new LinkedNode(), { label: "b" });
		const head = Object.assign(new LinkedNode(), { label: "a", next: tail });
		expect(await documentOf(head)).toEqual({
			label: "a",
			next: { label: "b", __type: { class: "LinkedNode" } },
		});
	});

	it("rejects an embedded cycle", async () => {
		const first = Object.assign(new LinkedNode(), { label: "a" });
		const second = Object.assign(new LinkedNode(), { label: "b", next: first });
		first.next = second;
		const error = await failureOf(first);
		expect(error._tag).toBe("ConfigurationError");
		expect(error.message).toBe("Cannot serialize a cyclic graph of embedded LinkedNode objects");
	});
});
