import { ObjectId } from "bson";
import { describe, expect, it } from "vitest";
import { applyDiff, diff, isEmptyUpdate } from "../src/diff/document-diff.js";

const HEX = "65a1f0c2e4b0a1b2c3d4e5f6";

describe("diff", () => {
	it("sets new and changed keys and unsets removed ones", () => {
		expect(diff({ a: 1, b: 2 }, { a: 1, c: 3 })).toEqual({
			$set: { b: 2 },
			$unset: { c: "" },
		});
	});

	it("omits both operators for identical documents", () => {
		const update = diff({ name: "a", tags: ["x"] }, { name: "a", tags: ["x"] });
		expect(update).toEqual({});
		expect(isEmptyUpdate(update)).toBe(true);
	});

	it("replaces a changed nested document whole", () => {
		expect(diff({ n: { x: 1, y: 2 } }, { n: { x: 1, y: 1 } })).toEqual({
			$set: { n: { x: 1, y: 2 } },
		});
	});

	it("ignores key order inside nested documents", () => {
		expect(diff({ n: { x: 1, y: 2 } }, { n: { y: 2, x: 1 } })).toEqual({});
	});

	it("treats array order as significant", () => {
		expect(diff({ tags: ["a", "b"] }, { tags: ["b", "a"] })).toEqual({
			$set: { tags: ["a", "b"] },
		});
	});

	it("compares identifiers and dates by value", () => {
		const current = { _id: new ObjectId(HEX), at: new Date(1000) };
		const previous = { _id: new ObjectId(HEX), at: new Date(1000) };
		expect(diff(current, previous)).toEqual({});
	});

	it("sets an identifier that changed from its hex string", () => {
		const id = new ObjectId(HEX);
		expect(diff({ ref: id }, { ref: HEX })).toEqual({ $set: { ref: id } });
		expect(diff({ ref: id }, { ref: new ObjectId() })).toEqual({ $set: { ref: id } });
	});

	it("sets a key that changed from null", () => {
		expect(diff({ a: 1 }, { a: null })).toEqual({ $set: { a: 1 } });
	});

	it("copies the values it sets", () => {
		const nested = { x: 1 };
		const update = diff({ n: nested }, {});
		expect(update.$set?.n).toEqual(nested);
		expect(update.$set?.n).not.toBe(nested);
	});
});

describe("applyDiff", () => {
	it("applies $unset and $set to a copy", () => {
		const previous = { a: 1, b: 2 };
		const next = applyDiff(previous, { $set: { a: 5 }, $unset: { b: "" } });
		expect(next).toEqual({ a: 5 });
		expect(previous).toEqual({ a: 1, b: 2 });
	});
});
