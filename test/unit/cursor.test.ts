import { describe, it } from "node:test";
import assert from "node:assert";
import { ShelfCursor } from "../../src/cursor.ts";
import { applyProjection, getProjectionMode, sortDocuments } from "../../src/utils.ts";
import { InvalidQueryError } from "../../src/errors.ts";
import type { Document } from "../../src/types.ts";

const people: Document[] = [
  { _id: "1", name: "Cy", age: 40, team: "red" },
  { _id: "2", name: "Ann", age: 25, team: "blue" },
  { _id: "3", name: "Bo", team: "red" },
  { _id: "4", name: "Di", age: 25, team: "red" },
];

function ids(docs: Iterable<Document>): string[] {
  return Array.from(docs, (doc) => String(doc._id));
}

describe("ShelfCursor", () => {
  it("should yield documents in input order by default", () => {
    assert.deepStrictEqual(ids(new ShelfCursor(people)), ["1", "2", "3", "4"]);
  });

  it("should sort ascending with missing values first", () => {
    assert.deepStrictEqual(ids(new ShelfCursor(people).sort({ age: 1 })), ["3", "2", "4", "1"]);
  });

  it("should keep input order for ties", () => {
    assert.deepStrictEqual(ids(new ShelfCursor(people).sort({ age: -1 })), ["1", "2", "4", "3"]);
  });

  it("should sort by several keys in key order", () => {
    const cursor = new ShelfCursor(people).sort({ team: 1, age: -1 });
    assert.deepStrictEqual(ids(cursor), ["2", "1", "4", "3"]);
  });

  it("should apply skip and limit after sorting", () => {
    const cursor = new ShelfCursor(people, { sort: { name: 1 }, skip: 1, limit: 2 });
    assert.deepStrictEqual(ids(cursor), ["3", "1"]);
  });

  it("should treat limit 0 as no limit and clamp negative counts", () => {
    assert.strictEqual(new ShelfCursor(people).limit(0).count(), 4);
    assert.strictEqual(new ShelfCursor(people).skip(-3).count(), 4);
    assert.strictEqual(new ShelfCursor(people).skip(10).count(), 0);
  });

  it("should project each result", () => {
    const [first] = new ShelfCursor(people).project({ name: 1 }).toArray();
    assert.deepStrictEqual(first, { _id: "1", name: "Cy" });
  });

  it("should reject a mixed projection", () => {
    assert.throws(() => new ShelfCursor(people).project({ name: 1, age: 0 }), InvalidQueryError);
  });

  it("should return null from first() when empty", () => {
    assert.strictEqual(new ShelfCursor([]).first(), null);
    assert.deepStrictEqual(new ShelfCursor(people).sort({ name: 1 }).first()?._id, "2");
  });

  it("should cap toArray at the requested length", () => {
    assert.strictEqual(new ShelfCursor(people).toArray(2).length, 2);
  });

  it("should be iterable more than once", () => {
    const cursor = new ShelfCursor(people).limit(2);
    assert.deepStrictEqual(ids(cursor), ids(cursor));
  });

  it("should hand out copies", () => {
    const source: Document[] = [{ _id: "a", tags: ["x"] }];
    const cursor = new ShelfCursor(source);
    const [doc] = cursor.toArray();
    doc.tags = [];
    assert.deepStrictEqual(cursor.toArray(), [{ _id: "a", tags: ["x"] }]);
    assert.deepStrictEqual(source, [{ _id: "a", tags: ["x"] }]);
  });
});

describe("projection", () => {
  const doc: Document = { _id: "a", name: "x", age: 3, address: { city: "Y", zip: "1" } };

  it("should include fields and _id", () => {
    assert.deepStrictEqual(applyProjection(doc, { name: 1 }), { _id: "a", name: "x" });
  });

  it("should drop _id on request in an inclusion projection", () => {
    assert.deepStrictEqual(applyProjection(doc, { name: 1, _id: 0 }), { name: "x" });
  });

  it("should exclude fields", () => {
    assert.deepStrictEqual(applyProjection(doc, { age: 0, "address.zip": 0 }), {
      _id: "a",
      name: "x",
      address: { city: "Y" },
    });
  });

  it("should include nested paths", () => {
    assert.deepStrictEqual(applyProjection(doc, { "address.city": 1 }), {
      _id: "a",
      address: { city: "Y" },
    });
  });

  it("should keep only _id for an _id-only inclusion", () => {
    assert.strictEqual(getProjectionMode({ _id: 1 }), "inclusion");
    assert.deepStrictEqual(applyProjection(doc, { _id: 1 }), { _id: "a" });
  });

  it("should pass documents through for an empty projection", () => {
    assert.strictEqual(getProjectionMode({}), "passthrough");
    assert.deepStrictEqual(applyProjection(doc, {}), doc);
    assert.notStrictEqual(applyProjection(doc, {}), doc);
  });

  it("should report the mixing error", () => {
    assert.throws(
      () => getProjectionMode({ a: 1, b: 0 }),
      /Cannot do exclusion on a field in an inclusion projection/
    );
  });
});

describe("sortDocuments", () => {
  it("should not reorder its input", () => {
    const input: Document[] = [{ n: 2 }, { n: 1 }];
    const sorted = sortDocuments(input, { n: 1 });
    assert.deepStrictEqual(sorted, [{ n: 1 }, { n: 2 }]);
    assert.deepStrictEqual(input, [{ n: 2 }, { n: 1 }]);
  });

  it("should order across types", () => {
    const sorted = sortDocuments([{ v: "s" }, { v: true }, { v: 3 }, { v: null }], { v: 1 });
    assert.deepStrictEqual(sorted.map((doc) => doc.v), [null, 3, "s", true]);
  });
});
