import { describe, it } from "node:test";
import assert from "node:assert";
import { matchesFilter, validateFilter } from "../../src/query-matcher.ts";
import { InvalidQueryError } from "../../src/errors.ts";

describe("query-matcher", () => {
  describe("implicit equality", () => {
    it("should match literal values at dotted paths", () => {
      const doc = { name: "Ada", address: { city: "Leeds" } };
      assert.strictEqual(matchesFilter(doc, { "address.city": "Leeds" }), true);
      assert.strictEqual(matchesFilter(doc, { "address.city": "York" }), false);
    });

    it("should compare documents structurally", () => {
      const doc = { meta: { a: 1, b: 2 } };
      assert.strictEqual(matchesFilter(doc, { meta: { b: 2, a: 1 } }), true);
      assert.strictEqual(matchesFilter(doc, { meta: { a: 1 } }), false);
    });

    it("should compare arrays as whole values", () => {
      assert.strictEqual(matchesFilter({ tags: ["x", "y"] }, { tags: ["x", "y"] }), true);
      assert.strictEqual(matchesFilter({ tags: ["x", "y"] }, { tags: "x" }), false);
    });

    it("should not match null against a missing field", () => {
      assert.strictEqual(matchesFilter({}, { a: null }), false);
      assert.strictEqual(matchesFilter({ a: null }, { a: null }), true);
    });

    it("should match everything with an empty filter", () => {
      assert.strictEqual(matchesFilter({ a: 1 }, {}), true);
    });
  });

  describe("comparison operators", () => {
    const range = { age: { $gte: 18, $lt: 65 } };

    it("should require every operator on a field", () => {
      assert.strictEqual(matchesFilter({ age: 70 }, range), false);
      assert.strictEqual(matchesFilter({ age: 30 }, range), true);
      assert.strictEqual(matchesFilter({ age: 18 }, range), true);
    });

    it("should fail on a missing field", () => {
      assert.strictEqual(matchesFilter({}, range), false);
    });

    it("should fail when types are not orderable", () => {
      assert.strictEqual(matchesFilter({ age: "30" }, { age: { $gt: 18 } }), false);
      assert.strictEqual(matchesFilter({ age: null }, { age: { $lte: 18 } }), false);
    });

    it("should order strings", () => {
      assert.strictEqual(matchesFilter({ name: "bob" }, { name: { $gt: "alice" } }), true);
    });

    it("should treat $eq and $ne structurally, with missing as its own state", () => {
      assert.strictEqual(matchesFilter({ a: [1, 2] }, { a: { $eq: [1, 2] } }), true);
      assert.strictEqual(matchesFilter({}, { a: { $ne: null } }), true);
      assert.strictEqual(matchesFilter({ a: null }, { a: { $ne: null } }), false);
    });
  });

  describe("$in / $nin", () => {
    it("should test membership", () => {
      assert.strictEqual(matchesFilter({ s: "b" }, { s: { $in: ["a", "b"] } }), true);
      assert.strictEqual(matchesFilter({ s: "c" }, { s: { $in: ["a", "b"] } }), false);
      assert.strictEqual(matchesFilter({ s: "c" }, { s: { $nin: ["a", "b"] } }), true);
    });

    it("should never find a missing value in the list", () => {
      assert.strictEqual(matchesFilter({}, { s: { $in: [null] } }), false);
      assert.strictEqual(matchesFilter({}, { s: { $nin: [null] } }), true);
    });

    it("should reject a non-array argument", () => {
      assert.throws(() => matchesFilter({ s: 1 }, { s: { $in: 1 } }), InvalidQueryError);
    });
  });

  describe("$exists", () => {
    it("should treat null as present", () => {
      assert.strictEqual(matchesFilter({ a: null }, { a: { $exists: true } }), true);
      assert.strictEqual(matchesFilter({}, { a: { $exists: true } }), false);
      assert.strictEqual(matchesFilter({}, { a: { $exists: false } }), true);
    });
  });

  describe("$regex", () => {
    it("should search rather than full-match", () => {
      assert.strictEqual(matchesFilter({ s: "hello world" }, { s: { $regex: "lo w" } }), true);
    });

    it("should accept pattern and options as a document", () => {
      const filter = { s: { $regex: { pattern: "^HELLO", options: "i" } } };
      assert.strictEqual(matchesFilter({ s: "hello" }, filter), true);
    });

    it("should accept a sibling $options", () => {
      assert.strictEqual(matchesFilter({ s: "a\nb" }, { s: { $regex: "a.b", $options: "s" } }), true);
      assert.strictEqual(matchesFilter({ s: "a\nb" }, { s: { $regex: "a.b" } }), false);
      assert.strictEqual(matchesFilter({ s: "x\nb" }, { s: { $regex: "^b", $options: "m" } }), true);
    });

    it("should fail on non-strings and missing values", () => {
      assert.strictEqual(matchesFilter({ s: 5 }, { s: { $regex: "5" } }), false);
      assert.strictEqual(matchesFilter({}, { s: { $regex: "" } }), false);
    });

    it("should reject unknown flags and bad patterns", () => {
      assert.throws(() => matchesFilter({ s: "a" }, { s: { $regex: "a", $options: "g" } }), InvalidQueryError);
      assert.throws(() => matchesFilter({ s: "a" }, { s: { $regex: "(" } }), InvalidQueryError);
    });
  });

  describe("$size", () => {
    it("should compare array and string lengths", () => {
      assert.strictEqual(matchesFilter({ a: [1, 2] }, { a: { $size: 2 } }), true);
      assert.strictEqual(matchesFilter({ a: "abc" }, { a: { $size: 3 } }), true);
      assert.strictEqual(matchesFilter({ a: 3 }, { a: { $size: 3 } }), false);
    });
  });

  describe("$all", () => {
    it("should require every listed element", () => {
      assert.strictEqual(matchesFilter({ t: ["a", "b", "c"] }, { t: { $all: ["c", "a"] } }), true);
      assert.strictEqual(matchesFilter({ t: ["a"] }, { t: { $all: ["a", "b"] } }), false);
      assert.strictEqual(matchesFilter({ t: "a" }, { t: { $all: ["a"] } }), false);
    });
  });

  describe("$elemMatch", () => {
    it("should match document elements with a sub-query", () => {
      const doc = { items: [{ sku: "a", qty: 1 }, { sku: "b", qty: 5 }] };
      assert.strictEqual(matchesFilter(doc, { items: { $elemMatch: { sku: "b", qty: { $gt: 3 } } } }), true);
      assert.strictEqual(matchesFilter(doc, { items: { $elemMatch: { sku: "a", qty: { $gt: 3 } } } }), false);
    });

    it("should match scalar elements when any of the operators holds", () => {
      assert.strictEqual(matchesFilter({ n: [1, 7, 12] }, { n: { $elemMatch: { $gt: 5, $lt: 10 } } }), true);
      assert.strictEqual(matchesFilter({ n: [1, 12] }, { n: { $elemMatch: { $gt: 5, $lt: 10 } } }), true);
      assert.strictEqual(matchesFilter({ n: [1, 2] }, { n: { $elemMatch: { $gt: 5, $in: [9] } } }), false);
    });

    it("should check every element operator even after one holds", () => {
      assert.throws(() => matchesFilter({ n: [9] }, { n: { $elemMatch: { $gt: 5, $all: [9] } } }), InvalidQueryError);
    });

    it("should fail when the value is not an array", () => {
      assert.strictEqual(matchesFilter({ n: 7 }, { n: { $elemMatch: { $gt: 5 } } }), false);
    });

    it("should reject array operators on scalar elements", () => {
      assert.throws(() => matchesFilter({ n: [1] }, { n: { $elemMatch: { $size: 1 } } }), InvalidQueryError);
    });
  });

  describe("logical operators", () => {
    it("should treat empty $and as true and empty $or as false", () => {
      assert.strictEqual(matchesFilter({ a: 1 }, { $and: [] }), true);
      assert.strictEqual(matchesFilter({ a: 1 }, { $or: [] }), false);
    });

    it("should combine clauses", () => {
      const doc = { a: 1, b: 2 };
      assert.strictEqual(matchesFilter(doc, { $and: [{ a: 1 }, { b: 2 }] }), true);
      assert.strictEqual(matchesFilter(doc, { $or: [{ a: 2 }, { b: 2 }] }), true);
      assert.strictEqual(matchesFilter(doc, { $nor: [{ a: 2 }, { b: 3 }] }), true);
      assert.strictEqual(matchesFilter(doc, { $not: { a: 1 } }), false);
    });

    it("should combine logical and field keys", () => {
      assert.strictEqual(matchesFilter({ a: 1, b: 2 }, { a: 1, $or: [{ b: 3 }] }), false);
    });

    it("should reject malformed clause shapes", () => {
      assert.throws(() => matchesFilter({}, { $and: { a: 1 } }), InvalidQueryError);
      assert.throws(() => matchesFilter({}, { $or: [1] }), InvalidQueryError);
      assert.throws(() => matchesFilter({}, { $not: [] }), InvalidQueryError);
    });
  });

  describe("invalid queries", () => {
    it("should reject unknown operators", () => {
      assert.throws(() => matchesFilter({ a: 1 }, { a: { $between: [0, 2] } }), /unknown operator: \$between/);
      assert.throws(() => matchesFilter({ a: 1 }, { $where: "1" }), InvalidQueryError);
    });

    it("should reject conditions mixing operators and fields", () => {
      assert.throws(() => matchesFilter({ a: { b: 1 } }, { a: { $eq: 1, b: 1 } }), InvalidQueryError);
    });
  });

  describe("validateFilter", () => {
    it("should find problems that evaluation would short-circuit past", () => {
      assert.throws(() => validateFilter({ a: { $gt: 1, $foo: 2 } }), /unknown operator: \$foo/);
      assert.throws(() => validateFilter({ $or: [{ a: 1 }, { b: { $in: 3 } }] }), /\$in needs an array/);
      assert.throws(() => validateFilter({ a: { $elemMatch: { $regex: "x" } } }), InvalidQueryError);
    });

    it("should accept well-formed filters", () => {
      assert.doesNotThrow(() =>
        validateFilter({
          a: { $gte: 1, $in: [1, 2] },
          $and: [{ b: { $exists: true } }, { c: { $regex: "^x", $options: "i" } }],
          items: { $elemMatch: { sku: "a" } },
        })
      );
    });
  });
});
