import { describe, it } from "node:test";
import assert from "node:assert";
import { runAggregation, createAccumulator } from "../../src/aggregation/index.ts";
import { InvalidQueryError } from "../../src/errors.ts";
import type { Document } from "../../src/types.ts";

const sales: Document[] = [
  { _id: "1", cat: "a", v: 1, item: "pen" },
  { _id: "2", cat: "a", v: 3, item: "ink" },
  { _id: "3", cat: "b", v: 5, item: "pad" },
];

describe("aggregation", () => {
  describe("$group", () => {
    it("should sum per group in first-seen order", () => {
      const result = runAggregation(sales, [{ $group: { _id: "$cat", total: { $sum: "$v" } } }]);
      assert.deepStrictEqual(result, [
        { _id: "a", total: 4 },
        { _id: "b", total: 5 },
      ]);
    });

    it("should count with a constant $sum", () => {
      const result = runAggregation(sales, [{ $group: { _id: null, n: { $sum: 1 } } }]);
      assert.deepStrictEqual(result, [{ _id: null, n: 3 }]);
    });

    it("should group a missing key under null", () => {
      const result = runAggregation(
        [{ k: 1 }, {}, { k: null }],
        [{ $group: { _id: "$k", n: { $sum: 1 } } }]
      );
      assert.deepStrictEqual(result, [
        { _id: 1, n: 1 },
        { _id: null, n: 2 },
      ]);
    });

    it("should bucket documents by structural key", () => {
      const result = runAggregation(
        [{ k: { x: 1, y: 2 } }, { k: { y: 2, x: 1 } }],
        [{ $group: { _id: "$k", n: { $sum: 1 } } }]
      );
      assert.strictEqual(result.length, 1);
      assert.strictEqual(result[0].n, 2);
    });

    it("should compute every accumulator", () => {
      const docs: Document[] = [{ v: 4 }, { v: "x" }, { v: 2 }, {}, { v: 4 }];
      const [result] = runAggregation(docs, [
        {
          $group: {
            _id: null,
            avg: { $avg: "$v" },
            min: { $min: "$v" },
            max: { $max: "$v" },
            all: { $push: "$v" },
            set: { $addToSet: "$v" },
          },
        },
      ]);
      assert.deepStrictEqual(result, {
        _id: null,
        avg: 2,
        min: 2,
        max: "x",
        all: [4, "x", 2, null, 4],
        set: [4, "x", 2, null],
      });
    });

    it("should return null for $min over only missing values", () => {
      const [result] = runAggregation([{}, { v: null }], [{ $group: { _id: null, m: { $min: "$v" } } }]);
      assert.deepStrictEqual(result, { _id: null, m: null });
    });

    it("should reject unknown accumulators even with no input", () => {
      assert.throws(
        () => runAggregation([], [{ $group: { _id: null, m: { $median: "$v" } } }]),
        /Unsupported group accumulator: \$median/
      );
    });
  });

  describe("createAccumulator", () => {
    it("should yield 0 for an empty $avg", () => {
      assert.strictEqual(createAccumulator("a", { $avg: "$v" }).getResult(), 0);
    });

    it("should reject an accumulator with several operators", () => {
      assert.throws(() => createAccumulator("a", { $sum: 1, $avg: 1 }), InvalidQueryError);
    });
  });

  describe("$match / $sort / $skip / $limit", () => {
    it("should run stages in order", () => {
      const result = runAggregation(sales, [
        { $match: { v: { $gte: 2 } } },
        { $sort: { v: -1 } },
        { $skip: 1 },
        { $limit: 5 },
      ]);
      assert.deepStrictEqual(result.map((doc) => doc._id), ["2"]);
    });

    it("should treat a non-positive skip or limit as a no-op", () => {
      assert.strictEqual(runAggregation(sales, [{ $limit: 0 }]).length, 3);
      assert.strictEqual(runAggregation(sales, [{ $skip: -2 }]).length, 3);
    });

    it("should reject non-numeric counts and bad sort directions", () => {
      assert.throws(() => runAggregation(sales, [{ $limit: "2" }]), /\$limit requires a number/);
      assert.throws(() => runAggregation(sales, [{ $sort: { v: 2 } }]), InvalidQueryError);
    });

    it("should validate $match filters", () => {
      assert.throws(() => runAggregation([], [{ $match: { v: { $near: 1 } } }]), InvalidQueryError);
    });
  });

  describe("$project", () => {
    it("should include, rename and compute fields without an implicit _id", () => {
      const result = runAggregation(
        [{ _id: "1", first: "Ada", last: "Lovelace", age: 36, meta: { tag: "x" } }],
        [
          {
            $project: {
              first: 1,
              age: 0,
              tag: "$meta.tag",
              full: { $concat: ["$first", " ", "$last"] },
              kind: { $literal: "$person" },
              absent: "$nope",
            },
          },
        ]
      );
      assert.deepStrictEqual(result, [
        { first: "Ada", tag: "x", full: "Ada Lovelace", kind: "$person" },
      ]);
    });

    it("should treat null and missing as empty in $concat", () => {
      const result = runAggregation([{ a: "x", b: null }], [
        { $project: { s: { $concat: ["$a", "$b", "$c", 7] } } },
      ]);
      assert.deepStrictEqual(result, [{ s: "x7" }]);
    });

    it("should reject unsupported expressions", () => {
      assert.throws(
        () => runAggregation([{ a: 1 }], [{ $project: { b: { $add: ["$a", 1] } } }]),
        InvalidQueryError
      );
      assert.throws(() => runAggregation([{ a: 1 }], [{ $project: { b: 2 } }]), InvalidQueryError);
    });
  });

  describe("$unwind", () => {
    it("should emit one document per element and drop non-arrays", () => {
      const result = runAggregation(
        [
          { _id: "a", tags: ["x", "y"] },
          { _id: "b", tags: [] },
          { _id: "c", tags: "z" },
          { _id: "d" },
        ],
        [{ $unwind: "$tags" }]
      );
      assert.deepStrictEqual(result, [
        { _id: "a", tags: "x" },
        { _id: "a", tags: "y" },
      ]);
    });

    it("should accept the document form", () => {
      const result = runAggregation([{ t: [1, 2] }], [{ $unwind: { path: "$t" } }]);
      assert.deepStrictEqual(result, [{ t: 1 }, { t: 2 }]);
    });
  });

  describe("$count", () => {
    it("should emit a single count document", () => {
      assert.deepStrictEqual(runAggregation(sales, [{ $match: { cat: "a" } }, { $count: "n" }]), [
        { count: 2 },
      ]);
      assert.deepStrictEqual(runAggregation([], [{ $count: "n" }]), [{ count: 0 }]);
    });
  });

  describe("pipeline validation", () => {
    it("should reject unknown stages and malformed stage documents", () => {
      assert.throws(() => runAggregation(sales, [{ $lookup: {} }]), /Unrecognized pipeline stage name: '\$lookup'/);
      assert.throws(() => runAggregation(sales, [{ $match: {}, $limit: 1 }]), InvalidQueryError);
    });

    it("should not mutate the input documents", () => {
      const docs: Document[] = [{ t: [1, 2], n: { v: 1 } }];
      const result = runAggregation(docs, [{ $unwind: "$t" }]);
      const first = result[0];
      first.n = 5;
      assert.deepStrictEqual(docs, [{ t: [1, 2], n: { v: 1 } }]);
    });

    it("should return the input for an empty pipeline", () => {
      assert.deepStrictEqual(runAggregation(sales, []), sales);
    });
  });
});
