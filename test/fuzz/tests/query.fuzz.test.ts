/**
 * Property tests for the query matcher.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as fc from 'fast-check';
import { matchesFilter } from '../../../src/query-matcher.ts';
import { cloneDocument } from '../../../src/document-utils.ts';
import type { Document, Filter } from '../../../src/types.ts';
import { fuzzParameters } from '../config.ts';
import {
  anyDocument,
  anyValue,
  arrayValue,
  fieldName,
  finiteNumber,
  numericDocument,
  scalarValue,
} from '../arbitraries/index.ts';

const condition: fc.Arbitrary<Document> = fc.oneof(
  fc.record({ $eq: anyValue }),
  fc.record({ $ne: anyValue }),
  fc.record({ $gt: scalarValue }),
  fc.record({ $gte: scalarValue }),
  fc.record({ $lt: scalarValue }),
  fc.record({ $lte: scalarValue }),
  fc.record({ $in: arrayValue }),
  fc.record({ $nin: arrayValue }),
  fc.record({ $exists: fc.boolean() }),
  fc.record({ $size: fc.nat({ max: 4 }) }),
  fc.record({ $all: arrayValue })
);

/** Single-field filter: a literal or an operator condition. */
const fieldFilter: fc.Arbitrary<Filter> = fc
  .tuple(fieldName, fc.oneof(anyValue, condition))
  .map(([field, value]): Filter => ({ [field]: value }));

describe('Query matcher properties', () => {
  it('should never mutate the document', () => {
    fc.assert(
      fc.property(anyDocument, fieldFilter, (doc, filter) => {
        const before = cloneDocument(doc);
        matchesFilter(doc, filter);
        assert.deepStrictEqual(doc, before);
      }),
      fuzzParameters()
    );
  });

  it('should match every document with an empty filter', () => {
    fc.assert(
      fc.property(anyDocument, (doc) => matchesFilter(doc, {}) && matchesFilter(doc, { $and: [] })),
      fuzzParameters()
    );
  });

  it('should negate with $not', () => {
    fc.assert(
      fc.property(anyDocument, fieldFilter, (doc, filter) => {
        assert.strictEqual(matchesFilter(doc, { $not: filter }), !matchesFilter(doc, filter));
      }),
      fuzzParameters()
    );
  });

  it('should combine clauses like boolean and/or/nor', () => {
    fc.assert(
      fc.property(anyDocument, fieldFilter, fieldFilter, (doc, left, right) => {
        const l = matchesFilter(doc, left);
        const r = matchesFilter(doc, right);
        assert.strictEqual(matchesFilter(doc, { $and: [left, right] }), l && r);
        assert.strictEqual(matchesFilter(doc, { $or: [left, right] }), l || r);
        assert.strictEqual(matchesFilter(doc, { $nor: [left, right] }), !(l || r));
      }),
      fuzzParameters()
    );
  });

  it('should treat a literal, $eq and a one-element $in alike', () => {
    fc.assert(
      fc.property(anyDocument, fieldName, anyValue, (doc, field, value) => {
        const literal = matchesFilter(doc, { [field]: value });
        assert.strictEqual(matchesFilter(doc, { [field]: { $eq: value } }), literal);
        assert.strictEqual(matchesFilter(doc, { [field]: { $in: [value] } }), literal);
        assert.strictEqual(matchesFilter(doc, { [field]: { $ne: value } }), !literal);
        assert.strictEqual(matchesFilter(doc, { [field]: { $nin: [value] } }), !literal);
      }),
      fuzzParameters()
    );
  });

  it('should agree with numeric comparison on numbers and fail otherwise', () => {
    fc.assert(
      fc.property(numericDocument, finiteNumber, (doc, threshold) => {
        const value = doc.a;
        const isNumber = typeof value === 'number';
        assert.strictEqual(matchesFilter(doc, { a: { $gte: threshold } }), isNumber && value >= threshold);
        assert.strictEqual(matchesFilter(doc, { a: { $lt: threshold } }), isNumber && value < threshold);
      }),
      fuzzParameters()
    );
  });

  it('should match $exists against presence, null included', () => {
    fc.assert(
      fc.property(anyDocument, fieldName, (doc, field) => {
        assert.strictEqual(matchesFilter(doc, { [field]: { $exists: true } }), Object.hasOwn(doc, field));
      }),
      fuzzParameters()
    );
  });
});
