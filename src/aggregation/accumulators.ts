/**
 * Accumulator classes for $group stage.
 */
import type { Document, Value } from "../types.ts";
import { cloneValue, compareValues, isDocument, valuesEqual } from "../document-utils.ts";
import { InvalidQueryError } from "../errors.ts";
import { evaluateOperand } from "./expression.ts";

export interface Accumulator {
  accumulate(doc: Document): void;
  getResult(): Value;
}

class SumAccumulator implements Accumulator {
  private sum = 0;
  private expr: Value;

  constructor(expr: Value) {
    this.expr = expr;
  }

  accumulate(doc: Document): void {
    const value = evaluateOperand(this.expr, doc);
    if (typeof value === "number") {
      this.sum += value;
    }
  }

  getResult(): number {
    return this.sum;
  }
}

// Non-numeric values count as 0 but still count towards the divisor.
class AvgAccumulator implements Accumulator {
  private sum = 0;
  private count = 0;
  private expr: Value;

  constructor(expr: Value) {
    this.expr = expr;
  }

  accumulate(doc: Document): void {
    const value = evaluateOperand(this.expr, doc);
    if (typeof value === "number") {
      this.sum += value;
    }
    this.count++;
  }

  getResult(): number {
    return this.count > 0 ? this.sum / this.count : 0;
  }
}

class BoundAccumulator implements Accumulator {
  private bound: Value | undefined = undefined;
  private expr: Value;
  private direction: 1 | -1;

  constructor(expr: Value, direction: 1 | -1) {
    this.expr = expr;
    this.direction = direction;
  }

  accumulate(doc: Document): void {
    const value = evaluateOperand(this.expr, doc);
    if (value === null || value === undefined) {
      return;
    }
    if (this.bound === undefined || this.direction * compareValues(value, this.bound) < 0) {
      this.bound = value;
    }
  }

  getResult(): Value {
    return this.bound === undefined ? null : cloneValue(this.bound);
  }
}

class PushAccumulator implements Accumulator {
  private values: Value[] = [];
  private expr: Value;

  constructor(expr: Value) {
    this.expr = expr;
  }

  accumulate(doc: Document): void {
    const value = evaluateOperand(this.expr, doc);
    this.values.push(value === undefined ? null : cloneValue(value));
  }

  getResult(): Value[] {
    return this.values;
  }
}

class AddToSetAccumulator implements Accumulator {
  private values: Value[] = [];
  private expr: Value;

  constructor(expr: Value) {
    this.expr = expr;
  }

  accumulate(doc: Document): void {
    const value = evaluateOperand(this.expr, doc) ?? null;
    if (!this.values.some((existing) => valuesEqual(existing, value))) {
      this.values.push(cloneValue(value));
    }
  }

  getResult(): Value[] {
    return this.values;
  }
}

/**
 * Create an accumulator from a `$group` output field specification such as
 * `{ $sum: "$price" }`.
 *
 * @param field - Output field name, used in error messages
 * @param spec - Accumulator specification with exactly one operator key
 * @throws InvalidQueryError for unknown or malformed accumulators
 */
export function createAccumulator(field: string, spec: Value): Accumulator {
  if (!isDocument(spec)) {
    throw new InvalidQueryError(`The field '${field}' must be an accumulator object`);
  }
  const entries = Object.entries(spec);
  if (entries.length !== 1) {
    throw new InvalidQueryError(`The field '${field}' must specify one accumulator`);
  }
  const [op, expr] = entries[0];

  switch (op) {
    case "$sum":
      return new SumAccumulator(expr);
    case "$avg":
      return new AvgAccumulator(expr);
    case "$min":
      return new BoundAccumulator(expr, 1);
    case "$max":
      return new BoundAccumulator(expr, -1);
    case "$push":
      return new PushAccumulator(expr);
    case "$addToSet":
      return new AddToSetAccumulator(expr);
    default:
      throw new InvalidQueryError(`Unsupported group accumulator: ${op}`);
  }
}
