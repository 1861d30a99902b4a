/**
 * Query matching: decides whether a document satisfies a filter.
 */
import type { Document, Filter, Value } from "./types.ts";
import {
  compareOrderable,
  getValueByPath,
  isDocument,
  valuesEqual,
} from "./document-utils.ts";
import { InvalidQueryError } from "./errors.ts";

/** Logical operators accepted at the top level of a filter. */
const LOGICAL_OPERATORS = new Set(["$and", "$or", "$nor", "$not"]);

/** Operators allowed on scalar array elements in `$elemMatch` and `$pull`. */
const SCALAR_OPERATORS = new Set([
  "$eq",
  "$ne",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
  "$in",
  "$nin",
  "$exists",
]);

const FIELD_OPERATORS = new Set([
  ...SCALAR_OPERATORS,
  "$regex",
  "$options",
  "$size",
  "$all",
  "$elemMatch",
]);

const REGEX_FLAGS = new Set(["i", "m", "s"]);

/**
 * Check if a value is an operator document: a non-empty document whose keys
 * all start with `$`.
 *
 * @throws InvalidQueryError when operator keys are mixed with plain keys
 */
export function isOperatorObject(value: Value | undefined): value is Document {
  if (!isDocument(value)) {
    return false;
  }
  const keys = Object.keys(value);
  if (keys.length === 0) {
    return false;
  }
  const operatorKeys = keys.filter((key) => key.startsWith("$"));
  if (operatorKeys.length === 0) {
    return false;
  }
  if (operatorKeys.length !== keys.length) {
    throw new InvalidQueryError(
      `cannot mix operators and field names in one condition: ${keys.join(", ")}`
    );
  }
  return true;
}

/**
 * Check if a document matches a filter.
 *
 * @description
 * Every top-level entry must hold. Logical operators (`$and`, `$or`, `$nor`,
 * `$not`) take nested filters. Any other key is a dotted path mapped either
 * to a literal (structural equality with the value at the path) or to an
 * operator document, in which case all operators must hold.
 *
 * @param doc - The document to test
 * @param filter - The query filter
 * @returns true if the document matches
 * @throws InvalidQueryError for malformed filters and unknown operators
 *
 * @example
 * ```typescript
 * matchesFilter({ age: 30 }, { age: { $gte: 18, $lt: 65 } }); // true
 * matchesFilter({}, { age: { $gte: 18 } });                   // false
 * matchesFilter({ a: 1 }, { $or: [{ a: 2 }, { a: 1 }] });     // true
 * ```
 */
export function matchesFilter(doc: Document, filter: Filter): boolean {
  if (!isDocument(filter)) {
    throw new InvalidQueryError("query filter must be a document");
  }

  for (const [key, condition] of Object.entries(filter)) {
    if (LOGICAL_OPERATORS.has(key)) {
      if (!evaluateLogicalOperator(doc, key, condition)) {
        return false;
      }
      continue;
    }
    if (key.startsWith("$")) {
      throw new InvalidQueryError(`unknown top level operator: ${key}`);
    }

    const value = getValueByPath(doc, key);
    const matched = isOperatorObject(condition)
      ? matchesOperators(value, condition)
      : valuesEqual(value, condition);
    if (!matched) {
      return false;
    }
  }

  return true;
}

/**
 * Check the structure of a filter without evaluating it against a document:
 * logical clause shapes, operator names and operator arguments.
 *
 * @throws InvalidQueryError describing the first problem found
 */
export function validateFilter(filter: Value): void {
  if (!isDocument(filter)) {
    throw new InvalidQueryError("query filter must be a document");
  }

  for (const [key, condition] of Object.entries(filter)) {
    if (key === "$not") {
      if (!isDocument(condition)) {
        throw new InvalidQueryError("$not requires a query document");
      }
      validateFilter(condition);
    } else if (LOGICAL_OPERATORS.has(key)) {
      for (const clause of toClauseList(key, condition)) {
        validateFilter(clause);
      }
    } else if (key.startsWith("$")) {
      throw new InvalidQueryError(`unknown top level operator: ${key}`);
    } else if (isOperatorObject(condition)) {
      validateOperators(condition, FIELD_OPERATORS);
    }
  }
}

function validateOperators(operators: Document, allowed: ReadonlySet<string>): void {
  for (const [op, arg] of Object.entries(operators)) {
    if (!allowed.has(op)) {
      throw new InvalidQueryError(`unknown operator: ${op}`);
    }
    switch (op) {
      case "$in":
      case "$nin":
      case "$all":
        requireArray(op, arg);
        break;
      case "$exists":
      case "$options":
      case "$regex":
      case "$size":
        // Argument checks happen before the value is looked at
        evaluateOperator(undefined, op, arg, operators);
        break;
      case "$elemMatch":
        if (!isDocument(arg)) {
          throw new InvalidQueryError("$elemMatch requires a document");
        }
        if (isOperatorObject(arg)) {
          validateOperators(arg, SCALAR_OPERATORS);
        } else {
          validateFilter(arg);
        }
        break;
    }
  }
}

function evaluateLogicalOperator(doc: Document, operator: string, condition: Value): boolean {
  if (operator === "$not") {
    if (!isDocument(condition)) {
      throw new InvalidQueryError("$not requires a query document");
    }
    return !matchesFilter(doc, condition);
  }

  const clauses = toClauseList(operator, condition);
  switch (operator) {
    case "$and":
      return clauses.every((clause) => matchesFilter(doc, clause));
    case "$or":
      return clauses.some((clause) => matchesFilter(doc, clause));
    default:
      return !clauses.some((clause) => matchesFilter(doc, clause));
  }
}

function toClauseList(operator: string, condition: Value): Document[] {
  if (!Array.isArray(condition)) {
    throw new InvalidQueryError(`${operator} requires an array of query documents`);
  }
  const clauses: Document[] = [];
  for (const clause of condition) {
    if (!isDocument(clause)) {
      throw new InvalidQueryError(`${operator} entries must be query documents`);
    }
    clauses.push(clause);
  }
  return clauses;
}

/**
 * Check whether a field value satisfies every operator of an operator document.
 *
 * @param value - The value at the queried path (`undefined` when missing)
 * @param operators - Operator document such as `{ $gt: 1, $lt: 5 }`
 */
export function matchesOperators(value: Value | undefined, operators: Document): boolean {
  for (const [op, arg] of Object.entries(operators)) {
    if (!FIELD_OPERATORS.has(op)) {
      throw new InvalidQueryError(`unknown operator: ${op}`);
    }
    if (!evaluateOperator(value, op, arg, operators)) {
      return false;
    }
  }
  return true;
}

/**
 * Match a non-document array element against scalar operators (`$eq`, `$ne`,
 * `$gt`, `$gte`, `$lt`, `$lte`, `$in`, `$nin`, `$exists`).
 *
 * Unlike field conditions, one operator holding is enough:
 * `{ $gt: 5, $lt: 10 }` matches both 1 and 12.
 */
export function matchesScalarOperators(value: Value | undefined, operators: Document): boolean {
  validateOperators(operators, SCALAR_OPERATORS);
  return Object.entries(operators).some(([op, arg]) => evaluateOperator(value, op, arg, operators));
}

/**
 * Check whether an array element satisfies an element condition, as used by
 * `$elemMatch` and `$pull`.
 *
 * An operator document applies to the element itself. A plain query document
 * only matches document elements, through the full matcher.
 */
export function matchesElementCondition(element: Value, condition: Document): boolean {
  if (isOperatorObject(condition)) {
    return matchesScalarOperators(element, condition);
  }
  return isDocument(element) && matchesFilter(element, condition);
}

function evaluateOperator(
  value: Value | undefined,
  op: string,
  arg: Value,
  siblings: Document
): boolean {
  switch (op) {
    case "$eq":
      return valuesEqual(value, arg);

    case "$ne":
      return !valuesEqual(value, arg);

    case "$gt":
    case "$gte":
    case "$lt":
    case "$lte": {
      const cmp = compareOrderable(value, arg);
      if (cmp === undefined) {
        return false;
      }
      if (op === "$gt") return cmp > 0;
      if (op === "$gte") return cmp >= 0;
      if (op === "$lt") return cmp < 0;
      return cmp <= 0;
    }

    case "$in":
      return requireArray(op, arg).some((candidate) => valuesEqual(value, candidate));

    case "$nin":
      return !requireArray(op, arg).some((candidate) => valuesEqual(value, candidate));

    case "$exists": {
      if (typeof arg !== "boolean" && typeof arg !== "number") {
        throw new InvalidQueryError("$exists requires a boolean");
      }
      return Boolean(arg) === (value !== undefined);
    }

    case "$regex": {
      const regex = buildRegex(arg, siblings.$options);
      return typeof value === "string" && regex.test(value);
    }

    case "$options":
      if (!("$regex" in siblings)) {
        throw new InvalidQueryError("$options needs a $regex");
      }
      return true;

    case "$size": {
      if (typeof arg !== "number" || !Number.isInteger(arg) || arg < 0) {
        throw new InvalidQueryError("$size requires a non-negative integer");
      }
      if (Array.isArray(value)) {
        return value.length === arg;
      }
      if (typeof value === "string") {
        return [...value].length === arg;
      }
      return false;
    }

    case "$all": {
      const required = requireArray(op, arg);
      if (!Array.isArray(value)) {
        return false;
      }
      const elements = value;
      return required.every((item) => elements.some((element) => valuesEqual(element, item)));
    }

    case "$elemMatch": {
      const condition = arg;
      if (!isDocument(condition)) {
        throw new InvalidQueryError("$elemMatch requires a document");
      }
      if (!Array.isArray(value)) {
        return false;
      }
      return value.some((element) => matchesElementCondition(element, condition));
    }

    default:
      throw new InvalidQueryError(`unknown operator: ${op}`);
  }
}

function requireArray(op: string, arg: Value): Value[] {
  if (!Array.isArray(arg)) {
    throw new InvalidQueryError(`${op} needs an array`);
  }
  return arg;
}

/**
 * Build a RegExp from a `$regex` argument.
 * The argument is a pattern string or `{ pattern, options }`; a sibling
 * `$options` string adds flags.
 */
function buildRegex(arg: Value, siblingOptions: Value | undefined): RegExp {
  let pattern: Value | undefined;
  let options: Value | undefined = siblingOptions;

  if (isDocument(arg)) {
    pattern = arg.pattern;
    options = arg.options ?? siblingOptions;
  } else {
    pattern = arg;
  }

  if (typeof pattern !== "string") {
    throw new InvalidQueryError("$regex pattern must be a string");
  }
  if (options !== undefined && typeof options !== "string") {
    throw new InvalidQueryError("$options must be a string");
  }

  const flags = options ?? "";
  for (const flag of flags) {
    if (!REGEX_FLAGS.has(flag)) {
      throw new InvalidQueryError(`invalid flag in regex options: ${flag}`);
    }
  }

  try {
    return new RegExp(pattern, [...new Set(flags)].join(""));
  } catch (error) {
    throw new InvalidQueryError(
      `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
