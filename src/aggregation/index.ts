/**
 * Aggregation pipeline for shelfdb.
 */
export { runAggregation } from "./pipeline.ts";
export { createAccumulator, type Accumulator } from "./accumulators.ts";
export { evaluateOperand, isFieldReference } from "./expression.ts";
