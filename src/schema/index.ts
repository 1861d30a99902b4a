export { validateDocument, assertValidDocument, checkSchema } from "./validator.ts";
export type { DocumentSchema, PropertySchema, SchemaType } from "./types.ts";
