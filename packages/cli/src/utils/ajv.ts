// pattern: Functional Core
import { Ajv } from "ajv";

// Singleton AJV instance configured for TypeBox schemas
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  // Enable schema compilation caching
  code: { optimize: true },
  allowUnionTypes: true,
  allErrors: true,
});

export { ajv };
