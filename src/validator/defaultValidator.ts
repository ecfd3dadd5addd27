import type { Validator } from "./Validator.js";
import { structuralValidate } from "./structuralValidate.js";

/**
 * A basic Validator implementation using structural validation logic.
 *
 * Checks types, required and unknown properties, and map keys against a
 * schema model using the `structuralValidate` function.
 */
export const defaultValidator: Validator = {
  validate(value, schema, options) {
    return structuralValidate(value, schema, options);
  },
};
