import type { SchemaModel } from "../schema/types.js";
import type { Value } from "../value/Value.js";

type ErrorBase = {
  /** DataPath of the offending value, `""` for the root. */
  path: string;
  message: string;
};

export type TypeMismatchError = ErrorBase & {
  kind: "TypeMismatch";
  expected: string;
  actual: string;
};

export type MissingRequiredPropertyError = ErrorBase & {
  kind: "MissingRequiredProperty";
  property: string;
};

export type UnknownPropertyError = ErrorBase & {
  kind: "UnknownProperty";
  property: string;
};

export type InvalidMapKeyError = ErrorBase & {
  kind: "InvalidMapKey";
  key: string | number;
  expected: "string" | "integer";
};

export type MaxDepthExceededError = ErrorBase & {
  kind: "MaxDepthExceeded";
  limit: number;
};

/**
 * One structural problem found in the data. Validation errors are collected,
 * never thrown.
 */
export type ValidationError =
  | TypeMismatchError
  | MissingRequiredPropertyError
  | UnknownPropertyError
  | InvalidMapKeyError
  | MaxDepthExceededError;

export type ValidationErrorKind = ValidationError["kind"];

export interface ValidationResult {
  ok: boolean;
  errors: ValidationError[];
}

export interface ValidateOptions {
  /**
   * Deepest nesting walked before a `MaxDepthExceeded` error stops the
   * subtree. Defaults to 1000.
   */
  maxDepth?: number;
}

/**
 * Validator interface for schema-based data validation.
 */
export interface Validator {
  /**
   * Validates a value against a schema model.
   *
   * @param value - The data to be validated.
   * @param schema - A model built by `loadSchema`.
   * @param options - Depth limit.
   * @returns Every error found, in document order.
   */
  validate(value: Value, schema: SchemaModel, options?: ValidateOptions): ValidationResult;
}
