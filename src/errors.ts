import type { PathStep } from "./datapath/types.js";

/**
 * Base class of everything dataspec throws.
 */
export class DataSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type SchemaErrorKind =
  | "DuplicateTypeName"
  | "UnknownTypeReference"
  | "AmbiguousOrMissingTypeSpecifier"
  | "InvalidMapKeyType"
  | "CircularRootDefinition"
  | "MalformedSchemaDocument";

/**
 * A schema document that cannot become a SchemaModel.
 */
export class SchemaDefinitionError extends DataSpecError {
  constructor(
    readonly kind: SchemaErrorKind,
    message: string,
    readonly location?: string
  ) {
    super(location ? `${kind} at ${location}: ${message}` : `${kind}: ${message}`);
  }
}

/**
 * Malformed DataPath text. `position` is a 0-based character offset.
 */
export class PathSyntaxError extends DataSpecError {
  readonly kind = "PathSyntaxError";

  constructor(
    readonly position: number,
    readonly reason: string
  ) {
    super(`Invalid path at position ${position}: ${reason}`);
  }
}

export type ResolutionErrorKind =
  | "KeyNotFound"
  | "IndexOutOfRange"
  | "FilterNoMatch"
  | "TypeMismatchOnStep"
  | "MaxDepthExceeded";

/**
 * A DataPath step that could not be applied. `stepIndex` counts from 0.
 */
export class PathResolutionError extends DataSpecError {
  constructor(
    readonly stepIndex: number,
    readonly kind: ResolutionErrorKind,
    readonly step: PathStep | undefined,
    detail: string
  ) {
    super(`${kind} at step ${stepIndex}: ${detail}`);
  }
}

/**
 * Text that does not parse as YAML/JSON, or whose format cannot be told.
 */
export class DataFormatError extends DataSpecError {
  readonly kind = "DataFormatError";
}

/**
 * Native data that has no Value representation.
 */
export class ValueConversionError extends DataSpecError {
  readonly kind = "ValueConversionError";
}
