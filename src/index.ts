import { DataSpec, type DataSpecOptions } from "./DataSpec.js";

/**
 * Factory function to create a DataSpec instance.
 *
 * @param options - Logger, validator, depth limit, cache and repository.
 * @returns A configured DataSpec.
 */
export function defineDataSpec(options: DataSpecOptions = {}): DataSpec {
  return new DataSpec(options);
}

export { DataSpec } from "./DataSpec.js";
export type { DataSpecOptions } from "./DataSpec.js";

export { DEFAULT_MAX_DEPTH } from "./constants.js";

// schema
export { loadSchema, loadSchemaText } from "./schema/SchemaLoader.js";
export type { SchemaTextOptions } from "./schema/SchemaLoader.js";
export { ROOT_NAME } from "./schema/types.js";
export { TypeRegistry } from "./schema/TypeRegistry.js";
export type {
  ArrayRef,
  MapKeyKind,
  MapRef,
  PrimitiveKind,
  PrimitiveRef,
  PropertyDef,
  ReferenceRef,
  SchemaModel,
  TypeDef,
  TypeRef,
} from "./schema/types.js";

// validation
export {
  structuralValidate as validate,
  formatValidationError,
} from "./validator/structuralValidate.js";
export { defaultValidator } from "./validator/defaultValidator.js";
export type {
  ValidateOptions,
  ValidationError,
  ValidationErrorKind,
  ValidationResult,
  Validator,
} from "./validator/Validator.js";

// datapath
export { parsePath } from "./datapath/parsePath.js";
export { formatPath } from "./datapath/formatPath.js";
export { resolvePath, search } from "./datapath/resolvePath.js";
export type { ResolveOptions } from "./datapath/resolvePath.js";
export { field, filter, index, key } from "./datapath/types.js";
export type {
  FieldStep,
  FilterLiteral,
  FilterStep,
  IndexStep,
  KeyStep,
  PathStep,
} from "./datapath/types.js";

// values
export {
  bool,
  describeValue,
  float,
  fromNative,
  getEntry,
  int,
  map,
  nil,
  seq,
  str,
  toNative,
} from "./value/Value.js";
export type {
  ConversionOptions,
  Mapping,
  MappingEntry,
  MappingKey,
  Scalar,
  ScalarKind,
  Sequence,
  Value,
} from "./value/Value.js";

// documents
export { DATA_FORMATS, detectFormat, parseByType, parseYamlOrJson } from "./parser/index.js";
export type { DataFormat, Parser, ParserOptions } from "./parser/index.js";
export type { StorageRepository } from "./repository/StorageRepository.js";
export { FsRepository } from "./repository/FsRepository.js";
export type { CacheProvider } from "./cache/CacheProvider.js";
export { InMemoryCacheProvider } from "./cache/InMemoryCacheProvider.js";

// errors and logging
export {
  DataFormatError,
  DataSpecError,
  PathResolutionError,
  PathSyntaxError,
  SchemaDefinitionError,
  ValueConversionError,
} from "./errors.js";
export type { ResolutionErrorKind, SchemaErrorKind } from "./errors.js";
export { ConsoleLogger } from "./logger/ConsoleLogger.js";
export type { LoggerProvider, LogLevel } from "./logger/LoggerProvider.js";
