import type { CacheProvider } from "./cache/CacheProvider.js";
import { InMemoryCacheProvider } from "./cache/InMemoryCacheProvider.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";
import { parsePath } from "./datapath/parsePath.js";
import { search } from "./datapath/resolvePath.js";
import type { PathStep } from "./datapath/types.js";
import { DataSpecError } from "./errors.js";
import { ConsoleLogger } from "./logger/ConsoleLogger.js";
import type { LoggerProvider } from "./logger/LoggerProvider.js";
import { detectFormat, parseByType, type DataFormat } from "./parser/index.js";
import { FsRepository } from "./repository/FsRepository.js";
import type { StorageRepository } from "./repository/StorageRepository.js";
import { loadSchema, loadSchemaText } from "./schema/SchemaLoader.js";
import type { SchemaModel } from "./schema/types.js";
import { defaultValidator } from "./validator/defaultValidator.js";
import type { ValidationResult, Validator } from "./validator/Validator.js";
import { fromNative, type Value } from "./value/Value.js";

/**
 * Options for DataSpec.
 */
export interface DataSpecOptions {
  validator?: Validator;
  logger?: LoggerProvider;
  /** Depth limit for validation and path resolution. */
  maxDepth?: number;
  /** Where loaded schema models are kept, keyed by format and path. */
  cache?: CacheProvider<SchemaModel>;
  repository?: StorageRepository;
}

/**
 * Loads schema and data documents and runs validation and DataPath searches
 * with one set of options.
 */
export class DataSpec {
  private validator: Validator;
  private logger: LoggerProvider;
  private cache: CacheProvider<SchemaModel>;
  private repository: StorageRepository;
  readonly maxDepth: number;

  constructor(private options: DataSpecOptions = {}) {
    this.validator = this.options.validator ?? defaultValidator;
    this.logger = this.options.logger ?? new ConsoleLogger("info");
    this.cache = this.options.cache ?? new InMemoryCacheProvider<SchemaModel>();
    this.repository = this.options.repository ?? new FsRepository(".");
    this.maxDepth = this.options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Reads and loads a schema file. The model is cached, so loading the same
   * file twice parses it once.
   *
   * @param filePath - Path of the schema document.
   * @param format - Forces a format instead of going by the extension.
   * @throws DataSpecError if the file is missing.
   * @throws DataFormatError if the format cannot be inferred.
   * @throws SchemaDefinitionError
   */
  async loadSchemaFile(filePath: string, format?: DataFormat): Promise<SchemaModel> {
    const resolvedFormat = format ?? detectFormat(filePath);
    const cacheKey = `${resolvedFormat}:${filePath}`;

    const cached = await this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug(`Using cached schema for ${filePath}`);
      return cached;
    }

    const text = await this.read(filePath);
    const schema = loadSchemaText(text, { format: resolvedFormat, source: filePath });
    this.logger.debug(`Loaded schema ${filePath} with ${schema.types.size} type(s)`);

    await this.cache.set(cacheKey, schema);
    return schema;
  }

  /**
   * Reads a YAML or JSON data file as a Value.
   *
   * @throws DataSpecError if the file is missing.
   * @throws DataFormatError if the text does not parse.
   * @throws ValueConversionError on values with no Value form, or nesting
   * deeper than both `maxDepth` and DEFAULT_MAX_DEPTH.
   */
  async loadDataFile(filePath: string, format?: DataFormat): Promise<Value> {
    const resolvedFormat = format ?? detectFormat(filePath);
    const text = await this.read(filePath);

    const document = parseByType(resolvedFormat, { rawContent: text, source: filePath });

    // Conversion goes at least DEFAULT_MAX_DEPTH deep, whatever maxDepth is.
    return fromNative(document, { maxDepth: Math.max(this.maxDepth, DEFAULT_MAX_DEPTH) });
  }

  loadSchema(document: unknown): SchemaModel {
    const schema = loadSchema(document);
    this.logger.debug(`Loaded schema with ${schema.types.size} type(s)`);
    return schema;
  }

  validate(value: Value, schema: SchemaModel): ValidationResult {
    const result = this.validator.validate(value, schema, { maxDepth: this.maxDepth });

    this.logger.debug(`Validation finished with ${result.errors.length} error(s)`);
    if (result.errors.some((e) => e.kind === "MaxDepthExceeded")) {
      this.logger.warn(`Validation stopped at the depth limit of ${this.maxDepth}`);
    }

    return result;
  }

  search(value: Value, path: string): Value {
    return search(value, path, { maxDepth: this.maxDepth });
  }

  parsePath(text: string): PathStep[] {
    return parsePath(text);
  }

  private async read(filePath: string): Promise<string> {
    if (!(await this.repository.exists(filePath))) {
      throw new DataSpecError(`File not found: ${filePath}`);
    }
    return this.repository.readFile(filePath);
  }
}
