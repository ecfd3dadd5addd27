import { DataFormatError } from "../errors.js";
import { parseJSON } from "./json.js";
import { parseYAML } from "./yaml.js";

/**
 * Supported document formats.
 */
export const DATA_FORMATS = ["yaml", "json"] as const;

export type DataFormat = (typeof DATA_FORMATS)[number];

/**
 * Parser function type.
 */
export type Parser = (options: ParserOptions) => unknown;

/**
 * Options for all parsers.
 */
export interface ParserOptions {
  /**
   * Raw file content as a string or binary buffer.
   */
  rawContent: string | Uint8Array;

  /**
   * Name of the document for error messages, usually its path.
   */
  source?: string;
}

/**
 * Built-in parser registry. Keys are format types.
 */
export const defaultParsers: Record<DataFormat, Parser> = {
  yaml: ({ rawContent, source }) =>
    parseYAML({ rawContent: decode(rawContent), source }),
  json: ({ rawContent, source }) => parseJSON({ rawContent, source }),
};

/**
 * parseByType: Delegates parsing based on the declared format.
 *
 * @param type - `"yaml"` or `"json"`.
 * @param options - Contains the raw content to parse.
 * @returns The parsed document as plain data.
 * @throws DataFormatError if parsing fails.
 */
export function parseByType(type: DataFormat, options: ParserOptions): unknown {
  return defaultParsers[type](options);
}

/**
 * Infers the format of a file from its extension.
 *
 * @param filePath - Path of the document.
 * @throws DataFormatError for anything but `.yaml`, `.yml` and `.json`.
 */
export function detectFormat(filePath: string): DataFormat {
  const ext = filePath.slice(filePath.lastIndexOf(".")).toLowerCase();

  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".json") return "json";

  throw new DataFormatError(`Cannot infer file format from extension: ${filePath}`);
}

/**
 * Parses text as YAML, falling back to JSON when YAML rejects it.
 *
 * @param text - Document text.
 * @param source - Name used in error messages.
 * @throws DataFormatError (the YAML error) when neither format accepts the text.
 */
export function parseYamlOrJson(text: string, source = "input"): unknown {
  try {
    return parseYAML({ rawContent: text, source });
  } catch (yamlError) {
    if (!(yamlError instanceof DataFormatError)) throw yamlError;

    try {
      return parseJSON({ rawContent: text, source });
    } catch {
      throw yamlError;
    }
  }
}

function decode(rawContent: string | Uint8Array): string {
  return rawContent instanceof Uint8Array ? new TextDecoder().decode(rawContent) : rawContent;
}
