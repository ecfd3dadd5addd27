import yaml from "js-yaml";
import { DataFormatError } from "../errors.js";

/**
 * parseYAML: Parses a YAML document with the core schema.
 *
 * The core schema has no timestamp or binary types, so `2024-01-01` stays a
 * string and data carries nothing a Value cannot hold.
 *
 * @param rawContent - Raw YAML string content.
 * @param source - Name used in error messages (usually a file path).
 * @returns Parsed JavaScript data.
 * @throws DataFormatError if the text is not valid YAML.
 */
export function parseYAML({
  rawContent,
  source = "input",
}: {
  rawContent: string;
  source?: string;
}): unknown {
  try {
    return yaml.load(rawContent, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new DataFormatError(`Invalid YAML in ${source}: ${err.message}`);
    }
    throw err;
  }
}
