import { DataFormatError } from "../errors.js";

/**
 * Parses a JSON string or buffer and returns the corresponding data.
 *
 * Automatically decodes a Uint8Array using UTF-8 if needed.
 *
 * @param rawContent - Raw JSON content as string or binary (Uint8Array).
 * @param source - Name used in error messages.
 * @returns Parsed JSON data.
 * @throws DataFormatError if the input is not valid JSON.
 */
export function parseJSON({
  rawContent,
  source = "input",
}: {
  rawContent: string | Uint8Array;
  source?: string;
}): unknown {
  const text =
    typeof rawContent === "string" ? rawContent : new TextDecoder().decode(rawContent);

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new DataFormatError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
