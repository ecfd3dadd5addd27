const BLOCK_KEY =
  /^(?:"((?:[^"\\]|\\.)*)"|'((?:[^']|'')*)'|([^\s#:'"%\-[{][^:#]*?))\s*:(?:\s|$)/;

/**
 * Lists the top-level keys of a YAML block mapping or a JSON object, in
 * document order and including repeats, which parsers silently merge or
 * reject without saying where.
 *
 * @param text - Raw schema text.
 * @returns Keys as written.
 */
export function scanTopLevelKeys(text: string): string[] {
  return text.trimStart().startsWith("{") ? scanJsonKeys(text) : scanBlockKeys(text);
}

/**
 * Returns the first top-level key that appears twice, if any.
 */
export function findDuplicateTopLevelKey(text: string): string | undefined {
  const seen = new Set<string>();

  for (const key of scanTopLevelKeys(text)) {
    if (seen.has(key)) return key;
    seen.add(key);
  }

  return undefined;
}

function scanBlockKeys(text: string): string[] {
  const keys: string[] = [];

  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    // Only column-0 lines can hold a top-level key.
    const match = line.match(BLOCK_KEY);
    if (!match) continue;

    if (match[1] !== undefined) keys.push(match[1]);
    else if (match[2] !== undefined) keys.push(match[2].replace(/''/g, "'"));
    else keys.push(match[3].trim());
  }

  return keys;
}

function scanJsonKeys(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '"') {
      const start = i;
      i++;
      while (i < text.length && text[i] !== '"') {
        i += text[i] === "\\" ? 2 : 1;
      }
      i++;
      const literal = text.slice(start, i);

      if (depth === 1) {
        let j = i;
        while (j < text.length && /\s/.test(text[j])) j++;
        if (text[j] === ":") keys.push(decodeJsonString(literal));
      }
      continue;
    }

    if (ch === "{" || ch === "[") depth++;
    else if (ch === "}" || ch === "]") depth--;
    i++;
  }

  return keys;
}

function decodeJsonString(literal: string): string {
  try {
    const decoded: unknown = JSON.parse(literal);
    return typeof decoded === "string" ? decoded : literal;
  } catch {
    return literal.slice(1, -1);
  }
}
