import { PathSyntaxError } from "../errors.js";
import {
  field,
  filter,
  index,
  key,
  type FilterLiteral,
  type PathStep,
} from "./types.js";

const IDENTIFIER = /[\p{L}\p{N}_$-]+/uy;
const IDENTIFIER_CHAR = /[\p{L}\p{N}_$-]/u;
const NUMBER = /-?\d+(\.\d+)?([eE][+-]?\d+)?/y;
const INTEGER_TEXT = /^-?\d+$/;

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

/**
 * Parses a DataPath expression into its steps.
 *
 * ```
 * projects[0].epics[id="EPIC-1"]/user_stories[0].tasks
 * metrics[2022]
 * labels["release notes"]
 * ```
 *
 * `.` and `/` separate segments interchangeably. Whitespace between tokens is
 * ignored.
 *
 * @param text - The DataPath expression.
 * @returns Steps in application order.
 * @throws PathSyntaxError with the offending character offset.
 */
export function parsePath(text: string): PathStep[] {
  return new PathParser(text).parse();
}

class PathParser {
  private pos = 0;
  private readonly steps: PathStep[] = [];

  constructor(private readonly text: string) {}

  parse(): PathStep[] {
    this.skipWhitespace();
    if (this.atEnd()) throw this.error("path is empty");

    this.segment();

    for (;;) {
      this.skipWhitespace();
      const ch = this.peek();
      if (ch === undefined) break;

      if (ch !== "." && ch !== "/") {
        throw this.error(`expected '.' or '/' but found '${ch}'`);
      }
      this.pos++;

      this.skipWhitespace();
      if (this.atEnd()) throw this.error("path ends with a separator");
      this.segment();
    }

    return this.steps;
  }

  // identifier? ('[' selector ']')*
  private segment(): void {
    const name = this.identifier();
    if (name !== undefined) this.steps.push(field(name));

    let selectors = 0;
    for (;;) {
      this.skipWhitespace();
      if (this.peek() !== "[") break;
      this.selector();
      selectors++;
    }

    if (name === undefined && selectors === 0) {
      throw this.error(`expected a field name or '[' but found '${this.peek()}'`);
    }
  }

  private selector(): void {
    const open = this.pos;
    this.pos++;
    this.skipWhitespace();

    const ch = this.peek();
    if (ch === undefined) {
      throw new PathSyntaxError(open, "unterminated '['");
    }

    if (ch === '"' || ch === "'") {
      this.steps.push(key(this.quoted()));
    } else {
      const start = this.pos;
      const number = this.number();

      if (number !== undefined) {
        if (!INTEGER_TEXT.test(number.text) || !Number.isSafeInteger(number.value)) {
          throw new PathSyntaxError(start, `index must be an integer, got ${number.text}`);
        }
        this.steps.push(index(number.value));
      } else {
        const name = this.identifier();
        if (name === undefined) {
          throw this.error(`unexpected character '${ch}' in selector`);
        }

        this.skipWhitespace();
        if (this.peek() !== "=") {
          throw this.error("expected an index, a quoted key or a 'field=value' filter");
        }
        this.pos++;
        this.skipWhitespace();

        this.steps.push(filter(name, this.literal()));
      }
    }

    this.skipWhitespace();
    const close = this.peek();
    if (close === undefined) {
      throw new PathSyntaxError(open, "unterminated '['");
    }
    if (close !== "]") {
      throw this.error(`expected ']' but found '${close}'`);
    }
    this.pos++;
  }

  private literal(): FilterLiteral {
    const ch = this.peek();
    if (ch === '"' || ch === "'") return this.quoted();

    const number = this.number();
    if (number !== undefined) return number.value;

    const word = this.identifier();
    if (word === undefined) {
      throw this.error("expected a value after '='");
    }
    if (word === "true") return true;
    if (word === "false") return false;

    return word;
  }

  /**
   * Reads a number unless the digits run on into an identifier ("2b3f"),
   * in which case nothing is consumed.
   */
  private number(): { text: string; value: number } | undefined {
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) return undefined;

    const end = this.pos + match[0].length;
    const next = this.text.charAt(end);
    if (next !== "" && IDENTIFIER_CHAR.test(next)) return undefined;

    this.pos = end;
    return { text: match[0], value: Number(match[0]) };
  }

  private identifier(): string | undefined {
    IDENTIFIER.lastIndex = this.pos;
    const match = IDENTIFIER.exec(this.text);
    if (!match) return undefined;

    this.pos += match[0].length;
    return match[0];
  }

  private quoted(): string {
    const start = this.pos;
    const quote = this.text.charAt(this.pos);
    this.pos++;

    let out = "";
    while (this.pos < this.text.length) {
      const c = this.text.charAt(this.pos++);
      if (c === quote) return out;

      if (c === "\\") {
        if (this.pos >= this.text.length) break;
        const escaped = this.text.charAt(this.pos++);
        out += ESCAPES[escaped] ?? escaped;
      } else {
        out += c;
      }
    }

    throw new PathSyntaxError(start, "unterminated string");
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.pos < this.text.length ? this.text.charAt(this.pos) : undefined;
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private error(reason: string): PathSyntaxError {
    return new PathSyntaxError(this.pos, reason);
  }
}
