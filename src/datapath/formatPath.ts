import type { FilterLiteral, PathStep } from "./types.js";

const IDENTIFIER = /^[\p{L}\p{N}_$-]+$/u;

/**
 * Renders steps as DataPath text that `parsePath` reads back to equivalent
 * steps. Field names that are not identifiers are written as quoted keys.
 *
 * @example formatPath([field("projects"), index(0), field("id")]) // "projects[0].id"
 */
export function formatPath(steps: readonly PathStep[]): string {
  let out = "";

  for (const step of steps) {
    switch (step.kind) {
      case "field":
        if (IDENTIFIER.test(step.name)) {
          out += out ? `.${step.name}` : step.name;
        } else {
          out += `[${quote(step.name)}]`;
        }
        break;
      case "index":
        out += `[${step.index}]`;
        break;
      case "key":
        out += `[${quote(step.key)}]`;
        break;
      case "filter":
        out += `[${step.field}=${formatLiteral(step.value)}]`;
        break;
    }
  }

  return out;
}

function formatLiteral(value: FilterLiteral): string {
  return typeof value === "string" ? quote(value) : String(value);
}

function quote(text: string): string {
  const escaped = text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .replace(/\r/g, "\\r");

  return `"${escaped}"`;
}
