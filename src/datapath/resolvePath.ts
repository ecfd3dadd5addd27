import { DEFAULT_MAX_DEPTH } from "../constants.js";
import { PathResolutionError } from "../errors.js";
import {
  canonicalInteger,
  describeValue,
  getEntry,
  scalarEquals,
  type Mapping,
  type Value,
} from "../value/Value.js";
import { formatPath } from "./formatPath.js";
import { parsePath } from "./parsePath.js";
import type { PathStep } from "./types.js";

export interface ResolveOptions {
  /**
   * Longest accepted path, in steps. Defaults to 1000.
   */
  maxDepth?: number;
}

/**
 * Parses `path` and resolves it against `value`.
 *
 * @param value - Root of the data.
 * @param path - DataPath expression, e.g. `projects[id=543].epics[0].name`.
 * @returns The value the path points at.
 * @throws PathSyntaxError if the expression is malformed.
 * @throws PathResolutionError if a step cannot be applied.
 */
export function search(value: Value, path: string, options: ResolveOptions = {}): Value {
  return resolvePath(value, parsePath(path), options);
}

/**
 * Applies steps left to right. The first step that fails aborts the whole
 * resolution.
 */
export function resolvePath(
  value: Value,
  steps: readonly PathStep[],
  options: ResolveOptions = {}
): Value {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (steps.length > maxDepth) {
    throw new PathResolutionError(
      maxDepth,
      "MaxDepthExceeded",
      steps[maxDepth],
      `path has ${steps.length} steps, the limit is ${maxDepth}`
    );
  }

  let current = value;
  steps.forEach((step, i) => {
    current = applyStep(current, step, i, steps);
  });

  return current;
}

function applyStep(
  current: Value,
  step: PathStep,
  stepIndex: number,
  steps: readonly PathStep[]
): Value {
  const at = () => formatPath(steps.slice(0, stepIndex)) || "(root)";
  const fail = (kind: PathResolutionError["kind"], detail: string) =>
    new PathResolutionError(stepIndex, kind, step, detail);

  switch (step.kind) {
    case "field":
    case "key": {
      const name = step.kind === "field" ? step.name : step.key;
      if (current.type !== "mapping") {
        throw fail(
          "TypeMismatchOnStep",
          `cannot look up '${name}' in ${describeValue(current)} at '${at()}'`
        );
      }

      const found = lookupString(current, name);
      if (found === undefined) {
        throw fail("KeyNotFound", `'${name}' not found at '${at()}'`);
      }
      return found;
    }

    case "index": {
      if (current.type === "sequence") {
        if (step.index < 0 || step.index >= current.items.length) {
          throw fail(
            "IndexOutOfRange",
            `index ${step.index} outside [0, ${current.items.length}) at '${at()}'`
          );
        }
        return current.items[step.index];
      }

      if (current.type === "mapping") {
        // Serialisers turn integer keys into strings, so try both forms.
        const found =
          getEntry(current, step.index) ?? getEntry(current, String(step.index));
        if (found === undefined) {
          throw fail("KeyNotFound", `key ${step.index} not found at '${at()}'`);
        }
        return found;
      }

      throw fail(
        "TypeMismatchOnStep",
        `cannot index ${describeValue(current)} at '${at()}'`
      );
    }

    case "filter": {
      if (current.type !== "sequence") {
        throw fail(
          "TypeMismatchOnStep",
          `cannot filter ${describeValue(current)} at '${at()}'`
        );
      }

      const { field, value } = step;
      const match = current.items.find((item) => {
        if (item.type !== "mapping") return false;
        const candidate = getEntry(item, field);
        return candidate?.type === "scalar" && scalarEquals(candidate, value);
      });
      if (match === undefined) {
        throw fail(
          "FilterNoMatch",
          `no element with ${field}=${JSON.stringify(value)} at '${at()}'`
        );
      }
      return match;
    }
  }
}

function lookupString(mapping: Mapping, name: string): Value | undefined {
  const found = getEntry(mapping, name);
  if (found !== undefined) return found;

  const n = canonicalInteger(name);
  return n === undefined ? undefined : getEntry(mapping, n);
}
