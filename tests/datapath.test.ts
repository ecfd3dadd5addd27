import { describe, expect, it } from "vitest";
import { PathSyntaxError } from "../src/errors.js";
import { formatPath } from "../src/datapath/formatPath.js";
import { parsePath } from "../src/datapath/parsePath.js";
import { field, filter, index, key, type PathStep } from "../src/datapath/types.js";

function syntaxError(text: string): PathSyntaxError {
  try {
    parsePath(text);
  } catch (err) {
    if (err instanceof PathSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected '${text}' to be rejected`);
}

describe("parsePath", () => {
  it("parses fields, indices and filters", () => {
    expect(parsePath("projects[0].epics[0].id")).toEqual([
      field("projects"),
      index(0),
      field("epics"),
      index(0),
      field("id"),
    ]);
    expect(parsePath("projects[id=543].epics[0].name")).toEqual([
      field("projects"),
      filter("id", 543),
      field("epics"),
      index(0),
      field("name"),
    ]);
  });

  it("treats '/' like '.'", () => {
    expect(parsePath("a/b.c")).toEqual(parsePath("a.b.c"));
  });

  it("parses an integer selector on a map as an index", () => {
    expect(parsePath("metrics[2022]")).toEqual([field("metrics"), index(2022)]);
  });

  it("parses quoted keys with either quote and escapes", () => {
    expect(parsePath(`labels["release notes"]`)).toEqual([
      field("labels"),
      key("release notes"),
    ]);
    expect(parsePath(`labels['v1.0']`)).toEqual([field("labels"), key("v1.0")]);
    expect(parsePath(`m["a\\"b\\nc"]`)).toEqual([field("m"), key('a"b\nc')]);
  });

  it("parses filter literals", () => {
    expect(parsePath(`xs[name="EPIC-1"]`)).toEqual([field("xs"), filter("name", "EPIC-1")]);
    expect(parsePath("xs[score=1.5]")).toEqual([field("xs"), filter("score", 1.5)]);
    expect(parsePath("xs[n=-3]")).toEqual([field("xs"), filter("n", -3)]);
    expect(parsePath("xs[done=true]")).toEqual([field("xs"), filter("done", true)]);
    expect(parsePath("xs[done=false]")).toEqual([field("xs"), filter("done", false)]);
    expect(parsePath("xs[status=open]")).toEqual([field("xs"), filter("status", "open")]);
  });

  it("reads digits that run into letters as a bare word", () => {
    expect(parsePath("xs[hash=2b3f]")).toEqual([field("xs"), filter("hash", "2b3f")]);
  });

  it("allows selectors at the start and chained selectors", () => {
    expect(parsePath("[0][1]")).toEqual([index(0), index(1)]);
    expect(parsePath(`["a b"].c`)).toEqual([key("a b"), field("c")]);
  });

  it("accepts non-ASCII identifiers and ignores whitespace between tokens", () => {
    expect(parsePath(" größe . wert [ 0 ] ")).toEqual([
      field("größe"),
      field("wert"),
      index(0),
    ]);
  });

  it("reports positions of syntax errors", () => {
    const cases: [string, number, string][] = [
      ["", 0, "path is empty"],
      ["a b", 2, "expected '.' or '/' but found 'b'"],
      ["a.", 2, "path ends with a separator"],
      ["a..b", 2, "expected a field name or '[' but found '.'"],
      ["a[0", 1, "unterminated '['"],
      ["a[", 1, "unterminated '['"],
      ["a[1.5]", 2, "index must be an integer, got 1.5"],
      ["a[#]", 2, "unexpected character '#' in selector"],
      ["a[abc]", 5, "expected an index, a quoted key or a 'field=value' filter"],
      ["a[0 x]", 4, "expected ']' but found 'x'"],
      ["a[id=]", 5, "expected a value after '='"],
      [`a["x`, 2, "unterminated string"],
    ];

    for (const [text, position, reason] of cases) {
      const err = syntaxError(text);
      expect({ text, position: err.position, reason: err.reason }).toEqual({
        text,
        position,
        reason,
      });
    }
  });

  it("formats the message with the position", () => {
    expect(syntaxError("a[0").message).toBe("Invalid path at position 1: unterminated '['");
  });
});

describe("formatPath", () => {
  it("renders steps", () => {
    expect(
      formatPath([field("projects"), index(0), field("epics"), filter("id", "EPIC-1")])
    ).toBe(`projects[0].epics[id="EPIC-1"]`);
    expect(formatPath([field("metrics"), index(2022)])).toBe("metrics[2022]");
    expect(formatPath([filter("id", 543), filter("ok", true)])).toBe("[id=543][ok=true]");
    expect(formatPath([])).toBe("");
  });

  it("quotes names that are not identifiers", () => {
    expect(formatPath([field("labels"), field("release notes")])).toBe(
      `labels["release notes"]`
    );
    expect(formatPath([key('say "hi"\n')])).toBe(`["say \\"hi\\"\\n"]`);
  });

  it("renders text that parses back to the same steps", () => {
    const paths: PathStep[][] = [
      [field("projects"), index(3), field("epics"), filter("id", "EPIC-1"), field("name")],
      [field("metrics"), index(2022), field("velocity")],
      [key("a.b"), key("tab\there"), filter("n", -2), filter("on", false)],
    ];

    for (const steps of paths) {
      expect(parsePath(formatPath(steps))).toEqual(steps);
    }
  });
});
