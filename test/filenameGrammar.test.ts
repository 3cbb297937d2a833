import { describe, expect, it } from "vitest";
import { FilenameGrammarError } from "../src/grammar/FilenameGrammarError";
import {
  defineGrammar,
  escapeRegex,
  field,
  fieldNames,
  fixedField,
  getField,
  literal,
  matchFilename,
  parseFilename,
  productNameOf,
} from "../src/grammar/filenameGrammar";

type DemoField = "kind" | "day";

const demo = defineGrammar<DemoField>({
  name: "demo",
  slots: [literal("A.B"), field("kind", "[a-z]{3}"), field("day", "\\d{2}")],
  extension: "txt",
});

describe("defineGrammar", () => {
  it("compiles slots into an anchored regex", () => {
    expect(demo.regex.source).toBe(String.raw`^A\.B_(?<kind>[a-z]{3})_(?<day>\d{2})\.txt$`);
    expect(fieldNames(demo)).toEqual(["kind", "day"]);
  });

  it("escapes fixed field values", () => {
    const grammar = defineGrammar<"code">({
      name: "fixed",
      slots: [literal("X"), fixedField("code", "a+b")],
      extension: "nc",
    });
    expect(matchFilename(grammar, "X_a+b.nc")?.get("code")).toBe("a+b");
    expect(matchFilename(grammar, "X_aab.nc")).toBeNull();
  });

  it("omits the extension separator when the extension is empty", () => {
    const grammar = defineGrammar<DemoField>({
      name: "bare",
      slots: [literal("A.B"), field("kind", "[a-z]{3}"), field("day", "\\d{2}")],
      extension: "",
    });
    expect(matchFilename(grammar, "A.B_abc_07")).not.toBeNull();
    expect(matchFilename(grammar, "A.B_abc_07.txt")).toBeNull();
  });

  it("rejects duplicate and invalid field names", () => {
    expect(() =>
      defineGrammar<"kind">({ name: "dup", slots: [field("kind", "a"), field("kind", "b")], extension: "" })
    ).toThrow("Grammar dup: duplicate field 'kind'");
    expect(() =>
      defineGrammar<"bad-name">({ name: "bad", slots: [field("bad-name", "a")], extension: "" })
    ).toThrow("Grammar bad: invalid field name 'bad-name'");
    expect(() => defineGrammar<"kind">({ name: "empty", slots: [], extension: "" })).toThrow(
      "Grammar empty has no slots"
    );
  });
});

describe("matchFilename", () => {
  it("returns named fields for the basename", () => {
    const fields = matchFilename(demo, "/data/inbox/A.B_abc_07.txt");
    expect(fields).not.toBeNull();
    expect(fields && getField(fields, "kind")).toBe("abc");
    expect(fields && getField(fields, "day")).toBe("07");
  });

  it("does not match partial or altered names", () => {
    expect(matchFilename(demo, "AxB_abc_07.txt")).toBeNull();
    expect(matchFilename(demo, "A.B_abc_07.txt.gz")).toBeNull();
    expect(matchFilename(demo, "prefix_A.B_abc_07.txt")).toBeNull();
    expect(matchFilename(demo, "A.B_ABC_07.txt")).toBeNull();
  });
});

describe("parseFilename", () => {
  it("throws a grammar error naming the file", () => {
    let caught: unknown;
    try {
      parseFilename(demo, "/tmp/other.txt");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FilenameGrammarError);
    expect(caught instanceof FilenameGrammarError && caught.code).toBe("no_match");
    expect(caught instanceof Error && caught.message).toBe(
      "Not parseable by the demo filename grammar in other.txt."
    );
  });
});

describe("helpers", () => {
  it("escapes regex metacharacters", () => {
    expect(escapeRegex("a.b*c")).toBe("a\\.b\\*c");
  });

  it("strips only the grammar extension from product names", () => {
    expect(productNameOf(demo, "/x/A.B_abc_07.txt")).toBe("A.B_abc_07");
    const bare = defineGrammar<"kind">({ name: "bare", slots: [field("kind", ".+")], extension: "" });
    expect(productNameOf(bare, "/x/v1.2")).toBe("v1.2");
  });
});
