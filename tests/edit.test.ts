import { describe, it, expect } from "vitest";
import {
  AmbiguousSectionError,
  HeaderLevelMismatchError,
  TargetNotFoundError,
  appendToSection,
  applyEdit,
  decodeNewlines,
  insertAfter,
  insertBefore,
  replaceText,
} from "../src/vault/index.ts";

describe("replaceText", () => {
  it("replaces only the first occurrence when asked", () => {
    expect(replaceText("foo bar foo", "foo", "X", false)).toBe("X bar foo");
  });

  it("replaces every occurrence by default", () => {
    expect(replaceText("foo bar foo", "foo", "X")).toBe("X bar X");
  });

  it("inserts replacement text verbatim", () => {
    expect(replaceText("a b", "a", "$&$1")).toBe("$&$1 b");
  });

  it("decodes escaped newlines in the replacement", () => {
    expect(replaceText("a b", "a", "x\\ny")).toBe("x\ny b");
  });

  it("does not rescan replaced text", () => {
    expect(replaceText("aa", "a", "aa")).toBe("aaaa");
  });

  it("fails when the target is absent", () => {
    expect(() => replaceText("abc", "zzz", "x")).toThrow(TargetNotFoundError);
    expect(() => replaceText("abc", "zzz", "x")).toThrow('Target text not found: "zzz"');
  });

  it("rejects an empty target", () => {
    expect(() => replaceText("abc", "", "x")).toThrow("Target text must not be empty");
  });
});

describe("insertAfter", () => {
  it("inserts right after the first match", () => {
    expect(insertAfter("Line one\nLine two\nLine one", "Line one", "!")).toBe("Line one!\nLine two\nLine one");
  });

  it("puts the content on a new line when asked", () => {
    expect(insertAfter("Line one\nLine two", "Line one", "added", true)).toBe("Line one\nadded\nLine two");
  });

  it("adds no extra break when the anchor already ends a line", () => {
    expect(insertAfter("a\nb", "a\n", "x\n", true)).toBe("a\nx\nb");
  });

  it("fails when the anchor is absent", () => {
    expect(() => insertAfter("abc", "zzz", "x")).toThrow(TargetNotFoundError);
  });
});

describe("insertBefore", () => {
  it("inserts right before the first match", () => {
    expect(insertBefore("a\nb", "b", "x")).toBe("a\nxb");
  });

  it("keeps the content on its own line when asked", () => {
    expect(insertBefore("a\nb", "b", "x", true)).toBe("a\nx\nb");
  });

  it("adds no extra break when the content already ends a line", () => {
    expect(insertBefore("a\nb", "b", "x\n", true)).toBe("a\nx\nb");
  });
});

describe("appendToSection", () => {
  it("appends after the last non-blank line of the section", () => {
    const body = "## Log\n- one\n\n## Other\nz\n";
    expect(appendToSection(body, "## Log", "- two")).toBe("## Log\n- one\n- two\n\n## Other\nz\n");
  });

  it("appends at the end of the document", () => {
    expect(appendToSection("## Log\n- one", "## Log", "- two")).toBe("## Log\n- one\n- two");
  });

  it("appends under an empty section", () => {
    expect(appendToSection("## Log\n## Next\n", "## Log", "- two")).toBe("## Log\n- two\n## Next\n");
  });

  it("appends after nested subsections", () => {
    const body = "## Log\nentry\n### Detail\nd\n## Next\nn\n";
    expect(appendToSection(body, "## Log", "new")).toBe("## Log\nentry\n### Detail\nd\nnew\n## Next\nn\n");
  });

  it("keeps trailing spaces on the last line of the section", () => {
    expect(appendToSection("## Log\nentry  \n## Next\n", "## Log", "new")).toBe("## Log\nentry  \nnew\n## Next\n");
  });

  it("skips whitespace-only lines at the end of the section", () => {
    expect(appendToSection("## Log\nentry\n  \n\n## Next\n", "## Log", "new")).toBe(
      "## Log\nentry\nnew\n  \n\n## Next\n"
    );
  });

  it("decodes escaped newlines in the appended text", () => {
    expect(appendToSection("# T\n", "# T", "a\\nb")).toBe("# T\na\nb\n");
  });

  it("fails on a level mismatch", () => {
    expect(() => appendToSection("## Log\n", "# Log", "x")).toThrow(HeaderLevelMismatchError);
  });

  it("fails on duplicate headings", () => {
    expect(() => appendToSection("## A\n## A\n", "## A", "x")).toThrow(AmbiguousSectionError);
  });
});

describe("applyEdit", () => {
  it("dispatches on the edit mode", () => {
    const body = "alpha beta alpha";

    expect(applyEdit(body, { mode: "replace", target: "alpha", content: "A", replaceAll: false })).toBe(
      "A beta alpha"
    );
    expect(applyEdit(body, { mode: "insert-before", target: "beta", content: "new " })).toBe(
      "alpha new beta alpha"
    );
    expect(applyEdit("# S\n", { mode: "append-to-section", header: "# S", text: "x" })).toBe("# S\nx\n");
  });

  it("decodes escape sequences", () => {
    expect(decodeNewlines("a\\nb\\n")).toBe("a\nb\n");
  });
});
