import { describe, test, expect } from "vitest";
import { formatRegistryFormat, hasFormatTags, parseRegistryFormat } from "./format";

describe("format", () => {
  describe("parseRegistryFormat", () => {
    test("splits on the separator", () => {
      expect(parseRegistryFormat("unversioned;one-level")).toEqual(new Set(["unversioned", "one-level"]));
    });

    test("collapses duplicates and ignores blanks", () => {
      expect(parseRegistryFormat("versioned;;collection;versioned; ")).toEqual(
        new Set(["versioned", "collection"])
      );
    });

    test("keeps unknown tags", () => {
      expect(parseRegistryFormat("flat")).toEqual(new Set(["flat"]));
    });
  });

  describe("hasFormatTags", () => {
    test("requires every tag", () => {
      const tags = parseRegistryFormat("collection;versioned");

      expect(hasFormatTags(tags, "versioned", "collection")).toBe(true);
      expect(hasFormatTags(tags, "unversioned", "one-level")).toBe(false);
      expect(hasFormatTags(tags, "versioned", "one-level")).toBe(false);
    });
  });

  describe("formatRegistryFormat", () => {
    test("joins unique tags", () => {
      expect(formatRegistryFormat(["versioned", "collection", "versioned"])).toBe("versioned;collection");
    });
  });
});
