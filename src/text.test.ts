import { describe, it, expect } from "vitest";
import { sliceWhole, truncate } from "./text";

const isWellFormed = (text: string) => !/[\ud800-\udbff](?![\udc00-\udfff])/.test(text);

describe("sliceWhole", () => {
  it("slices plain text like slice", () => {
    expect(sliceWhole("abcdef", 3)).toBe("abc");
    expect(sliceWhole("abc", 10)).toBe("abc");
    expect(sliceWhole("abc", 0)).toBe("");
  });

  it("drops an emoji the cut would split", () => {
    expect(sliceWhole("ab😀cd", 3)).toBe("ab");
  });

  it("keeps an emoji that ends at the cut", () => {
    expect(sliceWhole("ab😀cd", 4)).toBe("ab😀");
  });
});

describe("truncate", () => {
  it("leaves text within the limit alone", () => {
    expect(truncate("hello", 5)).toBe("hello");
  });

  it("cuts before an emoji straddling the boundary", () => {
    const result = truncate(`${"a".repeat(8)}😀tail`, 10);

    expect(result).toBe(`${"a".repeat(8)}…`);
    expect(isWellFormed(result)).toBe(true);
  });
});
