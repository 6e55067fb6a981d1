import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import type { RawItem } from "../sources";
import { createItemStore } from "../store/items";
import type { ItemStore } from "../store/items";
import { createTestDatabase, seedTestSource } from "../test-utils/db";
import { filterNew, matchesKeywords } from "./dedup";

const logger = pino({ level: "silent" });

function raw(key: string, fields: Partial<RawItem> = {}): RawItem {
  return {
    guid: key,
    title: `Item ${key}`,
    url: `https://example.com/${key}`,
    excerpt: null,
    publishedAt: null,
    metadata: {},
    ...fields,
  };
}

describe("matchesKeywords", () => {
  it("accepts everything without keywords", () => {
    expect(matchesKeywords(raw("a"), [])).toBe(true);
  });

  it("matches title or excerpt case-insensitively", () => {
    expect(matchesKeywords(raw("a", { title: "Rail STRIKE ends" }), ["strike"])).toBe(true);
    expect(matchesKeywords(raw("a", { excerpt: "about the harbour" }), ["Harbour"])).toBe(
      true,
    );
    expect(matchesKeywords(raw("a"), ["election"])).toBe(false);
  });
});

describe("filterNew", () => {
  let store: ItemStore;
  let sourceId: string;

  beforeEach(() => {
    const db = createTestDatabase();
    store = createItemStore(db);
    sourceId = seedTestSource(db);
  });

  it("stores unseen candidates as new, in fetch order", () => {
    const result = filterNew(store, sourceId, [raw("a"), raw("b")], logger);

    expect(result.fresh.map((i) => i.title)).toEqual(["Item a", "Item b"]);
    expect(result.fresh.every((i) => i.state === "new")).toBe(true);
    expect(result.skippedCount).toBe(0);
  });

  it("only returns items not seen before", () => {
    filterNew(store, sourceId, [raw("a"), raw("b")], logger);
    const result = filterNew(store, sourceId, [raw("a"), raw("b"), raw("c")], logger);

    expect(result.fresh.map((i) => i.title)).toEqual(["Item c"]);
    expect(result.skippedCount).toBe(2);
  });

  it("collapses duplicates within one fetch", () => {
    const result = filterNew(store, sourceId, [raw("a"), raw("a")], logger);

    expect(result.fresh).toHaveLength(1);
    expect(result.skippedCount).toBe(1);
  });

  it("keeps the original url", () => {
    const result = filterNew(
      store,
      sourceId,
      [raw("a", { guid: null, url: "https://example.com/a?ref=rss" })],
      logger,
    );

    expect(result.fresh[0]?.url).toBe("https://example.com/a?ref=rss");
  });

  it("skips candidates without a usable key", () => {
    const result = filterNew(
      store,
      sourceId,
      [raw("a", { guid: null, url: null, title: null })],
      logger,
    );

    expect(result.fresh).toHaveLength(0);
    expect(result.skippedCount).toBe(1);
  });

  it("filters by keyword before storing", () => {
    const result = filterNew(
      store,
      sourceId,
      [raw("a", { title: "Flood warning" }), raw("b", { title: "Sports" })],
      logger,
      ["flood"],
    );

    expect(result.fresh.map((i) => i.title)).toEqual(["Flood warning"]);
    expect(result.filteredCount).toBe(1);
    expect(store.listByState("new")).toHaveLength(1);
  });
});
