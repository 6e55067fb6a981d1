import { describe, it, expect } from "vitest";
import { createTestDatabase, seedTestSource } from "./db";
import { sources } from "../db/schema";

describe("Test Database Utilities", () => {
  it("should create an in-memory database", () => {
    const db = createTestDatabase();
    expect(db).toBeDefined();
  });

  it("should seed a test source", () => {
    const db = createTestDatabase();
    const sourceId = seedTestSource(db);
    expect(sourceId).toBe("test-source");
  });

  it("should seed a test source with overrides", () => {
    const db = createTestDatabase();
    const sourceId = seedTestSource(db, {
      id: "custom",
      kind: "html",
      url: "https://custom.example.com/news",
    });

    const rows = db.select().from(sources).all();
    expect(sourceId).toBe("custom");
    expect(rows).toHaveLength(1);
    expect(rows[0]?.kind).toBe("html");
  });
});
