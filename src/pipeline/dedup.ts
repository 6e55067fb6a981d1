import type { Logger } from "pino";
import type { Item, ItemStore } from "../store/items";
import type { RawItem } from "../sources";
import { deriveItemKey } from "./item-key";

export type DedupResult = {
  readonly sourceId: string;
  readonly fresh: ReadonlyArray<Item>;
  readonly skippedCount: number;
  readonly filteredCount: number;
};

/** True when the item mentions at least one keyword (case-insensitive). */
export function matchesKeywords(
  item: RawItem,
  keywords: ReadonlyArray<string>,
): boolean {
  if (keywords.length === 0) return true;
  const haystack = `${item.title ?? ""}\n${item.excerpt ?? ""}`.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Stores every unseen candidate of one source as `new` and returns them in
 * fetch order. Already-seen candidates, and candidates that lose an insert
 * race, are skipped without error.
 */
export function filterNew(
  store: ItemStore,
  sourceId: string,
  candidates: ReadonlyArray<RawItem>,
  logger: Logger,
  keywords: ReadonlyArray<string> = [],
): DedupResult {
  const fresh: Array<Item> = [];
  let skippedCount = 0;
  let filteredCount = 0;

  for (const candidate of candidates) {
    if (!matchesKeywords(candidate, keywords)) {
      filteredCount++;
      continue;
    }

    const itemKey = deriveItemKey(candidate);
    if (!itemKey) {
      logger.debug({ sourceId, title: candidate.title }, "candidate has no usable key");
      skippedCount++;
      continue;
    }

    if (store.hasSeen(sourceId, itemKey)) {
      skippedCount++;
      continue;
    }

    const result = store.insertNew({
      sourceId,
      itemKey,
      title: candidate.title,
      url: candidate.url,
      excerpt: candidate.excerpt,
      publishedAt: candidate.publishedAt,
      metadata: candidate.metadata,
    });

    if (result.status === "already_exists") {
      logger.debug({ sourceId, itemKey }, "item inserted concurrently, skipping");
      skippedCount++;
      continue;
    }

    fresh.push(result.item);
  }

  logger.info(
    { sourceId, newCount: fresh.length, skippedCount, filteredCount },
    "dedup complete",
  );
  return { sourceId, fresh, skippedCount, filteredCount };
}
