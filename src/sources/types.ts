import type { SourceConfig } from "../config";
import { truncate } from "../text";

/** A candidate entry as a source adapter returns it, before dedup. */
export type RawItem = {
  readonly guid: string | null;
  readonly title: string | null;
  readonly url: string | null;
  readonly excerpt: string | null;
  readonly publishedAt: Date | null;
  readonly metadata: Readonly<Record<string, unknown>>;
};

/**
 * One configured news source. `fetch` throws `SourceUnavailable` when the
 * source cannot be read; it has no other side effects.
 */
export type SourceAdapter = {
  readonly id: string;
  readonly name: string;
  readonly kind: SourceConfig["kind"];
  readonly fetch: () => Promise<ReadonlyArray<RawItem>>;
};

export type SourceOptions = {
  readonly timeoutMs: number;
};

export const MAX_EXCERPT_CHARS = 2000;

export function clip(text: string | null | undefined, max = MAX_EXCERPT_CHARS): string | null {
  if (!text) return null;
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) return null;
  return truncate(collapsed, max);
}
