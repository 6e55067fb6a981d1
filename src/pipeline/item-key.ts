// pattern: Functional Core
import { createHash } from "node:crypto";
import type { RawItem } from "../sources";

/**
 * Canonical form of an article URL: query string, fragment and trailing
 * slashes removed, host lowercased. Returns null for unparseable input.
 */
export function normalizeUrl(url: string): string | null {
  const trimmed = url.trim();
  if (trimmed.length === 0) return null;

  try {
    const parsed = new URL(trimmed);
    const path = parsed.pathname.replace(/\/+$/, "");
    return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}`;
  } catch {
    return null;
  }
}

/**
 * Stable dedup key for a raw item within its source: the source-native id
 * when present, else the normalized URL, else the title. Returns null when
 * the item carries none of them.
 */
export function deriveItemKey(item: RawItem): string | null {
  let basis: string | null = null;

  const guid = item.guid?.trim();
  if (guid) {
    basis = `guid:${guid}`;
  } else if (item.url) {
    const normalized = normalizeUrl(item.url);
    if (normalized) basis = `url:${normalized}`;
  }

  if (!basis) {
    const title = item.title?.trim().toLowerCase();
    if (title) basis = `title:${title}`;
  }

  return basis ? createHash("sha256").update(basis).digest("hex") : null;
}
