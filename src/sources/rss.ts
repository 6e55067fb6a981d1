import Parser from "rss-parser";
import type { SourceConfig } from "../config";
import { SourceUnavailable, errorMessage } from "../errors";
import { clip } from "./types";
import type { RawItem, SourceAdapter, SourceOptions } from "./types";

type CustomItem = {
  dcCreator?: string;
};

type FeedItem = {
  readonly guid?: string;
  readonly link?: string;
  readonly title?: string;
  readonly pubDate?: string;
  readonly isoDate?: string;
  readonly contentSnippet?: string;
  readonly content?: string;
  readonly categories?: ReadonlyArray<string>;
  readonly dcCreator?: string;
};

/** The slice of rss-parser the adapter relies on. */
export type FeedParser = {
  parseURL(url: string): Promise<{ readonly items: ReadonlyArray<FeedItem> }>;
};

export function createParser(timeoutMs: number): FeedParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    timeout: timeoutMs,
    customFields: {
      item: [["dc:creator", "dcCreator"]],
    },
  });
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function toRawItem(item: FeedItem): RawItem {
  const metadata: Record<string, unknown> = {};
  if (item.categories && item.categories.length > 0) {
    metadata["categories"] = [...item.categories];
  }
  if (item.dcCreator) metadata["creator"] = item.dcCreator;

  return {
    guid: item.guid ?? null,
    title: item.title?.trim() || null,
    url: item.link ?? null,
    excerpt: clip(item.contentSnippet ?? item.content),
    publishedAt: parseDate(item.isoDate ?? item.pubDate),
    metadata,
  };
}

export function createRssSource(
  config: Extract<SourceConfig, { kind: "rss" }>,
  options: SourceOptions,
  parser: FeedParser = createParser(options.timeoutMs),
): SourceAdapter {
  return {
    id: config.id,
    name: config.name,
    kind: "rss",
    fetch: async () => {
      let feed: Awaited<ReturnType<FeedParser["parseURL"]>>;
      try {
        feed = await parser.parseURL(config.url);
      } catch (err) {
        throw new SourceUnavailable(config.id, errorMessage(err), { cause: err });
      }
      return feed.items.map(toRawItem);
    },
  };
}
