// pattern: Imperative Shell
import * as cheerio from "cheerio";
import type { SourceConfig } from "../config";
import { SourceUnavailable, errorMessage, isAbortError } from "../errors";
import { clip } from "./types";
import type { RawItem, SourceAdapter, SourceOptions } from "./types";

type HtmlSourceConfig = Extract<SourceConfig, { kind: "html" }>;

export type ListingSelectors = Pick<
  HtmlSourceConfig,
  "itemSelector" | "titleSelector" | "linkSelector" | "excerptSelector"
>;

function resolveLink(href: string | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Extracts listing entries from a news index page with CSS selectors.
 * Entries with neither a title nor a link are skipped.
 */
export function parseListing(
  html: string,
  pageUrl: string,
  selectors: ListingSelectors,
): Array<RawItem> {
  const $ = cheerio.load(html);
  const result: Array<RawItem> = [];

  $(selectors.itemSelector).each((_, el) => {
    const node = $(el);
    const title = clip(node.find(selectors.titleSelector).first().text());
    const url = resolveLink(
      node.find(selectors.linkSelector).first().attr("href"),
      pageUrl,
    );
    if (!title && !url) return;

    const excerpt = selectors.excerptSelector
      ? clip(node.find(selectors.excerptSelector).first().text())
      : null;

    result.push({
      guid: null,
      title,
      url,
      excerpt,
      publishedAt: null,
      metadata: {},
    });
  });

  return result;
}

export function createHtmlSource(
  config: HtmlSourceConfig,
  options: SourceOptions,
): SourceAdapter {
  return {
    id: config.id,
    name: config.name,
    kind: "html",
    fetch: async () => {
      let html: string;
      try {
        const response = await fetch(config.url, {
          signal: AbortSignal.timeout(options.timeoutMs),
          headers: {
            "User-Agent": "NewsRelay/1.0 (news listing fetcher)",
            Accept: "text/html,application/xhtml+xml",
          },
        });

        if (!response.ok) {
          throw new SourceUnavailable(
            config.id,
            `HTTP ${response.status}: ${response.statusText}`,
          );
        }

        html = await response.text();
      } catch (err) {
        if (err instanceof SourceUnavailable) throw err;
        const message = isAbortError(err)
          ? `timed out after ${options.timeoutMs}ms`
          : errorMessage(err);
        throw new SourceUnavailable(config.id, message, { cause: err });
      }

      return parseListing(html, config.url, config);
    },
  };
}
