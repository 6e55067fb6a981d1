import type { SourceConfig } from "../config";
import { createHtmlSource } from "./html";
import { createRssSource } from "./rss";
import type { SourceAdapter, SourceOptions } from "./types";

export function createSourceAdapter(
  config: SourceConfig,
  options: SourceOptions,
): SourceAdapter {
  switch (config.kind) {
    case "rss":
      return createRssSource(config, options);
    case "html":
      return createHtmlSource(config, options);
    default: {
      const _exhaustive: never = config;
      throw new Error(`unknown source kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function createSourceAdapters(
  configs: ReadonlyArray<SourceConfig>,
  options: SourceOptions,
): Array<SourceAdapter> {
  return configs
    .filter((config) => config.enabled)
    .map((config) => createSourceAdapter(config, options));
}

export type { RawItem, SourceAdapter, SourceOptions } from "./types";
