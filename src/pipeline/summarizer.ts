import type { Logger } from "pino";
import type { Item } from "../store/items";
import type { CompleteFn } from "../llm/completion";
import { ExternalCallError, errorMessage } from "../errors";
import { sliceWhole } from "../text";
import type { RetryPolicy } from "./retry";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a news editor. Condense the numbered news items into one short, " +
  "readable channel post. Keep names, figures and other key facts, give each " +
  "item one or two sentences, and end each with its link. Reply with the post text only.";

export type BatchLimits = {
  readonly maxItems: number;
  readonly maxChars: number;
};

export type SummaryResult =
  | { readonly success: true; readonly text: string; readonly attempts: number }
  | {
      readonly success: false;
      readonly error: string;
      readonly transient: boolean;
      readonly attempts: number;
    };

export type Summarizer = {
  readonly summarize: (batch: ReadonlyArray<Item>, logger: Logger) => Promise<SummaryResult>;
};

export type SummarizerOptions = {
  readonly complete: CompleteFn;
  readonly policy: RetryPolicy;
  readonly maxOutputChars: number;
  readonly maxInputChars: number;
  readonly systemPrompt?: string;
};

type PromptEntry = Pick<Item, "title" | "excerpt" | "url">;

function renderEntry(item: PromptEntry, index: number): string {
  const lines = [`${index + 1}. ${item.title ?? "(untitled)"}`];
  if (item.excerpt) lines.push(item.excerpt);
  if (item.url) lines.push(item.url);
  return lines.join("\n");
}

/** Size of an item once rendered into the prompt, separator included. */
export function entrySize(item: PromptEntry): number {
  return renderEntry(item, 0).length + 2;
}

/**
 * Shortens an item's excerpt so that it fits `maxChars` on its own. Title
 * and link are kept whole.
 */
function fitEntry<T extends PromptEntry>(item: T, maxChars: number): T {
  const overflow = entrySize(item) - maxChars;
  if (overflow <= 0 || !item.excerpt) return item;

  const keep = Math.max(0, item.excerpt.length - overflow - 1);
  return { ...item, excerpt: keep > 0 ? `${sliceWhole(item.excerpt, keep)}…` : null };
}

/**
 * Splits items into order-preserving batches bounded by item count and
 * rendered size. No item is dropped; an item too large on its own becomes a
 * single-item batch.
 */
export function splitIntoBatches<T extends PromptEntry>(
  items: ReadonlyArray<T>,
  limits: BatchLimits,
): Array<Array<T>> {
  const batches: Array<Array<T>> = [];
  let current: Array<T> = [];
  let currentChars = 0;

  for (const item of items) {
    const size = entrySize(item);
    const full =
      current.length >= limits.maxItems ||
      (current.length > 0 && currentChars + size > limits.maxChars);

    if (full) {
      batches.push(current);
      current = [];
      currentChars = 0;
    }

    current.push(item);
    currentChars += size;
  }

  if (current.length > 0) batches.push(current);
  return batches;
}

export function renderBatchPrompt(
  batch: ReadonlyArray<PromptEntry>,
  maxOutputChars: number,
  maxInputChars: number,
): string {
  const body = batch
    .map((item, index) => renderEntry(fitEntry(item, maxInputChars), index))
    .join("\n\n");
  return `Write the post in at most ${maxOutputChars} characters.\n\nNews items:\n\n${body}`;
}

export function createSummarizer(options: SummarizerOptions): Summarizer {
  const system = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

  return {
    async summarize(batch, logger) {
      const prompt = renderBatchPrompt(batch, options.maxOutputChars, options.maxInputChars);

      const outcome = await options.policy.run(
        "llm.complete",
        () => options.complete({ system, prompt }),
        logger,
      );

      if (outcome.success) {
        logger.debug(
          { itemCount: batch.length, attempts: outcome.attempts },
          "batch summarized",
        );
        return { success: true, text: outcome.value, attempts: outcome.attempts };
      }

      const error =
        outcome.error instanceof ExternalCallError
          ? `${outcome.error.kind}: ${outcome.error.message}`
          : errorMessage(outcome.error);
      return {
        success: false,
        error,
        transient: outcome.transient,
        attempts: outcome.attempts,
      };
    },
  };
}
