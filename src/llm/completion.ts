// pattern: Imperative Shell
import { APICallError, generateText } from "ai";
import type { LanguageModel } from "ai";
import { ExternalCallError, errorMessage, isAbortError } from "../errors";

export type CompletionRequest = {
  readonly system: string;
  readonly prompt: string;
};

/**
 * Text-completion capability used by the summarizer. Resolves with the
 * generated text or rejects with an `ExternalCallError`.
 */
export type CompleteFn = (request: CompletionRequest) => Promise<string>;

export type CompletionOptions = {
  readonly timeoutMs: number;
};

/**
 * Maps an `ai` SDK failure onto the external failure taxonomy.
 */
export function classifyLlmError(err: unknown): ExternalCallError {
  if (err instanceof ExternalCallError) return err;

  if (isAbortError(err)) {
    return new ExternalCallError("timeout", "completion timed out", { cause: err });
  }

  if (APICallError.isInstance(err)) {
    const status = err.statusCode;
    const message = `completion failed with HTTP ${status ?? "?"}: ${err.message}`;

    if (status === 429) {
      const retryAfter = Number(err.responseHeaders?.["retry-after"]);
      return new ExternalCallError("rate_limited", message, {
        cause: err,
        retryAfterMs: Number.isFinite(retryAfter) ? retryAfter * 1000 : undefined,
      });
    }
    if (status === 401 || status === 403) {
      return new ExternalCallError("auth", message, { cause: err });
    }
    if (status === 400 || status === 404 || status === 422) {
      return new ExternalCallError("malformed", message, { cause: err });
    }
    if (status !== undefined && status >= 500) {
      return new ExternalCallError("server_error", message, { cause: err });
    }
    return new ExternalCallError(err.isRetryable ? "network" : "malformed", message, {
      cause: err,
    });
  }

  return new ExternalCallError("network", errorMessage(err), { cause: err });
}

/**
 * Wraps `generateText` as a CompleteFn. SDK-level retries are disabled so
 * the summarizer's retry policy is the only one in effect; each call is
 * bounded by `timeoutMs`.
 */
export function createCompletion(
  model: LanguageModel,
  options: CompletionOptions,
): CompleteFn {
  return async function complete(request: CompletionRequest): Promise<string> {
    let text: string;
    try {
      const result = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(options.timeoutMs),
      });
      text = result.text;
    } catch (err) {
      throw classifyLlmError(err);
    }

    if (text.trim().length === 0) {
      throw new ExternalCallError("malformed", "completion returned empty text");
    }
    return text.trim();
  };
}
