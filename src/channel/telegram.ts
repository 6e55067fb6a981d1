// pattern: Imperative Shell
import { z } from "zod";
import { ExternalCallError, errorMessage, isAbortError } from "../errors";
import { truncate } from "../text";

/** Telegram rejects messages longer than this many characters. */
export const TELEGRAM_MAX_MESSAGE_CHARS = 4096;

export type SendReceipt = {
  readonly messageId: string;
};

/**
 * Messaging-channel capability. Resolves with a delivery receipt or rejects
 * with an `ExternalCallError`.
 */
export type SendFn = (text: string) => Promise<SendReceipt>;

export type TelegramSenderOptions = {
  readonly botToken: string;
  readonly chatId: string;
  readonly timeoutMs: number;
  readonly disableWebPagePreview: boolean;
  readonly apiBaseUrl?: string;
  readonly onTruncate?: (originalLength: number) => void;
};

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

export function fitMessage(text: string, max = TELEGRAM_MAX_MESSAGE_CHARS): string {
  return truncate(text, max);
}

function failureFor(
  status: number,
  description: string,
  retryAfterSeconds: number | undefined,
): ExternalCallError {
  const message = `telegram sendMessage failed with HTTP ${status}: ${description}`;

  if (status === 429) {
    return new ExternalCallError("rate_limited", message, {
      retryAfterMs: retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : undefined,
    });
  }
  if (status === 401 || status === 403) {
    return new ExternalCallError("forbidden", message);
  }
  if (status >= 500) {
    return new ExternalCallError("server_error", message);
  }
  return new ExternalCallError("malformed", message);
}

/**
 * Creates a SendFn that posts to a Telegram chat through the Bot API
 * `sendMessage` method.
 */
export function createTelegramSender(options: TelegramSenderOptions): SendFn {
  const baseUrl = options.apiBaseUrl ?? "https://api.telegram.org";
  const endpoint = `${baseUrl}/bot${options.botToken}/sendMessage`;

  return async function send(text: string): Promise<SendReceipt> {
    const body = fitMessage(text);
    if (body.length !== text.length) {
      options.onTruncate?.(text.length);
    }

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: options.chatId,
          text: body,
          disable_web_page_preview: options.disableWebPagePreview,
        }),
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new ExternalCallError("timeout", "telegram sendMessage timed out", {
          cause: err,
        });
      }
      throw new ExternalCallError("network", errorMessage(err), { cause: err });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      if (response.status >= 500) {
        throw failureFor(response.status, response.statusText, undefined);
      }
      throw new ExternalCallError("malformed", "telegram returned a non-JSON body", {
        cause: err,
      });
    }

    const parsed = telegramResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ExternalCallError("malformed", "unexpected telegram response shape");
    }

    const data = parsed.data;
    if (!response.ok || !data.ok || !data.result) {
      throw failureFor(
        data.error_code ?? response.status,
        data.description ?? response.statusText,
        data.parameters?.retry_after,
      );
    }

    return { messageId: String(data.result.message_id) };
  };
}
