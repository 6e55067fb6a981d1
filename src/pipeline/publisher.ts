import type { Logger } from "pino";
import type { SendFn } from "../channel/telegram";
import { ExternalCallError, errorMessage } from "../errors";
import type { RetryPolicy } from "./retry";

export type PublishResult =
  | { readonly success: true; readonly messageId: string; readonly attempts: number }
  | {
      readonly success: false;
      readonly error: string;
      readonly transient: boolean;
      readonly attempts: number;
    };

export type Publisher = {
  readonly publish: (text: string, logger: Logger) => Promise<PublishResult>;
};

/**
 * Sends a summary through the channel with the channel retry policy.
 * Channel sends are not idempotent: callers must persist the outcome of a
 * successful publish before doing anything else.
 */
export function createPublisher(send: SendFn, policy: RetryPolicy): Publisher {
  return {
    async publish(text, logger) {
      const outcome = await policy.run("channel.send", () => send(text), logger);

      if (outcome.success) {
        logger.info(
          { messageId: outcome.value.messageId, attempts: outcome.attempts },
          "summary published",
        );
        return {
          success: true,
          messageId: outcome.value.messageId,
          attempts: outcome.attempts,
        };
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
