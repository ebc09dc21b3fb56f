import { PublisherError, TimeoutError } from "./errors.js";
import { withTimeout } from "./timeout.js";
import type { Publisher } from "../publishers/publisher.js";
import type { ChannelCredentials, PostRecord, PublishResult } from "./types.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";

export type DispatchOutcome =
  | { state: "published"; publishResult: Extract<PublishResult, { status: "published" }> }
  | { state: "failed"; publishResult: Extract<PublishResult, { status: "failed" }> };

export interface PublishDispatcherOptions {
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Sends a post that is already `publishing` to the external channel and turns
 * the answer into a terminal state. Never retries: a retry is always a
 * caller-initiated `retry_publish`.
 */
export class PublishDispatcher {
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly publisher: Publisher,
    options: PublishDispatcherOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: "PublishDispatcher" });
  }

  /**
   * @throws TimeoutError when the publisher does not answer in time; the
   * outcome is then unknown and the post must stay `publishing`.
   */
  async dispatch(post: PostRecord, credentials: ChannelCredentials): Promise<DispatchOutcome> {
    this.logger.info(`Publishing post to ${this.publisher.channel}`, { postId: post.id });

    try {
      const response = await withTimeout(
        this.publisher.publish(post.content, credentials),
        this.timeoutMs,
        `Publishing post ${post.id}`
      );

      if (response.ok) {
        this.logger.info("Post published", { postId: post.id, externalId: response.externalId });
        return {
          state: "published",
          publishResult: {
            status: "published",
            externalId: response.externalId,
            ...(response.url ? { url: response.url } : {}),
            publishedAt: this.now().toISOString(),
          },
        };
      }

      return this.failed(post.id, response.error.kind, response.error.message);
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn("Publish timed out; outcome unknown", { postId: post.id, timeoutMs: this.timeoutMs });
        throw error;
      }
      if (error instanceof PublisherError) {
        return this.failed(post.id, error.publisherKind, error.message);
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      return this.failed(post.id, "unknown", message);
    }
  }

  private failed(postId: string, kind: string, message: string): DispatchOutcome {
    this.logger.warn(`Publish failed (${kind}): ${message}`, { postId });
    return {
      state: "failed",
      publishResult: {
        status: "failed",
        error: { kind, message },
        failedAt: this.now().toISOString(),
      },
    };
  }
}
