import {
  AlreadyInProgressError,
  IllegalTransitionError,
  ImmutablePostError,
  SlotTakenError,
  TimeoutError,
} from "./errors.js";
import { KeyedLock } from "./keyedLock.js";
import type { PostStore } from "./postStore.js";
import type { DispatchOutcome, PublishDispatcher } from "./publishDispatcher.service.js";
import { withTimeout } from "./timeout.js";
import type {
  ChannelCredentials,
  PostEdit,
  PostEvent,
  PostRecord,
  PostRecordUpdate,
  PostState,
  PublishOutcome,
  PublishResult,
} from "./types.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";

const TRANSITIONS: Readonly<Record<PostState, Partial<Record<PostEvent, PostState>>>> = {
  draft: { confirm: "scheduled", cancel: "cancelled" },
  scheduled: { edit: "scheduled", cancel: "cancelled", request_publish: "publishing" },
  publishing: { publish_succeeded: "published", publish_failed: "failed" },
  published: {},
  failed: { retry_publish: "publishing" },
  cancelled: {},
};

/**
 * Resolves the state a post moves to, or throws IllegalTransitionError.
 */
export function nextState(postId: string, from: PostState, event: PostEvent): PostState {
  const to = TRANSITIONS[from][event];
  if (!to) {
    throw new IllegalTransitionError(postId, from, event);
  }
  return to;
}

export interface PostLifecycleOptions {
  storeTimeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Owns every state change of a post. Operations on one post id are
 * serialized; different posts proceed independently.
 */
export class PostLifecycleManager {
  private readonly locks = new KeyedLock();
  private readonly slotLocks = new KeyedLock();
  private readonly inFlight = new Set<string>();
  private readonly storeTimeoutMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: PostStore,
    private readonly dispatcher: PublishDispatcher,
    options: PostLifecycleOptions
  ) {
    this.storeTimeoutMs = options.storeTimeoutMs;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: "PostLifecycle" });
  }

  async getPost(postId: string): Promise<PostRecord> {
    return this.load(postId);
  }

  async confirmDraft(postId: string): Promise<PostRecord> {
    return this.transition(postId, "confirm");
  }

  async cancelPost(postId: string): Promise<PostRecord> {
    return this.transition(postId, "cancel");
  }

  async editPost(postId: string, edit: PostEdit): Promise<PostRecord> {
    return this.locks.runExclusive(postId, async () => {
      const post = await this.load(postId);
      if (post.state === "publishing" || post.state === "published") {
        throw new ImmutablePostError(postId, post.state);
      }
      const state = nextState(postId, post.state, "edit");

      const scheduledDate = edit.scheduledDate ?? post.scheduledDate;
      const scheduledTime = edit.scheduledTime ?? post.scheduledTime;
      const write = () =>
        this.save(post, {
          state,
          scheduledDate,
          scheduledTime,
          content: {
            text: edit.text ?? post.content.text,
            hashtags: edit.hashtags ?? post.content.hashtags,
            callToAction: edit.callToAction ?? post.content.callToAction,
            tone: edit.tone ?? post.content.tone,
            postType: edit.postType ?? post.content.postType,
          },
        });

      const moved = scheduledDate !== post.scheduledDate || scheduledTime !== post.scheduledTime;
      // Other posts may be moving onto the same day; check and write under one lock.
      const updated = moved
        ? await this.slotLocks.runExclusive(`${post.businessId}:${scheduledDate}`, async () => {
            await this.assertSlotFree(post, scheduledDate, scheduledTime);
            return write();
          })
        : await write();
      this.logger.info("Post edited", { postId, businessId: post.businessId });
      return updated;
    });
  }

  async requestPublish(postId: string, credentials: ChannelCredentials): Promise<PostRecord> {
    return this.publish(postId, credentials, "request_publish");
  }

  async retryPublish(postId: string, credentials: ChannelCredentials): Promise<PostRecord> {
    return this.publish(postId, credentials, "retry_publish");
  }

  /**
   * Settles a post left in `publishing` after a timeout, once the true
   * outcome is known from the external channel.
   */
  async reconcilePublish(postId: string, outcome: PublishOutcome): Promise<PostRecord> {
    return this.locks.runExclusive(postId, async () => {
      if (this.inFlight.has(postId)) {
        throw new AlreadyInProgressError(postId);
      }
      const post = await this.load(postId);
      const at = this.now().toISOString();
      const publishResult: PublishResult =
        outcome.status === "published"
          ? {
              status: "published",
              externalId: outcome.externalId,
              ...(outcome.url ? { url: outcome.url } : {}),
              publishedAt: at,
            }
          : { status: "failed", error: outcome.error, failedAt: at };
      const event: PostEvent = outcome.status === "published" ? "publish_succeeded" : "publish_failed";

      const updated = await this.save(post, { state: nextState(postId, post.state, event), publishResult });
      this.logger.info(`Publish reconciled as ${updated.state}`, { postId, businessId: post.businessId });
      return updated;
    });
  }

  async deletePost(postId: string): Promise<void> {
    await this.locks.runExclusive(postId, async () => {
      const post = await this.load(postId);
      if (post.state === "publishing") {
        throw new IllegalTransitionError(postId, post.state, "delete");
      }
      await withTimeout(this.store.delete(postId), this.storeTimeoutMs, `Deleting post ${postId}`);
      this.logger.info("Post deleted", { postId, businessId: post.businessId });
    });
  }

  isBusy(postId: string) {
    return this.locks.isLocked(postId) || this.inFlight.has(postId);
  }

  private async transition(postId: string, event: PostEvent): Promise<PostRecord> {
    return this.locks.runExclusive(postId, async () => {
      const post = await this.load(postId);
      const updated = await this.save(post, { state: nextState(postId, post.state, event) });
      this.logger.debug(`Post ${post.state} -> ${updated.state} (${event})`, {
        postId,
        businessId: post.businessId,
      });
      return updated;
    });
  }

  private async publish(
    postId: string,
    credentials: ChannelCredentials,
    event: "request_publish" | "retry_publish"
  ): Promise<PostRecord> {
    const publishing = await this.locks.runExclusive(postId, async () => {
      const post = await this.load(postId);
      if (post.state === "publishing") {
        throw new AlreadyInProgressError(postId);
      }
      const updated = await this.save(post, { state: nextState(postId, post.state, event), publishResult: null });
      this.inFlight.add(postId);
      return updated;
    });

    let outcome: DispatchOutcome;
    try {
      outcome = await this.dispatcher.dispatch(publishing, credentials);
    } catch (error) {
      this.inFlight.delete(postId);
      if (error instanceof TimeoutError) {
        this.logger.warn("Post left in publishing pending reconciliation", {
          postId,
          businessId: publishing.businessId,
        });
      }
      throw error;
    }

    return this.locks.runExclusive(postId, async () => {
      try {
        const post = await this.load(postId);
        const terminalEvent: PostEvent = outcome.state === "published" ? "publish_succeeded" : "publish_failed";
        return await this.save(post, {
          state: nextState(postId, post.state, terminalEvent),
          publishResult: outcome.publishResult,
        });
      } finally {
        this.inFlight.delete(postId);
      }
    });
  }

  private async assertSlotFree(post: PostRecord, date: string, time: string) {
    const sameDay = await withTimeout(
      this.store.listByBusiness(post.businessId, { start: date, end: date }),
      this.storeTimeoutMs,
      `Listing posts for ${date}`
    );
    const taken = sameDay.find(
      (other) => other.id !== post.id && other.state !== "cancelled" && other.scheduledTime === time
    );
    if (taken) {
      throw new SlotTakenError(post.businessId, date, time);
    }
  }

  private async load(postId: string): Promise<PostRecord> {
    return withTimeout(this.store.get(postId), this.storeTimeoutMs, `Loading post ${postId}`);
  }

  private async save(post: PostRecord, fields: PostRecordUpdate): Promise<PostRecord> {
    return withTimeout(
      this.store.update(post.id, { ...fields, updatedAt: this.now().toISOString() }, post.version),
      this.storeTimeoutMs,
      `Updating post ${post.id}`
    );
  }
}
