import { PlanningAbortedError, TimeoutError } from "./errors.js";
import { addDays, weekdayOfISODate } from "./dateUtils.js";
import { KeyedLock } from "./keyedLock.js";
import type { PostLifecycleManager } from "./postLifecycle.service.js";
import type { PostStore } from "./postStore.js";
import { allocate } from "./slotAllocator.js";
import { withTimeout } from "./timeout.js";
import { validatePlanningInput } from "./validation.js";
import type {
  DateRange,
  NewPostRecord,
  PlannerConfig,
  PostAnalytics,
  PostCandidate,
  PostRecord,
  PostState,
  Schedule,
  SlotAssignment,
} from "./types.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";

export interface PlanRequest {
  businessId: string;
  candidates: readonly PostCandidate[];
  /** Validated here; see BusinessPreferences. */
  preferences: unknown;
  window: unknown;
  /** Plan zero posts without failing when `candidates` is empty. */
  allowEmpty?: boolean;
}

export interface PlannerOrchestratorOptions {
  config: PlannerConfig;
  now?: () => Date;
  logger?: Logger;
}

export function toSchedule(businessId: string, window: DateRange, records: PostRecord[]): Schedule {
  return {
    businessId,
    window,
    entries: records
      .filter((record) => record.state !== "cancelled")
      .map((record) => ({
        date: record.scheduledDate,
        weekday: weekdayOfISODate(record.scheduledDate),
        time: record.scheduledTime,
        postId: record.id,
        state: record.state,
      }))
      .sort((a, b) => (a.date === b.date ? a.time.localeCompare(b.time) : a.date.localeCompare(b.date))),
  };
}

/** Times already held per date by live posts. */
export function occupiedSlots(records: PostRecord[]): Map<string, Set<string>> {
  const occupied = new Map<string, Set<string>>();
  for (const record of records) {
    if (record.state === "cancelled") continue;
    const times = occupied.get(record.scheduledDate) ?? new Set<string>();
    times.add(record.scheduledTime);
    occupied.set(record.scheduledDate, times);
  }
  return occupied;
}

/**
 * Entry point for weekly planning: validates the request, allocates slots,
 * persists the posts as one all-or-nothing batch and serves the derived
 * schedule back.
 */
export class PlannerOrchestrator {
  private readonly config: PlannerConfig;
  private readonly planLocks = new KeyedLock();
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: PostStore,
    private readonly lifecycle: PostLifecycleManager,
    options: PlannerOrchestratorOptions
  ) {
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? rootLogger).child({ component: "PlannerOrchestrator" });
  }

  async plan(request: PlanRequest): Promise<Schedule> {
    const { businessId } = request;
    const { preferences, window } = validatePlanningInput(request, this.config.defaultFrequency);
    const candidates = request.candidates.map((candidate) => Object.freeze({ ...candidate }));

    return this.planLocks.runExclusive(businessId, async () => {
      const existing = await withTimeout(
        this.store.listByBusiness(businessId, window),
        this.config.storeTimeoutMs,
        `Listing posts for ${businessId}`
      );
      const assignments = allocate(candidates, preferences, window, {
        allowEmpty: request.allowEmpty,
        occupied: occupiedSlots(existing),
      });

      this.logger.info(`Planning ${assignments.length} post(s) for ${window.start}..${window.end}`, {
        businessId,
        candidates: candidates.length,
        frequency: preferences.frequency,
        draftOnly: this.config.draftOnly,
      });

      const created: string[] = [];
      const pendingCreates: Promise<string>[] = [];
      const records: PostRecord[] = [];
      try {
        for (const assignment of assignments) {
          const pending = this.store.create(this.toDraft(businessId, assignment, preferences));
          const id = await withTimeout(
            pending,
            this.config.storeTimeoutMs,
            `Creating post for ${assignment.date} ${assignment.time}`
          ).catch((error: unknown) => {
            // the write may still land after we stop waiting
            if (error instanceof TimeoutError) pendingCreates.push(pending);
            throw error;
          });
          created.push(id);

          records.push(this.config.draftOnly ? await this.lifecycle.getPost(id) : await this.lifecycle.confirmDraft(id));
        }
      } catch (error) {
        const rollbackFailures = await this.rollback(businessId, created, pendingCreates);
        const aborted = new PlanningAbortedError(businessId, error, created.length, rollbackFailures);
        this.logger.error(
          "Planning aborted",
          { businessId, created: created.length },
          error instanceof Error ? error : undefined
        );
        throw aborted;
      }

      return toSchedule(businessId, window, records);
    });
  }

  async getSchedule(businessId: string, window: DateRange): Promise<Schedule> {
    const records = await withTimeout(
      this.store.listByBusiness(businessId, window),
      this.config.storeTimeoutMs,
      `Listing posts for ${businessId}`
    );
    return toSchedule(businessId, window, records);
  }

  async getAnalytics(businessId: string): Promise<PostAnalytics> {
    const records = await withTimeout(
      this.store.listByBusiness(businessId),
      this.config.storeTimeoutMs,
      `Listing posts for ${businessId}`
    );

    const byState: Record<PostState, number> = {
      draft: 0,
      scheduled: 0,
      publishing: 0,
      published: 0,
      failed: 0,
      cancelled: 0,
    };
    const postTypes: Record<string, number> = {};
    for (const record of records) {
      byState[record.state] += 1;
      postTypes[record.content.postType] = (postTypes[record.content.postType] ?? 0) + 1;
    }

    return {
      businessId,
      totalPosts: records.length,
      byState,
      postTypes,
      generatedAt: this.now().toISOString(),
    };
  }

  /**
   * Deletes drafts created more than `olderThanDays` days ago. Returns the
   * number removed.
   */
  async cleanupStaleDrafts(businessId: string, olderThanDays = this.config.retentionDays): Promise<number> {
    const cutoff = addDays(this.now(), -olderThanDays).toISOString();
    const records = await withTimeout(
      this.store.listByBusiness(businessId),
      this.config.storeTimeoutMs,
      `Listing posts for ${businessId}`
    );

    let deleted = 0;
    for (const record of records) {
      if (record.state === "draft" && record.createdAt < cutoff) {
        await this.lifecycle.deletePost(record.id);
        deleted += 1;
      }
    }

    this.logger.info(`Removed ${deleted} stale draft(s)`, { businessId, cutoff });
    return deleted;
  }

  private toDraft(
    businessId: string,
    assignment: SlotAssignment,
    preferences: { defaultTone?: string; defaultPostType?: string }
  ): NewPostRecord {
    const { candidate } = assignment;
    const at = this.now().toISOString();
    return {
      businessId,
      content: {
        text: candidate.text,
        hashtags: [...candidate.hashtags],
        postType: candidate.postType ?? preferences.defaultPostType ?? "general",
        tone: candidate.tone ?? preferences.defaultTone ?? "neutral",
        callToAction: candidate.callToAction ?? "",
      },
      state: "draft",
      scheduledDate: assignment.date,
      scheduledTime: assignment.time,
      createdAt: at,
      updatedAt: at,
      publishResult: null,
    };
  }

  private async rollback(businessId: string, created: string[], pendingCreates: Promise<string>[]) {
    const failures: { postId: string; message: string }[] = [];
    const ids = [...created];

    for (const pending of pendingCreates) {
      try {
        ids.push(await withTimeout(pending, this.config.storeTimeoutMs, "Waiting for a timed out post creation"));
      } catch (error) {
        // a create that failed outright left nothing behind
        if (error instanceof TimeoutError) {
          failures.push({ postId: "unknown", message: error.message });
          this.logger.error(`Rollback failed: ${error.message}`, { businessId });
        }
      }
    }

    for (const id of ids) {
      try {
        await withTimeout(this.store.delete(id), this.config.storeTimeoutMs, `Rolling back post ${id}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ postId: id, message });
        this.logger.error(`Rollback failed for post ${id}: ${message}`, { businessId, postId: id });
      }
    }
    if (ids.length > 0) {
      this.logger.warn(`Rolled back ${ids.length - failures.length} of ${ids.length} post(s)`, { businessId });
    }
    return failures;
  }
}
