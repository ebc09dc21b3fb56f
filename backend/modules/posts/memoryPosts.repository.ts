import { randomUUID } from "crypto";
import { ConflictError, NotFoundError, SlotTakenError } from "../../services/planner/errors.js";
import { isWithinRange } from "../../services/planner/dateUtils.js";
import type { PostStore } from "../../services/planner/postStore.js";
import type { DateRange, NewPostRecord, PostRecord, PostRecordUpdate } from "../../services/planner/types.js";

function clone(record: PostRecord): PostRecord {
  return structuredClone(record);
}

export function compareSlots(a: PostRecord, b: PostRecord) {
  if (a.scheduledDate !== b.scheduledDate) return a.scheduledDate < b.scheduledDate ? -1 : 1;
  if (a.scheduledTime !== b.scheduledTime) return a.scheduledTime < b.scheduledTime ? -1 : 1;
  return a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;
}

/**
 * Process-local post store. Backs tests and runs without DATABASE_URL.
 * Returned records are copies; callers cannot mutate stored state.
 */
export class MemoryPostsRepository implements PostStore {
  private posts = new Map<string, PostRecord>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async create(record: NewPostRecord): Promise<string> {
    this.assertSlotFree(record);
    const id = this.generateId();
    this.posts.set(id, clone({ ...record, id, version: 1 }));
    return id;
  }

  async get(id: string): Promise<PostRecord> {
    const post = this.posts.get(id);
    if (!post) throw new NotFoundError(id);
    return clone(post);
  }

  async update(id: string, fields: PostRecordUpdate, expectedVersion?: number): Promise<PostRecord> {
    const existing = this.posts.get(id);
    if (!existing) throw new NotFoundError(id);
    if (expectedVersion !== undefined && existing.version !== expectedVersion) {
      throw new ConflictError(id, expectedVersion, existing.version);
    }

    const updated: PostRecord = { ...existing, ...structuredClone(fields), version: existing.version + 1 };
    this.assertSlotFree(updated, id);
    this.posts.set(id, updated);
    return clone(updated);
  }

  async delete(id: string): Promise<void> {
    if (!this.posts.delete(id)) throw new NotFoundError(id);
  }

  async listByBusiness(businessId: string, range?: DateRange): Promise<PostRecord[]> {
    return Array.from(this.posts.values())
      .filter((post) => post.businessId === businessId)
      .filter((post) => !range || isWithinRange(post.scheduledDate, range))
      .sort(compareSlots)
      .map(clone);
  }

  /** Mirrors the partial unique index on non-cancelled (business, date, time). */
  private assertSlotFree(record: NewPostRecord, ownId?: string) {
    if (record.state === "cancelled") return;
    for (const [id, other] of this.posts) {
      if (
        id !== ownId &&
        other.state !== "cancelled" &&
        other.businessId === record.businessId &&
        other.scheduledDate === record.scheduledDate &&
        other.scheduledTime === record.scheduledTime
      ) {
        throw new SlotTakenError(record.businessId, record.scheduledDate, record.scheduledTime);
      }
    }
  }

  get size() {
    return this.posts.size;
  }
}
