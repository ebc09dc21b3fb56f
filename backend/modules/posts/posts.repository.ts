import { and, asc, eq, gte, lte } from "drizzle-orm";
import postgres from "postgres";
import { z } from "zod";
import type { Database } from "../../infra/db/index.js";
import { POSTS_SLOT_INDEX, posts, type NewPostRow, type PostRow } from "../../infra/db/schemas/posts.js";
import { ConflictError, NotFoundError, SlotTakenError } from "../../services/planner/errors.js";
import type { PostStore } from "../../services/planner/postStore.js";
import type { DateRange, NewPostRecord, PostRecord, PostRecordUpdate } from "../../services/planner/types.js";

const postIdSchema = z.string().uuid();

const UNIQUE_VIOLATION = "23505";

/** Ids that are not UUIDs cannot exist; reject them before Postgres does. */
function assertPostId(id: string) {
  if (!postIdSchema.safeParse(id).success) throw new NotFoundError(id);
}

function isSlotViolation(error: unknown) {
  const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
  return (
    cause instanceof postgres.PostgresError &&
    cause.code === UNIQUE_VIOLATION &&
    cause.constraint_name === POSTS_SLOT_INDEX
  );
}

function toRecord(row: PostRow): PostRecord {
  return {
    id: row.id,
    businessId: row.businessId,
    content: {
      text: row.text,
      hashtags: row.hashtags,
      postType: row.postType,
      tone: row.tone,
      callToAction: row.callToAction,
    },
    state: row.state,
    scheduledDate: row.scheduledDate,
    scheduledTime: row.scheduledTime,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    publishResult: row.publishResult ?? null,
    version: row.version,
  };
}

function toRowUpdate(fields: PostRecordUpdate): Partial<NewPostRow> {
  const values: Partial<NewPostRow> = {};
  if (fields.content !== undefined) {
    values.text = fields.content.text;
    values.hashtags = fields.content.hashtags;
    values.postType = fields.content.postType;
    values.tone = fields.content.tone;
    values.callToAction = fields.content.callToAction;
  }
  if (fields.state !== undefined) values.state = fields.state;
  if (fields.scheduledDate !== undefined) values.scheduledDate = fields.scheduledDate;
  if (fields.scheduledTime !== undefined) values.scheduledTime = fields.scheduledTime;
  if (fields.publishResult !== undefined) values.publishResult = fields.publishResult;
  values.updatedAt = fields.updatedAt ? new Date(fields.updatedAt) : new Date();
  return values;
}

/**
 * Postgres-backed post store. Updates are guarded by the `version` column.
 */
export class PostsRepository implements PostStore {
  constructor(private readonly db: Database) {}

  async create(record: NewPostRecord): Promise<string> {
    const rows = await this.db
      .insert(posts)
      .values({
        businessId: record.businessId,
        text: record.content.text,
        hashtags: record.content.hashtags,
        postType: record.content.postType,
        tone: record.content.tone,
        callToAction: record.content.callToAction,
        state: record.state,
        scheduledDate: record.scheduledDate,
        scheduledTime: record.scheduledTime,
        publishResult: record.publishResult,
        createdAt: new Date(record.createdAt),
        updatedAt: new Date(record.updatedAt),
      })
      .returning({ id: posts.id })
      .catch((error: unknown) => {
        if (isSlotViolation(error)) {
          throw new SlotTakenError(record.businessId, record.scheduledDate, record.scheduledTime);
        }
        throw error;
      });
    return rows[0].id;
  }

  async get(id: string): Promise<PostRecord> {
    assertPostId(id);
    const [row] = await this.db.select().from(posts).where(eq(posts.id, id));
    if (!row) throw new NotFoundError(id);
    return toRecord(row);
  }

  async update(id: string, fields: PostRecordUpdate, expectedVersion?: number): Promise<PostRecord> {
    const existing = await this.get(id);
    const version = expectedVersion ?? existing.version;

    const [row] = await this.db
      .update(posts)
      .set({ ...toRowUpdate(fields), version: version + 1 })
      .where(and(eq(posts.id, id), eq(posts.version, version)))
      .returning()
      .catch((error: unknown) => {
        if (isSlotViolation(error)) {
          const date = fields.scheduledDate ?? existing.scheduledDate;
          const time = fields.scheduledTime ?? existing.scheduledTime;
          throw new SlotTakenError(existing.businessId, date, time);
        }
        throw error;
      });

    if (!row) {
      const current = await this.get(id);
      throw new ConflictError(id, version, current.version);
    }
    return toRecord(row);
  }

  async delete(id: string): Promise<void> {
    assertPostId(id);
    const deleted = await this.db.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id });
    if (deleted.length === 0) throw new NotFoundError(id);
  }

  async listByBusiness(businessId: string, range?: DateRange): Promise<PostRecord[]> {
    const conditions = [eq(posts.businessId, businessId)];
    if (range) {
      conditions.push(gte(posts.scheduledDate, range.start));
      conditions.push(lte(posts.scheduledDate, range.end));
    }

    const rows = await this.db
      .select()
      .from(posts)
      .where(and(...conditions))
      .orderBy(asc(posts.scheduledDate), asc(posts.scheduledTime), asc(posts.createdAt));

    return rows.map(toRecord);
  }
}
