import type { DateRange, NewPostRecord, PostRecord, PostRecordUpdate } from "./types.js";

/**
 * Persistence contract for post records. Implementations throw NotFoundError
 * for unknown ids, ConflictError when `expectedVersion` no longer matches and
 * SlotTakenError when a non-cancelled post of the same business already holds
 * the record's (date, time).
 */
export interface PostStore {
  /** Persists a new record and returns its id. */
  create(record: NewPostRecord): Promise<string>;
  get(id: string): Promise<PostRecord>;
  /** Applies `fields`, bumps `version` and returns the stored record. */
  update(id: string, fields: PostRecordUpdate, expectedVersion?: number): Promise<PostRecord>;
  delete(id: string): Promise<void>;
  /** Records of a business, optionally limited to scheduled dates in `range`, ordered by date then time. */
  listByBusiness(businessId: string, range?: DateRange): Promise<PostRecord[]>;
}
