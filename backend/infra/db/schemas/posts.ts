import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  text,
  integer,
  date,
  jsonb,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { PostState, PublishResult } from "../../../services/planner/types.js";

export const POSTS_SLOT_INDEX = "posts_business_slot_unique";

export const posts = pgTable(
  "posts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    businessId: varchar("business_id", { length: 255 }).notNull(),

    // Content (mutable copy of the generated candidate)
    text: text("text").notNull(),
    hashtags: jsonb("hashtags").$type<string[]>().notNull().default([]),
    postType: varchar("post_type", { length: 50 }).notNull(), // tip, promo, update, insight...
    tone: varchar("tone", { length: 50 }).notNull(),
    callToAction: text("call_to_action").notNull().default(""),

    state: varchar("state", { length: 20 }).$type<PostState>().notNull().default("draft"),
    scheduledDate: date("scheduled_date", { mode: "string" }).notNull(), // YYYY-MM-DD
    scheduledTime: varchar("scheduled_time", { length: 5 }).notNull(), // HH:MM
    publishResult: jsonb("publish_result").$type<PublishResult>(),
    version: integer("version").notNull().default(1),

    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => [
    index("posts_business_schedule_idx").on(table.businessId, table.scheduledDate, table.scheduledTime),
    // one live post per slot; cancelled posts release theirs
    uniqueIndex(POSTS_SLOT_INDEX)
      .on(table.businessId, table.scheduledDate, table.scheduledTime)
      .where(sql`${table.state} <> 'cancelled'`),
  ]
);

export type PostRow = typeof posts.$inferSelect;
export type NewPostRow = typeof posts.$inferInsert;
