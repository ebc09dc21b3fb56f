export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const POST_STATES = [
  "draft",
  "scheduled",
  "publishing",
  "published",
  "failed",
  "cancelled",
] as const;

export type PostState = (typeof POST_STATES)[number];

export type PostEvent =
  | "confirm"
  | "cancel"
  | "edit"
  | "request_publish"
  | "publish_succeeded"
  | "publish_failed"
  | "retry_publish"
  | "delete";

/** Inclusive range of calendar dates (YYYY-MM-DD). */
export interface DateRange {
  start: string;
  end: string;
}

export interface BusinessPreferences {
  businessId: string;
  frequency: number; // posts per week, 1-7
  preferredDays: Weekday[];
  defaultTone?: string;
  defaultPostType?: string;
}

export interface PostCandidate {
  readonly text: string;
  readonly hashtags: readonly string[];
  readonly postType?: string;
  readonly tone?: string;
  readonly callToAction?: string;
  readonly suggestedTime?: string; // "18:00" or "6:00 PM"
}

export interface PostContent {
  text: string;
  hashtags: string[];
  postType: string;
  tone: string;
  callToAction: string;
}

export interface PublishErrorDescriptor {
  kind: string;
  message: string;
}

export type PublishResult =
  | {
      status: "published";
      externalId: string;
      url?: string;
      publishedAt: string;
    }
  | {
      status: "failed";
      error: PublishErrorDescriptor;
      failedAt: string;
    };

export interface PostRecord {
  id: string;
  businessId: string;
  content: PostContent;
  state: PostState;
  scheduledDate: string;
  scheduledTime: string; // HH:MM
  createdAt: string;
  updatedAt: string;
  publishResult: PublishResult | null;
  version: number;
}

export type NewPostRecord = Omit<PostRecord, "id" | "version">;

export type PostRecordUpdate = Partial<
  Pick<PostRecord, "content" | "state" | "scheduledDate" | "scheduledTime" | "updatedAt" | "publishResult">
>;

export interface SlotAssignment {
  candidate: PostCandidate;
  date: string;
  weekday: Weekday;
  time: string;
}

export interface ScheduleEntry {
  date: string;
  weekday: Weekday;
  time: string;
  postId: string;
  state: PostState;
}

export interface Schedule {
  businessId: string;
  window: DateRange;
  entries: ScheduleEntry[];
}

export interface ChannelCredentials {
  pageId: string;
  accessToken: string;
}

/** Fields a caller may change on a scheduled post. */
export interface PostEdit {
  text?: string;
  hashtags?: string[];
  callToAction?: string;
  tone?: string;
  postType?: string;
  scheduledDate?: string;
  scheduledTime?: string;
}

export type PublishOutcome =
  | { status: "published"; externalId: string; url?: string }
  | { status: "failed"; error: PublishErrorDescriptor };

export interface PlannerConfig {
  draftOnly: boolean;
  defaultFrequency: number;
  storeTimeoutMs: number;
  publishTimeoutMs: number;
  retentionDays: number;
}

export interface PostAnalytics {
  businessId: string;
  totalPosts: number;
  byState: Record<PostState, number>;
  postTypes: Record<string, number>;
  generatedAt: string;
}
