import type { ChannelCredentials, PostContent, PublishErrorDescriptor } from "../planner/types.js";

export type PublisherResponse =
  | { ok: true; externalId: string; url?: string }
  | { ok: false; error: PublishErrorDescriptor };

/**
 * External channel the planner publishes through (e.g. a Facebook page).
 * Adapters either resolve with a response or throw; a thrown PublisherError
 * keeps its kind.
 */
export interface Publisher {
  readonly channel: string;
  publish(content: PostContent, credentials: ChannelCredentials): Promise<PublisherResponse>;
}

/** Renders post text the way it goes out: body, call to action, hashtags. */
export function composeMessage(content: PostContent) {
  const parts = [content.text.trim()];
  if (content.callToAction.trim()) parts.push(content.callToAction.trim());
  const tags = content.hashtags
    .map((tag) => tag.trim())
    .filter(Boolean)
    .map((tag) => (tag.startsWith("#") ? tag : `#${tag}`));
  if (tags.length > 0) parts.push(tags.join(" "));
  return parts.join("\n\n");
}
