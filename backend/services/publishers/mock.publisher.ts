import { composeMessage, type Publisher, type PublisherResponse } from "./publisher.js";
import type { ChannelCredentials, PostContent } from "../planner/types.js";

export interface MockPublishedPost {
  externalId: string;
  pageId: string;
  message: string;
  publishedAt: string;
}

/**
 * In-memory stand-in for a Facebook page. Used in development and tests;
 * nothing leaves the process.
 */
export class MockPublisher implements Publisher {
  readonly channel = "facebook-mock";
  private counter = 0;
  private posts = new Map<string, MockPublishedPost>();

  constructor(private readonly pageIds: readonly string[] = ["mock_page_1", "mock_page_2"]) {}

  async publish(content: PostContent, credentials: ChannelCredentials): Promise<PublisherResponse> {
    if (!credentials.accessToken.trim()) {
      return { ok: false, error: { kind: "invalid_token", message: "Access token is missing" } };
    }
    if (!this.pageIds.includes(credentials.pageId)) {
      return {
        ok: false,
        error: { kind: "page_not_found", message: `Page ${credentials.pageId} not found or no access` },
      };
    }

    this.counter += 1;
    const externalId = `mock_${this.counter}`;
    this.posts.set(externalId, {
      externalId,
      pageId: credentials.pageId,
      message: composeMessage(content),
      publishedAt: new Date().toISOString(),
    });

    return {
      ok: true,
      externalId,
      url: `https://facebook.com/${credentials.pageId}/posts/${externalId}`,
    };
  }

  getPublished(externalId: string): MockPublishedPost | undefined {
    return this.posts.get(externalId);
  }

  get publishedCount() {
    return this.posts.size;
  }
}
