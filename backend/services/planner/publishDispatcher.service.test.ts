import { describe, it, expect } from "vitest";
import { PublishDispatcher } from "./publishDispatcher.service.js";
import { PublisherError, TimeoutError } from "./errors.js";
import type { PostRecord } from "./types.js";
import type { Publisher, PublisherResponse } from "../publishers/publisher.js";

const NOW = new Date("2025-02-03T12:00:00.000Z");

const post: PostRecord = {
  id: "post-1",
  businessId: "biz-1",
  content: { text: "Hello", hashtags: [], postType: "update", tone: "neutral", callToAction: "" },
  state: "publishing",
  scheduledDate: "2025-02-03",
  scheduledTime: "10:00",
  createdAt: NOW.toISOString(),
  updatedAt: NOW.toISOString(),
  publishResult: null,
  version: 2,
};

const credentials = { pageId: "page-1", accessToken: "test-token" };

function publisherWith(publish: () => Promise<PublisherResponse>): Publisher {
  return { channel: "stub", publish };
}

function dispatcherFor(publisher: Publisher, timeoutMs = 1_000) {
  return new PublishDispatcher(publisher, { timeoutMs, now: () => NOW });
}

describe("PublishDispatcher", () => {
  it("maps a successful response to published", async () => {
    const dispatcher = dispatcherFor(publisherWith(async () => ({ ok: true, externalId: "ext-1" })));

    await expect(dispatcher.dispatch(post, credentials)).resolves.toEqual({
      state: "published",
      publishResult: { status: "published", externalId: "ext-1", publishedAt: NOW.toISOString() },
    });
  });

  it("maps a rejected response to failed", async () => {
    const dispatcher = dispatcherFor(
      publisherWith(async () => ({ ok: false, error: { kind: "rate_limited", message: "slow down" } }))
    );

    await expect(dispatcher.dispatch(post, credentials)).resolves.toEqual({
      state: "failed",
      publishResult: {
        status: "failed",
        error: { kind: "rate_limited", message: "slow down" },
        failedAt: NOW.toISOString(),
      },
    });
  });

  it("keeps the kind of a thrown PublisherError", async () => {
    const dispatcher = dispatcherFor(
      publisherWith(async () => {
        throw new PublisherError("network", "connection reset");
      })
    );

    const outcome = await dispatcher.dispatch(post, credentials);
    expect(outcome.publishResult).toMatchObject({ status: "failed", error: { kind: "network", message: "connection reset" } });
  });

  it("classifies any other thrown error as unknown", async () => {
    const dispatcher = dispatcherFor(
      publisherWith(async () => {
        throw new Error("boom");
      })
    );

    const outcome = await dispatcher.dispatch(post, credentials);
    expect(outcome.state).toBe("failed");
    expect(outcome.publishResult).toMatchObject({ error: { kind: "unknown", message: "boom" } });
  });

  it("rethrows a timeout instead of deciding the outcome", async () => {
    const dispatcher = dispatcherFor(
      publisherWith(() => new Promise(() => {})),
      10
    );

    await expect(dispatcher.dispatch(post, credentials)).rejects.toBeInstanceOf(TimeoutError);
  });
});
