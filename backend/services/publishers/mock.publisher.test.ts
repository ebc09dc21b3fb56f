import { describe, it, expect } from "vitest";
import { MockPublisher } from "./mock.publisher.js";
import { composeMessage } from "./publisher.js";
import type { PostContent } from "../planner/types.js";

const content: PostContent = {
  text: "New sourdough this week ",
  hashtags: ["bakery", "#fresh", " "],
  postType: "promo",
  tone: "friendly",
  callToAction: "Order ahead",
};

describe("composeMessage", () => {
  it("joins text, call to action and hashtags", () => {
    expect(composeMessage(content)).toBe("New sourdough this week\n\nOrder ahead\n\n#bakery #fresh");
  });

  it("omits empty parts", () => {
    expect(composeMessage({ ...content, callToAction: "", hashtags: [] })).toBe("New sourdough this week");
  });
});

describe("MockPublisher", () => {
  it("publishes to a known page", async () => {
    const publisher = new MockPublisher();

    const response = await publisher.publish(content, { pageId: "mock_page_2", accessToken: "test-token" });

    expect(response).toEqual({
      ok: true,
      externalId: "mock_1",
      url: "https://facebook.com/mock_page_2/posts/mock_1",
    });
    expect(publisher.getPublished("mock_1")?.message).toBe(composeMessage(content));
    expect(publisher.publishedCount).toBe(1);
  });

  it("rejects a missing token and an unknown page", async () => {
    const publisher = new MockPublisher(["page-a"]);

    await expect(publisher.publish(content, { pageId: "page-a", accessToken: "" })).resolves.toEqual({
      ok: false,
      error: { kind: "invalid_token", message: "Access token is missing" },
    });
    await expect(publisher.publish(content, { pageId: "page-b", accessToken: "test-token" })).resolves.toEqual({
      ok: false,
      error: { kind: "page_not_found", message: "Page page-b not found or no access" },
    });
    expect(publisher.publishedCount).toBe(0);
  });
});
