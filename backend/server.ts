import { createApp } from "./app.js";
import { ENV } from "./config/env.js";
import { createDb } from "./infra/db/index.js";
import { logger } from "./lib/logger.js";
import { MemoryPostsRepository } from "./modules/posts/memoryPosts.repository.js";
import { PostsRepository } from "./modules/posts/posts.repository.js";
import { MockPublisher } from "./services/publishers/mock.publisher.js";
import { createPlanner, plannerConfigFromEnv } from "./services/planner/index.js";
import type { PostStore } from "./services/planner/postStore.js";

const HOST = "127.0.0.1";

function createStore(): PostStore {
  if (ENV.DATABASE_URL) {
    const { db } = createDb(ENV.DATABASE_URL);
    logger.info("Using Postgres post store");
    return new PostsRepository(db);
  }
  logger.warn("DATABASE_URL not set, posts are kept in memory");
  return new MemoryPostsRepository();
}

const planner = createPlanner({
  store: createStore(),
  publisher: new MockPublisher(),
  config: plannerConfigFromEnv(ENV),
});

const app = createApp(planner, ENV);

app.listen(ENV.PORT, HOST, () => {
  logger.info(`Server is running on http://localhost:${ENV.PORT}`, {
    env: ENV.NODE_ENV,
    draftOnly: ENV.PLANNER_DRAFT_ONLY,
  });
});
