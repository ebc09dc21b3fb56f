import express, { Request, Response } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import type { Env } from "./config/env.js";
import { authenticate } from "./middleware/auth.middleware.js";
import { createPlannerRoutes } from "./modules/planner/planner.routes.js";
import { createPostsRoutes } from "./modules/posts/posts.routes.js";
import type { Planner } from "./services/planner/index.js";

export function createApp(planner: Planner, env: Pick<Env, "CORS_ORIGIN" | "JWT_SECRET">) {
  const app = express();

  // Middleware
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true,
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());

  // Basic route
  app.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Weekly post planner API",
      status: "success",
    });
  });

  // Health check route
  app.get("/health", (req: Request, res: Response) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
    });
  });

  const requireToken = authenticate(env.JWT_SECRET);
  app.use("/planner", requireToken, createPlannerRoutes(planner));
  app.use("/posts", requireToken, createPostsRoutes(planner));

  return app;
}
