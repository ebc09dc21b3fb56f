import { Router } from "express";
import { PostsController } from "./posts.controller.js";
import type { Planner } from "../../services/planner/index.js";

export function createPostsRoutes(planner: Planner): Router {
  const router = Router();
  const postsController = new PostsController(planner);

  /**
   * @route   GET /posts/:id
   * @desc    Get a single post
   * @access  Private (requires token)
   */
  router.get("/:id", postsController.getPost);

  /**
   * @route   PATCH /posts/:id
   * @desc    Edit a scheduled post's content or slot
   * @access  Private (requires token)
   */
  router.patch("/:id", postsController.edit);

  /**
   * @route   DELETE /posts/:id
   * @desc    Delete a post that is not being published
   * @access  Private (requires token)
   */
  router.delete("/:id", postsController.remove);

  /**
   * @route   POST /posts/:id/confirm
   * @desc    Move a draft to scheduled
   * @access  Private (requires token)
   */
  router.post("/:id/confirm", postsController.confirm);

  /**
   * @route   POST /posts/:id/cancel
   * @desc    Cancel a draft or scheduled post
   * @access  Private (requires token)
   */
  router.post("/:id/cancel", postsController.cancel);

  /**
   * @route   POST /posts/:id/publish
   * @desc    Publish a scheduled post
   * @access  Private (requires token)
   */
  router.post("/:id/publish", postsController.publish);

  /**
   * @route   POST /posts/:id/retry
   * @desc    Retry publishing a failed post
   * @access  Private (requires token)
   */
  router.post("/:id/retry", postsController.retry);

  /**
   * @route   POST /posts/:id/reconcile
   * @desc    Record the real outcome of a publish that timed out
   * @access  Private (requires token)
   */
  router.post("/:id/reconcile", postsController.reconcile);

  return router;
}
