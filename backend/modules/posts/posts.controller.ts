import type { Request, Response } from "express";
import { requireBusinessId } from "../../middleware/auth.middleware.js";
import { createRequestLogger } from "../../lib/logger.js";
import { NotFoundError, type Planner } from "../../services/planner/index.js";
import type { PostRecord } from "../../services/planner/types.js";
import {
  credentialsSchema,
  parseInput,
  publishOutcomeSchema,
  validatePostEdit,
} from "../../services/planner/validation.js";
import { sendError } from "../http.js";

export class PostsController {
  constructor(private readonly planner: Planner) {}

  /** Posts of other businesses are reported as missing. */
  private async loadOwned(req: Request): Promise<PostRecord> {
    const businessId = requireBusinessId(req);
    const post = await this.planner.lifecycle.getPost(req.params.id);
    if (post.businessId !== businessId) {
      throw new NotFoundError(req.params.id);
    }
    return post;
  }

  /**
   * GET /posts/:id
   */
  getPost = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const post = await this.loadOwned(req);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Confirm a draft onto the schedule
   * POST /posts/:id/confirm
   */
  confirm = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.confirmDraft(id);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Edit content or move the slot of a scheduled post
   * PATCH /posts/:id
   */
  edit = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const changes = validatePostEdit(req.body);
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.editPost(id, changes);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * POST /posts/:id/cancel
   */
  cancel = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.cancelPost(id);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Publish a scheduled post now
   * POST /posts/:id/publish
   */
  publish = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const credentials = parseInput(credentialsSchema, req.body);
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.requestPublish(id, credentials);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Publish a failed post again
   * POST /posts/:id/retry
   */
  retry = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const credentials = parseInput(credentialsSchema, req.body);
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.retryPublish(id, credentials);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Settle a post left in publishing after a timeout
   * POST /posts/:id/reconcile
   */
  reconcile = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const outcome = parseInput(publishOutcomeSchema, req.body);
      const { id } = await this.loadOwned(req);
      const post = await this.planner.lifecycle.reconcilePublish(id, outcome);
      res.status(200).json({ success: true, data: { post } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * DELETE /posts/:id
   */
  remove = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const { id } = await this.loadOwned(req);
      await this.planner.lifecycle.deletePost(id);
      res.status(200).json({ success: true, message: "Post deleted successfully" });
    } catch (error) {
      sendError(res, error, log);
    }
  };
}
