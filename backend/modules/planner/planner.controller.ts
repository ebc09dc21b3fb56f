import type { Request, Response } from "express";
import { z } from "zod";
import { requireBusinessId } from "../../middleware/auth.middleware.js";
import { createRequestLogger } from "../../lib/logger.js";
import type { Planner } from "../../services/planner/index.js";
import { candidateSchema, dateRangeSchema, parseInput } from "../../services/planner/validation.js";
import { sendError } from "../http.js";

const planBodySchema = z.object({
  candidates: z.array(candidateSchema),
  preferences: z.record(z.unknown()).default({}),
  window: z.unknown(),
  allowEmpty: z.boolean().optional(),
});

const cleanupBodySchema = z.object({
  olderThanDays: z.number().int().positive().optional(),
});

export class PlannerController {
  constructor(private readonly planner: Planner) {}

  /**
   * Plan a batch of generated posts onto the calendar
   * POST /planner/plan
   */
  plan = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const businessId = requireBusinessId(req);
      const body = parseInput(planBodySchema, req.body);

      const schedule = await this.planner.orchestrator.plan({
        businessId,
        candidates: body.candidates,
        preferences: { ...body.preferences, businessId },
        window: body.window,
        allowEmpty: body.allowEmpty,
      });

      res.status(201).json({
        success: true,
        message: `Planned ${schedule.entries.length} post(s)`,
        data: { schedule },
      });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Calendar view over a date window
   * GET /planner/schedule?start=YYYY-MM-DD&end=YYYY-MM-DD
   */
  getSchedule = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const businessId = requireBusinessId(req);
      const window = parseInput(dateRangeSchema, { start: req.query.start, end: req.query.end });
      const schedule = await this.planner.orchestrator.getSchedule(businessId, window);

      res.status(200).json({ success: true, data: { schedule } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Post counts by state and type
   * GET /planner/analytics
   */
  getAnalytics = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const analytics = await this.planner.orchestrator.getAnalytics(requireBusinessId(req));
      res.status(200).json({ success: true, data: { analytics } });
    } catch (error) {
      sendError(res, error, log);
    }
  };

  /**
   * Remove stale drafts
   * POST /planner/cleanup
   */
  cleanup = async (req: Request, res: Response): Promise<void> => {
    const log = createRequestLogger(req);
    try {
      const businessId = requireBusinessId(req);
      const { olderThanDays } = parseInput(cleanupBodySchema, req.body ?? {});
      const deleted = await this.planner.orchestrator.cleanupStaleDrafts(businessId, olderThanDays);

      res.status(200).json({ success: true, data: { deletedPosts: deleted } });
    } catch (error) {
      sendError(res, error, log);
    }
  };
}
