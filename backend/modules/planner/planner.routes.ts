import { Router } from "express";
import { PlannerController } from "./planner.controller.js";
import type { Planner } from "../../services/planner/index.js";

export function createPlannerRoutes(planner: Planner): Router {
  const router = Router();
  const plannerController = new PlannerController(planner);

  /**
   * @route   POST /planner/plan
   * @desc    Allocate candidates to calendar slots and create their posts
   * @access  Private (requires token)
   */
  router.post("/plan", plannerController.plan);

  /**
   * @route   GET /planner/schedule
   * @desc    Get the schedule for a date window
   * @access  Private (requires token)
   */
  router.get("/schedule", plannerController.getSchedule);

  /**
   * @route   GET /planner/analytics
   * @desc    Get post counts by state and post type
   * @access  Private (requires token)
   */
  router.get("/analytics", plannerController.getAnalytics);

  /**
   * @route   POST /planner/cleanup
   * @desc    Delete drafts older than the retention period
   * @access  Private (requires token)
   */
  router.post("/cleanup", plannerController.cleanup);

  return router;
}
