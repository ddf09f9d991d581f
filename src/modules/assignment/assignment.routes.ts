/**
 * =============================================================================
 * ASSIGNMENT MODULE - ROUTES
 * =============================================================================
 *
 * Assignments are derived from the roster and ticket snapshots; nothing is
 * created or stored through these endpoints.
 * =============================================================================
 */

import { Router } from 'express';
import { AssignmentController } from './assignment.controller';
import { AssignmentService } from './assignment.service';

export function createAssignmentRouter(assignmentService: AssignmentService): Router {
  const router = Router();
  const controller = new AssignmentController(assignmentService);

  /**
   * @route   GET /assignments
   * @desc    Every available employee with their assigned locations
   */
  router.get('/', controller.getAssignments);

  /**
   * @route   POST /assignments/route
   * @desc    Route for one employee ({ eId } or { name }, optional depot)
   */
  router.post('/route', controller.getRoute);

  /**
   * @route   POST /assignments/map
   * @desc    HTML map of one employee's route
   */
  router.post('/map', controller.getMap);

  /**
   * @route   POST /assignments/plan
   * @desc    Route + map
   */
  router.post('/plan', controller.getPlan);

  return router;
}
