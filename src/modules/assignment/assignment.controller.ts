/**
 * =============================================================================
 * ASSIGNMENT MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { AssignmentService } from './assignment.service';
import { employeeRouteRequestSchema } from './assignment.schema';

export class AssignmentController {
  constructor(private readonly assignmentService: AssignmentService) {}

  /**
   * All current assignments
   */
  getAssignments = asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
    const assignments = await this.assignmentService.currentAssignments();

    res.json(successResponse(assignments, { total: assignments.length }));
  });

  /**
   * Visiting order and distance for one employee
   */
  getRoute = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const request = validateSchema(employeeRouteRequestSchema, req.body ?? {});

    const route = await this.assignmentService.routeForEmployee(request);

    res.json(successResponse(route));
  });

  /**
   * Rendered map for one employee
   */
  getMap = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const request = validateSchema(employeeRouteRequestSchema, req.body ?? {});

    const map = await this.assignmentService.mapForEmployee(request);

    res.json(successResponse(map));
  });

  /**
   * Route and map in one call
   */
  getPlan = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const request = validateSchema(employeeRouteRequestSchema, req.body ?? {});

    const plan = await this.assignmentService.planForEmployee(request);

    res.json(successResponse(plan));
  });
}
