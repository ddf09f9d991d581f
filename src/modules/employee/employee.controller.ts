/**
 * =============================================================================
 * EMPLOYEE MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { isPlainRecord, validateSchema, withFieldAliases } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { BadRequestError } from '../../core/errors/AppError';
import { ErrorCode, HTTP_STATUS, ROSTER_UPLOAD } from '../../core/constants';
import { EmployeeService } from './employee.service';
import { EMPLOYEE_FIELD_ALIASES, rosterFilterSchema, rosterQuerySchema } from './employee.schema';

/**
 * First file sent under any accepted field name
 */
function pickUploadedFile(req: Request): Express.Multer.File | undefined {
  if (!req.files || Array.isArray(req.files)) {
    return undefined;
  }
  for (const field of ROSTER_UPLOAD.FIELD_NAMES) {
    const file = req.files[field]?.[0];
    if (file) return file;
  }
  return undefined;
}

const aliasEmployeeFields = withFieldAliases(EMPLOYEE_FIELD_ALIASES);

/**
 * Filter criteria resolved per field: a non-blank query value wins, the JSON
 * body fills in the rest
 */
function resolveFilterCriteria(query: unknown, body: unknown): Record<string, unknown> {
  const fromBody = aliasEmployeeFields(body);
  const fromQuery = aliasEmployeeFields(query);
  const criteria: Record<string, unknown> = isPlainRecord(fromBody) ? { ...fromBody } : {};

  if (isPlainRecord(fromQuery)) {
    for (const [field, value] of Object.entries(fromQuery)) {
      if (value === undefined || (typeof value === 'string' && value.trim() === '')) continue;
      criteria[field] = value;
    }
  }
  return criteria;
}

export class EmployeeController {
  constructor(private readonly employeeService: EmployeeService) {}

  /**
   * Replace the roster with an uploaded CSV
   */
  uploadRoster = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const file = pickUploadedFile(req);
    if (!file) {
      throw new BadRequestError(
        `No file uploaded (use field ${ROSTER_UPLOAD.FIELD_NAMES.join(', ')})`,
        ErrorCode.VALIDATION_REQUIRED_FIELD
      );
    }

    const result = await this.employeeService.importCsv(file.buffer.toString('utf-8'));

    res.status(HTTP_STATUS.CREATED).json(successResponse({
      message: 'Employee roster uploaded',
      originalName: file.originalname,
      count: result.count,
      file: result.file
    }));
  });

  listEmployees = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const query = validateSchema(rosterQuerySchema, req.query);

    const employees = await this.employeeService.list(query);

    res.json(successResponse({ employees, count: employees.length }));
  });

  /**
   * Category filter; accepts the criteria as query string (GET) or JSON (POST),
   * with query values taking precedence over the body
   */
  filterEmployees = asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
    const criteria: unknown = req.method === 'POST' ? resolveFilterCriteria(req.query, req.body) : req.query;
    const filter = validateSchema(rosterFilterSchema, criteria);

    const employees = await this.employeeService.filter(filter);

    res.json(successResponse({
      problemCategory: filter.problemCategory,
      availability: filter.availability ?? null,
      employees,
      count: employees.length
    }));
  });
}
