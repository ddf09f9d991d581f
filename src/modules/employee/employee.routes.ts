/**
 * =============================================================================
 * EMPLOYEE MODULE - ROUTES
 * =============================================================================
 *
 * Roster upload and queries.
 * =============================================================================
 */

import * as path from 'path';
import { Router } from 'express';
import multer from 'multer';
import { config } from '../../config/environment';
import { BadRequestError } from '../../core/errors/AppError';
import { ErrorCode, ROSTER_UPLOAD } from '../../core/constants';
import { EmployeeController } from './employee.controller';
import { EmployeeService } from './employee.service';

// CSV kept in memory; parsed and written as a JSON snapshot
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: config.upload.maxBytes },
  fileFilter: (_req, file, cb) => {
    const extension = path.extname(file.originalname).toLowerCase();
    if (ROSTER_UPLOAD.ALLOWED_EXTENSIONS.some(allowed => allowed === extension)) {
      cb(null, true);
    } else {
      cb(new BadRequestError('Only .csv files are allowed', ErrorCode.VALIDATION_FILE_INVALID, {
        originalName: file.originalname
      }));
    }
  }
});

export function createEmployeeRouter(employeeService: EmployeeService): Router {
  const router = Router();
  const controller = new EmployeeController(employeeService);

  /**
   * @route   POST /employees/upload
   * @desc    Upload roster CSV (multipart field file | csv | upload)
   */
  router.post(
    '/upload',
    upload.fields(ROSTER_UPLOAD.FIELD_NAMES.map(name => ({ name, maxCount: 1 }))),
    controller.uploadRoster
  );

  /**
   * @route   GET /employees
   * @desc    Roster with optional availability / skill / problemCategory filters
   */
  router.get('/', controller.listEmployees);

  /**
   * @route   GET|POST /employees/filter
   * @desc    Employees for a problem category, optionally by availability
   */
  router.get('/filter', controller.filterEmployees);
  router.post('/filter', controller.filterEmployees);

  return router;
}
