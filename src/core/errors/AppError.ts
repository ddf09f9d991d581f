/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new EmployeeNotAssignedError({ eId: 'E1' });
 *
 * // In route handler
 * throw new BadRequestError('Provide eId or name in JSON body');
 * ```
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Bad Request - Invalid input
 */
export class BadRequestError extends AppError {
  constructor(
    message: string = 'Bad request',
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, details);
  }
}

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { fields: errors });
    this.errors = errors;
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = 'NOT_FOUND',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 422 Unprocessable Entity - Valid syntax but can't process
 */
export class UnprocessableError extends AppError {
  constructor(
    message: string = 'Cannot process request',
    code: ErrorCode | string = 'UNPROCESSABLE',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.UNPROCESSABLE, code, true, details);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal server error',
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, code, false, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Who the caller asked about: an employee id or a name
 */
export interface EmployeeLookup {
  eId?: string;
  name?: string;
}

/**
 * Roster / ticket snapshot errors
 */
export class EmployeeDataNotFoundError extends NotFoundError {
  constructor() {
    super('No employee data found. Please upload the roster first.', ErrorCode.EMPLOYEE_DATA_NOT_FOUND);
  }
}

export class TicketDataNotFoundError extends NotFoundError {
  constructor() {
    super('No customer ticket data found', ErrorCode.TICKET_DATA_NOT_FOUND);
  }
}

export class DataFileCorruptedError extends InternalError {
  constructor(file: string, reason: string) {
    super(`Data file is corrupted: ${reason}`, ErrorCode.DATA_FILE_CORRUPTED, { file });
  }
}

/**
 * The employee is unknown, unavailable or has no tickets in their category
 */
export class EmployeeNotAssignedError extends NotFoundError {
  constructor(lookup: EmployeeLookup) {
    super('Employee not found or no assigned locations', ErrorCode.EMPLOYEE_NOT_ASSIGNED, { ...lookup });
  }
}

/**
 * The employee has assignments, but none of them resolve to coordinates
 */
export class NoRoutableLocationsError extends UnprocessableError {
  constructor(eId: string, dropped: string[]) {
    super(
      'No assigned location could be resolved to coordinates',
      ErrorCode.NO_ROUTABLE_LOCATIONS,
      { eId, dropped }
    );
  }
}
