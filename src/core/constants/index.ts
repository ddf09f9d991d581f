/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// AVAILABILITY TOKENS
// =============================================================================

/**
 * Free-text availability values that count as "available".
 * Compared after trim + lower-case.
 */
export const AVAILABLE_TOKENS: ReadonlySet<string> = new Set([
  'yes',
  'true',
  '1',
  'available',
  'y'
]);

/**
 * Free-text availability values that count as "not available".
 * Only used by roster filters; the assignment engine treats anything outside
 * AVAILABLE_TOKENS as unavailable.
 */
export const UNAVAILABLE_TOKENS: ReadonlySet<string> = new Set([
  'no',
  'false',
  '0',
  'n'
]);

// =============================================================================
// ROUTING
// =============================================================================

export const ROUTING = {
  /** Decimal places kept on reported distances */
  DISTANCE_DECIMALS: 2,
  /** Initial zoom of rendered route maps */
  MAP_ZOOM: 12
} as const;

// =============================================================================
// TICKETS
// =============================================================================

export const TICKET_NUMBER = {
  PREFIX: 'T',
  /** Numeric part is zero-padded to this width (T0001) */
  PAD_LENGTH: 4
} as const;

// =============================================================================
// UPLOADS
// =============================================================================

export const ROSTER_UPLOAD = {
  /** Multipart field names accepted for the roster CSV */
  FIELD_NAMES: ['file', 'csv', 'upload'],
  ALLOWED_EXTENSIONS: ['.csv']
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  UNPROCESSABLE: 422,
  INTERNAL_ERROR: 500
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 2xxx: Validation errors
 * - 3xxx: Assignment & routing
 * - 4xxx: Roster & tickets
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // Validation (2xxx)
  VALIDATION_ERROR = 'VAL_2001',
  VALIDATION_REQUIRED_FIELD = 'VAL_2003',
  VALIDATION_FILE_INVALID = 'VAL_2008',

  // Assignment & routing (3xxx)
  EMPLOYEE_NOT_ASSIGNED = 'ASG_3001',
  NO_ROUTABLE_LOCATIONS = 'ASG_3002',

  // Roster & tickets (4xxx)
  EMPLOYEE_DATA_NOT_FOUND = 'DATA_4001',
  TICKET_DATA_NOT_FOUND = 'DATA_4002',
  DATA_FILE_CORRUPTED = 'DATA_4003',

  // System (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  STORAGE_ERROR = 'SYS_9004'
}
