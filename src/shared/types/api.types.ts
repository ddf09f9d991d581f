/**
 * =============================================================================
 * API TYPES - SHARED CONTRACTS
 * =============================================================================
 *
 * These types define the API contract between backend and clients.
 * =============================================================================
 */

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ApiMeta;
}

/**
 * API error structure
 */
export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * API metadata (counts, etc.)
 */
export interface ApiMeta {
  total?: number;
  [key: string]: unknown;
}

/**
 * Helper to create success response
 */
export function successResponse<T>(data: T, meta?: ApiMeta): ApiResponse<T> {
  return {
    success: true,
    data,
    ...(meta && { meta })
  };
}

/**
 * Helper to create error response
 */
export function errorResponse(code: string, message: string, details?: Record<string, unknown>): ApiResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details })
    }
  };
}
