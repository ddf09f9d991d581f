/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors/AppError';
import { AVAILABLE_TOKENS, UNAVAILABLE_TOKENS } from '../../core/constants';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Free-text field as it arrives from CSV or hand-edited JSON: strings,
 * numbers and booleans are all kept as their string form, missing → ''
 */
export const looseTextSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform(value => (value === null || value === undefined ? '' : String(value)));

/**
 * Non-empty trimmed string
 */
export const requiredTextSchema = z.string().trim().min(1, 'Required');

/**
 * Optional trimmed string; blank values count as absent
 */
export const optionalTextSchema = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Preprocessor that renames legacy keys (snake_case exports, CSV headers)
 * to the canonical field names. Keys are trimmed; the first occurrence of a
 * field wins when both spellings are present.
 */
export function withFieldAliases(aliases: Readonly<Record<string, string>>) {
  return (value: unknown): unknown => {
    if (!isPlainRecord(value)) {
      return value;
    }

    const renamed: Record<string, unknown> = {};
    for (const [rawKey, fieldValue] of Object.entries(value)) {
      const key = rawKey.trim();
      const target = aliases[key] ?? key;
      if (renamed[target] === undefined) {
        renamed[target] = fieldValue;
      }
    }
    return renamed;
  };
}

// ============================================================
// VALIDATION
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = result.error.errors.map(e => ({
      field: e.path.join('.'),
      message: e.message
    }));
    throw new ValidationError('Invalid request data', details);
  }
  return result.data;
}

// ============================================================
// TEXT NORMALIZATION
// ============================================================

/**
 * Trim + lower-case, with null/undefined treated as ''
 */
export function normalizeText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value).trim().toLowerCase();
}

/**
 * True when free-text availability means "available"
 */
export function isAvailable(availability: unknown): boolean {
  return AVAILABLE_TOKENS.has(normalizeText(availability));
}

/**
 * Flexible availability match used by roster filters:
 * - desired value in the truthy class → employee must be truthy
 * - desired value in the falsy class → employee must be falsy
 * - anything else → substring match on the normalized text
 */
export function availabilityMatches(employeeAvailability: unknown, desired: unknown): boolean {
  const wanted = normalizeText(desired);
  if (!wanted) return true;

  const actual = normalizeText(employeeAvailability);
  if (AVAILABLE_TOKENS.has(wanted)) return AVAILABLE_TOKENS.has(actual);
  if (UNAVAILABLE_TOKENS.has(wanted)) return UNAVAILABLE_TOKENS.has(actual);
  return actual.includes(wanted);
}
