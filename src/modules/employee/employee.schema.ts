/**
 * =============================================================================
 * EMPLOYEE MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Roster records come from admin CSV uploads and are persisted as JSON.
 * Older exports use snake_case headers (e_id, problem_occured); both
 * spellings are accepted and normalized to the camelCase fields below.
 * =============================================================================
 */

import { z } from 'zod';
import {
  looseTextSchema,
  optionalTextSchema,
  requiredTextSchema,
  withFieldAliases
} from '../../shared/utils/validation.utils';

export const EMPLOYEE_FIELD_ALIASES: Readonly<Record<string, string>> = {
  e_id: 'eId',
  id: 'eId',
  problem_occured: 'problemCategory',
  problem_occurred: 'problemCategory',
  problem: 'problemCategory'
};

/**
 * One roster row. Every field is kept as text; availability stays free text
 * and is normalized only when it is used.
 */
export const employeeRecordSchema = z.preprocess(
  withFieldAliases(EMPLOYEE_FIELD_ALIASES),
  z.object({
    eId: looseTextSchema,
    name: looseTextSchema,
    skill: looseTextSchema,
    problemCategory: looseTextSchema,
    availability: looseTextSchema
  })
);

/**
 * Roster file: a bare array, or { employees: [...] }
 */
export const rosterFileSchema = z.union([
  z.array(employeeRecordSchema),
  z.object({ employees: z.array(employeeRecordSchema) }).transform(file => file.employees)
]);

/**
 * GET /employees query
 */
export const rosterQuerySchema = z.preprocess(
  withFieldAliases(EMPLOYEE_FIELD_ALIASES),
  z.object({
    availability: optionalTextSchema,
    skill: optionalTextSchema,
    problemCategory: optionalTextSchema
  })
);

/**
 * GET|POST /employees/filter (query first, JSON body as fallback)
 */
export const rosterFilterSchema = z.preprocess(
  withFieldAliases(EMPLOYEE_FIELD_ALIASES),
  z.object({
    problemCategory: requiredTextSchema,
    availability: optionalTextSchema
  })
);

// Type exports
export type EmployeeRecord = z.infer<typeof employeeRecordSchema>;
export type RosterQuery = z.infer<typeof rosterQuerySchema>;
export type RosterFilter = z.infer<typeof rosterFilterSchema>;
