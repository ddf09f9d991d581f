/**
 * =============================================================================
 * ASSIGNMENT MODULE - SCHEMAS & TYPES
 * =============================================================================
 */

import { z } from 'zod';
import { optionalTextSchema, withFieldAliases } from '../../shared/utils/validation.utils';

/**
 * What the engine needs from a roster row
 */
export interface AssignableEmployee {
  eId: string;
  name: string;
  problemCategory: string;
  availability: string;
}

/**
 * What the engine needs from a ticket
 */
export interface AssignableTicket {
  location: string;
  problemCategory: string;
}

/**
 * Derived pairing of an available employee with the locations to visit.
 * Never persisted; recomputed from the current snapshots on every request.
 */
export interface Assignment {
  eId: string;
  name: string;
  problemCategory: string;
  assignedLocations: string[];
}

/**
 * Body of POST /assignments/route | /map | /plan
 *
 * eId takes precedence over name. Numeric ids are accepted and compared as
 * strings.
 */
export const employeeRouteRequestSchema = z.preprocess(
  withFieldAliases({ e_id: 'eId' }),
  z.object({
    eId: z.union([z.string(), z.number()])
      .optional()
      .transform(value => (value === undefined ? undefined : String(value)))
      .pipe(optionalTextSchema),
    name: optionalTextSchema,
    depot: optionalTextSchema
  }).refine(body => body.eId !== undefined || body.name !== undefined, {
    message: 'Provide eId or name in JSON body',
    path: ['eId']
  })
);

// Type exports
export type EmployeeRouteRequest = z.infer<typeof employeeRouteRequestSchema>;
