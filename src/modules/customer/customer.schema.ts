/**
 * =============================================================================
 * CUSTOMER MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * A "customer" record is one service ticket: who reported it, where, how to
 * reach them and what kind of problem it is.
 * =============================================================================
 */

import { z } from 'zod';
import {
  looseTextSchema,
  optionalTextSchema,
  requiredTextSchema,
  withFieldAliases
} from '../../shared/utils/validation.utils';

export const TICKET_FIELD_ALIASES: Readonly<Record<string, string>> = {
  ticket_number: 'ticketNumber',
  problem_occured: 'problemCategory',
  problem_occurred: 'problemCategory'
};

/**
 * Stored ticket
 */
export const ticketRecordSchema = z.preprocess(
  withFieldAliases(TICKET_FIELD_ALIASES),
  z.object({
    username: looseTextSchema,
    ticketNumber: looseTextSchema,
    location: looseTextSchema,
    contact: looseTextSchema,
    problemCategory: looseTextSchema
  })
);

export const ticketMetadataSchema = z.object({
  totalCustomers: z.number().int().nonnegative().optional(),
  locationsCount: z.number().int().nonnegative().optional(),
  problemTypes: z.array(z.string()).optional(),
  createdDate: z.string().optional(),
  updatedAt: z.string().optional()
}).passthrough();

/**
 * Ticket file: { customers: [...], metadata: {...} } or a bare array
 */
export const ticketFileSchema = z.union([
  z.object({
    customers: z.array(ticketRecordSchema),
    metadata: z.preprocess(
      withFieldAliases({
        total_customers: 'totalCustomers',
        locations_count: 'locationsCount',
        problem_types: 'problemTypes',
        created_date: 'createdDate'
      }),
      ticketMetadataSchema
    ).optional()
  }),
  z.array(ticketRecordSchema).transform(customers => ({ customers, metadata: undefined }))
]);

/**
 * POST /customers
 */
export const createTicketSchema = z.preprocess(
  withFieldAliases(TICKET_FIELD_ALIASES),
  z.object({
    username: requiredTextSchema,
    location: requiredTextSchema,
    // phone numbers often arrive as JSON numbers
    contact: z.union([z.string(), z.number()]).transform(String).pipe(requiredTextSchema),
    problemCategory: requiredTextSchema
  })
);

/**
 * GET /customers
 */
export const listTicketsQuerySchema = z.object({
  username: optionalTextSchema,
  ticketNumber: optionalTextSchema
});

// Type exports
export type TicketRecord = z.infer<typeof ticketRecordSchema>;
export type TicketMetadata = z.infer<typeof ticketMetadataSchema>;
export type TicketFile = z.infer<typeof ticketFileSchema>;
export type CreateTicketInput = z.infer<typeof createTicketSchema>;
export type ListTicketsQuery = z.infer<typeof listTicketsQuerySchema>;
