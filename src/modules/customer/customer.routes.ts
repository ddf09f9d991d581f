/**
 * =============================================================================
 * CUSTOMER ROUTES - Support tickets
 * =============================================================================
 *
 * Each customer request becomes a ticket with a generated number (T0001...).
 * Ticket locations feed the assignment engine.
 * =============================================================================
 */

import { Router, Request, Response, NextFunction } from 'express';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { HTTP_STATUS } from '../../core/constants';
import { CustomerService } from './customer.service';
import { createTicketSchema, listTicketsQuerySchema } from './customer.schema';

export function createCustomerRouter(customerService: CustomerService): Router {
  const router = Router();

  /**
   * @route   POST /customers
   * @desc    Create a ticket (username, location, contact, problemCategory)
   */
  router.post(
    '/',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const input = validateSchema(createTicketSchema, req.body ?? {});

        const ticket = await customerService.createTicket(input);

        res.status(HTTP_STATUS.CREATED).json(successResponse({
          message: 'Ticket created',
          ticket
        }));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * @route   GET /customers
   * @desc    List tickets, optional exact username / ticketNumber filters
   */
  router.get(
    '/',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = validateSchema(listTicketsQuerySchema, req.query);

        const customers = await customerService.listTickets(query);

        res.json(successResponse({ customers, count: customers.length }));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
