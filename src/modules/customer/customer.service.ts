/**
 * =============================================================================
 * CUSTOMER SERVICE - Ticket creation & listing
 * =============================================================================
 *
 * Tickets live in a single JSON snapshot:
 *
 *   {
 *     "customers": [{ "username": ..., "ticketNumber": "T0001", ... }],
 *     "metadata":  { "totalCustomers": 1, "locationsCount": 1, ... }
 *   }
 *
 * Ticket numbers are "T" + zero-padded sequence, one above the highest
 * existing number. Creation runs under the store mutex so two requests
 * never get the same number.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { JsonFileStore } from '../../shared/database/json-file.store';
import { DataFileCorruptedError } from '../../core/errors/AppError';
import { TICKET_NUMBER } from '../../core/constants';
import {
  CreateTicketInput,
  ListTicketsQuery,
  TicketFile,
  TicketMetadata,
  TicketRecord,
  ticketFileSchema
} from './customer.schema';

const TICKET_NUMBER_PATTERN = new RegExp(`^${TICKET_NUMBER.PREFIX}(\\d+)$`);

/**
 * Next free ticket number for the given tickets (T0001 for none)
 */
export function nextTicketNumber(tickets: readonly Pick<TicketRecord, 'ticketNumber'>[]): string {
  let max = 0;
  for (const { ticketNumber } of tickets) {
    const match = TICKET_NUMBER_PATTERN.exec(ticketNumber);
    if (match) {
      max = Math.max(max, parseInt(match[1], 10));
    }
  }
  return `${TICKET_NUMBER.PREFIX}${String(max + 1).padStart(TICKET_NUMBER.PAD_LENGTH, '0')}`;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

function buildMetadata(customers: readonly TicketRecord[], previous?: TicketMetadata): TicketMetadata {
  return {
    ...previous,
    totalCustomers: customers.length,
    locationsCount: new Set(customers.map(c => c.location)).size,
    problemTypes: [...new Set(customers.map(c => c.problemCategory))],
    createdDate: previous?.createdDate ?? today(),
    updatedAt: new Date().toISOString()
  };
}

export class CustomerService {
  constructor(private readonly store: JsonFileStore) {}

  /**
   * Create a ticket with a freshly generated ticket number
   */
  async createTicket(input: CreateTicketInput): Promise<TicketRecord> {
    const ticket = await this.store.update(current => {
      const file = current === null ? emptyTicketFile() : parseTicketFile(current, this.store.writePath);

      const created: TicketRecord = {
        username: input.username,
        ticketNumber: nextTicketNumber(file.customers),
        location: input.location,
        contact: input.contact,
        problemCategory: input.problemCategory
      };
      const customers = [...file.customers, created];

      return {
        data: { customers, metadata: buildMetadata(customers, file.metadata) },
        result: created
      };
    });

    logger.info('Ticket created', {
      ticketNumber: ticket.ticketNumber,
      location: ticket.location,
      problemCategory: ticket.problemCategory
    });
    return ticket;
  }

  /**
   * List tickets with optional exact filters
   */
  async listTickets(query: ListTicketsQuery): Promise<TicketRecord[]> {
    const tickets = (await this.loadTickets()) ?? [];
    return tickets.filter(ticket =>
      (query.username === undefined || ticket.username === query.username) &&
      (query.ticketNumber === undefined || ticket.ticketNumber === query.ticketNumber)
    );
  }

  /**
   * Current ticket snapshot, or null when there is no usable ticket file
   */
  async loadTickets(): Promise<TicketRecord[] | null> {
    const snapshot = await this.store.read();
    if (!snapshot) return null;

    const result = ticketFileSchema.safeParse(snapshot.data);
    if (!result.success) {
      logger.warn('Ticket file has unexpected structure, ignoring', { file: snapshot.path });
      return null;
    }
    return result.data.customers;
  }
}

function emptyTicketFile(): TicketFile {
  return { customers: [], metadata: undefined };
}

function parseTicketFile(data: unknown, file: string): TicketFile {
  const result = ticketFileSchema.safeParse(data);
  if (!result.success) {
    throw new DataFileCorruptedError(file, 'unexpected ticket file structure');
  }
  return result.data;
}
