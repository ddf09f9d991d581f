/**
 * =============================================================================
 * CUSTOMER SERVICE - Unit Tests
 * =============================================================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CustomerService, nextTicketNumber } from '../modules/customer/customer.service';
import { JsonFileStore } from '../shared/database/json-file.store';
import { DataFileCorruptedError } from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('nextTicketNumber', () => {
  it('starts at T0001', () => {
    expect(nextTicketNumber([])).toBe('T0001');
  });

  it('continues after the highest well-formed number', () => {
    expect(nextTicketNumber([
      { ticketNumber: 'T0009' },
      { ticketNumber: 'X0500' },
      { ticketNumber: 'T0010' },
      { ticketNumber: '' }
    ])).toBe('T0011');
  });

  it('grows past the padding width', () => {
    expect(nextTicketNumber([{ ticketNumber: 'T9999' }])).toBe('T10000');
  });
});

describe('CustomerService', () => {
  let dir: string;
  let ticketFile: string;
  let service: CustomerService;

  const readFile = (): unknown => JSON.parse(fs.readFileSync(ticketFile, 'utf-8'));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickets-'));
    ticketFile = path.join(dir, 'customers_data.json');
    service = new CustomerService(new JsonFileStore('customers', [ticketFile]));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('createTicket', () => {
    it('creates the ticket file with metadata', async () => {
      await service.createTicket({ username: 'asha', location: 'Madhapur', contact: '9000000001', problemCategory: 'Electrical' });
      const ticket = await service.createTicket({ username: 'ben', location: 'Madhapur', contact: '9000000002', problemCategory: 'Plumbing' });

      expect(ticket).toEqual({
        username: 'ben',
        ticketNumber: 'T0002',
        location: 'Madhapur',
        contact: '9000000002',
        problemCategory: 'Plumbing'
      });
      expect(readFile()).toEqual({
        customers: [
          { username: 'asha', ticketNumber: 'T0001', location: 'Madhapur', contact: '9000000001', problemCategory: 'Electrical' },
          ticket
        ],
        metadata: expect.objectContaining({
          totalCustomers: 2,
          locationsCount: 1,
          problemTypes: ['Electrical', 'Plumbing']
        })
      });
    });

    it('keeps the original creation date and legacy records', async () => {
      fs.writeFileSync(ticketFile, JSON.stringify({
        customers: [{ username: 'old', ticket_number: 'T0041', location: 'Uppal', contact: 1, problem_occured: 'Electrical' }],
        metadata: { created_date: '2024-01-05' }
      }));

      const ticket = await service.createTicket({ username: 'new', location: 'Ameerpet', contact: '2', problemCategory: 'Electrical' });

      expect(ticket.ticketNumber).toBe('T0042');
      expect(readFile()).toEqual({
        customers: [
          { username: 'old', ticketNumber: 'T0041', location: 'Uppal', contact: '1', problemCategory: 'Electrical' },
          ticket
        ],
        metadata: expect.objectContaining({
          totalCustomers: 2,
          locationsCount: 2,
          problemTypes: ['Electrical'],
          createdDate: '2024-01-05'
        })
      });
    });

    it('never hands out the same number to concurrent requests', async () => {
      const tickets = await Promise.all(
        ['a', 'b', 'c', 'd', 'e'].map(username =>
          service.createTicket({ username, location: 'Madhapur', contact: '1', problemCategory: 'Electrical' })
        )
      );

      expect(tickets.map(t => t.ticketNumber).sort()).toEqual(['T0001', 'T0002', 'T0003', 'T0004', 'T0005']);
      expect(await service.loadTickets()).toHaveLength(5);
    });

    it('refuses to overwrite a corrupted ticket file', async () => {
      fs.writeFileSync(ticketFile, 'not json');

      await expect(
        service.createTicket({ username: 'a', location: 'Madhapur', contact: '1', problemCategory: 'Electrical' })
      ).rejects.toBeInstanceOf(DataFileCorruptedError);
      expect(fs.readFileSync(ticketFile, 'utf-8')).toBe('not json');
    });
  });

  describe('listTickets', () => {
    it('returns nothing when there is no ticket file', async () => {
      expect(await service.listTickets({})).toEqual([]);
      expect(await service.loadTickets()).toBeNull();
    });

    it('reads a bare array and filters exactly', async () => {
      fs.writeFileSync(ticketFile, JSON.stringify([
        { username: 'asha', ticketNumber: 'T0001', location: 'A', contact: '1', problemCategory: 'Electrical' },
        { username: 'ben', ticketNumber: 'T0002', location: 'B', contact: '2', problemCategory: 'Plumbing' },
        { username: 'asha', ticketNumber: 'T0003', location: 'C', contact: '1', problemCategory: 'Plumbing' }
      ]));

      expect((await service.listTickets({ username: 'asha' })).map(t => t.ticketNumber)).toEqual(['T0001', 'T0003']);
      expect((await service.listTickets({ ticketNumber: 'T0002' })).map(t => t.username)).toEqual(['ben']);
      expect(await service.listTickets({ username: 'Asha' })).toEqual([]);
    });
  });
});
