/**
 * =============================================================================
 * EMPLOYEE SERVICE - Unit Tests
 * =============================================================================
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EmployeeService } from '../modules/employee/employee.service';
import { JsonFileStore } from '../shared/database/json-file.store';
import { availabilityMatches } from '../shared/utils/validation.utils';
import {
  BadRequestError,
  DataFileCorruptedError,
  EmployeeDataNotFoundError
} from '../core/errors/AppError';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const ROSTER_CSV = [
  'e_id,name,skill,problem_occured,availability,email',
  'E1,Ravi,Wiring,Electrical,Yes,ravi@example.com',
  'E2,Sita,Pipes,Plumbing,no,',
  '',
  'E3,Arun,Wiring, electrical ,Available,',
  ''
].join('\n');

describe('EmployeeService', () => {
  let dir: string;
  let rosterFile: string;
  let service: EmployeeService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-'));
    rosterFile = path.join(dir, 'employees.json');
    service = new EmployeeService(new JsonFileStore('employees', [rosterFile]));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('importCsv', () => {
    it('maps legacy headers and writes the roster as JSON', async () => {
      const result = await service.importCsv(ROSTER_CSV);

      expect(result).toEqual({ count: 3, file: rosterFile });
      expect(JSON.parse(fs.readFileSync(rosterFile, 'utf-8'))).toEqual([
        { eId: 'E1', name: 'Ravi', skill: 'Wiring', problemCategory: 'Electrical', availability: 'Yes' },
        { eId: 'E2', name: 'Sita', skill: 'Pipes', problemCategory: 'Plumbing', availability: 'no' },
        { eId: 'E3', name: 'Arun', skill: 'Wiring', problemCategory: ' electrical ', availability: 'Available' }
      ]);
    });

    it('strips a byte order mark and padded headers', async () => {
      await service.importCsv('\uFEFF eId , name ,problemCategory,availability\nE7,Meena,Electrical,yes\n');

      expect(await service.loadRoster()).toEqual([
        { eId: 'E7', name: 'Meena', skill: '', problemCategory: 'Electrical', availability: 'yes' }
      ]);
    });

    it('rejects a file with broken quoting', async () => {
      await expect(service.importCsv('eId,name\nE1,"Ravi\n')).rejects.toBeInstanceOf(BadRequestError);
      expect(fs.existsSync(rosterFile)).toBe(false);
    });
  });

  describe('loadRoster', () => {
    it('returns null when no roster file exists', async () => {
      expect(await service.loadRoster()).toBeNull();
    });

    it('accepts the { employees: [...] } layout', async () => {
      fs.writeFileSync(rosterFile, JSON.stringify({ employees: [{ id: 5, name: 'Ravi', availability: true }] }));

      expect(await service.loadRoster()).toEqual([
        { eId: '5', name: 'Ravi', skill: '', problemCategory: '', availability: 'true' }
      ]);
    });

    it('ignores a corrupted file unless strict', async () => {
      fs.writeFileSync(rosterFile, '{ oops');

      expect(await service.loadRoster()).toBeNull();
      await expect(service.loadRoster(true)).rejects.toBeInstanceOf(DataFileCorruptedError);
    });
  });

  describe('list / filter', () => {
    beforeEach(async () => {
      await service.importCsv(ROSTER_CSV);
    });

    it('lists everyone without filters', async () => {
      expect((await service.list({})).map(e => e.eId)).toEqual(['E1', 'E2', 'E3']);
    });

    it('filters by exact, case-insensitive values', async () => {
      expect((await service.list({ problemCategory: 'ELECTRICAL' })).map(e => e.eId)).toEqual(['E1', 'E3']);
      expect((await service.list({ skill: 'wiring', availability: 'yes' })).map(e => e.eId)).toEqual(['E1']);
    });

    it('filters a category by availability class', async () => {
      expect((await service.filter({ problemCategory: 'electrical', availability: 'true' })).map(e => e.eId))
        .toEqual(['E1', 'E3']);
      expect((await service.filter({ problemCategory: 'Plumbing', availability: 'N' })).map(e => e.eId))
        .toEqual(['E2']);
      expect((await service.filter({ problemCategory: 'Plumbing' })).map(e => e.eId)).toEqual(['E2']);
    });

    it('fails when no roster has been uploaded', async () => {
      fs.rmSync(rosterFile);
      await expect(service.list({})).rejects.toBeInstanceOf(EmployeeDataNotFoundError);
    });
  });
});

describe('availabilityMatches', () => {
  it('matches everything when no availability is requested', () => {
    expect(availabilityMatches('No', undefined)).toBe(true);
    expect(availabilityMatches('No', '  ')).toBe(true);
  });

  it('compares token classes', () => {
    expect(availabilityMatches('Available', 'yes')).toBe(true);
    expect(availabilityMatches('no', 'yes')).toBe(false);
    expect(availabilityMatches('0', 'false')).toBe(true);
    expect(availabilityMatches('maybe', 'no')).toBe(false);
  });

  it('falls back to substring matching', () => {
    expect(availabilityMatches('Weekends only', 'weekend')).toBe(true);
    expect(availabilityMatches('Weekdays', 'weekend')).toBe(false);
  });
});
