/**
 * =============================================================================
 * EMPLOYEE SERVICE - Roster import & queries
 * =============================================================================
 *
 * - importCsv(): admin uploads a CSV; it replaces the roster snapshot
 * - loadRoster(): current snapshot for the assignment engine
 * - list() / filter(): roster queries for the admin screens
 * =============================================================================
 */

import Papa from 'papaparse';
import { logger } from '../../shared/services/logger.service';
import { JsonFileStore } from '../../shared/database/json-file.store';
import {
  availabilityMatches,
  normalizeText
} from '../../shared/utils/validation.utils';
import {
  BadRequestError,
  DataFileCorruptedError,
  EmployeeDataNotFoundError
} from '../../core/errors/AppError';
import { ErrorCode } from '../../core/constants';
import {
  EmployeeRecord,
  RosterFilter,
  RosterQuery,
  employeeRecordSchema,
  rosterFileSchema
} from './employee.schema';

export interface RosterImportResult {
  count: number;
  file: string;
}

export class EmployeeService {
  constructor(private readonly store: JsonFileStore) {}

  // ===========================================================================
  // IMPORT
  // ===========================================================================

  /**
   * Parse an uploaded CSV and replace the roster snapshot.
   * Header row is required; unknown columns are ignored.
   */
  async importCsv(csv: string): Promise<RosterImportResult> {
    const parsed = Papa.parse<Record<string, string>>(csv.replace(/^\uFEFF/, ''), {
      header: true,
      skipEmptyLines: 'greedy',
      transformHeader: header => header.trim()
    });

    // delimiter guessing fails on single-column files; only broken quoting is fatal
    const fatal = parsed.errors.find(error => error.type === 'Quotes');
    if (fatal) {
      throw new BadRequestError('Could not parse CSV file', ErrorCode.VALIDATION_FILE_INVALID, {
        row: fatal.row,
        reason: fatal.message
      });
    }

    const employees = parsed.data.map(row => employeeRecordSchema.parse(row));
    await this.store.write(employees);

    logger.info('Employee roster imported', { count: employees.length, file: this.store.writePath });
    return { count: employees.length, file: this.store.writePath };
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Current roster snapshot, or null when no roster file exists.
   *
   * strict=false skips unreadable candidates (the assignment engine degrades
   * to "no data"); strict=true reports them as corrupted.
   */
  async loadRoster(strict = false): Promise<EmployeeRecord[] | null> {
    const snapshot = await this.store.read({ strict });
    if (!snapshot) return null;

    const result = rosterFileSchema.safeParse(snapshot.data);
    if (!result.success) {
      if (strict) {
        throw new DataFileCorruptedError(snapshot.path, 'unexpected roster structure');
      }
      logger.warn('Roster file has unexpected structure, ignoring', { file: snapshot.path });
      return null;
    }
    return result.data;
  }

  /**
   * Whole roster with optional exact-match filters (trimmed, case-insensitive)
   */
  async list(query: RosterQuery): Promise<EmployeeRecord[]> {
    const roster = await this.requireRoster();
    return roster.filter(employee =>
      matchesExactly(employee.availability, query.availability) &&
      matchesExactly(employee.skill, query.skill) &&
      matchesExactly(employee.problemCategory, query.problemCategory)
    );
  }

  /**
   * Employees for one problem category, optionally narrowed by availability.
   * Availability uses token classes (yes/true/1/... vs no/false/0/...).
   */
  async filter(filter: RosterFilter): Promise<EmployeeRecord[]> {
    const roster = await this.requireRoster();
    const wanted = normalizeText(filter.problemCategory);

    return roster.filter(employee =>
      normalizeText(employee.problemCategory) === wanted &&
      availabilityMatches(employee.availability, filter.availability)
    );
  }

  private async requireRoster(): Promise<EmployeeRecord[]> {
    const roster = await this.loadRoster(true);
    if (!roster) {
      throw new EmployeeDataNotFoundError();
    }
    return roster;
  }
}

function matchesExactly(value: string, wanted: string | undefined): boolean {
  return wanted === undefined || normalizeText(value) === normalizeText(wanted);
}
