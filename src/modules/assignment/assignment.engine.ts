/**
 * =============================================================================
 * ASSIGNMENT ENGINE - Employees ↔ ticket locations
 * =============================================================================
 *
 * Pure functions over in-memory snapshots; no I/O, no shared state.
 *
 * RULES:
 * - Only employees whose availability normalizes to a truthy token qualify
 * - An employee receives every ticket location whose problem category equals
 *   theirs (trimmed, case-insensitive), in ticket order, duplicates kept
 * - Employees with nothing to visit are left out (not an error)
 * - Output follows employee input order
 *
 * Locations are NOT filtered by geocode presence here; the route planner
 * reports unresolvable ones.
 * =============================================================================
 */

import { isAvailable, normalizeText } from '../../shared/utils/validation.utils';
import { EmployeeLookup } from '../../core/errors/AppError';
import { Assignment, AssignableEmployee, AssignableTicket } from './assignment.schema';

/**
 * Group ticket locations by normalized problem category.
 * Tickets without a location or category are skipped.
 */
export function groupLocationsByCategory(
  tickets: readonly AssignableTicket[]
): Map<string, string[]> {
  const byCategory = new Map<string, string[]>();

  for (const ticket of tickets) {
    const category = normalizeText(ticket.problemCategory);
    if (!ticket.location || !category) continue;

    const locations = byCategory.get(category);
    if (locations) {
      locations.push(ticket.location);
    } else {
      byCategory.set(category, [ticket.location]);
    }
  }

  return byCategory;
}

/**
 * Match available employees to the ticket locations of their category
 */
export function assign(
  employees: readonly AssignableEmployee[],
  tickets: readonly AssignableTicket[]
): Assignment[] {
  const byCategory = groupLocationsByCategory(tickets);
  const assignments: Assignment[] = [];

  for (const employee of employees) {
    if (!isAvailable(employee.availability)) continue;

    const locations = byCategory.get(normalizeText(employee.problemCategory));
    if (!locations || locations.length === 0) continue;

    assignments.push({
      eId: employee.eId,
      name: employee.name,
      problemCategory: employee.problemCategory,
      // each assignment owns its list
      assignedLocations: [...locations]
    });
  }

  return assignments;
}

/**
 * Pick one assignment by employee id (exact) or, without an id, by name
 * (trimmed, case-insensitive). First match wins.
 */
export function findAssignment(
  assignments: readonly Assignment[],
  lookup: EmployeeLookup
): Assignment | undefined {
  if (lookup.eId !== undefined) {
    return assignments.find(a => a.eId === lookup.eId);
  }
  if (lookup.name !== undefined) {
    const wanted = normalizeText(lookup.name);
    return assignments.find(a => normalizeText(a.name) === wanted);
  }
  return undefined;
}
