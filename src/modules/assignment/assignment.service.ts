/**
 * =============================================================================
 * ASSIGNMENT SERVICE
 * =============================================================================
 *
 * Ties the snapshots to the pure engine and the route planner:
 *
 *   roster + tickets ──assign()──► assignments
 *                                    │ findAssignment(eId | name)
 *                                    ▼
 *                     planRoute() ──► route, distanceKm, dropped
 *                                    │ buildRouteStops()
 *                                    ▼
 *                     renderRoute() ─► mapHtml
 *
 * Assignments are recomputed on every call from whatever is on disk, so a
 * fresh roster upload or a new ticket shows up on the next request.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import {
  EmployeeDataNotFoundError,
  EmployeeNotAssignedError,
  NoRoutableLocationsError,
  TicketDataNotFoundError
} from '../../core/errors/AppError';
import { Geocache } from '../geocache/geocache.service';
import { EmployeeService } from '../employee/employee.service';
import { CustomerService } from '../customer/customer.service';
import { RouteRenderer, buildRouteStops, planRoute, renderRoute } from '../routing';
import { assign, findAssignment } from './assignment.engine';
import { Assignment, EmployeeRouteRequest } from './assignment.schema';

export interface AssignmentServiceDeps {
  employees: EmployeeService;
  customers: CustomerService;
  geocache: Geocache;
  renderer: RouteRenderer;
}

export interface EmployeeRoute {
  eId: string;
  name: string;
  route: string[];
  distanceKm: number;
  dropped: string[];
}

export interface EmployeeMap {
  eId: string;
  name: string;
  distanceKm: number;
  mapHtml: string;
}

export interface EmployeePlan extends EmployeeRoute {
  mapHtml: string | null;
}

export class AssignmentService {
  constructor(private readonly deps: AssignmentServiceDeps) {}

  /**
   * Assignments for the current roster and ticket snapshots
   */
  async currentAssignments(): Promise<Assignment[]> {
    const [employees, tickets] = await Promise.all([
      this.deps.employees.loadRoster(),
      this.deps.customers.loadTickets()
    ]);

    if (!employees || employees.length === 0) {
      throw new EmployeeDataNotFoundError();
    }
    if (!tickets || tickets.length === 0) {
      throw new TicketDataNotFoundError();
    }

    return assign(employees, tickets);
  }

  async routeForEmployee(request: EmployeeRouteRequest): Promise<EmployeeRoute> {
    const assignment = await this.requireAssignment(request);
    const plan = planRoute(assignment.assignedLocations, this.deps.geocache, request.depot);

    if (plan.dropped.length > 0) {
      logger.warn('Locations missing from geocache', { eId: assignment.eId, dropped: plan.dropped });
    }

    return {
      eId: assignment.eId,
      name: assignment.name,
      route: plan.route,
      distanceKm: plan.distanceKm,
      dropped: plan.dropped
    };
  }

  /**
   * Rendered map for one employee. An employee whose locations all fail to
   * resolve is reported as NoRoutableLocationsError, not as an empty map.
   */
  async mapForEmployee(request: EmployeeRouteRequest): Promise<EmployeeMap> {
    const { mapHtml, ...route } = await this.planForEmployee(request);
    if (mapHtml === null) {
      throw new NoRoutableLocationsError(route.eId, route.dropped);
    }

    return { eId: route.eId, name: route.name, distanceKm: route.distanceKm, mapHtml };
  }

  async planForEmployee(request: EmployeeRouteRequest): Promise<EmployeePlan> {
    const route = await this.routeForEmployee(request);
    const stops = buildRouteStops(route.route, this.deps.geocache);
    const mapHtml = renderRoute(stops, this.deps.renderer, {
      title: `Route for ${route.name || route.eId}`,
      totalDistanceKm: route.distanceKm
    });

    return { ...route, mapHtml };
  }

  private async requireAssignment(request: EmployeeRouteRequest): Promise<Assignment> {
    const lookup = { eId: request.eId, name: request.name };
    const assignment = findAssignment(await this.currentAssignments(), lookup);
    if (!assignment) {
      throw new EmployeeNotAssignedError(lookup);
    }
    return assignment;
  }
}
