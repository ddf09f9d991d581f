/**
 * =============================================================================
 * FIELD DISPATCH BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Matches available field employees to customer tickets by problem category
 * and plans a visiting route over the ticket locations.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ EMPLOYEE   │ Roster CSV upload, roster queries                          │
 * │ CUSTOMER   │ Ticket creation with generated ticket numbers              │
 * │ GEOCACHE   │ Location name → coordinates, loaded once at startup        │
 * │ ASSIGNMENT │ Employees ↔ ticket locations, derived per request          │
 * │ ROUTING    │ Nearest-neighbour route + Leaflet HTML map                 │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import { createServer } from 'http';

import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { JsonFileStore } from './shared/database/json-file.store';
import { Geocache } from './modules/geocache/geocache.service';
import { EmployeeService } from './modules/employee/employee.service';
import { CustomerService } from './modules/customer/customer.service';
import { AssignmentService } from './modules/assignment/assignment.service';
import { LeafletHtmlRenderer } from './modules/routing';
import { createApp } from './app';

// =============================================================================
// ENVIRONMENT VALIDATION (Fail fast if config is invalid)
// =============================================================================
validateAndLogEnvironment();

// =============================================================================
// SERVICES
// =============================================================================

const geocache = Geocache.fromCandidates(config.geocacheCandidates);
const employeeService = new EmployeeService(new JsonFileStore('employees', config.employeeCandidates));
const customerService = new CustomerService(new JsonFileStore('customers', config.customerCandidates));
const assignmentService = new AssignmentService({
  employees: employeeService,
  customers: customerService,
  geocache,
  renderer: new LeafletHtmlRenderer()
});

const app = createApp({ geocache, employeeService, customerService, assignmentService });
const server = createServer(app);

// =============================================================================
// START SERVER
// =============================================================================

server.listen(config.port, config.host, () => {
  server.timeout = 30000; // 30s max request time

  logger.info(`Server started on ${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    geocacheLocations: geocache.size,
    roster: config.employeeCandidates[0],
    tickets: config.customerCandidates[0]
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const gracefulShutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
