/**
 * =============================================================================
 * EXPRESS APP
 * =============================================================================
 *
 * Builds the HTTP app from already-constructed services so tests can pass
 * their own stores and geocache.
 *
 * ROUTES:
 * ┌──────────────┬──────────────────────────────────────────────────────────┐
 * │ /health      │ liveness + geocache size                                 │
 * │ /employees   │ roster upload (CSV) and queries                          │
 * │ /customers   │ ticket creation and listing                              │
 * │ /assignments │ derived assignments, routes and maps                     │
 * └──────────────┴──────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';

import { config } from './config/environment';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestIdMiddleware, requestLogger } from './shared/middleware/request-logger.middleware';
import { createHealthRouter } from './shared/routes/health.routes';
import { Geocache } from './modules/geocache/geocache.service';
import { EmployeeService } from './modules/employee/employee.service';
import { createEmployeeRouter } from './modules/employee/employee.routes';
import { CustomerService } from './modules/customer/customer.service';
import { createCustomerRouter } from './modules/customer/customer.routes';
import { AssignmentService } from './modules/assignment/assignment.service';
import { createAssignmentRouter } from './modules/assignment/assignment.routes';

export interface AppDeps {
  geocache: Geocache;
  employeeService: EmployeeService;
  customerService: CustomerService;
  assignmentService: AssignmentService;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    level: 6,
    threshold: 1024 // map HTML is usually well above this
  }));

  if (config.security.enableHeaders) {
    app.use(helmet({
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' }
    }));
  }

  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  // Parse JSON bodies with size limit
  app.use(express.json({ limit: '1mb' }));

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/', createHealthRouter(deps.geocache));
  app.use('/employees', createEmployeeRouter(deps.employeeService));
  app.use('/customers', createCustomerRouter(deps.customerService));
  app.use('/assignments', createAssignmentRouter(deps.assignmentService));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
