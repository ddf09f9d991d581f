/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * DATA FILES:
 * - Each snapshot (geocache, employee roster, customer tickets) is looked up
 *   through an ordered list of candidate paths; the first usable file wins
 * - The first candidate of the roster and ticket lists is also the write target
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - Use getPathList() for comma-separated file paths
 * =============================================================================
 */

import dotenv from 'dotenv';
import path from 'path';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get comma-separated list, resolved against the working directory when
 * the entries are paths
 */
function getPathList(key: string, defaults: string[]): string[] {
  const value = process.env[key];
  const entries = value
    ? value.split(',').map(entry => entry.trim()).filter(Boolean)
    : defaults;
  return entries.map(entry => path.resolve(entry));
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const dataDir = path.resolve(getOptional('DATA_DIR', './data'));

/**
 * Application configuration object
 */
export const config = {
  // Server
  nodeEnv: getOptional('NODE_ENV', 'development'),
  port: getNumber('PORT', 5010),
  host: getOptional('HOST', '0.0.0.0'),

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Data snapshots
  dataDir,
  geocacheCandidates: getPathList('GEOCACHE_PATHS', [
    path.join(dataDir, 'geocache.json'),
    './geocache_hyd.json',
  ]),
  employeeCandidates: getPathList('EMPLOYEE_PATHS', [
    path.join(dataDir, 'employees.json'),
  ]),
  customerCandidates: getPathList('CUSTOMER_PATHS', [
    path.join(dataDir, 'customers_data.json'),
  ]),

  // Roster CSV uploads
  upload: {
    maxBytes: getNumber('UPLOAD_MAX_BYTES', 16 * 1024 * 1024), // 16MB
  },

  // Helpers
  isProduction: getOptional('NODE_ENV', 'development') === 'production',
  isTest: getOptional('NODE_ENV', 'development') === 'test',

  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;
