/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Throws if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function isPositiveInt(value: string): boolean {
  return /^\d+$/.test(value) && parseInt(value, 10) > 0;
}

function isBooleanFlag(value: string): boolean {
  return ['true', 'false'].includes(value.toLowerCase());
}

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '5010',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'debug',
    validator: (v) => LOG_LEVELS.includes(v),
    description: `Logger level (${LOG_LEVELS.join(', ')})`
  },
  {
    name: 'CORS_ORIGIN',
    required: false,
    default: '*',
    description: 'Allowed CORS origins, comma-separated'
  },

  // ==========================================================================
  // DATA FILES
  // ==========================================================================
  {
    name: 'DATA_DIR',
    required: false,
    default: './data',
    description: 'Directory holding the JSON snapshots'
  },
  {
    name: 'GEOCACHE_PATHS',
    required: false,
    description: 'Geocache candidate files, comma-separated, first usable wins'
  },
  {
    name: 'EMPLOYEE_PATHS',
    required: false,
    description: 'Roster candidate files, comma-separated, first is the write target'
  },
  {
    name: 'CUSTOMER_PATHS',
    required: false,
    description: 'Ticket candidate files, comma-separated, first is the write target'
  },
  {
    name: 'UPLOAD_MAX_BYTES',
    required: false,
    default: String(16 * 1024 * 1024),
    validator: isPositiveInt,
    description: 'Maximum roster CSV upload size in bytes'
  },

  // ==========================================================================
  // HTTP
  // ==========================================================================
  {
    name: 'ENABLE_SECURITY_HEADERS',
    required: false,
    default: 'true',
    validator: isBooleanFlag,
    description: 'Send helmet security headers'
  },
  {
    name: 'ENABLE_REQUEST_LOGGING',
    required: false,
    default: 'true',
    validator: isBooleanFlag,
    description: 'Log every request'
  }
];

/**
 * Check the given environment against ENV_VARS
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (!finalValue) continue;

    if (envVar.validator && !envVar.validator(finalValue)) {
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
      continue;
    }

    result.loaded[envVar.name] = finalValue;
  }

  if (isProduction) {
    if (!env.CORS_ORIGIN || env.CORS_ORIGIN === '*') {
      result.warnings.push('CORS_ORIGIN allows every origin in production');
    }
    if (env.LOG_LEVEL === 'debug' || env.LOG_LEVEL === 'silly') {
      result.warnings.push(`LOG_LEVEL=${env.LOG_LEVEL} is verbose for production`);
    }
  }

  return result;
}

/**
 * Validate and log results at startup.
 * Throws when any variable is invalid.
 */
export function validateAndLogEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result = validateEnvironment(env);

  result.errors.forEach(error => logger.error(`Environment validation error: ${error}`));
  result.warnings.forEach(warning => logger.warn(`Environment validation warning: ${warning}`));

  if (!result.valid) {
    throw new Error(`Invalid environment configuration (${result.errors.length} error(s))`);
  }

  logger.info('Environment validation passed', {
    mode: result.loaded.NODE_ENV,
    port: result.loaded.PORT
  });
  return result;
}
