/**
 * Centralized configuration for the Workout Export Analyzer.
 *
 * All tunable values live here, grouped by concern. Values can be overridden
 * via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: Per-request processing limits
 * - Auth: Write token settings for the archive load endpoint
 * - RateLimit: Request rate limiting
 * - CORS: Cross-origin resource sharing
 * - Archive: Export bundle layout
 * - Extraction: XML parsing behaviour
 * - Aggregation: Defaults for summary queries
 */

import type { DistanceUnit, Granularity } from './types';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
export function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

/**
 * Parse a comma-separated origin list. Unset or '*' allows every origin.
 */
export function parseOrigins(value: string | undefined): string | string[] {
  if (!value || value.trim() === '*') return '*';
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

function escapeRegExp(text: string): string {
  return text.replaceAll(/[$()*+.?[\\\]^{|}]/g, String.raw`\$&`);
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 3001
   */
  port: parseIntSafe(process.env.PORT, 3001, 'PORT'),

  /**
   * Server bind address.
   * @env HOST
   * @default '127.0.0.1'
   */
  host: process.env.HOST ?? '127.0.0.1',

  /**
   * Maximum request body size for JSON payloads.
   * Only the load endpoint takes a body, and it carries a path.
   * @default '100kb'
   */
  bodyLimit: '100kb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Loading a multi-gigabyte export can take minutes.
   * @env REQUEST_TIMEOUT_MS
   * @default 600000 (10 minutes)
   */
  timeoutMs: parseIntSafe(process.env.REQUEST_TIMEOUT_MS, 600_000, 'REQUEST_TIMEOUT_MS'),
} as const;

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

export const AuthConfig = {
  /**
   * Required prefix for write tokens.
   * @default 'sk-'
   */
  tokenPrefix: 'sk-',

  /**
   * HTTP header carrying the write token.
   * @default 'api-key'
   */
  headerName: 'api-key',

  /**
   * Environment variable holding the expected write token.
   * @default 'WRITE_TOKEN'
   */
  tokenEnvVar: 'WRITE_TOKEN',
} as const;

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

const RATE_LIMIT_WINDOW_MS = 60_000;
const RATE_LIMIT_SKIP_PATHS: readonly string[] = ['/health'];

export const RateLimitConfig = {
  /**
   * Maximum requests allowed per IP address within the time window.
   * @default 300
   */
  maxRequests: 300,

  /**
   * Rate limit time window in milliseconds.
   * @default 60000 (1 minute)
   */
  windowMs: RATE_LIMIT_WINDOW_MS,

  /**
   * Paths excluded from rate limiting.
   * @default ['/health']
   */
  skipPaths: RATE_LIMIT_SKIP_PATHS,
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

const CORS_ALLOWED_HEADERS: string[] = ['Content-Type', 'Authorization', 'api-key'];
const CORS_ALLOWED_METHODS: string[] = ['GET', 'POST', 'OPTIONS'];

export const CorsConfig = {
  allowedHeaders: CORS_ALLOWED_HEADERS,
  allowedMethods: CORS_ALLOWED_METHODS,

  /**
   * Allowed origins, comma-separated. '*' allows all.
   * @env CORS_ORIGINS
   * @default '*'
   */
  origins: parseOrigins(process.env.CORS_ORIGINS),
} as const;

// =============================================================================
// ARCHIVE CONFIGURATION
// =============================================================================

const EXPORT_DOCUMENT_FOLDER = process.env.EXPORT_DOCUMENT_FOLDER ?? 'apple_health_export';

export const ArchiveConfig = {
  /**
   * Folder inside the bundle that holds the export document.
   * @env EXPORT_DOCUMENT_FOLDER
   * @default 'apple_health_export'
   */
  documentFolder: EXPORT_DOCUMENT_FOLDER,

  /**
   * File name of the export document.
   * @default 'export.xml'
   */
  documentFileName: 'export.xml',

  /**
   * Entry paths recognised as the export document. Exactly one entry in the
   * bundle may match.
   */
  documentPattern: new RegExp(`^(?:\\./)?${escapeRegExp(EXPORT_DOCUMENT_FOLDER)}/export\\.xml$`),

  /**
   * Archive loaded at startup, if any.
   * @env ARCHIVE_PATH
   */
  preloadPath: process.env.ARCHIVE_PATH,
} as const;

// =============================================================================
// EXTRACTION CONFIGURATION
// =============================================================================

export const ExtractionConfig = {
  /** Element that delimits one workout. */
  workoutTag: 'Workout',

  /** Prefix stripped from `workoutActivityType` values. */
  activityTypePrefix: 'HKWorkoutActivityType',

  /** Prefix stripped from statistic types before table lookup. */
  quantityTypePrefix: 'HKQuantityTypeIdentifier',

  /** Activity type recorded when the attribute is missing. */
  unknownActivityType: 'Unknown',

  /** Unit assumed when `durationUnit` is missing. */
  defaultDurationUnit: 'min',

  /** Log a progress line every N workouts. */
  progressInterval: 5000,

  /** Diagnostics kept in a load result; the rest are only counted. */
  maxReportedDiagnostics: 100,
} as const;

// =============================================================================
// AGGREGATION CONFIGURATION
// =============================================================================

const DEFAULT_GRANULARITY: Granularity = 'month';
const DEFAULT_DISTANCE_UNIT: DistanceUnit = 'km';

export const AggregationConfig = {
  /** @default 'month' */
  defaultGranularity: DEFAULT_GRANULARITY,

  /** @default 'km' */
  defaultDistanceUnit: DEFAULT_DISTANCE_UNIT,

  /**
   * Percentage of the total below which the smallest categories are merged
   * into "Others" by per-activity totals.
   * @default 10
   */
  combinationThresholdPercent: 10,

  /** @default 'Others' */
  othersLabel: 'Others',

  /** Activity filter value meaning "every activity". */
  allActivities: 'All',
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  MULTI_STATUS: 207,
  NOT_FOUND: 404,
  OK: 200,
  REQUEST_TIMEOUT: 408,
  TOO_MANY_REQUESTS: 429,
  UNAUTHORIZED: 401,
  UNPROCESSABLE_ENTITY: 422,
} as const;

// =============================================================================
// COMBINED EXPORT
// =============================================================================

/**
 * Complete application configuration.
 */
export const config = {
  aggregation: AggregationConfig,
  archive: ArchiveConfig,
  auth: AuthConfig,
  cors: CorsConfig,
  extraction: ExtractionConfig,
  httpStatus: HttpStatus,
  rateLimit: RateLimitConfig,
  request: RequestConfig,
  server: ServerConfig,
} as const;

export default config;
