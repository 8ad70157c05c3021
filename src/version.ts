/**
 * @fileoverview Burrow version information.
 *
 * Central location for version information used by `about`, `uname`,
 * the CLI `--version` flag and the startup log entry.
 *
 * @module version
 */

/** Base Burrow version number */
const BASE_VERSION = '1.0.0';

/**
 * Check if running in development mode.
 * The compiled CLI sets NODE_ENV=production; tests and `tsx` runs do not.
 */
function isDevMode(): boolean {
  return process.env.NODE_ENV !== undefined && process.env.NODE_ENV !== 'production';
}

/**
 * Burrow version number.
 * In dev mode a `-dev` suffix is appended (e.g., "1.0.0-dev").
 */
export const VERSION = isDevMode() ? `${BASE_VERSION}-dev` : BASE_VERSION;

/** Full version string */
export const VERSION_STRING = `Burrow v${VERSION}`;

/** Short product name used in synthetic system output */
export const SYSTEM_NAME = 'Burrow';
