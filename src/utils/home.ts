import { join } from 'node:path';
import { APP_HOME_DIR, ENV_HOME_OVERRIDE } from '../config/branding.js';

/**
 * Returns the tool home directory (e.g. ~/.sourcegate).
 * Respects the SOURCEGATE_HOME env var override.
 */
export function getAppHome(): string {
  return process.env[ENV_HOME_OVERRIDE] ?? APP_HOME_DIR;
}

/**
 * Returns the path to a specific file within the tool home directory.
 */
export function getHomePath(filename: string): string {
  return join(getAppHome(), filename);
}
