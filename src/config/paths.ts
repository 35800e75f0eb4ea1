/**
 * Centralized Path Definitions
 *
 * Single source of truth for the kbrag directory layout.
 *
 * Directory structure:
 * ~/.kbrag/
 * └── config.toml     (User configuration)
 *
 * KBRAG_HOME relocates the whole directory (used by tests and CI).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the kbrag directory path (~/.kbrag, or $KBRAG_HOME)
 * @returns Absolute path to the kbrag directory
 */
export function getKbragDir(): string {
  const override = process.env.KBRAG_HOME?.trim();
  return override ? override : join(homedir(), '.kbrag');
}

/**
 * Get the config file path (~/.kbrag/config.toml)
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getKbragDir(), 'config.toml');
}
