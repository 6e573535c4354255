/**
 * Centralized Path Definitions
 *
 * Single source of truth for mcq directory paths.
 *
 * Directory structure:
 * ~/.mcq/                 (or $MCQ_HOME)
 * ├── config.toml         (user configuration)
 * └── cache/              (corpus index cache files)
 *
 * Resolved on every call so tests can point MCQ_HOME at a temp directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the mcq directory path (~/.mcq, overridable with MCQ_HOME)
 */
export function getMcqDir(): string {
  const override = process.env.MCQ_HOME?.trim();
  return override ? override : join(homedir(), '.mcq');
}

/**
 * Get the config file path (~/.mcq/config.toml)
 */
export function getConfigPath(): string {
  return join(getMcqDir(), 'config.toml');
}

/**
 * Get the index cache directory (~/.mcq/cache)
 */
export function getCacheDir(): string {
  return join(getMcqDir(), 'cache');
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}
