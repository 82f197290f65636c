/**
 * Shared constants for graphpin: file names, directory names and
 * reserved identities.
 */

export const DIR_PATTERNS = {
  GRAPHPIN: '.graphpin'
} as const;

export const FILE_PATTERNS = {
  MANIFEST_YML: 'graphpin.yml',
  LOCKFILE_YML: 'graphpin.lock.yml',
  BRANCHES_YML: 'branches.yml',
  CONFIG_FILES: ['config.jsonc', 'config.json']
} as const;

export const REGISTRY_DIRS = {
  REVISIONS: 'revisions'
} as const;

export const ENV_VARS = {
  VERBOSE: 'GRAPHPIN_VERBOSE',
  HOME: 'GRAPHPIN_HOME',
  REGISTRY: 'GRAPHPIN_REGISTRY',
  PLATFORM: 'GRAPHPIN_PLATFORM'
} as const;

/**
 * The synthetic package the solver resolves for. It can never collide with a
 * normalized identity because identities never contain angle brackets.
 */
export const ROOT_IDENTITY = '<root>';
export const ROOT_VERSION = '0.0.0';

export const LOCKFILE_FORMAT_VERSION = 1;
export const LOCKFILE_HEADER = '# This file is managed by graphpin. Do not edit manually.';
