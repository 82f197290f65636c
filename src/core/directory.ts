import * as os from 'os';
import * as path from 'path';
import { GraphpinDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS } from '../constants/index.js';

/**
 * Get graphpin directories using the dotfile convention (~/.graphpin).
 * GRAPHPIN_HOME replaces the whole directory, which tests rely on.
 */
export function getGraphpinDirectories(env: NodeJS.ProcessEnv = process.env): GraphpinDirectories {
  const override = env[ENV_VARS.HOME];
  const graphpinDir = override && override.trim() !== ''
    ? path.resolve(override)
    : path.join(os.homedir(), DIR_PATTERNS.GRAPHPIN);

  return {
    config: graphpinDir
  };
}
