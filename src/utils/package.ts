import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// Same depth from src/utils and dist/utils
const packageJsonPath = join(__dirname, '../../package.json');

/**
 * Version from the package.json the CLI ships with
 */
export function getVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { packageJsonPath, error });
  }
  return '0.0.0';
}
