import { join } from 'path';
import { GraphpinConfig, GraphpinDirectories } from '../types/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getGraphpinDirectories } from './directory.js';
import { ENV_VARS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Configuration management for the graphpin CLI
 * Supports both JSON and JSONC formats
 */

const DEFAULT_CONFIG: GraphpinConfig = {
  lockfileName: FILE_PATTERNS.LOCKFILE_YML
};

/** Settings after merging flags, environment, config file and defaults */
export interface ResolvedSettings {
  registry?: string;
  platform?: string;
  lockfileName: string;
}

function readString(source: Record<string, unknown>, key: keyof GraphpinConfig, configPath: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid configuration in ${configPath}: '${key}' must be a string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class ConfigManager {
  private config: GraphpinConfig | null = null;
  private configPath: string | null = null;
  private readonly graphpinDirs: GraphpinDirectories;

  constructor(directories: GraphpinDirectories = getGraphpinDirectories()) {
    this.graphpinDirs = directories;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.graphpinDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file. A missing file means defaults; unlike
   * manifests, nothing is written back.
   */
  async load(): Promise<GraphpinConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRecord(raw)) {
      throw new ConfigError(`Invalid configuration in ${configPath}: expected an object`);
    }

    this.configPath = configPath;
    this.config = {
      ...DEFAULT_CONFIG,
      ...stripUndefined({
        registry: readString(raw, 'registry', configPath),
        platform: readString(raw, 'platform', configPath),
        lockfileName: readString(raw, 'lockfileName', configPath)
      })
    };
    return this.config;
  }

  /**
   * Get a configuration value
   */
  async get<K extends keyof GraphpinConfig>(key: K): Promise<GraphpinConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Merge settings: CLI flags win over environment variables, which win over
   * the config file, which wins over defaults.
   */
  async resolveSettings(
    flags: { registry?: string; platform?: string },
    env: NodeJS.ProcessEnv = process.env
  ): Promise<ResolvedSettings> {
    const config = await this.load();
    const fromEnv = (name: string): string | undefined => {
      const value = env[name];
      return value && value.trim() !== '' ? value : undefined;
    };

    return {
      registry: flags.registry ?? fromEnv(ENV_VARS.REGISTRY) ?? config.registry,
      platform: (flags.platform ?? fromEnv(ENV_VARS.PLATFORM) ?? config.platform)?.toLowerCase(),
      lockfileName: config.lockfileName ?? FILE_PATTERNS.LOCKFILE_YML
    };
  }

  /**
   * Path of the loaded config file, if one was found
   */
  getLoadedConfigPath(): string | null {
    return this.configPath;
  }

  getDirectories(): GraphpinDirectories {
    return this.graphpinDirs;
  }
}

function stripUndefined(config: GraphpinConfig): GraphpinConfig {
  const result: GraphpinConfig = {};
  if (config.registry !== undefined) result.registry = config.registry;
  if (config.platform !== undefined) result.platform = config.platform;
  if (config.lockfileName !== undefined) result.lockfileName = config.lockfileName;
  return result;
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
