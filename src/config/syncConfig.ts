import { promises as fs } from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors/syncErrors.js';
import { isLogLevel, log, type LogLevel } from '../utils/logger.js';

/**
 * Drive Folder Sync configuration, as read from config.json
 */
export interface SyncConfig {
  credentials: {
    clientSecretsPath: string;
    tokenPath: string;
  };
  source: {
    folderId: string;
  };
  destination: {
    folderId: string;
  };
  logging: {
    logDirectory: string;
    logLevel: LogLevel;
  };
  performance: {
    userRateLimit: number;
    userTimeWindow: number;   // seconds
  };
  migration: {
    batchSize: number;
    maxRetries: number;
    autoFixMissing: boolean;
    finalValidation: boolean;
    countItemsFirst: boolean;
  };
}

/**
 * Defaults for every optional setting
 */
export const DEFAULT_CONFIG: Omit<SyncConfig, 'credentials' | 'source' | 'destination'> = {
  logging: {
    logDirectory: './logs',
    logLevel: 'info'
  },
  performance: {
    userRateLimit: 1000,
    userTimeWindow: 60
  },
  migration: {
    batchSize: 100,
    maxRetries: 10,
    autoFixMissing: true,
    finalValidation: true,
    countItemsFirst: true
  }
};

export const LOG_LEVEL_ENV = 'DRIVE_SYNC_LOG_LEVEL';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, name: string): RawSection {
  const value = raw[name];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(name, value, 'an object');
  }
  return value;
}

function requiredString(raw: RawSection, sectionName: string, key: string): string {
  const value = section(raw, sectionName)[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${sectionName}.${key}`, value, 'a non-empty string');
  }
  return value;
}

function optionalString(raw: RawSection, sectionName: string, key: string, fallback: string): string {
  const value = section(raw, sectionName)[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${sectionName}.${key}`, value, 'a non-empty string');
  }
  return value;
}

function positiveInteger(raw: RawSection, sectionName: string, key: string, fallback: number): number {
  const value = section(raw, sectionName)[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${sectionName}.${key}`, value, 'a positive integer');
  }
  return value;
}

function nonNegativeInteger(raw: RawSection, sectionName: string, key: string, fallback: number): number {
  const value = section(raw, sectionName)[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${sectionName}.${key}`, value, 'a non-negative integer');
  }
  return value;
}

function flag(raw: RawSection, sectionName: string, key: string, fallback: boolean): boolean {
  const value = section(raw, sectionName)[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${sectionName}.${key}`, value, 'true or false');
  }
  return value;
}

function logLevel(raw: RawSection, fallback: LogLevel): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV];
  if (fromEnv !== undefined && fromEnv !== '') {
    if (!isLogLevel(fromEnv)) {
      throw new ConfigurationError(LOG_LEVEL_ENV, fromEnv, 'debug, info, warn or error');
    }
    return fromEnv;
  }
  const value = section(raw, 'logging').logLevel;
  if (value === undefined) {
    return fallback;
  }
  if (!isLogLevel(value)) {
    throw new ConfigurationError('logging.logLevel', value, 'debug, info, warn or error');
  }
  return value;
}

/**
 * Validate a parsed config document and fill in defaults
 */
export function parseSyncConfig(raw: unknown): SyncConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('configuration', raw, 'a JSON object');
  }
  return {
    credentials: {
      clientSecretsPath: requiredString(raw, 'credentials', 'clientSecretsPath'),
      tokenPath: requiredString(raw, 'credentials', 'tokenPath')
    },
    source: { folderId: requiredString(raw, 'source', 'folderId') },
    destination: { folderId: requiredString(raw, 'destination', 'folderId') },
    logging: {
      logDirectory: optionalString(raw, 'logging', 'logDirectory', DEFAULT_CONFIG.logging.logDirectory),
      logLevel: logLevel(raw, DEFAULT_CONFIG.logging.logLevel)
    },
    performance: {
      userRateLimit: positiveInteger(raw, 'performance', 'userRateLimit', DEFAULT_CONFIG.performance.userRateLimit),
      userTimeWindow: positiveInteger(raw, 'performance', 'userTimeWindow', DEFAULT_CONFIG.performance.userTimeWindow)
    },
    migration: {
      batchSize: positiveInteger(raw, 'migration', 'batchSize', DEFAULT_CONFIG.migration.batchSize),
      maxRetries: nonNegativeInteger(raw, 'migration', 'maxRetries', DEFAULT_CONFIG.migration.maxRetries),
      autoFixMissing: flag(raw, 'migration', 'autoFixMissing', DEFAULT_CONFIG.migration.autoFixMissing),
      finalValidation: flag(raw, 'migration', 'finalValidation', DEFAULT_CONFIG.migration.finalValidation),
      countItemsFirst: flag(raw, 'migration', 'countItemsFirst', DEFAULT_CONFIG.migration.countItemsFirst)
    }
  };
}

/**
 * Configuration Manager
 */
export class SyncConfigManager {
  static readonly DEFAULT_PATH = './config.json';
  private static configCache: SyncConfig | null = null;
  private static configPath: string | null = null;

  /**
   * Read, validate and cache the configuration file; creates the log directory.
   * Relative paths inside the file are resolved against the file's directory.
   */
  static async loadFromFile(configFilePath: string = SyncConfigManager.DEFAULT_PATH): Promise<SyncConfig> {
    const resolved = path.resolve(configFilePath);
    if (SyncConfigManager.configCache && SyncConfigManager.configPath === resolved) {
      return SyncConfigManager.configCache;
    }

    let content: string;
    try {
      content = await fs.readFile(resolved, 'utf-8');
    } catch {
      throw new ConfigurationError('config file', resolved, 'a readable file');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new ConfigurationError('config file', resolved, 'valid JSON');
    }

    const config = parseSyncConfig(raw);
    const baseDir = path.dirname(resolved);
    config.credentials.clientSecretsPath = path.resolve(baseDir, config.credentials.clientSecretsPath);
    config.credentials.tokenPath = path.resolve(baseDir, config.credentials.tokenPath);
    config.logging.logDirectory = path.resolve(baseDir, config.logging.logDirectory);

    await fs.mkdir(config.logging.logDirectory, { recursive: true });

    SyncConfigManager.configCache = config;
    SyncConfigManager.configPath = resolved;
    log.debug(`[CONFIG] Loaded ${resolved}`);
    return config;
  }

  /**
   * Cached configuration, if loaded
   */
  static getConfig(): SyncConfig | null {
    return SyncConfigManager.configCache;
  }

  /**
   * Clear cache (for testing)
   */
  static clearCache(): void {
    SyncConfigManager.configCache = null;
    SyncConfigManager.configPath = null;
  }
}
