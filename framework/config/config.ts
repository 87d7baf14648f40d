/**
 * Configuration Management
 *
 * Loads router configuration from defaults, a JSON file and the environment.
 */

import { readFile } from 'node:fs/promises';

import { isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  routes?: {
    /** A YAML file or a directory of YAML files */
    source?: string;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  routes: {
    source: undefined,
  },
};

const DEFAULT_CONFIG_PATHS = ['./config/router.json', './router.json'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: Record<string, unknown> = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = this.getNestedValue(this.config, key);
    return (value ?? defaultValue) as T;
  }

  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  get logLevel(): LogLevel {
    const level = this.getNestedValue(this.config, 'logLevel');
    return isLogLevel(level) ? level : 'info';
  }

  get logFormat(): LogFormat {
    return this.getNestedValue(this.config, 'logFormat') === 'json' ? 'json' : 'pretty';
  }

  get routesSource(): string | undefined {
    const source = this.getNestedValue(this.config, 'routes.source');
    return typeof source === 'string' && source ? source : undefined;
  }

  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): Record<string, unknown> {
    // nested records are copied so that set() never writes into DEFAULT_CONFIG
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(base)) {
      result[key] = isRecord(value) ? this.mergeConfig(value, {}) : value;
    }

    for (const [key, value] of Object.entries(override)) {
      if (value !== undefined) {
        if (isRecord(value)) {
          const current = base[key];
          result[key] = this.mergeConfig(isRecord(current) ? current : {}, value);
        } else {
          result[key] = value;
        }
      }
    }

    return result;
  }

  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    return path.split('.').reduce<unknown>((current, key) => {
      return isRecord(current) ? current[key] : undefined;
    }, obj);
  }

  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop() ?? path;
    let current = obj;

    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | undefined> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from a config file and the environment.
 * Without a path the default locations are tried in order; missing files
 * fall back to defaults.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  for (const path of configPath ? [configPath] : DEFAULT_CONFIG_PATHS) {
    const loaded = await readConfigFile(path);
    if (loaded) {
      fileConfig = loaded;
      break;
    }
  }

  const config = new Config(fileConfig);

  if (env.NODE_ENV) config.set('env', env.NODE_ENV);
  if (isLogLevel(env.LOG_LEVEL)) config.set('logLevel', env.LOG_LEVEL);
  if (env.LOG_FORMAT === 'json' || env.LOG_FORMAT === 'pretty') {
    config.set('logFormat', env.LOG_FORMAT);
  }
  if (env.ROUTES_SOURCE) config.set('routes.source', env.ROUTES_SOURCE);

  return config;
}
