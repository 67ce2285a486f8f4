/**
 * Configuration Manager
 * Centralized configuration loading and validation
 */
import { ZodError } from 'zod';
import { logger, setLogLevel } from '../core/Logger.js';
import { configErrorFromZod } from '../core/errors.js';
import { appConfigSchema, type AppConfig } from './schema.js';

/**
 * Read environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

/**
 * Read environment variable as integer
 */
function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Read environment variable as boolean
 */
function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export class ConfigManager {
  private _app: AppConfig;

  constructor() {
    try {
      this._app = appConfigSchema.parse({
        logLevel: getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
        logPretty: getEnvBool('LOG_PRETTY', true),
        cloudsFile: getEnv('OS_CLIENT_CONFIG_FILE'),
        strict: getEnvBool('DNSSYNC_STRICT', false),
        defaultTtl: getEnvInt('DNSSYNC_DEFAULT_TTL', 3600),
      });
    } catch (error) {
      if (error instanceof ZodError) {
        throw configErrorFromZod('environment configuration', error);
      }
      throw error;
    }

    setLogLevel(this._app.logLevel);

    logger.debug(
      {
        logLevel: this._app.logLevel,
        cloudsFile: this._app.cloudsFile,
        strict: this._app.strict,
      },
      'Configuration loaded'
    );
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }
}

// Export singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
