import { LogLevel } from 'loglayer';
import { z } from 'zod';

/**
 * Environment configuration for the library and the CLI
 */
export interface EnvironmentConfig {
  logLevel: LogLevel;
  /** Default `baseurl` path parameter for templates that start with `{+baseurl}` */
  baseUrl?: string;
  /** Environment values that were present but rejected */
  warnings: string[];
}

export const DEFAULT_LOG_LEVEL = LogLevel.warn;

const LogLevelSchema = z.nativeEnum(LogLevel);
const BaseUrlSchema = z.string().url();

/**
 * Load configuration from environment variables. Invalid values are reported
 * in `warnings` and otherwise ignored.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const config: EnvironmentConfig = { logLevel: DEFAULT_LOG_LEVEL, warnings: [] };

  const logLevel = env['REQLINE_LOG_LEVEL'];
  if (logLevel) {
    const parsed = LogLevelSchema.safeParse(logLevel.toLowerCase());
    if (parsed.success) {
      config.logLevel = parsed.data;
    } else {
      config.warnings.push(`Ignoring REQLINE_LOG_LEVEL="${logLevel}": not a log level`);
    }
  }

  const baseUrl = env['REQLINE_BASE_URL'];
  if (baseUrl) {
    const parsed = BaseUrlSchema.safeParse(baseUrl);
    if (parsed.success) {
      config.baseUrl = parsed.data.replace(/\/+$/, '');
    } else {
      config.warnings.push(`Ignoring REQLINE_BASE_URL="${baseUrl}": not an absolute URL`);
    }
  }

  return config;
}

if (import.meta.vitest) {
  const { it, expect } = import.meta.vitest;

  it('defaults to warn with no environment', () => {
    expect(loadEnvironmentConfig({})).toEqual({ logLevel: 'warn', warnings: [] });
  });

  it('removes trailing slashes from the base URL', () => {
    const config = loadEnvironmentConfig({ REQLINE_BASE_URL: 'https://api.example.com/' });
    expect(config.baseUrl).toBe('https://api.example.com');
  });
}
