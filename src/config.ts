import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { join } from 'path';
import type { Config } from './types.js';

export const DEFAULT_CONFIG: Config = {
  paths: {
    input: join('test', 'task.yaml'),
    output: 'result.yaml',
  },
  report: {
    enabled: true,
  },
};

export function defaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths },
    report: { ...DEFAULT_CONFIG.report },
  };
}

/**
 * Interpolates environment variables in a string
 * Supports ${VAR_NAME} syntax
 */
export function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || '';
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  if (typeof value !== 'string') return fallback;
  return interpolateEnvVars(value) || fallback;
}

/**
 * Loads configuration from config.yaml
 * Falls back to defaults if file doesn't exist
 */
export function loadConfig(configPath?: string): Config {
  const path = configPath || join(process.cwd(), 'config.yaml');

  if (!existsSync(path)) {
    console.warn('No config.yaml found, using defaults');
    return defaultConfig();
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const parsed: unknown = parse(content);
    const root: Record<string, unknown> = isRecord(parsed) ? parsed : {};
    const paths: Record<string, unknown> = isRecord(root.paths) ? root.paths : {};
    const report: Record<string, unknown> = isRecord(root.report) ? root.report : {};

    // Merge with defaults
    return {
      paths: {
        input: readString(paths, 'input', DEFAULT_CONFIG.paths.input),
        output: readString(paths, 'output', DEFAULT_CONFIG.paths.output),
      },
      report: {
        enabled: typeof report.enabled === 'boolean' ? report.enabled : DEFAULT_CONFIG.report.enabled,
      },
    };
  } catch (error) {
    console.error('Error loading config:', error);
    return defaultConfig();
  }
}
