/**
 * Configuration module.
 *
 * Loads config from the JSON file named by POLICY_CATALOG_CONFIG
 * (default: policy-catalog.config.json in the working directory).
 * Missing keys fall back to defaults.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { DEFAULT_OSCAL_VERSION } from './catalog.js';
import { DEFAULT_TITLE } from './metadata.js';

export interface AppConfig {
  /** Catalog title written into metadata */
  title: string;
  oscalVersion: string;
  port: number;
  /** Directory scanned for policy documents */
  contentDir: string;
  /** Log each HTTP request with morgan */
  logRequests: boolean;
}

export const DEFAULT_CONFIG_FILE = 'policy-catalog.config.json';

export function defaultConfig(): AppConfig {
  return {
    title: DEFAULT_TITLE,
    oscalVersion: DEFAULT_OSCAL_VERSION,
    port: 3000,
    contentDir: process.cwd(),
    logRequests: true
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a raw JSON value over the defaults, ignoring keys of the wrong type.
 */
export function resolveConfig(raw: unknown, baseDir: string = process.cwd()): AppConfig {
  const config = defaultConfig();
  if (!isRecord(raw)) {
    return config;
  }

  if (typeof raw.title === 'string') config.title = raw.title;
  if (typeof raw.oscalVersion === 'string') config.oscalVersion = raw.oscalVersion;
  if (typeof raw.port === 'number' && Number.isInteger(raw.port)) config.port = raw.port;
  if (typeof raw.contentDir === 'string') config.contentDir = path.resolve(baseDir, raw.contentDir);
  if (typeof raw.logRequests === 'boolean') config.logRequests = raw.logRequests;

  return config;
}

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const filePath = path.resolve(configPath ?? process.env.POLICY_CATALOG_CONFIG ?? DEFAULT_CONFIG_FILE);

  let config: AppConfig;
  if (await fs.pathExists(filePath)) {
    const raw: unknown = await fs.readJson(filePath);
    config = resolveConfig(raw, path.dirname(filePath));
    // stderr: stdout may carry CLI output
    console.error(`Loaded config from ${filePath}`);
  } else {
    console.warn(`Config file ${filePath} not found, using defaults`);
    config = defaultConfig();
  }

  if (process.env.PORT) {
    const port = parseInt(process.env.PORT, 10);
    if (!isNaN(port)) config.port = port;
  }

  cachedConfig = config;
  return config;
}
