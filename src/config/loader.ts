/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { configSchema, analysisSettingsSchema, type Config, type AnalysisSettings } from './schema.js';

const CONFIG_NAMES = [
  'code-health.config.json',
  '.codehealthrc.json',
  '.codehealthrc',
];

function formatIssues(error: { errors: Array<{ path: (string | number)[]; message: string }> }): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Analysis settings with every threshold at its default, optionally overridden
 */
export function getAnalysisSettings(overrides: unknown = {}): AnalysisSettings {
  const result = analysisSettingsSchema.safeParse(overrides);
  if (!result.success) {
    throw new Error(`Invalid analysis settings:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

function readPackageConfig(packagePath: string): unknown {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  } catch {
    // An unreadable package.json carries no configuration
    return undefined;
  }
  if (typeof packageContent === 'object' && packageContent !== null && 'codeHealth' in packageContent) {
    return packageContent.codeHealth;
  }
  return undefined;
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // Check package.json for a codeHealth key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = readPackageConfig(packagePath);
      if (packageConfig !== undefined) {
        const result = configSchema.safeParse(packageConfig);
        if (result.success) {
          return result.data;
        }
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

export { configSchema, type Config } from './schema.js';
