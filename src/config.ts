import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { parseKeywords } from './records/filter.js';
import { DEFAULT_FOLDER } from './records/pipeline.js';
import type { EngineOptions } from './types/index.js';
import { ConfigError, errorMessage } from './utils/index.js';

export const APP_NAME = 'vault-dedup';
export const APP_VERSION = '0.1.0';

export interface AppConfig {
  filterKeywords: string[];
  defaultFolder: string;
}

const ConfigFileSchema = z.object({
  filter: z.union([z.string(), z.array(z.string())]).optional(),
  defaultFolder: z.string().min(1).optional(),
});

export function defaultConfigPath(): string {
  return process.env.VAULT_DEDUP_CONFIG
    ?? path.join(os.homedir(), '.vault-dedup', 'config.json');
}

export async function loadConfig(configPath: string = defaultConfigPath()): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch {
    // No config file - defaults apply
    return { filterKeywords: [], defaultFolder: DEFAULT_FOLDER };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config file ${configPath}: ${issues}`);
  }

  return {
    filterKeywords: parseKeywords(parsed.data.filter),
    defaultFolder: parsed.data.defaultFolder ?? DEFAULT_FOLDER,
  };
}

/** Apply per-run overrides (CLI flags, tool arguments) on top of the loaded config. */
export function resolveEngineOptions(
  config: AppConfig,
  overrides: { filter?: string; defaultFolder?: string },
): EngineOptions {
  return {
    filterKeywords: overrides.filter !== undefined ? parseKeywords(overrides.filter) : config.filterKeywords,
    defaultFolder: overrides.defaultFolder ?? config.defaultFolder,
  };
}
