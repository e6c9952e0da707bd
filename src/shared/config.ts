import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFixtureCalDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const ClubAliasSchema = z.object({
  canonical: z.string().min(1),
  variants: z.array(z.string()).default([]),
});

export type ClubAlias = z.infer<typeof ClubAliasSchema>;

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  source: z
    .object({
      base_url: z.string().default('https://dsvdaten.dsv.de/Modules/WB/League.aspx'),
      club: z.string().default('SG Example'),
      user_agent: z.string().default('fixturecal/1.0'),
      fetch_timeout_ms: z.number().default(15000),
      fetch_details: z.boolean().default(true),
    })
    .default({}),

  calendar: z
    .object({
      name: z.string().default('Fixtures'),
      description: z.string().default('Automatically generated fixtures'),
      timezone: z.string().default('Europe/Berlin'),
      prod_id: z.string().default('-//fixturecal//Fixture Calendar//EN'),
      uid_domain: z.string().default('fixturecal.local'),
      output_path: z.string().default('~/.fixturecal/fixtures.ics'),
    })
    .default({}),

  schedule: z
    .object({
      sync_cron: z.string().default('0 */6 * * *'),
    })
    .default({}),

  normalize: z
    .object({
      club_aliases: z.array(ClubAliasSchema).default([]),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.fixturecal/fixturecal.db'),
    })
    .default({}),

  competitions_path: z.string().default('~/.fixturecal/competitions.yaml'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sectionOf(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  return isRecord(section) ? section : {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('fixturecal', {
    searchPlaces: [
      'fixturecal.config.yaml',
      'fixturecal.config.yml',
      '.fixturecalrc.yaml',
      '.fixturecalrc.yml',
    ],
  });

  const envConfigPath = process.env['FIXTURECAL_CONFIG'];
  const defaultConfigPath = path.join(getFixtureCalDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * FIXTURECAL_DB_PATH and FIXTURECAL_OUTPUT win over the config file.
 */
export function applyEnvOverrides(rawConfig: Record<string, unknown>): void {
  const envDbPath = process.env['FIXTURECAL_DB_PATH'];
  const envOutput = process.env['FIXTURECAL_OUTPUT'];

  if (envDbPath) {
    rawConfig['db'] = { ...sectionOf(rawConfig, 'db'), path: envDbPath };
  }
  if (envOutput) {
    rawConfig['calendar'] = { ...sectionOf(rawConfig, 'calendar'), output_path: envOutput };
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
