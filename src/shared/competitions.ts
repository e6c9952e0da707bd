import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot } from './utils.js';
import { ConfigError } from './errors.js';

export const CompetitionSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/),
  label: z.string().min(1),
  season: z.number().int(),
  league_id: z.number().int(),
  group: z.string().default(''),
  kind: z.string().default('L'),
});

export type Competition = z.infer<typeof CompetitionSchema>;

const CompetitionFileSchema = z.object({
  competitions: z
    .array(CompetitionSchema)
    .refine((list) => new Set(list.map((c) => c.id)).size === list.length, {
      message: 'Competition ids must be unique',
    }),
});

export function getBundledCompetitionsPath(): string {
  return path.join(getPackageRoot(), 'competitions', 'default.yaml');
}

export function parseCompetitionsYaml(content: string): Competition[] {
  const raw = yamlParse(content) as unknown;
  const parsed = CompetitionFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid competitions file', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data.competitions;
}

export function loadCompetitions(filePath: string): Competition[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Competitions file not found: ${filePath}`);
  }
  return parseCompetitionsYaml(fs.readFileSync(filePath, 'utf-8'));
}

/** Label shown in brackets at the top of a fixture description. */
export function competitionLabels(competitions: Competition[]): Map<string, string> {
  return new Map(competitions.map((c) => [c.id, c.label]));
}

/**
 * Copy the bundled competition list to `target` unless a file is already there.
 * Returns true when the file was written.
 */
export function installDefaultCompetitions(target: string): boolean {
  if (fs.existsSync(target)) return false;
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.copyFileSync(getBundledCompetitionsPath(), target);
  return true;
}
