import { describe, it, expect, afterEach } from 'vitest';
import { parse as yamlParse } from 'yaml';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
} from '../config.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(3892);
      expect(result.data.calendar.timezone).toBe('Europe/Berlin');
      expect(result.data.calendar.uid_domain).toBe('fixturecal.local');
      expect(result.data.schedule.sync_cron).toBe('0 */6 * * *');
      expect(result.data.normalize.club_aliases).toEqual([]);
      expect(result.data.db.path).toBe('~/.fixturecal/fixturecal.db');
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      server: { port: 8080 },
      source: { club: 'SV Placeholder' },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(8080);
      expect(result.data.source.club).toBe('SV Placeholder');
      // defaults still apply for other fields
      expect(result.data.server.host).toBe('127.0.0.1');
      expect(result.data.source.fetch_details).toBe(true);
    }
  });

  it('rejects invalid types', () => {
    const result = ConfigSchema.safeParse({
      server: { port: 'not-a-number' },
    });
    expect(result.success).toBe(false);
  });

  it('defaults alias variants to an empty list', () => {
    const result = ConfigSchema.safeParse({
      normalize: { club_aliases: [{ canonical: 'SG Example' }] },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.normalize.club_aliases).toEqual([{ canonical: 'SG Example', variants: [] }]);
    }
  });
});

describe('generateDefaultConfig', () => {
  it('returns a full Config object', () => {
    const config = generateDefaultConfig();
    expect(config.server.port).toBe(3892);
    expect(config.calendar.output_path).toBe('~/.fixturecal/fixtures.ics');
  });
});

describe('generateDefaultConfigYaml', () => {
  it('round-trips through the schema', () => {
    const parsed = ConfigSchema.parse(yamlParse(generateDefaultConfigYaml()));
    expect(parsed).toEqual(generateDefaultConfig());
  });
});

describe('applyEnvOverrides', () => {
  afterEach(() => {
    delete process.env['FIXTURECAL_DB_PATH'];
    delete process.env['FIXTURECAL_OUTPUT'];
  });

  it('replaces db path and output path, keeping sibling keys', () => {
    process.env['FIXTURECAL_DB_PATH'] = '/tmp/test.db';
    process.env['FIXTURECAL_OUTPUT'] = '/tmp/test.ics';
    const raw: Record<string, unknown> = { calendar: { name: 'Team' } };

    applyEnvOverrides(raw);

    expect(raw['db']).toEqual({ path: '/tmp/test.db' });
    expect(raw['calendar']).toEqual({ name: 'Team', output_path: '/tmp/test.ics' });
  });

  it('leaves the config alone without env vars', () => {
    const raw: Record<string, unknown> = { db: { path: 'x.db' } };
    applyEnvOverrides(raw);
    expect(raw).toEqual({ db: { path: 'x.db' } });
  });
});
