import { describe, it, expect } from 'vitest';
import { eventIdentity, fixtureIdentity } from '../identity.js';
import { normalizeName } from '../../normalize/names.js';
import { sha1 } from '../../shared/utils.js';

describe('fixtureIdentity', () => {
  it('hashes kind, competition and names joined by the unit separator', () => {
    expect(fixtureIdentity('league', 'FC Example', 'SG Example')).toBe(
      sha1('fixture\u001fleague\u001fFC Example\u001fSG Example'),
    );
  });

  it('is stable across cosmetic name differences once normalized', () => {
    const a = fixtureIdentity('league', normalizeName(' 12 FC Example '), normalizeName('SG Example'));
    const b = fixtureIdentity('league', normalizeName('FC Example'), normalizeName('SG  Example'));
    expect(a).toBe(b);
  });

  it('depends on competition and side', () => {
    const base = fixtureIdentity('league', 'A', 'B');
    expect(fixtureIdentity('cup', 'A', 'B')).not.toBe(base);
    expect(fixtureIdentity('league', 'B', 'A')).not.toBe(base);
  });

  it('does not collide when fields shift across the separator', () => {
    expect(fixtureIdentity('league', 'A B', 'C')).not.toBe(fixtureIdentity('league', 'A', 'B C'));
  });
});

describe('eventIdentity', () => {
  it('trims the raw date text', () => {
    expect(eventIdentity('Club Party', ' 05.03.2025 ')).toBe(eventIdentity('Club Party', '05.03.2025'));
  });

  it('keys on the raw text, not the resolved date', () => {
    expect(eventIdentity('Club Party', '05.03.2025')).not.toBe(eventIdentity('Club Party', '2025-03-05'));
  });

  it('differs from a fixture identity over the same text', () => {
    expect(eventIdentity('x', 'y')).not.toBe(fixtureIdentity('x', 'y', ''));
  });
});
