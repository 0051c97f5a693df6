import { describe, it, expect } from 'vitest';
import { generateJobIdentity } from '../src/utils/hash';

describe('generateJobIdentity', () => {
  const parts = { title: 'Backend Engineer', company: 'Acme', sourceName: 'remotive', nativeId: '42' };

  it('returns a sha256 hex digest', () => {
    expect(generateJobIdentity(parts)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores case and whitespace differences in content mode', () => {
    expect(generateJobIdentity({ ...parts, title: '  backend   engineer ', company: 'ACME' })).toBe(
      generateJobIdentity(parts)
    );
  });

  it('collapses the same vacancy across sources in content mode', () => {
    expect(generateJobIdentity({ ...parts, sourceName: 'jobicy', nativeId: '7' })).toBe(
      generateJobIdentity(parts)
    );
  });

  it('keys on source and native id in source mode', () => {
    const a = generateJobIdentity(parts, 'source');
    expect(generateJobIdentity({ ...parts, title: 'Renamed' }, 'source')).toBe(a);
    expect(generateJobIdentity({ ...parts, sourceName: 'jobicy' }, 'source')).not.toBe(a);
  });

  it('falls back to title and company when the source has no id', () => {
    const withoutId = { ...parts, nativeId: undefined };
    expect(generateJobIdentity(withoutId, 'source')).not.toBe(generateJobIdentity(parts, 'source'));
    expect(generateJobIdentity(withoutId, 'source')).not.toBe(generateJobIdentity(withoutId, 'content'));
  });
});
