import { AccessPolicy, compileBlockRule, normalizeHost } from '../policies/access-policy';

// ---------------------------------------------------------------------------
// normalizeHost / compileBlockRule
// ---------------------------------------------------------------------------

describe('normalizeHost', () => {
  it('lower-cases and strips a trailing dot', () => {
    expect(normalizeHost('WWW.Example.COM.')).toBe('www.example.com');
  });
});

describe('compileBlockRule', () => {
  it('compiles a wildcard pattern', () => {
    expect(compileBlockRule('*.YouTube.com')).toEqual({
      pattern: '*.YouTube.com',
      domain: 'youtube.com',
      wildcard: true,
    });
  });

  it('compiles an exact pattern', () => {
    expect(compileBlockRule('ads.example.net')).toEqual({
      pattern: 'ads.example.net',
      domain: 'ads.example.net',
      wildcard: false,
    });
  });

  it('rejects an empty pattern', () => {
    expect(() => compileBlockRule('')).toThrow();
  });
});

// ---------------------------------------------------------------------------
// AccessPolicy
// ---------------------------------------------------------------------------

describe('AccessPolicy', () => {
  const policy = new AccessPolicy(['*.youtube.com', 'ads.example.net']);

  it('blocks the wildcard apex domain', () => {
    expect(policy.evaluate('youtube.com')).toEqual({ verdict: 'blocked', pattern: '*.youtube.com' });
  });

  it('blocks subdomains at any depth', () => {
    expect(policy.isBlocked('www.youtube.com')).toBe(true);
    expect(policy.isBlocked('a.b.youtube.com')).toBe(true);
  });

  it('matches case-insensitively and ignores a trailing dot', () => {
    expect(policy.isBlocked('WWW.YouTube.COM.')).toBe(true);
  });

  it('does not match a suffix that is not a label boundary', () => {
    expect(policy.isBlocked('notyoutube.com')).toBe(false);
    expect(policy.isBlocked('youtube.com.evil.org')).toBe(false);
  });

  it('matches exact patterns only exactly', () => {
    expect(policy.isBlocked('ads.example.net')).toBe(true);
    expect(policy.isBlocked('cdn.ads.example.net')).toBe(false);
    expect(policy.isBlocked('example.net')).toBe(false);
  });

  it('allows unrelated hosts', () => {
    expect(policy.evaluate('example.com')).toEqual({ verdict: 'allowed' });
  });

  it('allows everything with an empty blocklist', () => {
    const open = new AccessPolicy();
    expect(open.size).toBe(0);
    expect(open.isBlocked('www.youtube.com')).toBe(false);
  });

  describe('replace', () => {
    it('swaps the rule set', () => {
      const local = new AccessPolicy(['*.youtube.com']);
      local.replace(['*.example.org']);

      expect(local.patterns).toEqual(['*.example.org']);
      expect(local.isBlocked('www.youtube.com')).toBe(false);
      expect(local.isBlocked('www.example.org')).toBe(true);
    });

    it('keeps the old rules when a pattern is invalid', () => {
      const local = new AccessPolicy(['*.youtube.com']);
      expect(() => local.replace(['*.example.org', ''])).toThrow();
      expect(local.patterns).toEqual(['*.youtube.com']);
    });
  });
});
