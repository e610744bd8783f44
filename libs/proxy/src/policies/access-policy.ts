/**
 * Access Policy
 *
 * Domain blocklist evaluation. Patterns compile to immutable suffix rules:
 * `*.example.com` blocks `example.com` and every name under it, a bare
 * `example.com` blocks only that exact host. The first matching rule wins.
 *
 * The rule set is a frozen array that is only ever replaced as a whole, so
 * concurrent sessions read it without coordination.
 */

import type { AllowedDecision, BlockedDecision } from '@portcullis/ipc';

export interface BlockRule {
  /** Pattern as configured */
  readonly pattern: string;
  /** Lower-cased domain the rule is anchored on */
  readonly domain: string;
  readonly wildcard: boolean;
}

const ALLOWED: AllowedDecision = Object.freeze({ verdict: 'allowed' });

/**
 * Lower-case and drop a trailing root dot so `Example.COM.` matches `example.com`.
 */
export function normalizeHost(host: string): string {
  const lower = host.trim().toLowerCase();
  return lower.endsWith('.') ? lower.slice(0, -1) : lower;
}

export function compileBlockRule(pattern: string): BlockRule {
  const trimmed = pattern.trim();
  const wildcard = trimmed.startsWith('*.');
  const domain = normalizeHost(wildcard ? trimmed.slice(2) : trimmed);
  if (!domain || domain.includes('*')) {
    throw new Error(`Invalid block pattern: "${pattern}"`);
  }
  return Object.freeze({ pattern: trimmed, domain, wildcard });
}

export function ruleMatches(rule: BlockRule, host: string): boolean {
  if (host === rule.domain) {
    return true;
  }
  return rule.wildcard && host.endsWith(`.${rule.domain}`);
}

export class AccessPolicy {
  private rules: readonly BlockRule[];

  constructor(patterns: readonly string[] = []) {
    this.rules = AccessPolicy.compile(patterns);
  }

  private static compile(patterns: readonly string[]): readonly BlockRule[] {
    return Object.freeze(patterns.map(compileBlockRule));
  }

  /**
   * Evaluate a target host against the blocklist.
   */
  evaluate(host: string): AllowedDecision | BlockedDecision {
    const target = normalizeHost(host);
    // Read the reference once; a concurrent replace() swaps it, never edits it.
    const rules = this.rules;

    for (const rule of rules) {
      if (ruleMatches(rule, target)) {
        return { verdict: 'blocked', pattern: rule.pattern };
      }
    }
    return ALLOWED;
  }

  isBlocked(host: string): boolean {
    return this.evaluate(host).verdict === 'blocked';
  }

  /**
   * Atomically swap in a new blocklist. Invalid patterns throw before anything changes.
   */
  replace(patterns: readonly string[]): void {
    this.rules = AccessPolicy.compile(patterns);
  }

  get patterns(): string[] {
    return this.rules.map((r) => r.pattern);
  }

  get size(): number {
    return this.rules.length;
  }
}
