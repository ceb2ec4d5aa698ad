import { describe, expect, it } from 'vitest';

import { checkFires, runContentChecks } from '@/lib/compliance/content-checks';
import { getDefaultRegistry } from '@/lib/compliance/registry';

describe('runContentChecks', () => {
  const registry = getDefaultRegistry();

  it('flags a lending contract without an APR disclosure', () => {
    const findings = runContentChecks(registry, 'TILA', 'Loan financing with a stated finance charge.');
    expect(findings).toEqual({
      issues: ['Missing APR disclosure'],
      recommendations: ['Add TILA-required APR disclosure'],
    });
  });

  it('matches terms case-insensitively', () => {
    const findings = runContentChecks(registry, 'TILA', 'The ANNUAL PERCENTAGE RATE and Finance Charge apply.');
    expect(findings.issues).toEqual([]);
  });

  it('only runs conditional checks when their trigger term occurs', () => {
    expect(runContentChecks(registry, 'FCRA', 'No adverse action without notice.').issues).toEqual([]);
    expect(runContentChecks(registry, 'FCRA', 'A credit check precedes any adverse action.').issues).toEqual([
      'Missing credit check authorization',
    ]);
  });

  it('returns empty findings for regulations without checks', () => {
    expect(runContentChecks(registry, 'EFTA', 'anything')).toEqual({ issues: [], recommendations: [] });
  });
});

describe('checkFires', () => {
  it('fires when the trigger list is empty and no exemption term occurs', () => {
    const check = { ifAny: [], unlessAny: ['opt out'], issue: 'i', recommendation: 'r' };
    expect(checkFires(check, 'plain text')).toBe(true);
    expect(checkFires(check, 'customers may opt out')).toBe(false);
  });
});
