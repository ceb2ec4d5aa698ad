import { describe, expect, it } from 'vitest';

import { DEFAULT_COMPLIANCE_POLICY, loadCompliancePolicy } from '@/lib/config/compliance-policy';
import { ComplianceConfigError } from '@/lib/compliance/errors';

describe('loadCompliancePolicy', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadCompliancePolicy({})).toEqual(DEFAULT_COMPLIANCE_POLICY);
  });

  it('reads tunables from environment variables', () => {
    const policy = loadCompliancePolicy({
      COMPLIANCE_PRESENCE_THRESHOLD: '1.5',
      COMPLIANCE_BASELINE_CLAUSES: '5',
      COMPLIANCE_MAX_WORKERS: '2',
      COMPLIANCE_ENHANCE_WITH_LLM: 'TRUE',
      COMPLIANCE_GENERATIVE_SUMMARIES: '0',
    });

    expect(policy.detection.presenceThreshold).toBe(1.5);
    expect(policy.scoring.baselineClauses).toBe(5);
    expect(policy.concurrency.maxWorkers).toBe(2);
    expect(policy.features).toEqual({ enhanceWithLlm: true, generativeSummaries: false });
  });

  it('ignores blank environment values', () => {
    expect(loadCompliancePolicy({ COMPLIANCE_SCORE_FLOOR: '  ' }).scoring.scoreFloor).toBe(0.1);
  });

  it('lets explicit overrides win over the environment', () => {
    const policy = loadCompliancePolicy(
      { COMPLIANCE_MAX_WORKERS: '2' },
      { concurrency: { maxWorkers: 4 }, report: { maxIssues: 3 } }
    );
    expect(policy.concurrency.maxWorkers).toBe(4);
    expect(policy.report).toEqual({ ...DEFAULT_COMPLIANCE_POLICY.report, maxIssues: 3 });
  });

  it('rejects non-numeric values', () => {
    expect(() => loadCompliancePolicy({ COMPLIANCE_SCORE_FLOOR: 'low' })).toThrow(
      'COMPLIANCE_SCORE_FLOOR must be a number'
    );
  });

  it('rejects values that are not booleans', () => {
    expect(() => loadCompliancePolicy({ COMPLIANCE_ENHANCE_WITH_LLM: 'sometimes' })).toThrow(
      'COMPLIANCE_ENHANCE_WITH_LLM must be true or false'
    );
  });

  it('validates the merged policy', () => {
    expect(() => loadCompliancePolicy({ COMPLIANCE_SCORE_FLOOR: '2' })).toThrow(ComplianceConfigError);
    expect(() => loadCompliancePolicy({}, { concurrency: { maxWorkers: 0 } })).toThrow(
      'Compliance policy validation failed'
    );
  });
});
