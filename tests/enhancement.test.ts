import { describe, expect, it, vi } from 'vitest';

import { enhanceFindings, parseEnhancementResponse } from '@/lib/compliance/enhancement';
import type { RegulationFindings } from '@/lib/compliance/gap-aggregator';
import { clause } from './fixtures/reports';

const findings: RegulationFindings = {
  complianceScore: 0.8,
  riskAssessment: 'medium',
  issues: ['Total 1 GLBA compliance gaps'],
  recommendations: ['Implement comprehensive GLBA compliance section'],
  legalReferences: [],
};

describe('parseEnhancementResponse', () => {
  it('extracts a JSON object wrapped in prose or code fences', () => {
    const raw = 'Here you go:\n```json\n{"enhanced_issues": ["No opt-out notice"], "risk_assessment": " HIGH "}\n```';
    expect(parseEnhancementResponse(raw)).toEqual({
      enhanced_issues: ['No opt-out notice'],
      risk_assessment: 'high',
    });
  });

  it('returns null for text without a valid object', () => {
    expect(parseEnhancementResponse('no json here')).toBeNull();
    expect(parseEnhancementResponse('{not: json}')).toBeNull();
    expect(parseEnhancementResponse('{"risk_assessment": "severe"}')).toBeNull();
  });
});

describe('enhanceFindings', () => {
  const options = { maxTokens: 500, timeoutMs: 1_000 };

  it('merges generated issues, risk and legal references', async () => {
    const complete = vi.fn(async () =>
      JSON.stringify({
        enhanced_issues: ['Privacy notice lacks annual delivery'],
        recommendations: ['Schedule annual privacy notices'],
        risk_assessment: 'high',
        legal_references: ['16 CFR Part 313'],
      })
    );

    const result = await enhanceFindings({ complete }, 'GLBA', 'contract', findings, [clause()], options);

    expect(result).toEqual({
      complianceScore: 0.8,
      riskAssessment: 'high',
      issues: ['Total 1 GLBA compliance gaps', 'Privacy notice lacks annual delivery'],
      recommendations: ['Implement comprehensive GLBA compliance section', 'Schedule annual privacy notices'],
      legalReferences: ['16 CFR Part 313'],
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('keeps the deterministic findings when the service fails', async () => {
    const service = {
      complete: async (): Promise<string> => {
        throw new Error('rate limited');
      },
    };
    await expect(enhanceFindings(service, 'GLBA', 'contract', findings, [], options)).resolves.toBe(findings);
  });

  it('keeps the deterministic findings when the answer is not JSON', async () => {
    const service = { complete: async () => 'The contract looks mostly fine.' };
    await expect(enhanceFindings(service, 'GLBA', 'contract', findings, [], options)).resolves.toBe(findings);
  });
});
