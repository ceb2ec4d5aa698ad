import { describe, expect, it, vi } from 'vitest';

import {
  SummaryWriter,
  buildDetailedSummary,
  buildExecutiveSummary,
  buildModifiedContract,
  formatPercent,
} from '@/lib/compliance/summaries';
import { DEFAULT_COMPLIANCE_POLICY } from '@/lib/config/compliance-policy';
import { clause, gapReport, missingClause } from './fixtures/reports';

describe('formatPercent', () => {
  it('renders one decimal place', () => {
    expect(formatPercent(0.68)).toBe('68.0%');
    expect(formatPercent(1)).toBe('100.0%');
  });
});

describe('buildExecutiveSummary', () => {
  it('summarises an analysis without regulations', () => {
    expect(buildExecutiveSummary([], 0, 'low').split('\n')).toEqual([
      'COMPLIANCE ANALYSIS EXECUTIVE SUMMARY',
      '',
      'Overall Compliance Score: 0.0%',
      'Risk Level: LOW',
      '',
      'REGULATIONS ANALYZED: 0',
      '• High Risk: 0 regulations',
      '• Medium Risk: 0 regulations',
      '• Low Risk: 0 regulations',
      '',
      'CRITICAL FINDINGS:',
      '• No high-risk regulations identified',
      '',
      'RECOMMENDED ACTIONS:',
      '1. Address high-risk compliance gaps immediately',
      '2. Implement suggested clause additions',
      '3. Conduct legal review of compliance findings',
      '4. Establish ongoing compliance monitoring',
    ]);
  });

  it('lists high-risk regulations as critical findings', () => {
    const lines = buildExecutiveSummary(
      [gapReport({ riskAssessment: 'high' }), gapReport({ regulation: 'TILA', riskAssessment: 'low' })],
      0.8,
      'high'
    ).split('\n');
    expect(lines).toContain('• GLBA: 1 missing clauses');
    expect(lines).toContain('• Low Risk: 1 regulations');
    expect(lines).not.toContain('• No high-risk regulations identified');
  });
});

describe('buildDetailedSummary', () => {
  it('renders each regulation with its issues and recommendations', () => {
    const lines = buildDetailedSummary([gapReport()]).split('\n');
    expect(lines.slice(0, 12)).toEqual([
      'DETAILED COMPLIANCE ANALYSIS REPORT',
      '='.repeat(50),
      '',
      'REGULATION: GLBA',
      'Compliance Score: 80.0%',
      'Risk Assessment: MEDIUM',
      '',
      'ISSUES IDENTIFIED:',
      '• Total 1 GLBA compliance gaps',
      '',
      'RECOMMENDATIONS:',
      '• Implement comprehensive GLBA compliance section',
    ]);
  });
});

describe('buildModifiedContract', () => {
  it('appends suggested clauses after the original text', () => {
    const contract = buildModifiedContract(
      'Original contract body.',
      [
        gapReport(),
        gapReport({ regulation: 'TILA', missingClauses: [] }),
        gapReport({
          regulation: 'EFTA',
          missingClauses: [
            missingClause({
              requirement: clause({ clause: 'Transfers', riskLevel: 'medium', requirements: ['EFT authorization'] }),
              legalCitation: '',
              suggestedText: 'TRANSFERS',
            }),
          ],
        }),
      ],
      '2026-01-10T00:00:00.000Z'
    );
    const lines = contract.split('\n');

    expect(lines[0]).toBe('Original contract body.');
    expect(lines).toContain('Analysis Date: 2026-01-10T00:00:00.000Z');
    expect(lines).toContain('GLBA COMPLIANCE ADDITIONS');
    expect(lines).not.toContain('TILA COMPLIANCE ADDITIONS');
    expect(lines).toContain('HIGH RISK: Financial Privacy Notice');
    expect(lines).toContain('Legal Reference: 15 U.S.C. § 6801-6809');
    expect(lines).toContain('MEDIUM RISK: Transfers');
    expect(lines.filter((line) => line.startsWith('Legal Reference:'))).toHaveLength(1);
    expect(lines).toContain('Requirements: EFT authorization');
  });
});

describe('SummaryWriter', () => {
  const policy = DEFAULT_COMPLIANCE_POLICY;
  const results = [gapReport()];

  it('uses the deterministic summary without a service', async () => {
    const writer = new SummaryWriter(null, policy);
    await expect(writer.executiveSummary(results, 0.8, 'medium', 'contract')).resolves.toBe(
      buildExecutiveSummary(results, 0.8, 'medium')
    );
  });

  it('does not call the service when generative summaries are disabled', async () => {
    const complete = vi.fn(async () => 'Generated summary');
    const writer = new SummaryWriter(
      { complete },
      { ...policy, features: { ...policy.features, generativeSummaries: false } }
    );

    await expect(writer.detailedSummary(results, 'contract')).resolves.toBe(buildDetailedSummary(results));
    expect(complete).not.toHaveBeenCalled();
  });

  it('prefers generated text when available', async () => {
    const writer = new SummaryWriter({ complete: async () => '  Generated summary  ' }, policy);
    await expect(writer.detailedSummary(results, 'contract')).resolves.toBe('Generated summary');
  });

  it('falls back when the generated text is the degraded sentinel', async () => {
    const writer = new SummaryWriter(
      { complete: async () => 'AI analysis completed with limited functionality.' },
      policy
    );
    await expect(writer.executiveSummary(results, 0.8, 'medium', 'contract')).resolves.toBe(
      buildExecutiveSummary(results, 0.8, 'medium')
    );
  });
});
