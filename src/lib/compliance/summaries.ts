import type { CompliancePolicy } from '../config/compliance-policy';
import { boundedComplete, type TextGenerationService } from '../llm/text-generation';
import { logger } from '../observability/logger';
import { describeError } from './errors';
import type { RegulationGapReport, RiskLevel } from './types';

const log = logger.child('summaries');

const RULE = '='.repeat(50);
const WIDE_RULE = '='.repeat(80);
const CLAUSE_RULE = '-'.repeat(60);

const RISK_LABELS: Record<RiskLevel, string> = {
  high: 'HIGH RISK',
  medium: 'MEDIUM RISK',
  low: 'LOW RISK',
};

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function buildExecutiveSummary(
  results: readonly RegulationGapReport[],
  overallScore: number,
  overallRisk: RiskLevel
): string {
  const high = results.filter((result) => result.riskAssessment === 'high');
  const medium = results.filter((result) => result.riskAssessment === 'medium');
  const critical = high.map((result) => `• ${result.regulation}: ${result.missingClauses.length} missing clauses`);

  return [
    'COMPLIANCE ANALYSIS EXECUTIVE SUMMARY',
    '',
    `Overall Compliance Score: ${formatPercent(overallScore)}`,
    `Risk Level: ${overallRisk.toUpperCase()}`,
    '',
    `REGULATIONS ANALYZED: ${results.length}`,
    `• High Risk: ${high.length} regulations`,
    `• Medium Risk: ${medium.length} regulations`,
    `• Low Risk: ${results.length - high.length - medium.length} regulations`,
    '',
    'CRITICAL FINDINGS:',
    ...(critical.length > 0 ? critical : ['• No high-risk regulations identified']),
    '',
    'RECOMMENDED ACTIONS:',
    '1. Address high-risk compliance gaps immediately',
    '2. Implement suggested clause additions',
    '3. Conduct legal review of compliance findings',
    '4. Establish ongoing compliance monitoring',
  ].join('\n');
}

export function buildDetailedSummary(results: readonly RegulationGapReport[]): string {
  const lines = ['DETAILED COMPLIANCE ANALYSIS REPORT', RULE, ''];
  for (const result of results) {
    lines.push(
      `REGULATION: ${result.regulation}`,
      `Compliance Score: ${formatPercent(result.complianceScore)}`,
      `Risk Assessment: ${result.riskAssessment.toUpperCase()}`,
      '',
      'ISSUES IDENTIFIED:',
      ...result.issues.map((issue) => `• ${issue}`),
      '',
      'RECOMMENDATIONS:',
      ...result.recommendations.map((recommendation) => `• ${recommendation}`),
      '',
      RULE,
      ''
    );
  }
  return lines.join('\n');
}

/**
 * Original contract followed by a compliance-additions section with the
 * suggested text for every missing clause.
 */
export function buildModifiedContract(
  originalText: string,
  results: readonly RegulationGapReport[],
  analyzedAt: string
): string {
  const lines = [originalText, '', WIDE_RULE, 'COMPLIANCE ENHANCEMENTS', WIDE_RULE, '', `Analysis Date: ${analyzedAt}`, ''];
  for (const result of results) {
    if (result.missingClauses.length === 0) continue;
    lines.push(`${result.regulation} COMPLIANCE ADDITIONS`, RULE, '');
    for (const missing of result.missingClauses) {
      const { requirement } = missing;
      lines.push(`${RISK_LABELS[requirement.riskLevel]}: ${requirement.clause}`);
      lines.push(`Description: ${requirement.description}`);
      if (missing.legalCitation) {
        lines.push(`Legal Reference: ${missing.legalCitation}`);
      }
      lines.push(`Requirements: ${requirement.requirements.join(', ')}`, '');
      lines.push('SUGGESTED CLAUSE:', missing.suggestedText, '', CLAUSE_RULE, '');
    }
  }
  return lines.join('\n');
}

const EXECUTIVE_SYSTEM_PROMPT =
  'You are a Chief Compliance Officer. Create concise executive summaries for business ' +
  'stakeholders focusing on risk and action items.';

const DETAILED_SYSTEM_PROMPT = 'You are a legal compliance analyst. Provide detailed technical analysis.';

/**
 * Produces the report summaries, preferring the generative text service when
 * enabled and using the deterministic builders otherwise.
 */
export class SummaryWriter {
  constructor(
    private readonly service: TextGenerationService | null,
    private readonly policy: Pick<CompliancePolicy, 'remediation' | 'features'>
  ) {}

  async executiveSummary(
    results: readonly RegulationGapReport[],
    overallScore: number,
    overallRisk: RiskLevel,
    contractText: string
  ): Promise<string> {
    const fallback = buildExecutiveSummary(results, overallScore, overallRisk);
    const prompt = [
      'Create an executive summary for compliance analysis:',
      '',
      `OVERALL SCORE: ${formatPercent(overallScore)}`,
      `RISK LEVEL: ${overallRisk.toUpperCase()}`,
      '',
      'KEY FINDINGS:',
      ...results.map(
        (result) =>
          `- ${result.regulation}: ${formatPercent(result.complianceScore)} (${result.riskAssessment} risk)`
      ),
      '',
      `CONTRACT TYPE: ${contractText.slice(0, this.policy.remediation.excerptChars)}`,
      '',
      'Focus on overall risk, critical compliance gaps, priority recommendations and business impact.',
      'Keep it concise and actionable for executives.',
    ].join('\n');
    return this.generateOr(EXECUTIVE_SYSTEM_PROMPT, prompt, fallback);
  }

  async detailedSummary(results: readonly RegulationGapReport[], contractText: string): Promise<string> {
    const fallback = buildDetailedSummary(results);
    const prompt = [
      'Provide comprehensive compliance analysis:',
      '',
      `RESULTS: ${JSON.stringify(
        results.map(({ regulation, complianceScore, riskAssessment, issues, recommendations }) => ({
          regulation,
          complianceScore,
          riskAssessment,
          issues,
          recommendations,
        })),
        null,
        2
      )}`,
      `CONTRACT: ${contractText.slice(0, 1000)}`,
      '',
      'Include detailed risk analysis, legal implications, an implementation roadmap and compliance monitoring suggestions.',
    ].join('\n');
    return this.generateOr(DETAILED_SYSTEM_PROMPT, prompt, fallback);
  }

  private async generateOr(systemPrompt: string, userPrompt: string, fallback: string): Promise<string> {
    if (!this.service || !this.policy.features.generativeSummaries) {
      return fallback;
    }
    try {
      const text = (
        await boundedComplete(
          this.service,
          { systemPrompt, userPrompt, maxTokens: this.policy.remediation.maxTokens },
          this.policy.remediation.timeoutMs
        )
      ).trim();
      if (text.length === 0 || text.includes(this.policy.remediation.degradedSentinel)) {
        log.warn('Summary generation returned unusable text, using fallback');
        return fallback;
      }
      return text;
    } catch (error) {
      log.warn('Summary generation degraded, using fallback', { error: describeError(error) });
      return fallback;
    }
  }
}
