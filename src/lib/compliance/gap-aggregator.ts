/**
 * Gap & Score Aggregator
 *
 * Turns detector output into per-regulation findings and rolls those up into
 * the overall score and risk of an analysis.
 */

import type { CompliancePolicy } from '../config/compliance-policy';
import type { ContentFindings } from './content-checks';
import type {
  ClauseRequirement,
  MissingClause,
  RegulationGapReport,
  RiskLevel,
} from './types';

export type ScoringPolicy = CompliancePolicy['scoring'];
export type ReportPolicy = CompliancePolicy['report'];

/** Findings before optional enhancement and truncation. */
export interface RegulationFindings {
  complianceScore: number;
  riskAssessment: RiskLevel;
  issues: string[];
  recommendations: string[];
  legalReferences: string[];
}

export function complianceScore(missingCount: number, totalClauses: number, policy: ScoringPolicy): number {
  if (totalClauses <= 0) return 1.0;
  return Math.max(policy.scoreFloor, 1.0 - (missingCount / totalClauses) * policy.missingPenalty);
}

/**
 * Score with the smoothing baseline: the denominator is the missing count plus
 * `baselineClauses` implicit contextual clauses.
 */
export function computeComplianceScore(missingCount: number, policy: ScoringPolicy): number {
  return complianceScore(missingCount, missingCount + policy.baselineClauses, policy);
}

export function buildRegulationFindings(
  regulationId: string,
  missing: readonly ClauseRequirement[],
  content: ContentFindings,
  policy: Pick<CompliancePolicy, 'scoring' | 'report'>
): RegulationFindings {
  const issues: string[] = [];
  const recommendations: string[] = [];

  if (missing.length > 0) {
    const highRisk = missing.filter((clause) => clause.riskLevel === 'high').length;
    if (highRisk > 0) {
      issues.push(`Missing ${highRisk} high-risk compliance clauses`);
    }
    issues.push(`Total ${missing.length} ${regulationId} compliance gaps`);

    recommendations.push(`Implement comprehensive ${regulationId} compliance section`);
    for (const clause of missing.slice(0, policy.report.recommendedClauses)) {
      recommendations.push(`Add '${clause.clause}' clause`);
    }
  }

  issues.push(...content.issues);
  recommendations.push(...content.recommendations);

  return {
    complianceScore: computeComplianceScore(missing.length, policy.scoring),
    // Deterministic path never escalates or lowers risk.
    riskAssessment: 'medium',
    issues,
    recommendations,
    legalReferences: [],
  };
}

export function finalizeGapReport(
  regulation: string,
  findings: RegulationFindings,
  missingClauses: readonly MissingClause[],
  policy: ReportPolicy
): RegulationGapReport {
  return {
    regulation,
    complianceScore: findings.complianceScore,
    riskAssessment: findings.riskAssessment,
    issues: findings.issues.slice(0, policy.maxIssues),
    recommendations: findings.recommendations.slice(0, policy.maxRecommendations),
    missingClauses: [...missingClauses],
    legalReferences: [...findings.legalReferences],
  };
}

export function deriveOverallRisk(risks: readonly RiskLevel[]): RiskLevel {
  if (risks.includes('high')) return 'high';
  if (risks.includes('medium')) return 'medium';
  return 'low';
}

export function aggregateOverall(results: readonly RegulationGapReport[]): {
  overallScore: number;
  overallRisk: RiskLevel;
} {
  if (results.length === 0) {
    return { overallScore: 0.0, overallRisk: 'low' };
  }
  const total = results.reduce((sum, result) => sum + result.complianceScore, 0);
  return {
    overallScore: total / results.length,
    overallRisk: deriveOverallRisk(results.map((result) => result.riskAssessment)),
  };
}
