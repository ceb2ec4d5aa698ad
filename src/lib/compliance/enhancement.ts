/**
 * Optional generative enhancement of per-regulation findings. May append
 * issues and recommendations, replace the risk assessment and supply legal
 * references. Any failure leaves the deterministic findings untouched.
 */

import { z } from 'zod';
import { boundedComplete, type TextGenerationService } from '../llm/text-generation';
import { logger } from '../observability/logger';
import { describeError } from './errors';
import type { RegulationFindings } from './gap-aggregator';
import type { ClauseRequirement } from './types';

const log = logger.child('enhancement');

const ENHANCEMENT_EXCERPT_CHARS = 1500;

export const ENHANCEMENT_SYSTEM_PROMPT =
  'You are a senior compliance officer. Provide detailed, actionable compliance analysis with ' +
  'specific recommendations.';

export const EnhancementResponseSchema = z.object({
  enhanced_issues: z.array(z.string()).optional(),
  recommendations: z.array(z.string()).optional(),
  risk_assessment: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['low', 'medium', 'high'])
    )
    .optional(),
  legal_references: z.array(z.string()).optional(),
});

export type EnhancementResponse = z.infer<typeof EnhancementResponseSchema>;

export function buildEnhancementPrompt(
  regulationId: string,
  contractText: string,
  findings: RegulationFindings,
  missing: readonly ClauseRequirement[]
): string {
  return [
    `Provide comprehensive compliance analysis for ${regulationId}:`,
    '',
    'CONTRACT EXCERPT:',
    contractText.slice(0, ENHANCEMENT_EXCERPT_CHARS),
    '',
    'CURRENT FINDINGS:',
    `- Compliance Score: ${(findings.complianceScore * 100).toFixed(1)}%`,
    `- Issues: ${findings.issues.join('; ') || 'none'}`,
    `- Missing Clauses: ${missing.map((clause) => clause.clause).join(', ') || 'none'}`,
    '',
    'Provide detailed analysis including:',
    '1. 3-5 specific compliance risks (key "enhanced_issues")',
    '2. 3-5 actionable recommendations (key "recommendations")',
    '3. Risk level assessment, one of high/medium/low (key "risk_assessment")',
    '4. Legal references/citations (key "legal_references")',
    '',
    'Respond with a single JSON object only.',
  ].join('\n');
}

/** Pull the first JSON object out of a completion, tolerating code fences. */
export function parseEnhancementResponse(raw: string): EnhancementResponse | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return null;
  }
  const result = EnhancementResponseSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function mergeEnhancement(
  findings: RegulationFindings,
  enhancement: EnhancementResponse
): RegulationFindings {
  return {
    complianceScore: findings.complianceScore,
    riskAssessment: enhancement.risk_assessment ?? findings.riskAssessment,
    issues: [...findings.issues, ...(enhancement.enhanced_issues ?? [])],
    recommendations: [...findings.recommendations, ...(enhancement.recommendations ?? [])],
    legalReferences: enhancement.legal_references ?? findings.legalReferences,
  };
}

export async function enhanceFindings(
  service: TextGenerationService,
  regulationId: string,
  contractText: string,
  findings: RegulationFindings,
  missing: readonly ClauseRequirement[],
  options: { maxTokens: number; timeoutMs: number }
): Promise<RegulationFindings> {
  let raw: string;
  try {
    raw = await boundedComplete(
      service,
      {
        systemPrompt: ENHANCEMENT_SYSTEM_PROMPT,
        userPrompt: buildEnhancementPrompt(regulationId, contractText, findings, missing),
        maxTokens: options.maxTokens,
      },
      options.timeoutMs
    );
  } catch (error) {
    log.warn('Enhancement unavailable, keeping deterministic findings', {
      regulation: regulationId,
      error: describeError(error),
    });
    return findings;
  }

  const enhancement = parseEnhancementResponse(raw);
  if (!enhancement) {
    log.warn('Enhancement response was not valid JSON, keeping deterministic findings', {
      regulation: regulationId,
    });
    return findings;
  }
  return mergeEnhancement(findings, enhancement);
}
