/**
 * Remediation Text Generator
 *
 * Suggests clause text for a gap. Asks the generative text service first and
 * falls back to a fixed template whenever the answer is unusable, so callers
 * always get text back.
 */

import type { CompliancePolicy } from '../config/compliance-policy';
import { boundedComplete, type TextGenerationService } from '../llm/text-generation';
import { recordRemediation } from '../monitoring/metrics';
import { logger } from '../observability/logger';
import { TextGenerationError, describeError } from './errors';
import type { RemediationSource } from './types';

const log = logger.child('remediation');

export type RemediationPolicy = CompliancePolicy['remediation'];

export type FallbackReason = 'unavailable' | 'timeout' | 'malformed' | 'empty' | 'too_short' | 'degraded';

export interface RemediationResult {
  text: string;
  source: RemediationSource;
  fallbackReason?: FallbackReason;
}

export const REMEDIATION_SYSTEM_PROMPT =
  'You are a senior legal compliance expert with 15+ years of experience in corporate law and ' +
  'regulatory compliance. Generate professional, legally sound contract clauses that are ' +
  'enforceable and comprehensive.';

export function buildRemediationPrompt(
  regulationId: string,
  clause: string,
  requirements: readonly string[],
  contractExcerpt: string
): string {
  return [
    `Generate a professional legal clause for a commercial contract addressing: ${clause}`,
    '',
    `REGULATION: ${regulationId}`,
    `KEY REQUIREMENTS: ${requirements.join(', ')}`,
    `CONTRACT CONTEXT: ${contractExcerpt}`,
    '',
    'The clause must be:',
    '- Legally precise and enforceable',
    '- Comprehensive yet concise',
    '- Written in formal commercial contract language',
    '- Include specific obligations, responsibilities, and remedies',
    '- Reference the relevant regulation appropriately',
    '- Suitable for commercial use',
    '',
    'Provide only the clause text without explanations.',
  ].join('\n');
}

export function buildFallbackClause(
  regulationId: string,
  clause: string,
  requirements: readonly string[]
): string {
  return [
    clause.toUpperCase(),
    '',
    `The Parties shall comply with all applicable requirements under ${regulationId} regarding ${clause}, ` +
      `including but not limited to: ${requirements.join(', ')}.`,
    '',
    'Appropriate technical and organizational measures shall be implemented to ensure ongoing compliance. ' +
      'All compliance activities shall be properly documented and made available for audit upon request. ' +
      'In case of non-compliance, the Parties shall take immediate corrective action and notify relevant ' +
      'stakeholders as required by applicable law.',
  ].join('\n');
}

export class RemediationGenerator {
  constructor(
    private readonly service: TextGenerationService | null,
    private readonly policy: RemediationPolicy
  ) {}

  async generate(
    regulationId: string,
    clause: string,
    requirements: readonly string[],
    contractExcerpt: string
  ): Promise<string> {
    return (await this.generateDetailed(regulationId, clause, requirements, contractExcerpt)).text;
  }

  async generateDetailed(
    regulationId: string,
    clause: string,
    requirements: readonly string[],
    contractExcerpt: string
  ): Promise<RemediationResult> {
    const candidate = await this.requestClause(regulationId, clause, requirements, contractExcerpt);
    const reason = typeof candidate === 'string' ? this.rejectReason(candidate) : candidate.reason;

    if (reason === undefined && typeof candidate === 'string') {
      recordRemediation(regulationId, 'llm');
      return { text: candidate.trim(), source: 'llm' };
    }

    log.warn('Using fallback remediation clause', { regulation: regulationId, clause, reason });
    recordRemediation(regulationId, 'fallback', reason);
    return {
      text: buildFallbackClause(regulationId, clause, requirements),
      source: 'fallback',
      fallbackReason: reason,
    };
  }

  private async requestClause(
    regulationId: string,
    clause: string,
    requirements: readonly string[],
    contractExcerpt: string
  ): Promise<string | { reason: FallbackReason }> {
    if (!this.service) {
      return { reason: 'unavailable' };
    }
    try {
      return await boundedComplete(
        this.service,
        {
          systemPrompt: REMEDIATION_SYSTEM_PROMPT,
          userPrompt: buildRemediationPrompt(
            regulationId,
            clause,
            requirements,
            contractExcerpt.slice(0, this.policy.excerptChars)
          ),
          maxTokens: this.policy.maxTokens,
        },
        this.policy.timeoutMs
      );
    } catch (error) {
      log.warn('Remediation text generation degraded', {
        regulation: regulationId,
        clause,
        error: describeError(error),
      });
      return { reason: error instanceof TextGenerationError ? error.kind : 'unavailable' };
    }
  }

  private rejectReason(text: string): FallbackReason | undefined {
    const trimmed = text.trim();
    if (trimmed.length === 0) return 'empty';
    if (trimmed.includes(this.policy.degradedSentinel)) return 'degraded';
    if (trimmed.length < this.policy.minClauseLength) return 'too_short';
    return undefined;
  }
}
