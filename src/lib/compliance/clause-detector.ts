/**
 * Clause Presence Detector
 *
 * Lexical heuristic that decides whether each required clause of a
 * regulation is represented in a contract. Three signals are combined:
 * - clause-name keywords found in the text
 * - leading requirement phrases with at least one word in the text
 * - per-clause synonym phrases from the catalog's concept table
 *
 * The outcome is directional, not certain. Weights and threshold come from
 * the compliance policy.
 */

import type { CompliancePolicy } from '../config/compliance-policy';
import type { RegulationRegistry } from './registry';
import type { ClauseRequirement } from './types';

const STOP_WORDS = new Set(['the', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by']);

export interface ClauseSignalScore {
  keywordMatches: number;
  requirementMatches: number;
  conceptMatches: number;
  score: number;
  present: boolean;
}

export type DetectionPolicy = CompliancePolicy['detection'];

export function extractKeywords(text: string, policy: DetectionPolicy): string[] {
  const pattern = new RegExp(`\\b[a-z]{${policy.minKeywordLength},}\\b`, 'g');
  const words = text.toLowerCase().match(pattern) ?? [];
  return words.filter((word) => !STOP_WORDS.has(word)).slice(0, policy.maxKeywords);
}

export class ClausePresenceDetector {
  constructor(
    private readonly registry: RegulationRegistry,
    private readonly policy: DetectionPolicy
  ) {}

  /**
   * Score a clause against contract text. `text` may be in any case; it is
   * lowercased before matching.
   */
  scoreClause(clause: ClauseRequirement, text: string): ClauseSignalScore {
    const contract = text.toLowerCase();

    const keywordMatches = extractKeywords(clause.clause, this.policy).filter((keyword) =>
      contract.includes(keyword)
    ).length;

    const requirementMatches = clause.requirements
      .slice(0, this.policy.maxRequirementPhrases)
      .filter((requirement) =>
        requirement
          .toLowerCase()
          .split(/\s+/)
          .filter((word) => word.length > 0)
          .some((word) => contract.includes(word))
      ).length;

    const conceptMatches = this.registry
      .conceptsFor(clause.clause)
      .filter((concept) => contract.includes(concept)).length;

    const score =
      keywordMatches * this.policy.keywordWeight +
      requirementMatches * this.policy.requirementWeight +
      conceptMatches * this.policy.conceptWeight;

    return {
      keywordMatches,
      requirementMatches,
      conceptMatches,
      score,
      present: score >= this.policy.presenceThreshold,
    };
  }

  isPresent(clause: ClauseRequirement, text: string): boolean {
    return this.scoreClause(clause, text).present;
  }

  /**
   * Required clauses of `regulationId` not represented in the text, in
   * catalog order. Throws RegulationNotFoundError for an unknown id.
   */
  missingClauses(regulationId: string, contractText: string): ClauseRequirement[] {
    const definition = this.registry.get(regulationId);
    return definition.clauses.filter((clause) => !this.isPresent(clause, contractText));
  }
}
