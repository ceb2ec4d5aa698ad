// Compliance engine domain types

export type RiskLevel = 'low' | 'medium' | 'high';

export const GLOBAL_JURISDICTION = 'global';
export const ALL_INDUSTRIES = 'all';

export interface ClauseRequirement {
  readonly clause: string;
  readonly description: string;
  readonly riskLevel: RiskLevel;
  readonly requirements: readonly string[];
  readonly legalCitation?: string;
}

export interface RegulationDefinition {
  readonly id: string;
  readonly title: string;
  readonly clauses: readonly ClauseRequirement[];
  readonly jurisdictions: ReadonlySet<string>;
  readonly industries: ReadonlySet<string>;
}

export interface ContentSignalGroup {
  readonly name: string;
  readonly terms: readonly string[];
  readonly regulations: readonly string[];
}

/**
 * Regulation-specific lexical check. Fires when `ifAny` is empty or one of its
 * terms occurs, and none of `unlessAny` occurs.
 */
export interface ContentCheck {
  readonly ifAny: readonly string[];
  readonly unlessAny: readonly string[];
  readonly issue: string;
  readonly recommendation: string;
}

export interface AnalysisContext {
  readonly jurisdiction: string;
  readonly industry: string;
  readonly contractText: string;
}

export interface MissingClause {
  readonly requirement: ClauseRequirement;
  readonly suggestedText: string;
  readonly legalCitation: string;
  readonly suggestionSource: RemediationSource;
}

export type RemediationSource = 'llm' | 'fallback';

export interface RegulationGapReport {
  readonly regulation: string;
  readonly complianceScore: number;
  readonly riskAssessment: RiskLevel;
  readonly issues: readonly string[];
  readonly recommendations: readonly string[];
  readonly missingClauses: readonly MissingClause[];
  readonly legalReferences: readonly string[];
}

export interface AnalysisReport {
  readonly analysisId: string;
  readonly overallScore: number;
  readonly overallRisk: RiskLevel;
  readonly results: readonly RegulationGapReport[];
  readonly summary: string;
  readonly detailedSummary: string;
  readonly modifiedContract: string;
  readonly jurisdiction: string;
  readonly industry: string;
  readonly regulations: readonly string[];
  readonly analyzedAt: string;
  readonly processingTimeMs: number;
}

export interface InferredContractContext {
  jurisdiction: string;
  industry: string;
  contractType: string;
  keyConcerns: string[];
}
