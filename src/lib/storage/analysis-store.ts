/**
 * Analysis persistence
 *
 * The analyzer hands every finished report to an AnalysisStore. Search,
 * history and stats live here, outside the engine. InMemoryAnalysisStore keeps
 * records for the lifetime of the process.
 */

import type { AnalysisReport, RiskLevel } from '../compliance/types';

export interface StoredAnalysis {
  analysisId: string;
  contractText: string;
  jurisdiction: string;
  industry: string;
  report: AnalysisReport;
  storedAt: Date;
}

export interface AnalysisSearchHit {
  analysisId: string;
  relevance: number;
  excerpt: string;
  overallScore: number;
  overallRisk: RiskLevel;
  storedAt: string;
}

export interface AnalysisHistoryEntry {
  analysisId: string;
  storedAt: string;
  jurisdiction: string;
  industry: string;
  regulations: string[];
  overallScore: number;
  overallRisk: RiskLevel;
}

export interface AnalysisStats {
  totalAnalyses: number;
  averageScore: number;
  riskDistribution: Record<RiskLevel, number>;
  regulationFrequency: Record<string, number>;
}

export interface AnalysisStore {
  save(record: Omit<StoredAnalysis, 'storedAt'>): Promise<void>;
  search(query: string, limit?: number): Promise<AnalysisSearchHit[]>;
  history(limit?: number, offset?: number): Promise<AnalysisHistoryEntry[]>;
  stats(): Promise<AnalysisStats>;
  cleanup(olderThanDays: number): Promise<number>;
}

const EXCERPT_CHARS = 200;
const DAY_MS = 24 * 60 * 60 * 1000;

function tokenize(query: string): string[] {
  return [...new Set(query.toLowerCase().split(/\W+/).filter((token) => token.length >= 2))];
}

export class InMemoryAnalysisStore implements AnalysisStore {
  private records = new Map<string, StoredAnalysis>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async save(record: Omit<StoredAnalysis, 'storedAt'>): Promise<void> {
    this.records.set(record.analysisId, { ...record, storedAt: this.clock() });
  }

  async get(analysisId: string): Promise<StoredAnalysis | undefined> {
    return this.records.get(analysisId);
  }

  /** Keyword search: relevance is the share of query tokens found in the contract. */
  async search(query: string, limit = 10): Promise<AnalysisSearchHit[]> {
    const tokens = tokenize(query);
    if (tokens.length === 0) return [];

    const hits: AnalysisSearchHit[] = [];
    for (const record of this.records.values()) {
      const text = record.contractText.toLowerCase();
      const matched = tokens.filter((token) => text.includes(token)).length;
      if (matched === 0) continue;
      hits.push({
        analysisId: record.analysisId,
        relevance: matched / tokens.length,
        excerpt: record.contractText.slice(0, EXCERPT_CHARS),
        overallScore: record.report.overallScore,
        overallRisk: record.report.overallRisk,
        storedAt: record.storedAt.toISOString(),
      });
    }

    return hits
      .sort((a, b) => b.relevance - a.relevance || b.storedAt.localeCompare(a.storedAt))
      .slice(0, limit);
  }

  async history(limit = 20, offset = 0): Promise<AnalysisHistoryEntry[]> {
    return [...this.records.values()]
      .sort((a, b) => b.storedAt.getTime() - a.storedAt.getTime())
      .slice(offset, offset + limit)
      .map((record) => ({
        analysisId: record.analysisId,
        storedAt: record.storedAt.toISOString(),
        jurisdiction: record.jurisdiction,
        industry: record.industry,
        regulations: [...record.report.regulations],
        overallScore: record.report.overallScore,
        overallRisk: record.report.overallRisk,
      }));
  }

  async stats(): Promise<AnalysisStats> {
    const riskDistribution: Record<RiskLevel, number> = { low: 0, medium: 0, high: 0 };
    const regulationFrequency: Record<string, number> = {};
    let scoreTotal = 0;

    for (const { report } of this.records.values()) {
      scoreTotal += report.overallScore;
      riskDistribution[report.overallRisk] += 1;
      for (const regulation of report.regulations) {
        regulationFrequency[regulation] = (regulationFrequency[regulation] ?? 0) + 1;
      }
    }

    const totalAnalyses = this.records.size;
    return {
      totalAnalyses,
      averageScore: totalAnalyses > 0 ? scoreTotal / totalAnalyses : 0,
      riskDistribution,
      regulationFrequency,
    };
  }

  async cleanup(olderThanDays: number): Promise<number> {
    const cutoff = this.clock().getTime() - olderThanDays * DAY_MS;
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.storedAt.getTime() < cutoff) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }
}
