import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryAnalysisStore } from '@/lib/storage/analysis-store';
import { analysisReport } from './fixtures/reports';

describe('InMemoryAnalysisStore', () => {
  let now: Date;
  let store: InMemoryAnalysisStore;

  beforeEach(async () => {
    now = new Date('2026-01-10T00:00:00.000Z');
    store = new InMemoryAnalysisStore(() => now);

    await store.save({
      analysisId: 'analysis_a',
      contractText: 'Loan agreement with privacy terms',
      jurisdiction: 'US',
      industry: 'lending',
      report: analysisReport({
        analysisId: 'analysis_a',
        overallScore: 0.5,
        overallRisk: 'medium',
        regulations: ['GLBA', 'TILA'],
      }),
    });
    now = new Date('2026-01-11T00:00:00.000Z');
    await store.save({
      analysisId: 'analysis_b',
      contractText: 'Service agreement for privacy data',
      jurisdiction: 'US_CA',
      industry: 'general',
      report: analysisReport({
        analysisId: 'analysis_b',
        overallScore: 0.9,
        overallRisk: 'low',
        regulations: ['CCPA_CPRA', 'GLBA'],
      }),
    });
  });

  it('returns stored analyses by id', async () => {
    const stored = await store.get('analysis_a');
    expect(stored?.storedAt.toISOString()).toBe('2026-01-10T00:00:00.000Z');
    expect(await store.get('analysis_missing')).toBeUndefined();
  });

  it('ranks search hits by the share of matched query terms', async () => {
    const hits = await store.search('privacy loan');
    expect(hits.map((hit) => [hit.analysisId, hit.relevance])).toEqual([
      ['analysis_a', 1],
      ['analysis_b', 0.5],
    ]);
    expect(hits[0]?.excerpt).toBe('Loan agreement with privacy terms');
  });

  it('breaks relevance ties by recency', async () => {
    const hits = await store.search('privacy');
    expect(hits.map((hit) => hit.analysisId)).toEqual(['analysis_b', 'analysis_a']);
  });

  it('returns nothing for queries without usable terms', async () => {
    expect(await store.search('a')).toEqual([]);
    expect(await store.search('mortgage')).toEqual([]);
  });

  it('pages history newest first', async () => {
    expect((await store.history()).map((entry) => entry.analysisId)).toEqual(['analysis_b', 'analysis_a']);
    expect((await store.history(1, 1)).map((entry) => entry.analysisId)).toEqual(['analysis_a']);
  });

  it('aggregates statistics', async () => {
    const stats = await store.stats();
    expect(stats.totalAnalyses).toBe(2);
    expect(stats.averageScore).toBeCloseTo(0.7, 10);
    expect(stats.riskDistribution).toEqual({ low: 1, medium: 1, high: 0 });
    expect(stats.regulationFrequency).toEqual({ GLBA: 2, TILA: 1, CCPA_CPRA: 1 });
  });

  it('removes analyses older than the retention window', async () => {
    now = new Date('2026-01-20T00:00:00.000Z');
    expect(await store.cleanup(9)).toBe(1);
    expect(await store.get('analysis_a')).toBeUndefined();
    expect(await store.get('analysis_b')).toBeDefined();
  });
});
