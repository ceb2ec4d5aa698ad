import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { RiskLevel, RemediationSource } from '../compliance/types';

export const register = new Registry();

export type BreakerStateLabel = 'closed' | 'half_open' | 'open' | 'isolated';
const BREAKER_STATE_VALUE: Record<BreakerStateLabel, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
  isolated: 3,
};

export const llmBreakerRequests = new Counter({
  name: 'llm_breaker_requests_total',
  help: 'Total text generation breaker executions',
  labelNames: ['model'],
  registers: [register],
});

export const llmBreakerSuccesses = new Counter({
  name: 'llm_breaker_successes_total',
  help: 'Total successful text generation breaker executions',
  labelNames: ['model'],
  registers: [register],
});

export const llmBreakerFailures = new Counter({
  name: 'llm_breaker_failures_total',
  help: 'Total failed text generation breaker executions',
  labelNames: ['model', 'kind'],
  registers: [register],
});

export const llmBreakerStateGauge = new Gauge({
  name: 'llm_breaker_state',
  help: 'Numeric representation of the text generation circuit breaker state (0=closed, 1=half-open, 2=open, 3=isolated)',
  labelNames: ['model'],
  registers: [register],
});

export const analysesTotal = new Counter({
  name: 'compliance_analyses_total',
  help: 'Total compliance analyses by outcome',
  labelNames: ['status'],
  registers: [register],
});

export const analysisDuration = new Histogram({
  name: 'compliance_analysis_duration_seconds',
  help: 'Compliance analysis duration in seconds',
  labelNames: ['status'],
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 30, 60],
  registers: [register],
});

export const analysisOverallRisk = new Counter({
  name: 'compliance_analysis_overall_risk_total',
  help: 'Completed analyses by overall risk',
  labelNames: ['risk'],
  registers: [register],
});

export const remediationClausesTotal = new Counter({
  name: 'compliance_remediation_clauses_total',
  help: 'Remediation clauses generated, by source',
  labelNames: ['regulation', 'source'],
  registers: [register],
});

export const remediationFallbacksTotal = new Counter({
  name: 'compliance_remediation_fallbacks_total',
  help: 'Remediation fallbacks by reason',
  labelNames: ['reason'],
  registers: [register],
});

export function recordLLMBreakerRequest(model: string) {
  llmBreakerRequests.inc({ model });
}

export function recordLLMBreakerSuccess(model: string) {
  llmBreakerSuccesses.inc({ model });
}

export function recordLLMBreakerFailure(model: string, kind: string) {
  llmBreakerFailures.inc({ model, kind });
}

export function recordLLMBreakerState(model: string, state: BreakerStateLabel) {
  llmBreakerStateGauge.set({ model }, BREAKER_STATE_VALUE[state]);
}

export function recordAnalysisMetrics(
  status: 'completed' | 'failed',
  durationMs: number,
  overallRisk?: RiskLevel
) {
  analysesTotal.inc({ status });
  analysisDuration.observe({ status }, durationMs / 1000);
  if (overallRisk) {
    analysisOverallRisk.inc({ risk: overallRisk });
  }
}

export function recordRemediation(regulation: string, source: RemediationSource, fallbackReason?: string) {
  remediationClausesTotal.inc({ regulation, source });
  if (fallbackReason) {
    remediationFallbacksTotal.inc({ reason: fallbackReason });
  }
}
