export { ComplianceAnalyzer } from './lib/compliance/analyzer';
export type { AnalysisEventSink, ComplianceAnalyzerOptions } from './lib/compliance/analyzer';
export {
  RegulationRegistry,
  RegulationCatalogSchema,
  DEFAULT_CATALOG_PATH,
  getDefaultRegistry,
} from './lib/compliance/registry';
export type { RegulationCatalog } from './lib/compliance/registry';
export { resolveApplicableRegulations, detectContentSignals, isCompatible } from './lib/compliance/applicability';
export { ClausePresenceDetector, extractKeywords } from './lib/compliance/clause-detector';
export type { ClauseSignalScore } from './lib/compliance/clause-detector';
export { runContentChecks } from './lib/compliance/content-checks';
export {
  aggregateOverall,
  buildRegulationFindings,
  complianceScore,
  computeComplianceScore,
  deriveOverallRisk,
  finalizeGapReport,
} from './lib/compliance/gap-aggregator';
export type { RegulationFindings } from './lib/compliance/gap-aggregator';
export { RemediationGenerator, buildFallbackClause } from './lib/compliance/remediation';
export type { RemediationResult, FallbackReason } from './lib/compliance/remediation';
export { inferContractContext } from './lib/compliance/context-inference';
export { buildExecutiveSummary, buildDetailedSummary, buildModifiedContract } from './lib/compliance/summaries';
export { AnalyzeContractRequestSchema } from './lib/compliance/request-schema';
export type { AnalyzeContractRequest } from './lib/compliance/request-schema';
export {
  ComplianceError,
  ComplianceConfigError,
  InvalidAnalysisRequestError,
  RegulationNotFoundError,
  TextGenerationError,
} from './lib/compliance/errors';
export type * from './lib/compliance/types';
export { loadCompliancePolicy, DEFAULT_COMPLIANCE_POLICY } from './lib/config/compliance-policy';
export type { CompliancePolicy, CompliancePolicyOverrides } from './lib/config/compliance-policy';
export {
  GroqTextGenerationService,
  createTextGenerationService,
} from './lib/llm/text-generation';
export type { TextGenerationService } from './lib/llm/text-generation';
export { InMemoryAnalysisStore } from './lib/storage/analysis-store';
export type { AnalysisStore, StoredAnalysis } from './lib/storage/analysis-store';
export {
  CompositeNotifier,
  LoggingNotifier,
  WebhookNotifier,
  createNotifierFromEnv,
} from './lib/notifications';
export type { AnalysisEvent, AnalysisNotifier } from './lib/notifications';
export { register as metricsRegistry } from './lib/monitoring/metrics';
