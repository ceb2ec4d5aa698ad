/**
 * Compliance Analyzer
 *
 * Runs one analysis end to end:
 * resolve regulations -> detect missing clauses -> score -> remediate -> report.
 * Regulations are processed on a bounded worker pool; results always come back
 * in sorted regulation-id order.
 */

import crypto from 'crypto';
import { TaskCancelledError, TimeoutStrategy, timeout } from 'cockatiel';
import pLimit from 'p-limit';
import { loadCompliancePolicy, type CompliancePolicy } from '../config/compliance-policy';
import { createTextGenerationService, type TextGenerationService } from '../llm/text-generation';
import { recordAnalysisMetrics } from '../monitoring/metrics';
import { createNotifierFromEnv } from '../notifications';
import type { AnalysisEvent } from '../notifications/types';
import { logger } from '../observability/logger';
import { InMemoryAnalysisStore, type AnalysisStore } from '../storage/analysis-store';
import { resolveApplicableRegulations } from './applicability';
import { ClausePresenceDetector } from './clause-detector';
import { runContentChecks } from './content-checks';
import { inferContractContext } from './context-inference';
import { enhanceFindings } from './enhancement';
import { describeError } from './errors';
import { aggregateOverall, buildRegulationFindings, finalizeGapReport } from './gap-aggregator';
import { getDefaultRegistry, type RegulationRegistry } from './registry';
import { RemediationGenerator } from './remediation';
import {
  parseAnalyzeContractRequest,
  type AnalyzeContractRequest,
  type ParsedAnalyzeContractRequest,
} from './request-schema';
import { SummaryWriter, buildModifiedContract } from './summaries';
import type { AnalysisContext, AnalysisReport, MissingClause, RegulationGapReport } from './types';

const log = logger.child('analyzer');

const DEFAULT_NOTIFICATION_TIMEOUT_MS = 15_000;

export interface AnalysisEventSink {
  notify(event: AnalysisEvent): Promise<unknown>;
}

export interface ComplianceAnalyzerOptions {
  registry?: RegulationRegistry;
  policy?: CompliancePolicy;
  textGeneration?: TextGenerationService | null;
  notifier?: AnalysisEventSink | null;
  store?: AnalysisStore | null;
  idGenerator?: () => string;
  clock?: () => Date;
  /** Upper bound on waiting for one lifecycle event to be delivered. */
  notificationTimeoutMs?: number;
}

export class ComplianceAnalyzer {
  readonly registry: RegulationRegistry;
  readonly policy: CompliancePolicy;
  private readonly textGeneration: TextGenerationService | null;
  private readonly notifier: AnalysisEventSink | null;
  private readonly store: AnalysisStore | null;
  private readonly detector: ClausePresenceDetector;
  private readonly remediation: RemediationGenerator;
  private readonly summaries: SummaryWriter;
  private readonly idGenerator: () => string;
  private readonly clock: () => Date;
  private readonly notificationTimeoutMs: number;

  constructor(options: ComplianceAnalyzerOptions = {}) {
    this.registry = options.registry ?? getDefaultRegistry();
    this.policy = options.policy ?? loadCompliancePolicy();
    this.textGeneration = options.textGeneration ?? null;
    this.notifier = options.notifier ?? null;
    this.store = options.store ?? null;
    this.idGenerator = options.idGenerator ?? (() => `analysis_${crypto.randomUUID()}`);
    this.clock = options.clock ?? (() => new Date());
    this.notificationTimeoutMs = options.notificationTimeoutMs ?? DEFAULT_NOTIFICATION_TIMEOUT_MS;
    this.detector = new ClausePresenceDetector(this.registry, this.policy.detection);
    this.remediation = new RemediationGenerator(this.textGeneration, this.policy.remediation);
    this.summaries = new SummaryWriter(this.textGeneration, this.policy);
  }

  /** Wire the analyzer from environment variables: Groq key, webhook URL, policy overrides. */
  static fromEnv(env: Record<string, string | undefined> = process.env): ComplianceAnalyzer {
    const policy = loadCompliancePolicy(env);
    return new ComplianceAnalyzer({
      policy,
      textGeneration: createTextGenerationService(env, policy.remediation.timeoutMs),
      notifier: createNotifierFromEnv(env),
      store: new InMemoryAnalysisStore(),
    });
  }

  async analyze(input: AnalyzeContractRequest): Promise<AnalysisReport> {
    const startedAt = Date.now();
    try {
      const request = parseAnalyzeContractRequest(input);
      const context = this.buildContext(request);
      const regulations = this.selectRegulations(request, context);
      const analysisId = this.idGenerator();

      log.info('Analysis started', {
        analysisId,
        jurisdiction: context.jurisdiction,
        industry: context.industry,
        regulations,
      });
      await this.emit({
        type: 'analysis.started',
        analysisId,
        jurisdiction: context.jurisdiction,
        industry: context.industry,
        regulations,
        startedAt: this.clock().toISOString(),
      });

      const results = await this.analyzeRegulations(regulations, context);
      const report = await this.buildReport(analysisId, context, regulations, results, startedAt);

      recordAnalysisMetrics('completed', report.processingTimeMs, report.overallRisk);
      log.info('Analysis completed', {
        analysisId,
        overallScore: report.overallScore,
        overallRisk: report.overallRisk,
        processingTimeMs: report.processingTimeMs,
      });

      await this.persist(report, context);
      await this.emit({
        type: 'analysis.completed',
        analysisId,
        overallScore: report.overallScore,
        overallRisk: report.overallRisk,
        regulationsAnalyzed: results.length,
        highRiskRegulations: results.filter((result) => result.riskAssessment === 'high').length,
        missingClauses: results.reduce((sum, result) => sum + result.missingClauses.length, 0),
        processingTimeMs: report.processingTimeMs,
        completedAt: report.analyzedAt,
      });
      return report;
    } catch (error) {
      recordAnalysisMetrics('failed', Date.now() - startedAt);
      log.error('Analysis failed', { error: describeError(error) });
      throw error;
    }
  }

  /** Regulations that would be analysed for a context when none are requested explicitly. */
  resolveRegulations(context: AnalysisContext): string[] {
    return resolveApplicableRegulations(this.registry, context);
  }

  private buildContext(request: ParsedAnalyzeContractRequest): AnalysisContext {
    const { contractText } = request;
    if (request.jurisdiction !== undefined && request.industry !== undefined) {
      return Object.freeze({ jurisdiction: request.jurisdiction, industry: request.industry, contractText });
    }
    const inferred = inferContractContext(contractText);
    log.debug('Inferred contract context', { ...inferred });
    return Object.freeze({
      jurisdiction: request.jurisdiction ?? inferred.jurisdiction,
      industry: request.industry ?? inferred.industry,
      contractText,
    });
  }

  /**
   * An explicit regulation list bypasses the resolver; every id in it must
   * exist or the analysis fails before any work starts.
   */
  private selectRegulations(request: ParsedAnalyzeContractRequest, context: AnalysisContext): string[] {
    if (request.regulations && request.regulations.length > 0) {
      const requested = [...new Set(request.regulations)].sort();
      requested.forEach((id) => this.registry.get(id));
      return requested;
    }
    return this.resolveRegulations(context);
  }

  private async analyzeRegulations(
    regulations: readonly string[],
    context: AnalysisContext
  ): Promise<RegulationGapReport[]> {
    if (regulations.length === 0) return [];
    const limit = pLimit(Math.min(regulations.length, this.policy.concurrency.maxWorkers));

    const tasks = regulations.map((regulationId, idx) =>
      limit(async () => ({
        idx,
        report: await this.analyzeRegulation(regulationId, context),
      }))
    );

    const responses = await Promise.all(tasks);
    return responses.sort((a, b) => a.idx - b.idx).map((item) => item.report);
  }

  private async analyzeRegulation(regulationId: string, context: AnalysisContext): Promise<RegulationGapReport> {
    const missing = this.detector.missingClauses(regulationId, context.contractText);

    const missingClauses: MissingClause[] = [];
    for (const clause of missing) {
      const remediation = await this.remediation.generateDetailed(
        regulationId,
        clause.clause,
        clause.requirements,
        context.contractText
      );
      missingClauses.push({
        requirement: clause,
        suggestedText: remediation.text,
        legalCitation: clause.legalCitation ?? '',
        suggestionSource: remediation.source,
      });
    }

    let findings = buildRegulationFindings(
      regulationId,
      missing,
      runContentChecks(this.registry, regulationId, context.contractText),
      this.policy
    );
    if (this.policy.features.enhanceWithLlm && this.textGeneration) {
      findings = await enhanceFindings(this.textGeneration, regulationId, context.contractText, findings, missing, {
        maxTokens: this.policy.remediation.maxTokens,
        timeoutMs: this.policy.remediation.timeoutMs,
      });
    }

    log.debug('Regulation analysed', {
      regulation: regulationId,
      missingClauses: missing.length,
      complianceScore: findings.complianceScore,
    });
    return finalizeGapReport(regulationId, findings, missingClauses, this.policy.report);
  }

  private async buildReport(
    analysisId: string,
    context: AnalysisContext,
    regulations: readonly string[],
    results: readonly RegulationGapReport[],
    startedAt: number
  ): Promise<AnalysisReport> {
    const { overallScore, overallRisk } = aggregateOverall(results);
    const analyzedAt = this.clock().toISOString();
    const [summary, detailedSummary] = await Promise.all([
      this.summaries.executiveSummary(results, overallScore, overallRisk, context.contractText),
      this.summaries.detailedSummary(results, context.contractText),
    ]);

    return {
      analysisId,
      overallScore,
      overallRisk,
      results,
      summary,
      detailedSummary,
      modifiedContract: buildModifiedContract(context.contractText, results, analyzedAt),
      jurisdiction: context.jurisdiction,
      industry: context.industry,
      regulations: [...regulations],
      analyzedAt,
      processingTimeMs: Date.now() - startedAt,
    };
  }

  private async emit(event: AnalysisEvent): Promise<void> {
    const { notifier } = this;
    if (!notifier) return;
    const deadline = timeout(this.notificationTimeoutMs, TimeoutStrategy.Aggressive);
    try {
      await deadline.execute(() => notifier.notify(event));
    } catch (error) {
      log.warn('Analysis notification failed', {
        event: event.type,
        error:
          error instanceof TaskCancelledError
            ? `no delivery within ${this.notificationTimeoutMs}ms`
            : describeError(error),
      });
    }
  }

  private async persist(report: AnalysisReport, context: AnalysisContext): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.save({
        analysisId: report.analysisId,
        contractText: context.contractText,
        jurisdiction: context.jurisdiction,
        industry: context.industry,
        report,
      });
    } catch (error) {
      log.error('Failed to persist analysis', { analysisId: report.analysisId, error: describeError(error) });
    }
  }
}
