import { z } from 'zod';
import { ComplianceConfigError } from '../compliance/errors';
import { logger } from '../observability/logger';

/**
 * Tunable policy for clause detection, scoring, report truncation and the
 * generative text calls.
 */
export const CompliancePolicySchema = z.object({
  detection: z.object({
    keywordWeight: z.number().nonnegative(),
    requirementWeight: z.number().nonnegative(),
    conceptWeight: z.number().nonnegative(),
    presenceThreshold: z.number().positive(),
    maxKeywords: z.number().int().positive(),
    minKeywordLength: z.number().int().positive(),
    maxRequirementPhrases: z.number().int().nonnegative(),
  }),
  scoring: z.object({
    baselineClauses: z.number().int().nonnegative(),
    missingPenalty: z.number().min(0).max(1),
    scoreFloor: z.number().min(0).max(1),
  }),
  report: z.object({
    maxIssues: z.number().int().positive(),
    maxRecommendations: z.number().int().positive(),
    recommendedClauses: z.number().int().nonnegative(),
  }),
  remediation: z.object({
    excerptChars: z.number().int().nonnegative(),
    minClauseLength: z.number().int().nonnegative(),
    maxTokens: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    degradedSentinel: z.string().min(1),
  }),
  concurrency: z.object({
    maxWorkers: z.number().int().positive(),
  }),
  features: z.object({
    enhanceWithLlm: z.boolean(),
    generativeSummaries: z.boolean(),
  }),
});

export type CompliancePolicy = z.infer<typeof CompliancePolicySchema>;

export type CompliancePolicyOverrides = {
  [Section in keyof CompliancePolicy]?: Partial<CompliancePolicy[Section]>;
};

export const DEFAULT_COMPLIANCE_POLICY: CompliancePolicy = {
  detection: {
    keywordWeight: 0.5,
    requirementWeight: 0.3,
    conceptWeight: 0.2,
    presenceThreshold: 1.0,
    maxKeywords: 5,
    minKeywordLength: 3,
    maxRequirementPhrases: 3,
  },
  scoring: {
    baselineClauses: 3,
    missingPenalty: 0.8,
    scoreFloor: 0.1,
  },
  report: {
    maxIssues: 5,
    maxRecommendations: 5,
    recommendedClauses: 3,
  },
  remediation: {
    excerptChars: 500,
    minClauseLength: 50,
    maxTokens: 1000,
    timeoutMs: 30_000,
    degradedSentinel: 'AI analysis completed',
  },
  concurrency: {
    maxWorkers: 8,
  },
  features: {
    enhanceWithLlm: false,
    generativeSummaries: true,
  },
};

type Env = Record<string, string | undefined>;

const numberFromEnv = z.coerce.number().finite();
const booleanFromEnv = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const result = numberFromEnv.safeParse(raw);
  if (!result.success) {
    throw new ComplianceConfigError(`${name} must be a number`, { value: raw });
  }
  return result.data;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const result = booleanFromEnv.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    throw new ComplianceConfigError(`${name} must be true or false`, { value: raw });
  }
  return result.data;
}

function applyEnv(base: CompliancePolicy, env: Env): CompliancePolicy {
  const { detection, scoring, remediation, concurrency, features } = base;
  return {
    ...base,
    detection: {
      ...detection,
      keywordWeight: readNumber(env, 'COMPLIANCE_KEYWORD_WEIGHT') ?? detection.keywordWeight,
      requirementWeight: readNumber(env, 'COMPLIANCE_REQUIREMENT_WEIGHT') ?? detection.requirementWeight,
      conceptWeight: readNumber(env, 'COMPLIANCE_CONCEPT_WEIGHT') ?? detection.conceptWeight,
      presenceThreshold: readNumber(env, 'COMPLIANCE_PRESENCE_THRESHOLD') ?? detection.presenceThreshold,
    },
    scoring: {
      ...scoring,
      baselineClauses: readNumber(env, 'COMPLIANCE_BASELINE_CLAUSES') ?? scoring.baselineClauses,
      scoreFloor: readNumber(env, 'COMPLIANCE_SCORE_FLOOR') ?? scoring.scoreFloor,
    },
    remediation: {
      ...remediation,
      timeoutMs: readNumber(env, 'COMPLIANCE_LLM_TIMEOUT_MS') ?? remediation.timeoutMs,
    },
    concurrency: {
      maxWorkers: readNumber(env, 'COMPLIANCE_MAX_WORKERS') ?? concurrency.maxWorkers,
    },
    features: {
      enhanceWithLlm: readBoolean(env, 'COMPLIANCE_ENHANCE_WITH_LLM') ?? features.enhanceWithLlm,
      generativeSummaries:
        readBoolean(env, 'COMPLIANCE_GENERATIVE_SUMMARIES') ?? features.generativeSummaries,
    },
  };
}

function merge(base: CompliancePolicy, overrides: CompliancePolicyOverrides): CompliancePolicy {
  return {
    detection: { ...base.detection, ...overrides.detection },
    scoring: { ...base.scoring, ...overrides.scoring },
    report: { ...base.report, ...overrides.report },
    remediation: { ...base.remediation, ...overrides.remediation },
    concurrency: { ...base.concurrency, ...overrides.concurrency },
    features: { ...base.features, ...overrides.features },
  };
}

/**
 * Resolve the active policy: defaults, then environment variables, then
 * explicit overrides.
 */
export function loadCompliancePolicy(
  env: Env = process.env,
  overrides: CompliancePolicyOverrides = {}
): CompliancePolicy {
  const candidate = merge(applyEnv(DEFAULT_COMPLIANCE_POLICY, env), overrides);
  const result = CompliancePolicySchema.safeParse(candidate);
  if (!result.success) {
    logger.error('Compliance policy validation failed', { issues: result.error.issues });
    throw new ComplianceConfigError('Compliance policy validation failed', {
      issues: result.error.issues,
    });
  }
  return result.data;
}
