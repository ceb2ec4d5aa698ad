/**
 * Regulation Registry
 *
 * Read-only catalog of regulations, their required clauses and the lookup
 * tables the resolver and detector consult. Built once from
 * config/regulations.yaml and shared by every analysis.
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ComplianceConfigError, RegulationNotFoundError } from './errors';
import type {
  ClauseRequirement,
  ContentCheck,
  ContentSignalGroup,
  RegulationDefinition,
} from './types';
import { logger } from '../observability/logger';

const log = logger.child('registry');

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../../config/regulations.yaml', import.meta.url)
);

const ClauseSchema = z.object({
  clause: z.string().min(1),
  description: z.string(),
  risk_level: z.enum(['low', 'medium', 'high']),
  requirements: z.array(z.string().min(1)).min(1),
  legal_citation: z.string().optional(),
});

const RegulationSchema = z.object({
  title: z.string().min(1),
  jurisdictions: z.array(z.string()).min(1),
  industries: z.array(z.string()).min(1),
  clauses: z.array(ClauseSchema).min(1),
});

const ContentCheckSchema = z.object({
  if_any: z.array(z.string()).default([]),
  unless_any: z.array(z.string()).min(1),
  issue: z.string().min(1),
  recommendation: z.string().min(1),
});

export const RegulationCatalogSchema = z
  .object({
    regulations: z.record(z.string(), RegulationSchema),
    jurisdiction_defaults: z.record(z.string(), z.array(z.string())).default({}),
    industry_defaults: z.record(z.string(), z.array(z.string())).default({}),
    content_signals: z
      .array(
        z.object({
          name: z.string().min(1),
          terms: z.array(z.string().min(1)).min(1),
          regulations: z.array(z.string()).min(1),
        })
      )
      .default([]),
    semantic_concepts: z.record(z.string(), z.array(z.string().min(1))).default({}),
    content_checks: z.record(z.string(), z.array(ContentCheckSchema)).default({}),
  })
  .superRefine((catalog, ctx) => {
    const known = new Set(Object.keys(catalog.regulations));
    const checkIds = (ids: string[], path: (string | number)[]) => {
      ids.forEach((id, index) => {
        if (!known.has(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown regulation id ${id}`,
            path: [...path, index],
          });
        }
      });
    };
    for (const [code, ids] of Object.entries(catalog.jurisdiction_defaults)) {
      checkIds(ids, ['jurisdiction_defaults', code]);
    }
    for (const [code, ids] of Object.entries(catalog.industry_defaults)) {
      checkIds(ids, ['industry_defaults', code]);
    }
    catalog.content_signals.forEach((signal, index) => {
      checkIds(signal.regulations, ['content_signals', index, 'regulations']);
    });
    checkIds(Object.keys(catalog.content_checks), ['content_checks']);
  });

export type RegulationCatalog = z.input<typeof RegulationCatalogSchema>;
type ParsedCatalog = z.output<typeof RegulationCatalogSchema>;

const lower = (values: readonly string[]) => Object.freeze(values.map((value) => value.toLowerCase()));

function uniqueInOrder(ids: readonly string[]): readonly string[] {
  return Object.freeze([...new Set(ids)]);
}

export class RegulationRegistry {
  private readonly regulations: ReadonlyMap<string, RegulationDefinition>;
  private readonly jurisdictionDefaults: ReadonlyMap<string, readonly string[]>;
  private readonly industryDefaults: ReadonlyMap<string, readonly string[]>;
  private readonly concepts: ReadonlyMap<string, readonly string[]>;
  private readonly checks: ReadonlyMap<string, readonly ContentCheck[]>;
  readonly contentSignals: readonly ContentSignalGroup[];

  private constructor(catalog: ParsedCatalog) {
    this.regulations = new Map(
      Object.entries(catalog.regulations).map(([id, regulation]) => {
        const clauses: ClauseRequirement[] = regulation.clauses.map((clause) =>
          Object.freeze({
            clause: clause.clause,
            description: clause.description,
            riskLevel: clause.risk_level,
            requirements: Object.freeze([...clause.requirements]),
            legalCitation: clause.legal_citation,
          })
        );
        const definition: RegulationDefinition = Object.freeze({
          id,
          title: regulation.title,
          clauses: Object.freeze(clauses),
          jurisdictions: new Set(regulation.jurisdictions),
          industries: new Set(regulation.industries),
        });
        return [id, definition] as const;
      })
    );
    this.jurisdictionDefaults = new Map(
      Object.entries(catalog.jurisdiction_defaults).map(([code, ids]) => [code, uniqueInOrder(ids)] as const)
    );
    this.industryDefaults = new Map(
      Object.entries(catalog.industry_defaults).map(([code, ids]) => [code, uniqueInOrder(ids)] as const)
    );
    this.concepts = new Map(
      Object.entries(catalog.semantic_concepts).map(([clause, phrases]) => [clause, lower(phrases)] as const)
    );
    this.checks = new Map(
      Object.entries(catalog.content_checks).map(([id, checks]) => [
        id,
        Object.freeze(
          checks.map((check) =>
            Object.freeze({
              ifAny: lower(check.if_any),
              unlessAny: lower(check.unless_any),
              issue: check.issue,
              recommendation: check.recommendation,
            })
          )
        ),
      ] as const)
    );
    this.contentSignals = Object.freeze(
      catalog.content_signals.map((signal) =>
        Object.freeze({
          name: signal.name,
          terms: lower(signal.terms),
          regulations: uniqueInOrder(signal.regulations),
        })
      )
    );
  }

  static fromCatalog(catalog: RegulationCatalog): RegulationRegistry {
    return new RegulationRegistry(RegulationRegistry.validate(catalog, 'inline catalog'));
  }

  private static validate(input: unknown, source: string): ParsedCatalog {
    const result = RegulationCatalogSchema.safeParse(input);
    if (!result.success) {
      log.error('Regulation catalog validation failed', { source, issues: result.error.issues });
      throw new ComplianceConfigError(`Regulation catalog validation failed: ${source}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  static fromFile(path: string): RegulationRegistry {
    let file: string;
    try {
      file = fs.readFileSync(path, 'utf8');
    } catch (err) {
      log.error('Failed to read regulation catalog', { path, error: err });
      throw new ComplianceConfigError(`Failed to read regulation catalog: ${path}`);
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(file);
    } catch (err) {
      log.error('Failed to parse regulation catalog YAML', { path, error: err });
      throw new ComplianceConfigError(`Failed to parse YAML in regulation catalog: ${path}`);
    }
    const registry = new RegulationRegistry(RegulationRegistry.validate(parsed, path));
    log.info('Regulation catalog loaded', { path, regulations: registry.listRegulations() });
    return registry;
  }

  /** Identifiers of every regulation, sorted. */
  listRegulations(): string[] {
    return [...this.regulations.keys()].sort();
  }

  has(regulationId: string): boolean {
    return this.regulations.has(regulationId);
  }

  get(regulationId: string): RegulationDefinition {
    const definition = this.regulations.get(regulationId);
    if (!definition) {
      throw new RegulationNotFoundError(regulationId);
    }
    return definition;
  }

  regulationsForJurisdiction(code: string): readonly string[] {
    return this.jurisdictionDefaults.get(code) ?? [];
  }

  regulationsForIndustry(code: string): readonly string[] {
    return this.industryDefaults.get(code) ?? [];
  }

  /** Synonym phrases for a clause name; empty for clauses outside the table. */
  conceptsFor(clauseName: string): readonly string[] {
    return this.concepts.get(clauseName) ?? [];
  }

  contentChecksFor(regulationId: string): readonly ContentCheck[] {
    return this.checks.get(regulationId) ?? [];
  }
}

let defaultRegistry: RegulationRegistry | null = null;

export function getDefaultRegistry(): RegulationRegistry {
  if (!defaultRegistry) {
    defaultRegistry = RegulationRegistry.fromFile(DEFAULT_CATALOG_PATH);
  }
  return defaultRegistry;
}
