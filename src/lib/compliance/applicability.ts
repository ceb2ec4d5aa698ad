import type { RegulationRegistry } from './registry';
import {
  ALL_INDUSTRIES,
  GLOBAL_JURISDICTION,
  type AnalysisContext,
  type RegulationDefinition,
} from './types';
import { logger } from '../observability/logger';

const log = logger.child('applicability');

/**
 * Regulation ids added by the content trigger groups whose terms occur in the
 * (already lowercased) contract text.
 */
export function detectContentSignals(registry: RegulationRegistry, lowercasedText: string): string[] {
  const detected = new Set<string>();
  for (const signal of registry.contentSignals) {
    if (signal.terms.some((term) => lowercasedText.includes(term))) {
      signal.regulations.forEach((id) => detected.add(id));
    }
  }
  return [...detected];
}

export function isCompatible(
  definition: RegulationDefinition,
  context: Pick<AnalysisContext, 'jurisdiction' | 'industry'>
): boolean {
  const jurisdictionOk =
    definition.jurisdictions.has(context.jurisdiction) || definition.jurisdictions.has(GLOBAL_JURISDICTION);
  if (!jurisdictionOk) return false;
  return definition.industries.has(context.industry) || definition.industries.has(ALL_INDUSTRIES);
}

/**
 * Regulations that apply to a contract: jurisdiction and industry defaults
 * plus content-triggered ids, minus those incompatible with the context.
 * Returned sorted by identifier.
 */
export function resolveApplicableRegulations(
  registry: RegulationRegistry,
  context: AnalysisContext
): string[] {
  const candidates = new Set<string>([
    ...registry.regulationsForJurisdiction(context.jurisdiction),
    ...registry.regulationsForIndustry(context.industry),
    ...detectContentSignals(registry, context.contractText.toLowerCase()),
  ]);

  const applicable: string[] = [];
  const dropped: string[] = [];
  for (const id of candidates) {
    // Signals and defaults are validated against the catalog on load.
    if (isCompatible(registry.get(id), context)) {
      applicable.push(id);
    } else {
      dropped.push(id);
    }
  }

  applicable.sort();
  log.debug('Resolved applicable regulations', {
    jurisdiction: context.jurisdiction,
    industry: context.industry,
    applicable,
    dropped: dropped.sort(),
  });
  return applicable;
}
