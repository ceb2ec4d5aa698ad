import type { RegulationRegistry } from './registry';
import type { ContentCheck } from './types';

export interface ContentFindings {
  issues: string[];
  recommendations: string[];
}

export function checkFires(check: ContentCheck, lowercasedText: string): boolean {
  const triggered = check.ifAny.length === 0 || check.ifAny.some((term) => lowercasedText.includes(term));
  return triggered && !check.unlessAny.some((term) => lowercasedText.includes(term));
}

// Regulation-specific lexical checks, e.g. TILA without an APR disclosure.
export function runContentChecks(
  registry: RegulationRegistry,
  regulationId: string,
  contractText: string
): ContentFindings {
  const lowered = contractText.toLowerCase();
  const findings: ContentFindings = { issues: [], recommendations: [] };
  for (const check of registry.contentChecksFor(regulationId)) {
    if (checkFires(check, lowered)) {
      findings.issues.push(check.issue);
      findings.recommendations.push(check.recommendation);
    }
  }
  return findings;
}
