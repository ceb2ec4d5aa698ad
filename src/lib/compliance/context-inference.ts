import type { InferredContractContext } from './types';

const FINANCIAL_TERMS = ['loan', 'financing', 'credit', 'interest', 'payment', 'debt'];

const hasToken = (text: string, token: string) => new RegExp(`\\b${token}\\b`).test(text);

/**
 * Lexical guess at jurisdiction, industry and contract type, used when a
 * request leaves jurisdiction or industry unset.
 */
export function inferContractContext(contractText: string): InferredContractContext {
  const text = contractText.toLowerCase();

  let jurisdiction = 'US';
  if (text.includes('new york') || hasToken(text, 'ny')) {
    jurisdiction = 'US_NY';
  } else if (text.includes('california') || hasToken(text, 'ca')) {
    jurisdiction = 'US_CA';
  }

  let industry = 'general';
  let contractType = 'service';
  const keyConcerns: string[] = [];

  if (FINANCIAL_TERMS.some((term) => text.includes(term))) {
    industry = 'financial';
    contractType = 'loan';
    keyConcerns.push('financial compliance');
  }
  if (text.includes('data') || text.includes('privacy')) {
    keyConcerns.push('data privacy');
  }
  if (text.includes('security') || text.includes('cyber')) {
    keyConcerns.push('cybersecurity');
  }

  return { jurisdiction, industry, contractType, keyConcerns };
}
