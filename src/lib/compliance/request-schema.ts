import { z } from 'zod';
import { InvalidAnalysisRequestError } from './errors';

const code = z.string().trim().min(1);

export const AnalyzeContractRequestSchema = z.object({
  contractText: z.string().refine((text) => text.trim().length > 0, {
    message: 'contractText must not be empty',
  }),
  // An empty list is treated like no list: the resolver decides.
  regulations: z.array(code).optional(),
  jurisdiction: code.optional(),
  industry: code.optional(),
});

export type AnalyzeContractRequest = z.input<typeof AnalyzeContractRequestSchema>;
export type ParsedAnalyzeContractRequest = z.output<typeof AnalyzeContractRequestSchema>;

export function parseAnalyzeContractRequest(input: unknown): ParsedAnalyzeContractRequest {
  const result = AnalyzeContractRequestSchema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new InvalidAnalysisRequestError(first?.message ?? 'Invalid analysis request', {
      issues: result.error.issues,
    });
  }
  return result.data;
}
