import Groq from 'groq-sdk';
import {
  BrokenCircuitError,
  CircuitState,
  SamplingBreaker,
  TaskCancelledError,
  TimeoutStrategy,
  circuitBreaker,
  handleAll,
  timeout,
  wrap,
} from 'cockatiel';
import type { CircuitBreakerPolicy, ICircuitBreakerOptions } from 'cockatiel';
import { TextGenerationError, describeError } from '../compliance/errors';
import {
  recordLLMBreakerFailure,
  recordLLMBreakerRequest,
  recordLLMBreakerState,
  recordLLMBreakerSuccess,
} from '../monitoring/metrics';
import type { BreakerStateLabel } from '../monitoring/metrics';
import { logger } from '../observability/logger';

const log = logger.child('text-generation');

/**
 * Generative text collaborator. Implementations reject with
 * TextGenerationError; callers treat every rejection as "unavailable".
 */
export interface TextGenerationService {
  complete(systemPrompt: string, userPrompt: string, maxTokens: number): Promise<string>;
}

export const DEFAULT_MODEL = 'llama-3.3-70b-versatile';

interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  max_tokens: number;
  temperature: number;
  top_p: number;
}

interface ChatCompletionResult {
  model?: string;
  choices: Array<{ message?: { content: string | null } | null }>;
}

/** The slice of the groq-sdk client used here. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequest, options?: { signal?: AbortSignal }): PromiseLike<ChatCompletionResult>;
    };
  };
}

export interface GroqTextGenerationOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: ChatCompletionsClient;
  breaker?: ICircuitBreakerOptions;
}

// Breakers keep sampling state, so each client gets its own.
const defaultBreakerOptions = (): ICircuitBreakerOptions => ({
  halfOpenAfter: 30_000,
  breaker: new SamplingBreaker({
    threshold: 0.5,
    minimumRps: 10,
    duration: 60_000,
  }),
});

function buildPolicy(breaker: CircuitBreakerPolicy, timeoutMs: number) {
  return wrap(breaker, timeout(timeoutMs, TimeoutStrategy.Aggressive));
}

const CIRCUIT_STATE_LABELS: Record<CircuitState, BreakerStateLabel> = {
  [CircuitState.Closed]: 'closed',
  [CircuitState.Open]: 'open',
  [CircuitState.HalfOpen]: 'half_open',
  [CircuitState.Isolated]: 'isolated',
};

export class GroqTextGenerationService implements TextGenerationService {
  private readonly client: ChatCompletionsClient;
  private readonly breaker: CircuitBreakerPolicy;
  private readonly policy: ReturnType<typeof buildPolicy>;
  readonly model: string;
  private lastStateLabel: BreakerStateLabel = 'closed';
  private lastStateChangeAt = Date.now();
  private lastFailureMessage?: string;

  constructor(options: GroqTextGenerationOptions = {}) {
    this.model = options.model ?? DEFAULT_MODEL;
    if (options.client) {
      this.client = options.client;
    } else {
      if (!options.apiKey) {
        throw new TextGenerationError('unavailable', 'GROQ_API_KEY is required');
      }
      this.client = new Groq({ apiKey: options.apiKey, maxRetries: 0 });
    }

    this.breaker = circuitBreaker(handleAll, options.breaker ?? defaultBreakerOptions());
    this.policy = buildPolicy(this.breaker, options.timeoutMs ?? 30_000);

    this.breaker.onBreak(() => {
      log.warn('Circuit breaker opened - text generation suspended', { model: this.model });
    });
    this.breaker.onReset(() => {
      log.info('Circuit breaker reset', { model: this.model });
    });
    this.breaker.onStateChange((state) => this.handleStateChange(state));
    this.handleStateChange(this.breaker.state);
  }

  async complete(systemPrompt: string, userPrompt: string, maxTokens: number): Promise<string> {
    recordLLMBreakerRequest(this.model);
    const startTime = Date.now();
    try {
      const content = await this.policy.execute(async ({ signal }) => {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: [
              { role: 'system', content: systemPrompt },
              { role: 'user', content: userPrompt },
            ],
            max_tokens: maxTokens,
            temperature: 0.3,
            top_p: 0.9,
          },
          { signal }
        );
        const choice = completion.choices[0];
        if (!choice || !choice.message) {
          throw new TextGenerationError('malformed', 'Invalid completion response structure');
        }
        return (choice.message.content ?? '').trim();
      });

      recordLLMBreakerSuccess(this.model);
      log.debug('Text generation succeeded', { model: this.model, latencyMs: Date.now() - startTime });
      return content;
    } catch (error) {
      const failure = this.toTextGenerationError(error);
      recordLLMBreakerFailure(this.model, failure.kind);
      this.lastFailureMessage = failure.message;
      log.warn('Text generation failed', {
        model: this.model,
        kind: failure.kind,
        error: describeError(error),
        latencyMs: Date.now() - startTime,
      });
      throw failure;
    }
  }

  getBreakerState() {
    return {
      state: this.lastStateLabel,
      lastStateChangeAt: this.lastStateChangeAt,
      lastFailureMessage: this.lastFailureMessage,
    };
  }

  private toTextGenerationError(error: unknown): TextGenerationError {
    if (error instanceof TextGenerationError) return error;
    if (error instanceof TaskCancelledError) {
      return new TextGenerationError('timeout', error.message);
    }
    if (error instanceof BrokenCircuitError) {
      return new TextGenerationError('unavailable', 'circuit open');
    }
    return new TextGenerationError('unavailable', describeError(error));
  }

  private handleStateChange(state: CircuitState) {
    const label = CIRCUIT_STATE_LABELS[state] ?? 'closed';
    this.lastStateLabel = label;
    this.lastStateChangeAt = Date.now();
    recordLLMBreakerState(this.model, label);
  }
}

/**
 * Build the service from environment variables. Returns null when no API key
 * is configured; callers then use their deterministic fallbacks.
 */
export function createTextGenerationService(
  env: Record<string, string | undefined> = process.env,
  timeoutMs?: number
): TextGenerationService | null {
  const apiKey = env.GROQ_API_KEY;
  if (!apiKey) {
    log.warn('GROQ_API_KEY not configured - generative text disabled');
    return null;
  }
  return new GroqTextGenerationService({
    apiKey,
    model: env.COMPLIANCE_LLM_MODEL || env.GROQ_MODEL || DEFAULT_MODEL,
    timeoutMs,
  });
}

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
}

/**
 * Call any TextGenerationService under a hard deadline. The pending call is
 * abandoned, not awaited, once the deadline passes.
 */
export async function boundedComplete(
  service: TextGenerationService,
  request: CompletionRequest,
  timeoutMs: number
): Promise<string> {
  const deadline = timeout(timeoutMs, TimeoutStrategy.Aggressive);
  try {
    return await deadline.execute(() =>
      service.complete(request.systemPrompt, request.userPrompt, request.maxTokens)
    );
  } catch (error) {
    if (error instanceof TaskCancelledError) {
      throw new TextGenerationError('timeout', `no response within ${timeoutMs}ms`);
    }
    if (error instanceof TextGenerationError) throw error;
    throw new TextGenerationError('unavailable', describeError(error));
  }
}
