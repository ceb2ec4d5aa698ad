/**
 * Analysis Notifications
 *
 * Delivers analysis lifecycle events to logs and chat webhooks. Delivery
 * never throws into the analysis pipeline: failures come back as a failed
 * NotificationResult.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from 'cockatiel';
import { describeError } from '../compliance/errors';
import { formatPercent } from '../compliance/summaries';
import { logger } from '../observability/logger';
import type { AnalysisEvent, AnalysisNotifier, NotificationResult } from './types';

export type {
  AnalysisCompletedEvent,
  AnalysisEvent,
  AnalysisNotifier,
  AnalysisStartedEvent,
  NotificationResult,
  NotificationStatus,
} from './types';

const log = logger.child('notifications');

export function renderEventMessage(event: AnalysisEvent): string {
  if (event.type === 'analysis.started') {
    return [
      'New Contract Compliance Analysis Started',
      '',
      `Analysis ID: ${event.analysisId}`,
      `Jurisdiction: ${event.jurisdiction}`,
      `Industry: ${event.industry}`,
      `Regulations: ${event.regulations.length > 0 ? event.regulations.join(', ') : 'none'}`,
    ].join('\n');
  }
  return [
    'Contract Compliance Analysis Complete',
    '',
    `Analysis ID: ${event.analysisId}`,
    `Overall Score: ${formatPercent(event.overallScore)}`,
    `Risk Level: ${event.overallRisk.toUpperCase()}`,
    `Processing Time: ${(event.processingTimeMs / 1000).toFixed(2)}s`,
    '',
    'Key Findings:',
    `- Regulations Analyzed: ${event.regulationsAnalyzed}`,
    `- High Risk Regulations: ${event.highRiskRegulations}`,
    `- Missing Clauses: ${event.missingClauses}`,
  ].join('\n');
}

export class LoggingNotifier implements AnalysisNotifier {
  readonly channel = 'log';

  async notify(event: AnalysisEvent): Promise<NotificationResult> {
    log.info(`Analysis event ${event.type}`, { ...event });
    return { success: true, status: 'sent', channel: this.channel };
  }
}

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

export interface WebhookNotifierConfig {
  url: string;
  channel?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

/** Posts `{ text }` payloads, the format Slack-style incoming webhooks accept. */
export class WebhookNotifier implements AnalysisNotifier {
  readonly channel: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(config: WebhookNotifierConfig) {
    this.url = config.url;
    this.channel = config.channel ?? 'webhook';
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = config.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  async notify(event: AnalysisEvent): Promise<NotificationResult> {
    // The deadline covers the request and reading an error body.
    const deadline = timeout(this.timeoutMs, TimeoutStrategy.Aggressive);
    try {
      return await deadline.execute(async ({ signal }): Promise<NotificationResult> => {
        const response = await this.fetchImpl(this.url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ text: renderEventMessage(event) }),
          signal,
        });

        if (!response.ok) {
          const body = await response.text();
          return {
            success: false,
            status: 'failed',
            channel: this.channel,
            error: `Webhook error: ${response.status} - ${body}`,
          };
        }
        return { success: true, status: 'sent', channel: this.channel };
      });
    } catch (error) {
      return {
        success: false,
        status: 'failed',
        channel: this.channel,
        error:
          error instanceof TaskCancelledError
            ? `Webhook timed out after ${this.timeoutMs}ms`
            : describeError(error),
      };
    }
  }
}

/** Fans an event out to every notifier; one failing channel does not stop the rest. */
export class CompositeNotifier {
  constructor(private readonly notifiers: readonly AnalysisNotifier[]) {}

  async notify(event: AnalysisEvent): Promise<NotificationResult[]> {
    const settled = await Promise.allSettled(this.notifiers.map((notifier) => notifier.notify(event)));
    const results = settled.map((outcome, index): NotificationResult => {
      const channel = this.notifiers[index]?.channel ?? 'unknown';
      if (outcome.status === 'fulfilled') return outcome.value;
      return { success: false, status: 'failed', channel, error: describeError(outcome.reason) };
    });

    for (const result of results) {
      if (!result.success) {
        log.warn('Notification delivery failed', {
          event: event.type,
          channel: result.channel,
          error: result.error,
        });
      }
    }
    return results;
  }
}

export function createNotifierFromEnv(env: Record<string, string | undefined> = process.env): CompositeNotifier {
  const notifiers: AnalysisNotifier[] = [new LoggingNotifier()];
  if (env.COMPLIANCE_WEBHOOK_URL) {
    notifiers.push(new WebhookNotifier({ url: env.COMPLIANCE_WEBHOOK_URL, channel: 'slack' }));
  }
  return new CompositeNotifier(notifiers);
}
