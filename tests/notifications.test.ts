import { describe, expect, it, vi } from 'vitest';

import {
  CompositeNotifier,
  LoggingNotifier,
  WebhookNotifier,
  createNotifierFromEnv,
  renderEventMessage,
} from '@/lib/notifications';
import type { AnalysisCompletedEvent, AnalysisNotifier, AnalysisStartedEvent } from '@/lib/notifications';

const started: AnalysisStartedEvent = {
  type: 'analysis.started',
  analysisId: 'analysis_test',
  jurisdiction: 'US',
  industry: 'lending',
  regulations: ['GLBA', 'TILA'],
  startedAt: '2026-01-10T00:00:00.000Z',
};

const completed: AnalysisCompletedEvent = {
  type: 'analysis.completed',
  analysisId: 'analysis_test',
  overallScore: 0.68,
  overallRisk: 'medium',
  regulationsAnalyzed: 2,
  highRiskRegulations: 0,
  missingClauses: 3,
  processingTimeMs: 1250,
  completedAt: '2026-01-10T00:00:01.250Z',
};

describe('renderEventMessage', () => {
  it('renders the started event', () => {
    expect(renderEventMessage(started).split('\n')).toContain('Regulations: GLBA, TILA');
  });

  it('renders the completed event', () => {
    const lines = renderEventMessage(completed).split('\n');
    expect(lines).toContain('Overall Score: 68.0%');
    expect(lines).toContain('Risk Level: MEDIUM');
    expect(lines).toContain('Processing Time: 1.25s');
    expect(lines).toContain('- Missing Clauses: 3');
  });
});

describe('WebhookNotifier', () => {
  it('posts the rendered message as JSON', async () => {
    const fetchImpl = vi.fn(async () => new Response('ok', { status: 200 }));
    const notifier = new WebhookNotifier({ url: 'https://hooks.example.test/compliance', fetchImpl });

    const result = await notifier.notify(completed);

    expect(result).toEqual({ success: true, status: 'sent', channel: 'webhook' });
    expect(fetchImpl).toHaveBeenCalledWith('https://hooks.example.test/compliance', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: renderEventMessage(completed) }),
      signal: expect.any(AbortSignal),
    });
  });

  it('reports non-2xx responses as failures', async () => {
    const notifier = new WebhookNotifier({
      url: 'https://hooks.example.test/compliance',
      channel: 'slack',
      fetchImpl: async () => new Response('invalid_payload', { status: 400 }),
    });

    await expect(notifier.notify(started)).resolves.toEqual({
      success: false,
      status: 'failed',
      channel: 'slack',
      error: 'Webhook error: 400 - invalid_payload',
    });
  });

  it('reports network errors as failures', async () => {
    const notifier = new WebhookNotifier({
      url: 'https://hooks.example.test/compliance',
      fetchImpl: async () => {
        throw new Error('ECONNREFUSED');
      },
    });

    const result = await notifier.notify(started);

    expect(result.success).toBe(false);
    expect(result.error).toBe('ECONNREFUSED');
  });

  it('gives up on a webhook that never answers', async () => {
    const notifier = new WebhookNotifier({
      url: 'https://hooks.example.test/compliance',
      fetchImpl: () => new Promise<Response>(() => undefined),
      timeoutMs: 20,
    });

    await expect(notifier.notify(completed)).resolves.toEqual({
      success: false,
      status: 'failed',
      channel: 'webhook',
      error: 'Webhook timed out after 20ms',
    });
  });

  it('aborts the request when the deadline passes', async () => {
    let received: AbortSignal | undefined;
    const notifier = new WebhookNotifier({
      url: 'https://hooks.example.test/compliance',
      fetchImpl: (_input, init) => {
        received = init?.signal ?? undefined;
        return new Promise<Response>(() => undefined);
      },
      timeoutMs: 20,
    });

    await notifier.notify(started);

    expect(received?.aborted).toBe(true);
  });
});

describe('CompositeNotifier', () => {
  it('delivers to every channel even when one throws', async () => {
    const broken: AnalysisNotifier = {
      channel: 'broken',
      notify: async () => {
        throw new Error('boom');
      },
    };
    const composite = new CompositeNotifier([broken, new LoggingNotifier()]);

    const results = await composite.notify(started);

    expect(results).toEqual([
      { success: false, status: 'failed', channel: 'broken', error: 'boom' },
      { success: true, status: 'sent', channel: 'log' },
    ]);
  });

  it('logs events by default when no webhook is configured', async () => {
    const results = await createNotifierFromEnv({}).notify(started);
    expect(results).toEqual([{ success: true, status: 'sent', channel: 'log' }]);
  });
});
