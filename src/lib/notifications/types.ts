/**
 * Analysis lifecycle notification types
 */

import type { RiskLevel } from '../compliance/types';

export type NotificationStatus = 'sent' | 'failed';

export interface AnalysisStartedEvent {
  type: 'analysis.started';
  analysisId: string;
  jurisdiction: string;
  industry: string;
  regulations: string[];
  startedAt: string;
}

export interface AnalysisCompletedEvent {
  type: 'analysis.completed';
  analysisId: string;
  overallScore: number;
  overallRisk: RiskLevel;
  regulationsAnalyzed: number;
  highRiskRegulations: number;
  missingClauses: number;
  processingTimeMs: number;
  completedAt: string;
}

export type AnalysisEvent = AnalysisStartedEvent | AnalysisCompletedEvent;

export interface NotificationResult {
  success: boolean;
  status: NotificationStatus;
  channel: string;
  error?: string;
}

export interface AnalysisNotifier {
  readonly channel: string;
  notify(event: AnalysisEvent): Promise<NotificationResult>;
}
