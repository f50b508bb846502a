/**
 * AttemptEventTypes: lifecycle events emitted while an attempt runs.
 *
 * The navigation loop and the attempt runner share one typed emitter per
 * attempt; hosts subscribe to follow progress.
 */

import EventEmitter from 'eventemitter3';
import type { AttemptResult, HistoryEntry, ObstacleKind, PageType } from '../engine/types.js';

export const ATTEMPT_EVENT_TYPES = {
  // Lifecycle
  ATTEMPT_STARTED: 'attempt_started',
  ATTEMPT_FINISHED: 'attempt_finished',
  ATTEMPT_RETRY: 'attempt_retry',
  SCREENSHOT_CAPTURED: 'screenshot_captured',

  // Loop
  ITERATION_STARTED: 'iteration_started',
  ITERATION_FAILED: 'iteration_failed',
  PAGE_CLASSIFIED: 'page_classified',

  // Obstacles
  OBSTACLE_DETECTED: 'obstacle_detected',
  MITIGATION_FINISHED: 'mitigation_finished',

  // Actions
  ACTION_EXECUTED: 'action_executed',
  FALLBACK_ACTIONS_USED: 'fallback_actions_used',

  // Session
  COOKIES_RESTORED: 'cookies_restored',
  COOKIES_SAVED: 'cookies_saved',
} as const;

export type AttemptEventType = (typeof ATTEMPT_EVENT_TYPES)[keyof typeof ATTEMPT_EVENT_TYPES];

export interface AttemptEventMap {
  attempt_started: [payload: { attemptId: string; url: string; attempt: number }];
  attempt_finished: [payload: { attemptId: string; result: AttemptResult }];
  attempt_retry: [payload: { attemptId: string; attempt: number; error: string }];
  screenshot_captured: [payload: { attemptId: string; attempt: number; path: string }];
  iteration_started: [payload: { iteration: number }];
  iteration_failed: [payload: { iteration: number; error: string }];
  page_classified: [
    payload: { iteration: number; pageType: PageType; confidence: number; obstacles: ObstacleKind[]; elements: number },
  ];
  obstacle_detected: [payload: { iteration: number; obstacle: ObstacleKind }];
  mitigation_finished: [payload: { iteration: number; obstacle: ObstacleKind; mitigated: boolean }];
  action_executed: [entry: HistoryEntry];
  fallback_actions_used: [payload: { iteration: number; succeeded: boolean }];
  cookies_restored: [payload: { domain: string; count: number }];
  cookies_saved: [payload: { domain: string; count: number }];
}

export type AttemptEmitter = EventEmitter<AttemptEventMap>;

export function createAttemptEmitter(): AttemptEmitter {
  return new EventEmitter<AttemptEventMap>();
}
