/**
 * Rejection Contract
 *
 * Every failed operation is reported as a value, never thrown. A rejected
 * event leaves the game state untouched; recovery is the caller's business
 * (e.g. redeliver a corrected event).
 */
import { Events, type RejectionReason } from '@science-trivia/shared-types';

export interface TransitionRejection {
  type: typeof Events.Rejection.TRANSITION;
  reason: RejectionReason;
  message: string;
  /** Type of the rejected envelope, when it could be read */
  eventType?: string;
}

export type Rejected = { ok: false; rejection: TransitionRejection };

export type Result<T> = { ok: true; value: T } | Rejected;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function reject(reason: RejectionReason, message: string): Rejected {
  return { ok: false, rejection: { type: Events.Rejection.TRANSITION, reason, message } };
}
