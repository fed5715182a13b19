/**
 * Round Engine
 *
 * One question's lifecycle: OPEN -> CLOSED -> SCORED. A scored round does not
 * stay live; it is archived as a RoundSummary and its points are credited to
 * the registry.
 *
 * Early close: a round closes as soon as every active player has answered,
 * without waiting out the deadline.
 */
import {
  PlayerStatuses,
  RejectionReasons,
  RoundCloseReasons,
  RoundStatuses,
  type GameConfig,
  type Question,
  type RoundCloseReason,
} from '@science-trivia/shared-types';
import {
  ok,
  reject,
  type ClosedRound,
  type OpenRound,
  type PlayerRegistry,
  type Result,
  type Round,
  type RoundPlayerResult,
  type RoundSummary,
  type Submission,
} from './contracts';
import { getActivePlayerIds, playersInJoinOrder } from './helpers/players';
import { recordSubmission, type SubmissionRequest } from './player-registry';

export interface OpenRoundRequest {
  roundNumber: number;
  question: Question;
  openedAtTick: number;
  deadlineTick: number;
}

export function deadlineFor(question: Question, openedAtTick: number): number {
  return openedAtTick + question.timeLimitTicks;
}

export function open(current: Round | null, request: OpenRoundRequest): Result<OpenRound> {
  if (current) {
    return reject(
      RejectionReasons.ROUND_ALREADY_OPEN,
      `Round ${current.roundNumber} is still live`,
    );
  }
  return ok({
    ...request,
    status: RoundStatuses.OPEN,
    submissions: {},
    closedAtTick: null,
    closeReason: null,
  });
}

/** Validation is the registry's; the stored submission is the only side effect. */
export function accept(
  players: PlayerRegistry,
  round: Round | null,
  submission: SubmissionRequest,
): Result<{ players: PlayerRegistry; round: Round }> {
  return recordSubmission(players, round, submission);
}

export function closeReasonFor(
  round: OpenRound,
  players: PlayerRegistry,
  tick: number,
): RoundCloseReason | null {
  const allAnswered = getActivePlayerIds(players).every((pid) => Object.hasOwn(round.submissions, pid));
  if (allAnswered) return RoundCloseReasons.ALL_ANSWERED;
  if (tick >= round.deadlineTick) return RoundCloseReasons.DEADLINE;
  return null;
}

/** Closes the round if the deadline or early-close condition holds; otherwise returns it as is. */
export function close(round: OpenRound, players: PlayerRegistry, tick: number): Round {
  const reason = closeReasonFor(round, players, tick);
  if (!reason) return round;
  return closeWith(round, reason, tick);
}

/** Unconditional close, used when the game is force-ended mid-round. */
export function forceClose(round: OpenRound, tick: number): ClosedRound {
  return closeWith(round, RoundCloseReasons.FORCED, tick);
}

function closeWith(round: OpenRound, reason: RoundCloseReason, tick: number): ClosedRound {
  return {
    ...round,
    status: RoundStatuses.CLOSED,
    closedAtTick: tick,
    closeReason: reason,
  };
}

/**
 * Exact-match scoring, no partial credit: a correct answer earns the question
 * weight, anything else (including no answer) earns zero. Each player is
 * credited at most once per round.
 */
export function score(
  round: ClosedRound,
  players: PlayerRegistry,
  config: GameConfig,
): { players: PlayerRegistry; summary: RoundSummary } {
  const { question } = round;
  const updated: PlayerRegistry = { ...players };
  const results: RoundPlayerResult[] = [];
  let pointsAwarded = 0;

  for (const player of playersInJoinOrder(players)) {
    const submission: Submission | undefined = Object.hasOwn(round.submissions, player.id)
      ? round.submissions[player.id]
      : undefined;
    const correct = submission !== undefined && submission.answer === question.correctAnswer;
    const points = correct ? question.weight : 0;
    pointsAwarded += points;

    // Unanswered rounds count as answered at close
    const responseTicks = (submission ? submission.tick : round.closedAtTick) - round.openedAtTick;
    const missedStreak = submission ? 0 : player.missedStreak + 1;
    const eliminated =
      player.status === PlayerStatuses.ACTIVE &&
      config.eliminateAfterMissedRounds > 0 &&
      missedStreak >= config.eliminateAfterMissedRounds;

    updated[player.id] = {
      ...player,
      score: player.score + points,
      correctCount: player.correctCount + (correct ? 1 : 0),
      cumulativeSubmissionTicks: player.cumulativeSubmissionTicks + responseTicks,
      missedStreak,
      status: eliminated ? PlayerStatuses.ELIMINATED : player.status,
      currentAnswer: null,
    };

    results.push({
      playerId: player.id,
      answer: submission?.answer ?? null,
      submissionOrder: submission?.order ?? null,
      submittedAtTick: submission?.tick ?? null,
      correct,
      points,
    });
  }

  return {
    players: updated,
    summary: {
      roundNumber: round.roundNumber,
      questionId: question.id,
      correctAnswer: question.correctAnswer,
      weight: question.weight,
      openedAtTick: round.openedAtTick,
      deadlineTick: round.deadlineTick,
      closedAtTick: round.closedAtTick,
      closeReason: round.closeReason,
      pointsAwarded,
      results,
    },
  };
}
