import {
  GamePhases,
  PlayerStatuses,
  RejectionReasons,
  RoundStatuses,
  type GamePhase,
} from '@science-trivia/shared-types';
import { ok, reject, type Player, type PlayerRegistry, type Result, type Round } from './contracts';
import { findPlayer } from './helpers/players';

export interface RegistrationOptions {
  phase: GamePhase;
  maxPlayers: number;
}

export interface SubmissionRequest {
  playerId: string;
  answer: string;
  tick: number;
  /** When given, must match the live round */
  roundNumber?: number;
}

export function createPlayer(id: string, joinedSeq: number, joinedAtTick: number): Player {
  return {
    id,
    joinedSeq,
    joinedAtTick,
    status: PlayerStatuses.ACTIVE,
    score: 0,
    correctCount: 0,
    cumulativeSubmissionTicks: 0,
    missedStreak: 0,
    currentAnswer: null,
  };
}

export function register(
  players: PlayerRegistry,
  playerId: string,
  joinTick: number,
  { phase, maxPlayers }: RegistrationOptions,
): Result<PlayerRegistry> {
  if (phase !== GamePhases.WAITING_FOR_PLAYERS) {
    return reject(RejectionReasons.REGISTRATION_CLOSED, `Registration is closed (phase ${phase})`);
  }
  if (findPlayer(players, playerId)) {
    return reject(RejectionReasons.ALREADY_JOINED, `Player ${playerId} has already joined`);
  }
  const count = Object.keys(players).length;
  if (count >= maxPlayers) {
    return reject(RejectionReasons.GAME_FULL, `Game is full (${maxPlayers} players)`);
  }
  return ok({ ...players, [playerId]: createPlayer(playerId, count, joinTick) });
}

/**
 * Validate and store a submission. Returns the updated registry (the player's
 * current answer) and the updated round; neither input is modified.
 */
export function recordSubmission(
  players: PlayerRegistry,
  round: Round | null,
  { playerId, answer, tick, roundNumber }: SubmissionRequest,
): Result<{ players: PlayerRegistry; round: Round }> {
  const player = findPlayer(players, playerId);
  if (!player) {
    return reject(RejectionReasons.UNKNOWN_PLAYER, `Player ${playerId} is not registered`);
  }
  if (!round || round.status !== RoundStatuses.OPEN) {
    return reject(RejectionReasons.ROUND_NOT_OPEN, 'No round is open');
  }
  if (roundNumber !== undefined && roundNumber !== round.roundNumber) {
    return reject(
      RejectionReasons.ROUND_NOT_OPEN,
      `Round ${roundNumber} is not open (current round is ${round.roundNumber})`,
    );
  }
  if (player.status === PlayerStatuses.ELIMINATED) {
    return reject(RejectionReasons.PLAYER_ELIMINATED, `Player ${playerId} has been eliminated`);
  }
  if (Object.hasOwn(round.submissions, playerId)) {
    return reject(
      RejectionReasons.DUPLICATE_SUBMISSION,
      `Player ${playerId} already answered round ${round.roundNumber}`,
    );
  }
  if (tick > round.deadlineTick) {
    return reject(
      RejectionReasons.DEADLINE_EXCEEDED,
      `Tick ${tick} is past the round ${round.roundNumber} deadline (${round.deadlineTick})`,
    );
  }

  const order = Object.keys(round.submissions).length;
  return ok({
    players: { ...players, [playerId]: { ...player, currentAnswer: answer } },
    round: {
      ...round,
      submissions: { ...round.submissions, [playerId]: { answer, order, tick } },
    },
  });
}

/** Total order: score desc, cumulative submission ticks asc, join order asc. */
export function compareStanding(a: Player, b: Player): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.cumulativeSubmissionTicks !== b.cumulativeSubmissionTicks) {
    return a.cumulativeSubmissionTicks - b.cumulativeSubmissionTicks;
  }
  return a.joinedSeq - b.joinedSeq;
}

export function scoreboard(players: PlayerRegistry): Player[] {
  return Object.values(players).sort(compareStanding);
}
