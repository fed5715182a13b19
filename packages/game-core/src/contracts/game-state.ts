/**
 * Game State Contract
 *
 * GameState is the single value the substrate persists and replays. It must
 * stay plain JSON (records and arrays only) so that every party serializes
 * it identically.
 *
 * IMPORTANT: a live round carries the full question, correctAnswer included.
 * Anything shown to players goes through projectForPlayer, which strips it
 * until the round is scored.
 */
import type {
  GameConfig,
  GamePhase,
  PlayerStatus,
  Question,
  RoundCloseReason,
  RoundStatuses,
} from '@science-trivia/shared-types';

export interface Player {
  id: string;
  /** Registration order, 0-based. Final tie-break. */
  joinedSeq: number;
  joinedAtTick: number;
  status: PlayerStatus;
  score: number;
  correctCount: number;
  /** Sum of response ticks over scored rounds; second tie-break. */
  cumulativeSubmissionTicks: number;
  /** Consecutive scored rounds without a submission */
  missedStreak: number;
  currentAnswer: string | null;
}

export type PlayerRegistry = Record<string, Player>;

export interface Submission {
  answer: string;
  /** 0-based arrival order within the round */
  order: number;
  tick: number;
}

interface RoundBase {
  roundNumber: number;
  question: Question;
  openedAtTick: number;
  deadlineTick: number;
  submissions: Record<string, Submission>;
}

export interface OpenRound extends RoundBase {
  status: typeof RoundStatuses.OPEN;
  closedAtTick: null;
  closeReason: null;
}

export interface ClosedRound extends RoundBase {
  status: typeof RoundStatuses.CLOSED;
  closedAtTick: number;
  closeReason: RoundCloseReason;
}

export type Round = OpenRound | ClosedRound;

export interface RoundPlayerResult {
  playerId: string;
  answer: string | null;
  submissionOrder: number | null;
  submittedAtTick: number | null;
  correct: boolean;
  points: number;
}

/** A scored round, archived once its points are credited. */
export interface RoundSummary {
  roundNumber: number;
  questionId: string;
  correctAnswer: string;
  weight: number;
  openedAtTick: number;
  deadlineTick: number;
  closedAtTick: number;
  closeReason: RoundCloseReason;
  pointsAwarded: number;
  results: RoundPlayerResult[];
}

export interface SettlementEntry {
  playerId: string;
  rank: number;
  score: number;
  payoutWeight: number;
}

export interface GameState {
  gameId: string | null;
  seed: string;
  config: GameConfig;
  phase: GamePhase;
  tick: number;
  players: PlayerRegistry;
  /** Exactly one while IN_PROGRESS, null otherwise */
  round: Round | null;
  finishedRounds: RoundSummary[];
  /** Written once, on entering FINISHED */
  settlement: SettlementEntry[] | null;
}
