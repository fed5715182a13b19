import {
  RoundStatuses,
  type GamePhase,
  type PlayerStatus,
  type QuestionPrompt,
} from '@science-trivia/shared-types';
import type { GameState, RoundSummary, SettlementEntry } from '../contracts';
import { scoreboard } from '../player-registry';
import { findPlayer } from './players';

export interface ScoreboardRow {
  rank: number;
  playerId: string;
  score: number;
  status: PlayerStatus;
}

export interface PlayerView {
  phase: GamePhase;
  tick: number;
  totalRounds: number;
  me: { id: string; score: number; status: PlayerStatus; answer: string | null } | null;
  currentRound: {
    roundNumber: number;
    prompt: QuestionPrompt;
    weight: number;
    deadlineTick: number;
    submitted: string[];
  } | null;
  lastRound: RoundSummary | null;
  scoreboard: ScoreboardRow[];
  settlement: SettlementEntry[] | null;
}

export function projectScoreboard(state: GameState): ScoreboardRow[] {
  return scoreboard(state.players).map((p, index) => ({
    rank: index + 1,
    playerId: p.id,
    score: p.score,
    status: p.status,
  }));
}

/**
 * Client-safe view of the game for one player.
 * The correct answer of the live round and other players'
 * answers never leave the core; finished rounds are shown in full.
 */
export function projectForPlayer(state: GameState, playerId: string): PlayerView {
  const player = findPlayer(state.players, playerId);
  const { round } = state;
  const liveRound = round && round.status === RoundStatuses.OPEN ? round : null;

  return {
    phase: state.phase,
    tick: state.tick,
    totalRounds: state.config.totalRounds,
    me: player
      ? {
          id: player.id,
          score: player.score,
          status: player.status,
          answer: liveRound && Object.hasOwn(liveRound.submissions, player.id)
            ? liveRound.submissions[player.id].answer
            : null,
        }
      : null,
    currentRound: liveRound
      ? {
          roundNumber: liveRound.roundNumber,
          prompt: liveRound.question.prompt,
          weight: liveRound.question.weight,
          deadlineTick: liveRound.deadlineTick,
          submitted: Object.entries(liveRound.submissions)
            .sort(([, a], [, b]) => a.order - b.order)
            .map(([pid]) => pid),
        }
      : null,
    lastRound: state.finishedRounds.at(-1) ?? null,
    scoreboard: projectScoreboard(state),
    settlement: state.settlement,
  };
}
