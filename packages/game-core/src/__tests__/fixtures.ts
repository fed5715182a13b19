import type { GameConfigInput, QuestionInput } from '@science-trivia/shared-types';
import {
  createGameEngine,
  createQuestionBank,
  deadlineFor,
  open,
  recordSubmission,
  register,
  type GameEngine,
  type GameState,
  type OpenRound,
  type PlayerRegistry,
  type QuestionBank,
  type Round,
  type TransitionOutcome,
} from '../index';

export const SEED = 'test-seed';

export const QUESTIONS: QuestionInput[] = [
  { id: 'q-water', prompt: { text: 'Chemical formula of water?' }, correctAnswer: 'H2O', weight: 2, timeLimitTicks: 10 },
  { id: 'q-salt', prompt: { text: 'Chemical formula of table salt?' }, correctAnswer: 'NaCl', weight: 2, timeLimitTicks: 10 },
  { id: 'q-ozone', prompt: { text: 'Chemical formula of ozone?' }, correctAnswer: 'O3', weight: 2, timeLimitTicks: 10 },
  { id: 'q-methane', prompt: { text: 'Chemical formula of methane?' }, correctAnswer: 'CH4', weight: 2, timeLimitTicks: 10 },
];

export function newGame(config: GameConfigInput = {}): { bank: QuestionBank; engine: GameEngine; state: GameState } {
  const bank = createQuestionBank(QUESTIONS);
  const engine = createGameEngine(bank);
  const state = engine.createGame({ seed: SEED, config: { minPlayers: 2, totalRounds: 3, ...config } });
  return { bank, engine, state };
}

/** Applies one event and fails the test on rejection. */
export function step(engine: GameEngine, state: GameState, event: unknown): TransitionOutcome {
  const result = engine.apply(state, event);
  if (!result.ok) {
    throw new Error(`Unexpected rejection ${result.rejection.reason}: ${result.rejection.message}`);
  }
  return result.value;
}

export function steps(engine: GameEngine, state: GameState, events: unknown[]): GameState {
  return events.reduce<GameState>((current, event) => step(engine, current, event).state, state);
}

export function correctAnswerOf(state: GameState): string {
  if (!state.round) throw new Error('No live round');
  return state.round.question.correctAnswer;
}

export const join = (playerId: string, tick = 0) => ({ type: 'PLAYER.JOIN', tick, playerId });
export const start = (tick: number) => ({ type: 'GAME.START', tick });
export const submit = (playerId: string, answer: string, tick: number) => ({ type: 'ANSWER.SUBMIT', tick, playerId, answer });
export const tickTo = (tick: number) => ({ type: 'SYSTEM.TICK', tick });
export const forceEnd = (tick: number) => ({ type: 'ADMIN.FORCE_END', tick });

export function registryOf(...ids: string[]): PlayerRegistry {
  return ids.reduce<PlayerRegistry>((players, id) => {
    const registered = register(players, id, 0, { phase: 'WAITING_FOR_PLAYERS', maxPlayers: 100 });
    if (!registered.ok) throw new Error(registered.rejection.message);
    return registered.value;
  }, {});
}

/** Round 1 over q-water (answer H2O, weight 2, 10 ticks). */
export function openRound(openedAtTick = 5): OpenRound {
  const question = createQuestionBank(QUESTIONS).questions[0];
  const opened = open(null, {
    roundNumber: 1,
    question,
    openedAtTick,
    deadlineTick: deadlineFor(question, openedAtTick),
  });
  if (!opened.ok) throw new Error(opened.rejection.message);
  return opened.value;
}

export function withAnswers(
  players: PlayerRegistry,
  round: OpenRound,
  answers: Array<[playerId: string, answer: string, tick: number]>,
): { players: PlayerRegistry; round: Round } {
  return answers.reduce<{ players: PlayerRegistry; round: Round }>((acc, [playerId, answer, tick]) => {
    const accepted = recordSubmission(acc.players, acc.round, { playerId, answer, tick });
    if (!accepted.ok) throw new Error(accepted.rejection.message);
    return accepted.value;
  }, { players, round });
}
