import { initialTransition, transition } from 'xstate';
import {
  GameInputSchema,
  GamePhases,
  type GameInput,
} from '@science-trivia/shared-types';
import { ok, type GameState, type Result, type SettlementEntry, type TransitionRejection } from './contracts';
import type { QuestionBank } from './question-bank';
import { dispatch } from './dispatcher';
import { createScienceGameMachine, stateValueFor, type ScienceGameMachine } from './machines/science-game';

export interface TransitionOutcome {
  state: GameState;
  /** Present only on the event that moved the game into FINISHED */
  settlement: SettlementEntry[] | null;
}

export type TransitionResult = Result<TransitionOutcome>;

export interface GameEngine {
  readonly bank: QuestionBank;
  readonly machine: ScienceGameMachine;
  /** Throws a ZodError for an invalid seed or config. */
  createGame(input: GameInput): GameState;
  /** The single entry point: (prior state, raw event) -> new state + settlement, or a rejection. */
  apply(state: GameState, event: unknown): TransitionResult;
}

export function createGameEngine(bank: QuestionBank): GameEngine {
  const machine = createScienceGameMachine(bank);

  return {
    bank,
    machine,

    createGame(input) {
      const [snapshot] = initialTransition(machine, GameInputSchema.parse(input));
      return snapshot.context;
    },

    apply(state, raw) {
      const dispatched = dispatch(state, raw, bank);
      if (!dispatched.ok) return dispatched;

      const snapshot = machine.resolveState({ value: stateValueFor(state.phase), context: state });
      const [next] = transition(machine, snapshot, dispatched.value);
      const finalized = state.phase !== GamePhases.FINISHED && next.context.phase === GamePhases.FINISHED;

      return ok({
        state: next.context,
        settlement: finalized ? next.context.settlement : null,
      });
    },
  };
}

// --- Replay ---

export interface ReplayReport {
  state: GameState;
  applied: number;
  rejections: Array<{ index: number; rejection: TransitionRejection }>;
  settlement: SettlementEntry[] | null;
}

export type ReplayObserver = (index: number, event: unknown, result: TransitionResult) => void;

/** Folds apply over an ordered event log. Rejected events are recorded and skipped. */
export function replay(
  engine: GameEngine,
  initial: GameState,
  events: readonly unknown[],
  observe?: ReplayObserver,
): ReplayReport {
  const report: ReplayReport = { state: initial, applied: 0, rejections: [], settlement: null };

  events.forEach((event, index) => {
    const result = engine.apply(report.state, event);
    observe?.(index, event, result);
    if (!result.ok) {
      report.rejections.push({ index, rejection: result.rejection });
      return;
    }
    report.state = result.value.state;
    report.applied += 1;
    if (result.value.settlement) report.settlement = result.value.settlement;
  });

  return report;
}
