/**
 * Science Game Machine
 *
 * WAITING_FOR_PLAYERS -> IN_PROGRESS -> FINISHED (final).
 *
 * The machine is never interpreted by an actor: the engine evaluates it with
 * xstate's pure `transition` function, one event at a time, so a transition is
 * a function of (context, event) alone. Deadlines are ticks carried by the
 * events themselves.
 *
 * Round cascade inside IN_PROGRESS:
 *   roundOpen --(deadline / all answered)--> roundClosed (score)
 *   roundClosed --(more rounds)--> roundOpen (next question)
 *   roundClosed --(last round)--> finished
 * Both hops are eventless, so the event that closes a round also scores it
 * and opens the next one (or finalizes) before the transition returns.
 */
import { setup, assign, type StateValue } from 'xstate';
import {
  Events,
  GamePhases,
  RejectionReasons,
  RoundStatuses,
  type GameEvent,
  type GamePhase,
  type Question,
  type ResolvedGameInput,
} from '@science-trivia/shared-types';
import { ok, reject, type GameState, type Result } from '../contracts';
import type { QuestionBank } from '../question-bank';
import { register, scoreboard } from '../player-registry';
import { accept, close, closeReasonFor, deadlineFor, forceClose, open, score } from '../round-engine';
import { buildSettlement } from '../settlement';

export function createInitialState(input: ResolvedGameInput): GameState {
  return {
    gameId: input.gameId ?? null,
    seed: input.seed,
    config: input.config,
    phase: GamePhases.WAITING_FOR_PLAYERS,
    tick: 0,
    players: {},
    round: null,
    finishedRounds: [],
    settlement: null,
  };
}

/** Guard for GAME.START; also yields round 1's question. */
export function checkStart(state: GameState, bank: QuestionBank): Result<Question> {
  if (state.phase !== GamePhases.WAITING_FOR_PLAYERS || state.round) {
    return reject(RejectionReasons.ROUND_ALREADY_OPEN, 'The game has already started');
  }
  const count = Object.keys(state.players).length;
  if (count < state.config.minPlayers) {
    return reject(
      RejectionReasons.NOT_ENOUGH_PLAYERS,
      `${count} player(s) joined, ${state.config.minPlayers} required`,
    );
  }
  if (state.config.totalRounds > bank.size) {
    return reject(
      RejectionReasons.QUESTION_BANK_EXHAUSTED,
      `${state.config.totalRounds} rounds configured, ${bank.size} questions in the bank`,
    );
  }
  const first = bank.select(state.seed, 0);
  return first.ok ? ok(first.value) : first;
}

/** Machine state value a persisted phase resumes into. Closed rounds are never at rest. */
export function stateValueFor(phase: GamePhase): StateValue {
  switch (phase) {
    case GamePhases.WAITING_FOR_PLAYERS:
      return 'waitingForPlayers';
    case GamePhases.IN_PROGRESS:
      return { inProgress: 'roundOpen' };
    case GamePhases.FINISHED:
      return 'finished';
  }
}

export function createScienceGameMachine(bank: QuestionBank) {
  return setup({
    types: {
      context: {} as GameState,
      events: {} as GameEvent,
      input: {} as ResolvedGameInput,
    },
    guards: {
      canRegister: ({ context, event }) =>
        event.type === Events.Player.JOIN &&
        register(context.players, event.playerId, event.tick, {
          phase: context.phase,
          maxPlayers: context.config.maxPlayers,
        }).ok,
      canStart: ({ context }) => checkStart(context, bank).ok,
      canSubmit: ({ context, event }) =>
        event.type === Events.Answer.SUBMIT && accept(context.players, context.round, event).ok,
      roundShouldClose: ({ context: { round, players, tick } }) =>
        round !== null &&
        round.status === RoundStatuses.OPEN &&
        closeReasonFor(round, players, tick) !== null,
      hasMoreRounds: ({ context }) => context.finishedRounds.length < context.config.totalRounds,
    },
    actions: {
      advanceTick: assign({
        tick: ({ context, event }) => Math.max(context.tick, event.tick),
      }),

      registerPlayer: assign(({ context, event }) => {
        if (event.type !== Events.Player.JOIN) return {};
        const registered = register(context.players, event.playerId, event.tick, {
          phase: context.phase,
          maxPlayers: context.config.maxPlayers,
        });
        return registered.ok ? { players: registered.value } : {};
      }),

      enterInProgress: assign({ phase: GamePhases.IN_PROGRESS }),

      openNextRound: assign(({ context }) => {
        const roundNumber = context.finishedRounds.length + 1;
        const selected = bank.select(context.seed, roundNumber - 1);
        if (!selected.ok) return {};
        const opened = open(context.round, {
          roundNumber,
          question: selected.value,
          openedAtTick: context.tick,
          deadlineTick: deadlineFor(selected.value, context.tick),
        });
        return opened.ok ? { round: opened.value } : {};
      }),

      acceptAnswer: assign(({ context, event }) => {
        if (event.type !== Events.Answer.SUBMIT) return {};
        const accepted = accept(context.players, context.round, event);
        return accepted.ok ? { players: accepted.value.players, round: accepted.value.round } : {};
      }),

      closeRound: assign(({ context: { round, players, tick } }) => {
        if (!round || round.status !== RoundStatuses.OPEN) return {};
        return { round: close(round, players, tick) };
      }),

      forceCloseRound: assign(({ context: { round, tick } }) => {
        if (!round || round.status !== RoundStatuses.OPEN) return {};
        return { round: forceClose(round, tick) };
      }),

      scoreRound: assign(({ context }) => {
        const { round } = context;
        if (!round || round.status !== RoundStatuses.CLOSED) return {};
        const scored = score(round, context.players, context.config);
        return {
          players: scored.players,
          round: null,
          finishedRounds: [...context.finishedRounds, scored.summary],
        };
      }),

      finalize: assign(({ context }) => ({
        phase: GamePhases.FINISHED,
        round: null,
        settlement: buildSettlement(scoreboard(context.players), context.config.payoutByRank),
      })),
    },
  }).createMachine({
    id: 'science-game',
    context: ({ input }) => createInitialState(input),
    initial: 'waitingForPlayers',
    states: {
      waitingForPlayers: {
        on: {
          [Events.Player.JOIN]: { guard: 'canRegister', actions: ['advanceTick', 'registerPlayer'] },
          [Events.Game.START]: { guard: 'canStart', target: 'inProgress', actions: 'advanceTick' },
          [Events.System.TICK]: { actions: 'advanceTick' },
          // Cancellation before the first round: settle everyone at zero
          [Events.Admin.FORCE_END]: { target: 'finished', actions: 'advanceTick' },
        },
      },
      inProgress: {
        entry: 'enterInProgress',
        initial: 'roundOpen',
        on: {
          [Events.System.TICK]: { actions: 'advanceTick' },
          [Events.Admin.FORCE_END]: {
            target: 'finished',
            actions: ['advanceTick', 'forceCloseRound', 'scoreRound'],
          },
        },
        states: {
          roundOpen: {
            entry: 'openNextRound',
            always: { guard: 'roundShouldClose', target: 'roundClosed', actions: 'closeRound' },
            on: {
              [Events.Answer.SUBMIT]: { guard: 'canSubmit', actions: ['advanceTick', 'acceptAnswer'] },
            },
          },
          roundClosed: {
            entry: 'scoreRound',
            always: [
              { guard: 'hasMoreRounds', target: 'roundOpen' },
              { target: '#science-game.finished' },
            ],
          },
        },
      },
      finished: {
        type: 'final',
        entry: 'finalize',
      },
    },
  });
}

export type ScienceGameMachine = ReturnType<typeof createScienceGameMachine>;
