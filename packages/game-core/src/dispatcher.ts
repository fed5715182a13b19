/**
 * Event Dispatcher
 *
 * Turns a raw inbound envelope into a GameEvent the machine may take, or a
 * rejection. Checks run in a fixed order:
 *   1. structure (zod) and tick monotonicity -> MALFORMED_EVENT
 *   2. terminal phase                        -> GAME_FINISHED
 *   3. the transition's own preconditions    -> the component's rejection
 * The machine's guards call the same component functions, so an event that
 * passes here is taken by the machine.
 */
import {
  Events,
  GameEventSchema,
  GamePhases,
  RejectionReasons,
  type GameEvent,
} from '@science-trivia/shared-types';
import { ok, reject, type GameState, type Rejected, type Result } from './contracts';
import type { QuestionBank } from './question-bank';
import { register } from './player-registry';
import { accept } from './round-engine';
import { checkStart } from './machines/science-game';

function eventTypeOf(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('type' in raw)) return undefined;
  return typeof raw.type === 'string' ? raw.type : undefined;
}

function withEventType(rejected: Rejected, eventType: string | undefined): Rejected {
  if (eventType === undefined) return rejected;
  return { ok: false, rejection: { ...rejected.rejection, eventType } };
}

export function parseEnvelope(raw: unknown, lastTick: number): Result<GameEvent> {
  const parsed = GameEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return reject(RejectionReasons.MALFORMED_EVENT, `Malformed event: ${issues}`);
  }
  if (parsed.data.tick < lastTick) {
    return reject(
      RejectionReasons.MALFORMED_EVENT,
      `Tick ${parsed.data.tick} goes backwards (last tick ${lastTick})`,
    );
  }
  return ok(parsed.data);
}

export function checkPreconditions(state: GameState, event: GameEvent, bank: QuestionBank): Result<GameEvent> {
  if (state.phase === GamePhases.FINISHED) {
    return reject(RejectionReasons.GAME_FINISHED, 'The game has finished');
  }

  switch (event.type) {
    case Events.Player.JOIN: {
      const registered = register(state.players, event.playerId, event.tick, {
        phase: state.phase,
        maxPlayers: state.config.maxPlayers,
      });
      return registered.ok ? ok(event) : registered;
    }
    case Events.Game.START: {
      const started = checkStart(state, bank);
      return started.ok ? ok(event) : started;
    }
    case Events.Answer.SUBMIT: {
      const accepted = accept(state.players, state.round, event);
      return accepted.ok ? ok(event) : accepted;
    }
    case Events.System.TICK:
    case Events.Admin.FORCE_END:
      return ok(event);
  }
}

export function dispatch(state: GameState, raw: unknown, bank: QuestionBank): Result<GameEvent> {
  const parsed = parseEnvelope(raw, state.tick);
  if (!parsed.ok) return withEventType(parsed, eventTypeOf(raw));
  const checked = checkPreconditions(state, parsed.value, bank);
  return checked.ok ? checked : withEventType(checked, parsed.value.type);
}
