/**
 * String literal constants for event types, phases, statuses and rejection
 * reasons. Consumers import these instead of writing raw strings.
 */

// --- EVENT TYPE CONSTANTS ---

export const Events = {
  Player: { JOIN: 'PLAYER.JOIN' },
  Game: { START: 'GAME.START' },
  Answer: { SUBMIT: 'ANSWER.SUBMIT' },
  System: { TICK: 'SYSTEM.TICK' },
  Admin: { FORCE_END: 'ADMIN.FORCE_END' },
  Rejection: { TRANSITION: 'TRANSITION.REJECTED' },
} as const;

// --- PHASE CONSTANTS ---

export const GamePhases = {
  WAITING_FOR_PLAYERS: 'WAITING_FOR_PLAYERS',
  IN_PROGRESS: 'IN_PROGRESS',
  FINISHED: 'FINISHED',
} as const;

export const RoundStatuses = {
  OPEN: 'OPEN',
  CLOSED: 'CLOSED',
  SCORED: 'SCORED',
} as const;

export const RoundCloseReasons = {
  DEADLINE: 'DEADLINE',
  ALL_ANSWERED: 'ALL_ANSWERED',
  FORCED: 'FORCED',
} as const;

export const PlayerStatuses = {
  ACTIVE: 'ACTIVE',
  ELIMINATED: 'ELIMINATED',
} as const;

// --- REJECTION REASONS ---

export const RejectionReasons = {
  // registry
  ALREADY_JOINED: 'ALREADY_JOINED',
  REGISTRATION_CLOSED: 'REGISTRATION_CLOSED',
  UNKNOWN_PLAYER: 'UNKNOWN_PLAYER',
  GAME_FULL: 'GAME_FULL',
  PLAYER_ELIMINATED: 'PLAYER_ELIMINATED',
  // submission timing
  ROUND_NOT_OPEN: 'ROUND_NOT_OPEN',
  DUPLICATE_SUBMISSION: 'DUPLICATE_SUBMISSION',
  DEADLINE_EXCEEDED: 'DEADLINE_EXCEEDED',
  // round lifecycle / config
  ROUND_ALREADY_OPEN: 'ROUND_ALREADY_OPEN',
  QUESTION_BANK_EXHAUSTED: 'QUESTION_BANK_EXHAUSTED',
  NOT_ENOUGH_PLAYERS: 'NOT_ENOUGH_PLAYERS',
  GAME_FINISHED: 'GAME_FINISHED',
  // dispatcher
  MALFORMED_EVENT: 'MALFORMED_EVENT',
} as const;

export type GamePhase = (typeof GamePhases)[keyof typeof GamePhases];
export type RoundStatus = (typeof RoundStatuses)[keyof typeof RoundStatuses];
export type RoundCloseReason = (typeof RoundCloseReasons)[keyof typeof RoundCloseReasons];
export type PlayerStatus = (typeof PlayerStatuses)[keyof typeof PlayerStatuses];
export type RejectionReason = (typeof RejectionReasons)[keyof typeof RejectionReasons];
