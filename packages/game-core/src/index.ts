// Contracts
export type {
  Player,
  PlayerRegistry,
  Submission,
  OpenRound,
  ClosedRound,
  Round,
  RoundPlayerResult,
  RoundSummary,
  SettlementEntry,
  GameState,
  TransitionRejection,
  Rejected,
  Result,
} from './contracts';
export { ok, reject } from './contracts';

// Components
export { createQuestionBank, questionOrder, type QuestionBank } from './question-bank';
export {
  register,
  recordSubmission,
  scoreboard,
  compareStanding,
  createPlayer,
  type RegistrationOptions,
  type SubmissionRequest,
} from './player-registry';
export {
  open,
  accept,
  close,
  forceClose,
  closeReasonFor,
  deadlineFor,
  score,
  type OpenRoundRequest,
} from './round-engine';
export { buildSettlement } from './settlement';
export { dispatch, parseEnvelope, checkPreconditions } from './dispatcher';

// Machine + engine
export {
  createScienceGameMachine,
  createInitialState,
  checkStart,
  stateValueFor,
  type ScienceGameMachine,
} from './machines/science-game';
export {
  createGameEngine,
  replay,
  type GameEngine,
  type TransitionOutcome,
  type TransitionResult,
  type ReplayReport,
  type ReplayObserver,
} from './engine';

// Helpers
export { playersInJoinOrder, getActivePlayerIds, findPlayer } from './helpers/players';
export { hashSeed, mulberry32, seededShuffle } from './helpers/seeded-random';
export { projectForPlayer, projectScoreboard, type PlayerView, type ScoreboardRow } from './helpers/projections';
