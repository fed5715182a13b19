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
} from './game-state';
export type { TransitionRejection, Rejected, Result } from './transition-result';
export { ok, reject } from './transition-result';
