import { PlayerStatuses } from '@science-trivia/shared-types';
import type { Player, PlayerRegistry } from '../contracts';

/** Object key order is not stable for numeric-looking ids; joinedSeq is. */
export function playersInJoinOrder(players: PlayerRegistry): Player[] {
  return Object.values(players).sort((a, b) => a.joinedSeq - b.joinedSeq);
}

export function getActivePlayerIds(players: PlayerRegistry): string[] {
  return playersInJoinOrder(players)
    .filter((p) => p.status === PlayerStatuses.ACTIVE)
    .map((p) => p.id);
}

/** Own-property lookup: ids such as "constructor" must not hit Object.prototype. */
export function findPlayer(players: PlayerRegistry, playerId: string): Player | undefined {
  return Object.hasOwn(players, playerId) ? players[playerId] : undefined;
}
