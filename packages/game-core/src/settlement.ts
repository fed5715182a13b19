import type { Player, SettlementEntry } from './contracts';

/**
 * Settlement Builder.
 * Standings must already be in scoreboard order; rank is position + 1, so no
 * two players ever share a rank. Ranks past the payout table get weight 0.
 */
export function buildSettlement(
  standings: readonly Player[],
  payoutByRank: readonly number[],
): SettlementEntry[] {
  return standings.map((player, index) => ({
    playerId: player.id,
    rank: index + 1,
    score: player.score,
    payoutWeight: payoutByRank[index] ?? 0,
  }));
}
