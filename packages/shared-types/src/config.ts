export const Config = {
  game: {
    minPlayers: 2,
    maxPlayers: 1_000,
    totalRounds: 5,
    // 0 disables elimination for inactivity
    eliminateAfterMissedRounds: 0,
    payoutByRank: [15, 10, 7, 3] as readonly number[],
  },
  question: {
    defaultWeight: 1,
    defaultTimeLimitTicks: 30,
    maxAnswerLength: 280,
  },
  simulator: {
    axiomDataset: 'science-trivia',
    logLevel: 'info',
  },
} as const;
