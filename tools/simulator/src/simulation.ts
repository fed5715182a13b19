import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { z } from 'zod';
import {
  createGameEngine,
  createQuestionBank,
  replay,
  type ReplayReport,
} from '@science-trivia/game-core';
import { GameConfigSchema, QuestionPoolSchema, type Question } from '@science-trivia/shared-types';
import type { Logger } from '@science-trivia/logger';

export const DEFAULT_QUESTIONS_PATH = createRequire(import.meta.url).resolve(
  '@science-trivia/game-core/data/science-questions.json',
);

/** A recorded game: its seed, optional config, and the substrate's ordered event log. */
export const GameLogSchema = z.object({
  gameId: z.string().min(1).optional(),
  seed: z.string().min(1),
  config: GameConfigSchema.optional(),
  // Envelopes stay unparsed here; the dispatcher owns their validation
  events: z.array(z.unknown()),
});

export type GameLog = z.infer<typeof GameLogSchema>;

export interface SimulationInput {
  log: GameLog;
  questions: Question[];
}

async function readJson(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf8');
  return JSON.parse(text);
}

/** Throws on unreadable files, invalid JSON, or a log/pool that fails validation. */
export async function loadSimulationInput(
  gameLogPath: string,
  questionsPath: string = DEFAULT_QUESTIONS_PATH,
): Promise<SimulationInput> {
  const [log, questions] = await Promise.all([readJson(gameLogPath), readJson(questionsPath)]);
  return {
    log: GameLogSchema.parse(log),
    questions: QuestionPoolSchema.parse(questions),
  };
}

export function runSimulation({ log, questions }: SimulationInput, logger: Logger): ReplayReport {
  const engine = createGameEngine(createQuestionBank(questions));
  const initial = engine.createGame({ gameId: log.gameId, seed: log.seed, config: log.config });
  logger.info('game.created', {
    gameId: initial.gameId,
    seed: initial.seed,
    questionCount: engine.bank.size,
    totalRounds: initial.config.totalRounds,
  });

  const report = replay(engine, initial, log.events, (index, _event, result) => {
    if (!result.ok) {
      logger.warn('event.rejected', {
        index,
        eventType: result.rejection.eventType,
        reason: result.rejection.reason,
        message: result.rejection.message,
      });
      return;
    }
    const { state, settlement } = result.value;
    logger.debug('event.applied', {
      index,
      phase: state.phase,
      tick: state.tick,
      round: state.round?.roundNumber ?? null,
      scoredRounds: state.finishedRounds.length,
    });
    if (settlement) {
      logger.info('game.settled', { index, settlement });
    }
  });

  logger.info('replay.complete', {
    applied: report.applied,
    rejected: report.rejections.length,
    phase: report.state.phase,
    tick: report.state.tick,
  });
  return report;
}
