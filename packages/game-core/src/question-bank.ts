/**
 * Question Bank
 *
 * Immutable ordered pool. Selection is a pure function of (seed, index):
 * the pool's index order is shuffled once per seed, so every party holding
 * the same pool and seed draws the same question for the same round and no
 * question repeats within a game.
 */
import {
  QuestionPoolSchema,
  RejectionReasons,
  type Question,
  type QuestionInput,
} from '@science-trivia/shared-types';
import { ok, reject, type Result } from './contracts';
import { hashSeed, seededShuffle } from './helpers/seeded-random';

export interface QuestionBank {
  readonly size: number;
  readonly questions: readonly Question[];
  select(seed: string, index: number): Result<Question>;
}

export function questionOrder(seed: string, size: number): number[] {
  const indices = Array.from({ length: size }, (_, index) => index);
  return seededShuffle(indices, hashSeed(`${seed}:order`));
}

/** Throws a ZodError for an empty pool, a malformed question or a duplicate id. */
export function createQuestionBank(pool: readonly QuestionInput[]): QuestionBank {
  const questions: readonly Question[] = Object.freeze(QuestionPoolSchema.parse(pool));

  return {
    size: questions.length,
    questions,
    select(seed, index) {
      if (!Number.isInteger(index) || index < 0 || index >= questions.length) {
        return reject(
          RejectionReasons.QUESTION_BANK_EXHAUSTED,
          `Question index ${index} is outside a pool of ${questions.length}`,
        );
      }
      const order = questionOrder(seed, questions.length);
      return ok(questions[order[index]]);
    },
  };
}
