import { describe, test, expect } from 'vitest';
import { QuestionPoolSchema } from '@science-trivia/shared-types';
import sciencePool from '../../data/science-questions.json';
import { createQuestionBank, hashSeed, questionOrder, seededShuffle } from '../index';
import { QUESTIONS, SEED } from './fixtures';

describe('Question Bank', () => {
  test('same seed and index always yield the same question', () => {
    const bank = createQuestionBank(QUESTIONS);
    const first = bank.select(SEED, 2);
    const second = createQuestionBank(QUESTIONS).select(SEED, 2);

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(first.value).toEqual(second.value);
  });

  test('selection follows the seeded order and never repeats a question', () => {
    const bank = createQuestionBank(QUESTIONS);
    const order = questionOrder(SEED, QUESTIONS.length);

    const ids = order.map((_, index) => {
      const selected = bank.select(SEED, index);
      return selected.ok ? selected.value.id : null;
    });

    expect(ids).toEqual(order.map((i) => QUESTIONS[i].id));
    expect([...ids].sort()).toEqual(['q-methane', 'q-ozone', 'q-salt', 'q-water']);
  });

  test('different seeds order a large pool differently', () => {
    const pool = QuestionPoolSchema.parse(sciencePool);
    expect(questionOrder('alpha', pool.length)).not.toEqual(questionOrder('beta', pool.length));
  });

  test('index at or past the pool size is QUESTION_BANK_EXHAUSTED', () => {
    const bank = createQuestionBank(QUESTIONS);

    for (const index of [4, 10, -1, 1.5]) {
      const selected = bank.select(SEED, index);
      expect(selected.ok).toBe(false);
      if (selected.ok) continue;
      expect(selected.rejection.reason).toBe('QUESTION_BANK_EXHAUSTED');
    }
  });

  test('applies question defaults', () => {
    const bank = createQuestionBank([{ id: 'bare', prompt: { text: 'Bare question' }, correctAnswer: 'yes' }]);
    expect(bank.questions[0]).toEqual({
      id: 'bare',
      prompt: { text: 'Bare question' },
      correctAnswer: 'yes',
      weight: 1,
      timeLimitTicks: 30,
    });
  });

  test('rejects empty pools and duplicate ids at construction', () => {
    expect(() => createQuestionBank([])).toThrow();
    expect(() => createQuestionBank([QUESTIONS[0], { ...QUESTIONS[1], id: 'q-water' }])).toThrow(/Duplicate question id/);
  });

  test('bundled science pool is valid', () => {
    const bank = createQuestionBank(QuestionPoolSchema.parse(sciencePool));
    expect(bank.size).toBe(30);
  });
});

describe('seeded randomness', () => {
  test('hashSeed is 32-bit FNV-1a', () => {
    expect(hashSeed('')).toBe(2166136261);
    expect(hashSeed('a')).toBe(0xe40c292c);
  });

  test('seededShuffle returns a permutation without touching its input', () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = seededShuffle(items, 42);

    expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(seededShuffle(items, 42)).toEqual(shuffled);
  });
});
