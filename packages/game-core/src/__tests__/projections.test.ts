import { describe, test, expect } from 'vitest';
import { projectForPlayer, projectScoreboard } from '../index';
import { correctAnswerOf, forceEnd, join, newGame, start, steps, submit } from './fixtures';

describe('Projections', () => {
  test('the live round hides the correct answer and other players\' answers', () => {
    const { engine, state: created } = newGame();
    const state = steps(engine, created, [join('ada'), join('grace'), join('linus'), start(1)]);
    const answer = correctAnswerOf(state);
    const live = steps(engine, state, [submit('grace', 'guess', 2), submit('ada', answer, 3)]);

    const view = projectForPlayer(live, 'ada');

    expect(view.me).toEqual({ id: 'ada', score: 0, status: 'ACTIVE', answer });
    expect(view.currentRound).toMatchObject({ roundNumber: 1, weight: 2, deadlineTick: 11, submitted: ['grace', 'ada'] });
    expect(JSON.stringify(view.currentRound)).not.toContain(answer);
    expect(JSON.stringify(projectForPlayer(live, 'linus'))).not.toContain('guess');
    expect(view.lastRound).toBeNull();
  });

  test('spectators get no personal section', () => {
    const { state } = newGame();
    expect(projectForPlayer(state, 'nobody').me).toBeNull();
  });

  test('finished rounds and settlement are shown in full', () => {
    const { engine, state: created } = newGame();
    const state = steps(engine, created, [join('ada'), join('grace'), start(1)]);
    const answer = correctAnswerOf(state);
    const ended = steps(engine, state, [submit('ada', answer, 2), forceEnd(4)]);

    const view = projectForPlayer(ended, 'grace');

    expect(view.phase).toBe('FINISHED');
    expect(view.currentRound).toBeNull();
    expect(view.lastRound).toMatchObject({ roundNumber: 1, correctAnswer: answer, closeReason: 'FORCED' });
    expect(view.settlement?.map((e) => e.playerId)).toEqual(['ada', 'grace']);
  });

  test('scoreboard rows are ranked', () => {
    const { engine, state: created } = newGame();
    const state = steps(engine, created, [join('ada'), join('grace'), start(1)]);
    const scored = steps(engine, state, [submit('grace', correctAnswerOf(state), 2), submit('ada', 'nope', 3)]);

    expect(projectScoreboard(scored)).toEqual([
      { rank: 1, playerId: 'grace', score: 2, status: 'ACTIVE' },
      { rank: 2, playerId: 'ada', score: 0, status: 'ACTIVE' },
    ]);
  });
});
