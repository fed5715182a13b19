import { describe, test, expect } from 'vitest';
import { getStateNodes, toDirectedGraph } from '@xstate/graph';
import type { AnyStateNode } from 'xstate';
import { createQuestionBank } from '../../question-bank';
import { createScienceGameMachine } from '../science-game';
import { QUESTIONS } from '../../__tests__/fixtures';

/**
 * Static event coverage using @xstate/graph: which events each state can take,
 * checked against the machine definition without running it.
 */

const machine = createScienceGameMachine(createQuestionBank(QUESTIONS));

function findStateNode(key: string): AnyStateNode {
  const node = getStateNodes(machine.root).find((n) => n.key === key);
  if (!node) throw new Error(`No state node ${key}`);
  return node;
}

// Events handled by a node, including those inherited from ancestors
function getHandledEvents(node: AnyStateNode): string[] {
  const events: string[] = [];
  let current: AnyStateNode | undefined = node;
  while (current) {
    events.push(...Object.keys(current.config.on ?? {}));
    current = current.parent;
  }
  return events;
}

describe('Science Game - Event Coverage', () => {
  test('top level is waiting / in progress / finished', () => {
    const graph = toDirectedGraph(machine.root);
    expect(graph.children.map((c) => c.stateNode.key)).toEqual(['waitingForPlayers', 'inProgress', 'finished']);
  });

  test('registration and start are only handled while waiting', () => {
    expect(getHandledEvents(findStateNode('waitingForPlayers')).sort()).toEqual([
      'ADMIN.FORCE_END',
      'GAME.START',
      'PLAYER.JOIN',
      'SYSTEM.TICK',
    ]);
    expect(getHandledEvents(findStateNode('roundOpen'))).not.toContain('PLAYER.JOIN');
    expect(getHandledEvents(findStateNode('roundOpen'))).not.toContain('GAME.START');
  });

  test('an open round takes answers, ticks and force-end', () => {
    expect(getHandledEvents(findStateNode('roundOpen')).sort()).toEqual([
      'ADMIN.FORCE_END',
      'ANSWER.SUBMIT',
      'SYSTEM.TICK',
    ]);
  });

  test('roundClosed is transient', () => {
    const roundClosed = findStateNode('roundClosed');
    expect(roundClosed.config.always).toBeDefined();
    expect(Object.keys(roundClosed.config.on ?? {})).toEqual([]);
  });

  test('finished is final and handles nothing', () => {
    const finished = findStateNode('finished');
    expect(finished.type).toBe('final');
    expect(getHandledEvents(finished)).toEqual([]);
  });
});
