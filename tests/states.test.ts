import { describe, it, expect } from 'vitest';
import { isTerminal, PublishStateMachine } from '../src/publish/states.js';

describe('PublishStateMachine', () => {
  it('records the trail of a successful run', () => {
    const machine = new PublishStateMachine();
    machine.transition('checking-divergence');
    machine.transition('pushing-private');
    machine.transition('building-filtered-tree');
    machine.transition('comparing-trees');
    machine.transition('no-op-done');

    expect(machine.state).toBe('no-op-done');
    expect(machine.history).toEqual([
      'start',
      'checking-divergence',
      'pushing-private',
      'building-filtered-tree',
      'comparing-trees',
      'no-op-done',
    ]);
  });

  it('rejects skipping the private push', () => {
    const machine = new PublishStateMachine();
    machine.transition('checking-divergence');
    expect(() => machine.transition('building-filtered-tree')).toThrow(
      'Illegal publish state transition checking-divergence -> building-filtered-tree',
    );
    expect(machine.state).toBe('checking-divergence');
  });

  it('allows nothing after a terminal state', () => {
    const machine = new PublishStateMachine();
    machine.transition('aborted-precondition');
    expect(isTerminal(machine.state)).toBe(true);
    expect(() => machine.transition('checking-divergence')).toThrow();
  });

  it('treats only end states as terminal', () => {
    expect(isTerminal('done')).toBe(true);
    expect(isTerminal('aborted-push-failed')).toBe(true);
    expect(isTerminal('pushing-public')).toBe(false);
  });
});
