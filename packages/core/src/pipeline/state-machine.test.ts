import { describe, it, expect } from 'vitest';
import { InvalidTransitionError } from '@repoindex/shared';
import {
  assertTransition,
  canTransition,
  embeddingProgress,
  isPipelineStage,
  isTerminalStatus,
} from './state-machine';

describe('task state machine', () => {
  it('walks the happy path', () => {
    const path = ['pending', 'acquiring', 'parsing', 'embedding', 'generating-artifacts', 'completed'] as const;
    for (let i = 1; i < path.length; i++) {
      expect(canTransition(path[i - 1], path[i])).toBe(true);
    }
  });

  it('allows the zero-change fast-forward and artifact-only entry', () => {
    expect(canTransition('parsing', 'completed')).toBe(true);
    expect(canTransition('pending', 'generating-artifacts')).toBe(true);
  });

  it('reaches every stop status from each non-terminal status', () => {
    for (const from of ['pending', 'acquiring', 'parsing', 'embedding', 'generating-artifacts'] as const) {
      expect(canTransition(from, 'failed')).toBe(true);
      expect(canTransition(from, 'cancelled')).toBe(true);
      expect(canTransition(from, 'interrupted')).toBe(true);
    }
  });

  it('resets a stage to pending for a retry, but not pending itself', () => {
    expect(canTransition('embedding', 'pending')).toBe(true);
    expect(canTransition('pending', 'pending')).toBe(false);
  });

  it('rejects skipping stages and leaving terminal states', () => {
    expect(() => assertTransition('pending', 'embedding')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('acquiring', 'completed')).toThrow(
      'Invalid task transition: acquiring -> completed',
    );
    expect(() => assertTransition('completed', 'pending')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('cancelled', 'failed')).toThrow(InvalidTransitionError);
  });

  it('classifies statuses', () => {
    expect(isTerminalStatus('interrupted')).toBe(true);
    expect(isTerminalStatus('pending')).toBe(false);
    expect(isPipelineStage('embedding')).toBe(true);
    expect(isPipelineStage('pending')).toBe(false);
  });

  it('spreads embedding progress between 50 and 75', () => {
    expect(embeddingProgress(0, 4)).toBe(50);
    expect(embeddingProgress(1, 4)).toBe(56);
    expect(embeddingProgress(3, 4)).toBe(68);
    expect(embeddingProgress(4, 4)).toBe(75);
    expect(embeddingProgress(0, 0)).toBe(75);
  });
});
