import {
  chooseRandomMove,
  createSeededRng,
} from '../../src/shared/engine/localAIMoveSelection';
import {
  createEmptyDiagnostics,
  selectFallbackMove,
  updateDiagnostics,
} from '../../src/shared/ai/AIFallbackHandler';
import type { Move } from '../../src/shared/types/game';
import { dragMove, setMove } from '../utils/fixtures';

const moves: Move[] = [setMove('RED', 'ANT', 0, -1), dragMove(0, 0, 1, 0), { type: 'skip' }];

describe('chooseRandomMove', () => {
  it('returns null when there is nothing to choose', () => {
    expect(chooseRandomMove([], () => 0.5)).toBeNull();
  });

  it('maps the rng value onto the move list', () => {
    expect(chooseRandomMove(moves, () => 0)).toBe(moves[0]);
    expect(chooseRandomMove(moves, () => 0.5)).toBe(moves[1]);
    expect(chooseRandomMove(moves, () => 0.99)).toBe(moves[2]);
  });

  it('clamps out-of-range rng values to the last move', () => {
    expect(chooseRandomMove(moves, () => 1)).toBe(moves[2]);
  });
});

describe('createSeededRng', () => {
  it('produces the same sequence for the same seed', () => {
    const a = createSeededRng(42);
    const b = createSeededRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('produces values in [0, 1)', () => {
    const rng = createSeededRng(7);
    for (let i = 0; i < 100; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createSeededRng(1)()).not.toBe(createSeededRng(2)());
  });
});

describe('AIFallbackHandler', () => {
  it('selects a move and records diagnostics', () => {
    const result = selectFallbackMove({
      reason: 'move_timeout',
      color: 'RED',
      validMoves: moves,
      rng: () => 0,
    });

    expect(result.move).toBe(moves[0]);
    expect(result.success).toBe(true);
    expect(result.reason).toBe('move_timeout');
    expect(result.diagnostics.validMoveCount).toBe(3);
    expect(result.diagnostics.selectedMoveType).toBe('set');
  });

  it('reports failure when no move is available', () => {
    const result = selectFallbackMove({
      reason: 'invalid_move',
      color: 'BLUE',
      validMoves: [],
      rng: () => 0,
    });

    expect(result.move).toBeNull();
    expect(result.success).toBe(false);
    expect(result.diagnostics.selectedMoveType).toBeUndefined();
  });

  it('accumulates diagnostics per reason', () => {
    const success = selectFallbackMove({ reason: 'move_timeout', color: 'RED', validMoves: moves, rng: () => 0 });
    const failure = selectFallbackMove({ reason: 'delegate_error', color: 'RED', validMoves: [], rng: () => 0 });

    let diagnostics = createEmptyDiagnostics();
    diagnostics = updateDiagnostics(diagnostics, success);
    diagnostics = updateDiagnostics(diagnostics, success);
    diagnostics = updateDiagnostics(diagnostics, failure);

    expect(diagnostics).toMatchObject({
      totalAttempts: 3,
      successfulSelections: 2,
      failedSelections: 1,
      byReason: { move_timeout: 2, delegate_error: 1 },
    });
  });
});
