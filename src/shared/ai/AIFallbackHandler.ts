/**
 * Fallback move selection for when the player's own logic does not deliver
 * a usable move in time.
 *
 * The core selection policy is in `engine/localAIMoveSelection.ts`. This
 * module adds:
 * - Type definitions for fallback contexts
 * - Diagnostics helpers for the end-of-game summary
 *
 * Usage:
 * ```typescript
 * const result = selectFallbackMove({
 *   reason: 'move_timeout',
 *   color: 'RED',
 *   validMoves: getPossibleMoves(state, 'RED'),
 *   rng: createSeededRng(42),
 * });
 * ```
 *
 * @module AIFallbackHandler
 */

import type { Move, PlayerColor } from '../types/game';
import { chooseRandomMove, LocalAIRng } from '../engine/localAIMoveSelection';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reasons why fallback was triggered.
 */
export type FallbackReason = 'move_timeout' | 'delegate_error' | 'invalid_move';

export interface FallbackContext {
  reason: FallbackReason;
  color: PlayerColor;
  /** Legal moves for `color` */
  validMoves: readonly Move[];
  rng: LocalAIRng;
}

export interface FallbackResult {
  /** Selected move (null if no valid moves) */
  move: Move | null;
  success: boolean;
  reason: FallbackReason;
  diagnostics: FallbackDiagnostics;
}

export interface FallbackDiagnostics {
  validMoveCount: number;
  selectedMoveType?: Move['type'];
  selectionTimeMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// FALLBACK SELECTION
// ═══════════════════════════════════════════════════════════════════════════

export function selectFallbackMove(context: FallbackContext): FallbackResult {
  const startTime = performance.now();
  const move = chooseRandomMove(context.validMoves, context.rng);
  const selectionTimeMs = performance.now() - startTime;

  return {
    move,
    success: move !== null,
    reason: context.reason,
    diagnostics: {
      validMoveCount: context.validMoves.length,
      selectedMoveType: move?.type,
      selectionTimeMs,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// DIAGNOSTICS TRACKING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Cumulative fallback diagnostics for one game.
 */
export interface CumulativeFallbackDiagnostics {
  totalAttempts: number;
  successfulSelections: number;
  /** Selections that found no valid move */
  failedSelections: number;
  byReason: Partial<Record<FallbackReason, number>>;
  totalSelectionTimeMs: number;
}

export function createEmptyDiagnostics(): CumulativeFallbackDiagnostics {
  return {
    totalAttempts: 0,
    successfulSelections: 0,
    failedSelections: 0,
    byReason: {},
    totalSelectionTimeMs: 0,
  };
}

/**
 * Fold a new result into the cumulative diagnostics.
 */
export function updateDiagnostics(
  cumulative: CumulativeFallbackDiagnostics,
  result: FallbackResult
): CumulativeFallbackDiagnostics {
  return {
    totalAttempts: cumulative.totalAttempts + 1,
    successfulSelections: cumulative.successfulSelections + (result.success ? 1 : 0),
    failedSelections: cumulative.failedSelections + (result.success ? 0 : 1),
    byReason: {
      ...cumulative.byReason,
      [result.reason]: (cumulative.byReason[result.reason] ?? 0) + 1,
    },
    totalSelectionTimeMs: cumulative.totalSelectionTimeMs + result.diagnostics.selectionTimeMs,
  };
}
