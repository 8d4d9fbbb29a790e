import type { Move } from '../types/game';

/**
 * Local move-selection policy used by the bundled player logic and by the
 * client's fallback when a delegate fails to produce a legal move.
 *
 * Candidates must already be legal; this module only picks one. It is
 * side-effect free apart from advancing the supplied RNG.
 */
export type LocalAIRng = () => number;

/**
 * Pick a uniformly random move. Returns null for an empty list.
 */
export function chooseRandomMove(moves: readonly Move[], rng: LocalAIRng): Move | null {
  if (moves.length === 0) {
    return null;
  }
  const index = Math.min(Math.floor(rng() * moves.length), moves.length - 1);
  return moves[index] ?? null;
}

/**
 * Deterministic RNG from a seed (mulberry32), for reproducible games and
 * tests.
 */
export function createSeededRng(seed: number): LocalAIRng {
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createDefaultRng(): LocalAIRng {
  return Math.random;
}
