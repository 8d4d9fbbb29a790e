import type { AxialCoords, CubeCoords, DoubledCoords } from '../types/game';

/**
 * Hex-grid geometry helpers.
 *
 * Axial coordinates are the engine's canonical form; cube coordinates are
 * what the protocol transmits and what makes line tests trivial; doubled
 * coordinates map onto ASCII hex grids, where the conversion uses these
 * axes after turning the grid into axial form:
 *
 * ```
 *  y ^   ^ x
 *     \ /
 *      +
 * ```
 */

export function axial(x: number, y: number): AxialCoords {
  return { x, y };
}

export function cube(x: number, y: number, z: number): CubeCoords {
  return { x, y, z };
}

/**
 * Cube coordinates only describe a hex when their components sum to zero.
 */
export function validCube(x: number, y: number, z: number): CubeCoords | undefined {
  return x + y + z === 0 ? { x, y, z } : undefined;
}

export function doubled(x: number, y: number): DoubledCoords {
  return { x, y };
}

// ============================================================================
// Conversions
// ============================================================================

export function axialToCube(coords: AxialCoords): CubeCoords {
  return { x: coords.x, y: coords.y, z: 0 - coords.x - coords.y };
}

export function cubeToAxial(coords: CubeCoords): AxialCoords {
  return { x: coords.x, y: coords.y };
}

export function axialToDoubled(coords: AxialCoords): DoubledCoords {
  return { x: coords.x - coords.y, y: 0 - coords.x - coords.y };
}

export function doubledToAxial(coords: DoubledCoords): AxialCoords {
  return {
    x: Math.trunc((coords.x - coords.y) / 2),
    y: Math.trunc((0 - coords.x - coords.y) / 2),
  };
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addAxial(a: AxialCoords, b: AxialCoords): AxialCoords {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractAxial(a: AxialCoords, b: AxialCoords): AxialCoords {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scaleAxial(a: AxialCoords, factor: number): AxialCoords {
  return { x: a.x * factor, y: a.y * factor };
}

export function addCube(a: CubeCoords, b: CubeCoords): CubeCoords {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtractCube(a: CubeCoords, b: CubeCoords): CubeCoords {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function addDoubled(a: DoubledCoords, b: DoubledCoords): DoubledCoords {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function subtractDoubled(a: DoubledCoords, b: DoubledCoords): DoubledCoords {
  return { x: a.x - b.x, y: a.y - b.y };
}

/** Component-wise division, truncating toward zero. */
export function divideDoubled(a: DoubledCoords, divisor: number): DoubledCoords {
  return { x: Math.trunc(a.x / divisor), y: Math.trunc(a.y / divisor) };
}

// ============================================================================
// Neighborhood & Lines
// ============================================================================

/**
 * The 6 axial direction offsets, in the order neighbors are reported.
 */
export const AXIAL_DIRECTIONS: readonly AxialCoords[] = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 1, y: -1 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
  { x: -1, y: 1 },
];

/**
 * All 6 neighbors of a coordinate, regardless of any board boundaries.
 */
export function axialNeighbors(coords: AxialCoords): AxialCoords[] {
  return AXIAL_DIRECTIONS.map((direction) => addAxial(coords, direction));
}

export function coordsEqual(a: AxialCoords, b: AxialCoords): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isAdjacent(a: AxialCoords, b: AxialCoords): boolean {
  return axialNeighbors(a).some((neighbor) => coordsEqual(neighbor, b));
}

/**
 * Two hexes form a straight line when they share a cube component.
 */
export function formsLine(a: AxialCoords, b: AxialCoords): boolean {
  const lhs = axialToCube(a);
  const rhs = axialToCube(b);
  return lhs.x === rhs.x || lhs.y === rhs.y || lhs.z === rhs.z;
}

/**
 * The coordinates strictly between `a` and `b`, walking from `a` towards `b`.
 * Only meaningful when the two form a line (see {@link formsLine}).
 */
export function lineBetween(a: AxialCoords, b: AxialCoords): AxialCoords[] {
  const start = axialToCube(a);
  const destination = axialToCube(b);
  const diff = subtractCube(destination, start);
  const step = cube(Math.sign(diff.x), Math.sign(diff.y), Math.sign(diff.z));
  const distance = Math.max(Math.abs(diff.x), Math.abs(diff.y), Math.abs(diff.z));

  const between: AxialCoords[] = [];
  let current = addCube(start, step);
  for (let i = 1; i < distance; i++) {
    between.push(cubeToAxial(current));
    current = addCube(current, step);
  }
  return between;
}

export function hexDistance(a: AxialCoords, b: AxialCoords): number {
  const diff = subtractCube(axialToCube(a), axialToCube(b));
  return Math.max(Math.abs(diff.x), Math.abs(diff.y), Math.abs(diff.z));
}

// ============================================================================
// Keys & Formatting
// ============================================================================

/**
 * Stable map key for a coordinate.
 */
export function coordsKey(coords: AxialCoords): string {
  return `${coords.x},${coords.y}`;
}

export function formatCoords(coords: AxialCoords): string {
  return `(${coords.x}, ${coords.y})`;
}
