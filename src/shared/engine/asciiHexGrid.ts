import type { DoubledCoords, Field, PositionedField } from '../types/game';
import { engineTraceLog } from '../utils/envFlags';
import { Board } from './Board';
import { emptyField } from './field';
import { divideDoubled, doubled, doubledToAxial, subtractDoubled } from './hexCoords';
import { parseFieldNotation } from './notation';

/**
 * Parses a board from a plain-text hex grid such as:
 *
 * ```
 *     /\  /\
 *    /  \/  \
 *    |BB |   |
 *   /\  /\  /\
 *  /  \/  \/  \
 *  |   |RG |   |
 *  \  /\  /\  /
 *   \/  \/  \/
 *    |   |   |
 *    \  /\  /
 *     \/  \/
 * ```
 *
 * Rows are indented alternately, starting indented as above, and the grid
 * must have a single center field. Each hex may hold a field in
 * two-character notation (see `notation.ts`); empty or unparseable
 * contents become empty fields. Stacks and obstructed fields cannot be
 * expressed.
 *
 * The resulting board uses axial coordinates centered on the middle hex,
 * x pointing right and y diagonally to the top-left. Unlike
 * {@link Board.fillingRadius}, only the hexes drawn in the grid exist.
 */
export function parseAsciiHexGrid(grid: string): Board {
  const lines = grid.split(/\r?\n/).map((line) => line.trim());
  const firstContent = lines.findIndex((line) => line.length > 0);
  const rows = firstContent < 0 ? [] : lines.slice(firstContent + 2).filter((_, i) => i % 3 === 0);

  const positioned: Array<{ doubled: DoubledCoords; field: Field }> = [];
  rows.forEach((line, y) => {
    line
      .split('|')
      .filter((fragment) => fragment.length > 0)
      .forEach((fragment, x) => {
        positioned.push({
          doubled: doubled(2 * x + ((y + 1) % 2), y),
          field: parseFragment(fragment),
        });
      });
  });

  const center = divideDoubled(
    doubled(
      positioned.reduce((max, p) => Math.max(max, p.doubled.x), 0),
      positioned.reduce((max, p) => Math.max(max, p.doubled.y), 0)
    ),
    2
  );
  engineTraceLog('asciiHexGrid', 'Determined center', center);

  const fields: PositionedField[] = positioned.map((p) => ({
    coords: doubledToAxial(subtractDoubled(p.doubled, center)),
    field: p.field,
  }));
  return new Board(fields);
}

function parseFragment(fragment: string): Field {
  try {
    return parseFieldNotation(fragment.trim());
  } catch (error) {
    engineTraceLog('asciiHexGrid', `Could not parse field '${fragment}'`, error);
    return emptyField();
  }
}
