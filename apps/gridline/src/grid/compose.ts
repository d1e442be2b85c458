import type { GridSnapshot } from './gridStore';

/**
 * Flattens the shown grids of a snapshot into lines of text, painting back to front.
 * Cells that fall outside the global grid are clipped.
 */
export function composeText(snapshot: GridSnapshot): string[] {
  const surface = snapshot.surface;
  if (!surface) {
    return [];
  }
  const lines: string[][] = [];
  for (let row = 0; row < surface.rows; row += 1) {
    lines.push(new Array<string>(surface.cols).fill(' '));
  }
  for (const grid of snapshot.grids) {
    grid.rows.forEach((cells, rowIndex) => {
      const target = lines[grid.row + rowIndex];
      if (!target) {
        return;
      }
      cells.forEach((cell, colIndex) => {
        const col = grid.col + colIndex;
        if (col >= 0 && col < surface.cols) {
          target[col] = cell.text;
        }
      });
    });
  }
  return lines.map((cells) => cells.join(''));
}
