import type { GridLineCell } from '../protocol/types';

export interface Cell {
  /** One grapheme; empty for the right half of a double-width character. */
  readonly text: string;
  readonly hlId: number;
}

export type Row = readonly Cell[];

export const BLANK_CELL: Cell = Object.freeze({ text: ' ', hlId: 0 });

function blankRow(width: number): Row {
  return Object.freeze(new Array<Cell>(width).fill(BLANK_CELL));
}

/**
 * A rectangle of cells in its own coordinate space. Rows are immutable arrays that are
 * replaced on every write, so clones share untouched rows.
 */
export class Grid {
  readonly id: number;
  private widthValue: number;
  private rowsValue: Row[];

  constructor(id: number, width: number, height: number) {
    this.id = id;
    this.widthValue = Math.max(0, width);
    this.rowsValue = [];
    for (let row = 0; row < Math.max(0, height); row += 1) {
      this.rowsValue.push(blankRow(this.widthValue));
    }
  }

  get width(): number {
    return this.widthValue;
  }

  get height(): number {
    return this.rowsValue.length;
  }

  get rows(): readonly Row[] {
    return this.rowsValue;
  }

  row(index: number): Row | undefined {
    return this.rowsValue[index];
  }

  rowText(index: number): string | undefined {
    const row = this.rowsValue[index];
    return row ? row.map((cell) => cell.text).join('') : undefined;
  }

  /** Changes dimensions in place, keeping the overlapping content. */
  resize(width: number, height: number): boolean {
    const nextWidth = Math.max(0, width);
    const nextHeight = Math.max(0, height);
    if (nextWidth === this.widthValue && nextHeight === this.rowsValue.length) {
      return false;
    }
    const next: Row[] = [];
    for (let index = 0; index < nextHeight; index += 1) {
      const existing = this.rowsValue[index];
      if (!existing) {
        next.push(blankRow(nextWidth));
      } else if (existing.length === nextWidth) {
        next.push(existing);
      } else if (existing.length > nextWidth) {
        next.push(Object.freeze(existing.slice(0, nextWidth)));
      } else {
        next.push(Object.freeze([...existing, ...blankRow(nextWidth - existing.length)]));
      }
    }
    this.widthValue = nextWidth;
    this.rowsValue = next;
    return true;
  }

  /**
   * Writes a run of cells starting at `colStart`. A cell without `hlId` reuses the previous
   * cell's id; `repeat` expands a cell. Cells past the right edge are dropped.
   * Returns false when the row or start column is out of range.
   */
  writeLine(row: number, colStart: number, cells: readonly GridLineCell[]): boolean {
    const existing = this.rowsValue[row];
    if (!existing || colStart < 0 || colStart >= this.widthValue) {
      return false;
    }
    const next = existing.slice();
    let col = colStart;
    let hlId = 0;
    for (const cell of cells) {
      if (cell.hlId !== undefined) {
        hlId = cell.hlId;
      }
      const repeat = cell.repeat ?? 1;
      const written: Cell = hlId === 0 && cell.text === ' ' ? BLANK_CELL : { text: cell.text, hlId };
      for (let count = 0; count < repeat && col < this.widthValue; count += 1) {
        next[col] = written;
        col += 1;
      }
      if (col >= this.widthValue) {
        break;
      }
    }
    this.rowsValue[row] = Object.freeze(next);
    return true;
  }

  clear(): void {
    this.rowsValue = this.rowsValue.map(() => blankRow(this.widthValue));
  }

  /**
   * Moves the region `[top, bottom) x [left, right)` by `rows`: positive moves content up.
   * Vacated rows inside the region become blank. Bounds are clamped to the grid.
   */
  scroll(top: number, bottom: number, left: number, right: number, rows: number): boolean {
    const regionTop = Math.max(0, top);
    const regionBottom = Math.min(this.rowsValue.length, bottom);
    const regionLeft = Math.max(0, left);
    const regionRight = Math.min(this.widthValue, right);
    if (rows === 0 || regionTop >= regionBottom || regionLeft >= regionRight) {
      return false;
    }
    const source = this.rowsValue;
    const next = source.slice();
    for (let target = regionTop; target < regionBottom; target += 1) {
      const from = target + rows;
      const moved = from >= regionTop && from < regionBottom ? source[from] : null;
      next[target] = spliceColumns(source[target], regionLeft, regionRight, moved);
    }
    this.rowsValue = next;
    return true;
  }

  clone(): Grid {
    const copy = new Grid(this.id, 0, 0);
    copy.widthValue = this.widthValue;
    copy.rowsValue = this.rowsValue.slice();
    return copy;
  }
}

function spliceColumns(row: Row, left: number, right: number, source: Row | null): Row {
  if (left === 0 && right === row.length) {
    return source ?? blankRow(row.length);
  }
  const next = row.slice();
  for (let col = left; col < right; col += 1) {
    next[col] = source ? source[col] : BLANK_CELL;
  }
  return Object.freeze(next);
}
