import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';
import { GLOBAL_GRID_ID, type FloatAnchor, type GridLineCell } from '../protocol/types';
import { Grid, type Row } from './grid';

export const WINDOW_Z_INDEX = 1;
export const DEFAULT_FLOAT_Z_INDEX = 50;
export const MESSAGE_Z_INDEX = 200;

export type Placement =
  | { kind: 'global' }
  | { kind: 'unplaced' }
  | { kind: 'window'; row: number; col: number }
  | {
      kind: 'float';
      anchor: FloatAnchor;
      anchorGrid: number;
      anchorRow: number;
      anchorCol: number;
      zIndex: number;
      focusable: boolean;
    }
  | { kind: 'message'; row: number; zIndex: number };

export interface FloatPosition {
  anchor: FloatAnchor;
  anchorGrid: number;
  anchorRow: number;
  anchorCol: number;
  zIndex?: number;
  focusable?: boolean;
}

export interface VisibleGrid {
  id: number;
  /** Top-left corner on the global surface. */
  row: number;
  col: number;
  zIndex: number;
  width: number;
  height: number;
  rows: readonly Row[];
}

export interface GridHit {
  grid: number;
  row: number;
  col: number;
}

interface GridEntry {
  grid: Grid;
  placement: Placement;
  hidden: boolean;
  order: number;
}

interface Origin {
  row: number;
  col: number;
  zIndex: number;
}

/**
 * Owns every grid and its placement on the global surface. Operations on unknown grids or
 * out-of-range rows are ignored and logged at debug level.
 */
export class GridRegistry {
  private readonly entries = new Map<number, GridEntry>();
  private readonly log: Logger;
  private nextOrder = 0;

  constructor(logger: Logger = silentLogger) {
    this.log = logger;
  }

  get(id: number): Grid | undefined {
    return this.entries.get(id)?.grid;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Creates the grid on first sight, otherwise resizes it keeping overlapping content. */
  resize(gridId: number, width: number, height: number): boolean {
    const entry = this.entries.get(gridId);
    if (entry) {
      return entry.grid.resize(width, height);
    }
    this.entries.set(gridId, {
      grid: new Grid(gridId, width, height),
      placement: gridId === GLOBAL_GRID_ID ? { kind: 'global' } : { kind: 'unplaced' },
      hidden: false,
      order: this.nextOrder++,
    });
    return true;
  }

  writeLine(gridId: number, row: number, colStart: number, cells: readonly GridLineCell[]): boolean {
    const grid = this.lookup(gridId, 'grid_line');
    if (!grid) {
      return false;
    }
    if (!grid.writeLine(row, colStart, cells)) {
      this.log.debug({ grid: gridId, row, colStart, height: grid.height, width: grid.width }, 'ignoring out-of-range line');
      return false;
    }
    return true;
  }

  clear(gridId: number): boolean {
    const grid = this.lookup(gridId, 'grid_clear');
    if (!grid) {
      return false;
    }
    grid.clear();
    return true;
  }

  scroll(gridId: number, top: number, bottom: number, left: number, right: number, rows: number): boolean {
    const grid = this.lookup(gridId, 'grid_scroll');
    if (!grid) {
      return false;
    }
    if (!grid.scroll(top, bottom, left, right, rows)) {
      this.log.debug({ grid: gridId, top, bottom, left, right, rows }, 'ignoring empty scroll region');
      return false;
    }
    return true;
  }

  /** Positions a floating grid relative to its anchor grid. */
  setPosition(gridId: number, position: FloatPosition): boolean {
    return this.place(gridId, 'win_float_pos', {
      kind: 'float',
      anchor: position.anchor,
      anchorGrid: position.anchorGrid,
      anchorRow: position.anchorRow,
      anchorCol: position.anchorCol,
      zIndex: position.zIndex ?? DEFAULT_FLOAT_Z_INDEX,
      focusable: position.focusable ?? true,
    });
  }

  setWindowPosition(gridId: number, row: number, col: number): boolean {
    return this.place(gridId, 'win_pos', { kind: 'window', row, col });
  }

  setMessagePosition(gridId: number, row: number, zIndex = MESSAGE_Z_INDEX): boolean {
    return this.place(gridId, 'msg_set_pos', { kind: 'message', row, zIndex });
  }

  hide(gridId: number): boolean {
    const entry = this.entries.get(gridId);
    if (!entry) {
      this.log.debug({ grid: gridId }, 'win_hide for unknown grid');
      return false;
    }
    entry.hidden = true;
    return true;
  }

  /** The window was closed; the grid stays allocated until destroyed but is no longer placed. */
  close(gridId: number): boolean {
    const entry = this.entries.get(gridId);
    if (!entry || gridId === GLOBAL_GRID_ID) {
      this.log.debug({ grid: gridId }, 'win_close for unknown grid');
      return false;
    }
    entry.placement = { kind: 'unplaced' };
    entry.hidden = true;
    return true;
  }

  destroy(gridId: number): boolean {
    if (gridId === GLOBAL_GRID_ID) {
      this.log.debug({ grid: gridId }, 'refusing to destroy the global grid');
      return false;
    }
    if (!this.entries.delete(gridId)) {
      this.log.debug({ grid: gridId }, 'grid_destroy for unknown grid');
      return false;
    }
    return true;
  }

  /** Surface position of a grid, or undefined when it is not currently shown. */
  origin(gridId: number): { row: number; col: number } | undefined {
    const origin = this.resolveOrigin(gridId, new Set());
    return origin ? { row: origin.row, col: origin.col } : undefined;
  }

  /** Shown grids, back to front. Each call starts a fresh iteration. */
  *visibleGrids(): Generator<VisibleGrid> {
    const shown: Array<{ entry: GridEntry; origin: Origin }> = [];
    for (const [id, entry] of this.entries) {
      const origin = this.resolveOrigin(id, new Set());
      if (origin) {
        shown.push({ entry, origin });
      }
    }
    shown.sort((a, b) => a.origin.zIndex - b.origin.zIndex || a.entry.order - b.entry.order);
    for (const { entry, origin } of shown) {
      yield {
        id: entry.grid.id,
        row: origin.row,
        col: origin.col,
        zIndex: origin.zIndex,
        width: entry.grid.width,
        height: entry.grid.height,
        rows: entry.grid.rows,
      };
    }
  }

  /** Topmost shown grid covering a surface cell, with grid-relative coordinates. */
  gridAt(row: number, col: number): GridHit | null {
    let hit: GridHit | null = null;
    for (const visible of this.visibleGrids()) {
      const inside =
        row >= visible.row &&
        row < visible.row + visible.height &&
        col >= visible.col &&
        col < visible.col + visible.width;
      if (inside) {
        hit = { grid: visible.id, row: row - visible.row, col: col - visible.col };
      }
    }
    return hit;
  }

  clone(): GridRegistry {
    const copy = new GridRegistry(this.log);
    for (const [id, entry] of this.entries) {
      copy.entries.set(id, { ...entry, grid: entry.grid.clone() });
    }
    copy.nextOrder = this.nextOrder;
    return copy;
  }

  private lookup(gridId: number, event: string): Grid | undefined {
    const grid = this.entries.get(gridId)?.grid;
    if (!grid) {
      this.log.debug({ grid: gridId, event }, 'ignoring event for unknown grid');
    }
    return grid;
  }

  private place(gridId: number, event: string, placement: Placement): boolean {
    const entry = this.entries.get(gridId);
    if (!entry) {
      this.log.debug({ grid: gridId, event }, 'ignoring placement for unknown grid');
      return false;
    }
    entry.placement = placement;
    entry.hidden = false;
    return true;
  }

  private resolveOrigin(gridId: number, visiting: Set<number>): Origin | undefined {
    const entry = this.entries.get(gridId);
    if (!entry || entry.hidden || visiting.has(gridId)) {
      return undefined;
    }
    visiting.add(gridId);
    const { placement, grid } = entry;
    switch (placement.kind) {
      case 'global':
        return { row: 0, col: 0, zIndex: 0 };
      case 'unplaced':
        return undefined;
      case 'window':
        return { row: placement.row, col: placement.col, zIndex: WINDOW_Z_INDEX };
      case 'message':
        return { row: placement.row, col: 0, zIndex: placement.zIndex };
      case 'float': {
        const anchor = this.resolveOrigin(placement.anchorGrid, visiting);
        if (!anchor) {
          return undefined;
        }
        let row = anchor.row + Math.floor(placement.anchorRow);
        let col = anchor.col + Math.floor(placement.anchorCol);
        if (placement.anchor === 'SW' || placement.anchor === 'SE') {
          row -= grid.height;
        }
        if (placement.anchor === 'NE' || placement.anchor === 'SE') {
          col -= grid.width;
        }
        return { row, col, zIndex: placement.zIndex };
      }
      default: {
        const exhaustive: never = placement;
        return exhaustive;
      }
    }
  }
}
