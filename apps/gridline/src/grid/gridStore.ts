import type { BackgroundState } from '../lib/config';
import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';
import {
  GLOBAL_GRID_ID,
  type CursorShape,
  type HighlightAttributes,
  type ModeInfo,
  type OptionValue,
  type RedrawEvent,
} from '../protocol/types';
import { CursorStateMachine, type CursorPhase } from './cursorState';
import type { GridHit, VisibleGrid } from './gridRegistry';
import type { CursorColors, ResolvedColors } from './highlightTable';
import type { GridSize } from './resizeNegotiator';
import { ScreenState, type PopupMenuState, type TablineState } from './screenState';

export type { CursorPhase } from './cursorState';
export type { Cell, Row } from './grid';
export type { GridHit, VisibleGrid } from './gridRegistry';
export type { CursorColors, ResolvedColors } from './highlightTable';
export type { PopupMenuState, TablineState } from './screenState';

export type ConnectionState = 'connecting' | 'connected' | 'disconnected' | 'failed';

export interface CursorSnapshot {
  grid: number;
  /** Grid-relative position, clamped into the grid. */
  row: number;
  col: number;
  surfaceRow: number;
  surfaceCol: number;
  shape: CursorShape;
  cellPercentage: number;
  phase: CursorPhase;
  visible: boolean;
  /** Opacity at the time of the last tick or publish, 0 to 1. */
  alpha: number;
  focused: boolean;
  colors: CursorColors;
}

export interface PopupMenuSnapshot extends PopupMenuState {
  /** Anchor cell on the surface; equals `row`/`col` when the grid is not shown. */
  surfaceRow: number;
  surfaceCol: number;
}

export interface GridSnapshot {
  /** Shown grids, back to front. */
  grids: readonly VisibleGrid[];
  /** Size of the global grid, or null before the first `grid_resize`. */
  surface: GridSize | null;
  cursor: CursorSnapshot | null;
  defaultColors: ResolvedColors;
  mode: ModeInfo | null;
  modeName: string;
  busy: boolean;
  mouseEnabled: boolean;
  options: ReadonlyMap<string, OptionValue>;
  popupmenu: PopupMenuSnapshot | null;
  tabline: TablineState | null;
  connection: ConnectionState;
  error: Error | null;
  /** Number of batches published so far. */
  batches: number;
  resolveHighlight: (id: number) => Readonly<HighlightAttributes>;
  colorsFor: (id: number) => ResolvedColors;
  gridAt: (row: number, col: number) => GridHit | null;
}

export interface GridStoreOptions {
  logger?: Logger;
  background?: BackgroundState;
  cursorBlinkLimit?: number | null;
  /** Cursor fade length in ms; 0 blinks without fading. */
  cursorFade?: number;
  now?: () => number;
}

/**
 * Batch controller over the screen state. Events accumulate in a working copy; `flush`
 * publishes that copy atomically and readers only ever see published state. The store
 * exposes a subscribe/notify API so React can hook in through `useSyncExternalStore`.
 */
export class GridStore {
  private working: ScreenState;
  private committed: ScreenState;
  private accumulating = false;
  private readonly cursor: CursorStateMachine;
  private readonly now: () => number;
  private cursorClock = 0;
  private readonly log: Logger;
  private connection: ConnectionState = 'connecting';
  private connectionError: Error | null = null;
  private batches = 0;
  private readonly listeners = new Set<() => void>();
  private snapshotCache: GridSnapshot | null = null;

  constructor(options: GridStoreOptions = {}) {
    this.log = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.committed = new ScreenState({ logger: this.log, background: options.background });
    this.working = this.committed.clone();
    this.cursor = new CursorStateMachine({
      blinkLimit: options.cursorBlinkLimit,
      fadeDuration: options.cursorFade,
    });
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getSnapshot(): GridSnapshot {
    if (this.snapshotCache) {
      return this.snapshotCache;
    }
    const snapshot = this.buildSnapshot(this.committed);
    this.snapshotCache = snapshot;
    return snapshot;
  }

  /** True while events have been applied that are not yet published. */
  get pending(): boolean {
    return this.accumulating;
  }

  apply(event: RedrawEvent): void {
    if (event.type === 'flush') {
      this.flush();
      return;
    }
    this.accumulating = true;
    this.working.apply(event);
  }

  applyBatch(events: readonly RedrawEvent[]): void {
    for (const event of events) {
      this.apply(event);
    }
  }

  /** Publishes the working state. A flush with nothing pending is a no-op. */
  flush(): boolean {
    if (!this.accumulating) {
      return false;
    }
    const previous = this.committed;
    this.committed = this.working;
    this.working = this.committed.clone();
    this.accumulating = false;
    this.batches += 1;
    this.syncCursor(previous, this.committed);
    this.invalidate();
    this.notify();
    return true;
  }

  /** Drops unpublished events, returning to the last published state. */
  discardPending(): boolean {
    if (!this.accumulating) {
      return false;
    }
    this.working = this.committed.clone();
    this.accumulating = false;
    this.log.debug({ batches: this.batches }, 'discarded unpublished redraw events');
    return true;
  }

  setConnectionState(state: ConnectionState, error: Error | null = null): void {
    if (this.connection === state && this.connectionError === error) {
      return;
    }
    this.connection = state;
    this.connectionError = error;
    this.invalidate();
    this.notify();
  }

  tick(now = this.now()): void {
    const wasFading = this.cursor.transitioning;
    this.cursorClock = now;
    if (this.cursor.tick(now) || wasFading) {
      this.invalidate();
      this.notify();
    }
  }

  notifyTyping(now = this.now()): void {
    this.cursorClock = now;
    if (this.cursor.notifyTyping(now)) {
      this.invalidate();
      this.notify();
    }
  }

  setFocus(focused: boolean, now = this.now()): void {
    this.cursorClock = now;
    if (this.cursor.setFocus(focused, now)) {
      this.invalidate();
      this.notify();
    }
  }

  setCursorBlinkLimit(limit: number | null, now = this.now()): void {
    this.cursorClock = now;
    if (this.cursor.setBlinkLimit(limit, now)) {
      this.invalidate();
      this.notify();
    }
  }

  /**
   * When the cursor next changes phase, or null while it is steady. While a fade is running
   * the renderer ticks once per frame to animate the alpha.
   */
  nextCursorDeadline(): number | null {
    return this.cursor.nextDeadline();
  }

  /** Topmost published grid under a surface cell. */
  hitTest(row: number, col: number): GridHit | null {
    return this.committed.registry.gridAt(row, col);
  }

  private syncCursor(previous: ScreenState, next: ScreenState): void {
    const now = this.now();
    this.cursorClock = now;
    if (previous.busy !== next.busy) {
      this.cursor.setBusy(next.busy, now);
    }
    if (previous.modes !== next.modes || previous.modeIndex !== next.modeIndex) {
      this.cursor.setMode(next.activeMode(), now);
      return;
    }
    if (previous.cursorMoves !== next.cursorMoves) {
      this.cursor.moved(now);
    }
  }

  private buildSnapshot(state: ScreenState): GridSnapshot {
    const global = state.registry.get(GLOBAL_GRID_ID);
    return {
      grids: [...state.registry.visibleGrids()],
      surface: global ? { cols: global.width, rows: global.height } : null,
      cursor: this.cursorSnapshot(state),
      defaultColors: state.highlights.defaultColors(),
      mode: state.activeMode(),
      modeName: state.modeName,
      busy: state.busy,
      mouseEnabled: state.mouseEnabled,
      options: state.options,
      popupmenu: this.popupmenuSnapshot(state),
      tabline: state.tabline,
      connection: this.connection,
      error: this.connectionError,
      batches: this.batches,
      resolveHighlight: (id) => state.highlights.resolve(id),
      colorsFor: (id) => state.highlights.effectiveColors(id),
      gridAt: (row, col) => state.registry.gridAt(row, col),
    };
  }

  private cursorSnapshot(state: ScreenState): CursorSnapshot | null {
    let gridId = state.cursor.grid;
    let grid = state.registry.get(gridId);
    if (!grid) {
      gridId = GLOBAL_GRID_ID;
      grid = state.registry.get(gridId);
    }
    if (!grid || grid.width === 0 || grid.height === 0) {
      return null;
    }
    const row = clamp(state.cursor.row, 0, grid.height - 1);
    const col = clamp(state.cursor.col, 0, grid.width - 1);
    const origin = state.registry.origin(gridId);
    const mode = state.cursorStyleEnabled ? state.activeMode() : null;
    return {
      grid: gridId,
      row,
      col,
      surfaceRow: (origin?.row ?? 0) + row,
      surfaceCol: (origin?.col ?? 0) + col,
      shape: mode?.cursorShape ?? 'block',
      cellPercentage: mode?.cellPercentage ?? 100,
      phase: this.cursor.phase,
      visible: this.cursor.visible && origin !== undefined,
      alpha: origin === undefined ? 0 : this.cursor.alphaAt(this.cursorClock),
      focused: this.cursor.hasFocus,
      colors: state.highlights.cursorColors(mode?.attrId ?? 0),
    };
  }

  private popupmenuSnapshot(state: ScreenState): PopupMenuSnapshot | null {
    const menu = state.popupmenu;
    if (!menu) {
      return null;
    }
    const origin = state.registry.origin(menu.grid);
    return {
      ...menu,
      surfaceRow: (origin?.row ?? 0) + menu.row,
      surfaceCol: (origin?.col ?? 0) + menu.col,
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) {
      return;
    }
    for (const listener of this.listeners) {
      listener();
    }
  }

  private invalidate(): void {
    this.snapshotCache = null;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
