import type { BackgroundState } from '../lib/config';
import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';
import {
  GLOBAL_GRID_ID,
  type BufferInfo,
  type ModeInfo,
  type OptionValue,
  type PopupMenuItem,
  type RedrawEvent,
  type TabInfo,
} from '../protocol/types';
import { GridRegistry } from './gridRegistry';
import { HighlightTable } from './highlightTable';

export interface CursorPosition {
  grid: number;
  row: number;
  col: number;
}

export interface PopupMenuState {
  items: readonly PopupMenuItem[];
  selected: number;
  /** Anchor cell, relative to `grid`. */
  row: number;
  col: number;
  grid: number;
}

export interface TablineState {
  current: number;
  tabs: readonly TabInfo[];
  currentBuffer: number | null;
  buffers: readonly BufferInfo[];
}

export interface ScreenStateOptions {
  logger?: Logger;
  background?: BackgroundState;
}

/**
 * Everything a redraw batch can touch. The batch controller keeps one copy that receives
 * events and one that was last published.
 */
export class ScreenState {
  readonly registry: GridRegistry;
  readonly highlights: HighlightTable;
  cursor: CursorPosition = { grid: GLOBAL_GRID_ID, row: 0, col: 0 };
  /** Counts `grid_cursor_goto` events, including ones that land on the same cell. */
  cursorMoves = 0;
  modes: readonly ModeInfo[] = [];
  cursorStyleEnabled = true;
  modeName = '';
  modeIndex = -1;
  busy = false;
  mouseEnabled = false;
  popupmenu: PopupMenuState | null = null;
  tabline: TablineState | null = null;
  readonly options = new Map<string, OptionValue>();
  private readonly log: Logger;

  constructor(options: ScreenStateOptions = {}, registry?: GridRegistry, highlights?: HighlightTable) {
    this.log = options.logger ?? silentLogger;
    this.registry = registry ?? new GridRegistry(this.log);
    this.highlights = highlights ?? new HighlightTable(options.background);
  }

  activeMode(): ModeInfo | null {
    return this.modes[this.modeIndex] ?? null;
  }

  /** Applies one event. Returns true when visible state changed; `flush` is not handled here. */
  apply(event: RedrawEvent): boolean {
    switch (event.type) {
      case 'grid_resize':
        return this.registry.resize(event.grid, event.width, event.height);
      case 'grid_line':
        return this.registry.writeLine(event.grid, event.row, event.colStart, event.cells);
      case 'grid_clear':
        return this.registry.clear(event.grid);
      case 'grid_destroy':
        return this.registry.destroy(event.grid);
      case 'grid_cursor_goto':
        this.cursor = { grid: event.grid, row: event.row, col: event.col };
        this.cursorMoves += 1;
        return true;
      case 'grid_scroll':
        if (event.cols !== 0) {
          this.log.debug({ grid: event.grid, cols: event.cols }, 'horizontal scroll is not part of the protocol');
        }
        return this.registry.scroll(event.grid, event.top, event.bottom, event.left, event.right, event.rows);
      case 'hl_attr_define':
        return this.highlights.define(event.id, event.attributes, event.info);
      case 'hl_group_set':
        this.highlights.setGroup(event.name, event.id);
        return true;
      case 'default_colors_set':
        this.highlights.setDefaultColors(event.foreground, event.background, event.special);
        return true;
      case 'mode_info_set':
        this.cursorStyleEnabled = event.cursorStyleEnabled;
        this.modes = event.modes;
        return true;
      case 'mode_change':
        this.modeName = event.mode;
        this.modeIndex = event.index;
        return true;
      case 'win_pos':
        return this.registry.setWindowPosition(event.grid, event.startRow, event.startCol);
      case 'win_float_pos':
        return this.registry.setPosition(event.grid, {
          anchor: event.anchor,
          anchorGrid: event.anchorGrid,
          anchorRow: event.anchorRow,
          anchorCol: event.anchorCol,
          zIndex: event.zIndex,
          focusable: event.focusable,
        });
      case 'win_hide':
        return this.registry.hide(event.grid);
      case 'win_close':
        return this.registry.close(event.grid);
      case 'msg_set_pos':
        return this.registry.setMessagePosition(event.grid, event.row, event.zIndex);
      case 'busy_start':
        this.busy = true;
        return true;
      case 'busy_stop':
        this.busy = false;
        return true;
      case 'mouse_on':
        this.mouseEnabled = true;
        return true;
      case 'mouse_off':
        this.mouseEnabled = false;
        return true;
      case 'option_set':
        this.options.set(event.name, event.value);
        if (event.name === 'background' && (event.value === 'dark' || event.value === 'light')) {
          this.highlights.setBackground(event.value);
        }
        return true;
      case 'popupmenu_show':
        this.popupmenu = {
          items: event.items,
          selected: event.selected,
          row: event.row,
          col: event.col,
          grid: event.grid,
        };
        return true;
      case 'popupmenu_select':
        if (!this.popupmenu) {
          this.log.debug({ selected: event.selected }, 'popupmenu_select without a shown menu');
          return false;
        }
        this.popupmenu = { ...this.popupmenu, selected: event.selected };
        return true;
      case 'popupmenu_hide':
        this.popupmenu = null;
        return true;
      case 'tabline_update':
        this.tabline = {
          current: event.current,
          tabs: event.tabs,
          currentBuffer: event.currentBuffer ?? null,
          buffers: event.buffers,
        };
        return true;
      case 'flush':
        return false;
      default: {
        const exhaustive: never = event;
        throw new Error(`unhandled redraw event: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  clone(): ScreenState {
    const copy = new ScreenState({ logger: this.log }, this.registry.clone(), this.highlights.clone());
    copy.cursor = { ...this.cursor };
    copy.cursorMoves = this.cursorMoves;
    copy.modes = this.modes;
    copy.cursorStyleEnabled = this.cursorStyleEnabled;
    copy.modeName = this.modeName;
    copy.modeIndex = this.modeIndex;
    copy.busy = this.busy;
    copy.mouseEnabled = this.mouseEnabled;
    copy.popupmenu = this.popupmenu;
    copy.tabline = this.tabline;
    for (const [name, value] of this.options) {
      copy.options.set(name, value);
    }
    return copy;
  }
}
