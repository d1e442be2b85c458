/** Grid id the editor uses for the global (outer) grid. */
export const GLOBAL_GRID_ID = 1;

export interface HighlightAttributes {
  foreground?: number;
  background?: number;
  special?: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  undercurl: boolean;
  underdouble: boolean;
  underdotted: boolean;
  underdashed: boolean;
  strikethrough: boolean;
  reverse: boolean;
  standout: boolean;
  altfont: boolean;
  blend: number;
}

export interface HighlightInfo {
  kind: string;
  hiName?: string;
}

export interface GridLineCell {
  text: string;
  /** Omitted ids reuse the id of the previous cell in the same line update. */
  hlId?: number;
  repeat?: number;
}

export type CursorShape = 'block' | 'horizontal' | 'vertical';

export interface ModeInfo {
  name: string;
  shortName: string;
  cursorShape: CursorShape;
  /** Percentage of the cell the cursor occupies for horizontal and vertical shapes. */
  cellPercentage: number;
  blinkWait: number;
  blinkOn: number;
  blinkOff: number;
  attrId: number;
  attrIdLm: number;
  mouseShape?: number;
}

export type FloatAnchor = 'NW' | 'NE' | 'SW' | 'SE';

export type OptionValue = string | number | boolean;

/** One completion candidate of an external popup menu. */
export interface PopupMenuItem {
  word: string;
  kind: string;
  menu: string;
  info: string;
}

export interface TabInfo {
  tab: number;
  name: string;
}

export interface BufferInfo {
  buffer: number;
  name: string;
}

export type RedrawEvent =
  | { type: 'grid_resize'; grid: number; width: number; height: number }
  | { type: 'grid_line'; grid: number; row: number; colStart: number; cells: GridLineCell[] }
  | { type: 'grid_clear'; grid: number }
  | { type: 'grid_destroy'; grid: number }
  | { type: 'grid_cursor_goto'; grid: number; row: number; col: number }
  | {
      type: 'grid_scroll';
      grid: number;
      top: number;
      bottom: number;
      left: number;
      right: number;
      rows: number;
      cols: number;
    }
  | { type: 'hl_attr_define'; id: number; attributes: HighlightAttributes; info: HighlightInfo[] }
  | { type: 'hl_group_set'; name: string; id: number }
  | { type: 'default_colors_set'; foreground: number; background: number; special: number }
  | { type: 'mode_info_set'; cursorStyleEnabled: boolean; modes: ModeInfo[] }
  | { type: 'mode_change'; mode: string; index: number }
  | {
      type: 'win_pos';
      grid: number;
      startRow: number;
      startCol: number;
      width: number;
      height: number;
    }
  | {
      type: 'win_float_pos';
      grid: number;
      anchor: FloatAnchor;
      anchorGrid: number;
      anchorRow: number;
      anchorCol: number;
      focusable: boolean;
      zIndex?: number;
    }
  | { type: 'win_hide'; grid: number }
  | { type: 'win_close'; grid: number }
  | {
      type: 'msg_set_pos';
      grid: number;
      row: number;
      scrolled: boolean;
      sepChar: string;
      zIndex?: number;
    }
  | { type: 'busy_start' }
  | { type: 'busy_stop' }
  | { type: 'mouse_on' }
  | { type: 'mouse_off' }
  | { type: 'option_set'; name: string; value: OptionValue }
  | {
      type: 'popupmenu_show';
      items: PopupMenuItem[];
      /** Index of the selected item, -1 for none. */
      selected: number;
      row: number;
      col: number;
      /** Grid the position is relative to; -1 while completing on the command line. */
      grid: number;
    }
  | { type: 'popupmenu_select'; selected: number }
  | { type: 'popupmenu_hide' }
  | { type: 'tabline_update'; current: number; tabs: TabInfo[]; currentBuffer?: number; buffers: BufferInfo[] }
  | { type: 'flush' };

export type RedrawEventType = RedrawEvent['type'];

export type MouseButton = 'left' | 'right' | 'middle' | 'wheel' | 'move';

export type MouseAction = 'press' | 'drag' | 'release' | 'up' | 'down' | 'left' | 'right';

export type ClientRequest =
  | { type: 'resize'; cols: number; rows: number }
  | { type: 'input'; keys: string }
  | {
      type: 'mouse';
      button: MouseButton;
      action: MouseAction;
      modifiers: string;
      grid: number;
      row: number;
      col: number;
    }
  | { type: 'focus'; focused: boolean };
