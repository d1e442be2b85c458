import { ProtocolError } from '../lib/errors';
import type {
  BufferInfo,
  CursorShape,
  FloatAnchor,
  GridLineCell,
  HighlightAttributes,
  HighlightInfo,
  ModeInfo,
  OptionValue,
  PopupMenuItem,
  RedrawEvent,
  TabInfo,
} from './types';
import { GLOBAL_GRID_ID } from './types';

export interface DecodeOptions {
  /** Called once per unknown event name; the event itself is skipped. */
  onUnknownEvent?: (name: string) => void;
}

/**
 * Decodes the argument list of one `redraw` notification. Each entry is
 * `[eventName, ...parameterTuples]`; every tuple becomes one event, in order.
 * Throws {@link ProtocolError} when a known event carries parameters of the wrong shape.
 */
export function decodeRedrawBatch(args: unknown[], options: DecodeOptions = {}): RedrawEvent[] {
  const events: RedrawEvent[] = [];
  for (const entry of args) {
    const [name, ...tuples] = expectArray(entry, 'redraw', 'entry');
    if (typeof name !== 'string') {
      throw new ProtocolError('redraw', `event name must be a string, got ${describe(name)}`);
    }
    if (!KNOWN_EVENTS.has(name)) {
      options.onUnknownEvent?.(name);
      continue;
    }
    for (const tuple of tuples) {
      events.push(decodeEvent(name, expectArray(tuple, name, 'parameters')));
    }
  }
  return events;
}

const KNOWN_EVENTS = new Set<string>([
  'grid_resize',
  'grid_line',
  'grid_clear',
  'grid_destroy',
  'grid_cursor_goto',
  'grid_scroll',
  'hl_attr_define',
  'hl_group_set',
  'default_colors_set',
  'mode_info_set',
  'mode_change',
  'win_pos',
  'win_float_pos',
  'win_hide',
  'win_close',
  'msg_set_pos',
  'busy_start',
  'busy_stop',
  'mouse_on',
  'mouse_off',
  'option_set',
  'popupmenu_show',
  'popupmenu_select',
  'popupmenu_hide',
  'tabline_update',
  'flush',
]);

function decodeEvent(name: string, params: unknown[]): RedrawEvent {
  switch (name) {
    case 'grid_resize':
      return {
        type: 'grid_resize',
        grid: expectInteger(params[0], name, 'grid'),
        width: expectInteger(params[1], name, 'width'),
        height: expectInteger(params[2], name, 'height'),
      };
    case 'grid_line':
      return {
        type: 'grid_line',
        grid: expectInteger(params[0], name, 'grid'),
        row: expectInteger(params[1], name, 'row'),
        colStart: expectInteger(params[2], name, 'col_start'),
        cells: expectArray(params[3], name, 'cells').map(decodeCell),
      };
    case 'grid_clear':
      return { type: 'grid_clear', grid: expectInteger(params[0], name, 'grid') };
    case 'grid_destroy':
      return { type: 'grid_destroy', grid: expectInteger(params[0], name, 'grid') };
    case 'grid_cursor_goto':
      return {
        type: 'grid_cursor_goto',
        grid: expectInteger(params[0], name, 'grid'),
        row: expectInteger(params[1], name, 'row'),
        col: expectInteger(params[2], name, 'col'),
      };
    case 'grid_scroll':
      return {
        type: 'grid_scroll',
        grid: expectInteger(params[0], name, 'grid'),
        top: expectInteger(params[1], name, 'top'),
        bottom: expectInteger(params[2], name, 'bot'),
        left: expectInteger(params[3], name, 'left'),
        right: expectInteger(params[4], name, 'right'),
        rows: expectInteger(params[5], name, 'rows'),
        cols: expectInteger(params[6], name, 'cols'),
      };
    case 'hl_attr_define':
      return {
        type: 'hl_attr_define',
        id: expectInteger(params[0], name, 'id'),
        attributes: decodeAttributes(expectRecord(params[1], name, 'rgb_attr')),
        info: params[3] === undefined ? [] : expectArray(params[3], name, 'info').map(decodeHighlightInfo),
      };
    case 'hl_group_set':
      return {
        type: 'hl_group_set',
        name: expectString(params[0], name, 'name'),
        id: expectInteger(params[1], name, 'hl_id'),
      };
    case 'default_colors_set':
      return {
        type: 'default_colors_set',
        foreground: expectInteger(params[0], name, 'rgb_fg'),
        background: expectInteger(params[1], name, 'rgb_bg'),
        special: expectInteger(params[2], name, 'rgb_sp'),
      };
    case 'mode_info_set':
      return {
        type: 'mode_info_set',
        cursorStyleEnabled: expectBoolean(params[0], name, 'cursor_style_enabled'),
        modes: expectArray(params[1], name, 'mode_info').map(decodeModeInfo),
      };
    case 'mode_change':
      return {
        type: 'mode_change',
        mode: expectString(params[0], name, 'mode'),
        index: expectInteger(params[1], name, 'mode_idx'),
      };
    case 'win_pos':
      return {
        type: 'win_pos',
        grid: expectInteger(params[0], name, 'grid'),
        startRow: expectInteger(params[2], name, 'start_row'),
        startCol: expectInteger(params[3], name, 'start_col'),
        width: expectInteger(params[4], name, 'width'),
        height: expectInteger(params[5], name, 'height'),
      };
    case 'win_float_pos':
      return {
        type: 'win_float_pos',
        grid: expectInteger(params[0], name, 'grid'),
        anchor: expectAnchor(params[2]),
        anchorGrid: expectInteger(params[3], name, 'anchor_grid'),
        anchorRow: expectNumber(params[4], name, 'anchor_row'),
        anchorCol: expectNumber(params[5], name, 'anchor_col'),
        focusable: expectBoolean(params[6], name, 'focusable'),
        zIndex: optionalInteger(params[7], name, 'zindex'),
      };
    case 'win_hide':
      return { type: 'win_hide', grid: expectInteger(params[0], name, 'grid') };
    case 'win_close':
      return { type: 'win_close', grid: expectInteger(params[0], name, 'grid') };
    case 'msg_set_pos':
      return {
        type: 'msg_set_pos',
        grid: expectInteger(params[0], name, 'grid'),
        row: expectInteger(params[1], name, 'row'),
        scrolled: expectBoolean(params[2], name, 'scrolled'),
        sepChar: expectString(params[3], name, 'sep_char'),
        zIndex: optionalInteger(params[4], name, 'zindex'),
      };
    case 'busy_start':
      return { type: 'busy_start' };
    case 'busy_stop':
      return { type: 'busy_stop' };
    case 'mouse_on':
      return { type: 'mouse_on' };
    case 'mouse_off':
      return { type: 'mouse_off' };
    case 'flush':
      return { type: 'flush' };
    case 'option_set':
      return {
        type: 'option_set',
        name: expectString(params[0], name, 'name'),
        value: expectOptionValue(params[1]),
      };
    case 'popupmenu_show':
      return {
        type: 'popupmenu_show',
        items: expectArray(params[0], name, 'items').map(decodePopupMenuItem),
        selected: expectInteger(params[1], name, 'selected'),
        row: expectInteger(params[2], name, 'row'),
        col: expectInteger(params[3], name, 'col'),
        grid: optionalInteger(params[4], name, 'grid') ?? GLOBAL_GRID_ID,
      };
    case 'popupmenu_select':
      return { type: 'popupmenu_select', selected: expectInteger(params[0], name, 'selected') };
    case 'popupmenu_hide':
      return { type: 'popupmenu_hide' };
    case 'tabline_update': {
      // curbuf and buffers were added to the event later and may be missing.
      const currentBuffer = params[2] === undefined ? undefined : expectHandle(params[2], name, 'curbuf');
      return {
        type: 'tabline_update',
        current: expectHandle(params[0], name, 'curtab'),
        tabs: expectArray(params[1], name, 'tabs').map(decodeTab),
        buffers: params[3] === undefined ? [] : expectArray(params[3], name, 'buffers').map(decodeBuffer),
        ...(currentBuffer === undefined ? {} : { currentBuffer }),
      };
    }
    default:
      throw new ProtocolError(name, 'no decoder registered');
  }
}

function decodeCell(raw: unknown): GridLineCell {
  const [text, hlId, repeat] = expectArray(raw, 'grid_line', 'cell');
  const cell: GridLineCell = { text: expectString(text, 'grid_line', 'cell text') };
  const id = optionalInteger(hlId, 'grid_line', 'hl_id');
  if (id !== undefined) {
    cell.hlId = id;
  }
  const count = optionalInteger(repeat, 'grid_line', 'repeat');
  if (count !== undefined) {
    cell.repeat = count;
  }
  return cell;
}

function decodePopupMenuItem(raw: unknown): PopupMenuItem {
  const [word, kind, menu, info] = expectArray(raw, 'popupmenu_show', 'item');
  return {
    word: expectString(word, 'popupmenu_show', 'word'),
    kind: expectString(kind ?? '', 'popupmenu_show', 'kind'),
    menu: expectString(menu ?? '', 'popupmenu_show', 'menu'),
    info: expectString(info ?? '', 'popupmenu_show', 'info'),
  };
}

function decodeTab(raw: unknown): TabInfo {
  const record = expectRecord(raw, 'tabline_update', 'tab');
  return {
    tab: expectHandle(record.tab, 'tabline_update', 'tab'),
    name: expectString(record.name, 'tabline_update', 'name'),
  };
}

function decodeBuffer(raw: unknown): BufferInfo {
  const record = expectRecord(raw, 'tabline_update', 'buffer');
  return {
    buffer: expectHandle(record.buffer, 'tabline_update', 'buffer'),
    name: expectString(record.name, 'tabline_update', 'name'),
  };
}

function decodeAttributes(raw: Record<string, unknown>): HighlightAttributes {
  const attributes: HighlightAttributes = {
    bold: raw.bold === true,
    italic: raw.italic === true,
    underline: raw.underline === true,
    undercurl: raw.undercurl === true,
    underdouble: raw.underdouble === true,
    underdotted: raw.underdotted === true,
    underdashed: raw.underdashed === true,
    strikethrough: raw.strikethrough === true,
    reverse: raw.reverse === true,
    standout: raw.standout === true,
    altfont: raw.altfont === true,
    blend: optionalInteger(raw.blend, 'hl_attr_define', 'blend') ?? 0,
  };
  const foreground = optionalInteger(raw.foreground, 'hl_attr_define', 'foreground');
  const background = optionalInteger(raw.background, 'hl_attr_define', 'background');
  const special = optionalInteger(raw.special, 'hl_attr_define', 'special');
  if (foreground !== undefined) {
    attributes.foreground = foreground;
  }
  if (background !== undefined) {
    attributes.background = background;
  }
  if (special !== undefined) {
    attributes.special = special;
  }
  return attributes;
}

function decodeHighlightInfo(raw: unknown): HighlightInfo {
  const record = expectRecord(raw, 'hl_attr_define', 'info');
  const info: HighlightInfo = { kind: typeof record.kind === 'string' ? record.kind : 'unknown' };
  if (typeof record.hi_name === 'string') {
    info.hiName = record.hi_name;
  }
  return info;
}

function decodeModeInfo(raw: unknown): ModeInfo {
  const record = expectRecord(raw, 'mode_info_set', 'mode_info');
  const event = 'mode_info_set';
  const mode: ModeInfo = {
    name: typeof record.name === 'string' ? record.name : '',
    shortName: typeof record.short_name === 'string' ? record.short_name : '',
    cursorShape: toCursorShape(record.cursor_shape),
    cellPercentage: optionalInteger(record.cell_percentage, event, 'cell_percentage') ?? 100,
    blinkWait: optionalInteger(record.blinkwait, event, 'blinkwait') ?? 0,
    blinkOn: optionalInteger(record.blinkon, event, 'blinkon') ?? 0,
    blinkOff: optionalInteger(record.blinkoff, event, 'blinkoff') ?? 0,
    attrId: optionalInteger(record.attr_id, event, 'attr_id') ?? 0,
    attrIdLm: optionalInteger(record.attr_id_lm, event, 'attr_id_lm') ?? 0,
  };
  const mouseShape = optionalInteger(record.mouse_shape, event, 'mouse_shape');
  if (mouseShape !== undefined) {
    mode.mouseShape = mouseShape;
  }
  return mode;
}

function toCursorShape(raw: unknown): CursorShape {
  if (raw === 'horizontal' || raw === 'vertical') {
    return raw;
  }
  return 'block';
}

function expectAnchor(value: unknown): FloatAnchor {
  if (value === 'NW' || value === 'NE' || value === 'SW' || value === 'SE') {
    return value;
  }
  throw new ProtocolError('win_float_pos', `anchor must be NW, NE, SW or SE, got ${describe(value)}`);
}

function expectOptionValue(value: unknown): OptionValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  throw new ProtocolError('option_set', `value must be a string, number or boolean, got ${describe(value)}`);
}

function expectArray(value: unknown, event: string, label: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ProtocolError(event, `${label} must be an array, got ${describe(value)}`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, event: string, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ProtocolError(event, `${label} must be a map, got ${describe(value)}`);
  }
  return value;
}

function expectInteger(value: unknown, event: string, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ProtocolError(event, `${label} must be an integer, got ${describe(value)}`);
  }
  return value;
}

/**
 * Tabpage and buffer handles arrive as msgpack extension values; the RPC client hands them
 * over either as plain integers or as objects carrying the id in `data`.
 */
function expectHandle(value: unknown, event: string, label: string): number {
  if (isRecord(value)) {
    return expectInteger(value.data, event, `${label} handle`);
  }
  return expectInteger(value, event, label);
}

function optionalInteger(value: unknown, event: string, label: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return expectInteger(value, event, label);
}

function expectNumber(value: unknown, event: string, label: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ProtocolError(event, `${label} must be a number, got ${describe(value)}`);
  }
  return value;
}

function expectString(value: unknown, event: string, label: string): string {
  if (typeof value !== 'string') {
    throw new ProtocolError(event, `${label} must be a string, got ${describe(value)}`);
  }
  return value;
}

function expectBoolean(value: unknown, event: string, label: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ProtocolError(event, `${label} must be a boolean, got ${describe(value)}`);
  }
  return value;
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
