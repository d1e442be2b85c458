import { describe, expect, it, vi } from 'vitest';
import { ProtocolError } from '../lib/errors';
import { decodeRedrawBatch } from './redraw';

describe('decodeRedrawBatch', () => {
  it('expands every parameter tuple of an entry into its own event', () => {
    const events = decodeRedrawBatch([
      ['grid_resize', [1, 80, 24]],
      ['grid_line', [1, 0, 0, [['a', 3], ['b'], [' ', 0, 4]]], [1, 1, 2, [['x', 5, 2]]]],
      ['flush', []],
    ]);

    expect(events).toEqual([
      { type: 'grid_resize', grid: 1, width: 80, height: 24 },
      {
        type: 'grid_line',
        grid: 1,
        row: 0,
        colStart: 0,
        cells: [{ text: 'a', hlId: 3 }, { text: 'b' }, { text: ' ', hlId: 0, repeat: 4 }],
      },
      { type: 'grid_line', grid: 1, row: 1, colStart: 2, cells: [{ text: 'x', hlId: 5, repeat: 2 }] },
      { type: 'flush' },
    ]);
  });

  it('decodes highlight definitions with their info entries', () => {
    const [event] = decodeRedrawBatch([
      [
        'hl_attr_define',
        [7, { foreground: 0xff0000, bold: true, reverse: true }, {}, [{ kind: 'syntax', hi_name: 'Cursor' }]],
      ],
    ]);

    expect(event).toEqual({
      type: 'hl_attr_define',
      id: 7,
      attributes: {
        foreground: 0xff0000,
        bold: true,
        italic: false,
        underline: false,
        undercurl: false,
        underdouble: false,
        underdotted: false,
        underdashed: false,
        strikethrough: false,
        reverse: true,
        standout: false,
        altfont: false,
        blend: 0,
      },
      info: [{ kind: 'syntax', hiName: 'Cursor' }],
    });
  });

  it('decodes mode info with defaults for missing keys', () => {
    const [event] = decodeRedrawBatch([
      [
        'mode_info_set',
        [
          true,
          [
            { name: 'normal', short_name: 'n', cursor_shape: 'block', blinkwait: 700, blinkon: 400, blinkoff: 250 },
            { name: 'insert', short_name: 'i', cursor_shape: 'vertical', cell_percentage: 25, attr_id: 9 },
          ],
        ],
      ],
    ]);

    expect(event).toEqual({
      type: 'mode_info_set',
      cursorStyleEnabled: true,
      modes: [
        {
          name: 'normal',
          shortName: 'n',
          cursorShape: 'block',
          cellPercentage: 100,
          blinkWait: 700,
          blinkOn: 400,
          blinkOff: 250,
          attrId: 0,
          attrIdLm: 0,
        },
        {
          name: 'insert',
          shortName: 'i',
          cursorShape: 'vertical',
          cellPercentage: 25,
          blinkWait: 0,
          blinkOn: 0,
          blinkOff: 0,
          attrId: 9,
          attrIdLm: 0,
        },
      ],
    });
  });

  it('skips the window handle when decoding window placements', () => {
    const events = decodeRedrawBatch([
      ['win_pos', [2, { id: 1000 }, 0, 0, 40, 23]],
      ['win_float_pos', [4, { id: 1001 }, 'SE', 2, 10.5, 3, true, 50]],
      ['msg_set_pos', [3, 20, false, '-']],
    ]);

    expect(events).toEqual([
      { type: 'win_pos', grid: 2, startRow: 0, startCol: 0, width: 40, height: 23 },
      {
        type: 'win_float_pos',
        grid: 4,
        anchor: 'SE',
        anchorGrid: 2,
        anchorRow: 10.5,
        anchorCol: 3,
        focusable: true,
        zIndex: 50,
      },
      { type: 'msg_set_pos', grid: 3, row: 20, scrolled: false, sepChar: '-' },
    ]);
  });

  it('reports and skips unknown events', () => {
    const onUnknownEvent = vi.fn();
    const events = decodeRedrawBatch(
      [
        ['cmdline_show', [[[0, 'write']], 5, ':', '', 0, 1]],
        ['busy_start', []],
      ],
      { onUnknownEvent },
    );

    expect(events).toEqual([{ type: 'busy_start' }]);
    expect(onUnknownEvent).toHaveBeenCalledWith('cmdline_show');
  });

  it('decodes popup menu events', () => {
    const events = decodeRedrawBatch([
      ['popupmenu_show', [[['print', 'f', '', 'print(value)'], ['printf']], -1, 4, 7, 2], [[['x', 'v', '', '']], 0, 1, 1]],
      ['popupmenu_select', [1]],
      ['popupmenu_hide', []],
    ]);

    expect(events).toEqual([
      {
        type: 'popupmenu_show',
        items: [
          { word: 'print', kind: 'f', menu: '', info: 'print(value)' },
          { word: 'printf', kind: '', menu: '', info: '' },
        ],
        selected: -1,
        row: 4,
        col: 7,
        grid: 2,
      },
      {
        type: 'popupmenu_show',
        items: [{ word: 'x', kind: 'v', menu: '', info: '' }],
        selected: 0,
        row: 1,
        col: 1,
        grid: 1,
      },
      { type: 'popupmenu_select', selected: 1 },
      { type: 'popupmenu_hide' },
    ]);
  });

  it('decodes tab line updates with plain or wrapped handles', () => {
    const [withBuffers, tabsOnly] = decodeRedrawBatch([
      [
        'tabline_update',
        [{ data: 2 }, [{ tab: { data: 1 }, name: 'notes.md' }, { tab: { data: 2 }, name: 'main.ts' }], 3, [{ buffer: 3, name: 'main.ts' }]],
        [1, [{ tab: 1, name: '[No Name]' }]],
      ],
    ]);

    expect(withBuffers).toEqual({
      type: 'tabline_update',
      current: 2,
      tabs: [
        { tab: 1, name: 'notes.md' },
        { tab: 2, name: 'main.ts' },
      ],
      currentBuffer: 3,
      buffers: [{ buffer: 3, name: 'main.ts' }],
    });
    expect(tabsOnly).toEqual({ type: 'tabline_update', current: 1, tabs: [{ tab: 1, name: '[No Name]' }], buffers: [] });
  });

  it('throws a ProtocolError for malformed parameters', () => {
    expect(() => decodeRedrawBatch([['grid_resize', [1, '80', 24]]])).toThrow(ProtocolError);
    expect(() => decodeRedrawBatch([['grid_resize', [1, '80', 24]]])).toThrow(
      'malformed grid_resize notification: width must be an integer, got string',
    );
    expect(() => decodeRedrawBatch([['win_float_pos', [4, null, 'N', 2, 0, 0, true]]])).toThrow(
      'malformed win_float_pos notification: anchor must be NW, NE, SW or SE, got string',
    );
    expect(() => decodeRedrawBatch([['tabline_update', [{ data: 'one' }, []]]])).toThrow(
      'malformed tabline_update notification: curtab handle must be an integer, got string',
    );
    expect(() => decodeRedrawBatch(['flush'])).toThrow(
      'malformed redraw notification: entry must be an array, got string',
    );
  });
});
