import { describe, expect, it } from 'vitest';
import { composeText } from './compose';
import { GridStore } from './gridStore';

describe('composeText', () => {
  it('returns nothing before the global grid exists', () => {
    expect(composeText(new GridStore().getSnapshot())).toEqual([]);
  });

  it('paints floats over the grids beneath and clips at the surface edge', () => {
    const store = new GridStore();
    store.applyBatch([
      { type: 'grid_resize', grid: 1, width: 6, height: 3 },
      { type: 'grid_line', grid: 1, row: 1, colStart: 0, cells: [{ text: '.', hlId: 0, repeat: 6 }] },
      { type: 'grid_resize', grid: 4, width: 3, height: 1 },
      { type: 'grid_line', grid: 4, row: 0, colStart: 0, cells: [{ text: 'p', hlId: 2 }, { text: 'o' }, { text: 'p' }] },
      {
        type: 'win_float_pos',
        grid: 4,
        anchor: 'NW',
        anchorGrid: 1,
        anchorRow: 1,
        anchorCol: 4,
        focusable: false,
      },
      { type: 'flush' },
    ]);

    expect(composeText(store.getSnapshot())).toEqual(['      ', '....po', '      ']);
  });

  it('keeps the empty right half of wide characters', () => {
    const store = new GridStore();
    store.applyBatch([
      { type: 'grid_resize', grid: 1, width: 3, height: 1 },
      { type: 'grid_line', grid: 1, row: 0, colStart: 0, cells: [{ text: '字', hlId: 0 }, { text: '' }, { text: 'a' }] },
      { type: 'flush' },
    ]);

    expect(composeText(store.getSnapshot())).toEqual(['字a']);
  });
});
