import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      nvimPath: 'nvim',
      nvimArgs: ['--embed'],
      cols: 80,
      rows: 24,
      logLevel: 'info',
      multigrid: false,
      cursorBlinkLimit: null,
      background: 'dark',
      cursorFade: 180,
      externalPopupmenu: false,
      externalTabline: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      GRIDLINE_NVIM_PATH: '/opt/nvim/bin/nvim',
      GRIDLINE_NVIM_ARGS: '--embed, --clean',
      GRIDLINE_COLS: '120',
      GRIDLINE_ROWS: '40',
      GRIDLINE_LOG_LEVEL: 'debug',
      GRIDLINE_MULTIGRID: '1',
      GRIDLINE_CURSOR_BLINK: '3',
      GRIDLINE_BACKGROUND: 'light',
      GRIDLINE_CURSOR_FADE: '0',
      GRIDLINE_EXT_POPUPMENU: '1',
      GRIDLINE_EXT_TABLINE: '1',
    });
    expect(config.nvimPath).toBe('/opt/nvim/bin/nvim');
    expect(config.nvimArgs).toEqual(['--embed', '--clean']);
    expect(config.cols).toBe(120);
    expect(config.rows).toBe(40);
    expect(config.logLevel).toBe('debug');
    expect(config.multigrid).toBe(true);
    expect(config.cursorBlinkLimit).toBe(3);
    expect(config.background).toBe('light');
    expect(config.cursorFade).toBe(0);
    expect(config.externalPopupmenu).toBe(true);
    expect(config.externalTabline).toBe(true);
  });

  it('rejects a negative cursor fade', () => {
    expect(() => loadConfig({ GRIDLINE_CURSOR_FADE: '-5' })).toThrow(
      'Invalid GRIDLINE_CURSOR_FADE: expected a non-negative integer, got "-5"',
    );
  });

  it('rejects dimensions that are not positive integers', () => {
    expect(() => loadConfig({ GRIDLINE_COLS: 'wide' })).toThrow(
      'Invalid GRIDLINE_COLS: expected an integer, got "wide"',
    );
    expect(() => loadConfig({ GRIDLINE_ROWS: '0' })).toThrow(
      'Invalid GRIDLINE_ROWS: expected a positive integer, got "0"',
    );
  });

  it('rejects an unknown background', () => {
    expect(() => loadConfig({ GRIDLINE_BACKGROUND: 'sepia' })).toThrow(
      'Invalid GRIDLINE_BACKGROUND: expected "dark" or "light", got "sepia"',
    );
  });
});
