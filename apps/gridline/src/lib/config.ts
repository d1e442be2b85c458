export type BackgroundState = 'dark' | 'light';

export interface GridlineConfig {
  nvimPath: string;
  nvimArgs: string[];
  cols: number;
  rows: number;
  logLevel: string;
  multigrid: boolean;
  /** Number of blink cycles before the cursor settles; `null` blinks forever. */
  cursorBlinkLimit: number | null;
  background: BackgroundState;
  /** Cursor fade length in ms; 0 blinks without fading. */
  cursorFade: number;
  externalPopupmenu: boolean;
  externalTabline: boolean;
}

function parseList(raw?: string): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  }
  return value;
}

function parseDimension(name: string, raw: string | undefined, fallback: number): number {
  const value = parseInteger(name, raw, fallback);
  if (value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function parseDuration(name: string, raw: string | undefined, fallback: number): number {
  const value = parseInteger(name, raw, fallback);
  if (value < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseBackground(raw?: string): BackgroundState {
  if (!raw) {
    return 'dark';
  }
  if (raw === 'dark' || raw === 'light') {
    return raw;
  }
  throw new Error(`Invalid GRIDLINE_BACKGROUND: expected "dark" or "light", got "${raw}"`);
}

export function loadConfig(env = process.env): GridlineConfig {
  const nvimArgs = parseList(env.GRIDLINE_NVIM_ARGS);
  const blink = parseInteger('GRIDLINE_CURSOR_BLINK', env.GRIDLINE_CURSOR_BLINK, -1);

  return {
    nvimPath: env.GRIDLINE_NVIM_PATH ?? 'nvim',
    nvimArgs: nvimArgs.length > 0 ? nvimArgs : ['--embed'],
    cols: parseDimension('GRIDLINE_COLS', env.GRIDLINE_COLS, 80),
    rows: parseDimension('GRIDLINE_ROWS', env.GRIDLINE_ROWS, 24),
    logLevel: env.GRIDLINE_LOG_LEVEL ?? 'info',
    multigrid: env.GRIDLINE_MULTIGRID === '1',
    cursorBlinkLimit: blink < 0 ? null : blink,
    background: parseBackground(env.GRIDLINE_BACKGROUND),
    cursorFade: parseDuration('GRIDLINE_CURSOR_FADE', env.GRIDLINE_CURSOR_FADE, 180),
    externalPopupmenu: env.GRIDLINE_EXT_POPUPMENU === '1',
    externalTabline: env.GRIDLINE_EXT_TABLINE === '1',
  };
}
