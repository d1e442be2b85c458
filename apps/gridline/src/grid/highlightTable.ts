import type { BackgroundState } from '../lib/config';
import type { HighlightAttributes, HighlightInfo } from '../protocol/types';

export interface ResolvedColors {
  foreground: number;
  background: number;
  special: number;
}

export interface CursorColors {
  foreground: number;
  background: number;
}

export const DEFAULT_ATTRIBUTES: Readonly<HighlightAttributes> = Object.freeze({
  bold: false,
  italic: false,
  underline: false,
  undercurl: false,
  underdouble: false,
  underdotted: false,
  underdashed: false,
  strikethrough: false,
  reverse: false,
  standout: false,
  altfont: false,
  blend: 0,
});

export function createAttributes(overrides: Partial<HighlightAttributes> = {}): HighlightAttributes {
  return { ...DEFAULT_ATTRIBUTES, ...overrides };
}

const WHITE = 0xffffff;
const BLACK = 0x000000;
const RED = 0xff0000;

export function invertColor(color: number): number {
  return WHITE ^ (color & WHITE);
}

/**
 * Highlight id → attribute table. Id 0 is the default attribute and can never be redefined;
 * unknown ids resolve to it.
 */
export class HighlightTable {
  private readonly attributes = new Map<number, HighlightAttributes>();
  private readonly groups = new Map<string, number>();
  private defaults: Partial<ResolvedColors> = {};
  private backgroundState: BackgroundState;

  constructor(background: BackgroundState = 'dark') {
    this.backgroundState = background;
  }

  /** Inserts or replaces the attributes for `id`. Returns false for the reserved id 0. */
  define(id: number, attributes: HighlightAttributes, info: readonly HighlightInfo[] = []): boolean {
    if (id <= 0) {
      return false;
    }
    this.attributes.set(id, { ...attributes });
    for (const entry of info) {
      if (entry.kind === 'syntax' && entry.hiName) {
        this.groups.set(entry.hiName, id);
      }
    }
    return true;
  }

  resolve(id: number): Readonly<HighlightAttributes> {
    return this.attributes.get(id) ?? DEFAULT_ATTRIBUTES;
  }

  setGroup(name: string, id: number): void {
    this.groups.set(name, id);
  }

  resolveGroup(name: string): Readonly<HighlightAttributes> | undefined {
    const id = this.groups.get(name);
    return id === undefined ? undefined : this.attributes.get(id);
  }

  /** Accepts the raw protocol values, where -1 means "not set". */
  setDefaultColors(foreground: number, background: number, special: number): void {
    this.defaults = {
      foreground: foreground < 0 ? undefined : foreground,
      background: background < 0 ? undefined : background,
      special: special < 0 ? undefined : special,
    };
  }

  setBackground(state: BackgroundState): boolean {
    if (this.backgroundState === state) {
      return false;
    }
    this.backgroundState = state;
    return true;
  }

  get background(): BackgroundState {
    return this.backgroundState;
  }

  defaultColors(): ResolvedColors {
    const dark = this.backgroundState === 'dark';
    return {
      foreground: this.defaults.foreground ?? (dark ? WHITE : BLACK),
      background: this.defaults.background ?? (dark ? BLACK : WHITE),
      special: this.defaults.special ?? RED,
    };
  }

  /** Concrete colours for a cell, after default fallback and reverse video. */
  effectiveColors(id: number): ResolvedColors {
    const attributes = this.resolve(id);
    const defaults = this.defaultColors();
    const foreground = attributes.foreground ?? defaults.foreground;
    const background = attributes.background ?? defaults.background;
    const special = attributes.special ?? defaults.special;
    if (attributes.reverse || attributes.standout) {
      return { foreground: background, background: foreground, special };
    }
    return { foreground, background, special };
  }

  /**
   * Colours for the cursor block. A non-zero mode attribute wins, then the `Cursor`
   * group, then the inverse of the default background.
   */
  cursorColors(attrId = 0): CursorColors {
    const defaults = this.defaultColors();
    const source = (attrId > 0 ? this.attributes.get(attrId) : undefined) ?? this.resolveGroup('Cursor');
    if (!source) {
      return { foreground: defaults.background, background: invertColor(defaults.background) };
    }
    if (source.reverse) {
      return {
        foreground: source.background ?? defaults.background,
        background: source.foreground ?? defaults.foreground,
      };
    }
    return {
      foreground: source.foreground ?? defaults.background,
      background: source.background ?? invertColor(defaults.background),
    };
  }

  clone(): HighlightTable {
    const copy = new HighlightTable(this.backgroundState);
    for (const [id, attributes] of this.attributes) {
      copy.attributes.set(id, attributes);
    }
    for (const [name, id] of this.groups) {
      copy.groups.set(name, id);
    }
    copy.defaults = { ...this.defaults };
    return copy;
  }
}
