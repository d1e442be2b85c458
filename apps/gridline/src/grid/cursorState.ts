import type { ModeInfo } from '../protocol/types';

export type CursorPhase =
  | 'steady-visible'
  | 'steady-hidden'
  | 'blink-visible'
  | 'fading-out'
  | 'blink-hidden'
  | 'fading-in'
  | 'no-focus';

export interface BlinkTiming {
  /** Length of the first visible period after a reset. */
  wait: number;
  on: number;
  off: number;
}

export interface CursorStateOptions {
  /** Blink cycles before the cursor settles on steady-visible; null blinks forever. */
  blinkLimit?: number | null;
  /** Length of the fade between blink states in ms; 0 toggles without fading. */
  fadeDuration?: number;
}

/** Blink timing for a mode, or null when any of its durations is zero (no blinking). */
export function blinkTimingFor(mode: ModeInfo | null | undefined): BlinkTiming | null {
  if (!mode || mode.blinkWait <= 0 || mode.blinkOn <= 0 || mode.blinkOff <= 0) {
    return null;
  }
  return { wait: mode.blinkWait, on: mode.blinkOn, off: mode.blinkOff };
}

/**
 * Cursor presentation as a pure function of elapsed time. Nothing here schedules work:
 * the owner calls {@link tick} at {@link nextDeadline} (or whenever it redraws).
 */
export class CursorStateMachine {
  private phaseValue: CursorPhase = 'steady-visible';
  private phaseStartedAt = 0;
  private timing: BlinkTiming | null = null;
  private focused = true;
  private busy = false;
  private blinkLimit: number | null;
  private readonly fadeDuration: number;
  private blinks = 0;
  private firstPeriod = true;

  constructor(options: CursorStateOptions = {}) {
    this.blinkLimit = options.blinkLimit ?? null;
    this.fadeDuration = Math.max(0, options.fadeDuration ?? 0);
  }

  get phase(): CursorPhase {
    return this.phaseValue;
  }

  get since(): number {
    return this.phaseStartedAt;
  }

  get hasFocus(): boolean {
    return this.focused;
  }

  /** Whether anything should be drawn. Unfocused cursors draw as an outline. */
  get visible(): boolean {
    return this.phaseValue !== 'steady-hidden' && this.phaseValue !== 'blink-hidden';
  }

  /** True while fading between blink states. */
  get transitioning(): boolean {
    return this.phaseValue === 'fading-out' || this.phaseValue === 'fading-in';
  }

  /** Cursor opacity at `now`, from 0 (hidden) to 1. */
  alphaAt(now: number): number {
    switch (this.phaseValue) {
      case 'steady-hidden':
      case 'blink-hidden':
        return 0;
      case 'fading-out':
        return 1 - this.fadeProgress(now);
      case 'fading-in':
        return this.fadeProgress(now);
      default:
        return 1;
    }
  }

  /** A protocol mode change: adopt the mode's blink timing and restart. */
  setMode(mode: ModeInfo | null | undefined, now: number): boolean {
    this.timing = blinkTimingFor(mode);
    return this.reset(now);
  }

  /** A protocol cursor move. */
  moved(now: number): boolean {
    return this.reset(now);
  }

  /** Typing never shows a blinked-out cursor. */
  notifyTyping(now: number): boolean {
    return this.reset(now);
  }

  setFocus(focused: boolean, now: number): boolean {
    if (this.focused === focused) {
      return false;
    }
    this.focused = focused;
    return this.reset(now);
  }

  setBusy(busy: boolean, now: number): boolean {
    if (this.busy === busy) {
      return false;
    }
    this.busy = busy;
    return this.reset(now);
  }

  setBlinkLimit(limit: number | null, now: number): boolean {
    this.blinkLimit = limit !== null && limit < 0 ? null : limit;
    return this.reset(now);
  }

  /** Advances blinking up to `now`. Returns true when the phase changed. */
  tick(now: number): boolean {
    const before = this.phaseValue;
    let deadline = this.nextDeadline();
    while (deadline !== null && now >= deadline) {
      this.advance(deadline);
      deadline = this.nextDeadline();
    }
    return this.phaseValue !== before;
  }

  /** When the phase changes next if nothing else happens, or null when it is steady. */
  nextDeadline(): number | null {
    if (!this.timing) {
      return null;
    }
    if (this.phaseValue === 'blink-visible') {
      return this.phaseStartedAt + (this.firstPeriod ? this.timing.wait : this.timing.on);
    }
    if (this.phaseValue === 'blink-hidden') {
      return this.phaseStartedAt + this.timing.off;
    }
    if (this.transitioning) {
      return this.phaseStartedAt + this.fadeDuration;
    }
    return null;
  }

  private advance(at: number): void {
    this.phaseStartedAt = at;
    const fades = this.fadeDuration > 0;
    if (this.phaseValue === 'blink-visible') {
      this.phaseValue = fades ? 'fading-out' : 'blink-hidden';
      this.firstPeriod = false;
      return;
    }
    if (this.phaseValue === 'fading-out') {
      this.phaseValue = 'blink-hidden';
      return;
    }
    if (this.phaseValue === 'blink-hidden' && fades) {
      this.phaseValue = 'fading-in';
      return;
    }
    this.blinks += 1;
    this.phaseValue =
      this.blinkLimit !== null && this.blinks >= this.blinkLimit ? 'steady-visible' : 'blink-visible';
  }

  private fadeProgress(now: number): number {
    if (this.fadeDuration === 0) {
      return 1;
    }
    return Math.min(1, Math.max(0, (now - this.phaseStartedAt) / this.fadeDuration));
  }

  private reset(now: number): boolean {
    const before = this.phaseValue;
    this.phaseStartedAt = now;
    this.blinks = 0;
    this.firstPeriod = true;
    if (this.busy) {
      this.phaseValue = 'steady-hidden';
    } else if (!this.focused) {
      this.phaseValue = 'no-focus';
    } else if (this.timing && this.blinkLimit !== 0) {
      this.phaseValue = 'blink-visible';
    } else {
      this.phaseValue = 'steady-visible';
    }
    return this.phaseValue !== before;
  }
}
