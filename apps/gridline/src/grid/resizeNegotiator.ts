import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';

export interface GridSize {
  cols: number;
  rows: number;
}

export type Scheduler = (task: () => void) => void;

export interface ResizeNegotiatorOptions {
  /** Sends one resize request to the editor; settles when the editor answers. */
  send: (size: GridSize) => Promise<unknown>;
  schedule?: Scheduler;
  logger?: Logger;
}

function sameSize(a: GridSize, b: GridSize): boolean {
  return a.cols === b.cols && a.rows === b.rows;
}

/**
 * Keeps at most one resize request in flight. Requests made while one is pending replace
 * each other; only the latest is sent once the editor has answered. The editor's
 * `grid_resize` for the global grid is the ground truth, and a size it clamped is never
 * requested again on its own.
 */
export class ResizeNegotiator {
  private readonly sendRequest: (size: GridSize) => Promise<unknown>;
  private readonly schedule: Scheduler;
  private readonly log: Logger;
  private current: GridSize | null = null;
  private requested: GridSize | null = null;
  private inFlight: GridSize | null = null;
  private drainScheduled = false;

  constructor(options: ResizeNegotiatorOptions) {
    this.sendRequest = options.send;
    this.schedule = options.schedule ?? queueMicrotask;
    this.log = options.logger ?? silentLogger;
  }

  /** Size last confirmed by the editor, or null before the first `grid_resize`. */
  get currentSize(): GridSize | null {
    return this.current;
  }

  /** Latest local intent that has not been sent yet. */
  get pendingSize(): GridSize | null {
    return this.requested;
  }

  get awaitingReply(): boolean {
    return this.inFlight !== null;
  }

  requestResize(cols: number, rows: number): void {
    const target = { cols, rows };
    if (!this.inFlight && this.current && sameSize(this.current, target)) {
      this.requested = null;
      return;
    }
    this.requested = target;
    this.scheduleDrain();
  }

  /** Called for every `grid_resize` on the global grid. */
  acknowledge(cols: number, rows: number): void {
    const size = { cols, rows };
    this.current = size;
    if (this.inFlight) {
      if (!sameSize(this.inFlight, size)) {
        this.log.debug({ requested: this.inFlight, granted: size }, 'resize request was clamped');
      }
      this.inFlight = null;
    }
    if (this.requested && sameSize(this.requested, size)) {
      this.requested = null;
    }
    if (this.requested) {
      this.scheduleDrain();
    }
  }

  /** Forgets all state, e.g. after the connection is gone. */
  reset(): void {
    this.current = null;
    this.requested = null;
    this.inFlight = null;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.inFlight) {
      return;
    }
    this.drainScheduled = true;
    this.schedule(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    const target = this.requested;
    if (!target || this.inFlight || !this.current) {
      return;
    }
    this.requested = null;
    if (sameSize(target, this.current)) {
      return;
    }
    this.inFlight = target;
    this.log.debug({ cols: target.cols, rows: target.rows }, 'requesting resize');
    void this.sendRequest(target).then(
      () => this.settle(target),
      (error: unknown) => {
        this.log.warn({ err: error, cols: target.cols, rows: target.rows }, 'resize request failed');
        this.settle(target);
      },
    );
  }

  private settle(target: GridSize): void {
    if (this.inFlight !== target) {
      return;
    }
    this.inFlight = null;
    if (this.requested) {
      this.scheduleDrain();
    }
  }
}
