import { GridStore } from '../grid/gridStore';
import { ResizeNegotiator, type GridSize, type Scheduler } from '../grid/resizeNegotiator';
import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';
import { encodeKey, encodeModifiers, encodeText, type KeyInput, type KeyModifiers } from '../protocol/keys';
import {
  GLOBAL_GRID_ID,
  type ClientRequest,
  type MouseAction,
  type MouseButton,
  type RedrawEvent,
} from '../protocol/types';
import type { AttachOptions, NvimTransport } from '../transport/nvimTransport';

export interface UiSessionOptions {
  transport: NvimTransport;
  /** Size requested at attach time. */
  size: GridSize;
  store?: GridStore;
  multigrid?: boolean;
  /** Externalised UI elements, published on the snapshot instead of drawn into grids. */
  external?: Pick<AttachOptions, 'popupmenu' | 'tabline'>;
  logger?: Logger;
  schedule?: Scheduler;
}

export interface MouseInput extends KeyModifiers {
  button: MouseButton;
  action: MouseAction;
  /** Surface coordinates; translated to grid coordinates before sending. */
  row: number;
  col: number;
}

/**
 * One attached UI: feeds redraw events into the store, routes global grid resizes to the
 * negotiator, and turns local input into editor requests.
 */
export class UiSession {
  readonly store: GridStore;
  readonly negotiator: ResizeNegotiator;
  private readonly transport: NvimTransport;
  private readonly size: GridSize;
  private readonly multigrid: boolean;
  private readonly external: Pick<AttachOptions, 'popupmenu' | 'tabline'>;
  private readonly log: Logger;
  private failure: Error | null = null;

  constructor(options: UiSessionOptions) {
    this.transport = options.transport;
    this.size = options.size;
    this.multigrid = options.multigrid === true;
    this.external = options.external ?? {};
    this.log = options.logger ?? silentLogger;
    this.store = options.store ?? new GridStore({ logger: this.log.child({ component: 'grid-store' }) });
    this.negotiator = new ResizeNegotiator({
      send: (size) => this.transport.send({ type: 'resize', cols: size.cols, rows: size.rows }),
      schedule: options.schedule,
      logger: this.log.child({ component: 'resize' }),
    });

    this.transport.addEventListener('redraw', (event) => this.handleRedraw(event.detail));
    this.transport.addEventListener('error', (event) => this.handleProtocolError(event.detail));
    this.transport.addEventListener('close', () => this.handleClose());
  }

  async start(): Promise<void> {
    this.store.setConnectionState('connecting');
    try {
      await this.transport.attach(this.size, { ...this.external, multigrid: this.multigrid });
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.log.error({ err: failure }, 'ui attach failed');
      this.failure = failure;
      this.store.setConnectionState('failed', failure);
      throw failure;
    }
    if (!this.transport.isClosed) {
      this.log.info({ cols: this.size.cols, rows: this.size.rows, multigrid: this.multigrid }, 'ui attached');
      this.store.setConnectionState('connected');
    }
  }

  resize(cols: number, rows: number): void {
    this.negotiator.requestResize(cols, rows);
  }

  /** Returns false when the key has no editor notation. */
  sendKey(input: KeyInput): boolean {
    const keys = encodeKey(input);
    if (keys === null) {
      return false;
    }
    this.store.notifyTyping();
    this.dispatch({ type: 'input', keys });
    return true;
  }

  sendText(text: string): void {
    if (text.length === 0) {
      return;
    }
    this.store.notifyTyping();
    this.dispatch({ type: 'input', keys: encodeText(text) });
  }

  /** Returns false when the editor has the mouse off or the position is outside every grid. */
  sendMouse(input: MouseInput): boolean {
    const snapshot = this.store.getSnapshot();
    if (!snapshot.mouseEnabled) {
      return false;
    }
    const hit = this.store.hitTest(input.row, input.col);
    if (!hit) {
      return false;
    }
    this.dispatch({
      type: 'mouse',
      button: input.button,
      action: input.action,
      modifiers: encodeModifiers(input),
      grid: this.multigrid ? hit.grid : 0,
      row: this.multigrid ? hit.row : input.row,
      col: this.multigrid ? hit.col : input.col,
    });
    return true;
  }

  setFocus(focused: boolean): void {
    this.store.setFocus(focused);
    this.dispatch({ type: 'focus', focused });
  }

  tick(now?: number): void {
    this.store.tick(now);
  }

  close(): void {
    this.transport.close();
  }

  private handleRedraw(events: readonly RedrawEvent[]): void {
    for (const event of events) {
      if (event.type === 'grid_resize' && event.grid === GLOBAL_GRID_ID) {
        this.negotiator.acknowledge(event.width, event.height);
      }
      this.store.apply(event);
    }
  }

  private handleProtocolError(error: Error): void {
    this.log.error({ err: error }, 'closing connection after protocol error');
    this.failure = error;
    this.store.discardPending();
    this.store.setConnectionState('failed', error);
    this.transport.close();
  }

  private handleClose(): void {
    this.store.discardPending();
    this.negotiator.reset();
    if (!this.failure) {
      this.store.setConnectionState('disconnected');
    }
  }

  private dispatch(request: ClientRequest): void {
    if (this.transport.isClosed) {
      this.log.debug({ request: request.type }, 'dropping request on closed transport');
      return;
    }
    void this.transport.send(request).catch((error: unknown) => {
      this.log.warn({ err: error, request: request.type }, 'editor request failed');
    });
  }
}
