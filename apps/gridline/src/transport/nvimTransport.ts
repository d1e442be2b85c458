import { ProtocolError, TransportClosedError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { silentLogger } from '../lib/logger';
import { decodeRedrawBatch } from '../protocol/redraw';
import type { ClientRequest, RedrawEvent } from '../protocol/types';
import type { GridSize } from '../grid/resizeNegotiator';

/** The slice of a msgpack-RPC client the transport needs. */
export interface RpcChannel {
  onNotification(handler: (method: string, args: unknown[]) => void): void;
  onDisconnect(handler: () => void): void;
  request(method: string, args: unknown[]): Promise<unknown>;
  close(): void;
}

export interface AttachOptions {
  multigrid?: boolean;
  /** Ask the editor to send completion menus as `popupmenu_*` events instead of drawing them. */
  popupmenu?: boolean;
  /** Ask the editor to send `tabline_update` instead of drawing the tab line. */
  tabline?: boolean;
}

export type NvimTransportEventMap = {
  redraw: CustomEvent<RedrawEvent[]>;
  error: CustomEvent<Error>;
  close: Event;
};

interface NvimTransportOptions {
  logger?: Logger;
}

/**
 * Typed event surface over an RPC channel. `redraw` notifications are decoded here and
 * dispatched as `redraw` events; a malformed notification dispatches `error` instead.
 */
export class NvimTransport extends EventTarget {
  private readonly channel: RpcChannel;
  private readonly log: Logger;
  private notificationsSeen = 0;
  private closed = false;

  constructor(channel: RpcChannel, options: NvimTransportOptions = {}) {
    super();
    this.channel = channel;
    this.log = options.logger ?? silentLogger;
    this.channel.onNotification((method, args) => this.handleNotification(method, args));
    this.channel.onDisconnect(() => this.handleDisconnect());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  attach(size: GridSize, options: AttachOptions = {}): Promise<unknown> {
    return this.request('nvim_ui_attach', [
      size.cols,
      size.rows,
      {
        rgb: true,
        ext_linegrid: true,
        ext_multigrid: options.multigrid === true,
        ext_popupmenu: options.popupmenu === true,
        ext_tabline: options.tabline === true,
      },
    ]);
  }

  send(request: ClientRequest): Promise<unknown> {
    switch (request.type) {
      case 'resize':
        return this.request('nvim_ui_try_resize', [request.cols, request.rows]);
      case 'input':
        return this.request('nvim_input', [request.keys]);
      case 'mouse':
        return this.request('nvim_input_mouse', [
          request.button,
          request.action,
          request.modifiers,
          request.grid,
          request.row,
          request.col,
        ]);
      case 'focus':
        return this.request('nvim_ui_set_focus', [request.focused]);
      default: {
        const exhaustive: never = request;
        return Promise.reject(new Error(`unsupported client request: ${JSON.stringify(exhaustive)}`));
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channel.close();
    this.dispatchEvent(new Event('close'));
  }

  addEventListener<K extends keyof NvimTransportEventMap>(
    type: K,
    listener: (event: NvimTransportEventMap[K]) => void,
    options?: boolean | AddEventListenerOptions,
  ): void {
    super.addEventListener(type, listener as EventListener, options);
  }

  removeEventListener<K extends keyof NvimTransportEventMap>(
    type: K,
    listener: (event: NvimTransportEventMap[K]) => void,
    options?: boolean | EventListenerOptions,
  ): void {
    super.removeEventListener(type, listener as EventListener, options);
  }

  private request(method: string, args: unknown[]): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError(method));
    }
    return this.channel.request(method, args);
  }

  private handleNotification(method: string, args: unknown[]): void {
    if (this.closed || method !== 'redraw') {
      return;
    }
    let events: RedrawEvent[];
    try {
      events = decodeRedrawBatch(args, {
        onUnknownEvent: (name) => this.log.debug({ event: name }, 'ignoring unknown redraw event'),
      });
    } catch (error) {
      const failure = error instanceof Error ? error : new ProtocolError('redraw', String(error));
      this.log.error({ err: failure }, 'failed to decode redraw notification');
      this.dispatchEvent(new CustomEvent<Error>('error', { detail: failure }));
      return;
    }
    this.notificationsSeen += 1;
    if (this.notificationsSeen <= 5 || this.notificationsSeen % 500 === 0) {
      this.log.debug({ seen: this.notificationsSeen, events: events.length }, 'received redraw notification');
    }
    this.dispatchEvent(new CustomEvent<RedrawEvent[]>('redraw', { detail: events }));
  }

  private handleDisconnect(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.log.info('editor channel disconnected');
    this.dispatchEvent(new Event('close'));
  }
}
