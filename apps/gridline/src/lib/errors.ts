/**
 * Raised when a redraw notification does not have the shape the UI protocol defines.
 * Fatal for the connection: the session rolls back the pending batch and closes the channel.
 */
export class ProtocolError extends Error {
  readonly event: string;

  constructor(event: string, message: string) {
    super(`malformed ${event} notification: ${message}`);
    this.name = 'ProtocolError';
    this.event = event;
  }
}

export class TransportClosedError extends Error {
  constructor(method: string) {
    super(`cannot send ${method}: transport is closed`);
    this.name = 'TransportClosedError';
  }
}
