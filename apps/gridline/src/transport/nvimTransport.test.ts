import { describe, expect, it, vi } from 'vitest';
import { ProtocolError, TransportClosedError } from '../lib/errors';
import type { RedrawEvent } from '../protocol/types';
import { FakeRpcChannel } from '../testing/fakeRpcChannel';
import { NvimTransport } from './nvimTransport';

describe('NvimTransport', () => {
  it('decodes redraw notifications into redraw events', () => {
    const channel = new FakeRpcChannel();
    const transport = new NvimTransport(channel);
    const received: RedrawEvent[][] = [];
    transport.addEventListener('redraw', (event) => received.push(event.detail));

    channel.notify('redraw', [['grid_clear', [1]], ['flush', []]]);
    channel.notify('nvim_buf_lines_event', [1]);

    expect(received).toEqual([[{ type: 'grid_clear', grid: 1 }, { type: 'flush' }]]);
  });

  it('dispatches an error for malformed notifications', () => {
    const channel = new FakeRpcChannel();
    const transport = new NvimTransport(channel);
    const errors: Error[] = [];
    const redraw = vi.fn();
    transport.addEventListener('error', (event) => errors.push(event.detail));
    transport.addEventListener('redraw', redraw);

    channel.notify('redraw', [['grid_clear', ['one']]]);

    expect(redraw).not.toHaveBeenCalled();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ProtocolError);
  });

  it('maps client requests onto API calls', async () => {
    const channel = new FakeRpcChannel();
    const transport = new NvimTransport(channel);

    await transport.attach({ cols: 80, rows: 24 }, { multigrid: true });
    await transport.send({ type: 'resize', cols: 100, rows: 30 });
    await transport.send({ type: 'input', keys: '<C-w>' });
    await transport.send({ type: 'mouse', button: 'left', action: 'press', modifiers: 'S', grid: 2, row: 3, col: 4 });
    await transport.send({ type: 'focus', focused: false });

    expect(channel.requests).toEqual([
      [
        'nvim_ui_attach',
        [80, 24, { rgb: true, ext_linegrid: true, ext_multigrid: true, ext_popupmenu: false, ext_tabline: false }],
      ],
      ['nvim_ui_try_resize', [100, 30]],
      ['nvim_input', ['<C-w>']],
      ['nvim_input_mouse', ['left', 'press', 'S', 2, 3, 4]],
      ['nvim_ui_set_focus', [false]],
    ]);
  });

  it('emits close once when the channel disconnects and rejects later requests', async () => {
    const channel = new FakeRpcChannel();
    const transport = new NvimTransport(channel);
    const onClose = vi.fn();
    transport.addEventListener('close', onClose);

    channel.disconnect();
    channel.disconnect();
    transport.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(transport.isClosed).toBe(true);
    await expect(transport.send({ type: 'input', keys: 'i' })).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('closes the channel when closed locally', () => {
    const channel = new FakeRpcChannel();
    const transport = new NvimTransport(channel);
    transport.close();
    expect(channel.closed).toBe(true);
  });
});
