import { describe, expect, it } from 'vitest';
import type { GridSnapshot } from '../grid/gridStore';
import { ProtocolError } from '../lib/errors';
import { FakeRpcChannel } from '../testing/fakeRpcChannel';
import { NvimTransport } from '../transport/nvimTransport';
import { UiSession, type UiSessionOptions } from './uiSession';

describe('UiSession', () => {
  it('attaches with the configured size and reports the connection', async () => {
    const { session, channel } = setup({ multigrid: true });
    expect(session.store.getSnapshot().connection).toBe('connecting');

    await session.start();

    expect(channel.requests[0]).toEqual([
      'nvim_ui_attach',
      [
        80,
        24,
        { rgb: true, ext_linegrid: true, ext_multigrid: true, ext_popupmenu: false, ext_tabline: false },
      ],
    ]);
    expect(session.store.getSnapshot().connection).toBe('connected');
  });

  it('asks for an external popup menu and tab line when configured', async () => {
    const { session, channel } = setup({ external: { popupmenu: true, tabline: true } });
    await session.start();

    expect(channel.requests[0]).toEqual([
      'nvim_ui_attach',
      [80, 24, { rgb: true, ext_linegrid: true, ext_multigrid: false, ext_popupmenu: true, ext_tabline: true }],
    ]);

    channel.redraw(['popupmenu_show', [[['foo', '', '', '']], 0, 0, 0, 1]], ['flush', []]);
    expect(session.store.getSnapshot().popupmenu?.items).toEqual([{ word: 'foo', kind: '', menu: '', info: '' }]);
  });

  it('marks the session failed when attaching is rejected', async () => {
    const { session, channel } = setup();
    channel.replyWith('nvim_ui_attach', () => Promise.reject(new Error('ui already attached')));

    await expect(session.start()).rejects.toThrow('ui already attached');
    expect(session.store.getSnapshot()).toMatchObject({ connection: 'failed' });
    expect(session.store.getSnapshot().error?.message).toBe('ui already attached');
  });

  it('publishes a batch that spans several notifications at its flush', () => {
    const { session, channel } = setup();
    channel.redraw(['grid_resize', [1, 10, 2]], ['grid_line', [1, 0, 0, [['h', 0], ['i']]]]);
    expect(session.store.getSnapshot().grids).toEqual([]);

    channel.redraw(['grid_cursor_goto', [1, 0, 2]], ['flush', []]);
    expect(rowText(session.store.getSnapshot(), 0)).toBe('hi        ');
    expect(session.store.getSnapshot().cursor).toMatchObject({ row: 0, col: 2 });
  });

  it('keeps the last published state when the editor disconnects mid-batch', () => {
    const { session, channel } = setup();
    channel.redraw(['grid_resize', [1, 4, 2]], ['grid_line', [1, 0, 0, [['o', 0], ['k']]]], ['flush', []]);
    const published = session.store.getSnapshot();

    channel.redraw(['grid_resize', [1, 2, 1]], ['grid_clear', [1]]);
    channel.disconnect();

    const snapshot = session.store.getSnapshot();
    expect(snapshot.connection).toBe('disconnected');
    expect(snapshot.grids).toEqual(published.grids);
    expect(snapshot.surface).toEqual({ cols: 4, rows: 2 });
    expect(session.store.pending).toBe(false);
  });

  it('fails the connection on a malformed notification', () => {
    const { session, channel } = setup();
    channel.redraw(['grid_resize', [1, 4, 1]], ['flush', []]);
    channel.redraw(['grid_clear', [1]]);
    channel.redraw(['grid_line', [1, 'zero', 0, []]]);

    const snapshot = session.store.getSnapshot();
    expect(snapshot.connection).toBe('failed');
    expect(snapshot.error).toBeInstanceOf(ProtocolError);
    expect(channel.closed).toBe(true);
    expect(session.store.pending).toBe(false);
  });

  it('sends one resize request for a burst of window resizes', () => {
    const { session, channel, scheduler } = setup();
    channel.redraw(['grid_resize', [1, 80, 24]], ['flush', []]);

    session.resize(80, 24);
    session.resize(81, 24);
    session.resize(82, 24);
    scheduler.run();

    const resizes = channel.requests.filter(([method]) => method === 'nvim_ui_try_resize');
    expect(resizes).toEqual([['nvim_ui_try_resize', [82, 24]]]);
  });

  it('acknowledges resize requests from grid_resize of the global grid only', () => {
    const { session, channel, scheduler } = setup();
    channel.redraw(['grid_resize', [1, 80, 24]], ['flush', []]);
    session.resize(100, 30);
    scheduler.run();
    expect(session.negotiator.awaitingReply).toBe(true);

    channel.redraw(['grid_resize', [2, 100, 29]], ['flush', []]);
    expect(session.negotiator.awaitingReply).toBe(true);

    channel.redraw(['grid_resize', [1, 100, 30]], ['flush', []]);
    expect(session.negotiator.awaitingReply).toBe(false);
    expect(session.negotiator.currentSize).toEqual({ cols: 100, rows: 30 });
  });

  it('encodes keys and text as editor input', () => {
    const { session, channel } = setup();
    expect(session.sendKey({ key: 'a', shift: true })).toBe(true);
    expect(session.sendKey({ key: 'Shift', shift: true })).toBe(false);
    session.sendText('x<y');

    expect(channel.requests).toEqual([
      ['nvim_input', ['<S-a>']],
      ['nvim_input', ['x<lt>y']],
    ]);
  });

  it('only sends mouse input while the editor wants it', () => {
    const { session, channel } = setup();
    channel.redraw(['grid_resize', [1, 20, 5]], ['flush', []]);
    expect(session.sendMouse({ button: 'left', action: 'press', row: 1, col: 1 })).toBe(false);

    channel.redraw(['mouse_on', []], ['flush', []]);
    expect(session.sendMouse({ button: 'left', action: 'press', row: 1, col: 3, ctrl: true })).toBe(true);
    expect(session.sendMouse({ button: 'left', action: 'press', row: 9, col: 3 })).toBe(false);

    expect(channel.requests).toEqual([['nvim_input_mouse', ['left', 'press', 'C', 0, 1, 3]]]);
  });

  it('sends grid-relative mouse positions with multigrid', () => {
    const { session, channel } = setup({ multigrid: true });
    channel.redraw(
      ['grid_resize', [1, 20, 5], [2, 10, 4]],
      ['win_pos', [2, null, 1, 10, 10, 4]],
      ['mouse_on', []],
      ['flush', []],
    );

    session.sendMouse({ button: 'wheel', action: 'down', row: 2, col: 12 });
    expect(channel.requests).toEqual([['nvim_input_mouse', ['wheel', 'down', '', 2, 1, 2]]]);
  });

  it('reports focus changes to the editor and the cursor', () => {
    const { session, channel } = setup();
    channel.redraw(['grid_resize', [1, 4, 1]], ['flush', []]);

    session.setFocus(false);

    expect(channel.requests).toEqual([['nvim_ui_set_focus', [false]]]);
    expect(session.store.getSnapshot().cursor?.phase).toBe('no-focus');
  });

  it('stops sending once the session is closed', () => {
    const { session, channel } = setup();
    session.close();
    session.sendText('late');

    expect(channel.closed).toBe(true);
    expect(channel.requests).toEqual([]);
    expect(session.store.getSnapshot().connection).toBe('disconnected');
  });
});

function setup(overrides: Partial<UiSessionOptions> = {}) {
  const channel = new FakeRpcChannel();
  const transport = new NvimTransport(channel);
  const tasks: Array<() => void> = [];
  const scheduler = {
    run: () => {
      while (tasks.length > 0) {
        tasks.shift()?.();
      }
    },
  };
  const session = new UiSession({
    transport,
    size: { cols: 80, rows: 24 },
    schedule: (task) => {
      tasks.push(task);
    },
    ...overrides,
  });
  return { session, channel, scheduler };
}

function rowText(snapshot: GridSnapshot, row: number): string | undefined {
  return snapshot.grids[0]?.rows[row]?.map((cell) => cell.text).join('');
}
