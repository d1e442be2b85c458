import { spawn, type ChildProcess } from 'node:child_process';
import { attach, type NeovimClient } from 'neovim';
import type { GridlineConfig } from '../lib/config';
import type { Logger } from '../lib/logger';
import type { RpcChannel } from './nvimTransport';

export function channelFromClient(client: NeovimClient, proc?: ChildProcess): RpcChannel {
  return {
    onNotification(handler) {
      client.on('notification', handler);
    },
    onDisconnect(handler) {
      client.on('disconnect', handler);
      proc?.once('exit', () => handler());
    },
    request(method, args) {
      return client.request(method, args);
    },
    close() {
      proc?.kill();
    },
  };
}

export interface SpawnedEditor {
  channel: RpcChannel;
  process: ChildProcess;
}

/** Starts an embedded editor process and binds an RPC client to its stdio. */
export function spawnEditor(config: Pick<GridlineConfig, 'nvimPath' | 'nvimArgs'>, logger: Logger): SpawnedEditor {
  const proc = spawn(config.nvimPath, config.nvimArgs, { stdio: ['pipe', 'pipe', 'inherit'] });
  proc.on('error', (error) => {
    logger.error({ err: error, path: config.nvimPath }, 'failed to start editor process');
  });
  proc.on('exit', (code, signal) => {
    logger.info({ code, signal }, 'editor process exited');
  });
  const client = attach({ proc });
  return { channel: channelFromClient(client, proc), process: proc };
}
