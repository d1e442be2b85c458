#!/usr/bin/env node
import { composeText } from '../src/grid/compose';
import { GridStore, type GridSnapshot } from '../src/grid/gridStore';
import { loadConfig } from '../src/lib/config';
import { createLogger } from '../src/lib/logger';
import { UiSession } from '../src/session/uiSession';
import { NvimTransport } from '../src/transport/nvimTransport';
import { spawnEditor } from '../src/transport/spawn';

const SETTLE_MS = 250;
const TIMEOUT_MS = 10_000;

// Waits until the editor has published a screen and then stayed quiet for a moment.
function waitForScreen(store: GridStore): Promise<GridSnapshot> {
  return new Promise((resolve, reject) => {
    let settle: ReturnType<typeof setTimeout> | undefined;
    const timeout = setTimeout(() => {
      unsubscribe();
      if (settle) {
        clearTimeout(settle);
      }
      reject(new Error(`no screen published within ${TIMEOUT_MS}ms`));
    }, TIMEOUT_MS);
    const unsubscribe = store.subscribe(() => {
      const snapshot = store.getSnapshot();
      if (snapshot.connection === 'failed' || snapshot.connection === 'disconnected') {
        clearTimeout(timeout);
        if (settle) {
          clearTimeout(settle);
        }
        unsubscribe();
        reject(snapshot.error ?? new Error(`editor ${snapshot.connection} before drawing`));
        return;
      }
      if (snapshot.grids.length === 0) {
        return;
      }
      if (settle) {
        clearTimeout(settle);
      }
      settle = setTimeout(() => {
        clearTimeout(timeout);
        unsubscribe();
        resolve(store.getSnapshot());
      }, SETTLE_MS);
    });
  });
}

async function run(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ name: 'screen-dump', level: config.logLevel, fd: 2 });
  logger.info({ path: config.nvimPath, cols: config.cols, rows: config.rows }, 'starting editor');

  const editor = spawnEditor(config, logger);
  const transport = new NvimTransport(editor.channel, { logger: logger.child({ component: 'transport' }) });
  const store = new GridStore({
    logger: logger.child({ component: 'grid-store' }),
    background: config.background,
    cursorBlinkLimit: config.cursorBlinkLimit,
    cursorFade: config.cursorFade,
  });
  const session = new UiSession({
    transport,
    store,
    size: { cols: config.cols, rows: config.rows },
    multigrid: config.multigrid,
    external: { popupmenu: config.externalPopupmenu, tabline: config.externalTabline },
    logger,
  });

  try {
    const [, snapshot] = await Promise.all([session.start(), waitForScreen(store)]);
    for (const line of composeText(snapshot)) {
      process.stdout.write(`${line.trimEnd()}\n`);
    }
    logger.info({ batches: snapshot.batches, grids: snapshot.grids.length }, 'screen captured');
  } finally {
    session.close();
  }
}

run().catch((error: unknown) => {
  console.error('[screen-dump] failed', error);
  process.exitCode = 1;
});
