import { useCallback, useSyncExternalStore } from 'react';
import type { GridSnapshot, GridStore } from '../grid/gridStore';

/** Subscribes a component to the store's published snapshots. */
export function useGridSnapshot(store: GridStore): GridSnapshot {
  const subscribe = useCallback((listener: () => void) => store.subscribe(listener), [store]);
  const getSnapshot = useCallback(() => store.getSnapshot(), [store]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
