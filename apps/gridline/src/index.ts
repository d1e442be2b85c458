export { composeText } from './grid/compose';
export { CursorStateMachine, blinkTimingFor } from './grid/cursorState';
export type { BlinkTiming, CursorPhase, CursorStateOptions } from './grid/cursorState';
export { BLANK_CELL, Grid } from './grid/grid';
export type { Cell, Row } from './grid/grid';
export { GridRegistry } from './grid/gridRegistry';
export type { FloatPosition, GridHit, Placement, VisibleGrid } from './grid/gridRegistry';
export { GridStore } from './grid/gridStore';
export type {
  ConnectionState,
  CursorSnapshot,
  GridSnapshot,
  GridStoreOptions,
  PopupMenuSnapshot,
} from './grid/gridStore';
export { DEFAULT_ATTRIBUTES, HighlightTable, createAttributes, invertColor } from './grid/highlightTable';
export type { CursorColors, ResolvedColors } from './grid/highlightTable';
export { ResizeNegotiator } from './grid/resizeNegotiator';
export type { GridSize, ResizeNegotiatorOptions, Scheduler } from './grid/resizeNegotiator';
export { ScreenState } from './grid/screenState';
export type { CursorPosition, PopupMenuState, ScreenStateOptions, TablineState } from './grid/screenState';
export { useGridSnapshot } from './hooks/useGridSnapshot';
export { loadConfig } from './lib/config';
export type { BackgroundState, GridlineConfig } from './lib/config';
export { ProtocolError, TransportClosedError } from './lib/errors';
export { createLogger } from './lib/logger';
export type { Logger, LoggerOptions } from './lib/logger';
export { encodeKey, encodeModifiers, encodeText } from './protocol/keys';
export type { KeyInput, KeyModifiers } from './protocol/keys';
export { decodeRedrawBatch } from './protocol/redraw';
export type { DecodeOptions } from './protocol/redraw';
export * from './protocol/types';
export { UiSession } from './session/uiSession';
export type { MouseInput, UiSessionOptions } from './session/uiSession';
export { NvimTransport } from './transport/nvimTransport';
export type { AttachOptions, NvimTransportEventMap, RpcChannel } from './transport/nvimTransport';
export { channelFromClient, spawnEditor } from './transport/spawn';
export type { SpawnedEditor } from './transport/spawn';
