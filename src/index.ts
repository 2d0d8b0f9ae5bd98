export { createTickerApp, type TickerApp, type TickerAppOptions } from './app.js';
export { SessionController } from './controller.js';
export { loadConfig, ConfigError, type ClientConfig } from './config.js';
export { createLogger, logger, type Logger } from './logger.js';
export { EventLoop } from './events/event-loop.js';
export {
  FeedConnection,
  RETRY_PROMPT,
  invalidSymbolPrompt,
  type FeedState,
  type FeedStatus,
} from './feed/connection.js';
export { decodeMessage, encodeRequest, type DecodeResult } from './feed/codec.js';
export {
  wsTransport,
  TransportError,
  type FeedTransport,
  type TransportFactory,
  type TransportHandlers,
} from './feed/transport.js';
export type { Prompter } from './prompt/prompter.js';
export { SessionRepository } from './repositories/session.repo.js';
export { HistoryCache, MAX_HISTORY } from './state/history-cache.js';
export { TrackedSymbolSet, type UntrackResult } from './state/tracked-symbols.js';
export { SessionState } from './state/session-state.js';
export { createFileStore } from './storage/file-store.js';
export {
  createMemoryStore,
  createWebStorageStore,
  openBrowserStore,
  type KeyValueStore,
  type WebStorageLike,
} from './storage/key-value-store.js';
export { symbolCards, tickerHealth, type SymbolCard, type TickerHealth } from './view/cards.js';
export type { TickerRecord, TickerSymbol, FeedMessage, FeedRequest, PersistedSession } from './domain/types.js';
