import WebSocket from 'ws';

export type TransportHandlers = {
  onOpen(): void;
  onMessage(text: string): void;
  onError(err: Error): void;
  onClose(code: number, reason: string): void;
};

/** One live socket. `close` also detaches the handlers. */
export interface FeedTransport {
  send(text: string): void;
  close(): void;
}

/** Must throw synchronously when the transport cannot be built (e.g. malformed URL). */
export type TransportFactory = (url: string, handlers: TransportHandlers) => FeedTransport;

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

function rawToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export const wsTransport: TransportFactory = (url, handlers) => {
  let ws: WebSocket;
  try {
    ws = new WebSocket(url);
  } catch (err) {
    throw new TransportError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawToText(data)));
  ws.on('error', (err) => handlers.onError(err));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));

  return {
    send: (text) => ws.send(text),
    close: () => {
      ws.removeAllListeners();
      // keep a late socket error from surfacing as an unhandled 'error' event
      ws.on('error', () => undefined);
      if (ws.readyState === WebSocket.CONNECTING) ws.terminate();
      else if (ws.readyState === WebSocket.OPEN) ws.close(1000, 'client disconnect');
    },
  };
};
