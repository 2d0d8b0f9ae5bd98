import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createTickerApp, type TickerApp } from '../../src/app.js';
import { RETRY_PROMPT, invalidSymbolPrompt } from '../../src/feed/connection.js';
import type { TransportFactory } from '../../src/feed/transport.js';
import type { Prompter } from '../../src/prompt/prompter.js';
import { createMemoryStore, type KeyValueStore } from '../../src/storage/key-value-store.js';
import { fakePrompter, fakeTransport, pendingPrompter, silentLogger } from '../helpers/fakes.js';

const ENDPOINT = 'wss://feed.test';
const URL_WITH_KEY = 'wss://feed.test/?token=test-key';

function build(prompter: Prompter, transport: TransportFactory, store: KeyValueStore = createMemoryStore()): TickerApp {
  return createTickerApp({
    endpoint: ENDPOINT,
    store,
    prompter,
    log: silentLogger(),
    transport,
    now: () => 1234,
  });
}

async function track(app: TickerApp, ...symbols: string[]) {
  for (const s of symbols) {
    app.controller.updatePendingSymbol(s);
    await app.controller.trackSymbol();
  }
}

describe('FeedConnection', () => {
  let t: ReturnType<typeof fakeTransport>;

  beforeEach(() => {
    t = fakeTransport();
  });

  describe('connect / open', () => {
    it('opens with the API key as token and moves to connecting', async () => {
      const { prompter } = fakePrompter();
      const app = build(prompter, t.factory);
      await app.controller.updateApiKey('test-key');

      await app.controller.connect();

      expect(t.factory).toHaveBeenCalledTimes(1);
      expect(t.last().url).toBe(URL_WITH_KEY);
      expect(app.feed.status().state).toEqual({ status: 'connecting', url: 'wss://feed.test/?token=***' });
      expect(app.feed.isConnected()).toBe(false);
    });

    it('subscribes every tracked entry, in order, once open', async () => {
      const { prompter } = fakePrompter();
      const app = build(prompter, t.factory);
      await track(app, 'AAPL', 'TSLA', 'MSFT');
      await app.controller.untrackAt(1);

      await app.controller.connect();
      t.last().open();
      await app.loop.idle();

      expect(app.feed.isConnected()).toBe(true);
      expect(t.last().requests()).toEqual([
        { type: 'subscribe', symbol: 'AAPL' },
        { type: 'subscribe', symbol: 'MSFT' },
      ]);
    });

    it('does not deduplicate subscriptions', async () => {
      const { prompter } = fakePrompter();
      const app = build(prompter, t.factory);
      await track(app, 'AAPL', 'AAPL');

      await app.controller.connect();
      t.last().open();
      await app.loop.idle();

      expect(t.last().requests()).toEqual([
        { type: 'subscribe', symbol: 'AAPL' },
        { type: 'subscribe', symbol: 'AAPL' },
      ]);
    });

    it('alerts and stays disconnected when the transport cannot be built', async () => {
      const { prompter, alert, confirm } = fakePrompter();
      const failing: TransportFactory = () => { throw new Error('Invalid URL: nope'); };
      const app = build(prompter, failing);

      await app.controller.connect();

      expect(alert).toHaveBeenCalledTimes(1);
      expect(alert).toHaveBeenCalledWith('Invalid URL: nope');
      expect(confirm).not.toHaveBeenCalled();
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });

    it('alerts on a malformed endpoint', async () => {
      const { prompter, alert } = fakePrompter();
      const app = createTickerApp({
        endpoint: 'not a url',
        store: null,
        prompter,
        log: silentLogger(),
        transport: t.factory,
      });

      await app.controller.connect();

      expect(t.factory).not.toHaveBeenCalled();
      expect(alert).toHaveBeenCalledTimes(1);
      expect(app.feed.status().state.status).toBe('disconnected');
    });

    it('replaces a live connection and resubscribes on a second connect', async () => {
      const { prompter, confirm } = fakePrompter();
      const app = build(prompter, t.factory);
      await track(app, 'AAPL');
      await app.controller.connect();
      const first = t.last();
      first.open();
      await app.loop.idle();

      await app.controller.connect();
      const second = t.last();
      second.open();
      first.drop();
      await app.loop.idle();

      expect(t.sockets).toHaveLength(2);
      expect(first.closed).toBe(true);
      expect(second.closed).toBe(false);
      expect(second.requests()).toEqual([{ type: 'subscribe', symbol: 'AAPL' }]);
      expect(confirm).not.toHaveBeenCalled();
      expect(app.feed.isConnected()).toBe(true);
    });
  });

  describe('inbound frames', () => {
    async function connected(prompter: Prompter, store: KeyValueStore = createMemoryStore()) {
      const app = build(prompter, t.factory, store);
      await app.controller.connect();
      t.last().open();
      await app.loop.idle();
      return app;
    }

    it('stores a trade and persists', async () => {
      const { prompter } = fakePrompter();
      const store = createMemoryStore();
      const app = await connected(prompter, store);
      const write = vi.spyOn(store, 'store');

      t.last().receive({ type: 'trade', data: [{ s: 'AAPL', p: 101.5, v: 10, t: 1690000000000 }] });
      await app.loop.idle();

      expect(app.session.history.get('AAPL')).toEqual([
        { symbol: 'AAPL', price: 101.5, volume: 10, timestamp: 1690000000000 },
      ]);
      expect(write).toHaveBeenCalledTimes(1);
      expect(app.feed.status().lastMessageAt).toBe(1234);
    });

    it('keeps batch order: later ticks end up in front', async () => {
      const { prompter } = fakePrompter();
      const app = await connected(prompter);

      t.last().receive({
        type: 'trade',
        data: [
          { s: 'AAPL', p: 1, v: 1, t: 30 },
          { s: 'MSFT', p: 5, v: 1, t: 10 },
          { s: 'AAPL', p: 2, v: 1, t: 20 },
        ],
      });
      await app.loop.idle();

      expect(app.session.history.get('AAPL')?.map((r) => r.price)).toEqual([2, 1]);
      expect(app.session.history.get('MSFT')?.map((r) => r.price)).toEqual([5]);
    });

    it('drops malformed frames without prompting or persisting', async () => {
      const { prompter, confirm, alert } = fakePrompter();
      const store = createMemoryStore();
      const app = await connected(prompter, store);
      const write = vi.spyOn(store, 'store');

      t.last().receive('{"type":"trade","data":"nope"}');
      t.last().receive('<html>');
      await app.loop.idle();

      expect(write).not.toHaveBeenCalled();
      expect(confirm).not.toHaveBeenCalled();
      expect(alert).not.toHaveBeenCalled();
      expect(app.feed.isConnected()).toBe(true);
    });

    it('only records the time of a ping', async () => {
      const { prompter } = fakePrompter();
      const store = createMemoryStore();
      const app = await connected(prompter, store);
      const write = vi.spyOn(store, 'store');

      t.last().receive({ type: 'ping' });
      await app.loop.idle();

      expect(app.feed.status().lastPingAt).toBe(1234);
      expect(write).not.toHaveBeenCalled();
      expect(app.feed.isConnected()).toBe(true);
    });

    it('asks once about the last added symbol on "Invalid symbol" and removes it without unsubscribing', async () => {
      const { prompter, confirm } = fakePrompter([true]);
      const app = build(prompter, t.factory);
      await track(app, 'AAPL', 'ZZZZ');
      await app.controller.connect();
      t.last().open();
      await app.loop.idle();

      t.last().receive({ type: 'error', msg: 'Invalid symbol' });
      await app.loop.idle();

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(confirm.mock.calls[0][0]).toBe(invalidSymbolPrompt('ZZZZ'));
      expect(confirm.mock.calls[0][0]).toContain('[ZZZZ]');
      expect(app.session.tracked.entries()).toEqual(['AAPL']);
      expect(t.last().requests()).toEqual([
        { type: 'subscribe', symbol: 'AAPL' },
        { type: 'subscribe', symbol: 'ZZZZ' },
      ]);
      expect(app.feed.status().state).toMatchObject({ status: 'connected', awaiting: null });
    });

    it('keeps the symbol when the user declines', async () => {
      const { prompter, confirm } = fakePrompter([false]);
      const app = build(prompter, t.factory);
      await track(app, 'ZZZZ');
      await app.controller.connect();
      t.last().open();

      t.last().receive({ type: 'error', msg: 'Invalid symbol' });
      await app.loop.idle();

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(app.session.tracked.entries()).toEqual(['ZZZZ']);
    });

    it('shows the awaiting state while the invalid-symbol question is open', async () => {
      const { prompter, confirm } = pendingPrompter();
      const app = build(prompter, t.factory);
      await track(app, 'ZZZZ');
      await app.controller.connect();
      t.last().open();

      t.last().receive({ type: 'error', msg: 'Invalid symbol' });
      await vi.waitFor(() => expect(confirm).toHaveBeenCalledTimes(1));

      expect(app.feed.status().state).toMatchObject({ status: 'connected', awaiting: 'untrack-invalid' });

      app.controller.disconnect();
      await app.loop.idle();
      expect(app.session.tracked.entries()).toEqual(['ZZZZ']);
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });

    it('only logs other errors, and ignores "Invalid symbol" with nothing tracked', async () => {
      const { prompter, confirm } = fakePrompter([true]);
      const app = await connected(prompter);

      t.last().receive({ type: 'error', msg: 'Subscribing to too many symbols' });
      t.last().receive({ type: 'error', msg: 'Invalid symbol' });
      await app.loop.idle();

      expect(confirm).not.toHaveBeenCalled();
      expect(app.feed.isConnected()).toBe(true);
    });
  });

  describe('drops and retry', () => {
    it('asks to retry when the connection closes, and reconnects on yes', async () => {
      const { prompter, confirm } = fakePrompter([true]);
      const app = build(prompter, t.factory);
      await app.controller.updateApiKey('test-key');
      await track(app, 'AAPL');
      await app.controller.connect();
      const first = t.last();
      first.open();

      first.drop(1006, 'gone');
      await app.loop.idle();

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(confirm.mock.calls[0][0]).toBe(RETRY_PROMPT);
      expect(first.closed).toBe(true);
      expect(t.sockets).toHaveLength(2);
      expect(t.last().url).toBe(URL_WITH_KEY);
      expect(app.feed.status()).toMatchObject({ state: { status: 'connecting' }, reconnects: 1 });

      t.last().open();
      await app.loop.idle();
      expect(t.last().requests()).toEqual([{ type: 'subscribe', symbol: 'AAPL' }]);
    });

    it('stays disconnected on no', async () => {
      const { prompter, confirm } = fakePrompter([false]);
      const app = build(prompter, t.factory);
      await app.controller.connect();

      t.last().fail(new Error('handshake refused'));
      await app.loop.idle();

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(t.sockets).toHaveLength(1);
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });

    it('prompts once for an error followed by a close on the same socket', async () => {
      const { prompter, confirm } = fakePrompter([false]);
      const app = build(prompter, t.factory);
      await app.controller.connect();
      t.last().open();

      t.last().fail();
      t.last().drop();
      await app.loop.idle();

      expect(confirm).toHaveBeenCalledTimes(1);
    });

    it('disconnect cancels an open retry question', async () => {
      const { prompter, confirm } = pendingPrompter();
      const app = build(prompter, t.factory);
      await app.controller.connect();
      t.last().drop();
      await vi.waitFor(() => expect(confirm).toHaveBeenCalledTimes(1));
      expect(app.feed.status().state).toEqual({ status: 'awaiting-retry', cause: 'close' });

      app.controller.disconnect();
      await app.loop.idle();

      expect(t.sockets).toHaveLength(1);
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });
  });

  describe('disconnect', () => {
    it('closes the socket without asking and ignores its late events', async () => {
      const { prompter, confirm } = fakePrompter([true]);
      const app = build(prompter, t.factory);
      await app.controller.connect();
      const socket = t.last();
      socket.open();
      await app.loop.idle();

      app.controller.disconnect();
      socket.drop();
      socket.receive({ type: 'trade', data: [{ s: 'AAPL', p: 1, v: 1, t: 1 }] });
      await app.loop.idle();

      expect(socket.closed).toBe(true);
      expect(confirm).not.toHaveBeenCalled();
      expect(app.session.history.get('AAPL')).toBeUndefined();
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });

    it('cancels a connect that has not run yet', async () => {
      const { prompter } = fakePrompter();
      const app = build(prompter, t.factory);

      const pending = app.controller.connect();
      app.controller.disconnect();
      await pending;
      await app.loop.idle();

      expect(t.factory).not.toHaveBeenCalled();
      expect(app.feed.status().state).toEqual({ status: 'disconnected' });
    });

    it('still honours a connect issued after the disconnect', async () => {
      const { prompter } = fakePrompter();
      const app = build(prompter, t.factory);

      void app.controller.connect();
      app.controller.disconnect();
      await app.controller.connect();

      expect(t.factory).toHaveBeenCalledTimes(1);
      expect(app.feed.status().state).toMatchObject({ status: 'connecting' });
    });
  });

  it('notifies listeners until they unsubscribe', async () => {
    const { prompter } = fakePrompter();
    const app = build(prompter, t.factory);
    const seen: string[] = [];
    const off = app.feed.onChange((s) => seen.push(s.state.status));

    await app.controller.connect();
    t.last().open();
    await app.loop.idle();
    off();
    app.controller.disconnect();

    expect(seen).toEqual(['connecting', 'connected']);
  });
});
