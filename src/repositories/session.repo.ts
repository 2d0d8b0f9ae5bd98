import type { Logger } from '../logger.js';
import { PersistedSessionSchema } from '../domain/schemas.js';
import type { KeyValueStore } from '../storage/key-value-store.js';
import { SessionState } from '../state/session-state.js';

/**
 * Loads the session once and writes it back whole after each mutation.
 * Without a store it runs in memory only.
 */
export class SessionRepository {
  constructor(
    private readonly store: KeyValueStore | null,
    private readonly key: string,
    private readonly log: Logger,
  ) {
    if (!store) {
      this.log.warn('Local storage is disabled, nothing will be saved.');
    }
  }

  get persistent(): boolean {
    return this.store !== null;
  }

  restore(): SessionState {
    if (!this.store) return SessionState.empty();

    let raw: string | null;
    try {
      raw = this.store.restore(this.key);
    } catch (err) {
      this.log.warn({ err, key: this.key }, 'session restore failed; starting empty');
      return SessionState.empty();
    }
    if (raw === null) return SessionState.empty();

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err, key: this.key }, 'stored session is not JSON; starting empty');
      return SessionState.empty();
    }

    const parsed = PersistedSessionSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ key: this.key, issues: parsed.error.flatten() }, 'stored session is malformed; starting empty');
      return SessionState.empty();
    }

    const state = SessionState.fromSnapshot(parsed.data);
    this.log.info(
      { key: this.key, tracked: state.tracked.size, symbolsWithHistory: state.history.symbols().length },
      'session restored',
    );
    return state;
  }

  persist(state: SessionState): void {
    if (!this.store) return;
    try {
      this.store.store(this.key, JSON.stringify(state.toSnapshot()));
    } catch (err) {
      // e.g. QuotaExceededError; the in-memory session stays authoritative
      this.log.warn({ err, key: this.key }, 'session persist failed');
    }
  }
}
