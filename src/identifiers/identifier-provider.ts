import { logger } from '../application-logger';
import { DEFAULT_SESSION_TIMEOUT_MS, SESSION_STORAGE_KEY } from '../constants';
import { KVStore, MemoryStore } from '../kvstore';

import { ActivityScope, parseActivityScope } from './activity-scope';
import { generateId } from './generate-id';
import { ScopeState, cloneScopeState, isScopeState, newScopeState } from './scope-state';

export type IdentifierProviderOptions = {
  // where session state is kept between runs; defaults to process memory
  store?: KVStore<unknown>;
  // idle time after which the session (and the pageview with it) is regenerated
  sessionTimeoutMs?: number;
  generateId?: () => string;
  now?: () => number;
};

/**
 * Hands out the session, pageview and activity identifiers embedded in event payloads.
 *
 * Activity identifiers are the scope identifier followed by a four-digit hex sequence number. The
 * first request for an activity name in a scope is assigned that scope's generation counter,
 * which is then incremented; later requests for the same name reuse the number until
 * {@link resetActivity} is called.
 */
export default class IdentifierProvider {
  private readonly store: KVStore<unknown>;
  private readonly sessionTimeoutMs: number;
  private readonly generateId: () => string;
  private readonly now: () => number;

  private session: ScopeState | null = null;
  private pageview: ScopeState | null = null;
  private lastSessionAccess = 0;

  constructor(options: IdentifierProviderOptions = {}) {
    this.store = options.store ?? new MemoryStore<unknown>();
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.generateId = options.generateId ?? generateId;
    this.now = options.now ?? Date.now;
  }

  sessionId(): string {
    return this.sessionState().id;
  }

  pageviewId(): string {
    return this.pageviewState().id;
  }

  /** Starts a new pageview; pageview-scoped activity numbering restarts. */
  newPageview(): string {
    this.pageview = newScopeState(this.generateId());
    return this.pageview.id;
  }

  /**
   * Returns the identifier of the named activity within the given scope (`session` or
   * `pageview`), or null for any other scope name.
   */
  activityId(name: string, scopeName: string): string | null {
    const scope = parseActivityScope(scopeName);
    if (scope === null) {
      logger.debug(`[IdentifierProvider] Unknown activity scope "${scopeName}".`);
      return null;
    }

    const state = scope === ActivityScope.Session ? this.sessionState() : this.pageviewState();
    if (!Object.hasOwn(state.activities, name)) {
      state.activities[name] = state.generation;
      state.generation++;
      if (scope === ActivityScope.Session) {
        this.persistSession(state);
      }
    }
    const sequenceNumber = state.activities[name];
    return `${state.id}${sequenceNumber.toString(16).padStart(4, '0')}`;
  }

  /**
   * Forgets the sequence number of the named activity so the next {@link activityId} call assigns
   * a new one. An activity lives in a single scope, so the pageview is checked first and the
   * session only if the name was not found there.
   */
  resetActivity(name: string): void {
    const pageview = this.pageviewState();
    if (Object.hasOwn(pageview.activities, name)) {
      delete pageview.activities[name];
      return;
    }

    const session = this.sessionState();
    if (Object.hasOwn(session.activities, name)) {
      delete session.activities[name];
      this.persistSession(session);
    }
  }

  private sessionState(): ScopeState {
    const now = this.now();
    if (this.session === null) {
      this.session = this.loadSession();
    } else if (now - this.lastSessionAccess >= this.sessionTimeoutMs) {
      logger.info('[IdentifierProvider] Session expired, starting a new session and pageview.');
      this.session = newScopeState(this.generateId());
      this.pageview = newScopeState(this.generateId());
      this.persistSession(this.session);
    }
    this.lastSessionAccess = now;
    return this.session;
  }

  private pageviewState(): ScopeState {
    if (this.pageview === null) {
      this.pageview = newScopeState(this.generateId());
    }
    return this.pageview;
  }

  private loadSession(): ScopeState {
    const stored = this.store.get(SESSION_STORAGE_KEY);
    if (isScopeState(stored)) {
      return cloneScopeState(stored);
    }
    if (stored !== null) {
      logger.warn('[IdentifierProvider] Stored session state is malformed, regenerating.');
    }
    const session = newScopeState(this.generateId());
    this.persistSession(session);
    return session;
  }

  private persistSession(session: ScopeState): void {
    this.store.set(SESSION_STORAGE_KEY, cloneScopeState(session));
  }
}
