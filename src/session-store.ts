// Voice Assistant - Session Store
// Owns every conversation history, keyed by the client-generated session id.
//
// Session data lives in server memory only. Entries are created lazily on first
// access, bounded by a sliding window, and removed only by an explicit clear.

import type { ConversationTurn, SessionInfo, TurnRole } from "./types.js";

const DEFAULT_MAX_TURNS = 50;

interface SessionEntry {
  turns: ConversationTurn[];
  createdAt: Date;
  lastActivityAt: Date;
}

export interface SessionStoreOptions {
  /** Maximum stored turns per session (user and assistant turns both count). */
  maxTurns?: number;
  /** Clock override for tests. */
  now?: () => Date;
}

function makeTurn(role: TurnRole, text: string): ConversationTurn {
  return Object.freeze({ role, text });
}

export class SessionStore {
  private readonly sessions: Map<string, SessionEntry> = new Map();
  /** Tail of the per-session task chain used by runExclusive(). */
  private readonly tails: Map<string, Promise<void>> = new Map();
  private readonly maxTurns: number;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    if (!Number.isInteger(maxTurns) || maxTurns < 2) {
      throw new Error(`maxTurns must be an integer >= 2, got ${maxTurns}`);
    }
    this.maxTurns = maxTurns;
    this.now = options.now ?? (() => new Date());
  }

  get maxHistoryTurns(): number {
    return this.maxTurns;
  }

  /**
   * Returns a snapshot of the session's history, oldest turn first.
   * An unseen session id gets a new, empty history.
   */
  getHistory(sessionId: string): readonly ConversationTurn[] {
    return [...this.getOrCreate(sessionId).turns];
  }

  /**
   * Appends a user turn and the assistant's reply, then trims the window.
   * @returns The session's turn count after trimming.
   */
  append(sessionId: string, userText: string, replyText: string): number {
    const entry = this.getOrCreate(sessionId);
    entry.turns.push(makeTurn("user", userText), makeTurn("assistant", replyText));
    this.trim(entry.turns);
    entry.lastActivityAt = this.now();
    return entry.turns.length;
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  turnCount(sessionId: string): number {
    return this.sessions.get(sessionId)?.turns.length ?? 0;
  }

  sessionInfo(sessionId: string): SessionInfo {
    const entry = this.sessions.get(sessionId);
    return {
      sessionId,
      turnCount: entry?.turns.length ?? 0,
      createdAt: entry?.createdAt ?? null,
      lastActivityAt: entry?.lastActivityAt ?? null,
    };
  }

  /** Number of sessions currently held. */
  size(): number {
    return this.sessions.size;
  }

  /**
   * Runs `task` once every task queued earlier for the same session has settled.
   * Tasks for different sessions never wait on each other, and a task that
   * rejects does not hold up the ones queued after it.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails.set(sessionId, done);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(sessionId) === done) {
        this.tails.delete(sessionId);
      }
    }
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private getOrCreate(sessionId: string): SessionEntry {
    let entry = this.sessions.get(sessionId);
    if (!entry) {
      const createdAt = this.now();
      entry = { turns: [], createdAt, lastActivityAt: createdAt };
      this.sessions.set(sessionId, entry);
    }
    return entry;
  }

  /**
   * Drops the oldest turns beyond the window. A window never opens on an
   * assistant turn, so an odd bound keeps one turn fewer.
   */
  private trim(turns: ConversationTurn[]): void {
    const overflow = turns.length - this.maxTurns;
    if (overflow > 0) {
      turns.splice(0, overflow);
    }
    while (turns.length > 0 && turns[0]?.role === "assistant") {
      turns.shift();
    }
  }
}
