import type { ConversationTurn } from "../intent/types.js";

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * In-memory conversation history, one bounded FIFO per session id.
 * At most `maxSessions` sessions are kept; appending to a new session past
 * that drops the one written least recently. Nothing here outlives the process.
 */
export class SessionStore {
  // Map order is recency order: oldest write first
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(
    private readonly maxTurns = 10,
    private readonly maxSessions = 1000,
  ) {
    assertPositiveInteger("maxTurns", maxTurns);
    assertPositiveInteger("maxSessions", maxSessions);
  }

  append(sessionId: string, turn: ConversationTurn): void {
    const turns = this.sessions.get(sessionId) ?? [];
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, turns);

    turns.push(turn);
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns);
    }
    this.evictOverflow();
  }

  history(sessionId: string): ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  private evictOverflow(): void {
    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) return;
      this.sessions.delete(sessionId);
    }
  }

  /**
   * Runs `task` once every earlier task for the same session has settled.
   * Tasks for different sessions do not wait on each other.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(sessionId, settled);
    try {
      return await current;
    } finally {
      if (this.locks.get(sessionId) === settled) {
        this.locks.delete(sessionId);
      }
    }
  }
}
