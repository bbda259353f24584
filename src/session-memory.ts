import type { Session, Turn, TurnRole } from "./types";

export interface SessionMemoryOptions {
  /** Maximum turns kept per session (default 10). */
  maxTurns?: number;
  /** Optional cap on the summed text length of kept turns. */
  maxChars?: number;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

/**
 * Per-session rolling conversation history.
 *
 * Sessions are created on first reference and never torn down here; the
 * caller owns their lifetime. On overflow the oldest turns are evicted first,
 * but the newest turn is always kept. Turns are appended in the order calls
 * complete, so callers must not overlap requests for the same session when
 * strict ordering matters.
 */
export class SessionMemory {
  private readonly sessions = new Map<string, Session>();
  private readonly maxTurns: number;
  private readonly maxChars?: number;
  private readonly now: () => Date;

  public constructor(opts: SessionMemoryOptions = {}) {
    this.maxTurns = Math.max(1, Math.floor(opts.maxTurns ?? 10));
    this.maxChars = opts.maxChars !== undefined && opts.maxChars > 0 ? opts.maxChars : undefined;
    this.now = opts.now ?? (() => new Date());
  }

  /** Ordered turns of a session (a copy; empty for a new session). */
  public getHistory(sessionId: string): readonly Turn[] {
    return [...this.session(sessionId).turns];
  }

  public append(sessionId: string, role: TurnRole, text: string): Turn {
    const session = this.session(sessionId);
    const turn: Turn = Object.freeze({ role, text, timestamp: this.now().toISOString() });
    session.turns.push(turn);
    this.truncate(session);
    return turn;
  }

  /** Record a completed question/answer pair. */
  public appendExchange(sessionId: string, question: string, answer: string): void {
    this.append(sessionId, "user", question);
    this.append(sessionId, "assistant", answer);
  }

  public has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  public size(): number {
    return this.sessions.size;
  }

  private session(sessionId: string): Session {
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { sessionId, createdAt: this.now().toISOString(), turns: [] };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  private truncate(session: Session): void {
    const { turns } = session;
    if (turns.length > this.maxTurns) turns.splice(0, turns.length - this.maxTurns);
    if (this.maxChars === undefined) return;
    let total = turns.reduce((sum, t) => sum + t.text.length, 0);
    while (turns.length > 1 && total > this.maxChars) {
      const evicted = turns.shift();
      total -= evicted?.text.length ?? 0;
    }
  }
}
