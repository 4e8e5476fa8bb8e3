import { randomUUID } from "crypto";
import type {
  InterviewContext,
  ProfilingSession,
  ProfilingState,
  ProfilingTurnResult,
} from "@shared/types/profiling";
import type { EntityExtractor } from "./entity-extractor";
import { buildInterviewContext } from "./interview-context";
import {
  createProfilingSession,
  getCurrentQuestion,
  processResponse,
} from "./state-machine";

export type ConversationEntry = {
  speaker: "coach" | "candidate";
  text: string;
  timestamp: number;
  state: ProfilingState;
};

export type StoredProfilingSession = {
  id: string;
  createdAt: number;
  updatedAt: number;
  profiling: ProfilingSession;
  history: ConversationEntry[];
  interviewContext: InterviewContext | null;
};

export type ProfilingMessageOutcome =
  | { status: "not_found" }
  | { status: "empty" }
  | {
      status: "ok";
      session: StoredProfilingSession;
      turn: ProfilingTurnResult;
    };

export const DEFAULT_SESSION_MAX_AGE_MS = 2 * 60 * 60_000;

/**
 * In-memory store for text-mode profiling conversations served over REST.
 * Sessions are independent; nothing is shared between them except the
 * read-only extractor tables.
 */
export class ProfilingSessionStore {
  private readonly sessions = new Map<string, StoredProfilingSession>();

  constructor(
    private readonly extractor: EntityExtractor,
    private readonly now: () => number = Date.now,
  ) {}

  create(): StoredProfilingSession {
    const timestamp = this.now();
    const profiling = createProfilingSession();
    const session: StoredProfilingSession = {
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
      profiling,
      history: [],
      interviewContext: null,
    };
    const greeting = getCurrentQuestion(profiling.state);
    if (greeting) {
      session.history.push({
        speaker: "coach",
        text: greeting,
        timestamp,
        state: profiling.state,
      });
    }
    this.sessions.set(session.id, session);
    console.log(`[Profiling] Created text session ${session.id}`);
    return session;
  }

  get(id: string): StoredProfilingSession | undefined {
    return this.sessions.get(id);
  }

  list(): StoredProfilingSession[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  processMessage(id: string, message: string): ProfilingMessageOutcome {
    const session = this.sessions.get(id);
    if (!session) {
      return { status: "not_found" };
    }

    const turn = processResponse(session.profiling, message, this.extractor);
    if (!turn) {
      return { status: "empty" };
    }

    const timestamp = this.now();
    session.history.push({
      speaker: "candidate",
      text: message.trim(),
      timestamp,
      state: turn.previousState,
    });
    session.profiling = turn.session;
    session.updatedAt = timestamp;

    if (turn.effects.profilingCompleted) {
      session.interviewContext = buildInterviewContext(turn.session.profile);
      console.log(`[Profiling] Session ${id} completed profiling`);
    }
    if (turn.prompt) {
      session.history.push({
        speaker: "coach",
        text: turn.prompt,
        timestamp,
        state: turn.session.state,
      });
    }

    return { status: "ok", session, turn };
  }

  cleanup(maxAgeMs: number = DEFAULT_SESSION_MAX_AGE_MS): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.createdAt < cutoff) {
        this.sessions.delete(id);
        removed += 1;
        console.log(`[Profiling] Cleaned up expired session ${id}`);
      }
    }
    return removed;
  }
}
