import type { Express } from "express";
import { fromError } from "zod-validation-error";
import { profilingMessageBodySchema } from "@shared/schema";
import type { ProfilingSessionStore, StoredProfilingSession } from "../profiling/session-store";

function describeSession(session: StoredProfilingSession) {
  return {
    sessionId: session.id,
    state: session.profiling.state,
    profilingComplete: session.profiling.completed,
    createdAt: new Date(session.createdAt).toISOString(),
    updatedAt: new Date(session.updatedAt).toISOString(),
    messageCount: session.history.length,
  };
}

/** Text-mode profiling: the same state machine as the voice session, over REST. */
export function registerProfilingRoutes(
  app: Express,
  store: ProfilingSessionStore,
  sessionMaxAgeMs: number,
) {
  app.post("/api/profiling/start", (_req, res) => {
    try {
      const session = store.create();
      const greeting = session.history[session.history.length - 1];
      res.json({
        sessionId: session.id,
        message: greeting?.text ?? "",
        state: session.profiling.state,
      });
    } catch (error) {
      console.error("[Profiling] Error creating session:", error);
      res.status(500).json({ message: "Failed to start profiling session" });
    }
  });

  app.post("/api/profiling/message", (req, res) => {
    try {
      const parseResult = profilingMessageBodySchema.safeParse(req.body);
      if (!parseResult.success) {
        const errorMessage = fromError(parseResult.error).toString();
        return res.status(400).json({ message: errorMessage });
      }

      const { sessionId, message } = parseResult.data;
      const outcome = store.processMessage(sessionId, message);

      switch (outcome.status) {
        case "not_found":
          return res.status(404).json({ message: "Session not found" });
        case "empty":
          return res.status(400).json({ message: "Message cannot be empty" });
        case "ok": {
          const { session, turn } = outcome;
          return res.json({
            sessionId,
            aiMessage: turn.prompt,
            state: session.profiling.state,
            profilingComplete: session.profiling.completed,
            ...(session.profiling.completed
              ? { profile: session.profiling.profile, interviewContext: session.interviewContext }
              : {}),
          });
        }
      }
    } catch (error) {
      console.error("[Profiling] Error processing message:", error);
      res.status(500).json({ message: "Failed to process message" });
    }
  });

  app.get("/api/profiling/status/:sessionId", (req, res) => {
    const session = store.get(req.params.sessionId);
    if (!session) {
      return res.status(404).json({ message: "Session not found" });
    }
    res.json({
      ...describeSession(session),
      profile: session.profiling.completed ? session.profiling.profile : null,
      interviewContext: session.interviewContext,
      history: session.history.map((entry) => ({
        ...entry,
        timestamp: new Date(entry.timestamp).toISOString(),
      })),
    });
  });

  app.get("/api/profiling/sessions", (_req, res) => {
    const sessions = store.list().map(describeSession);
    res.json({ sessions, total: sessions.length });
  });

  app.post("/api/profiling/cleanup", (_req, res) => {
    try {
      const cleaned = store.cleanup(sessionMaxAgeMs);
      res.json({ cleanedSessions: cleaned, remainingSessions: store.size });
    } catch (error) {
      console.error("[Profiling] Cleanup failed:", error);
      res.status(500).json({ message: "Failed to clean up sessions" });
    }
  });

  app.get("/api/profiling/health", (_req, res) => {
    res.json({ status: "healthy", activeSessions: store.size });
  });
}
