import type { Express } from "express";
import type { Server } from "http";
import { WebSocketServer } from "ws";
import { registerProfilingRoutes } from "./routes/profiling.routes";
import { registerTtsRoutes } from "./routes/tts.routes";
import type { AppServices } from "./services";

export const COACH_WS_PATH = "/ws/coach";

export function registerRoutes(
  httpServer: Server,
  app: Express,
  services: AppServices,
): WebSocketServer {
  // WebSocket server for voice coaching sessions
  const wss = new WebSocketServer({ server: httpServer, path: COACH_WS_PATH });

  wss.on("connection", (ws, req) => {
    console.log(`[WebSocket] New connection on ${COACH_WS_PATH}`);
    services.sessions.handleConnection(ws, req);
  });

  wss.on("error", (error) => {
    console.error("[WebSocket] Server error:", error);
  });

  registerProfilingRoutes(
    app,
    services.profilingStore,
    services.config.PROFILING_SESSION_MAX_AGE_MS,
  );
  registerTtsRoutes(app, services.synthesizer, services.config.DEFAULT_VOICE);

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      voiceSessions: services.sessions.size,
      profilingSessions: services.profilingStore.size,
    });
  });

  return wss;
}
