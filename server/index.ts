import express from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { registerRoutes } from "./routes";
import { createServices } from "./services";

const config = loadConfig();
const services = createServices(config);

const app = express();
app.use(express.json({ limit: "1mb" }));

const httpServer = createServer(app);
const wss = registerRoutes(httpServer, app, services);

// Periodic cleanup of abandoned text-mode profiling sessions
const profilingCleanup = setInterval(() => {
  const removed = services.profilingStore.cleanup(config.PROFILING_SESSION_MAX_AGE_MS);
  if (removed > 0) {
    console.log(`[Profiling] Cleanup removed ${removed} expired session(s)`);
  }
}, 10 * 60_000);
profilingCleanup.unref();

httpServer.listen(config.PORT, () => {
  console.log(`[Server] Listening on port ${config.PORT} (${config.NODE_ENV})`);
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, shutting down`);
  clearInterval(profilingCleanup);
  services.sessions.shutdown();
  wss.close();
  httpServer.close((error) => {
    if (error) {
      console.error("[Server] Error during shutdown:", error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
