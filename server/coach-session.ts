import WebSocket from "ws";
import type { IncomingMessage } from "http";
import { randomUUID } from "crypto";
import { fromError } from "zod-validation-error";
import {
  clientMessageSchema,
  turnModeSchema,
  type ClientMessage,
  type ServerEvent,
  type TerminationReason,
} from "@shared/schema";
import type { TurnMode } from "@shared/types/turn-state";
import type { EntityExtractor } from "./profiling/entity-extractor";
import { getCurrentQuestion } from "./profiling/state-machine";
import { resolveVoice } from "./providers/voice-catalog";
import { ClientMicrophone } from "./voice-session/client-microphone";
import { ClientPlayback } from "./voice-session/client-playback";
import { ClientTransport } from "./voice-session/client-transport";
import { SpeechOutput } from "./voice-session/speech-output";
import {
  TurnOrchestrator,
  type TurnVadOptions,
} from "./voice-session/turn-orchestrator";
import type {
  InterviewResponder,
  SpeechSynthesizer,
  TranscriptionProvider,
  VoiceSettings,
} from "./voice-session/types";

export type SessionHygieneOptions = {
  heartbeatTimeoutMs: number;
  idleTimeoutMs: number;
  maxAgeMs: number;
  watchdogIntervalMs: number;
  terminationWarningMs: number;
};

export const DEFAULT_SESSION_HYGIENE: SessionHygieneOptions = {
  heartbeatTimeoutMs: 90_000, // 3 missed 30s client pings
  idleTimeoutMs: 5 * 60_000,
  maxAgeMs: 60 * 60_000,
  watchdogIntervalMs: 30_000,
  terminationWarningMs: 30_000,
};

export type CoachSessionOptions = {
  hygiene: SessionHygieneOptions;
  defaultMode: TurnMode;
  voice: VoiceSettings;
  graceMs: number;
  playbackTimeoutMs: number;
  fallbackLang: string;
  preRollMs: number;
  vad: TurnVadOptions;
};

export type CoachSessionDependencies = {
  extractor: EntityExtractor;
  transcription: TranscriptionProvider;
  synthesizer: SpeechSynthesizer | null;
  interviewer: InterviewResponder;
};

type CoachSession = {
  sessionId: string;
  connectionId: string;
  clientWs: WebSocket | null;
  transport: ClientTransport;
  microphone: ClientMicrophone;
  playback: ClientPlayback;
  orchestrator: TurnOrchestrator;
  // Session hygiene tracking
  createdAt: number;
  lastHeartbeatAt: number;
  lastActivityAt: number;
  terminationWarned: boolean;
  clientDisconnectedAt: number | null;
};

const TERMINATION_MESSAGES: Record<TerminationReason, string> = {
  heartbeat_timeout: "Connection lost - no heartbeat received",
  idle_timeout: "Session ended due to inactivity",
  max_age_exceeded: "Maximum session duration reached",
  client_disconnected: "Connection closed - session will be cleaned up",
  server_shutdown: "The server is restarting",
};

function sendDirect(ws: WebSocket, event: ServerEvent): boolean {
  if (ws.readyState !== WebSocket.OPEN) return false;
  try {
    ws.send(JSON.stringify(event));
    return true;
  } catch (error) {
    console.warn(`[CoachSession] Failed to send ${event.type}: ${error}`);
    return false;
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Owns every live coaching session behind `/ws/coach`. A session outlives its
 * socket: when the client drops, outbound events are held and the client may
 * reconnect with the same sessionId until the heartbeat timeout passes.
 */
export class CoachSessionManager {
  private readonly sessions = new Map<string, CoachSession>();
  private watchdog: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly deps: CoachSessionDependencies,
    private readonly options: CoachSessionOptions,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  getOrchestrator(sessionId: string): TurnOrchestrator | undefined {
    return this.sessions.get(sessionId)?.orchestrator;
  }

  handleConnection(clientWs: WebSocket, req: IncomingMessage): void {
    // /ws/coach?sessionId=xxx&mode=auto|manual
    const url = new URL(req.url || "", `http://${req.headers.host ?? "localhost"}`);
    const sessionId = url.searchParams.get("sessionId");
    const modeParam = url.searchParams.get("mode");
    const modeResult = turnModeSchema.safeParse(modeParam);
    if (modeParam && !modeResult.success) {
      console.warn(`[CoachSession] Invalid mode "${modeParam}", using ${this.options.defaultMode}`);
    }
    const mode = modeResult.success ? modeResult.data : this.options.defaultMode;

    if (!sessionId || sessionId.length > 128) {
      clientWs.close(1008, "Session ID required");
      return;
    }

    const existing = this.sessions.get(sessionId);
    if (existing?.clientWs) {
      const wsState = existing.clientWs.readyState;

      if (wsState === WebSocket.OPEN) {
        console.log(`[CoachSession] Rejecting concurrent connection for session: ${sessionId}`);
        sendDirect(clientWs, {
          type: "error",
          code: "SESSION_ACTIVE_ELSEWHERE",
          message: "This session is already active in another tab or window",
        });
        clientWs.close(1008, "Session active elsewhere");
        return;
      }

      // Old socket still closing: ask the client to retry shortly
      sendDirect(clientWs, {
        type: "error",
        code: "SESSION_TRANSITIONING",
        message: "Session is transitioning. Please wait a moment and try again.",
        retryAfterMs: 1000,
      });
      clientWs.close(1013, "Session transitioning");
      return;
    }

    if (existing) {
      this.resumeSession(existing, clientWs);
      return;
    }

    this.createSession(sessionId, mode, clientWs);
  }

  runWatchdogCycle(now: number = this.now()): void {
    const { hygiene } = this.options;
    const toTerminate: Array<{ sessionId: string; reason: TerminationReason }> = [];
    const toWarn: CoachSession[] = [];

    for (const [sessionId, session] of Array.from(this.sessions.entries())) {
      const age = now - session.createdAt;
      const sinceHeartbeat = now - session.lastHeartbeatAt;
      const sinceActivity = now - session.lastActivityAt;

      let reason: TerminationReason | null = null;
      if (age > hygiene.maxAgeMs) {
        reason = "max_age_exceeded";
      } else if (session.clientDisconnectedAt !== null) {
        if (now - session.clientDisconnectedAt > hygiene.heartbeatTimeoutMs) {
          reason = "client_disconnected";
        }
      } else if (sinceHeartbeat > hygiene.heartbeatTimeoutMs) {
        reason = "heartbeat_timeout";
      } else if (sinceActivity > hygiene.idleTimeoutMs) {
        reason = "idle_timeout";
      }

      if (reason) {
        toTerminate.push({ sessionId, reason });
      } else if (!session.terminationWarned && session.clientDisconnectedAt === null) {
        const remaining = Math.min(
          hygiene.maxAgeMs - age,
          hygiene.idleTimeoutMs - sinceActivity,
          hygiene.heartbeatTimeoutMs - sinceHeartbeat,
        );
        if (remaining > 0 && remaining <= hygiene.terminationWarningMs) {
          toWarn.push(session);
        }
      }
    }

    for (const session of toWarn) {
      session.terminationWarned = true;
      session.transport.send({
        type: "session_warning",
        reason: "inactivity",
        message: "Your session will end soon due to inactivity. Please interact to keep it active.",
        timeoutMs: hygiene.terminationWarningMs,
      });
      console.log(`[SessionWatchdog] Warning sent to session: ${session.sessionId}`);
    }

    for (const { sessionId, reason } of toTerminate) {
      this.terminateSession(sessionId, reason);
    }
  }

  terminateSession(sessionId: string, reason: TerminationReason): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    console.log(`[SessionWatchdog] Terminating session ${sessionId} - reason: ${reason}`);
    session.transport.send({
      type: "session_terminated",
      reason,
      message: TERMINATION_MESSAGES[reason],
      canResume: false,
    });

    session.orchestrator.dispose();
    session.microphone.stop("session ended");
    session.transport.detach();
    if (session.clientWs) {
      session.clientWs.removeAllListeners();
      if (session.clientWs.readyState === WebSocket.OPEN) {
        session.clientWs.close(1000, "Session ended");
      }
    }
    this.sessions.delete(sessionId);
    console.log(`[CoachSession] Session cleaned up: ${sessionId}`);

    if (this.sessions.size === 0) {
      this.stopWatchdog();
    }
  }

  shutdown(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.terminateSession(sessionId, "server_shutdown");
    }
    this.stopWatchdog();
  }

  private createSession(sessionId: string, mode: TurnMode, clientWs: WebSocket): void {
    console.log(`[CoachSession] New connection for session: ${sessionId} (${mode} mode)`);

    const transport = new ClientTransport(sessionId);
    const microphone = new ClientMicrophone({
      sessionId,
      transport,
      preRollMs: this.options.preRollMs,
    });
    const playback = new ClientPlayback({
      transport,
      minTimeoutMs: this.options.playbackTimeoutMs,
      lang: this.options.fallbackLang,
    });
    const orchestrator = new TurnOrchestrator({
      sessionId,
      mode,
      voice: this.options.voice,
      transport,
      audioInput: microphone,
      transcription: this.deps.transcription,
      speech: new SpeechOutput(this.deps.synthesizer, playback, sessionId),
      interviewer: this.deps.interviewer,
      extractor: this.deps.extractor,
      graceMs: this.options.graceMs,
      vad: this.options.vad,
    });

    const now = this.now();
    const session: CoachSession = {
      sessionId,
      connectionId: randomUUID(),
      clientWs,
      transport,
      microphone,
      playback,
      orchestrator,
      createdAt: now,
      lastHeartbeatAt: now,
      lastActivityAt: now,
      terminationWarned: false,
      clientDisconnectedAt: null,
    };
    this.sessions.set(sessionId, session);
    this.startWatchdog();

    const profiling = orchestrator.getProfilingSession();
    sendDirect(clientWs, {
      type: "connected",
      sessionId,
      mode,
      profilingState: profiling.state,
      prompt: getCurrentQuestion(profiling.state),
      isResumed: false,
    });
    transport.attach(clientWs);
    this.bindSocket(session, clientWs);
    void orchestrator.start();
  }

  private resumeSession(session: CoachSession, clientWs: WebSocket): void {
    console.log(`[CoachSession] Reconnecting to disconnected session: ${session.sessionId}`);

    const now = this.now();
    session.clientWs = clientWs;
    session.connectionId = randomUUID();
    session.clientDisconnectedAt = null;
    session.lastHeartbeatAt = now;
    session.lastActivityAt = now;
    session.terminationWarned = false;

    const profiling = session.orchestrator.getProfilingSession();
    sendDirect(clientWs, {
      type: "connected",
      sessionId: session.sessionId,
      mode: session.orchestrator.getSnapshot().mode,
      profilingState: profiling.state,
      prompt: getCurrentQuestion(profiling.state),
      isResumed: true,
    });
    session.transport.attach(clientWs);
    this.bindSocket(session, clientWs);
    session.orchestrator.handleTransportState(true);
    console.log(`[CoachSession] Session ${session.sessionId} reconnected successfully`);
  }

  private bindSocket(session: CoachSession, clientWs: WebSocket): void {
    const connectionId = session.connectionId;

    clientWs.on("message", (data) => {
      if (session.connectionId !== connectionId) return;
      this.handleClientMessage(session, rawDataToString(data));
    });

    clientWs.on("close", (code: number, reason: Buffer) => {
      console.log(`[CoachSession] Client disconnected: ${session.sessionId}`, {
        closeCode: code,
        closeReason: reason.toString() || "(none)",
        sessionAge: `${this.now() - session.createdAt}ms`,
      });
      this.markDisconnected(session, connectionId);
    });

    clientWs.on("error", (error) => {
      console.error(`[CoachSession] Client error for ${session.sessionId}:`, error);
      this.markDisconnected(session, connectionId);
    });
  }

  // Keep the session for a possible reconnect; the watchdog cleans up after
  // the heartbeat timeout.
  private markDisconnected(session: CoachSession, connectionId: string): void {
    if (session.connectionId !== connectionId || session.clientWs === null) return;
    if (this.sessions.get(session.sessionId) !== session) return;

    session.clientWs = null;
    session.clientDisconnectedAt = this.now();
    session.transport.detach();
    session.orchestrator.handleTransportState(false);
    console.log(
      `[CoachSession] Session ${session.sessionId} marked as disconnected, watchdog will cleanup after heartbeat timeout`,
    );
  }

  private handleClientMessage(session: CoachSession, raw: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      console.error("[CoachSession] Error parsing client message:", error);
      session.transport.send({
        type: "error",
        code: "INVALID_MESSAGE",
        message: "Messages must be JSON",
      });
      return;
    }

    const parseResult = clientMessageSchema.safeParse(payload);
    if (!parseResult.success) {
      const message = fromError(parseResult.error).toString();
      console.warn(`[CoachSession] Rejected message for ${session.sessionId}: ${message}`);
      session.transport.send({ type: "error", code: "INVALID_MESSAGE", message });
      return;
    }

    this.dispatch(session, parseResult.data);
  }

  private dispatch(session: CoachSession, message: ClientMessage): void {
    const { orchestrator } = session;
    const now = this.now();

    // Heartbeat is handled before anything else and is not user activity
    if (message.type === "heartbeat.ping") {
      session.lastHeartbeatAt = now;
      session.terminationWarned = false;
      session.transport.send({ type: "heartbeat.pong" });
      return;
    }

    session.lastActivityAt = now;
    session.terminationWarned = false;

    switch (message.type) {
      case "audio_ready":
        console.log(`[CoachSession] Client audio ready for ${session.sessionId}`);
        void orchestrator.greet();
        break;

      case "microphone_ready":
        session.microphone.markReady(message.sampleRate);
        void orchestrator.handleMicrophoneReady();
        break;

      case "microphone_unavailable":
        session.microphone.markUnavailable(message.reason);
        void orchestrator.handleMicrophoneUnavailable(message.reason);
        break;

      case "audio":
        session.microphone.pushAudio(message.audio);
        break;

      case "start_recording":
        void orchestrator.startRecording("user");
        break;

      case "stop_recording":
        void orchestrator.stopRecording("user");
        break;

      case "set_mode":
        void orchestrator.setMode(message.mode);
        break;

      case "set_voice": {
        const preset = resolveVoice(message.voice);
        orchestrator.setVoice({
          voice: preset.id,
          speakingRate: message.speakingRate,
          pitch: message.pitch,
        });
        break;
      }

      case "text_input":
        void orchestrator.submitText(message.text);
        break;

      case "playback_complete":
        if (!session.playback.acknowledge(message.utteranceId)) {
          console.log(`[CoachSession] Ignoring stale playback ack ${message.utteranceId}`);
        }
        break;

      case "playback_error":
        if (!session.playback.fail(message.utteranceId, message.error)) {
          console.log(`[CoachSession] Ignoring stale playback error ${message.utteranceId}`);
        }
        break;

      case "reset_profiling":
        void orchestrator.resetProfiling();
        break;
    }
  }

  private startWatchdog(): void {
    if (this.watchdog) return;
    this.watchdog = setInterval(() => {
      this.runWatchdogCycle();
    }, this.options.hygiene.watchdogIntervalMs);
    console.log(
      "[SessionWatchdog] Started - checking every",
      this.options.hygiene.watchdogIntervalMs / 1000,
      "seconds",
    );
  }

  private stopWatchdog(): void {
    if (!this.watchdog) return;
    clearInterval(this.watchdog);
    this.watchdog = null;
    console.log("[SessionWatchdog] Stopped - no active sessions");
  }
}
