import { z } from "zod";
import { PROFILING_STATES } from "./types/profiling";

export const profilingStateSchema = z.enum(PROFILING_STATES);

export const turnModeSchema = z.enum(["auto", "manual"]);

export const turnPhaseSchema = z.enum([
  "idle",
  "recording",
  "awaiting_final",
  "processing",
  "speaking",
]);

export const candidateProfileSchema = z.object({
  role: z.string(),
  experienceLevel: z.string(),
  targetRole: z.string(),
  targetCompany: z.string(),
  educationDetails: z.string(),
});

export const interviewContextSchema = z.object({
  summary: z.string(),
  currentRole: z.string(),
  background: z.string(),
  targetRole: z.string(),
  targetCompany: z.string().nullable(),
  suggestedQuestionCount: z.number().int().positive(),
  estimatedDurationMinutes: z.number().int().positive(),
});

export const turnSnapshotSchema = z.object({
  phase: turnPhaseSchema,
  mode: turnModeSchema,
  isRecording: z.boolean(),
  isAISpeaking: z.boolean(),
  transportConnected: z.boolean(),
  microphoneAvailable: z.boolean(),
});

export const terminationReasonSchema = z.enum([
  "heartbeat_timeout",
  "idle_timeout",
  "max_age_exceeded",
  "client_disconnected",
  "server_shutdown",
]);

export type TerminationReason = z.infer<typeof terminationReasonSchema>;

// ---------------------------------------------------------------------------
// Client -> server messages
// ---------------------------------------------------------------------------

export const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("heartbeat.ping") }),
  z.object({
    type: z.literal("microphone_ready"),
    sampleRate: z.number().int().min(8000).max(96000).default(24000),
  }),
  z.object({
    type: z.literal("microphone_unavailable"),
    reason: z.string().max(500).default("unknown"),
  }),
  z.object({
    type: z.literal("audio"),
    audio: z.string().min(1),
  }),
  z.object({ type: z.literal("start_recording") }),
  z.object({ type: z.literal("stop_recording") }),
  z.object({
    type: z.literal("set_mode"),
    mode: turnModeSchema,
  }),
  z.object({
    type: z.literal("set_voice"),
    voice: z.string().min(1).max(64),
    speakingRate: z.number().min(0.25).max(4).optional(),
    pitch: z.number().min(-20).max(20).optional(),
  }),
  z.object({
    type: z.literal("text_input"),
    text: z.string().max(4000),
  }),
  z.object({
    type: z.literal("playback_complete"),
    utteranceId: z.string().min(1),
  }),
  z.object({
    type: z.literal("playback_error"),
    utteranceId: z.string().min(1),
    error: z.string().max(500).default("unknown"),
  }),
  z.object({ type: z.literal("reset_profiling") }),
  z.object({ type: z.literal("audio_ready") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

// ---------------------------------------------------------------------------
// Server -> client events
// ---------------------------------------------------------------------------

export const serverEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("connected"),
    sessionId: z.string(),
    mode: turnModeSchema,
    profilingState: profilingStateSchema,
    prompt: z.string().nullable(),
    isResumed: z.boolean(),
  }),
  z.object({ type: z.literal("heartbeat.pong") }),
  z.object({
    type: z.literal("turn_state"),
    snapshot: turnSnapshotSchema,
  }),
  z.object({
    type: z.literal("transcript_update"),
    text: z.string(),
    isFinal: z.boolean(),
  }),
  z.object({
    type: z.literal("connection_state_changed"),
    service: z.enum(["transcription", "client"]),
    connected: z.boolean(),
  }),
  z.object({
    type: z.literal("user_utterance"),
    text: z.string(),
  }),
  z.object({
    type: z.literal("ai_response"),
    text: z.string(),
    source: z.enum(["profiling", "interview", "system"]),
  }),
  z.object({
    type: z.literal("tts_audio"),
    utteranceId: z.string(),
    audio: z.string(),
    mimeType: z.string(),
  }),
  z.object({
    type: z.literal("speak_text"),
    utteranceId: z.string(),
    text: z.string(),
    speakingRate: z.number(),
    pitch: z.number(),
    lang: z.string(),
  }),
  z.object({
    type: z.literal("stop_playback"),
  }),
  z.object({
    type: z.literal("release_microphone"),
  }),
  z.object({
    type: z.literal("profiling_update"),
    state: profilingStateSchema,
    profile: candidateProfileSchema,
  }),
  z.object({
    type: z.literal("profiling_completed"),
    success: z.boolean(),
    profile: candidateProfileSchema,
    interviewContext: interviewContextSchema.nullable(),
    error: z.string().optional(),
  }),
  z.object({
    type: z.literal("error"),
    code: z.string(),
    message: z.string(),
    retryAfterMs: z.number().optional(),
  }),
  z.object({
    type: z.literal("session_warning"),
    reason: z.literal("inactivity"),
    message: z.string(),
    timeoutMs: z.number(),
  }),
  z.object({
    type: z.literal("session_terminated"),
    reason: terminationReasonSchema,
    message: z.string(),
    canResume: z.boolean(),
  }),
]);

export type ServerEvent = z.infer<typeof serverEventSchema>;

export type ServerEventType = ServerEvent["type"];

// ---------------------------------------------------------------------------
// REST bodies
// ---------------------------------------------------------------------------

export const profilingMessageBodySchema = z.object({
  sessionId: z.string().min(1),
  message: z.string().max(4000),
});

export const synthesizeBodySchema = z.object({
  text: z.string().min(1).max(5000),
  voice: z.string().min(1).max(64).optional(),
  speakingRate: z
    .number()
    .min(0.25, "Speaking rate must be between 0.25 and 4.0")
    .max(4, "Speaking rate must be between 0.25 and 4.0")
    .default(0.9),
  pitch: z
    .number()
    .min(-20, "Pitch must be between -20.0 and 20.0")
    .max(20, "Pitch must be between -20.0 and 20.0")
    .default(0),
  format: z.enum(["base64", "binary"]).default("base64"),
});

export type SynthesizeBody = z.infer<typeof synthesizeBodySchema>;
