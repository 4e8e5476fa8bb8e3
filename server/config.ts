import { z } from "zod";
import { fromError } from "zod-validation-error";
import { turnModeSchema } from "@shared/schema";

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().nonnegative().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),

  OPENAI_API_KEY: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  TRANSCRIPTION_MODEL: z.string().min(1).default("gpt-4o-mini-transcribe"),
  TRANSCRIPTION_LANGUAGE: z.string().min(2).default("en"),
  TTS_MODEL: z.string().min(1).default("gpt-4o-mini-tts"),
  INTERVIEW_MODEL: z.string().min(1).default("gemini-2.5-flash"),

  DEFAULT_TURN_MODE: turnModeSchema.default("auto"),
  DEFAULT_VOICE: z.string().min(1).default("neural2_male"),
  DEFAULT_SPEAKING_RATE: z.coerce.number().min(0.25).max(4).default(0.9),
  FALLBACK_SPEECH_LANG: z.string().min(2).default("en-US"),

  VAD_VOLUME_THRESHOLD: z.coerce.number().min(0).max(1).default(0.01),
  VAD_SILENCE_THRESHOLD_MS: numberFromEnv(1500),
  VAD_TICK_MS: z.coerce.number().int().positive().default(20),
  VAD_PRE_ROLL_MS: numberFromEnv(500),
  TRANSCRIPT_GRACE_MS: numberFromEnv(500),
  PLAYBACK_TIMEOUT_MS: numberFromEnv(15_000),

  HEARTBEAT_TIMEOUT_MS: numberFromEnv(90_000),
  SESSION_IDLE_TIMEOUT_MS: numberFromEnv(5 * 60_000),
  SESSION_MAX_AGE_MS: numberFromEnv(60 * 60_000),
  WATCHDOG_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  TERMINATION_WARNING_MS: numberFromEnv(30_000),
  PROFILING_SESSION_MAX_AGE_MS: numberFromEnv(2 * 60 * 60_000),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    throw new Error(`Invalid environment: ${fromError(parseResult.error).toString()}`);
  }
  const config = parseResult.data;

  if (!config.OPENAI_API_KEY) {
    console.warn("[Config] OPENAI_API_KEY is not set; transcription and server-side speech are disabled");
  }
  if (!config.GEMINI_API_KEY) {
    console.warn("[Config] GEMINI_API_KEY is not set; interview replies are disabled");
  }
  return config;
}
