import type { AppConfig } from "./config";
import { CoachSessionManager } from "./coach-session";
import { createEntityExtractor, type EntityExtractor } from "./profiling/entity-extractor";
import { getDefaultKeywordTables } from "./profiling/keyword-tables";
import { ProfilingSessionStore } from "./profiling/session-store";
import { GeminiInterviewer } from "./providers/gemini-interviewer";
import { OpenAISpeechSynthesizer } from "./providers/openai-speech";
import { OpenAIRealtimeTranscriptionProvider } from "./providers/realtime-transcription";
import {
  UnavailableInterviewer,
  UnavailableTranscriptionProvider,
} from "./providers/unavailable";
import { resolveVoice } from "./providers/voice-catalog";
import type {
  InterviewResponder,
  SpeechSynthesizer,
  TranscriptionProvider,
} from "./voice-session/types";

export type AppServices = {
  config: AppConfig;
  extractor: EntityExtractor;
  profilingStore: ProfilingSessionStore;
  synthesizer: SpeechSynthesizer | null;
  sessions: CoachSessionManager;
};

export type ServiceOverrides = {
  transcription?: TranscriptionProvider;
  synthesizer?: SpeechSynthesizer | null;
  interviewer?: InterviewResponder;
};

export function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): AppServices {
  const extractor = createEntityExtractor(getDefaultKeywordTables());

  const transcription =
    overrides.transcription ??
    (config.OPENAI_API_KEY
      ? new OpenAIRealtimeTranscriptionProvider({
          apiKey: config.OPENAI_API_KEY,
          model: config.TRANSCRIPTION_MODEL,
          language: config.TRANSCRIPTION_LANGUAGE,
        })
      : new UnavailableTranscriptionProvider("OPENAI_API_KEY is not set"));

  const synthesizer =
    overrides.synthesizer !== undefined
      ? overrides.synthesizer
      : config.OPENAI_API_KEY
        ? new OpenAISpeechSynthesizer({ apiKey: config.OPENAI_API_KEY, model: config.TTS_MODEL })
        : null;

  const interviewer =
    overrides.interviewer ??
    (config.GEMINI_API_KEY
      ? new GeminiInterviewer({ apiKey: config.GEMINI_API_KEY, model: config.INTERVIEW_MODEL })
      : new UnavailableInterviewer("GEMINI_API_KEY is not set"));

  const sessions = new CoachSessionManager(
    { extractor, transcription, synthesizer, interviewer },
    {
      hygiene: {
        heartbeatTimeoutMs: config.HEARTBEAT_TIMEOUT_MS,
        idleTimeoutMs: config.SESSION_IDLE_TIMEOUT_MS,
        maxAgeMs: config.SESSION_MAX_AGE_MS,
        watchdogIntervalMs: config.WATCHDOG_INTERVAL_MS,
        terminationWarningMs: config.TERMINATION_WARNING_MS,
      },
      defaultMode: config.DEFAULT_TURN_MODE,
      voice: {
        voice: resolveVoice(config.DEFAULT_VOICE).id,
        speakingRate: config.DEFAULT_SPEAKING_RATE,
        pitch: 0,
      },
      graceMs: config.TRANSCRIPT_GRACE_MS,
      playbackTimeoutMs: config.PLAYBACK_TIMEOUT_MS,
      fallbackLang: config.FALLBACK_SPEECH_LANG,
      preRollMs: config.VAD_PRE_ROLL_MS,
      vad: {
        volumeThreshold: config.VAD_VOLUME_THRESHOLD,
        silenceThresholdMs: config.VAD_SILENCE_THRESHOLD_MS,
        tickMs: config.VAD_TICK_MS,
      },
    },
  );

  return {
    config,
    extractor,
    profilingStore: new ProfilingSessionStore(extractor),
    synthesizer,
    sessions,
  };
}
