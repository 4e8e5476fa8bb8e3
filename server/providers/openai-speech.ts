import OpenAI from "openai";
import type { SpeechCreateParams } from "openai/resources/audio/speech";
import type {
  SpeechSynthesizer,
  SynthesisRequest,
  SynthesizedSpeech,
} from "../voice-session/types";
import { resolveVoice } from "./voice-catalog";

export class SynthesisError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SynthesisError";
  }
}

/** The slice of the SDK this adapter calls; `openai.audio.speech` satisfies it. */
export interface SpeechApi {
  create(params: SpeechCreateParams): Promise<{ arrayBuffer(): Promise<ArrayBuffer> }>;
}

export type OpenAISpeechOptions = {
  apiKey?: string;
  model?: string;
  api?: SpeechApi;
};

export const MIN_SPEAKING_RATE = 0.25;
export const MAX_SPEAKING_RATE = 4;
export const MIN_PITCH = -20;
export const MAX_PITCH = 20;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// The speech API has no pitch control; the preset style and a pitch hint are
// passed as delivery instructions instead.
export function describePitch(pitch: number): string | null {
  if (pitch >= 10) return "Use a noticeably higher pitch than usual.";
  if (pitch >= 3) return "Use a slightly higher pitch than usual.";
  if (pitch <= -10) return "Use a noticeably lower pitch than usual.";
  if (pitch <= -3) return "Use a slightly lower pitch than usual.";
  return null;
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  readonly name = "openai-speech";

  private readonly api: SpeechApi;
  private readonly model: string;

  constructor(options: OpenAISpeechOptions) {
    if (options.api) {
      this.api = options.api;
    } else {
      if (!options.apiKey) {
        throw new Error("OPENAI_API_KEY is required for speech synthesis");
      }
      this.api = new OpenAI({ apiKey: options.apiKey }).audio.speech;
    }
    this.model = options.model ?? "gpt-4o-mini-tts";
  }

  buildParams(request: SynthesisRequest): SpeechCreateParams {
    const preset = resolveVoice(request.voice);
    const pitch = clamp(request.pitch, MIN_PITCH, MAX_PITCH);
    const instructions = [preset.style, describePitch(pitch)].filter(Boolean).join(" ");

    return {
      model: this.model,
      voice: preset.providerVoice,
      input: request.text,
      speed: clamp(request.speakingRate, MIN_SPEAKING_RATE, MAX_SPEAKING_RATE),
      response_format: "mp3",
      instructions,
    };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesizedSpeech> {
    const text = request.text.trim();
    if (!text) {
      throw new SynthesisError("Text must not be empty");
    }

    const startedAt = Date.now();
    try {
      const response = await this.api.create(this.buildParams({ ...request, text }));
      const audio = Buffer.from(await response.arrayBuffer());
      console.log(
        `[TTS] Synthesized ${text.length} chars into ${audio.length} bytes in ${Date.now() - startedAt}ms`,
      );
      return { audio, mimeType: "audio/mpeg" };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("[TTS] Synthesis failed:", message);
      throw new SynthesisError(`Speech synthesis failed: ${message}`, error);
    }
  }
}
