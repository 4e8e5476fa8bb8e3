import { randomUUID } from "crypto";
import { PlaybackCancelledError } from "./client-playback";
import type { PlaybackChannel, SpeechSynthesizer, VoiceSettings } from "./types";

export class SpeechUnavailableError extends Error {
  constructor(cause: unknown) {
    super(
      `Neither server-side nor client-side speech succeeded: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = "SpeechUnavailableError";
  }
}

export type SpeechOutcome = "synthesized" | "fallback";

const MS_PER_WORD = 400;

export function estimateSpeechMs(text: string, speakingRate: number): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  const rate = speakingRate > 0 ? speakingRate : 1;
  return Math.round((words * MS_PER_WORD) / rate);
}

/**
 * Voices a reply: synthesise on the server and play it on the client, or ask
 * the client to speak it itself when synthesis or playback of the audio fails.
 * Stopping playback cancels without falling back.
 */
export class SpeechOutput {
  constructor(
    private readonly synthesizer: SpeechSynthesizer | null,
    private readonly playback: PlaybackChannel,
    private readonly label = "speech",
  ) {}

  async speak(text: string, settings: VoiceSettings): Promise<SpeechOutcome> {
    const request = { ...settings, text };
    const estimatedMs = estimateSpeechMs(text, settings.speakingRate);

    if (this.synthesizer) {
      try {
        const speech = await this.synthesizer.synthesize(request);
        await this.playback.playAudio(randomUUID(), speech, estimatedMs);
        return "synthesized";
      } catch (error) {
        if (error instanceof PlaybackCancelledError) throw error;
        console.warn(
          `[Speech] ${this.label} ${this.synthesizer.name} failed, using client speech:`,
          error instanceof Error ? error.message : error,
        );
      }
    }

    try {
      await this.playback.speakLocally(randomUUID(), request, estimatedMs);
      return "fallback";
    } catch (error) {
      if (error instanceof PlaybackCancelledError) throw error;
      throw new SpeechUnavailableError(error);
    }
  }

  stop(): void {
    this.playback.stop();
  }
}
