import type {
  PlaybackChannel,
  SessionTransport,
  SynthesisRequest,
  SynthesizedSpeech,
} from "./types";

export class PlaybackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlaybackError";
  }
}

export class PlaybackCancelledError extends Error {
  constructor() {
    super("Playback was stopped");
    this.name = "PlaybackCancelledError";
  }
}

type PendingPlayback = {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

export type ClientPlaybackOptions = {
  transport: SessionTransport;
  /** Lower bound on how long to wait for the client's playback acknowledgement. */
  minTimeoutMs?: number;
  /** Added to the estimated speech duration. */
  timeoutPaddingMs?: number;
  lang?: string;
};

const DEFAULT_MIN_TIMEOUT_MS = 15_000;
const DEFAULT_TIMEOUT_PADDING_MS = 5_000;

/**
 * Plays audio on the client and waits for `playback_complete` or
 * `playback_error`. A missing acknowledgement is treated as completion once the
 * timeout passes, so a lost ack never leaves the session stuck speaking.
 */
export class ClientPlayback implements PlaybackChannel {
  private readonly pending = new Map<string, PendingPlayback>();
  private readonly minTimeoutMs: number;
  private readonly timeoutPaddingMs: number;
  private readonly lang: string;

  constructor(private readonly options: ClientPlaybackOptions) {
    this.minTimeoutMs = options.minTimeoutMs ?? DEFAULT_MIN_TIMEOUT_MS;
    this.timeoutPaddingMs = options.timeoutPaddingMs ?? DEFAULT_TIMEOUT_PADDING_MS;
    this.lang = options.lang ?? "en-US";
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  playAudio(
    utteranceId: string,
    speech: SynthesizedSpeech,
    estimatedMs: number,
  ): Promise<void> {
    return this.dispatch(utteranceId, estimatedMs, () =>
      this.options.transport.send({
        type: "tts_audio",
        utteranceId,
        audio: speech.audio.toString("base64"),
        mimeType: speech.mimeType,
      }),
    );
  }

  speakLocally(
    utteranceId: string,
    request: SynthesisRequest,
    estimatedMs: number,
  ): Promise<void> {
    return this.dispatch(utteranceId, estimatedMs, () =>
      this.options.transport.send({
        type: "speak_text",
        utteranceId,
        text: request.text,
        speakingRate: request.speakingRate,
        pitch: request.pitch,
        lang: this.lang,
      }),
    );
  }

  acknowledge(utteranceId: string): boolean {
    const entry = this.take(utteranceId);
    if (!entry) return false;
    entry.resolve();
    return true;
  }

  fail(utteranceId: string, error: string): boolean {
    const entry = this.take(utteranceId);
    if (!entry) return false;
    entry.reject(new PlaybackError(`Client playback failed: ${error}`));
    return true;
  }

  stop(): void {
    if (this.pending.size === 0) return;
    const entries = Array.from(this.pending.values());
    this.pending.clear();
    for (const entry of entries) {
      clearTimeout(entry.timer);
      entry.reject(new PlaybackCancelledError());
    }
    this.options.transport.send({ type: "stop_playback" });
  }

  private dispatch(
    utteranceId: string,
    estimatedMs: number,
    send: () => void,
  ): Promise<void> {
    if (!this.options.transport.isConnected()) {
      return Promise.reject(new PlaybackError("Client is not connected"));
    }

    const timeoutMs = Math.max(this.minTimeoutMs, estimatedMs + this.timeoutPaddingMs);
    const done = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(utteranceId)) {
          console.warn(
            `[Playback] No acknowledgement for ${utteranceId} after ${timeoutMs}ms, continuing`,
          );
          resolve();
        }
      }, timeoutMs);
      this.pending.set(utteranceId, { resolve, reject, timer });
    });

    send();
    return done;
  }

  private take(utteranceId: string): PendingPlayback | undefined {
    const entry = this.pending.get(utteranceId);
    if (!entry) return undefined;
    this.pending.delete(utteranceId);
    clearTimeout(entry.timer);
    return entry;
  }
}
