import type { AudioLevelSource } from "./level-source";

export type VoiceActivityDetectorOptions = {
  volumeThreshold?: number;
  silenceThresholdMs?: number;
  tickMs?: number;
  minSpeechFrames?: number;
  minSilenceFrames?: number;
  onSpeechStart?: () => void;
  onSpeechEnd?: () => void;
  onLevel?: (level: number) => void;
  /** Called when the level source fails after initialisation. */
  onError?: (error: unknown) => void;
  now?: () => number;
  label?: string;
};

export type VoiceActivitySnapshot = {
  isInitialized: boolean;
  isEnabled: boolean;
  isSpeaking: boolean;
  audioLevel: number;
  consecutiveSpeechFrames: number;
  consecutiveSilenceFrames: number;
};

export const DEFAULT_VAD_OPTIONS = {
  volumeThreshold: 0.01,
  silenceThresholdMs: 1500,
  tickMs: 20,
  minSpeechFrames: 3,
  minSilenceFrames: 10,
} as const;

type LevelSourceAcquirer = () => AudioLevelSource | Promise<AudioLevelSource>;

/**
 * Debounced speech/silence edge detector. A speech start needs
 * `minSpeechFrames` consecutive ticks above the threshold; a speech end needs
 * `minSilenceFrames` consecutive ticks below it and more than
 * `silenceThresholdMs` since the last speech tick. Each edge fires once.
 */
export class VoiceActivityDetector {
  private readonly volumeThreshold: number;
  private readonly silenceThresholdMs: number;
  private readonly tickMs: number;
  private readonly minSpeechFrames: number;
  private readonly minSilenceFrames: number;
  private readonly callbacks: Pick<
    VoiceActivityDetectorOptions,
    "onSpeechStart" | "onSpeechEnd" | "onLevel" | "onError"
  >;
  private readonly now: () => number;
  private readonly label: string;

  private source: AudioLevelSource | null = null;
  private enabled = false;
  private disposed = false;
  private tickTimer: ReturnType<typeof setTimeout> | null = null;

  private speaking = false;
  private level = 0;
  private speechFrames = 0;
  private silenceFrames = 0;
  private lastSpeechAt = 0;

  constructor(options: VoiceActivityDetectorOptions = {}) {
    this.volumeThreshold = options.volumeThreshold ?? DEFAULT_VAD_OPTIONS.volumeThreshold;
    this.silenceThresholdMs =
      options.silenceThresholdMs ?? DEFAULT_VAD_OPTIONS.silenceThresholdMs;
    this.tickMs = options.tickMs ?? DEFAULT_VAD_OPTIONS.tickMs;
    this.minSpeechFrames = options.minSpeechFrames ?? DEFAULT_VAD_OPTIONS.minSpeechFrames;
    this.minSilenceFrames = options.minSilenceFrames ?? DEFAULT_VAD_OPTIONS.minSilenceFrames;
    this.callbacks = {
      onSpeechStart: options.onSpeechStart,
      onSpeechEnd: options.onSpeechEnd,
      onLevel: options.onLevel,
      onError: options.onError,
    };
    this.now = options.now ?? Date.now;
    this.label = options.label ?? "vad";
  }

  get isInitialized(): boolean {
    return this.source !== null;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get isSpeaking(): boolean {
    return this.speaking;
  }

  get audioLevel(): number {
    return this.level;
  }

  getSnapshot(): VoiceActivitySnapshot {
    return {
      isInitialized: this.isInitialized,
      isEnabled: this.enabled,
      isSpeaking: this.speaking,
      audioLevel: this.level,
      consecutiveSpeechFrames: this.speechFrames,
      consecutiveSilenceFrames: this.silenceFrames,
    };
  }

  /**
   * Acquires the level source. On failure the detector stays uninitialised and
   * never emits; the caller is expected to fall back to manual turns.
   */
  async initialize(acquire: LevelSourceAcquirer): Promise<boolean> {
    if (this.disposed) return false;
    if (this.source) return true;

    try {
      const source = await acquire();
      if (this.disposed) {
        source.release();
        return false;
      }
      this.source = source;
      console.log(`[VAD] ${this.label} initialized`);
      return true;
    } catch (error) {
      console.warn(`[VAD] ${this.label} could not acquire audio input:`, error);
      this.source = null;
      return false;
    }
  }

  enable(): boolean {
    if (!this.source || this.disposed) {
      console.warn(`[VAD] ${this.label} enable ignored: not initialized`);
      return false;
    }
    if (this.enabled) return true;

    this.enabled = true;
    this.resetWindow();
    this.scheduleTick();
    return true;
  }

  disable(): void {
    this.enabled = false;
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
    this.resetWindow();
  }

  /** One tick of the detection algorithm. */
  processLevel(level: number, now: number = this.now()): void {
    if (!this.enabled || !this.source) {
      this.speechFrames = 0;
      this.silenceFrames = 0;
      return;
    }

    this.level = level;
    this.safely("onLevel", () => this.callbacks.onLevel?.(level));

    if (level > this.volumeThreshold) {
      this.speechFrames += 1;
      this.silenceFrames = 0;
      this.lastSpeechAt = now;

      if (!this.speaking && this.speechFrames >= this.minSpeechFrames) {
        this.speaking = true;
        this.safely("onSpeechStart", () => this.callbacks.onSpeechStart?.());
      }
      return;
    }

    this.silenceFrames += 1;
    this.speechFrames = 0;

    if (this.speaking && this.silenceFrames >= this.minSilenceFrames) {
      const silentForMs = now - this.lastSpeechAt;
      if (silentForMs > this.silenceThresholdMs) {
        this.speaking = false;
        this.silenceFrames = 0;
        this.safely("onSpeechEnd", () => this.callbacks.onSpeechEnd?.());
      }
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disable();
    this.disposed = true;
    const source = this.source;
    this.source = null;
    source?.release();
  }

  private resetWindow(): void {
    this.speaking = false;
    this.level = 0;
    this.speechFrames = 0;
    this.silenceFrames = 0;
    this.lastSpeechAt = 0;
  }

  private scheduleTick(): void {
    this.tickTimer = setTimeout(() => {
      this.tickTimer = null;
      const source = this.source;
      if (!this.enabled || !source) return;

      let level: number;
      try {
        level = source.readLevel();
      } catch (error) {
        console.error(`[VAD] ${this.label} level source failed:`, error);
        this.failClosed(error);
        return;
      }

      this.processLevel(level);
      if (this.enabled) this.scheduleTick();
    }, this.tickMs);
  }

  private failClosed(error: unknown): void {
    this.disable();
    const source = this.source;
    this.source = null;
    source?.release();
    this.safely("onError", () => this.callbacks.onError?.(error));
  }

  private safely(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error(`[VAD] ${this.label} ${name} callback failed:`, error);
    }
  }
}
