export type AudioChunk = {
  pcm: Buffer;
  sampleRate: number;
  receivedAt: number;
};

export type AudioChunkListener = (chunk: AudioChunk) => void;

export interface AudioStreamLease {
  readonly owner: string;
  readonly sampleRate: number;
  /** Recent chunks, oldest first, covering roughly the configured pre-roll. */
  recentChunks(): AudioChunk[];
  onChunk(listener: AudioChunkListener): () => void;
  release(): void;
}

export type SharedAudioStreamOptions = {
  label: string;
  sampleRate: number;
  preRollMs?: number;
  onStop?: (reason: string) => void;
};

export class AudioStreamStoppedError extends Error {
  constructor(label: string) {
    super(`Audio stream ${label} has been stopped`);
    this.name = "AudioStreamStoppedError";
  }
}

const DEFAULT_PRE_ROLL_MS = 500;

/**
 * One inbound microphone stream per session, fanned out to every consumer
 * (VAD analyser, recorder) through leases. Releasing a lease detaches that
 * consumer only; `stop()` ends the stream for everyone and runs exactly once.
 */
export class SharedAudioStream {
  readonly label: string;
  readonly sampleRate: number;

  private readonly preRollMs: number;
  private readonly onStop?: (reason: string) => void;
  private readonly leases = new Map<number, Set<AudioChunkListener>>();
  private readonly recent: AudioChunk[] = [];
  private recentDurationMs = 0;
  private nextLeaseId = 1;
  private stopped = false;

  constructor(options: SharedAudioStreamOptions) {
    this.label = options.label;
    this.sampleRate = options.sampleRate;
    this.preRollMs = options.preRollMs ?? DEFAULT_PRE_ROLL_MS;
    this.onStop = options.onStop;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get activeLeases(): number {
    return this.leases.size;
  }

  acquire(owner: string): AudioStreamLease {
    if (this.stopped) {
      throw new AudioStreamStoppedError(this.label);
    }

    const id = this.nextLeaseId++;
    const listeners = new Set<AudioChunkListener>();
    this.leases.set(id, listeners);

    return {
      owner,
      sampleRate: this.sampleRate,
      recentChunks: () => [...this.recent],
      onChunk: (listener) => {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
      release: () => {
        listeners.clear();
        this.leases.delete(id);
      },
    };
  }

  push(pcm: Buffer, receivedAt: number = Date.now()): void {
    if (this.stopped || pcm.length === 0) return;

    const chunk: AudioChunk = { pcm, sampleRate: this.sampleRate, receivedAt };
    this.remember(chunk);

    for (const listeners of this.leases.values()) {
      for (const listener of listeners) {
        try {
          listener(chunk);
        } catch (error) {
          console.error(`[AudioStream] ${this.label} listener failed:`, error);
        }
      }
    }
  }

  stop(reason: string): void {
    if (this.stopped) return;
    this.stopped = true;
    this.leases.clear();
    this.recent.length = 0;
    this.recentDurationMs = 0;
    console.log(`[AudioStream] ${this.label} stopped (${reason})`);
    this.onStop?.(reason);
  }

  private remember(chunk: AudioChunk): void {
    this.recent.push(chunk);
    this.recentDurationMs += chunkDurationMs(chunk);
    while (this.recent.length > 1) {
      const oldest = this.recent[0];
      const withoutOldest = this.recentDurationMs - chunkDurationMs(oldest);
      if (withoutOldest < this.preRollMs) break;
      this.recent.shift();
      this.recentDurationMs = withoutOldest;
    }
  }
}

export function chunkDurationMs(chunk: AudioChunk): number {
  return (chunk.pcm.length / 2 / chunk.sampleRate) * 1000;
}
