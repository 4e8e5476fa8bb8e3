import type { AudioStreamLease } from "../voice-session/shared-audio-stream";
import { chunkDurationMs } from "../voice-session/shared-audio-stream";
import { computeSpeechBandLevel } from "./speech-band";
import { PcmSpectrumAnalyser, type SpectrumAnalyserOptions } from "./spectrum-analyser";

/** Where the detector reads one level sample per tick. */
export interface AudioLevelSource {
  readLevel(): number;
  release(): void;
}

export type AnalyserLevelSourceOptions = Omit<SpectrumAnalyserOptions, "sampleRate"> & {
  now?: () => number;
};

/**
 * Feeds every chunk of a stream lease into a spectrum analyser and reports the
 * speech-band level of the current window on demand. Once frames stop arriving
 * for longer than one analysis window the input counts as silent.
 */
export function createAnalyserLevelSource(
  lease: AudioStreamLease,
  options: AnalyserLevelSourceOptions = {},
): AudioLevelSource {
  const { now = Date.now, ...analyserOptions } = options;
  const analyser = new PcmSpectrumAnalyser({ ...analyserOptions, sampleRate: lease.sampleRate });
  const frequencyData = new Uint8Array(analyser.frequencyBinCount);
  const windowMs = (analyser.fftSize / analyser.sampleRate) * 1000;

  let lastChunkAt: number | null = null;
  let lastChunkMs = 0;
  const unsubscribe = lease.onChunk((chunk) => {
    lastChunkAt = now();
    lastChunkMs = chunkDurationMs(chunk);
    analyser.writePcm16(chunk.pcm);
  });

  return {
    readLevel() {
      if (lastChunkAt === null) return 0;
      // A chunk is followed by the next one within its own duration while audio flows
      if (now() - lastChunkAt > windowMs + lastChunkMs) {
        analyser.reset();
        lastChunkAt = null;
        return 0;
      }
      analyser.getByteFrequencyData(frequencyData);
      return computeSpeechBandLevel(frequencyData, analyser.sampleRate);
    },
    release() {
      unsubscribe();
      lease.release();
    },
  };
}
