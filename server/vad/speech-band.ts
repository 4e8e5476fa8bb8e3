export const SPEECH_BAND_LOW_HZ = 85;
export const SPEECH_BAND_HIGH_HZ = 255;

/**
 * RMS of the byte-scaled magnitudes in the 85-255 Hz band, normalised to [0, 1].
 * Bins are indexed as `floor(hz * binCount / nyquist)`; an empty band yields 0.
 */
export function computeSpeechBandLevel(
  frequencyData: Uint8Array,
  sampleRate: number,
): number {
  const nyquist = sampleRate / 2;
  const binCount = frequencyData.length;
  if (binCount === 0 || nyquist <= 0) return 0;

  const start = Math.floor((SPEECH_BAND_LOW_HZ * binCount) / nyquist);
  const end = Math.min(binCount, Math.floor((SPEECH_BAND_HIGH_HZ * binCount) / nyquist));
  if (end <= start) return 0;

  let sumOfSquares = 0;
  for (let i = start; i < end; i++) {
    sumOfSquares += frequencyData[i] * frequencyData[i];
  }
  const rms = Math.sqrt(sumOfSquares / (end - start));
  return rms / 255;
}
