// Linear-interpolation resampler for little-endian 16-bit mono PCM.
export function resamplePcm16(pcm: Buffer, fromRate: number, toRate: number): Buffer {
  if (fromRate === toRate || pcm.length < 2) return pcm;

  const inputSamples = Math.floor(pcm.length / 2);
  const outputSamples = Math.max(1, Math.round((inputSamples * toRate) / fromRate));
  const output = Buffer.alloc(outputSamples * 2);
  const step = fromRate / toRate;

  for (let i = 0; i < outputSamples; i++) {
    const position = i * step;
    const index = Math.floor(position);
    const fraction = position - index;
    const current = pcm.readInt16LE(Math.min(index, inputSamples - 1) * 2);
    const next = pcm.readInt16LE(Math.min(index + 1, inputSamples - 1) * 2);
    const value = Math.round(current + (next - current) * fraction);
    output.writeInt16LE(Math.max(-32768, Math.min(32767, value)), i * 2);
  }

  return output;
}

export function pcm16DurationMs(byteLength: number, sampleRate: number): number {
  return (byteLength / 2 / sampleRate) * 1000;
}
