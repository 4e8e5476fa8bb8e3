// Frequency analysis over an inbound PCM16 stream, computed the way a browser
// AnalyserNode does it: Blackman window, radix-2 FFT, magnitude / N, temporal
// smoothing, then decibels scaled into a byte range.

export type SpectrumAnalyserOptions = {
  sampleRate: number;
  fftSize?: number;
  smoothingTimeConstant?: number;
  minDecibels?: number;
  maxDecibels?: number;
};

export const DEFAULT_FFT_SIZE = 2048;
export const DEFAULT_SMOOTHING = 0.8;
export const DEFAULT_MIN_DECIBELS = -100;
export const DEFAULT_MAX_DECIBELS = -30;

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

function blackmanWindow(size: number): Float64Array {
  const window = new Float64Array(size);
  const a0 = 0.42;
  const a1 = 0.5;
  const a2 = 0.08;
  for (let n = 0; n < size; n++) {
    const phase = (2 * Math.PI * n) / size;
    window[n] = a0 - a1 * Math.cos(phase) + a2 * Math.cos(2 * phase);
  }
  return window;
}

function reverseBits(value: number, bits: number): number {
  let reversed = 0;
  for (let i = 0; i < bits; i++) {
    reversed = (reversed << 1) | ((value >> i) & 1);
  }
  return reversed;
}

// In-place iterative Cooley-Tukey. Lengths of re/im must equal a power of two.
export function fft(re: Float64Array, im: Float64Array): void {
  const size = re.length;
  const bits = Math.log2(size);

  for (let i = 0; i < size; i++) {
    const j = reverseBits(i, bits);
    if (j > i) {
      const tr = re[i];
      re[i] = re[j];
      re[j] = tr;
      const ti = im[i];
      im[i] = im[j];
      im[j] = ti;
    }
  }

  for (let span = 2; span <= size; span <<= 1) {
    const half = span >> 1;
    const angle = (-2 * Math.PI) / span;
    for (let start = 0; start < size; start += span) {
      for (let k = 0; k < half; k++) {
        const cos = Math.cos(angle * k);
        const sin = Math.sin(angle * k);
        const evenIndex = start + k;
        const oddIndex = evenIndex + half;
        const oddRe = re[oddIndex] * cos - im[oddIndex] * sin;
        const oddIm = re[oddIndex] * sin + im[oddIndex] * cos;
        re[oddIndex] = re[evenIndex] - oddRe;
        im[oddIndex] = im[evenIndex] - oddIm;
        re[evenIndex] += oddRe;
        im[evenIndex] += oddIm;
      }
    }
  }
}

export class PcmSpectrumAnalyser {
  readonly sampleRate: number;
  readonly fftSize: number;
  readonly frequencyBinCount: number;
  readonly smoothingTimeConstant: number;
  readonly minDecibels: number;
  readonly maxDecibels: number;

  private readonly samples: Float64Array;
  private readonly window: Float64Array;
  private readonly smoothed: Float64Array;
  private writeIndex = 0;

  constructor(options: SpectrumAnalyserOptions) {
    const fftSize = options.fftSize ?? DEFAULT_FFT_SIZE;
    if (!isPowerOfTwo(fftSize) || fftSize < 32) {
      throw new RangeError(`fftSize must be a power of two >= 32, got ${fftSize}`);
    }
    if (!(options.sampleRate > 0)) {
      throw new RangeError(`sampleRate must be positive, got ${options.sampleRate}`);
    }

    this.sampleRate = options.sampleRate;
    this.fftSize = fftSize;
    this.frequencyBinCount = fftSize / 2;
    this.smoothingTimeConstant = options.smoothingTimeConstant ?? DEFAULT_SMOOTHING;
    this.minDecibels = options.minDecibels ?? DEFAULT_MIN_DECIBELS;
    this.maxDecibels = options.maxDecibels ?? DEFAULT_MAX_DECIBELS;

    this.samples = new Float64Array(fftSize);
    this.window = blackmanWindow(fftSize);
    this.smoothed = new Float64Array(this.frequencyBinCount);
  }

  /** Appends little-endian 16-bit samples to the rolling time-domain window. */
  writePcm16(chunk: Buffer): void {
    const sampleCount = Math.floor(chunk.length / 2);
    for (let i = 0; i < sampleCount; i++) {
      this.samples[this.writeIndex] = chunk.readInt16LE(i * 2) / 32768;
      this.writeIndex = (this.writeIndex + 1) % this.fftSize;
    }
  }

  getByteFrequencyData(target: Uint8Array): void {
    const re = new Float64Array(this.fftSize);
    const im = new Float64Array(this.fftSize);

    // Oldest sample first
    for (let i = 0; i < this.fftSize; i++) {
      const sample = this.samples[(this.writeIndex + i) % this.fftSize];
      re[i] = sample * this.window[i];
    }
    fft(re, im);

    const tau = this.smoothingTimeConstant;
    const range = this.maxDecibels - this.minDecibels;
    const count = Math.min(target.length, this.frequencyBinCount);

    for (let k = 0; k < this.frequencyBinCount; k++) {
      const magnitude = Math.hypot(re[k], im[k]) / this.fftSize;
      this.smoothed[k] = tau * this.smoothed[k] + (1 - tau) * magnitude;
    }

    for (let k = 0; k < count; k++) {
      const value = this.smoothed[k];
      const decibels = value > 0 ? 20 * Math.log10(value) : -Infinity;
      const scaled = Math.floor((255 / range) * (decibels - this.minDecibels));
      target[k] = Math.max(0, Math.min(255, scaled));
    }
  }

  reset(): void {
    this.samples.fill(0);
    this.smoothed.fill(0);
    this.writeIndex = 0;
  }
}
