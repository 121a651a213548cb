import { describe, it, expect, afterAll } from 'vitest';
import { DEFAULT_SPECTRAL_CONFIG } from '../src/config/constants';
import {
  adoptMelFilters,
  createFilterBank,
  createHannWindow,
  createMelBoundaries,
  hzToMel,
  melToHz
} from '../src/whisper/spectral/FilterBank';
import { FramePool } from '../src/whisper/spectral/FramePool';
import {
  LogMelExtractor,
  computeLogMel,
  describeMel,
  projectToLogMel,
  reflectPad,
  stftFrameCount
} from '../src/whisper/spectral/LogMelExtractor';
import { freqBinCount, resolveSpectralConfig } from '../src/whisper/spectral/SpectralConfig';
import { constant, noise, sine } from './helpers/signals';

// one-second chunks keep the exact DFT cheap
const config = resolveSpectralConfig({ chunkLengthSamples: 16000 });
const bank = createFilterBank(config);

describe('resolveSpectralConfig', () => {
  it('keeps the Whisper defaults', () => {
    expect(resolveSpectralConfig()).toEqual(DEFAULT_SPECTRAL_CONFIG);
  });

  it('derives the frame count from a chunk length', () => {
    expect(config.chunkLengthSamples).toBe(16000);
    expect(config.nFrames).toBe(100);
  });

  it('derives the chunk length from a frame count', () => {
    const resolved = resolveSpectralConfig({ nFrames: 1500 });
    expect(resolved.chunkLengthSamples).toBe(1500 * 160);
    expect(resolved.nFrames).toBe(1500);
  });

  it('rejects non-positive sizes', () => {
    expect(() => resolveSpectralConfig({ nMels: 0 })).toThrow();
  });
});

describe('analysis window', () => {
  it('is a periodic Hann window', () => {
    const window = createHannWindow(400);
    expect(window[0]).toBe(0);
    expect(window[200]).toBeCloseTo(1, 6);
    for (let i = 1; i < 400; i++) {
      expect(window[i]).toBeCloseTo(window[400 - i], 6);
    }
  });

  it('is mirror-symmetric for odd and small sizes too', () => {
    for (const n of [2, 7, 64]) {
      const window = createHannWindow(n);
      for (let i = 1; i < n; i++) {
        expect(window[i]).toBeCloseTo(window[n - i], 6);
      }
    }
  });
});

describe('Slaney mel scale', () => {
  it('is linear below 1 kHz and logarithmic above', () => {
    expect(hzToMel(0)).toBe(0);
    expect(hzToMel(200)).toBeCloseTo(3, 10);
    expect(hzToMel(1000)).toBeCloseTo(15, 10);
    expect(hzToMel(6400)).toBeCloseTo(15 + 27, 10);
  });

  it('round-trips through melToHz', () => {
    for (const hz of [50, 440, 999, 1000, 4000, 8000]) {
      expect(melToHz(hzToMel(hz))).toBeCloseTo(hz, 6);
    }
  });

  it('spans 0 Hz to Nyquist in nMels + 2 boundaries', () => {
    const boundaries = createMelBoundaries(config);
    expect(boundaries.length).toBe(82);
    expect(boundaries[0]).toBe(0);
    expect(boundaries[81]).toBeCloseTo(8000, 6);
  });
});

describe('filter bank', () => {
  const freqBins = freqBinCount(config);
  const binWidth = config.sampleRate / config.nFft;

  it('scales every triangle by 2 / bandwidth', () => {
    for (let m = 0; m < config.nMels; m++) {
      const bandwidth = bank.melBoundariesHz[m + 2] - bank.melBoundariesHz[m];
      const row = bank.melFilters.subarray(m * freqBins, (m + 1) * freqBins);
      const peak = Math.max(...row);
      expect(peak).toBeLessThanOrEqual(2 / bandwidth + 1e-9);
    }
  });

  it('gives wide filters unit area', () => {
    for (let m = 70; m < config.nMels; m++) {
      const row = bank.melFilters.subarray(m * freqBins, (m + 1) * freqBins);
      const area = row.reduce((sum, weight) => sum + weight * binWidth, 0);
      expect(Math.abs(area - 1)).toBeLessThan(0.05);
    }
  });

  it('accepts precomputed filters in either orientation', () => {
    const rows: number[][] = [];
    for (let m = 0; m < config.nMels; m++) {
      rows.push(Array.from({ length: freqBins }, (_, k) => m * 1000 + k));
    }
    const transposed = Array.from({ length: freqBins }, (_, k) => rows.map((row) => row[k]));

    const direct = adoptMelFilters(config, rows);
    const flipped = adoptMelFilters(config, transposed);
    expect(direct?.[3 * freqBins + 7]).toBe(3007);
    expect(flipped).toEqual(direct);
  });

  it('falls back to Slaney filters for a mismatched shape', () => {
    const odd = createFilterBank(config, [[1, 2, 3]]);
    expect(odd.filterSource).toBe('slaney');
    expect(odd.melFilters).toEqual(bank.melFilters);
  });
});

describe('computeLogMel', () => {
  it('reflect-pads around the edge samples', () => {
    const padded = reflectPad(new Float32Array([1, 2, 3, 4]), 2);
    expect(Array.from(padded)).toEqual([3, 2, 1, 2, 3, 4, 3, 2]);
  });

  it('fills out-of-range reflections with silence', () => {
    const padded = reflectPad(new Float32Array([5]), 2);
    expect(Array.from(padded)).toEqual([0, 0, 5, 0, 0]);
  });

  it('drops the final STFT frame', () => {
    expect(stftFrameCount(16000 + 400, config)).toBe(100);
    expect(stftFrameCount(8000 + 400, config)).toBe(50);
  });

  it('maps an all-zero chunk to the normalized silence floor', () => {
    const mel = computeLogMel(new Float32Array(config.chunkLengthSamples), bank);
    expect(mel.dims).toEqual([1, 80, 100]);
    expect(mel.data.length).toBe(8000);
    for (const value of mel.data) {
      expect(value).toBe(-1.5);
    }
  });

  it('keeps the normalized spread within 2', () => {
    const audio = sine(440, 16000, 16000, 0.8);
    const hiss = noise(16000, 7, 0.001);
    for (let i = 0; i < audio.length; i++) audio[i] += hiss[i];

    const stats = describeMel(computeLogMel(audio, bank));
    expect(stats.hasNaN).toBe(false);
    expect(stats.hasInfinity).toBe(false);
    expect(stats.max - stats.min).toBeLessThanOrEqual(2 + 1e-6);
  });

  it('peaks in the filter covering a pure tone', () => {
    const mel = computeLogMel(sine(1000, 16000, 16000), bank);
    const frame = 50;
    let best = 0;
    for (let m = 1; m < 80; m++) {
      if (mel.data[m * 100 + frame] > mel.data[best * 100 + frame]) best = m;
    }
    expect(bank.melBoundariesHz[best]).toBeLessThan(1000);
    expect(bank.melBoundariesHz[best + 2]).toBeGreaterThan(1000);
  });

  it('fills frames past a short chunk with the clamped floor', () => {
    const mel = computeLogMel(sine(440, 16000, 8000), bank);
    const stats = describeMel(mel);
    for (let m = 0; m < 80; m++) {
      for (let frame = 50; frame < 100; frame++) {
        expect(mel.data[m * 100 + frame]).toBe(stats.min);
      }
    }
  });

  it('reports uniform statistics for silence', () => {
    const mel = computeLogMel(constant(16000, 0), bank);
    expect(describeMel(mel)).toEqual({ min: -1.5, max: -1.5, mean: -1.5, hasNaN: false, hasInfinity: false });
  });
});

describe('LogMelExtractor', () => {
  const parallel = new LogMelExtractor(config, { workers: 3 });
  const serial = new LogMelExtractor(config, { workers: 1 });

  afterAll(async () => {
    await parallel.close();
    await serial.close();
  });

  it('computes the same spectrogram on worker threads', async () => {
    const audio = sine(523.25, 16000, 12345, 0.3);
    const expected = computeLogMel(audio, bank);

    const fromWorkers = await parallel.extract(audio);
    expect(fromWorkers.dims).toEqual(expected.dims);
    expect(fromWorkers.data).toEqual(expected.data);

    const fromMainThread = await serial.extract(audio);
    expect(fromMainThread.data).toEqual(expected.data);
  });

  it('falls back to the calling thread when the pool fails mid-extraction', async () => {
    const extractor = new LogMelExtractor(config, { workers: 2 });
    const audio = sine(300, 16000, 16000, 0.4);

    const pending = extractor.extract(audio);
    await extractor.close();

    expect((await pending).data).toEqual(computeLogMel(audio, bank).data);
  });

  it('swaps the whole bank on reconfigure', async () => {
    const extractor = new LogMelExtractor(config, { workers: 1 });
    const before = extractor.filterBank;
    extractor.reconfigure(resolveSpectralConfig({ chunkLengthSamples: 8000, nMels: 40 }));

    expect(extractor.filterBank).not.toBe(before);
    expect(before.config.nMels).toBe(80);
    const mel = await extractor.extract(new Float32Array(8000));
    expect(mel.dims).toEqual([1, 40, 50]);
  });
});

describe('FramePool', () => {
  it('fails the jobs of a worker that exits and replaces it', async () => {
    const pool = new FramePool(2);
    try {
      const audio = noise(16000, 9);
      const padded = reflectPad(audio, Math.floor(config.nFft / 2), true);
      const frames = Math.min(stftFrameCount(padded.length, config), config.nFrames);

      const lost = expect(pool.computePower(padded, bank, frames)).rejects.toThrow(/^Frame worker 0 exited/);
      const dead = pool.threads[0];
      await dead.terminate();
      await lost;

      expect(pool.threads[0]).not.toBe(dead);
      const power = await pool.computePower(padded, bank, frames);
      expect(projectToLogMel(power, frames, bank).data).toEqual(computeLogMel(audio, bank).data);
    } finally {
      await pool.close();
    }
  });
});
