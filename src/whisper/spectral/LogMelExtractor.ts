import { DYNAMIC_RANGE_DB, LOG_ENERGY_FLOOR } from '../../config/constants';
import { createLogger } from '../../utils/logger';
import type { FloatTensor, SpectralConfig } from '../types';
import { createFilterBank, type FilterBank } from './FilterBank';
import { FramePool, defaultWorkerCount } from './FramePool';
import { powerSpectrumFrames } from './powerSpectrumKernel';

const logger = createLogger({ service: 'LogMelExtractor' });

/**
 * Reflect-pad by `pad` samples on each side, mirroring around the first and
 * last sample. Reflections that fall outside the input are silence.
 */
export function reflectPad(audio: Float32Array, pad: number, shared = false): Float32Array {
  const length = audio.length + 2 * pad;
  const padded = shared
    ? new Float32Array(new SharedArrayBuffer(length * Float32Array.BYTES_PER_ELEMENT))
    : new Float32Array(length);

  for (let i = 0; i < pad; i++) {
    const source = pad - i;
    padded[i] = source < audio.length ? audio[source] : 0;
  }
  padded.set(audio, pad);
  for (let i = 0; i < pad; i++) {
    const source = audio.length - 2 - i;
    padded[pad + audio.length + i] = source >= 0 ? audio[source] : 0;
  }

  return padded;
}

/** STFT frame count with the final frame dropped */
export function stftFrameCount(paddedLength: number, config: SpectralConfig): number {
  if (paddedLength < config.nFft) return 0;
  const total = Math.floor((paddedLength - config.nFft) / config.hopLength) + 1;
  return Math.max(0, total - 1);
}

/**
 * Mel projection, log10 floor, padding frames, dynamic range clamp and
 * normalization. `power` holds `computedFrames` frames of `freqBins` values.
 */
export function projectToLogMel(power: Float32Array, computedFrames: number, bank: FilterBank): FloatTensor {
  const { nMels, nFrames } = bank.config;
  const { freqBins, melFilters } = bank;
  const data = new Float32Array(nMels * nFrames);
  const silence = Math.log10(LOG_ENERGY_FLOOR);

  let globalMax = -Infinity;
  for (let m = 0; m < nMels; m++) {
    const filterRow = m * freqBins;
    for (let frame = 0; frame < nFrames; frame++) {
      let value = silence;
      if (frame < computedFrames) {
        const powerRow = frame * freqBins;
        let energy = 0;
        for (let k = 0; k < freqBins; k++) {
          energy += melFilters[filterRow + k] * power[powerRow + k];
        }
        value = Math.log10(Math.max(energy, LOG_ENERGY_FLOOR));
      }
      data[m * nFrames + frame] = value;
      if (value > globalMax) globalMax = value;
    }
  }

  const floor = globalMax - DYNAMIC_RANGE_DB;
  for (let i = 0; i < data.length; i++) {
    data[i] = (Math.max(data[i], floor) + 4) / 4;
  }

  return { data, dims: [1, nMels, nFrames] };
}

/**
 * Log-mel spectrogram of one chunk, dims [1, nMels, nFrames], on the calling
 * thread.
 */
export function computeLogMel(audio: Float32Array, bank: FilterBank): FloatTensor {
  const { config } = bank;
  const padded = reflectPad(audio, Math.floor(config.nFft / 2));
  const frames = Math.min(stftFrameCount(padded.length, config), config.nFrames);
  const power = new Float32Array(frames * bank.freqBins);

  powerSpectrumFrames(
    padded,
    bank.window,
    bank.dftCos,
    bank.dftSin,
    config.nFft,
    config.hopLength,
    bank.freqBins,
    0,
    frames,
    power
  );

  return projectToLogMel(power, frames, bank);
}

export interface MelStats {
  min: number;
  max: number;
  mean: number;
  hasNaN: boolean;
  hasInfinity: boolean;
}

export function describeMel(tensor: FloatTensor): MelStats {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let finiteCount = 0;
  let hasNaN = false;
  let hasInfinity = false;

  for (const value of tensor.data) {
    if (Number.isNaN(value)) {
      hasNaN = true;
      continue;
    }
    if (!Number.isFinite(value)) {
      hasInfinity = true;
      continue;
    }
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
    finiteCount++;
  }

  return {
    min,
    max,
    mean: finiteCount > 0 ? sum / finiteCount : NaN,
    hasNaN,
    hasInfinity
  };
}

export interface FeatureExtractor {
  readonly filterBank: FilterBank;
  extract(audio: Float32Array): Promise<FloatTensor>;
}

export interface LogMelExtractorOptions {
  /** 1 keeps all work on the calling thread; 0 or undefined uses one worker per core */
  workers?: number;
  melFilters?: readonly (readonly number[])[];
}

/**
 * Owns the current filter bank and, when configured for more than one worker,
 * a frame pool. The pool is started on first use.
 */
export class LogMelExtractor implements FeatureExtractor {
  private bank: FilterBank;
  private pool: FramePool | null = null;
  private readonly workerCount: number;

  constructor(config: SpectralConfig, options: LogMelExtractorOptions = {}) {
    this.bank = createFilterBank(config, options.melFilters);
    this.workerCount = options.workers && options.workers > 0 ? options.workers : defaultWorkerCount();
  }

  get filterBank(): FilterBank {
    return this.bank;
  }

  /** Installs a freshly built bank; extractions already running keep the old one */
  reconfigure(config: SpectralConfig, melFilters?: readonly (readonly number[])[]): void {
    this.bank = createFilterBank(config, melFilters);
    logger.info(
      { sampleRate: config.sampleRate, nMels: config.nMels, nFrames: config.nFrames },
      'Spectral configuration replaced'
    );
  }

  async extract(audio: Float32Array): Promise<FloatTensor> {
    const bank = this.bank;
    if (this.workerCount <= 1) {
      return computeLogMel(audio, bank);
    }

    const { config } = bank;
    const padded = reflectPad(audio, Math.floor(config.nFft / 2), true);
    const frames = Math.min(stftFrameCount(padded.length, config), config.nFrames);

    if (!this.pool) {
      this.pool = new FramePool(this.workerCount);
    }
    let power: Float32Array;
    try {
      power = await this.pool.computePower(padded, bank, frames);
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Frame pool failed, computing on the calling thread'
      );
      return computeLogMel(audio, bank);
    }
    return projectToLogMel(power, frames, bank);
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    await pool.close();
  }
}
