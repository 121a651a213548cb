import { createLogger } from '../../utils/logger';
import type { SpectralConfig } from '../types';
import { freqBinCount } from './SpectralConfig';

const logger = createLogger({ service: 'FilterBank' });

// Slaney mel scale
const F_SP = 200 / 3;
const MIN_LOG_HZ = 1000;
const MIN_LOG_MEL = MIN_LOG_HZ / F_SP; // 15
const LOG_STEP = Math.log(6.4) / 27;

/**
 * Everything the log-mel extraction needs for one spectral configuration.
 *
 * Built once per configuration by {@link createFilterBank} and never mutated;
 * a reconfiguration builds a new bank. The tables live in shared memory so the
 * feature workers can read them without a copy.
 */
export interface FilterBank {
  readonly config: SpectralConfig;
  readonly freqBins: number;
  /** Periodic Hann window, length nFft */
  readonly window: Float32Array;
  /** nMels rows of freqBins weights */
  readonly melFilters: Float32Array;
  /** nMels + 2 boundary frequencies in Hz */
  readonly melBoundariesHz: Float64Array;
  /** freqBins rows of nFft twiddles */
  readonly dftCos: Float64Array;
  readonly dftSin: Float64Array;
  readonly filterSource: 'slaney' | 'preprocessor';
}

export function hzToMel(hz: number): number {
  if (hz < MIN_LOG_HZ) {
    return hz / F_SP;
  }
  return MIN_LOG_MEL + Math.log(hz / MIN_LOG_HZ) / LOG_STEP;
}

export function melToHz(mel: number): number {
  if (mel < MIN_LOG_MEL) {
    return F_SP * mel;
  }
  return MIN_LOG_HZ * Math.exp(LOG_STEP * (mel - MIN_LOG_MEL));
}

function sharedFloat32(length: number): Float32Array {
  return new Float32Array(new SharedArrayBuffer(length * Float32Array.BYTES_PER_ELEMENT));
}

function sharedFloat64(length: number): Float64Array {
  return new Float64Array(new SharedArrayBuffer(length * Float64Array.BYTES_PER_ELEMENT));
}

export function createHannWindow(length: number): Float32Array {
  const window = sharedFloat32(length);
  for (let i = 0; i < length; i++) {
    window[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / length));
  }
  return window;
}

export function createMelBoundaries(config: SpectralConfig): Float64Array {
  const points = config.nMels + 2;
  const minMel = hzToMel(0);
  const maxMel = hzToMel(config.sampleRate / 2);
  const boundaries = new Float64Array(points);
  for (let i = 0; i < points; i++) {
    boundaries[i] = melToHz(minMel + ((maxMel - minMel) * i) / (points - 1));
  }
  return boundaries;
}

/**
 * Triangular Slaney filters: filter m rises from boundary m to m+1, falls to
 * m+2, and is scaled by 2 / (hz[m+2] - hz[m]).
 */
export function createSlaneyFilters(config: SpectralConfig, boundaries: Float64Array): Float32Array {
  const freqBins = freqBinCount(config);
  const filters = sharedFloat32(config.nMels * freqBins);

  for (let m = 0; m < config.nMels; m++) {
    const lower = boundaries[m];
    const center = boundaries[m + 1];
    const upper = boundaries[m + 2];
    const enorm = 2 / (upper - lower);

    for (let k = 0; k < freqBins; k++) {
      const freq = (k * config.sampleRate) / config.nFft;
      let weight = 0;
      if (freq >= lower && freq <= center && center > lower) {
        weight = (freq - lower) / (center - lower);
      } else if (freq > center && freq <= upper && upper > center) {
        weight = (upper - freq) / (upper - center);
      }
      filters[m * freqBins + k] = weight * enorm;
    }
  }

  return filters;
}

/**
 * Accepts precomputed filters laid out [nMels][freqBins] or transposed
 * [freqBins][nMels]. Returns undefined for any other shape.
 */
export function adoptMelFilters(
  config: SpectralConfig,
  rows: readonly (readonly number[])[]
): Float32Array | undefined {
  const freqBins = freqBinCount(config);
  const width = rows.length > 0 ? rows[0].length : 0;
  if (rows.some((row) => row.length !== width)) {
    return undefined;
  }

  const filters = sharedFloat32(config.nMels * freqBins);

  if (rows.length === config.nMels && width === freqBins) {
    rows.forEach((row, m) => filters.set(row, m * freqBins));
    return filters;
  }

  if (rows.length === freqBins && width === config.nMels) {
    rows.forEach((row, k) => {
      row.forEach((weight, m) => {
        filters[m * freqBins + k] = weight;
      });
    });
    return filters;
  }

  return undefined;
}

function createDftTables(nFft: number, freqBins: number): { dftCos: Float64Array; dftSin: Float64Array } {
  const dftCos = sharedFloat64(freqBins * nFft);
  const dftSin = sharedFloat64(freqBins * nFft);
  for (let k = 0; k < freqBins; k++) {
    for (let t = 0; t < nFft; t++) {
      const angle = (2 * Math.PI * k * t) / nFft;
      dftCos[k * nFft + t] = Math.cos(angle);
      dftSin[k * nFft + t] = Math.sin(angle);
    }
  }
  return { dftCos, dftSin };
}

export function createFilterBank(
  config: SpectralConfig,
  melFilters?: readonly (readonly number[])[]
): FilterBank {
  const freqBins = freqBinCount(config);
  const melBoundariesHz = createMelBoundaries(config);

  let filters: Float32Array | undefined;
  if (melFilters) {
    filters = adoptMelFilters(config, melFilters);
    if (!filters) {
      logger.warn(
        { rows: melFilters.length, nMels: config.nMels, freqBins },
        'mel_filters shape does not match configuration, using computed Slaney filters'
      );
    }
  }

  const { dftCos, dftSin } = createDftTables(config.nFft, freqBins);

  const bank: FilterBank = {
    config,
    freqBins,
    window: createHannWindow(config.nFft),
    melFilters: filters ?? createSlaneyFilters(config, melBoundariesHz),
    melBoundariesHz,
    dftCos,
    dftSin,
    filterSource: filters ? 'preprocessor' : 'slaney'
  };

  logger.debug(
    { nFft: config.nFft, nMels: config.nMels, freqBins, filterSource: bank.filterSource },
    'Filter bank built'
  );

  return Object.freeze(bank);
}
