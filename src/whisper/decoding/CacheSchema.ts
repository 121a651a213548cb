import { TENSOR_NAMES } from '../../config/constants';
import type { CacheSlot, FloatTensor } from '../types';

/**
 * Builds the cache slot schema from a decoder's declared names. Every
 * `past_key_values.*` input must have a matching `present.*` output.
 */
export function resolveCacheSlots(
  inputNames: readonly string[],
  outputNames: readonly string[],
  emptyDims: readonly number[]
): CacheSlot[] {
  const outputs = new Set(outputNames);

  return inputNames
    .filter((name) => name.startsWith(TENSOR_NAMES.PAST_PREFIX))
    .map((inputName, index) => {
      const outputName = TENSOR_NAMES.PRESENT_PREFIX + inputName.slice(TENSOR_NAMES.PAST_PREFIX.length);
      if (!outputs.has(outputName)) {
        throw new Error(`Decoder declares ${inputName} but no ${outputName} output`);
      }
      return { index, inputName, outputName, emptyDims: [...emptyDims] };
    });
}

export function emptyTensor(dims: readonly number[]): FloatTensor {
  const size = dims.reduce((product, dim) => product * dim, 1);
  return { data: new Float32Array(size), dims: [...dims] };
}

/**
 * Key/value cache of one chunk, indexed by slot. Holds zero tensors until the
 * first decoder call; afterwards each call's "present" outputs replace the
 * whole array.
 */
export class KeyValueCache {
  private tensors: FloatTensor[];
  private filled = false;

  constructor(private readonly slots: readonly CacheSlot[]) {
    this.tensors = slots.map((slot) => emptyTensor(slot.emptyDims));
  }

  get populated(): boolean {
    return this.filled;
  }

  get values(): readonly FloatTensor[] {
    return this.tensors;
  }

  replace(present: readonly FloatTensor[]): void {
    if (present.length !== this.slots.length) {
      throw new Error(`Expected ${this.slots.length} present tensors, got ${present.length}`);
    }
    this.tensors = [...present];
    this.filled = true;
  }

  clear(): void {
    this.tensors = this.slots.map((slot) => emptyTensor(slot.emptyDims));
    this.filled = false;
  }
}
