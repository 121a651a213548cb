/**
 * Power spectrum of analysis frames `[start, end)` by exact N-point DFT.
 *
 * Runs both on the main thread and inside feature workers, where it is loaded
 * from its own source text: it must stay self-contained (no imports, no
 * closures, no nested functions, only built-in globals).
 *
 * `out` holds `freqBins` values per frame, frame-major.
 */
export function powerSpectrumFrames(
  padded: Float32Array,
  window: Float32Array,
  dftCos: Float64Array,
  dftSin: Float64Array,
  nFft: number,
  hopLength: number,
  freqBins: number,
  start: number,
  end: number,
  out: Float32Array
): void {
  const windowed = new Float64Array(nFft);

  for (let frame = start; frame < end; frame++) {
    const offset = frame * hopLength;
    for (let t = 0; t < nFft; t++) {
      const index = offset + t;
      const sample = index < padded.length ? padded[index] : 0;
      windowed[t] = sample * window[t];
    }

    for (let k = 0; k < freqBins; k++) {
      const row = k * nFft;
      let re = 0;
      let im = 0;
      for (let t = 0; t < nFft; t++) {
        re += windowed[t] * dftCos[row + t];
        im -= windowed[t] * dftSin[row + t];
      }
      out[frame * freqBins + k] = re * re + im * im;
    }
  }
}
