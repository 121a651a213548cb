/**
 * Token Policy
 *
 * Score adjustments and selection applied to the decoder's logits for the
 * last position. Stateless: recent tokens and the ban list come from the
 * caller's DecodeState. The in-place helpers mutate the scores they are given;
 * callers work on a copy of the logits.
 */

import type { TextDecoderLike } from '../types';

export interface TokenPolicyOptions {
  repetitionPenalty: number;
  repetitionWindow: number;
  qualityTopK: number;
  qualityMaskCap: number;
  initialSamplingSteps: number;
  samplingTopK: number;
  samplingTemperature: number;
  /** Greedy picks whose text falls below this alphanumeric ratio are resampled */
  greedyMinAlphaRatio: number;
}

export const DEFAULT_TOKEN_POLICY: Readonly<TokenPolicyOptions> = Object.freeze({
  repetitionPenalty: 2.0,
  repetitionWindow: 15,
  qualityTopK: 64,
  qualityMaskCap: 16,
  initialSamplingSteps: 3,
  samplingTopK: 50,
  samplingTemperature: 0.8,
  greedyMinAlphaRatio: 0.25
});

export interface Candidate {
  id: number;
  score: number;
}

// ---------------------------------------------------------------------------
// Text heuristics
// ---------------------------------------------------------------------------

const LETTER_OR_DIGIT = /^[\p{L}\p{Nd}]$/u;
const PUNCTUATION = /^\p{P}$/u;
const CONTROL = /\p{Cc}/u;

/** Byte-level BPE marks a leading space with Ġ */
export function normalizeTokenText(text: string): string {
  return text.replace(/Ġ/g, ' ').trim();
}

export function alphanumericRatio(text: string): number {
  const chars = Array.from(text);
  if (chars.length === 0) return 0;
  const alnum = chars.filter((ch) => LETTER_OR_DIGIT.test(ch)).length;
  return alnum / chars.length;
}

/**
 * Normalized token text that should never win: empty, one or two
 * characters without a letter or digit, only non-ASCII symbols, a
 * replacement character, or control characters.
 */
export function isLowQualityText(normalized: string): boolean {
  const chars = Array.from(normalized);
  if (chars.length === 0) return true;

  const alnum = chars.filter((ch) => LETTER_OR_DIGIT.test(ch)).length;
  if (chars.length <= 2 && alnum === 0) return true;

  const nonAsciiSymbolsOnly = chars.every(
    (ch) => (ch.codePointAt(0) ?? 0) > 127 && !LETTER_OR_DIGIT.test(ch) && !PUNCTUATION.test(ch)
  );
  if (nonAsciiSymbolsOnly) return true;

  return normalized.includes('\uFFFD') || CONTROL.test(normalized);
}

/** Very short with hardly any letters or digits, e.g. "-", "..", "♪" */
export function isSymbolLike(normalized: string): boolean {
  return Array.from(normalized).length <= 3 && alphanumericRatio(normalized) < 0.25;
}

export function decodeTokenText(tokenizer: TextDecoderLike, id: number): string {
  return normalizeTokenText(tokenizer.decode([id]));
}

// ---------------------------------------------------------------------------
// Score adjustments
// ---------------------------------------------------------------------------

/** Only end-of-transcript may be chosen among the special ids */
export function suppressSpecialTokens(scores: Float32Array, suppressFrom: number): void {
  scores.fill(-Infinity, Math.max(0, suppressFrom));
}

export function maskBannedTokens(scores: Float32Array, banned: Iterable<number>): void {
  for (const id of banned) {
    if (id >= 0 && id < scores.length) scores[id] = -Infinity;
  }
}

/**
 * Multiplicative penalty on content ids among the last `window` tokens:
 * positive scores are divided, the rest multiplied.
 */
export function applyRepetitionPenalty(
  scores: Float32Array,
  recentTokens: readonly number[],
  suppressFrom: number,
  penalty: number,
  window: number
): void {
  const unique = new Set(recentTokens.slice(Math.max(0, recentTokens.length - window)));
  for (const id of unique) {
    if (id < 0 || id >= suppressFrom || id >= scores.length) continue;
    scores[id] = scores[id] > 0 ? scores[id] / penalty : scores[id] * penalty;
  }
}

/**
 * The `k` highest scores, best first; ties keep the lower id first.
 * With `finiteOnly`, -Infinity and NaN entries are skipped.
 */
export function topCandidates(scores: Float32Array, k: number, finiteOnly = false): Candidate[] {
  const top: Candidate[] = [];
  if (k <= 0) return top;

  for (let id = 0; id < scores.length; id++) {
    const score = scores[id];
    if (Number.isNaN(score)) continue;
    if (finiteOnly && !Number.isFinite(score)) continue;
    if (top.length === k && score <= top[k - 1].score) continue;

    let at = top.length;
    while (at > 0 && top[at - 1].score < score) at--;
    top.splice(at, 0, { id, score });
    if (top.length > k) top.pop();
  }

  return top;
}

/**
 * Masks up to `cap` of the `topK` best candidates whose text is low quality.
 * End-of-transcript is never masked.
 *
 * @returns number of masked candidates
 */
export function maskLowQualityCandidates(
  scores: Float32Array,
  tokenizer: TextDecoderLike,
  suppressFrom: number,
  eot: number,
  topK: number,
  cap: number
): number {
  let masked = 0;
  for (const candidate of topCandidates(scores, topK, true)) {
    if (masked >= cap) break;
    if (candidate.id >= suppressFrom || candidate.id === eot) continue;

    if (isLowQualityText(decodeTokenText(tokenizer, candidate.id))) {
      scores[candidate.id] = -Infinity;
      masked++;
    }
  }
  return masked;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/** Index of the highest finite score, or -1 when every score is -Infinity */
export function argmax(scores: Float32Array, exclude?: ReadonlySet<number>): number {
  let best = -1;
  let bestScore = -Infinity;
  for (let id = 0; id < scores.length; id++) {
    if (exclude?.has(id)) continue;
    if (scores[id] > bestScore) {
      bestScore = scores[id];
      best = id;
    }
  }
  return best;
}

/**
 * Temperature-weighted draw among the `k` best finite candidates.
 * Returns -1 when nothing is finite.
 */
export function sampleTopK(scores: Float32Array, k: number, temperature: number, random: () => number): number {
  const candidates = topCandidates(scores, k, true);
  if (candidates.length === 0) return -1;

  const t = Math.max(1e-6, temperature);
  const maxScore = candidates[0].score;
  const weights = candidates.map((c) => Math.exp((c.score - maxScore) / t));
  const total = weights.reduce((sum, w) => sum + w, 0);

  const r = random() * total;
  let acc = 0;
  for (let i = 0; i < candidates.length; i++) {
    acc += weights[i];
    if (r <= acc) return candidates[i].id;
  }
  return candidates[candidates.length - 1].id;
}

export interface Selection {
  id: number;
  sampled: boolean;
}

/**
 * Greedy by default. Samples during the first `initialSamplingSteps`
 * generated tokens, or when the greedy pick decodes to empty or mostly
 * non-alphanumeric text.
 */
export function selectToken(
  scores: Float32Array,
  generatedSteps: number,
  tokenizer: TextDecoderLike,
  options: TokenPolicyOptions,
  random: () => number
): Selection {
  const greedy = argmax(scores);
  if (greedy < 0) return { id: -1, sampled: false };

  let sample = generatedSteps < options.initialSamplingSteps;
  if (!sample) {
    const text = decodeTokenText(tokenizer, greedy);
    sample = text.length === 0 || alphanumericRatio(text) < options.greedyMinAlphaRatio;
  }

  if (sample) {
    const sampled = sampleTopK(scores, options.samplingTopK, options.samplingTemperature, random);
    if (sampled >= 0) return { id: sampled, sampled: true };
  }

  return { id: greedy, sampled: false };
}

export interface ScoreContext {
  eot: number;
  recentTokens: readonly number[];
  banned: Iterable<number>;
}

/**
 * Full adjustment sequence on a copy of the raw scores: special-token
 * suppression, ban list, repetition penalty, quality mask.
 */
export function adjustScores(
  logits: Float32Array,
  context: ScoreContext,
  tokenizer: TextDecoderLike,
  options: TokenPolicyOptions
): { scores: Float32Array; masked: number } {
  const scores = Float32Array.from(logits);
  const suppressFrom = context.eot + 1;

  suppressSpecialTokens(scores, suppressFrom);
  maskBannedTokens(scores, context.banned);
  applyRepetitionPenalty(scores, context.recentTokens, suppressFrom, options.repetitionPenalty, options.repetitionWindow);
  const masked = maskLowQualityCandidates(
    scores,
    tokenizer,
    suppressFrom,
    context.eot,
    options.qualityTopK,
    options.qualityMaskCap
  );

  return { scores, masked };
}
