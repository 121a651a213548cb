/**
 * Step guards
 *
 * The reselection rules of the decode loop as a small state machine. Each
 * guard looks at the candidate chosen by the token policy and answers with a
 * verdict: accept it, reject it and resample, or terminate the chunk.
 * {@link resolveCandidate} drives the guards for one step.
 */

import type { TextDecoderLike } from '../types';
import type { DecodeState } from './DecodeState';
import { alphanumericRatio, argmax, decodeTokenText, isSymbolLike } from './TokenPolicy';

export type TerminationReason =
  | 'end-of-transcript'
  | 'early-eot-without-alternative'
  | 'no-candidate'
  | 'repeated-ngram'
  | 'token-limit'
  | 'decoder-failed'
  | 'cancelled';

export type GuardVerdict =
  | { action: 'accept'; tokenId: number }
  | { action: 'reject-and-resample'; rejected: number; reason: 'early-eot' | 'repeated-symbol' }
  | { action: 'terminate'; reason: TerminationReason };

export interface GuardOptions {
  minTokensBeforeEot: number;
  /** Early-EOT replacement must have at least this length and alphanumeric ratio */
  eotReselectMinLength: number;
  eotReselectMinAlphaRatio: number;
  symbolReselectAttempts: number;
  symbolReselectMinLength: number;
  symbolReselectMinAlphaRatio: number;
  loopMinHistory: number;
  loopMinNgram: number;
  loopMaxNgram: number;
}

export const DEFAULT_GUARD_OPTIONS: Readonly<GuardOptions> = Object.freeze({
  minTokensBeforeEot: 3,
  eotReselectMinLength: 2,
  eotReselectMinAlphaRatio: 0.4,
  symbolReselectAttempts: 3,
  symbolReselectMinLength: 2,
  symbolReselectMinAlphaRatio: 0.35,
  loopMinHistory: 6,
  loopMinNgram: 3,
  loopMaxNgram: 6
});

export interface GuardContext {
  /** Adjusted scores of this step; guards mask rejected ids in place */
  scores: Float32Array;
  state: DecodeState;
  eot: number;
  tokenizer: TextDecoderLike;
  options: GuardOptions;
}

export function earlyEotGuard(candidate: number, ctx: GuardContext): GuardVerdict {
  if (candidate !== ctx.eot) return { action: 'accept', tokenId: candidate };
  if (ctx.state.contentCount >= ctx.options.minTokensBeforeEot) {
    return { action: 'terminate', reason: 'end-of-transcript' };
  }
  return { action: 'reject-and-resample', rejected: candidate, reason: 'early-eot' };
}

export function repeatedSymbolGuard(candidate: number, ctx: GuardContext): GuardVerdict {
  const text = decodeTokenText(ctx.tokenizer, candidate);
  if (isSymbolLike(text) && ctx.state.lastContentToken === candidate) {
    return { action: 'reject-and-resample', rejected: candidate, reason: 'repeated-symbol' };
  }
  return { action: 'accept', tokenId: candidate };
}

function qualifies(id: number, minLength: number, minRatio: number, ctx: GuardContext): boolean {
  const text = decodeTokenText(ctx.tokenizer, id);
  return Array.from(text).length >= minLength && alphanumericRatio(text) >= minRatio && !ctx.state.isBanned(id);
}

/** Best non-EOT candidate if its text is good enough to stand in for an early EOT */
export function resampleAfterEarlyEot(ctx: GuardContext): number | undefined {
  const best = argmax(ctx.scores, new Set([ctx.eot]));
  if (best < 0) return undefined;
  const { eotReselectMinLength, eotReselectMinAlphaRatio } = ctx.options;
  return qualifies(best, eotReselectMinLength, eotReselectMinAlphaRatio, ctx) ? best : undefined;
}

/** Next-best candidates after masking `rejected`; each failed attempt is masked too */
export function resampleAfterRepeatedSymbol(rejected: number, ctx: GuardContext): number | undefined {
  const { symbolReselectAttempts, symbolReselectMinLength, symbolReselectMinAlphaRatio } = ctx.options;
  ctx.scores[rejected] = -Infinity;

  for (let attempt = 0; attempt < symbolReselectAttempts; attempt++) {
    const next = argmax(ctx.scores);
    if (next < 0) return undefined;
    if (qualifies(next, symbolReselectMinLength, symbolReselectMinAlphaRatio, ctx)) return next;
    ctx.scores[next] = -Infinity;
  }
  return undefined;
}

export type StepResolution =
  | { action: 'accept'; tokenId: number; reselected: boolean; ban: boolean }
  | { action: 'terminate'; reason: TerminationReason };

export function resolveCandidate(candidate: number, ctx: GuardContext): StepResolution {
  if (candidate < 0) return { action: 'terminate', reason: 'no-candidate' };

  let tokenId = candidate;
  let reselected = false;

  const eotVerdict = earlyEotGuard(tokenId, ctx);
  if (eotVerdict.action === 'terminate') return eotVerdict;
  if (eotVerdict.action === 'reject-and-resample') {
    const replacement = resampleAfterEarlyEot(ctx);
    if (replacement === undefined) {
      return { action: 'terminate', reason: 'early-eot-without-alternative' };
    }
    tokenId = replacement;
    reselected = true;
  }

  const symbolVerdict = repeatedSymbolGuard(tokenId, ctx);
  if (symbolVerdict.action === 'reject-and-resample') {
    const replacement = resampleAfterRepeatedSymbol(tokenId, ctx);
    if (replacement === undefined) {
      // emitted once more, then banned for the rest of the chunk
      return { action: 'accept', tokenId, reselected, ban: true };
    }
    tokenId = replacement;
    reselected = true;
  }

  return { action: 'accept', tokenId, reselected, ban: false };
}

/**
 * Size of an n-gram at the end of `history` that repeats the n-gram right
 * before it, or undefined. Only checked once `contentCount` reaches
 * `loopMinHistory`.
 */
export function detectRepeatedNgram(
  history: readonly number[],
  contentCount: number,
  options: Pick<GuardOptions, 'loopMinHistory' | 'loopMinNgram' | 'loopMaxNgram'>
): number | undefined {
  if (contentCount < options.loopMinHistory) return undefined;

  const maxN = Math.min(options.loopMaxNgram, Math.floor(history.length / 2));
  for (let n = options.loopMinNgram; n <= maxN; n++) {
    let same = true;
    for (let i = 0; i < n; i++) {
      if (history[history.length - n + i] !== history[history.length - 2 * n + i]) {
        same = false;
        break;
      }
    }
    if (same) return n;
  }
  return undefined;
}
