import { createLogger } from '../../utils/logger';
import type { TokenMap } from '../TokenMap';
import type { DecoderSession, FloatTensor, TextDecoderLike, TranscriptionOptions } from '../types';
import { KeyValueCache } from './CacheSchema';
import { DecodeState } from './DecodeState';
import {
  DEFAULT_GUARD_OPTIONS,
  detectRepeatedNgram,
  resolveCandidate,
  type GuardOptions,
  type TerminationReason
} from './StepGuards';
import { DEFAULT_TOKEN_POLICY, adjustScores, selectToken, type TokenPolicyOptions } from './TokenPolicy';

const logger = createLogger({ service: 'DecodingEngine' });

export interface DecodingEngineOptions {
  maxTokens: number;
  policy: TokenPolicyOptions;
  guards: GuardOptions;
  /** Source for hybrid sampling, in [0, 1) */
  random: () => number;
}

export const DEFAULT_MAX_TOKENS = 448;

export interface ChunkDecodeSummary {
  reason: TerminationReason;
  contentTokens: number;
  steps: number;
}

export interface DecodeChunkOptions extends TranscriptionOptions {
  chunkIndex?: number;
}

/** Scores of the last position of a [1, sequence, vocab] logits tensor */
export function lastStepScores(logits: FloatTensor): Float32Array {
  if (logits.dims.length !== 3) {
    throw new Error(`Unexpected logits shape [${logits.dims.join(',')}]`);
  }
  const sequence = logits.dims[1];
  const vocab = logits.dims[2];
  const offset = (sequence - 1) * vocab;
  if (sequence < 1 || offset + vocab > logits.data.length) {
    throw new Error(`Logits data does not match shape [${logits.dims.join(',')}]`);
  }
  return logits.data.slice(offset, offset + vocab);
}

/**
 * Autoregressive decoder loop for one encoded chunk.
 *
 * Owns the per-chunk key/value cache and DecodeState; the decoder session is
 * called strictly one step at a time.
 */
export class DecodingEngine {
  private readonly options: DecodingEngineOptions;

  constructor(
    private readonly decoder: DecoderSession,
    private readonly tokenizer: TextDecoderLike,
    options: Partial<DecodingEngineOptions> = {}
  ) {
    this.options = {
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      policy: options.policy ?? DEFAULT_TOKEN_POLICY,
      guards: options.guards ?? DEFAULT_GUARD_OPTIONS,
      random: options.random ?? Math.random
    };
  }

  /**
   * Yields the text of every accepted token, in generation order. The return
   * value says why the chunk ended. Never throws for decoder failures or
   * cancellation.
   */
  async *decodeChunk(
    encoderOutput: FloatTensor,
    tokenMap: TokenMap,
    options: DecodeChunkOptions = {}
  ): AsyncGenerator<string, ChunkDecodeSummary, void> {
    const { maxTokens, policy, guards, random } = this.options;
    const { signature } = this.decoder;
    const chunk = options.chunkIndex ?? 0;

    const prompt = tokenMap.prompt(options);
    const state = new DecodeState(prompt, policy.repetitionWindow, 2 * guards.loopMaxNgram);
    const cache = new KeyValueCache(signature.cacheSlots);
    let steps = 0;

    logger.debug({ chunk, prompt }, 'Decoding chunk');

    const finish = (reason: TerminationReason): ChunkDecodeSummary => {
      logger.debug({ chunk, reason, contentTokens: state.contentCount, steps }, 'Chunk decode finished');
      return { reason, contentTokens: state.contentCount, steps };
    };

    while (state.length < maxTokens) {
      if (options.signal?.aborted) return finish('cancelled');

      let scores: Float32Array;
      try {
        const output = await this.decoder.decode({
          inputIds: cache.populated ? [state.lastToken] : [...state.tokens],
          encoderHiddenStates: encoderOutput,
          useCacheBranch: cache.populated,
          cache: cache.values
        });
        cache.replace(output.present);
        scores = lastStepScores(output.logits);
      } catch (error) {
        logger.error(
          { chunk, step: state.generatedSteps, error: error instanceof Error ? error.message : String(error) },
          'Decoder step failed'
        );
        cache.clear();
        return finish('decoder-failed');
      }
      steps++;

      if (options.signal?.aborted) return finish('cancelled');

      const adjusted = adjustScores(
        scores,
        { eot: tokenMap.eot, recentTokens: state.recentTokens, banned: state.banned.keys() },
        this.tokenizer,
        policy
      );
      const selection = selectToken(adjusted.scores, state.generatedSteps, this.tokenizer, policy, random);

      const resolution = resolveCandidate(selection.id, {
        scores: adjusted.scores,
        state,
        eot: tokenMap.eot,
        tokenizer: this.tokenizer,
        options: guards
      });

      if (resolution.action === 'terminate') return finish(resolution.reason);

      state.accept(resolution.tokenId);
      if (resolution.ban) {
        const count = state.ban(resolution.tokenId);
        logger.debug({ chunk, tokenId: resolution.tokenId, count }, 'Symbol-like token banned for this chunk');
      }

      const ngram = detectRepeatedNgram(state.recentHistory, state.contentCount, guards);
      if (ngram !== undefined) {
        logger.debug({ chunk, ngram, tail: state.recentHistory.slice(-ngram) }, 'Repeated n-gram, ending chunk');
        return finish('repeated-ngram');
      }

      if (state.generatedSteps <= 5 || state.generatedSteps % 20 === 0) {
        logger.trace(
          {
            chunk,
            step: state.generatedSteps,
            tokenId: resolution.tokenId,
            sampled: selection.sampled,
            reselected: resolution.reselected,
            masked: adjusted.masked
          },
          'Token accepted'
        );
      }

      yield this.tokenizer.decode([resolution.tokenId]);
    }

    return finish('token-limit');
  }
}
