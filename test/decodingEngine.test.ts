import { describe, it, expect } from 'vitest';
import { DecodingEngine, lastStepScores } from '../src/whisper/decoding/DecodingEngine';
import { KeyValueCache, resolveCacheSlots } from '../src/whisper/decoding/CacheSchema';
import { CACHE_SLOTS, IDS, PROMPT, ScriptedDecoder, WordTokenizer, drain, logitsFor, testTokenMap } from './helpers/fakes';

const encoderOutput = { data: new Float32Array([0]), dims: [1, 1, 1] };
const tokenMap = testTokenMap();
const tokenizer = new WordTokenizer();

function engineFor(decoder: ScriptedDecoder, maxTokens?: number): DecodingEngine {
  return new DecodingEngine(decoder, tokenizer, { random: () => 0, maxTokens });
}

/** Emits `sequence[step]` with a clear margin, then end-of-transcript */
function sequenceScript(sequence: number[]) {
  return ({ step }: { step: number }) =>
    step < sequence.length ? logitsFor({ [sequence[step]]: 100 }) : logitsFor({ [IDS.EOT]: 100 });
}

describe('DecodingEngine.decodeChunk', () => {
  it('emits tokens until end-of-transcript is accepted', async () => {
    const decoder = new ScriptedDecoder(sequenceScript([1, 2, 3]));
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' beta', ' gamma']);
    expect(result).toEqual({ reason: 'end-of-transcript', contentTokens: 3, steps: 4 });
  });

  it('feeds the prompt first and then only the last token with the cache', async () => {
    const decoder = new ScriptedDecoder(sequenceScript([1, 2, 3]));
    await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    const [first, second, third] = decoder.calls;
    expect(first.inputIds).toEqual(PROMPT);
    expect(first.useCacheBranch).toBe(false);
    expect(first.cache.map((tensor) => tensor.dims)).toEqual([
      [1, 2, 0, 4],
      [1, 2, 0, 4]
    ]);
    expect(first.cache[0].data.length).toBe(0);

    expect(second.inputIds).toEqual([1]);
    expect(second.useCacheBranch).toBe(true);
    expect(second.cache[0]).toBe(decoder.presents[0][0]);
    expect(second.cache[1]).toBe(decoder.presents[0][1]);

    expect(third.inputIds).toEqual([2]);
    expect(third.cache[0]).toBe(decoder.presents[1][0]);
  });

  it('builds the translate and timestamp prompts', async () => {
    const decoder = new ScriptedDecoder(() => logitsFor({ [IDS.EOT]: 100 }, -Infinity));
    const engine = engineFor(decoder);

    await drain(engine.decodeChunk(encoderOutput, tokenMap, { translate: true }));
    await drain(engine.decodeChunk(encoderOutput, tokenMap, { timestamps: true, language: 'en' }));

    expect(decoder.calls[0].inputIds).toEqual([IDS.SOT, IDS.EN, IDS.TRANSLATE, IDS.NO_TIMESTAMPS]);
    expect(decoder.calls[1].inputIds).toEqual([IDS.SOT, IDS.EN, IDS.TRANSCRIBE]);
  });

  it('stops a repeating trigram before emitting the repetition in full', async () => {
    const decoder = new ScriptedDecoder(({ step }) => logitsFor({ [[1, 2, 3][step % 3]]: 100 }));
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' beta', ' gamma', ' alpha', ' beta']);
    expect(result).toEqual({ reason: 'repeated-ngram', contentTokens: 6, steps: 6 });
  });

  it('does not accept an immediate end-of-transcript and ends empty without an alternative', async () => {
    const decoder = new ScriptedDecoder(() => logitsFor({ [IDS.EOT]: 100 }, -Infinity));
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([]);
    expect(result).toEqual({ reason: 'early-eot-without-alternative', contentTokens: 0, steps: 1 });
  });

  it('reselects a readable token instead of an early end-of-transcript', async () => {
    const decoder = new ScriptedDecoder(({ step }) =>
      step === 0 ? logitsFor({ [IDS.EOT]: 100, 4: 5 }) : logitsFor({ [IDS.EOT]: 100 }, -Infinity)
    );
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' delta']);
    expect(result.reason).toBe('early-eot-without-alternative');
    expect(result.contentTokens).toBe(1);
  });

  it('resamples away from a repeated symbol token', async () => {
    const decoder = new ScriptedDecoder(({ step }) => {
      if (step === 0) return logitsFor({ 1: 100 });
      if (step === 1 || step === 2) return logitsFor({ 7: 1000, 5: 50 });
      return logitsFor({ [IDS.EOT]: 100 });
    });
    const { fragments } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' ...', ' echo']);
  });

  it('emits a repeated symbol once more, then bans it for the chunk', async () => {
    const decoder = new ScriptedDecoder(({ step }) => {
      if (step === 0) return logitsFor({ 1: 100 });
      return logitsFor({ 7: 1000, [IDS.EOT]: 0 }, -Infinity);
    });
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' ...', ' ...']);
    expect(result).toEqual({ reason: 'end-of-transcript', contentTokens: 3, steps: 4 });
  });

  it('keeps what was emitted when the decoder fails', async () => {
    const decoder = new ScriptedDecoder(sequenceScript([1, 2, 3]), ({ step }) => step === 2);
    const { fragments, result } = await drain(engineFor(decoder).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' beta']);
    expect(result).toEqual({ reason: 'decoder-failed', contentTokens: 2, steps: 2 });
  });

  it('respects the token ceiling including the prompt', async () => {
    const decoder = new ScriptedDecoder(sequenceScript([1, 2, 3, 4, 5]));
    const { fragments, result } = await drain(engineFor(decoder, 6).decodeChunk(encoderOutput, tokenMap));

    expect(fragments).toEqual([' alpha', ' beta']);
    expect(result.reason).toBe('token-limit');
  });

  it('stops quietly when cancelled between steps', async () => {
    const controller = new AbortController();
    const decoder = new ScriptedDecoder(sequenceScript([1, 2, 3]));
    const generator = engineFor(decoder).decodeChunk(encoderOutput, tokenMap, { signal: controller.signal });

    const first = await generator.next();
    expect(first).toEqual({ done: false, value: ' alpha' });
    controller.abort();

    const rest = await drain(generator);
    expect(rest.fragments).toEqual([]);
    expect(rest.result.reason).toBe('cancelled');
    expect(decoder.calls).toHaveLength(1);
  });
});

describe('cache schema', () => {
  it('pairs every past input with its present output', () => {
    const slots = resolveCacheSlots(
      ['input_ids', 'encoder_hidden_states', 'past_key_values.0.decoder.key', 'past_key_values.0.encoder.value'],
      ['logits', 'present.0.decoder.key', 'present.0.encoder.value'],
      [1, 6, 0, 64]
    );
    expect(slots).toEqual([
      { index: 0, inputName: 'past_key_values.0.decoder.key', outputName: 'present.0.decoder.key', emptyDims: [1, 6, 0, 64] },
      { index: 1, inputName: 'past_key_values.0.encoder.value', outputName: 'present.0.encoder.value', emptyDims: [1, 6, 0, 64] }
    ]);
  });

  it('rejects a past input without a present output', () => {
    expect(() => resolveCacheSlots(['past_key_values.0.decoder.key'], ['logits'], [1, 1, 0, 1])).toThrow(
      'Decoder declares past_key_values.0.decoder.key but no present.0.decoder.key output'
    );
  });

  it('swaps present tensors in wholesale and clears back to empty tensors', () => {
    const cache = new KeyValueCache(CACHE_SLOTS);
    expect(cache.populated).toBe(false);

    const present = CACHE_SLOTS.map(() => ({ data: new Float32Array(8), dims: [1, 2, 1, 4] }));
    cache.replace(present);
    expect(cache.populated).toBe(true);
    expect(cache.values[0]).toBe(present[0]);

    expect(() => cache.replace([present[0]])).toThrow('Expected 2 present tensors, got 1');

    cache.clear();
    expect(cache.populated).toBe(false);
    expect(cache.values[1].dims).toEqual([1, 2, 0, 4]);
  });

  it('reads the scores of the last position', () => {
    const logits = { data: new Float32Array([1, 2, 3, 4, 5, 6]), dims: [1, 2, 3] };
    expect(Array.from(lastStepScores(logits))).toEqual([4, 5, 6]);
    expect(() => lastStepScores({ data: new Float32Array(2), dims: [1, 2, 3] })).toThrow();
  });
});
