import { describe, it, expect } from 'vitest';
import { Tensor } from 'onnxruntime-web';
import { downmix } from '../src/audio/AudioUtils';
import type { AudioPreparation } from '../src/audio/AudioPreparer';
import { OnnxDecoder, OnnxEncoder, emptyCacheDims, toFloatTensor } from '../src/providers/ai/stt/OnnxSessions';
import { OnnxWhisperProvider } from '../src/providers/ai/stt/OnnxWhisperProvider';
import { loadModelAssets } from '../src/whisper/ModelAssets';
import type { AudioClip } from '../src/whisper/types';
import { collect } from './helpers/fakes';
import { FakeDecoderSession, FakeEncoderSession, TINY, fixtureModel, idsOf } from './helpers/fakeSessions';
import { noise } from './helpers/signals';

const passThrough: AudioPreparation = {
  async toMono(clip: AudioClip): Promise<Float32Array> {
    return downmix(clip.channels);
  }
};

function providerWith(encoder: FakeEncoderSession, decoder: FakeDecoderSession): OnnxWhisperProvider {
  return new OnnxWhisperProvider({
    audio: passThrough,
    featureWorkers: 1,
    decoding: { random: () => 0 },
    createSession: async (path) => (path.endsWith('encoder_model.onnx') ? encoder : decoder)
  });
}

describe('loadModelAssets', () => {
  it('reads the spectral layout and token ids of a model directory', async () => {
    const assets = await loadModelAssets(fixtureModel());

    expect(assets.spectral).toEqual({
      sampleRate: 16000,
      nFft: 400,
      hopLength: 160,
      nMels: 80,
      chunkLengthSamples: 16000,
      nFrames: 100
    });
    expect(assets.melFilters).toBeUndefined();
    expect(assets.tokenMap.prompt({})).toEqual([TINY.SOT, TINY.EN, TINY.TRANSCRIBE, TINY.NO_TIMESTAMPS]);
    expect(assets.tokenMap.prompt({ language: 'de', translate: true, timestamps: true })).toEqual([
      TINY.SOT,
      TINY.DE,
      TINY.TRANSLATE
    ]);
    expect(assets.tokenizer.decode([7, 8])).toBe(' café');
  });

  it('falls back to the defaults without optional files', async () => {
    const { preprocessorConfigPath: _p, configPath: _c, generationConfigPath: _g, ...required } = fixtureModel();
    const assets = await loadModelAssets(required);

    expect(assets.spectral.chunkLengthSamples).toBe(480000);
    expect(assets.spectral.nFrames).toBe(3000);
    expect(emptyCacheDims(assets.modelConfig)).toEqual([1, 6, 0, 64]);
  });
});

describe('ONNX session adapters', () => {
  it('shapes the empty cache from the decoder width and heads', () => {
    expect(emptyCacheDims({ d_model: 384, decoder_attention_heads: 6 })).toEqual([1, 6, 0, 64]);
    expect(emptyCacheDims({ d_model: 8, decoder_attention_heads: 2 })).toEqual([1, 2, 0, 4]);
  });

  it('rejects non-float outputs', () => {
    const ids = new Tensor('int64', BigInt64Array.from([1n]), [1]);
    expect(() => toFloatTensor(ids, 'logits')).toThrow("Output 'logits' has type int64, expected float32");
    expect(() => toFloatTensor(undefined, 'logits')).toThrow("Session returned no 'logits' output");
  });

  it('maps the encoder features onto input_features', async () => {
    const session = new FakeEncoderSession();
    const output = await new OnnxEncoder(session).encode({ data: new Float32Array(6), dims: [1, 2, 3] });

    expect(session.feeds[0].input_features.dims).toEqual([1, 2, 3]);
    expect(session.feeds[0].input_features.type).toBe('float32');
    expect(Array.from(output.data)).toEqual([0]);
  });

  it('resolves the cache slots and feeds int64 ids with the cache branch flag', async () => {
    const session = new FakeDecoderSession([[5]]);
    const decoder = new OnnxDecoder(session, [1, 2, 0, 4]);

    expect(decoder.signature.supportsCacheBranch).toBe(true);
    expect(decoder.signature.cacheSlots.map((slot) => [slot.inputName, slot.outputName])).toEqual([
      ['past_key_values.0.decoder.key', 'present.0.decoder.key'],
      ['past_key_values.0.decoder.value', 'present.0.decoder.value']
    ]);

    const empty = { data: new Float32Array(0), dims: [1, 2, 0, 4] };
    const output = await decoder.decode({
      inputIds: [TINY.SOT, TINY.EN, TINY.TRANSCRIBE],
      encoderHiddenStates: { data: new Float32Array([0]), dims: [1, 1, 1] },
      useCacheBranch: false,
      cache: [empty, empty]
    });

    const feeds = session.feeds[0];
    expect(idsOf(feeds.input_ids)).toEqual([TINY.SOT, TINY.EN, TINY.TRANSCRIBE]);
    expect(feeds.input_ids.dims).toEqual([1, 3]);
    expect(feeds.use_cache_branch.type).toBe('bool');
    expect(Boolean(feeds.use_cache_branch.data[0])).toBe(false);
    expect(feeds['past_key_values.0.decoder.key'].dims).toEqual([1, 2, 0, 4]);
    expect(output.logits.dims).toEqual([1, 3, TINY.VOCAB]);
    expect(output.present.map((tensor) => tensor.dims)).toEqual([
      [1, 2, 3, 4],
      [1, 2, 3, 4]
    ]);
  });

  it('refuses a decoder without past_key_values inputs', () => {
    const session = new FakeDecoderSession([]);
    const plain = {
      inputNames: ['input_ids', 'encoder_hidden_states'],
      outputNames: ['logits'],
      run: session.run.bind(session),
      release: session.release.bind(session)
    };
    expect(() => new OnnxDecoder(plain, [1, 2, 0, 4])).toThrow('a merged decoder is required');
  });
});

describe('OnnxWhisperProvider', () => {
  it('loads a model and transcribes chunk by chunk', async () => {
    const encoder = new FakeEncoderSession();
    const decoder = new FakeDecoderSession([
      [5, 6],
      [7, 8]
    ]);
    const provider = providerWith(encoder, decoder);

    await provider.load(fixtureModel());
    expect(provider.model?.name).toBe('tiny-whisper');
    expect(provider.progress).toBeUndefined();

    const fragments = await collect(provider.transcribe({ sampleRate: 16000, channels: [noise(24000, 2)] }));

    expect(fragments.join('')).toBe(' hello world café');
    expect(encoder.feeds.map((feeds) => feeds.input_features.dims)).toEqual([
      [1, 80, 100],
      [1, 80, 100]
    ]);
    expect(idsOf(decoder.feeds[0].input_ids)).toEqual([TINY.SOT, TINY.EN, TINY.TRANSCRIBE, TINY.NO_TIMESTAMPS]);
    expect(idsOf(decoder.feeds[1].input_ids)).toEqual([5]);
    expect(Boolean(decoder.feeds[1].use_cache_branch.data[0])).toBe(true);
    expect(decoder.feeds[1]['past_key_values.0.decoder.key'].dims).toEqual([1, 2, 4, 4]);
    expect(provider.progress).toBeUndefined();
  });

  it('releases both sessions', async () => {
    const encoder = new FakeEncoderSession();
    const decoder = new FakeDecoderSession([]);
    const provider = providerWith(encoder, decoder);

    await provider.load(fixtureModel());
    await provider.release();

    expect(provider.model).toBeNull();
    expect(encoder.released).toBe(true);
    expect(decoder.released).toBe(true);
    await expect(collect(provider.transcribe({ sampleRate: 16000, channels: [noise(100)] }))).rejects.toThrow(
      'No Whisper model loaded'
    );
  });

  it('releases the sessions it created when the decoder is unusable', async () => {
    const encoder = new FakeEncoderSession();
    const broken = new FakeDecoderSession([]);
    const provider = new OnnxWhisperProvider({
      audio: passThrough,
      featureWorkers: 1,
      createSession: async (path) =>
        path.endsWith('encoder_model.onnx')
          ? encoder
          : {
              inputNames: ['input_ids'],
              outputNames: ['logits'],
              run: broken.run.bind(broken),
              release: broken.release.bind(broken)
            }
    });

    await expect(provider.load(fixtureModel())).rejects.toThrow("Decoder has no 'encoder_hidden_states' input");
    expect(provider.model).toBeNull();
    expect(encoder.released).toBe(true);
    expect(broken.released).toBe(true);
  });
});
