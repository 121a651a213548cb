import { TokenMap } from '../../src/whisper/TokenMap';
import type {
  CacheSlot,
  DecoderSession,
  DecoderSignature,
  DecoderStepInput,
  DecoderStepOutput,
  EncoderSession,
  FloatTensor,
  TextDecoderLike
} from '../../src/whisper/types';

/**
 * Test vocabulary: ids 0-9 are content tokens, 10 is end-of-transcript and
 * 11-15 are the prompt specials.
 */
export const VOCAB = [
  ' the',
  ' alpha',
  ' beta',
  ' gamma',
  ' delta',
  ' echo',
  ' fox',
  ' ...',
  ' golf',
  ' hotel',
  '', // 10 <|endoftext|>
  '', // 11 <|startoftranscript|>
  '', // 12 <|en|>
  '', // 13 <|transcribe|>
  '', // 14 <|translate|>
  '' // 15 <|notimestamps|>
];

export const IDS = { EOT: 10, SOT: 11, EN: 12, TRANSCRIBE: 13, TRANSLATE: 14, NO_TIMESTAMPS: 15 };

export const PROMPT = [IDS.SOT, IDS.EN, IDS.TRANSCRIBE, IDS.NO_TIMESTAMPS];

export class WordTokenizer implements TextDecoderLike {
  constructor(private readonly words: readonly string[] = VOCAB) {}

  decode(ids: readonly number[]): string {
    return ids.map((id) => this.words[id] ?? '').join('');
  }
}

export function testTokenMap(): TokenMap {
  return new TokenMap(
    {
      sot: IDS.SOT,
      eot: IDS.EOT,
      transcribe: IDS.TRANSCRIBE,
      translate: IDS.TRANSLATE,
      noTimestamps: IDS.NO_TIMESTAMPS,
      defaultLanguage: IDS.EN
    },
    undefined,
    { '<|en|>': IDS.EN }
  );
}

/** Scores for one step: listed ids get their score, every other id `rest` */
export function logitsFor(scores: Record<number, number>, rest = 0, vocab = VOCAB.length): Float32Array {
  const data = new Float32Array(vocab).fill(rest);
  for (const [id, score] of Object.entries(scores)) {
    data[Number(id)] = score;
  }
  return data;
}

export interface StepInfo {
  /** Value the fake encoder wrote for this chunk */
  chunk: number;
  step: number;
}

export type StepScript = (info: StepInfo) => Float32Array;

export const CACHE_SLOTS: CacheSlot[] = [
  { index: 0, inputName: 'past_key_values.0.decoder.key', outputName: 'present.0.decoder.key', emptyDims: [1, 2, 0, 4] },
  { index: 1, inputName: 'past_key_values.0.decoder.value', outputName: 'present.0.decoder.value', emptyDims: [1, 2, 0, 4] }
];

/**
 * Decoder returning scripted logits. The step counter restarts whenever the
 * cache branch is off, i.e. on the first call of every chunk.
 */
export class ScriptedDecoder implements DecoderSession {
  readonly signature: DecoderSignature = { cacheSlots: CACHE_SLOTS, supportsCacheBranch: true };
  readonly calls: DecoderStepInput[] = [];
  readonly presents: FloatTensor[][] = [];
  private step = 0;

  constructor(
    private readonly script: StepScript,
    private readonly failAt?: (info: StepInfo) => boolean
  ) {}

  async decode(input: DecoderStepInput): Promise<DecoderStepOutput> {
    if (!input.useCacheBranch) this.step = 0;
    const info = { chunk: input.encoderHiddenStates.data[0], step: this.step };
    this.calls.push(input);
    this.step++;

    if (this.failAt?.(info)) {
      throw new Error('decoder exploded');
    }

    const length = info.step + 1;
    const present = CACHE_SLOTS.map(() => ({
      data: new Float32Array(2 * length * 4).fill(info.step),
      dims: [1, 2, length, 4]
    }));
    this.presents.push(present);

    const vocab = this.script(info);
    return { logits: { data: vocab, dims: [1, 1, vocab.length] }, present };
  }
}

/** Encoder whose output carries the index of the chunk it was called for */
export class CountingEncoder implements EncoderSession {
  readonly inputs: FloatTensor[] = [];

  constructor(private readonly failOn: ReadonlySet<number> = new Set()) {}

  async encode(features: FloatTensor): Promise<FloatTensor> {
    const call = this.inputs.length;
    this.inputs.push(features);
    if (this.failOn.has(call)) {
      throw new Error('encoder exploded');
    }
    return { data: new Float32Array([call]), dims: [1, 1, 1] };
  }
}

export async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const fragment of source) out.push(fragment);
  return out;
}

/** Returns the generator's fragments and its return value */
export async function drain<R>(generator: AsyncGenerator<string, R, void>): Promise<{ fragments: string[]; result: R }> {
  const fragments: string[] = [];
  for (;;) {
    const next = await generator.next();
    if (next.done) return { fragments, result: next.value };
    fragments.push(next.value);
  }
}
