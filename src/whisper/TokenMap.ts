import { DEFAULT_LANGUAGE, SPECIAL_TOKENS, TOKEN_FALLBACKS } from '../config/constants';
import type { GenerationConfig } from '../models/GenerationConfig';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'TokenMap' });

export interface VocabularyLookup {
  tokenToId(token: string): number | undefined;
}

export interface TokenIds {
  sot: number;
  eot: number;
  transcribe: number;
  translate: number;
  noTimestamps: number;
  defaultLanguage: number;
}

function languageToken(code: string): string {
  const bare = code.trim().toLowerCase().replace(/^<\|/, '').replace(/\|>$/, '');
  return `<|${bare}|>`;
}

/**
 * Numeric ids of the prompt tokens, resolved once per model.
 *
 * Lookup order: generation_config.json (task_to_id, forced_decoder_ids,
 * no_timestamps_token_id), then the vocabulary, then the multilingual defaults.
 */
export class TokenMap implements TokenIds {
  readonly sot: number;
  readonly eot: number;
  readonly transcribe: number;
  readonly translate: number;
  readonly noTimestamps: number;
  readonly defaultLanguage: number;

  constructor(
    ids: TokenIds,
    private readonly vocabulary?: VocabularyLookup,
    private readonly langToId: Readonly<Record<string, number>> = {}
  ) {
    this.sot = ids.sot;
    this.eot = ids.eot;
    this.transcribe = ids.transcribe;
    this.translate = ids.translate;
    this.noTimestamps = ids.noTimestamps;
    this.defaultLanguage = ids.defaultLanguage;
  }

  static resolve(vocabulary: VocabularyLookup, generation?: GenerationConfig): TokenMap {
    const forced = new Map<number, number>();
    for (const [position, id] of generation?.forced_decoder_ids ?? []) {
      if (position !== null && id !== null) forced.set(position, id);
    }
    const taskToId = generation?.task_to_id ?? {};

    const map = new TokenMap(
      {
        sot:
          vocabulary.tokenToId(SPECIAL_TOKENS.START_OF_TRANSCRIPT) ??
          generation?.decoder_start_token_id ??
          TOKEN_FALLBACKS.START_OF_TRANSCRIPT,
        eot: vocabulary.tokenToId(SPECIAL_TOKENS.END_OF_TEXT) ?? TOKEN_FALLBACKS.END_OF_TEXT,
        transcribe:
          taskToId.transcribe ??
          forced.get(2) ??
          vocabulary.tokenToId(SPECIAL_TOKENS.TRANSCRIBE) ??
          TOKEN_FALLBACKS.TRANSCRIBE,
        translate: taskToId.translate ?? vocabulary.tokenToId(SPECIAL_TOKENS.TRANSLATE) ?? TOKEN_FALLBACKS.TRANSLATE,
        noTimestamps:
          generation?.no_timestamps_token_id ??
          vocabulary.tokenToId(SPECIAL_TOKENS.NO_TIMESTAMPS) ??
          TOKEN_FALLBACKS.NO_TIMESTAMPS,
        defaultLanguage:
          forced.get(1) ?? vocabulary.tokenToId(languageToken(DEFAULT_LANGUAGE)) ?? TOKEN_FALLBACKS.ENGLISH
      },
      vocabulary,
      generation?.lang_to_id ?? {}
    );

    logger.info(
      {
        sot: map.sot,
        eot: map.eot,
        transcribe: map.transcribe,
        translate: map.translate,
        noTimestamps: map.noTimestamps,
        defaultLanguage: map.defaultLanguage
      },
      'Token map resolved'
    );
    return map;
  }

  /** Accepts "de" or "<|de|>"; unknown codes fall back to the default language */
  languageId(code: string): number {
    const token = languageToken(code);
    const id = this.vocabulary?.tokenToId(token) ?? this.langToId[token];
    if (id !== undefined) return id;

    logger.warn({ language: code, fallback: this.defaultLanguage }, 'Unknown language code');
    return this.defaultLanguage;
  }

  prompt(options: { language?: string; translate?: boolean; timestamps?: boolean }): number[] {
    const tokens = [
      this.sot,
      this.languageId(options.language ?? DEFAULT_LANGUAGE),
      options.translate ? this.translate : this.transcribe
    ];
    if (!options.timestamps) tokens.push(this.noTimestamps);
    return tokens;
  }
}
