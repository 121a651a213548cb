import { readFile } from 'fs/promises';
import { Tiktoken } from 'tiktoken';
import { TokenizerJsonSchema, type TokenizerJson } from '../models/TokenizerJson';
import { createLogger } from '../utils/logger';
import type { TextDecoderLike } from './types';

const logger = createLogger({ service: 'WhisperTokenizer' });

const SPECIAL_TOKEN = /^<\|.*\|>$/;

// GPT-2 split pattern; decoding never applies it
const PATTERN = `'s|'t|'re|'ve|'m|'ll|'d| ?\\p{L}+| ?\\p{N}+| ?[^\\s\\p{L}\\p{N}]+|\\s+(?!\\S)|\\s+`;

/**
 * Byte-level BPE writes every byte as a printable code point; this is the
 * inverse table (code point → byte).
 */
function buildByteDecoder(): Map<string, number> {
  const bytes: number[] = [];
  for (let b = 33; b <= 126; b++) bytes.push(b);
  for (let b = 161; b <= 172; b++) bytes.push(b);
  for (let b = 174; b <= 255; b++) bytes.push(b);

  const codePoints = [...bytes];
  let extra = 0;
  for (let b = 0; b < 256; b++) {
    if (!bytes.includes(b)) {
      bytes.push(b);
      codePoints.push(256 + extra);
      extra++;
    }
  }

  const decoder = new Map<string, number>();
  bytes.forEach((byte, i) => decoder.set(String.fromCodePoint(codePoints[i]), byte));
  return decoder;
}

const BYTE_DECODER = buildByteDecoder();

function tokenBytes(token: string): Buffer {
  const bytes: number[] = [];
  for (const char of token) {
    const byte = BYTE_DECODER.get(char);
    if (byte !== undefined) {
      bytes.push(byte);
    } else {
      bytes.push(...Buffer.from(char, 'utf8'));
    }
  }
  return Buffer.from(bytes);
}

/**
 * Decode-only view of a Hugging Face `tokenizer.json` with a byte-level BPE
 * model, which is what Whisper exports ship. The vocabulary is handed to
 * tiktoken as mergeable ranks; the encoder is built on first decode.
 */
export class WhisperTokenizer implements TextDecoderLike {
  private readonly idToToken = new Map<number, string>();
  private readonly tokenToIdMap = new Map<string, number>();
  /** Content id → rank known to tiktoken; ids sharing bytes share a rank */
  private readonly ranks = new Map<number, number>();
  private readonly rankLines: string[] = [];
  private readonly utf8Decoder = new TextDecoder('utf-8', { fatal: false });
  private bpe: Tiktoken | undefined;

  constructor(json: TokenizerJson) {
    const added = new Set(json.added_tokens.map((token) => token.content));
    const rankOfBytes = new Map<string, number>();

    for (const [token, id] of Object.entries(json.model.vocab)) {
      this.idToToken.set(id, token);
      this.tokenToIdMap.set(token, id);
      if (added.has(token) || SPECIAL_TOKEN.test(token)) continue;

      const encoded = tokenBytes(token).toString('base64');
      const existing = rankOfBytes.get(encoded);
      if (existing !== undefined) {
        this.ranks.set(id, existing);
        continue;
      }
      rankOfBytes.set(encoded, id);
      this.ranks.set(id, id);
      this.rankLines.push(`${encoded} ${id}`);
    }
    for (const token of json.added_tokens) {
      this.idToToken.set(token.id, token.content);
      this.tokenToIdMap.set(token.content, token.id);
      this.ranks.delete(token.id);
    }
  }

  static async load(path: string): Promise<WhisperTokenizer> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    return new WhisperTokenizer(TokenizerJsonSchema.parse(raw));
  }

  get size(): number {
    return this.idToToken.size;
  }

  tokenToId(token: string): number | undefined {
    return this.tokenToIdMap.get(token);
  }

  idToTokenText(id: number): string | undefined {
    return this.idToToken.get(id);
  }

  /** Special `<|…|>` tokens and unknown ids contribute nothing */
  decode(ids: readonly number[]): string {
    const ranks: number[] = [];
    for (const id of ids) {
      const rank = this.ranks.get(id);
      if (rank !== undefined) ranks.push(rank);
    }
    if (ranks.length === 0) return '';

    return this.utf8Decoder.decode(this.encoder().decode(Uint32Array.from(ranks)));
  }

  /** Frees the WASM encoder; a later decode builds it again */
  free(): void {
    this.bpe?.free();
    this.bpe = undefined;
  }

  private encoder(): Tiktoken {
    if (!this.bpe) {
      this.bpe = new Tiktoken(this.rankLines.join('\n'), {}, PATTERN);
      logger.debug({ ranks: this.rankLines.length }, 'BPE ranks loaded');
    }
    return this.bpe;
  }
}
