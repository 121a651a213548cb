/**
 * Per-chunk decoding state: the token sequence fed to the decoder, a bounded
 * window of recent content tokens for the repetition penalty, a short
 * history for loop detection and the chunk's ban list.
 */
export class DecodeState {
  private readonly sequence: number[];
  private readonly recent: number[] = [];
  private readonly history: number[] = [];
  private readonly bannedCounts = new Map<number, number>();
  private content = 0;

  readonly promptLength: number;

  constructor(
    prompt: readonly number[],
    private readonly recentWindow: number,
    private readonly historyWindow: number = 12
  ) {
    this.sequence = [...prompt];
    this.promptLength = prompt.length;
  }

  get tokens(): readonly number[] {
    return this.sequence;
  }

  get length(): number {
    return this.sequence.length;
  }

  get lastToken(): number {
    return this.sequence[this.sequence.length - 1];
  }

  /** Content tokens accepted so far in this chunk */
  get contentCount(): number {
    return this.content;
  }

  get generatedSteps(): number {
    return this.sequence.length - this.promptLength;
  }

  get recentTokens(): readonly number[] {
    return this.recent;
  }

  /** Most recent content tokens, oldest first */
  get recentHistory(): readonly number[] {
    return this.history;
  }

  get lastContentToken(): number | undefined {
    return this.recent.length > 0 ? this.recent[this.recent.length - 1] : undefined;
  }

  get banned(): ReadonlyMap<number, number> {
    return this.bannedCounts;
  }

  accept(tokenId: number): void {
    this.sequence.push(tokenId);
    this.content++;

    this.recent.push(tokenId);
    if (this.recent.length > this.recentWindow) this.recent.shift();

    this.history.push(tokenId);
    if (this.history.length > this.historyWindow) this.history.shift();
  }

  ban(tokenId: number): number {
    const count = (this.bannedCounts.get(tokenId) ?? 0) + 1;
    this.bannedCounts.set(tokenId, count);
    return count;
  }

  isBanned(tokenId: number): boolean {
    return this.bannedCounts.has(tokenId);
  }
}
