export interface EmbedOptions {
  /** Aborts the underlying provider call */
  signal?: AbortSignal;
}

/**
 * Turns texts into fixed-width vectors, one per input, in input order.
 */
export interface Embedder {
  embedTexts(texts: string[], opts?: EmbedOptions): Promise<number[][]>;
  dims(): number;
  /** Stable identifier of provider, model and width */
  id(): string;
}
