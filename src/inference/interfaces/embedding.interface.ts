/**
 * Embedding collaborator. Returns one vector per input text, in input order.
 */
export interface IEmbeddingService {
  readonly dimensions: number;

  embed(texts: string[]): Promise<number[][]>;
}
