/**
 * Embedding client for retrieval. Without one, runs skip the knowledge context.
 */
export interface EmbeddingClient {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}
