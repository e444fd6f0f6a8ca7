import { logLine, logTitle } from "../agent/log.js";
import { getErrorMessage } from "../lib/errors.js";
import type { EmbeddingClient } from "../llm/embedding.js";
import { VectorStore } from "./vectorStore.js";

/**
 * Embeds documents into a VectorStore and ranks them against queries.
 */
export class EmbeddingRetriever {
  readonly vectorStore: VectorStore;

  constructor(
    private readonly client: EmbeddingClient,
    vectorStore?: VectorStore
  ) {
    this.vectorStore = vectorStore ?? new VectorStore();
  }

  async embedDocument(document: string, id?: string): Promise<number[]> {
    logTitle("EMBEDDING DOCUMENT");
    const embedding = await this.embed(document);
    this.vectorStore.add(embedding, document, id);
    return embedding;
  }

  async embedQuery(query: string): Promise<number[]> {
    logTitle("EMBEDDING QUERY");
    return this.embed(query);
  }

  async retrieve(query: string, topK = 3): Promise<string[]> {
    const queryEmbedding = await this.embedQuery(query);
    logTitle("RETRIEVING DOCUMENTS");
    const results = this.vectorStore.search(queryEmbedding, topK);
    logLine(`Retrieved ${results.length} relevant document(s)`);
    return results;
  }

  removeDocument(id: string): boolean {
    return this.vectorStore.remove(id);
  }

  getVectorStoreSize(): number {
    return this.vectorStore.size();
  }

  clearVectorStore(): void {
    this.vectorStore.clear();
  }

  private async embed(text: string): Promise<number[]> {
    try {
      const embedding = await this.client.embed(text);
      logLine(`Embedding dimension: ${embedding.length}`);
      logLine(`First 5 values: ${JSON.stringify(embedding.slice(0, 5))}`);
      return embedding;
    } catch (err) {
      logLine(`Embedding request failed (${this.client.model}): ${getErrorMessage(err)}`);
      throw err;
    }
  }
}
