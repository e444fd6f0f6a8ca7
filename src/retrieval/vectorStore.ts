export interface VectorStoreItem {
  id: string;
  embedding: number[];
  document: string;
}

export interface ScoredDocument {
  id: string;
  document: string;
  score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * In-memory embedding store ranked by cosine similarity. Small corpora only: search is a full scan.
 */
export class VectorStore {
  private items: VectorStoreItem[] = [];
  private nextId = 0;

  /**
   * Store a document with its embedding and return its id. An existing id is replaced in place.
   */
  add(embedding: number[], document: string, id?: string): string {
    const key = id ?? `doc-${this.nextId++}`;
    const item: VectorStoreItem = { id: key, embedding, document };
    const existing = this.items.findIndex((i) => i.id === key);
    if (existing >= 0) this.items[existing] = item;
    else this.items.push(item);
    return key;
  }

  remove(id: string): boolean {
    const before = this.items.length;
    this.items = this.items.filter((i) => i.id !== id);
    return this.items.length < before;
  }

  /** Top `topK` items by descending similarity; ties keep insertion order. */
  searchScored(queryEmbedding: number[], topK = 3): ScoredDocument[] {
    const scored = this.items.map((i) => ({
      id: i.id,
      document: i.document,
      score: cosineSimilarity(queryEmbedding, i.embedding),
    }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, topK));
  }

  search(queryEmbedding: number[], topK = 3): string[] {
    return this.searchScored(queryEmbedding, topK).map((s) => s.document);
  }

  getAllDocuments(): string[] {
    return this.items.map((i) => i.document);
  }

  ids(): string[] {
    return this.items.map((i) => i.id);
  }

  size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
