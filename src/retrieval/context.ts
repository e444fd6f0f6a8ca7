import { logLine, logTitle } from "../agent/log.js";
import type { EmbeddingRetriever } from "./embeddingRetriever.js";

const PREVIEW_CHARS = 500;

/**
 * Rank the indexed documents against `query` and join the best `topK` into one prompt context.
 */
export async function retrieveContext(retriever: EmbeddingRetriever, query: string, topK = 3): Promise<string> {
  logTitle("CONTEXT");
  if (retriever.getVectorStoreSize() === 0) {
    logLine("No knowledge documents indexed");
    return "";
  }
  const documents = await retriever.retrieve(query, topK);
  const context = documents.join("\n\n");

  logLine(context.length > PREVIEW_CHARS ? `${context.slice(0, PREVIEW_CHARS)}...` : context);
  logLine(`Context length: ${context.length} characters`);
  return context;
}
