import dotenv from "dotenv";
import path from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import { setChatClient, setKnowledgeBase, setMcpServers, setRunOptions } from "./agent/runner.js";
import { KnowledgeBase } from "./knowledge/knowledgeBase.js";
import { createOpenAIChatClient, createOpenAIEmbeddingClient } from "./llm/openai.js";
import { EmbeddingRetriever } from "./retrieval/embeddingRetriever.js";
import { loadAppConfig, type AppConfig } from "./storage/appConfig.js";
import { loadMcpServerConfigs } from "./storage/mcpServers.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function findEnvPath(startDir: string): string {
  const candidates = [path.resolve(process.cwd(), ".env"), path.resolve(startDir, "..", ".env")];
  for (const p of candidates) {
    if (existsSync(p)) return p;
  }
  return candidates[0];
}

export interface BootstrapOptions {
  useRag?: boolean;
  mcpConfigPath?: string;
}

export interface Bootstrapped {
  config: AppConfig;
  knowledgeBase: KnowledgeBase | null;
}

/**
 * Load .env and settings, then wire the chat model, knowledge base and MCP servers into the runner.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<Bootstrapped> {
  dotenv.config({ path: findEnvPath(__dirname) });
  const config = loadAppConfig();

  if (config.openaiApiKey) {
    setChatClient(
      createOpenAIChatClient({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl ?? undefined,
        model: config.chatModel,
      })
    );
  } else {
    console.warn("OPENAI_API_KEY is not set. Add it to the .env file to use the agent.");
  }

  let knowledgeBase: KnowledgeBase | null = null;
  if (options.useRag !== false) {
    if (config.embedding) {
      const embeddingClient = createOpenAIEmbeddingClient({
        apiKey: config.embedding.apiKey,
        baseURL: config.embedding.baseUrl,
        model: config.embedding.model,
      });
      knowledgeBase = new KnowledgeBase(new EmbeddingRetriever(embeddingClient), config.knowledgeDir);
    } else {
      console.warn("EMBEDDING_BASE_URL and EMBEDDING_KEY are not both set; running without knowledge retrieval.");
    }
  }
  setKnowledgeBase(knowledgeBase);

  setMcpServers(await loadMcpServerConfigs(options.mcpConfigPath ?? config.mcpConfigPath));
  setRunOptions({
    systemPrompt: config.systemPrompt,
    topK: config.topK,
    maxToolRounds: config.maxToolRounds,
  });

  return { config, knowledgeBase };
}
