import path from "path";

export interface EmbeddingConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export interface AppConfig {
  openaiApiKey: string | null;
  openaiBaseUrl: string | null;
  chatModel: string;
  /** Null when EMBEDDING_BASE_URL or EMBEDDING_KEY is missing; runs then skip retrieval. */
  embedding: EmbeddingConfig | null;
  knowledgeDir: string;
  mcpConfigPath: string;
  topK: number;
  maxToolRounds: number;
  systemPrompt: string;
  port: number;
}

const DEFAULTS = {
  chatModel: "gpt-4o-mini",
  embeddingModel: "BAAI/bge-m3",
  knowledgeDir: "knowledge",
  mcpConfigPath: "mcp-servers.json",
  topK: 3,
  maxToolRounds: 20,
  port: 3840,
};

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Read settings from the environment (after dotenv has loaded .env). Missing or invalid values use defaults;
 * relative paths resolve against `cwd`.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const embeddingBaseUrl = nonEmpty(env.EMBEDDING_BASE_URL);
  const embeddingKey = nonEmpty(env.EMBEDDING_KEY);
  return {
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openaiBaseUrl: nonEmpty(env.OPENAI_BASE_URL),
    chatModel: nonEmpty(env.CHAT_MODEL) ?? DEFAULTS.chatModel,
    embedding:
      embeddingBaseUrl && embeddingKey
        ? { baseUrl: embeddingBaseUrl, apiKey: embeddingKey, model: nonEmpty(env.EMBEDDING_MODEL) ?? DEFAULTS.embeddingModel }
        : null,
    knowledgeDir: path.resolve(cwd, nonEmpty(env.KNOWLEDGE_DIR) ?? DEFAULTS.knowledgeDir),
    mcpConfigPath: path.resolve(cwd, nonEmpty(env.MCP_CONFIG) ?? DEFAULTS.mcpConfigPath),
    topK: positiveInt(env.RAG_TOP_K, DEFAULTS.topK),
    maxToolRounds: positiveInt(env.MAX_TOOL_ROUNDS, DEFAULTS.maxToolRounds),
    systemPrompt: env.SYSTEM_PROMPT ?? "",
    port: positiveInt(env.PORT, DEFAULTS.port),
  };
}
