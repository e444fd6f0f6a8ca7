export { Agent, type AgentOptions } from "./agent/agent.js";
export {
  getRunnerState,
  runTask,
  setChatClient,
  setKnowledgeBase,
  setMcpServers,
  setRunOptions,
  type RunnerState,
} from "./agent/runner.js";
export { formatTitle, logTitle } from "./agent/log.js";
export { KnowledgeBase, type SyncSummary } from "./knowledge/knowledgeBase.js";
export { loadKnowledgeDocuments, type KnowledgeDocument } from "./knowledge/loader.js";
export * from "./lib/errors.js";
export { ChatSession } from "./llm/chat.js";
export type { ChatClient, ChatMessage, ChatResponse, ToolCall, ToolDefinition } from "./llm/client.js";
export type { EmbeddingClient } from "./llm/embedding.js";
export { createOpenAIChatClient, createOpenAIEmbeddingClient } from "./llm/openai.js";
export { McpToolClient, formatToolResult, type McpServerConfig } from "./mcp/client.js";
export { EmbeddingRetriever } from "./retrieval/embeddingRetriever.js";
export { retrieveContext } from "./retrieval/context.js";
export { VectorStore, cosineSimilarity } from "./retrieval/vectorStore.js";
export { createMathServer } from "./servers/mathServer.js";
export { loadAppConfig, type AppConfig } from "./storage/appConfig.js";
export { loadMcpServerConfigs, parseMcpServerConfigs } from "./storage/mcpServers.js";
