/**
 * Chat model interface so the agent can run against any OpenAI-compatible provider, or a fake in tests.
 */
export interface ToolCall {
  id: string;
  function: {
    name: string;
    /** Raw JSON text as produced by the model. */
    arguments: string;
  };
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCall[] }
  | { role: "tool"; content: string; toolCallId: string };

/** A tool as MCP servers describe it. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ChatResponse {
  content: string;
  toolCalls: ToolCall[];
}

export interface ChatOptions {
  tools?: ToolDefinition[];
  /** Receives each text fragment as it streams in. */
  onToken?: (token: string) => void;
}

export interface ChatClient {
  complete(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}
