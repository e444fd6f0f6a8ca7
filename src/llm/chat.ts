import { logTitle } from "../agent/log.js";
import type { ChatClient, ChatMessage, ChatResponse, ToolDefinition } from "./client.js";

export interface ChatSessionOptions {
  systemPrompt?: string;
  tools?: ToolDefinition[];
  /** Reference text placed before the first prompt, e.g. retrieved documents. */
  context?: string;
  onToken?: (token: string) => void;
}

const writeToStdout = (token: string): void => {
  process.stdout.write(token);
};

/**
 * One conversation with the model. Keeps the full message history so tool results
 * can be appended and the model called again without a new prompt.
 */
export class ChatSession {
  private readonly messages: ChatMessage[] = [];
  private readonly tools: ToolDefinition[];
  private readonly onToken: (token: string) => void;

  constructor(
    private readonly client: ChatClient,
    options: ChatSessionOptions = {}
  ) {
    this.tools = options.tools ?? [];
    this.onToken = options.onToken ?? writeToStdout;
    if (options.systemPrompt) this.messages.push({ role: "system", content: options.systemPrompt });
    if (options.context) this.messages.push({ role: "user", content: options.context });
  }

  async chat(prompt?: string): Promise<ChatResponse> {
    logTitle("CHAT");
    if (prompt) this.messages.push({ role: "user", content: prompt });

    logTitle("RESPONSE");
    const response = await this.client.complete(this.messages, {
      tools: this.tools.length > 0 ? this.tools : undefined,
      onToken: this.onToken,
    });
    this.onToken("\n");

    if (response.toolCalls.length > 0) {
      this.messages.push({ role: "assistant", content: response.content, toolCalls: response.toolCalls });
    } else {
      this.messages.push({ role: "assistant", content: response.content });
    }
    return response;
  }

  appendToolResult(toolCallId: string, output: string): void {
    this.messages.push({ role: "tool", content: output, toolCallId });
  }

  getMessages(): ChatMessage[] {
    return this.messages.map((m) => ({ ...m }));
  }
}
