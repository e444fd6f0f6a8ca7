import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { EmbeddingError } from "../lib/errors.js";
import type { ChatClient, ChatMessage, ChatOptions, ChatResponse, ToolCall, ToolDefinition } from "./client.js";
import type { EmbeddingClient } from "./embedding.js";

export interface OpenAIClientOptions {
  apiKey: string;
  /** Any OpenAI-compatible endpoint; the SDK default when unset. */
  baseURL?: string;
  model: string;
}

/** One streamed fragment of a tool call, keyed by its position in the response. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  function?: {
    name?: string;
    arguments?: string;
  };
}

/**
 * Fold streamed tool-call fragments into complete calls. The first fragment for an index
 * opens an empty call; later fragments append to its id, name and arguments.
 */
export function mergeToolCallDeltas(calls: ToolCall[], deltas: ToolCallDelta[]): void {
  for (const delta of deltas) {
    while (calls.length <= delta.index) {
      calls.push({ id: "", function: { name: "", arguments: "" } });
    }
    const current = calls[delta.index];
    if (delta.id) current.id += delta.id;
    if (delta.function?.name) current.function.name += delta.function.name;
    if (delta.function?.arguments) current.function.arguments += delta.function.arguments;
  }
}

export function toOpenAIMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "assistant":
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: "assistant",
            content: m.content,
            tool_calls: m.toolCalls.map((c) => ({
              id: c.id,
              type: "function" as const,
              function: { name: c.function.name, arguments: c.function.arguments },
            })),
          };
        }
        return { role: "assistant", content: m.content };
      case "tool":
        return { role: "tool", content: m.content, tool_call_id: m.toolCallId };
    }
  });
}

export function toOpenAITools(tools: ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }));
}

export function createOpenAIChatClient(options: OpenAIClientOptions): ChatClient {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

  return {
    async complete(messages: ChatMessage[], chatOptions?: ChatOptions): Promise<ChatResponse> {
      const params: ChatCompletionCreateParamsStreaming = {
        model: options.model,
        messages: toOpenAIMessages(messages),
        stream: true,
      };
      const tools = chatOptions?.tools ?? [];
      if (tools.length > 0) params.tools = toOpenAITools(tools);

      const stream = await openai.chat.completions.create(params);
      let content = "";
      const toolCalls: ToolCall[] = [];
      for await (const chunk of stream) {
        // Some providers send a trailing usage chunk with no choices.
        const delta = chunk.choices[0]?.delta;
        if (!delta) continue;
        if (delta.content) {
          content += delta.content;
          chatOptions?.onToken?.(delta.content);
        }
        if (delta.tool_calls) mergeToolCallDeltas(toolCalls, delta.tool_calls);
      }
      return { content, toolCalls };
    },
  };
}

export function createOpenAIEmbeddingClient(options: OpenAIClientOptions): EmbeddingClient {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });

  return {
    model: options.model,
    async embed(text: string): Promise<number[]> {
      const response = await openai.embeddings.create({
        model: options.model,
        input: text,
        encoding_format: "float",
      });
      const vec = response.data[0]?.embedding;
      if (!vec || !Array.isArray(vec) || vec.length === 0) {
        throw new EmbeddingError("Empty embedding response", options.model);
      }
      return vec;
    },
  };
}
