import type { ChatClient, ChatMessage, ChatOptions, ChatResponse, ToolDefinition } from "../llm/client.js";
import type { EmbeddingClient } from "../llm/embedding.js";

export interface RecordedCall {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
}

/** Replays canned responses in order and records what it was sent. */
export class ScriptedChatClient implements ChatClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly responses: ChatResponse[]) {}

  async complete(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), tools: options?.tools });
    const next = this.responses.shift();
    if (!next) throw new Error("no scripted response left");
    if (next.content) options?.onToken?.(next.content);
    return next;
  }
}

/**
 * Embeds text as the sum of the vectors of the keywords it contains; unknown text embeds to zeros.
 */
export class KeywordEmbeddingClient implements EmbeddingClient {
  readonly model = "keyword-test";
  readonly inputs: string[] = [];

  constructor(private readonly keywords: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text);
    const lower = text.toLowerCase();
    const dims = Object.values(this.keywords)[0]?.length ?? 0;
    const out = new Array<number>(dims).fill(0);
    for (const [word, vec] of Object.entries(this.keywords)) {
      if (lower.includes(word)) vec.forEach((v, i) => (out[i] += v));
    }
    return out;
  }
}

/** Keyword embeddings that take `delayMs` to answer; `started` counts requests as they arrive. */
export class SlowEmbeddingClient extends KeywordEmbeddingClient {
  started = 0;

  constructor(
    keywords: Record<string, number[]>,
    private readonly delayMs: number
  ) {
    super(keywords);
  }

  async embed(text: string): Promise<number[]> {
    this.started++;
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    return super.embed(text);
  }
}

export const GREEK = {
  alpha: [1, 0, 0],
  beta: [0, 1, 0],
  gamma: [0, 0, 1],
};

export const silent = (): void => {};
