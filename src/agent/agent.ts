import { AgentNotInitializedError, MaxToolRoundsError, getErrorMessage } from "../lib/errors.js";
import { ChatSession } from "../llm/chat.js";
import type { ChatClient, ChatMessage, ToolCall, ToolDefinition } from "../llm/client.js";
import { formatToolResult, type McpToolClient } from "../mcp/client.js";
import { logLine, logTitle } from "./log.js";

export interface AgentOptions {
  systemPrompt?: string;
  /** Retrieved reference text placed before the task. */
  context?: string;
  /** Tool-call rounds allowed before giving up. */
  maxToolRounds?: number;
  onToken?: (token: string) => void;
}

const DEFAULT_MAX_TOOL_ROUNDS = 20;
const RESULT_PREVIEW_CHARS = 200;

function parseToolArguments(raw: string): Record<string, unknown> {
  if (!raw.trim()) return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new SyntaxError("arguments must be a JSON object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Runs a task against the model, executing requested MCP tools until the model answers without tool calls.
 */
export class Agent {
  private session: ChatSession | null = null;
  private tools: ToolDefinition[] = [];
  private readonly maxToolRounds: number;

  constructor(
    private readonly chatClient: ChatClient,
    private readonly mcpClients: McpToolClient[],
    private readonly options: AgentOptions = {}
  ) {
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
  }

  async init(): Promise<void> {
    logTitle("TOOLS");
    for (const client of this.mcpClients) {
      if (!client.isConnected()) await client.init();
    }
    this.tools = this.mcpClients.flatMap((c) => c.getTools());

    logLine(`Loaded ${this.tools.length} tool(s)`);
    this.tools.forEach((t, i) => logLine(`  ${i + 1}. ${t.name}`));

    this.session = new ChatSession(this.chatClient, {
      systemPrompt: this.options.systemPrompt,
      tools: this.tools,
      context: this.options.context,
      onToken: this.options.onToken,
    });
  }

  async invoke(prompt: string): Promise<string> {
    const session = this.session;
    if (!session) throw new AgentNotInitializedError();

    let response = await session.chat(prompt);
    let rounds = 0;
    while (response.toolCalls.length > 0) {
      if (rounds >= this.maxToolRounds) throw new MaxToolRoundsError(rounds, response.content);
      rounds++;
      for (const call of response.toolCalls) {
        await this.handleToolCall(session, call);
      }
      response = await session.chat();
    }
    return response.content;
  }

  async close(): Promise<void> {
    const failures: string[] = [];
    for (const client of this.mcpClients) {
      try {
        await client.close();
      } catch (err) {
        failures.push(`${client.name}: ${getErrorMessage(err)}`);
      }
    }
    if (failures.length > 0) {
      logLine(`Some MCP connections failed to close: ${failures.join("; ")}`);
    } else {
      logLine("All MCP connections closed");
    }
  }

  getTools(): ToolDefinition[] {
    return this.tools.map((t) => ({ ...t }));
  }

  getMessages(): ChatMessage[] {
    return this.session?.getMessages() ?? [];
  }

  private findClientForTool(name: string): McpToolClient | undefined {
    return this.mcpClients.find((c) => c.hasTool(name));
  }

  /** Execute one tool call and append exactly one tool message for it, whatever happens. */
  private async handleToolCall(session: ChatSession, call: ToolCall): Promise<void> {
    const { name, arguments: rawArgs } = call.function;
    logTitle("TOOL USE");
    logLine(`Calling tool: ${name}`);
    logLine(`Arguments: ${rawArgs}`);

    const client = this.findClientForTool(name);
    if (!client) {
      const message = `Tool not found: ${name}`;
      logLine(message);
      session.appendToolResult(call.id, message);
      return;
    }

    let args: Record<string, unknown>;
    try {
      args = parseToolArguments(rawArgs);
    } catch (err) {
      const message = `Invalid tool arguments: ${getErrorMessage(err)}`;
      logLine(message);
      session.appendToolResult(call.id, message);
      return;
    }

    try {
      const output = formatToolResult(await client.callTool(name, args));
      logLine(`Result: ${output.slice(0, RESULT_PREVIEW_CHARS)}${output.length > RESULT_PREVIEW_CHARS ? "..." : ""}`);
      session.appendToolResult(call.id, output);
    } catch (err) {
      const message = `Tool call failed: ${getErrorMessage(err)}`;
      logLine(message);
      session.appendToolResult(call.id, message);
    }
  }
}
