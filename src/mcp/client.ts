import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { logLine } from "../agent/log.js";
import { McpConnectionError, McpNotConnectedError, getErrorMessage } from "../lib/errors.js";
import type { ToolDefinition } from "../llm/client.js";

export type McpTransportConfig =
  | { type: "stdio"; command: string; args: string[]; env?: Record<string, string> }
  | { type: "http"; url: string };

export interface McpServerConfig {
  name: string;
  version?: string;
  transport: McpTransportConfig;
}

export type McpToolResult = Awaited<ReturnType<Client["callTool"]>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Render an MCP tool result as the text handed back to the model. Text items are kept
 * as-is; images, resources and other items are serialized as JSON.
 */
export function formatToolResult(result: unknown): string {
  if (!isRecord(result)) return JSON.stringify(result ?? null);
  const content = result.content;
  if (!Array.isArray(content)) return JSON.stringify(result, null, 2);
  const text = content
    .map((item: unknown) =>
      isRecord(item) && item.type === "text" && typeof item.text === "string" ? item.text : JSON.stringify(item)
    )
    .join("\n");
  return result.isError === true ? `Tool error: ${text}` : text;
}

function createTransport(config: McpTransportConfig): Transport {
  if (config.type === "stdio") {
    return new StdioClientTransport({
      command: config.command,
      args: config.args,
      // A custom env replaces the inherited one, so keep PATH and friends.
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    });
  }
  return new StreamableHTTPClientTransport(new URL(config.url));
}

/**
 * Session with a single MCP server: connect, list its tools once, call them by name.
 */
export class McpToolClient {
  readonly name: string;
  readonly version: string;
  private client: Client | null = null;
  private tools: ToolDefinition[] = [];

  constructor(private readonly config: McpServerConfig) {
    this.name = config.name;
    this.version = config.version ?? "0.0.1";
  }

  /** Spawn or dial the configured server and load its tools. */
  async init(): Promise<void> {
    let transport: Transport;
    try {
      transport = createTransport(this.config.transport);
    } catch (err) {
      throw new McpConnectionError(this.name, getErrorMessage(err));
    }
    await this.connect(transport);
  }

  /** Connect over an already-built transport (e.g. an in-process pair). */
  async connect(transport: Transport): Promise<void> {
    const client = new Client({ name: this.name, version: this.version }, { capabilities: {} });
    try {
      await client.connect(transport);
      const response = await client.listTools();
      this.tools = response.tools.map((t) => ({
        name: t.name,
        description: t.description ?? "",
        inputSchema: { ...t.inputSchema },
      }));
    } catch (err) {
      try {
        await client.close();
      } catch (closeErr) {
        console.warn(`Closing ${this.name} after a failed connect also failed: ${getErrorMessage(closeErr)}`);
      }
      logLine(`Failed to connect to MCP server ${this.name}: ${getErrorMessage(err)}`);
      throw new McpConnectionError(this.name, getErrorMessage(err));
    }
    this.client = client;
    logLine(`Connected to MCP server ${this.name}, tools: ${this.tools.map((t) => t.name).join(", ") || "none"}`);
  }

  isConnected(): boolean {
    return this.client != null;
  }

  getTools(): ToolDefinition[] {
    return this.tools.map((t) => ({ ...t }));
  }

  hasTool(name: string): boolean {
    return this.tools.some((t) => t.name === name);
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<McpToolResult> {
    if (!this.client) throw new McpNotConnectedError(this.name);
    return this.client.callTool({ name, arguments: args });
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    this.tools = [];
    await client.close();
  }
}
