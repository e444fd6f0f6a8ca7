import { readFile } from "fs/promises";
import { ConfigError, getErrorMessage } from "../lib/errors.js";
import type { McpServerConfig } from "../mcp/client.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function parseEnv(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

/**
 * Parse `{ "mcpServers": { "<name>": { command, args?, env? } | { url } } }`.
 * Malformed or disabled entries are skipped with a warning.
 */
export function parseMcpServerConfigs(data: unknown): McpServerConfig[] {
  if (!isRecord(data) || !isRecord(data.mcpServers)) return [];
  const configs: McpServerConfig[] = [];
  for (const [name, entry] of Object.entries(data.mcpServers)) {
    if (!isRecord(entry) || entry.disabled === true) continue;
    if (typeof entry.command === "string" && entry.command.trim()) {
      configs.push({
        name,
        transport: {
          type: "stdio",
          command: entry.command,
          args: isStringArray(entry.args) ? entry.args : [],
          env: parseEnv(entry.env),
        },
      });
    } else if (typeof entry.url === "string" && entry.url.trim()) {
      configs.push({ name, transport: { type: "http", url: entry.url } });
    } else {
      console.warn(`Ignoring MCP server "${name}": needs a command or a url`);
    }
  }
  return configs;
}

/** Load MCP server configs from a JSON file. A missing file means no servers. */
export async function loadMcpServerConfigs(filePath: string): Promise<McpServerConfig[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") return [];
    throw new ConfigError(`Could not read MCP config ${filePath}: ${getErrorMessage(err)}`);
  }
  try {
    return parseMcpServerConfigs(JSON.parse(raw));
  } catch (err) {
    throw new ConfigError(`Invalid MCP config ${filePath}: ${getErrorMessage(err)}`);
  }
}
