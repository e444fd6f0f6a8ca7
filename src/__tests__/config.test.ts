import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "../lib/errors.js";
import { loadAppConfig } from "../storage/appConfig.js";
import { loadMcpServerConfigs, parseMcpServerConfigs } from "../storage/mcpServers.js";

describe("loadAppConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadAppConfig({}, "/work")).toEqual({
      openaiApiKey: null,
      openaiBaseUrl: null,
      chatModel: "gpt-4o-mini",
      embedding: null,
      knowledgeDir: "/work/knowledge",
      mcpConfigPath: "/work/mcp-servers.json",
      topK: 3,
      maxToolRounds: 20,
      systemPrompt: "",
      port: 3840,
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadAppConfig(
      {
        OPENAI_API_KEY: "test-key",
        OPENAI_BASE_URL: "http://localhost:8000/v1",
        CHAT_MODEL: "local-model",
        EMBEDDING_BASE_URL: "http://localhost:8001/v1",
        EMBEDDING_KEY: "test-embed-key",
        EMBEDDING_MODEL: "embed-small",
        KNOWLEDGE_DIR: "docs",
        MCP_CONFIG: "/etc/mcp.json",
        RAG_TOP_K: "5",
        MAX_TOOL_ROUNDS: "4",
        SYSTEM_PROMPT: "Be concise.",
        PORT: "4000",
      },
      "/work"
    );
    expect(config).toEqual({
      openaiApiKey: "test-key",
      openaiBaseUrl: "http://localhost:8000/v1",
      chatModel: "local-model",
      embedding: { baseUrl: "http://localhost:8001/v1", apiKey: "test-embed-key", model: "embed-small" },
      knowledgeDir: "/work/docs",
      mcpConfigPath: "/etc/mcp.json",
      topK: 5,
      maxToolRounds: 4,
      systemPrompt: "Be concise.",
      port: 4000,
    });
  });

  it("needs both the embedding URL and key to enable retrieval", () => {
    expect(loadAppConfig({ EMBEDDING_BASE_URL: "http://localhost:8001/v1" }, "/work").embedding).toBeNull();
    expect(loadAppConfig({ EMBEDDING_KEY: "test-embed-key", EMBEDDING_BASE_URL: " " }, "/work").embedding).toBeNull();
    expect(
      loadAppConfig({ EMBEDDING_KEY: "test-embed-key", EMBEDDING_BASE_URL: "http://e" }, "/work").embedding?.model
    ).toBe("BAAI/bge-m3");
  });

  it("falls back on invalid numbers", () => {
    const config = loadAppConfig({ RAG_TOP_K: "abc", MAX_TOOL_ROUNDS: "0", PORT: "-1" }, "/work");
    expect([config.topK, config.maxToolRounds, config.port]).toEqual([3, 20, 3840]);
  });
});

describe("parseMcpServerConfigs", () => {
  it("reads stdio and http servers and skips the rest", () => {
    expect(
      parseMcpServerConfigs({
        mcpServers: {
          math: { command: "npx", args: ["tsx", "src/servers/math.ts"], env: { DEBUG: "1", BAD: 2 } },
          remote: { url: "http://localhost:9000/mcp" },
          bare: { command: "uvx" },
          off: { command: "node", disabled: true },
          broken: { args: ["x"] },
          junk: "nope",
        },
      })
    ).toEqual([
      {
        name: "math",
        transport: { type: "stdio", command: "npx", args: ["tsx", "src/servers/math.ts"], env: { DEBUG: "1" } },
      },
      { name: "remote", transport: { type: "http", url: "http://localhost:9000/mcp" } },
      { name: "bare", transport: { type: "stdio", command: "uvx", args: [], env: undefined } },
    ]);
  });

  it("returns nothing without an mcpServers object", () => {
    expect(parseMcpServerConfigs({})).toEqual([]);
    expect(parseMcpServerConfigs(null)).toEqual([]);
  });
});

describe("loadMcpServerConfigs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "mcp-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a config file", async () => {
    const file = path.join(dir, "mcp.json");
    await writeFile(file, JSON.stringify({ mcpServers: { fetch: { command: "uvx", args: ["mcp-server-fetch"] } } }));
    expect(await loadMcpServerConfigs(file)).toEqual([
      { name: "fetch", transport: { type: "stdio", command: "uvx", args: ["mcp-server-fetch"], env: undefined } },
    ]);
  });

  it("starts only the bundled math server from the shipped config", async () => {
    const shipped = fileURLToPath(new URL("../../mcp-servers.json", import.meta.url));
    expect(await loadMcpServerConfigs(shipped)).toEqual([
      { name: "math", transport: { type: "stdio", command: "npx", args: ["tsx", "src/servers/math.ts"], env: undefined } },
    ]);
  });

  it("treats a missing file as no servers", async () => {
    expect(await loadMcpServerConfigs(path.join(dir, "absent.json"))).toEqual([]);
  });

  it("rejects invalid JSON", async () => {
    const file = path.join(dir, "bad.json");
    await writeFile(file, "{ not json");
    await expect(loadMcpServerConfigs(file)).rejects.toBeInstanceOf(ConfigError);
  });
});
