import type { KnowledgeBase } from "../knowledge/knowledgeBase.js";
import { ConfigError, RunnerBusyError, getErrorMessage } from "../lib/errors.js";
import type { ChatClient } from "../llm/client.js";
import { McpToolClient, type McpServerConfig } from "../mcp/client.js";
import { retrieveContext } from "../retrieval/context.js";
import { Agent } from "./agent.js";
import { notifyRunnerUpdate } from "./events.js";
import { appendLog, getLog } from "./log.js";

export type RunnerStatus = "idle" | "running";

export interface RunnerState {
  status: RunnerStatus;
  currentTask: string | null;
  lastResult: string | null;
  lastError: string | null;
  log: string[];
  chatConfigured: boolean;
  ragEnabled: boolean;
  mcpServers: string[];
}

export interface RunOptions {
  systemPrompt: string;
  topK: number;
  maxToolRounds: number;
  onToken?: (token: string) => void;
}

export interface RunTaskOptions {
  /** Set false to skip knowledge retrieval for this run. */
  useRag?: boolean;
}

type RunOutcome = Pick<RunnerState, "status" | "currentTask" | "lastResult" | "lastError">;

let state: RunOutcome = {
  status: "idle",
  currentTask: null,
  lastResult: null,
  lastError: null,
};

let chatClient: ChatClient | null = null;
let knowledgeBase: KnowledgeBase | null = null;
let mcpServers: McpServerConfig[] = [];
let runOptions: RunOptions = { systemPrompt: "", topK: 3, maxToolRounds: 20 };

export function getRunnerState(): RunnerState {
  return {
    ...state,
    log: getLog(),
    chatConfigured: chatClient != null,
    ragEnabled: knowledgeBase != null,
    mcpServers: mcpServers.map((s) => s.name),
  };
}

export function setChatClient(client: ChatClient | null): void {
  chatClient = client;
  notifyRunnerUpdate("config");
}

export function setKnowledgeBase(kb: KnowledgeBase | null): void {
  knowledgeBase = kb;
  notifyRunnerUpdate("config");
}

export function getKnowledgeBase(): KnowledgeBase | null {
  return knowledgeBase;
}

export function setMcpServers(configs: McpServerConfig[]): void {
  mcpServers = [...configs];
  notifyRunnerUpdate("config");
}

export function setRunOptions(options: Partial<RunOptions>): void {
  runOptions = { ...runOptions, ...options };
}

/** Forget the last run's outcome. Does not touch the configured clients. */
export function resetRunnerState(): void {
  state = { status: "idle", currentTask: null, lastResult: null, lastError: null };
  notifyRunnerUpdate("status");
}

function setStatus(status: RunnerStatus, currentTask: string | null): void {
  state.status = status;
  state.currentTask = currentTask;
  notifyRunnerUpdate("status");
}

/**
 * One complete run: sync knowledge, retrieve context for the task, connect the MCP servers,
 * let the agent work, then close every connection. Only one run at a time.
 */
export async function runTask(task: string, options: RunTaskOptions = {}): Promise<string> {
  if (state.status === "running") throw new RunnerBusyError(state.currentTask);
  const client = chatClient;
  if (!client) throw new ConfigError("No chat model configured: set OPENAI_API_KEY and restart");

  state.lastResult = null;
  state.lastError = null;
  setStatus("running", task);
  appendLog(`Task started: ${task}`);

  try {
    let context = "";
    const kb = knowledgeBase;
    if (options.useRag !== false && kb) {
      await kb.sync();
      context = await retrieveContext(kb.retriever, task, runOptions.topK);
    }

    const agent = new Agent(
      client,
      mcpServers.map((config) => new McpToolClient(config)),
      {
        systemPrompt: runOptions.systemPrompt,
        context,
        maxToolRounds: runOptions.maxToolRounds,
        onToken: runOptions.onToken,
      }
    );

    let result: string;
    try {
      await agent.init();
      result = await agent.invoke(task);
    } finally {
      await agent.close();
    }

    state.lastResult = result;
    appendLog("Task finished");
    return result;
  } catch (err) {
    state.lastError = getErrorMessage(err);
    appendLog(`Task failed: ${state.lastError}`);
    throw err;
  } finally {
    setStatus("idle", null);
  }
}
