/**
 * Typed errors for the agent, its MCP connections and the retrieval layer.
 * Tool failures never surface as these: the agent turns them into tool messages.
 */

/** Missing or unusable configuration (API keys, endpoints, config files). */
export class ConfigError extends Error {
  readonly name = "ConfigError";
}

/** The embedding endpoint failed or returned no vector. */
export class EmbeddingError extends Error {
  readonly name = "EmbeddingError";

  constructor(
    message: string,
    /** Embedding model that was requested */
    public readonly model?: string
  ) {
    super(message);
  }
}

/** Connecting to an MCP server (spawn, handshake or tool listing) failed. */
export class McpConnectionError extends Error {
  readonly name = "McpConnectionError";

  constructor(
    /** Name of the MCP server as configured */
    public readonly serverName: string,
    reason: string
  ) {
    super(`Could not connect to MCP server ${serverName}: ${reason}`);
  }
}

export class McpNotConnectedError extends Error {
  readonly name = "McpNotConnectedError";

  constructor(public readonly serverName: string) {
    super(`MCP client ${serverName} is not connected; call init() first`);
  }
}

export class AgentNotInitializedError extends Error {
  readonly name = "AgentNotInitializedError";

  constructor() {
    super("Agent is not initialized; call init() first");
  }
}

/**
 * The model kept requesting tools past the configured round limit.
 */
export class MaxToolRoundsError extends Error {
  readonly name = "MaxToolRoundsError";

  constructor(
    /** Number of tool-call rounds that were executed */
    public readonly rounds: number,
    /** Content of the last assistant response */
    public readonly lastContent: string
  ) {
    super(`Max tool rounds (${rounds}) reached without a final answer`);
  }
}

export class RunnerBusyError extends Error {
  readonly name = "RunnerBusyError";

  constructor(public readonly currentTask: string | null) {
    super("Agent is already running a task");
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
