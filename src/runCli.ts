import path from "path";
import { parseArgs } from "util";
import { logTitle } from "./agent/log.js";
import { runTask } from "./agent/runner.js";
import { bootstrap } from "./bootstrap.js";
import { getErrorMessage } from "./lib/errors.js";

export const USAGE = `Usage: llm-mcp-rag [--no-rag] [--mcp-config <file>] "<task>"`;

/**
 * Run one task from command-line arguments and print the answer. Resolves to the process exit code;
 * failures are printed, never thrown.
 */
export async function runCli(args: string[]): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        "no-rag": { type: "boolean", default: false },
        "mcp-config": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
    const task = positionals.join(" ").trim();
    if (values.help || !task) {
      console.log(USAGE);
      return values.help ? 0 : 1;
    }

    const useRag = !values["no-rag"];
    const mcpConfig = values["mcp-config"];
    await bootstrap({ useRag, mcpConfigPath: mcpConfig ? path.resolve(mcpConfig) : undefined });

    const result = await runTask(task, { useRag });
    logTitle("RESULT");
    console.log(result);
    return 0;
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    return 1;
  }
}
