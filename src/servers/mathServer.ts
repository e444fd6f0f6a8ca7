import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export const MATH_SERVER_NAME = "math-server";

/**
 * Small MCP tool server bundled as a local example: one arithmetic tool the model can call.
 */
export function createMathServer(): McpServer {
  const server = new McpServer({ name: MATH_SERVER_NAME, version: "0.1.0" });

  server.tool(
    "add_then_multiply",
    "Compute (a + b) * c and return the worked expression",
    {
      a: z.number().describe("First addend"),
      b: z.number().describe("Second addend"),
      c: z.number().describe("Multiplier"),
    },
    async ({ a, b, c }) => ({
      content: [{ type: "text", text: `(${a} + ${b}) * ${c} = ${(a + b) * c}` }],
    })
  );

  return server;
}
