#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMathServer } from "./mathServer.js";

// stdout carries the protocol; diagnostics go to stderr.
await createMathServer().connect(new StdioServerTransport());
console.error("math-server listening on stdio");
