import express from "express";
import cors from "cors";
import { agentRouter } from "./routes/agent.js";
import { knowledgeRouter } from "./routes/knowledge.js";

export function createApp(): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use("/api/agent", agentRouter);
  app.use("/api/knowledge", knowledgeRouter);
  return app;
}
