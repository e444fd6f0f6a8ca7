import { Router } from "express";
import { subscribeRunnerUpdates } from "../agent/events.js";
import { getRunnerState, runTask } from "../agent/runner.js";
import { getErrorMessage } from "../lib/errors.js";

export const agentRouter = Router();

agentRouter.get("/status", (_req, res) => {
  res.json(getRunnerState());
});

agentRouter.get("/stream", (req, res) => {
  req.socket.setTimeout(0);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders?.();

  const send = (data: object) => {
    res.write(`data: ${JSON.stringify(data)}\n\n`);
  };

  send({ update: "status", ...getRunnerState() });
  const unsubscribe = subscribeRunnerUpdates((update) => {
    if (res.writableEnded) return;
    send({ update, ...getRunnerState() });
  });

  req.on("close", () => {
    unsubscribe();
  });
});

agentRouter.post("/run", (req, res) => {
  const body: unknown = req.body;
  const task =
    typeof body === "object" && body !== null && "task" in body && typeof body.task === "string" ? body.task.trim() : "";
  const useRag =
    typeof body === "object" && body !== null && "useRag" in body && body.useRag === false ? false : undefined;
  if (!task) {
    res.status(400).json({ ok: false, error: "task required" });
    return;
  }
  const state = getRunnerState();
  if (state.status === "running") {
    res.status(409).json({ ok: false, error: "Agent is already running", currentTask: state.currentTask });
    return;
  }
  if (!state.chatConfigured) {
    res.status(503).json({ ok: false, error: "OPENAI_API_KEY is not configured" });
    return;
  }
  res.json({ ok: true });
  // Outcome is recorded in runner state and streamed to /stream subscribers.
  runTask(task, { useRag }).catch((err: unknown) => {
    console.error(`Run failed: ${getErrorMessage(err)}`);
  });
});
