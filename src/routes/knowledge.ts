import { Router } from "express";
import { getKnowledgeBase } from "../agent/runner.js";
import { getErrorMessage } from "../lib/errors.js";

export const knowledgeRouter = Router();

knowledgeRouter.get("/", (_req, res) => {
  const kb = getKnowledgeBase();
  if (!kb) {
    res.json({ enabled: false, dir: null, documents: [] });
    return;
  }
  res.json({ enabled: true, dir: kb.dir, documents: kb.list() });
});

knowledgeRouter.post("/sync", async (_req, res) => {
  const kb = getKnowledgeBase();
  if (!kb) {
    res.status(400).json({ ok: false, error: "Knowledge retrieval is not configured" });
    return;
  }
  try {
    const summary = await kb.sync();
    res.json({ ok: true, ...summary });
  } catch (err) {
    res.status(500).json({ ok: false, error: getErrorMessage(err) });
  }
});
