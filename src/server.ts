import { createApp } from "./app.js";
import { appendLog } from "./agent/log.js";
import { bootstrap } from "./bootstrap.js";
import { getErrorMessage } from "./lib/errors.js";

const { config, knowledgeBase } = await bootstrap();
const app = createApp();

app.listen(config.port, () => {
  console.log(`MCP + RAG agent at http://localhost:${config.port}`);
  if (knowledgeBase) {
    knowledgeBase
      .sync()
      .then(() => knowledgeBase.watch())
      .catch((err: unknown) => appendLog(`Initial knowledge sync failed: ${getErrorMessage(err)}`));
  }
});
