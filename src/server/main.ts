import "dotenv/config";

import { loadConfigFromEnv } from "../config";
import { SecurityPipeline } from "../core/pipeline";
import { createLogger } from "../util/logger";
import { createApp } from "./app";

const logger = createLogger("server");

const pipeline = new SecurityPipeline(loadConfigFromEnv());
const app = createApp(pipeline);

// ---- Start server ----
const PORT = Number(process.env.PORT || 3000);
const server = app.listen(PORT, () => {
  logger.info({ port: PORT }, `listening on http://localhost:${PORT}`);
});

function shutdown(signal: string) {
  logger.info({ signal }, "Shutting down");
  pipeline.dispose();
  server.close();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
