#!/usr/bin/env node
import { createServer as createHttpServer } from "http";
import { createAppContext } from "./app.js";
import { loadConfig } from "./config/index.js";
import { createMcpServer } from "./mcp/server.js";
import { startStdio } from "./mcp/stdio.js";
import { logger } from "./observability/logger.js";
import { ChatSocketServer } from "./realtime/chat-socket.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const context = createAppContext(config);

  if (config.runMode === "stdio") {
    await startStdio(createMcpServer(context.tools));
    logger.info("MCP server running on stdio");
    return;
  }

  const app = createServer(context.chat);
  const httpServer = createHttpServer(app);
  new ChatSocketServer(httpServer, context.chat);

  httpServer.listen(config.port, () => {
    logger.info(
      { port: config.port, patientApi: `${config.patientApi.baseUrl}${config.patientApi.endpointPath}` },
      `Service listening on port ${config.port}`,
    );
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "failed to start");
  process.exit(1);
});
