/**
 * Entry point: load config, build the session registry and chatbot engine, serve the HTTP API.
 */

import { loadConfig } from "./config";
import { providerFactory } from "./adapters/llm";
import { startApiServer } from "./api-server";
import { ChatbotEngine } from "./chatbot/engine";
import { logger, logError } from "./logging";
import { SessionRegistry } from "./memory/registry";

async function main(): Promise<void> {
  const config = loadConfig();
  const registry = new SessionRegistry({
    memory: {
      maxMessages: config.memory.maxMessages,
      summaryThreshold: config.memory.summaryThreshold,
      contextWindow: config.memory.contextWindow,
      factsDriftBound: config.memory.factsDriftBound,
      timeoutMs: config.llm.timeoutMs,
      systemPrompt: config.systemPrompt,
    },
    providerFactory: providerFactory(config.llm),
    idleTimeoutMs: config.memory.idleTimeoutMs,
  });
  const engine = new ChatbotEngine(registry, config.llm);

  const server = await startApiServer(engine, config.server.port);
  registry.startIdleSweep();
  logger.info(
    {
      event: "SERVICE_STARTED",
      port: config.server.port,
      provider: config.llm.provider,
      maxMessages: config.memory.maxMessages,
      summaryThreshold: config.memory.summaryThreshold,
      contextWindow: config.memory.contextWindow,
    },
    "Session memory service listening"
  );

  const shutdown = (): void => {
    logger.info({ event: "SHUTDOWN" }, "Shutting down");
    registry.stop();
    server.close(() => process.exit(0));
    server.closeAllConnections();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)), { phase: "startup" });
  process.exit(1);
});
