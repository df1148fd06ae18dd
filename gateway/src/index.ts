import {
  Orchestrator,
  createConsoleLogger,
  ensureEnvLoaded,
  errorMessage,
  loadConductorConfig,
} from "../../runtime/src/index.js";
import { buildGateway } from "./app.js";

ensureEnvLoaded();

async function start() {
  const config = loadConductorConfig();
  const logger = createConsoleLogger(config.logLevel);

  logger.info("🔧 Initializing orchestrator...");
  const orchestrator = await Orchestrator.create({
    eventDbPath: config.eventDbPath,
    artifactDir: config.artifactDir,
    defaultStepTimeoutSeconds: config.defaultStepTimeoutSeconds,
    workerThreads: config.workerThreads,
    retry: config.retry,
    logger,
  });
  logger.info("✅ Orchestrator initialized", { tools: orchestrator.listTools().length });

  const startup = await orchestrator.checkHealth();
  if (startup.eventSink !== "healthy") {
    logger.warn("⚠️ Event sink unavailable on startup", { eventSink: startup.eventSink });
  }

  const { app, tasks } = await buildGateway(orchestrator, {
    requestLogging: true,
    logger,
  });

  await app.listen({ port: config.gateway.port, host: config.gateway.host });
  logger.info(`🚀 Gateway running on http://${config.gateway.host}:${config.gateway.port}`);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("🛑 Shutting down gateway...", { signal });
    await app.close();
    await tasks.drain();
    await orchestrator.shutdown();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

start().catch((error: unknown) => {
  console.error("Fatal error starting gateway:", error);
  process.exit(1);
});
