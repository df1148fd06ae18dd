import {
  Orchestrator,
  createConsoleLogger,
  ensureEnvLoaded,
  loadConductorConfig,
  type LogLevel,
} from "../../../runtime/src/index.js";

/**
 * In-process orchestrator configured from ~/.conductor.
 */
export async function createCliOrchestrator(options: { debug?: boolean } = {}): Promise<Orchestrator> {
  ensureEnvLoaded();
  const config = loadConductorConfig();
  const level: LogLevel = options.debug ? "debug" : config.logLevel === "info" ? "warn" : config.logLevel;

  return await Orchestrator.create({
    eventDbPath: config.eventDbPath,
    artifactDir: config.artifactDir,
    defaultStepTimeoutSeconds: config.defaultStepTimeoutSeconds,
    workerThreads: config.workerThreads,
    retry: config.retry,
    logger: createConsoleLogger(level),
  });
}
