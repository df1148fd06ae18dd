import { FileArtifactSink, type ArtifactSink } from "./artifact-sink.js";
import { createBuiltinTools } from "./builtin-tools.js";
import { MonotonicClock } from "./clock.js";
import { SqliteEventSink, type EventSink, type RecordedEvent } from "./event-sink.js";
import { TimeoutStepExecutor, type StepExecutor } from "./executor.js";
import { ExecutionHistory, type HistorySummary } from "./history.js";
import { silentLogger, type Logger } from "./logger.js";
import { PlanRunner, type PlanIssue, type RunReport } from "./plan-runner.js";
import { Planner, type Classifier } from "./planner.js";
import { RetryingStepExecutor } from "./retry.js";
import { createStep, type Plan, type StepOutcome } from "./schema.js";
import { TelemetryRecorder } from "./telemetry.js";
import { ToolRegistry, type ToolDefinition, type ToolSummary } from "./tools.js";

export const VERSION = "0.1.0";

export interface OrchestratorConfig {
  /** SQLite file for lifecycle events; null disables the event sink. */
  eventDbPath: string | null;
  /** Root directory for artifacts; null disables the artifact sink. */
  artifactDir: string | null;
  defaultStepTimeoutSeconds?: number;
  workerThreads?: number;
  retry?: { enabled: boolean; delayMs: number };
  logger?: Logger;
}

/** Collaborators that tests and embedders may swap out. */
export interface OrchestratorDeps {
  eventSink?: EventSink | null;
  artifactSink?: ArtifactSink | null;
  classifier?: Classifier;
  clock?: MonotonicClock;
  now?: () => Date;
  tools?: ToolDefinition[];
}

export interface GoalExecution {
  plan: Plan;
  report: RunReport;
}

export type SinkHealth = "healthy" | "unhealthy" | "disabled";

export interface HealthReport {
  eventSink: SinkHealth;
  artifactSink: SinkHealth;
  orchestrator: "healthy";
}

/**
 * Conductor Orchestrator - owns one registry, one history and the sinks, and
 * wires planner, executor and runner together.
 */
export class Orchestrator {
  private constructor(
    private readonly registry: ToolRegistry,
    private readonly history: ExecutionHistory,
    private readonly planner: Planner,
    private readonly executor: StepExecutor,
    private readonly runner: PlanRunner,
    private readonly telemetry: TelemetryRecorder,
    private readonly eventSink: EventSink | null,
    private readonly artifactSink: ArtifactSink | null,
    private readonly logger: Logger,
    private readonly defaultStepTimeoutSeconds: number | undefined,
  ) {}

  /**
   * Create a new orchestrator instance
   */
  static async create(
    config: OrchestratorConfig,
    deps: OrchestratorDeps = {},
  ): Promise<Orchestrator> {
    const logger = config.logger ?? silentLogger;
    const now = deps.now ?? (() => new Date());

    const eventSink =
      deps.eventSink !== undefined
        ? deps.eventSink
        : config.eventDbPath
          ? SqliteEventSink.create(config.eventDbPath, now)
          : null;
    const artifactSink =
      deps.artifactSink !== undefined
        ? deps.artifactSink
        : config.artifactDir
          ? new FileArtifactSink(config.artifactDir, now)
          : null;

    const registry = new ToolRegistry({ maxThreads: config.workerThreads });
    for (const tool of createBuiltinTools({ eventSink, artifactSink })) {
      registry.register(tool);
    }
    for (const tool of deps.tools ?? []) {
      registry.register(tool);
    }

    const history = new ExecutionHistory();
    const telemetry = new TelemetryRecorder(eventSink, logger);

    const baseExecutor = new TimeoutStepExecutor(history, { logger, now });
    const executor: StepExecutor = config.retry?.enabled
      ? new RetryingStepExecutor(baseExecutor, { delayMs: config.retry.delayMs, logger })
      : baseExecutor;

    const planner = new Planner({
      classifier: deps.classifier,
      telemetry,
      logger,
      clock: deps.clock,
      now,
      defaultTimeoutSeconds: config.defaultStepTimeoutSeconds,
    });
    const runner = new PlanRunner(registry, executor, { telemetry, logger, now });

    return new Orchestrator(
      registry,
      history,
      planner,
      executor,
      runner,
      telemetry,
      eventSink,
      artifactSink,
      logger,
      config.defaultStepTimeoutSeconds,
    );
  }

  plan(goal: string): Plan {
    return this.planner.plan(goal);
  }

  validate(plan: Plan): boolean {
    return this.runner.validate(plan);
  }

  inspect(plan: Plan): PlanIssue[] {
    return this.runner.inspect(plan);
  }

  async run(plan: Plan): Promise<RunReport> {
    return await this.runner.run(plan);
  }

  /**
   * Plan and run a goal
   */
  async execute(goal: string): Promise<GoalExecution> {
    const plan = this.plan(goal);
    const report = await this.runner.run(plan);
    return { plan, report };
  }

  /**
   * Run one tool directly, outside any plan (function-call path of the
   * intent layer). Recorded in history like any plan step.
   */
  async executeTool(
    name: string,
    args: Record<string, unknown>,
    options: { timeoutSeconds?: number } = {},
  ): Promise<StepOutcome> {
    const step = createStep({
      tool: name,
      args,
      timeout: options.timeoutSeconds ?? this.defaultStepTimeoutSeconds,
    });
    return await this.executor.execute(step, this.registry);
  }

  summarize(): HistorySummary {
    return this.history.summarize();
  }

  listTools(): ToolSummary[] {
    return this.registry.list();
  }

  hasTool(name: string): boolean {
    return this.registry.has(name);
  }

  registerTool(tool: ToolDefinition): void {
    this.registry.register(tool);
  }

  getHistory(): ExecutionHistory {
    return this.history;
  }

  async recentEvents(limit = 10): Promise<RecordedEvent[]> {
    if (!this.eventSink) return [];
    return await this.eventSink.recent(limit);
  }

  /**
   * Check the sinks. The event sink gets a HEALTH_CHECK event; the artifact
   * sink is only reported as configured or not.
   */
  async checkHealth(): Promise<HealthReport> {
    let eventSink: SinkHealth = "disabled";
    if (this.eventSink) {
      const healthCheck = await this.telemetry.emitAndWait("HEALTH_CHECK", {
        timestamp: new Date().toISOString(),
      });
      eventSink = healthCheck.ok ? "healthy" : "unhealthy";
    }

    return {
      eventSink,
      artifactSink: this.artifactSink ? "healthy" : "disabled",
      orchestrator: "healthy",
    };
  }

  /**
   * Shutdown orchestrator
   */
  async shutdown(): Promise<void> {
    await this.telemetry.flush();
    await this.registry.shutdown();
    this.eventSink?.close();
    this.logger.debug("Orchestrator shut down");
  }
}

// Re-export types
export * from "./artifact-sink.js";
export * from "./builtin-tools.js";
export * from "./clock.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./event-sink.js";
export * from "./executor.js";
export * from "./history.js";
export * from "./logger.js";
export * from "./plan-runner.js";
export * from "./planner.js";
export * from "./result.js";
export * from "./retry.js";
export * from "./schema.js";
export * from "./telemetry.js";
export * from "./tools.js";
