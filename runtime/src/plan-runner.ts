import { InvalidDependencyError, UnknownToolError } from "./errors.js";
import type { StepExecutor } from "./executor.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { RECORD_EVENT_TOOL } from "./planner.js";
import type { Plan, StepOutcome } from "./schema.js";
import type { TelemetryRecorder } from "./telemetry.js";
import type { ToolRegistry } from "./tools.js";

export type PlanIssue =
  | { kind: "unknown_tool"; stepIndex: number; error: UnknownToolError }
  | { kind: "invalid_dependency"; stepIndex: number; error: InvalidDependencyError };

export interface StepReport {
  index: number;
  tool: string;
  outcome: StepOutcome;
  /** Dependencies whose outcome was not a success. The step ran anyway. */
  unmetDependencies: number[];
}

export type RunReport =
  | {
      status: "completed";
      goal: string;
      outcomes: StepReport[];
      startedAt: string;
      finishedAt: string;
      durationMs: number;
    }
  | {
      status: "failed-to-start";
      goal: string;
      issues: PlanIssue[];
      outcomes: [];
    };

export interface PlanRunnerOptions {
  telemetry?: TelemetryRecorder;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Validates a plan, then runs its steps one at a time in array order.
 * Array order is trusted as a topological order: validation guarantees every
 * dependency points backwards.
 */
export class PlanRunner {
  private readonly telemetry: TelemetryRecorder | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly executor: StepExecutor,
    options: PlanRunnerOptions = {},
  ) {
    this.telemetry = options.telemetry;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  inspect(plan: Plan): PlanIssue[] {
    const issues: PlanIssue[] = [];

    plan.steps.forEach((step, index) => {
      if (!this.registry.has(step.tool)) {
        issues.push({ kind: "unknown_tool", stepIndex: index, error: new UnknownToolError(step.tool) });
      }
      for (const dep of step.dependsOn) {
        if (!Number.isInteger(dep) || dep < 0 || dep >= index) {
          issues.push({
            kind: "invalid_dependency",
            stepIndex: index,
            error: new InvalidDependencyError(index, dep),
          });
        }
      }
    });

    return issues;
  }

  validate(plan: Plan): boolean {
    const issues = this.inspect(plan);
    for (const issue of issues) {
      this.logger.error(
        issue.kind === "unknown_tool" ? "Unknown tool in plan" : "Invalid dependency",
        { step: issue.stepIndex, error: issue.error.message },
      );
    }
    return issues.length === 0;
  }

  async run(plan: Plan): Promise<RunReport> {
    const issues = this.inspect(plan);
    if (issues.length > 0) {
      this.logger.error("Plan rejected", {
        goal: plan.goal,
        issues: issues.map((issue) => issue.error.message),
      });
      this.telemetry?.emit("RUN_REJECTED", {
        goal: plan.goal,
        issues: issues.map((issue) => issue.error.message),
      });
      return { status: "failed-to-start", goal: plan.goal, issues, outcomes: [] };
    }

    const started = this.now();
    this.telemetry?.emit("RUN_STARTED", { goal: plan.goal, steps: plan.steps.length });

    const outcomes: StepReport[] = [];
    for (const [index, step] of plan.steps.entries()) {
      const unmetDependencies = step.dependsOn.filter(
        (dep) => outcomes[dep]?.outcome.status !== "success",
      );

      const outcome = await this.executor.execute(step, this.registry);
      outcomes.push({ index, tool: step.tool, outcome, unmetDependencies });

      if (outcome.status !== "success" && step.tool === RECORD_EVENT_TOOL) {
        this.logger.warn("Event recording step failed, continuing", {
          tool: step.tool,
          status: outcome.status,
          error: outcome.error,
        });
      }
    }

    const finished = this.now();
    const succeeded = outcomes.filter((entry) => entry.outcome.status === "success").length;
    this.telemetry?.emit("RUN_COMPLETED", {
      goal: plan.goal,
      steps: outcomes.length,
      succeeded,
    });
    this.logger.info("Plan completed", {
      goal: plan.goal,
      steps: outcomes.length,
      succeeded,
    });

    return {
      status: "completed",
      goal: plan.goal,
      outcomes,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
    };
  }
}
