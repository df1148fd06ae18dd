import { MonotonicClock } from "./clock.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import {
  createStep,
  freezePlan,
  type Plan,
  type Step,
  type StepInput,
  type WorkflowKind,
} from "./schema.js";
import type { TelemetryRecorder } from "./telemetry.js";

export const PLANNER_VERSION = "1.0.0";
export const RECORD_EVENT_TOOL = "runs_record_event";
const SECONDS_PER_STEP_ESTIMATE = 5;

// ── Classification ──────────────────────────────────────────────────────────

export interface Classifier {
  classify(goal: string): WorkflowKind;
}

export interface KeywordGroup {
  workflow: Exclude<WorkflowKind, "generic">;
  keywords: string[];
}

/** Evaluated in order; the first group with a matching keyword wins. */
export const DEFAULT_KEYWORD_GROUPS: readonly KeywordGroup[] = [
  { workflow: "etl", keywords: ["etl", "data", "pipeline"] },
  { workflow: "training", keywords: ["train", "model"] },
  { workflow: "deployment", keywords: ["deploy", "agent"] },
];

/**
 * Case-insensitive substring matching against ordered keyword groups.
 * Falls back to the generic workflow.
 */
export class KeywordClassifier implements Classifier {
  constructor(private readonly groups: readonly KeywordGroup[] = DEFAULT_KEYWORD_GROUPS) {}

  classify(goal: string): WorkflowKind {
    const text = goal.toLowerCase();
    for (const group of this.groups) {
      if (group.keywords.some((keyword) => text.includes(keyword))) {
        return group.workflow;
      }
    }
    return "generic";
  }
}

// ── Templates ───────────────────────────────────────────────────────────────

export interface TemplateContext {
  goal: string;
  /** Monotonic millisecond stamp, read once per plan. */
  stamp: number;
}

/**
 * Domain steps for a workflow. Indices in `dependsOn` are plan indices: the
 * record-plan step occupies index 0, so the first domain step is index 1.
 */
export type WorkflowTemplate = (ctx: TemplateContext) => StepInput[];

export const WORKFLOW_TEMPLATES: Record<WorkflowKind, WorkflowTemplate> = {
  etl: ({ goal, stamp }) => [
    {
      tool: "etl_run_job",
      args: { payload: { goal, pipeline: "default" } },
      dependsOn: [0],
    },
    {
      tool: "artifacts_write_text",
      args: {
        path: `etl/results/${stamp}.json`,
        content: JSON.stringify({ goal, status: "completed" }),
      },
      dependsOn: [1],
    },
  ],
  training: ({ goal, stamp }) => [
    {
      tool: "train_model",
      args: {
        modelName: "orchestrator-model",
        config: { epochs: 10, batchSize: 32 },
      },
      dependsOn: [0],
    },
    {
      tool: "artifacts_write_text",
      args: {
        path: `training/logs/${stamp}.txt`,
        content: `Training initiated for goal: ${goal}`,
      },
      dependsOn: [1],
    },
  ],
  deployment: () => [
    {
      tool: "deploy_agent",
      args: {
        agentName: "orchestrator-agent",
        version: "v1.0.0",
        config: { replicas: 1, memory: "2Gi" },
      },
      dependsOn: [0],
    },
  ],
  generic: ({ goal, stamp }) => [
    {
      tool: "etl_run_job",
      args: { payload: { goal, type: "generic" } },
      dependsOn: [0],
    },
    {
      tool: "artifacts_write_text",
      args: {
        path: `runs/${stamp}.txt`,
        content: `Goal: ${goal}\nStatus: Processing`,
      },
      dependsOn: [1],
    },
  ],
};

// ── Planner ─────────────────────────────────────────────────────────────────

export interface PlannerOptions {
  classifier?: Classifier;
  templates?: Partial<Record<WorkflowKind, WorkflowTemplate>>;
  telemetry?: TelemetryRecorder;
  logger?: Logger;
  clock?: MonotonicClock;
  now?: () => Date;
  defaultTimeoutSeconds?: number;
}

/**
 * Turns a goal into a fixed-shape plan: record-plan, the workflow's domain
 * steps, record-done.
 */
export class Planner {
  private readonly classifier: Classifier;
  private readonly templates: Record<WorkflowKind, WorkflowTemplate>;
  private readonly telemetry: TelemetryRecorder | undefined;
  private readonly logger: Logger;
  private readonly clock: MonotonicClock;
  private readonly now: () => Date;
  private readonly defaultTimeoutSeconds: number | undefined;

  constructor(options: PlannerOptions = {}) {
    this.classifier = options.classifier ?? new KeywordClassifier();
    this.templates = { ...WORKFLOW_TEMPLATES, ...options.templates };
    this.telemetry = options.telemetry;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? new MonotonicClock();
    this.now = options.now ?? (() => new Date());
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds;
  }

  plan(goal: string): Plan {
    this.telemetry?.emit("PLANNING_STARTED", { goal });

    const workflow = this.classifier.classify(goal);
    const domain = this.templates[workflow]({ goal, stamp: this.clock.nowMs() });

    const drafts: StepInput[] = [
      { tool: RECORD_EVENT_TOOL, args: { eventType: "PLAN", details: { goal } } },
      ...domain,
    ];
    drafts.push({
      tool: RECORD_EVENT_TOOL,
      args: { eventType: "DONE", details: { goal } },
      dependsOn: domain.length > 0 ? [drafts.length - 1] : [],
    });

    const steps: Step[] = drafts.map((draft) =>
      createStep({ timeout: this.defaultTimeoutSeconds, ...draft }),
    );

    const plan = freezePlan({
      goal,
      steps,
      metadata: {
        plannerVersion: PLANNER_VERSION,
        workflow,
        estimatedDurationSeconds: steps.length * SECONDS_PER_STEP_ESTIMATE,
      },
      createdAt: this.now().toISOString(),
    });

    this.logger.info("Plan created", {
      goal,
      workflow,
      steps: plan.steps.map((step) => step.tool),
    });
    return plan;
  }
}
