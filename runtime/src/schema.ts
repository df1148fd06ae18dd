import { z } from "zod";

export const DEFAULT_STEP_TIMEOUT_SECONDS = 300;
export const DEFAULT_RETRY_COUNT = 3;
/** Longest delay a Node timer can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_STEP_TIMEOUT_SECONDS = 2_147_483;

export const stepTimeoutSchema = z.number().positive().finite().max(MAX_STEP_TIMEOUT_SECONDS);

// ── Step ──────────────────────────────────────────────────────────────────

export const stepSchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
  dependsOn: z.array(z.number().int()).default([]),
  timeout: stepTimeoutSchema.default(DEFAULT_STEP_TIMEOUT_SECONDS),
  retryCount: z.number().int().nonnegative().default(DEFAULT_RETRY_COUNT),
});

export type StepInput = z.input<typeof stepSchema>;

export interface Step {
  readonly tool: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly dependsOn: readonly number[];
  /** Seconds. */
  readonly timeout: number;
  /** Declared budget; only the retrying executor reads it. */
  readonly retryCount: number;
}

// ── Plan ──────────────────────────────────────────────────────────────────

export const workflowKindSchema = z.enum(["etl", "training", "deployment", "generic"]);

export type WorkflowKind = z.infer<typeof workflowKindSchema>;

export const planMetadataSchema = z.object({
  plannerVersion: z.string().min(1),
  workflow: workflowKindSchema.optional(),
  estimatedDurationSeconds: z.number().nonnegative(),
});

export type PlanMetadata = z.infer<typeof planMetadataSchema>;

export const planSchema = z.object({
  goal: z.string(),
  steps: z.array(stepSchema).min(1),
  metadata: planMetadataSchema.default({ plannerVersion: "external", estimatedDurationSeconds: 0 }),
  createdAt: z.string().datetime().optional(),
});

export interface Plan {
  readonly goal: string;
  readonly steps: readonly Step[];
  readonly metadata: Readonly<PlanMetadata>;
  readonly createdAt: string;
}

// ── Outcome ───────────────────────────────────────────────────────────────

export type OutcomeStatus = "success" | "failed" | "timeout" | "error";

export interface StepOutcome {
  readonly tool: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly status: OutcomeStatus;
  readonly result?: Readonly<Record<string, unknown>>;
  readonly error?: string;
  readonly timestamp: string;
  readonly durationMs: number;
}

// ── Builders ──────────────────────────────────────────────────────────────

export function createStep(input: StepInput): Step {
  const parsed = stepSchema.parse(input);
  return Object.freeze({
    tool: parsed.tool,
    args: Object.freeze({ ...parsed.args }),
    dependsOn: Object.freeze([...parsed.dependsOn]),
    timeout: parsed.timeout,
    retryCount: parsed.retryCount,
  });
}

export function freezePlan(plan: {
  goal: string;
  steps: Step[];
  metadata: PlanMetadata;
  createdAt: string;
}): Plan {
  return Object.freeze({
    goal: plan.goal,
    steps: Object.freeze([...plan.steps]),
    metadata: Object.freeze({ ...plan.metadata }),
    createdAt: plan.createdAt,
  });
}

/**
 * Parse a plan that arrived from outside the process (HTTP body, JSON file).
 * Throws a ZodError when the shape is wrong; dependency and tool checks are
 * left to PlanRunner.validate.
 */
export function parsePlan(data: unknown, now: () => Date = () => new Date()): Plan {
  const parsed = planSchema.parse(data);
  return freezePlan({
    goal: parsed.goal,
    steps: parsed.steps.map((step) => createStep(step)),
    metadata: parsed.metadata,
    createdAt: parsed.createdAt ?? now().toISOString(),
  });
}
