import { setTimeout as sleep } from "timers/promises";
import {
  deployAgentArgsSchema,
  etlJobArgsSchema,
  parseToolArgs,
  trainModelArgsSchema,
} from "./tool-args.js";

export interface WorkerTask {
  toolName: string;
  parameters: Record<string, unknown>;
}

export const WORKER_TOOLS = ["etl_run_job", "train_model", "deploy_agent"] as const;

export type WorkerToolName = (typeof WORKER_TOOLS)[number];

export function isWorkerTool(name: string): name is WorkerToolName {
  return (WORKER_TOOLS as readonly string[]).includes(name);
}

const DEFAULT_SIMULATED_DELAY_MS = 1_000;

/**
 * Piscina entry point. Runs on a worker thread; everything it returns must be
 * structured-cloneable.
 */
export default async function (task: WorkerTask): Promise<Record<string, unknown>> {
  const { toolName, parameters } = task;

  switch (toolName) {
    case "etl_run_job":
      return await runEtlJob(parameters);
    case "train_model":
      return submitTraining(parameters);
    case "deploy_agent":
      return deployAgent(parameters);
    default:
      throw new Error(`Unknown tool: ${toolName}`);
  }
}

export async function runEtlJob(
  params: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Record<string, unknown>> {
  const args = parseToolArgs("etl_run_job", etlJobArgsSchema, params);
  const start = new Date();
  const jobId = `etl_${start.getTime()}`;

  const delayMs = resolveSimulatedDelayMs(args.simulatedDelayMs, env.CONDUCTOR_JOB_DELAY_MS);
  if (delayMs > 0) {
    await sleep(delayMs);
  }

  const end = new Date();
  return {
    status: "success",
    jobId,
    echo: args.payload,
    durationMs: end.getTime() - start.getTime(),
    startTime: start.toISOString(),
    endTime: end.toISOString(),
  };
}

export function submitTraining(params: Record<string, unknown>): Record<string, unknown> {
  const args = parseToolArgs("train_model", trainModelArgsSchema, params);
  const now = new Date();

  return {
    status: "submitted",
    jobId: `train_${args.modelName}_${now.getTime()}`,
    modelName: args.modelName,
    config: args.config,
    estimatedDurationMinutes: 30,
    timestamp: now.toISOString(),
  };
}

export function deployAgent(
  params: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const args = parseToolArgs("deploy_agent", deployAgentArgsSchema, params);
  const now = new Date();
  const deploymentId = `deploy_${args.agentName}_${args.version}_${now.getTime()}`;
  const baseUrl = resolveDeployBaseUrl(env.CONDUCTOR_DEPLOY_BASE_URL);

  return {
    status: "deployed",
    deploymentId,
    agentName: args.agentName,
    version: args.version,
    config: args.config,
    endpoint: `${baseUrl}/${deploymentId}`,
    timestamp: now.toISOString(),
  };
}

export function resolveSimulatedDelayMs(
  explicit: number | undefined,
  envValue: string | undefined,
): number {
  if (explicit !== undefined) return explicit;
  const parsed = Number.parseInt(envValue || "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : DEFAULT_SIMULATED_DELAY_MS;
}

export function resolveDeployBaseUrl(envValue: string | undefined): string {
  const trimmed = String(envValue || "").trim().replace(/\/+$/, "");
  return trimmed || "http://127.0.0.1:8080/agents";
}
