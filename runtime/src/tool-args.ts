import { z } from "zod";
import { InvalidArgumentsError } from "./errors.js";
import { err, ok, type Result } from "./result.js";

// Argument shapes for the built-in tools. Shared by the registry (inline
// tools) and the worker (pooled tools).

export const recordEventArgsSchema = z.object({
  eventType: z.string().min(1),
  details: z.record(z.unknown()).default({}),
});

export const writeTextArgsSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

export const etlJobArgsSchema = z.object({
  payload: z.record(z.unknown()),
  simulatedDelayMs: z.number().int().nonnegative().optional(),
});

export const trainModelArgsSchema = z.object({
  modelName: z.string().min(1),
  config: z.record(z.unknown()).default({ epochs: 10, batchSize: 32 }),
});

export const deployAgentArgsSchema = z.object({
  agentName: z.string().min(1),
  version: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});

export type RecordEventArgs = z.infer<typeof recordEventArgsSchema>;
export type WriteTextArgs = z.infer<typeof writeTextArgsSchema>;
export type EtlJobArgs = z.infer<typeof etlJobArgsSchema>;
export type TrainModelArgs = z.infer<typeof trainModelArgsSchema>;
export type DeployAgentArgs = z.infer<typeof deployAgentArgsSchema>;

export type ToolArgsSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

/**
 * Check arguments against a schema without throwing. Defaults declared by the
 * schema are filled in.
 */
export function checkToolArgs<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  args: unknown,
): Result<z.infer<T>, InvalidArgumentsError> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return err(new InvalidArgumentsError(toolName, issues));
  }
  return ok(parsed.data);
}

/**
 * Parse tool arguments, throwing InvalidArgumentsError with a one-line
 * message that names the tool.
 */
export function parseToolArgs<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  args: unknown,
): z.infer<T> {
  const checked = checkToolArgs(toolName, schema, args);
  if (!checked.ok) {
    throw checked.error;
  }
  return checked.value;
}
