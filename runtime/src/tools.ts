import { existsSync } from "fs";
import { dirname, join } from "path";
import { Piscina } from "piscina";
import { fileURLToPath } from "url";
import { UnknownToolError, type InvalidArgumentsError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import { checkToolArgs, type ToolArgsSchema } from "./tool-args.js";
import { isWorkerTool, type WorkerTask } from "./worker.js";

export type ToolResult = Record<string, unknown>;
export type { ToolArgsSchema };

export interface CapabilityContext {
  /** Aborted when the caller stops waiting (step timeout). */
  signal: AbortSignal;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /**
   * Inline implementation. When absent the tool is dispatched to the worker
   * pool, which only knows the built-in job tools.
   */
  execute?: (args: Record<string, unknown>, context: CapabilityContext) => Promise<ToolResult>;
  /** Checked by the executor before invocation; a mismatch is an `error` outcome. */
  argsSchema?: ToolArgsSchema;
  category?: "telemetry" | "storage" | "job" | "other";
  keywords?: string[];
}

export type CapabilityMode = "inline" | "worker";

/**
 * A resolved, invocable tool. Two variants: inline functions and
 * worker-pool dispatch.
 */
export interface Capability {
  readonly name: string;
  readonly mode: CapabilityMode;
  /** Validate and normalize arguments without invoking anything. */
  parseArgs(args: Record<string, unknown>): Result<Record<string, unknown>, InvalidArgumentsError>;
  invoke(args: Record<string, unknown>, context: CapabilityContext): Promise<ToolResult>;
}

export interface ToolSummary {
  name: string;
  description: string;
  category: NonNullable<ToolDefinition["category"]>;
  mode: CapabilityMode;
}

export interface ToolRegistryOptions {
  maxThreads?: number;
  idleTimeoutMs?: number;
}

/** The slice of a Piscina pool that worker capabilities use. */
export interface TaskRunner {
  run(task: WorkerTask, options: { signal: AbortSignal }): Promise<unknown>;
}

abstract class BaseCapability {
  constructor(
    readonly name: string,
    private readonly argsSchema: ToolArgsSchema | undefined,
  ) {}

  parseArgs(args: Record<string, unknown>): Result<Record<string, unknown>, InvalidArgumentsError> {
    return this.argsSchema ? checkToolArgs(this.name, this.argsSchema, args) : ok(args);
  }
}

class InlineCapability extends BaseCapability implements Capability {
  readonly mode = "inline";

  constructor(
    name: string,
    argsSchema: ToolArgsSchema | undefined,
    private readonly fn: NonNullable<ToolDefinition["execute"]>,
  ) {
    super(name, argsSchema);
  }

  async invoke(args: Record<string, unknown>, context: CapabilityContext): Promise<ToolResult> {
    return await this.fn(args, context);
  }
}

export class WorkerCapability extends BaseCapability implements Capability {
  readonly mode = "worker";

  constructor(
    name: string,
    argsSchema: ToolArgsSchema | undefined,
    private readonly pool: () => TaskRunner,
  ) {
    super(name, argsSchema);
  }

  async invoke(args: Record<string, unknown>, context: CapabilityContext): Promise<ToolResult> {
    const task: WorkerTask = { toolName: this.name, parameters: { ...args } };
    const result: unknown = await this.pool().run(task, { signal: context.signal });
    if (!isRecord(result)) {
      throw new Error(`Tool ${this.name} returned a non-object result`);
    }
    return result;
  }
}

export class ToolRegistry {
  private readonly tools: Map<string, ToolDefinition> = new Map();
  private readonly workerPath: string;
  private readonly maxThreads: number;
  private readonly idleTimeoutMs: number;
  private pool: Piscina | null = null;

  constructor(options: ToolRegistryOptions = {}) {
    this.workerPath = this.resolveWorkerPath();
    this.maxThreads = Math.max(1, options.maxThreads ?? 4);
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60_000;
  }

  private resolveWorkerPath(): string {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);

    const tsWorker = join(__dirname, "worker.ts");
    if (existsSync(tsWorker)) return tsWorker;
    return join(__dirname, "worker.js");
  }

  private getPool(): Piscina {
    if (!this.pool) {
      const execArgv = this.workerPath.endsWith(".ts") ? ["--import", "tsx"] : undefined;

      this.pool = new Piscina({
        filename: this.workerPath,
        maxThreads: this.maxThreads,
        idleTimeout: this.idleTimeoutMs,
        execArgv,
      });
    }
    return this.pool;
  }

  register(tool: ToolDefinition): void {
    if (!tool.name.trim()) {
      throw new Error("Tool name must not be empty");
    }
    if (!tool.execute && !isWorkerTool(tool.name)) {
      throw new Error(`Tool ${tool.name} has no implementation and is not a worker tool`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): ToolSummary[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      category: tool.category ?? "other",
      mode: tool.execute ? "inline" : "worker",
    }));
  }

  resolve(name: string): Result<Capability, UnknownToolError> {
    const tool = this.get(name);
    if (!tool) {
      return err(new UnknownToolError(name));
    }

    if (tool.execute) {
      return ok(new InlineCapability(tool.name, tool.argsSchema, tool.execute));
    }
    return ok(new WorkerCapability(tool.name, tool.argsSchema, () => this.getPool()));
  }

  async execute(
    name: string,
    params: Record<string, unknown>,
    context: CapabilityContext = { signal: new AbortController().signal },
  ): Promise<ToolResult> {
    const resolved = this.resolve(name);
    if (!resolved.ok) {
      throw resolved.error;
    }
    const parsed = resolved.value.parseArgs(params);
    if (!parsed.ok) {
      throw parsed.error;
    }
    return await resolved.value.invoke(parsed.value, context);
  }

  get workerPoolStarted(): boolean {
    return this.pool !== null;
  }

  async shutdown(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.destroy();
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
