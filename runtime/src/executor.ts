import { StepTimeoutError, errorMessage } from "./errors.js";
import type { ExecutionHistory } from "./history.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { OutcomeStatus, Step, StepOutcome } from "./schema.js";
import type { ToolRegistry, ToolResult } from "./tools.js";

/**
 * Runs one step against a registry. Implementations never reject: every
 * failure mode comes back as an outcome.
 */
export interface StepExecutor {
  execute(step: Step, registry: ToolRegistry): Promise<StepOutcome>;
}

export interface TimeoutStepExecutorOptions {
  logger?: Logger;
  now?: () => Date;
}

// Node fires longer delays after 1 ms.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

type Settled<T> =
  | { kind: "fulfilled"; value: T }
  | { kind: "rejected"; reason: unknown }
  | { kind: "timeout" };

/**
 * Invokes the step's capability raced against `step.timeout`. On timeout the
 * capability's abort signal fires and the executor stops waiting; whether
 * the capability actually stops is up to the capability. No retries.
 */
export class TimeoutStepExecutor implements StepExecutor {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly history: ExecutionHistory,
    options: TimeoutStepExecutorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async execute(step: Step, registry: ToolRegistry): Promise<StepOutcome> {
    const startedAt = this.now().getTime();
    const resolved = registry.resolve(step.tool);
    if (!resolved.ok) {
      this.logger.error("Unknown tool", { tool: step.tool });
      return this.record(step, startedAt, "error", { error: resolved.error.message });
    }

    const capability = resolved.value;
    const args = capability.parseArgs({ ...step.args });
    if (!args.ok) {
      this.logger.error("Invalid tool arguments", { tool: step.tool, error: args.error.message });
      return this.record(step, startedAt, "error", { error: args.error.message });
    }

    this.logger.info("Executing step", { tool: step.tool, args: step.args });

    const controller = new AbortController();
    const settled = await settleWithin(
      capability.invoke(args.value, { signal: controller.signal }),
      step.timeout * 1000,
    );

    switch (settled.kind) {
      case "fulfilled":
        return this.record(step, startedAt, "success", { result: settled.value });
      case "timeout": {
        const timeoutError = new StepTimeoutError(step.timeout);
        controller.abort(timeoutError);
        this.logger.error("Step timed out", { tool: step.tool, timeout: step.timeout });
        return this.record(step, startedAt, "timeout", { error: timeoutError.message });
      }
      case "rejected": {
        const message = errorMessage(settled.reason);
        this.logger.error("Step failed", { tool: step.tool, error: message });
        return this.record(step, startedAt, "failed", { error: message });
      }
    }
  }

  private record(
    step: Step,
    startedAt: number,
    status: OutcomeStatus,
    payload: { result?: ToolResult; error?: string },
  ): StepOutcome {
    const finished = this.now();
    const outcome: StepOutcome = {
      tool: step.tool,
      args: step.args,
      status,
      ...payload,
      timestamp: finished.toISOString(),
      durationMs: Math.max(0, finished.getTime() - startedAt),
    };
    this.history.append(outcome);
    return outcome;
  }
}

async function settleWithin<T>(promise: Promise<T>, timeoutMs: number): Promise<Settled<T>> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise.then(
        (value): Settled<T> => ({ kind: "fulfilled", value }),
        (reason: unknown): Settled<T> => ({ kind: "rejected", reason }),
      ),
      new Promise<Settled<T>>((resolve) => {
        timer = setTimeout(
          () => resolve({ kind: "timeout" }),
          Math.min(timeoutMs, MAX_TIMER_DELAY_MS),
        );
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
