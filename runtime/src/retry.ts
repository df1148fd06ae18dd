import { setTimeout as sleep } from "timers/promises";
import type { StepExecutor } from "./executor.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Step, StepOutcome } from "./schema.js";
import type { ToolRegistry } from "./tools.js";

export interface RetryOptions {
  /** Fixed wait between attempts. */
  delayMs: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Opt-in decorator: re-runs a step while its outcome is not a success, up to
 * `step.retryCount` extra attempts. Every attempt is recorded by the inner
 * executor; the last outcome is returned.
 */
export class RetryingStepExecutor implements StepExecutor {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly inner: StepExecutor,
    private readonly options: RetryOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  async execute(step: Step, registry: ToolRegistry): Promise<StepOutcome> {
    let outcome = await this.inner.execute(step, registry);

    for (let attempt = 1; attempt <= step.retryCount && outcome.status !== "success"; attempt++) {
      // An unknown tool will not appear between attempts.
      if (outcome.status === "error") break;

      this.logger.warn("Retrying step", {
        tool: step.tool,
        attempt,
        of: step.retryCount,
        previousStatus: outcome.status,
      });
      if (this.options.delayMs > 0) {
        await this.sleep(this.options.delayMs);
      }
      outcome = await this.inner.execute(step, registry);
    }

    return outcome;
  }
}
