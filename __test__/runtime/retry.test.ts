import { describe, expect, it, vi } from "vitest";
import {
  RetryingStepExecutor,
  ToolRegistry,
  createStep,
  type OutcomeStatus,
  type StepExecutor,
} from "../../runtime/src/index.js";
import { createLoggerMock } from "../helpers/fixtures.js";

function scriptedExecutor(statuses: OutcomeStatus[]) {
  const queue = [...statuses];
  const execute = vi.fn<StepExecutor["execute"]>(async (step) => ({
    tool: step.tool,
    args: step.args,
    status: queue.shift() ?? "success",
    timestamp: new Date(0).toISOString(),
    durationMs: 0,
  }));
  return { execute };
}

describe("RetryingStepExecutor", () => {
  const registry = new ToolRegistry();

  it("retries up to the step's retry budget", async () => {
    const inner = scriptedExecutor(["failed", "timeout", "failed"]);
    const sleep = vi.fn(async () => undefined);
    const executor = new RetryingStepExecutor(inner, { delayMs: 250, sleep });

    const outcome = await executor.execute(createStep({ tool: "t", retryCount: 2 }), registry);

    expect(outcome.status).toBe("failed");
    expect(inner.execute).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it("stops at the first success", async () => {
    const inner = scriptedExecutor(["failed", "success"]);
    const logger = createLoggerMock();
    const executor = new RetryingStepExecutor(inner, { delayMs: 0, logger });

    const outcome = await executor.execute(createStep({ tool: "t" }), registry);

    expect(outcome.status).toBe("success");
    expect(inner.execute).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith("Retrying step", {
      tool: "t",
      attempt: 1,
      of: 3,
      previousStatus: "failed",
    });
  });

  it("does not retry an unknown tool", async () => {
    const inner = scriptedExecutor(["error"]);
    const executor = new RetryingStepExecutor(inner, { delayMs: 0 });

    const outcome = await executor.execute(createStep({ tool: "ghost" }), registry);

    expect(outcome.status).toBe("error");
    expect(inner.execute).toHaveBeenCalledTimes(1);
  });

  it("runs once when the budget is zero", async () => {
    const inner = scriptedExecutor(["failed"]);
    const executor = new RetryingStepExecutor(inner, { delayMs: 0 });

    await executor.execute(createStep({ tool: "t", retryCount: 0 }), registry);

    expect(inner.execute).toHaveBeenCalledTimes(1);
  });
});
