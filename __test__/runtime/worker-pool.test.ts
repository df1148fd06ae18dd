import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ExecutionHistory,
  TimeoutStepExecutor,
  ToolRegistry,
  WorkerCapability,
  createBuiltinTools,
  createStep,
  type TaskRunner,
} from "../../runtime/src/index.js";

// Worker threads start through tsx, which takes a moment on first load.
const POOL_TEST_TIMEOUT_MS = 30_000;

function builtinRegistry() {
  const registry = new ToolRegistry({ maxThreads: 1 });
  for (const tool of createBuiltinTools({ eventSink: null, artifactSink: null })) {
    registry.register(tool);
  }
  return registry;
}

describe("worker pool dispatch", () => {
  let registry: ToolRegistry | undefined;

  afterEach(async () => {
    await registry?.shutdown();
    registry = undefined;
  });

  it(
    "runs etl_run_job on a worker thread",
    async () => {
      registry = builtinRegistry();

      const result = await registry.execute("etl_run_job", {
        payload: { goal: "nightly load" },
        simulatedDelayMs: 10,
      });

      expect(result.status).toBe("success");
      expect(result.echo).toEqual({ goal: "nightly load" });
      expect(String(result.jobId)).toMatch(/^etl_\d+$/);
    },
    POOL_TEST_TIMEOUT_MS,
  );

  it(
    "times out a slow worker job and keeps the pool usable",
    async () => {
      registry = builtinRegistry();
      const history = new ExecutionHistory();
      const executor = new TimeoutStepExecutor(history);

      const slow = await executor.execute(
        createStep({
          tool: "etl_run_job",
          args: { payload: {}, simulatedDelayMs: 5_000 },
          timeout: 0.5,
        }),
        registry,
      );
      const next = await executor.execute(
        createStep({ tool: "train_model", args: { modelName: "ranker" } }),
        registry,
      );

      expect(slow.status).toBe("timeout");
      expect(slow.error).toBe("timed out after 0.5s");
      expect(next.status).toBe("success");
      expect(next.result?.status).toBe("submitted");
    },
    POOL_TEST_TIMEOUT_MS,
  );

  it(
    "starts the pool on first use and destroys it on shutdown",
    async () => {
      registry = builtinRegistry();
      expect(registry.workerPoolStarted).toBe(false);

      await registry.execute("deploy_agent", { agentName: "bot", version: "v1" });
      expect(registry.workerPoolStarted).toBe(true);

      await registry.shutdown();
      expect(registry.workerPoolStarted).toBe(false);
    },
    POOL_TEST_TIMEOUT_MS,
  );
});

describe("WorkerCapability", () => {
  it("hands the task and abort signal to the pool", async () => {
    const run = vi.fn<TaskRunner["run"]>(async () => ({ status: "success" }));
    const capability = new WorkerCapability("etl_run_job", undefined, () => ({ run }));
    const controller = new AbortController();

    const result = await capability.invoke({ payload: { a: 1 } }, { signal: controller.signal });

    expect(result).toEqual({ status: "success" });
    expect(run).toHaveBeenCalledWith(
      { toolName: "etl_run_job", parameters: { payload: { a: 1 } } },
      { signal: controller.signal },
    );
  });

  it("rejects results that are not objects", async () => {
    const capability = new WorkerCapability("etl_run_job", undefined, () => ({
      run: async () => "done",
    }));

    await expect(
      capability.invoke({}, { signal: new AbortController().signal }),
    ).rejects.toThrow("Tool etl_run_job returned a non-object result");
  });
});
