import { describe, expect, it } from "vitest";
import runWorkerTask, {
  deployAgent,
  isWorkerTool,
  resolveDeployBaseUrl,
  resolveSimulatedDelayMs,
  runEtlJob,
  submitTraining,
} from "../../runtime/src/worker.js";

describe("resolveSimulatedDelayMs", () => {
  it("defaults to one second", () => {
    expect(resolveSimulatedDelayMs(undefined, undefined)).toBe(1000);
    expect(resolveSimulatedDelayMs(undefined, "not-a-number")).toBe(1000);
  });

  it("uses CONDUCTOR_JOB_DELAY_MS when provided", () => {
    expect(resolveSimulatedDelayMs(undefined, "250")).toBe(250);
    expect(resolveSimulatedDelayMs(undefined, "0")).toBe(0);
  });

  it("prefers the explicit argument over env", () => {
    expect(resolveSimulatedDelayMs(5, "250")).toBe(5);
  });
});

describe("resolveDeployBaseUrl", () => {
  it("defaults to the local agents endpoint", () => {
    expect(resolveDeployBaseUrl(undefined)).toBe("http://127.0.0.1:8080/agents");
    expect(resolveDeployBaseUrl("   ")).toBe("http://127.0.0.1:8080/agents");
  });

  it("strips trailing slashes", () => {
    expect(resolveDeployBaseUrl("https://agents.example.test/v1//")).toBe(
      "https://agents.example.test/v1",
    );
  });
});

describe("runEtlJob", () => {
  it("echoes the payload", async () => {
    const result = await runEtlJob({ payload: { goal: "g", pipeline: "default" }, simulatedDelayMs: 0 });

    expect(result.status).toBe("success");
    expect(result.echo).toEqual({ goal: "g", pipeline: "default" });
    expect(String(result.jobId)).toMatch(/^etl_\d+$/);
    expect(typeof result.startTime).toBe("string");
    expect(typeof result.endTime).toBe("string");
  });

  it("reads the delay from env", async () => {
    const result = await runEtlJob({ payload: {} }, { CONDUCTOR_JOB_DELAY_MS: "0" });
    expect(result.status).toBe("success");
  });

  it("rejects a missing payload", async () => {
    await expect(runEtlJob({})).rejects.toThrow(
      "Invalid arguments for etl_run_job: payload: Required",
    );
  });
});

describe("submitTraining", () => {
  it("fills the default training config", () => {
    const result = submitTraining({ modelName: "ranker" });

    expect(result.status).toBe("submitted");
    expect(result.config).toEqual({ epochs: 10, batchSize: 32 });
    expect(result.estimatedDurationMinutes).toBe(30);
    expect(String(result.jobId)).toMatch(/^train_ranker_\d+$/);
  });

  it("requires a model name", () => {
    expect(() => submitTraining({ modelName: "" })).toThrow(
      "Invalid arguments for train_model: modelName: String must contain at least 1 character(s)",
    );
  });
});

describe("deployAgent", () => {
  it("builds the endpoint from the deployment id", () => {
    const result = deployAgent(
      { agentName: "bot", version: "v2" },
      { CONDUCTOR_DEPLOY_BASE_URL: "https://agents.example.test/" },
    );

    expect(result.status).toBe("deployed");
    expect(result.config).toEqual({});
    expect(String(result.deploymentId)).toMatch(/^deploy_bot_v2_\d+$/);
    expect(result.endpoint).toBe(`https://agents.example.test/${String(result.deploymentId)}`);
  });

  it("requires a version", () => {
    expect(() => deployAgent({ agentName: "bot" })).toThrow(
      "Invalid arguments for deploy_agent: version: Required",
    );
  });
});

describe("worker entry point", () => {
  it("knows exactly the pooled tools", () => {
    expect(isWorkerTool("etl_run_job")).toBe(true);
    expect(isWorkerTool("train_model")).toBe(true);
    expect(isWorkerTool("deploy_agent")).toBe(true);
    expect(isWorkerTool("runs_record_event")).toBe(false);
  });

  it("dispatches by tool name", async () => {
    const result = await runWorkerTask({ toolName: "train_model", parameters: { modelName: "m" } });
    expect(result.status).toBe("submitted");
  });

  it("rejects tools it does not host", async () => {
    await expect(runWorkerTask({ toolName: "nope", parameters: {} })).rejects.toThrow("Unknown tool: nope");
  });
});
