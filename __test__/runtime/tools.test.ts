import { afterEach, describe, expect, it } from "vitest";
import {
  SinkUnavailableError,
  ToolRegistry,
  UnknownToolError,
  createBuiltinTools,
} from "../../runtime/src/index.js";
import { MemoryEventSink } from "../helpers/fixtures.js";

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  afterEach(async () => {
    await registry.shutdown();
  });

  it("lists built-in tools with their dispatch mode", () => {
    registry = new ToolRegistry();
    for (const tool of createBuiltinTools({ eventSink: null, artifactSink: null })) {
      registry.register(tool);
    }

    expect(registry.list()).toEqual([
      {
        name: "runs_record_event",
        description: "Record a run lifecycle event in the event store",
        category: "telemetry",
        mode: "inline",
      },
      {
        name: "artifacts_write_text",
        description: "Write a text artifact to artifact storage",
        category: "storage",
        mode: "inline",
      },
      { name: "etl_run_job", description: "Run an ETL job with the given payload", category: "job", mode: "worker" },
      { name: "train_model", description: "Submit a model training job", category: "job", mode: "worker" },
      { name: "deploy_agent", description: "Deploy an agent at a given version", category: "job", mode: "worker" },
    ]);
  });

  it("rejects tools it cannot dispatch", () => {
    registry = new ToolRegistry();
    expect(() => registry.register({ name: "mystery", description: "no body" })).toThrow(
      "Tool mystery has no implementation and is not a worker tool",
    );
    expect(() => registry.register({ name: "  ", description: "blank", execute: async () => ({}) })).toThrow(
      "Tool name must not be empty",
    );
  });

  it("resolves unknown tools to an error result", () => {
    registry = new ToolRegistry();
    const resolved = registry.resolve("ghost");

    expect(resolved.ok).toBe(false);
    if (!resolved.ok) {
      expect(resolved.error).toBeInstanceOf(UnknownToolError);
      expect(resolved.error.toolName).toBe("ghost");
    }
  });

  it("throws from execute for unknown tools", async () => {
    registry = new ToolRegistry();
    await expect(registry.execute("ghost", {})).rejects.toThrow("Unknown tool: ghost");
  });

  it("starts the worker pool only when a worker tool is invoked", () => {
    registry = new ToolRegistry();
    for (const tool of createBuiltinTools({ eventSink: null, artifactSink: null })) {
      registry.register(tool);
    }

    const resolved = registry.resolve("etl_run_job");
    expect(resolved.ok && resolved.value.mode).toBe("worker");
    expect(registry.workerPoolStarted).toBe(false);
  });

  it("replaces a tool registered under the same name", async () => {
    registry = new ToolRegistry();
    registry.register({ name: "etl_run_job", description: "inline", execute: async () => ({ inline: true }) });

    expect(registry.list()[0]?.mode).toBe("inline");
    expect(await registry.execute("etl_run_job", {})).toEqual({ inline: true });
  });
});

describe("built-in inline tools", () => {
  it("records events through the event sink", async () => {
    const sink = new MemoryEventSink();
    const registry = new ToolRegistry();
    for (const tool of createBuiltinTools({ eventSink: sink, artifactSink: null })) {
      registry.register(tool);
    }

    const result = await registry.execute("runs_record_event", {
      eventType: "PLAN",
      details: { goal: "g" },
    });

    expect(result).toMatchObject({ status: "success", id: 1, eventType: "PLAN" });
    expect(sink.events[0]?.details).toEqual({ goal: "g" });
  });

  it("fails without a configured sink", async () => {
    const registry = new ToolRegistry();
    for (const tool of createBuiltinTools({ eventSink: null, artifactSink: null })) {
      registry.register(tool);
    }

    await expect(
      registry.execute("artifacts_write_text", { path: "a.txt", content: "x" }),
    ).rejects.toBeInstanceOf(SinkUnavailableError);
    await expect(registry.execute("runs_record_event", { eventType: "X" })).rejects.toThrow(
      "No event sink configured",
    );
  });

  it("validates arguments", async () => {
    const registry = new ToolRegistry();
    for (const tool of createBuiltinTools({ eventSink: new MemoryEventSink(), artifactSink: null })) {
      registry.register(tool);
    }

    await expect(registry.execute("runs_record_event", {})).rejects.toThrow(
      "Invalid arguments for runs_record_event: eventType: Required",
    );
    await expect(registry.execute("artifacts_write_text", { path: "a.txt" })).rejects.toThrow(
      "Invalid arguments for artifacts_write_text: content: Required",
    );
  });
});
