import type { ArtifactSink } from "./artifact-sink.js";
import { SinkUnavailableError } from "./errors.js";
import type { EventSink } from "./event-sink.js";
import {
  deployAgentArgsSchema,
  etlJobArgsSchema,
  parseToolArgs,
  recordEventArgsSchema,
  trainModelArgsSchema,
  writeTextArgsSchema,
} from "./tool-args.js";
import type { ToolDefinition } from "./tools.js";

export interface BuiltinToolDeps {
  eventSink: EventSink | null;
  artifactSink: ArtifactSink | null;
}

export function createBuiltinTools(deps: BuiltinToolDeps): ToolDefinition[] {
  return [
    {
      name: "runs_record_event",
      argsSchema: recordEventArgsSchema,
      description: "Record a run lifecycle event in the event store",
      category: "telemetry",
      keywords: ["event", "record", "log", "run"],
      execute: async (params) => {
        const args = parseToolArgs("runs_record_event", recordEventArgsSchema, params);
        if (!deps.eventSink) {
          throw new SinkUnavailableError("event", "No event sink configured");
        }
        const receipt = await deps.eventSink.record(args.eventType, args.details);
        return { ...receipt, eventType: args.eventType };
      },
    },
    {
      name: "artifacts_write_text",
      argsSchema: writeTextArgsSchema,
      description: "Write a text artifact to artifact storage",
      category: "storage",
      keywords: ["artifact", "write", "file", "save", "store"],
      execute: async (params) => {
        const args = parseToolArgs("artifacts_write_text", writeTextArgsSchema, params);
        if (!deps.artifactSink) {
          throw new SinkUnavailableError("artifact", "No artifact sink configured");
        }
        const receipt = await deps.artifactSink.writeText(args.path, args.content);
        return { ...receipt, path: args.path };
      },
    },
    // Worker-pool tools: no inline `execute`, dispatched by name to worker.ts.
    {
      name: "etl_run_job",
      argsSchema: etlJobArgsSchema,
      description: "Run an ETL job with the given payload",
      category: "job",
      keywords: ["etl", "pipeline", "data", "job"],
    },
    {
      name: "train_model",
      argsSchema: trainModelArgsSchema,
      description: "Submit a model training job",
      category: "job",
      keywords: ["train", "model", "training"],
    },
    {
      name: "deploy_agent",
      argsSchema: deployAgentArgsSchema,
      description: "Deploy an agent at a given version",
      category: "job",
      keywords: ["deploy", "agent", "release"],
    },
  ];
}
