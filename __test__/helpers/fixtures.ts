import { vi, type Mock } from "vitest";
import type {
  EventReceipt,
  EventSink,
  Logger,
  RecordedEvent,
  ToolDefinition,
} from "../../runtime/src/index.js";

export type LoggerMock = { [K in keyof Logger]: Mock };

export function createLoggerMock(): LoggerMock {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Event sink that keeps everything in an array. */
export class MemoryEventSink implements EventSink {
  readonly events: RecordedEvent[] = [];

  async record(eventType: string, details: Record<string, unknown>): Promise<EventReceipt> {
    const event: RecordedEvent = {
      id: this.events.length + 1,
      eventType,
      details,
      timestamp: new Date().toISOString(),
    };
    this.events.push(event);
    return { status: "success", id: event.id, timestamp: event.timestamp };
  }

  async recent(limit: number): Promise<RecordedEvent[]> {
    return this.events.slice(-limit).reverse();
  }

  close(): void {}
}

/** Event sink whose every write fails. */
export class BrokenEventSink implements EventSink {
  async record(): Promise<EventReceipt> {
    throw new Error("event store offline");
  }

  async recent(): Promise<RecordedEvent[]> {
    throw new Error("event store offline");
  }

  close(): void {}
}

/** Inline stand-in for the pooled ETL tool so runs stay on the test thread. */
export const inlineEtlTool: ToolDefinition = {
  name: "etl_run_job",
  description: "Inline ETL job",
  category: "job",
  execute: async (args) => ({ status: "success", jobId: "etl_test", echo: args.payload }),
};
