import { errorMessage } from "./errors.js";
import type { EventReceipt, EventSink } from "./event-sink.js";
import type { Logger } from "./logger.js";
import { err, ok, type Result } from "./result.js";

/**
 * Fire-and-forget lifecycle events. Sink failures are logged and never reach
 * the caller; `flush()` waits for whatever is still in flight.
 */
export class TelemetryRecorder {
  private readonly pending = new Set<Promise<Result<EventReceipt>>>();

  constructor(
    private readonly sink: EventSink | null,
    private readonly logger: Logger,
  ) {}

  emit(eventType: string, details: Record<string, unknown>): void {
    if (!this.sink) return;

    const task = this.record(this.sink, eventType, details);
    this.pending.add(task);
    void task.then(() => this.pending.delete(task));
  }

  /**
   * Record and wait. Still never throws: the outcome comes back as a Result.
   */
  async emitAndWait(
    eventType: string,
    details: Record<string, unknown>,
  ): Promise<Result<EventReceipt>> {
    if (!this.sink) return err(new Error("No event sink configured"));
    return await this.record(this.sink, eventType, details);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  private async record(
    sink: EventSink,
    eventType: string,
    details: Record<string, unknown>,
  ): Promise<Result<EventReceipt>> {
    try {
      return ok(await sink.record(eventType, details));
    } catch (error) {
      this.logger.warn("Failed to record event", {
        eventType,
        error: errorMessage(error),
      });
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
