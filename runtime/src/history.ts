import type { OutcomeStatus, StepOutcome } from "./schema.js";

export type HistorySummary =
  | { status: "empty"; message: string }
  | {
      status: "ok";
      total: number;
      successful: number;
      failed: number;
      successRate: number;
      byStatus: Record<OutcomeStatus, number>;
      lastEntry: StepOutcome;
    };

/**
 * Append-only log of step outcomes for one orchestrator instance.
 * Entries are frozen on append and never removed or reordered.
 */
export class ExecutionHistory {
  private readonly log: StepOutcome[] = [];

  /**
   * Freezes the outcome's args and result in place, so the caller's copy and
   * the stored entry cannot drift apart.
   */
  append(outcome: StepOutcome): void {
    deepFreeze(outcome.args);
    deepFreeze(outcome.result);
    this.log.push(Object.freeze({ ...outcome }));
  }

  get size(): number {
    return this.log.length;
  }

  entries(): readonly StepOutcome[] {
    return [...this.log];
  }

  /**
   * Most recent entries, newest last.
   */
  recent(limit: number): readonly StepOutcome[] {
    if (limit <= 0) return [];
    return this.log.slice(-limit);
  }

  summarize(): HistorySummary {
    const total = this.log.length;
    const lastEntry = this.log[total - 1];
    if (total === 0 || lastEntry === undefined) {
      return { status: "empty", message: "No execution history" };
    }

    const byStatus: Record<OutcomeStatus, number> = {
      success: 0,
      failed: 0,
      timeout: 0,
      error: 0,
    };
    for (const entry of this.log) {
      byStatus[entry.status]++;
    }

    const successful = byStatus.success;
    return {
      status: "ok",
      total,
      successful,
      failed: total - successful,
      successRate: successful / total,
      byStatus,
      lastEntry,
    };
  }
}

function deepFreeze(value: unknown, seen: WeakSet<object> = new WeakSet()): void {
  if (value === null || typeof value !== "object" || seen.has(value)) return;
  // Typed arrays with elements cannot be frozen.
  if (ArrayBuffer.isView(value)) return;
  seen.add(value);
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child, seen);
  }
}
