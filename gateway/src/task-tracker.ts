import { randomUUID } from "crypto";
import { errorMessage, type GoalExecution, type Logger } from "../../runtime/src/index.js";

export type TrackedTask =
  | { taskId: string; goal: string; status: "running"; acceptedAt: string }
  | {
      taskId: string;
      goal: string;
      status: "completed";
      acceptedAt: string;
      finishedAt: string;
      execution: GoalExecution;
    }
  | {
      taskId: string;
      goal: string;
      status: "failed";
      acceptedAt: string;
      finishedAt: string;
      error: string;
    };

export const DEFAULT_MAX_FINISHED_TASKS = 1000;

/**
 * Background goal executions started by `POST /execute` with `async: true`.
 * Running tasks are always kept; once more than `maxFinishedTasks` have
 * finished, the oldest finished ones are forgotten.
 */
export class TaskTracker {
  private readonly tasks = new Map<string, TrackedTask>();
  private readonly finished: string[] = [];
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
    private readonly maxFinishedTasks: number = DEFAULT_MAX_FINISHED_TASKS,
  ) {}

  start(goal: string, run: () => Promise<GoalExecution>): TrackedTask {
    const taskId = `task_${randomUUID()}`;
    const acceptedAt = this.now().toISOString();
    const task: TrackedTask = { taskId, goal, status: "running", acceptedAt };
    this.tasks.set(taskId, task);
    this.logger.info("Starting async task", { taskId, goal });

    const settle = run().then(
      (execution) => {
        this.tasks.set(taskId, {
          taskId,
          goal,
          status: "completed",
          acceptedAt,
          finishedAt: this.now().toISOString(),
          execution,
        });
        this.retire(taskId);
        this.logger.info("Async task completed", { taskId, status: execution.report.status });
      },
      (error: unknown) => {
        this.tasks.set(taskId, {
          taskId,
          goal,
          status: "failed",
          acceptedAt,
          finishedAt: this.now().toISOString(),
          error: errorMessage(error),
        });
        this.retire(taskId);
        this.logger.error("Async task failed", { taskId, error: errorMessage(error) });
      },
    );
    this.inFlight.add(settle);
    void settle.finally(() => this.inFlight.delete(settle));

    return task;
  }

  get size(): number {
    return this.tasks.size;
  }

  get(taskId: string): TrackedTask | undefined {
    return this.tasks.get(taskId);
  }

  /**
   * Wait for every background task started so far.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private retire(taskId: string): void {
    this.finished.push(taskId);
    while (this.finished.length > this.maxFinishedTasks) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.tasks.delete(evicted);
    }
  }
}
