import chalk from "chalk";
import { createCliOrchestrator } from "../utils/orchestrator.js";

export async function eventsCommand(options: { limit?: string }) {
  const limit = Number.parseInt(options.limit ?? "10", 10);
  if (!Number.isInteger(limit) || limit < 1) {
    console.error(chalk.red("Error:"), "--limit must be a positive integer");
    process.exitCode = 1;
    return;
  }

  const orchestrator = await createCliOrchestrator();
  try {
    const events = await orchestrator.recentEvents(limit);
    if (events.length === 0) {
      console.log(chalk.gray("\nNo events recorded yet.\n"));
      return;
    }
    console.log(chalk.bold(`\n📜 Last ${events.length} events\n`));
    for (const event of events) {
      console.log(
        `  ${chalk.gray(event.timestamp)} ${chalk.cyan(event.eventType)} ${JSON.stringify(event.details)}`,
      );
    }
    console.log();
  } finally {
    await orchestrator.shutdown();
  }
}
