#!/usr/bin/env node
import { program } from "commander";
import chalk from "chalk";
import { VERSION } from "../../runtime/src/index.js";
import { runCommand } from "./commands/run.js";

program
  .name("conductor")
  .description(chalk.cyan("🎼 Conductor goal orchestration CLI"))
  .version(VERSION);

program
  .command("run <goal>")
  .description("Plan and execute a goal")
  .option("-v, --verbose", "Show the plan and debug logs")
  .option("--dry-run", "Print the plan without executing it")
  .action(runCommand);

program
  .command("check")
  .description("Test event sink, artifact sink and ETL runner connectivity")
  .action(async () => {
    const { checkCommand } = await import("./commands/check.js");
    return checkCommand();
  });

program
  .command("tools")
  .description("List registered tools")
  .action(async () => {
    const { toolsCommand } = await import("./commands/tools.js");
    return toolsCommand();
  });

program
  .command("events")
  .description("Show recently recorded events")
  .option("-n, --limit <count>", "Number of events to show (default: 10)")
  .action(async (options: { limit?: string }) => {
    const { eventsCommand } = await import("./commands/events.js");
    return eventsCommand(options);
  });

await program.parseAsync();
