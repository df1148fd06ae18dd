import chalk from "chalk";
import ora from "ora";
import { errorMessage } from "../../../runtime/src/index.js";
import { createCliOrchestrator } from "../utils/orchestrator.js";
import { formatPlan, formatReport, formatSummary } from "../utils/format.js";

export interface RunOptions {
  verbose?: boolean;
  dryRun?: boolean;
}

export async function runCommand(goal: string, options: RunOptions = {}) {
  console.log(chalk.cyan(`\n🚀 Goal: ${goal}\n`));

  const orchestrator = await createCliOrchestrator({ debug: options.verbose });
  const spinner = ora("Planning...").start();

  try {
    const plan = orchestrator.plan(goal);
    spinner.succeed(`Plan created with ${plan.steps.length} steps`);

    if (options.dryRun || options.verbose) {
      console.log();
      formatPlan(plan).forEach((line) => console.log(line));
      console.log();
    }
    if (options.dryRun) return;

    spinner.start("Executing plan...");
    const report = await orchestrator.run(plan);

    if (report.status === "failed-to-start") {
      spinner.fail("Plan rejected");
      formatReport(report).forEach((line) => console.log(line));
      process.exitCode = 1;
      return;
    }

    spinner.succeed(`Executed ${report.outcomes.length} steps in ${(report.durationMs / 1000).toFixed(2)}s`);
    console.log();
    formatReport(report).forEach((line) => console.log(line));

    console.log(chalk.bold("\n📊 Summary"));
    formatSummary(orchestrator.summarize()).forEach((line) => console.log(`  ${line}`));
    console.log();
  } catch (error) {
    spinner.fail("Execution failed");
    console.error(chalk.red("\nError:"), errorMessage(error));
    process.exitCode = 1;
  } finally {
    await orchestrator.shutdown();
  }
}
