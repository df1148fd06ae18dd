import chalk from "chalk";
import ora from "ora";
import { errorMessage, type Orchestrator } from "../../../runtime/src/index.js";
import { createCliOrchestrator } from "../utils/orchestrator.js";

interface ConnectionCheck {
  label: string;
  run: (orchestrator: Orchestrator) => Promise<string>;
}

const CHECKS: ConnectionCheck[] = [
  {
    label: "Event sink",
    run: async (orchestrator) => {
      const health = await orchestrator.checkHealth();
      if (health.eventSink !== "healthy") {
        throw new Error(`event sink is ${health.eventSink}`);
      }
      return "HEALTH_CHECK recorded";
    },
  },
  {
    label: "Artifact sink",
    run: async (orchestrator) => {
      const outcome = await orchestrator.executeTool("artifacts_write_text", {
        path: "test/connection.txt",
        content: "Connection test successful",
      });
      if (outcome.status !== "success") throw new Error(outcome.error ?? outcome.status);
      return "test/connection.txt written";
    },
  },
  {
    label: "ETL runner",
    run: async (orchestrator) => {
      const outcome = await orchestrator.executeTool(
        "etl_run_job",
        { payload: { test: "connectivity" }, simulatedDelayMs: 0 },
        { timeoutSeconds: 30 },
      );
      if (outcome.status !== "success") throw new Error(outcome.error ?? outcome.status);
      return "job completed";
    },
  },
];

export async function checkCommand() {
  console.log(chalk.cyan("\n🔍 Testing connections...\n"));

  const orchestrator = await createCliOrchestrator();
  let failures = 0;

  try {
    for (const check of CHECKS) {
      const spinner = ora(check.label).start();
      try {
        const detail = await check.run(orchestrator);
        spinner.succeed(`${check.label}: ${chalk.gray(detail)}`);
      } catch (error) {
        failures++;
        spinner.fail(`${check.label}: ${chalk.red(errorMessage(error))}`);
      }
    }
  } finally {
    await orchestrator.shutdown();
  }

  console.log();
  if (failures > 0) {
    console.log(chalk.yellow(`⚠️  ${failures} of ${CHECKS.length} checks failed\n`));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green("✅ All connections working\n"));
}
