import chalk from "chalk";
import type {
  HistorySummary,
  OutcomeStatus,
  Plan,
  RunReport,
} from "../../../runtime/src/index.js";

const MAX_ARGS_CHARS = 50;

const STATUS_ICONS: Record<OutcomeStatus, string> = {
  success: chalk.green("✓"),
  failed: chalk.red("✗"),
  timeout: chalk.yellow("⏱"),
  error: chalk.red("!"),
};

export function truncate(text: string, max = MAX_ARGS_CHARS): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * One line per step: position, tool, dependencies and abbreviated args.
 */
export function formatPlan(plan: Plan): string[] {
  const lines = [
    chalk.bold(`Execution plan (${plan.metadata.workflow ?? "custom"} workflow)`),
  ];
  plan.steps.forEach((step, index) => {
    const deps = step.dependsOn.length > 0 ? ` ← [${step.dependsOn.join(", ")}]` : "";
    lines.push(
      `  ${String(index).padStart(2)}. ${chalk.cyan(step.tool)}${chalk.dim(deps)} ${chalk.green(truncate(JSON.stringify(step.args)))}`,
    );
  });
  return lines;
}

export function formatReport(report: RunReport): string[] {
  if (report.status === "failed-to-start") {
    return [
      chalk.red("Plan rejected before execution:"),
      ...report.issues.map((issue) => `  step ${issue.stepIndex}: ${issue.error.message}`),
    ];
  }

  return report.outcomes.map((entry) => {
    const { outcome } = entry;
    const detail = outcome.status === "success" ? "" : ` ${chalk.dim(outcome.error ?? "")}`;
    return `  ${STATUS_ICONS[outcome.status]} ${entry.tool}: ${outcome.status}${detail}`;
  });
}

export function formatSummary(summary: HistorySummary): string[] {
  if (summary.status === "empty") {
    return [summary.message];
  }
  return [
    `Total: ${summary.total}`,
    `Successful: ${summary.successful}`,
    `Failed: ${summary.failed}`,
    `Success rate: ${(summary.successRate * 100).toFixed(1)}%`,
  ];
}
