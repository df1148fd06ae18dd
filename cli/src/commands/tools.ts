import chalk from "chalk";
import { createCliOrchestrator } from "../utils/orchestrator.js";

export async function toolsCommand() {
  const orchestrator = await createCliOrchestrator();
  try {
    const tools = orchestrator.listTools();
    console.log(chalk.bold(`\n🔧 Registered tools (${tools.length})\n`));
    for (const tool of tools) {
      console.log(`  ${chalk.cyan(tool.name)} ${chalk.gray(`[${tool.category}, ${tool.mode}]`)}`);
      console.log(`    ${tool.description}`);
    }
    console.log();
  } finally {
    await orchestrator.shutdown();
  }
}
