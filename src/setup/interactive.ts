import prompts from "prompts";
import chalk from "chalk";
import {
  Config,
  DEFAULT_CONFIG,
  saveConfig,
  getConfigPath,
  configExists,
  loadConfig,
} from "../config/index.js";
import { isUsableDateFormat } from "../tasks/dates.js";
import { initialize, InitResult } from "../tasks/store.js";

export async function runInteractiveSetup(): Promise<InitResult | null> {
  console.log(chalk.bold("\ntasklog setup\n"));

  const current: Config = configExists() ? loadConfig() : DEFAULT_CONFIG;
  let cancelled = false;

  const responses = await prompts(
    [
      {
        type: "text",
        name: "logPath",
        message: "Path of your markdown log (existing files are never rewritten outside task lines):",
        initial: current.logPath,
        validate: (value: string) => (value.trim() ? true : "Log path is required"),
      },
      {
        type: "text",
        name: "dateFormat",
        message: "Date format for section headers (date-fns tokens):",
        initial: current.dateFormat,
        validate: (value: string) =>
          isUsableDateFormat(value) ? true : "Use day, month and year tokens, e.g. dd/MM/yyyy",
      },
      {
        type: "number",
        name: "noteIndent",
        message: "Spaces before a note's dash:",
        initial: current.noteIndent,
        min: 1,
        max: 16,
      },
      {
        type: "number",
        name: "scanWindowLines",
        message: "How many trailing lines of the log to work on:",
        initial: current.scanWindowLines,
        min: 1,
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("Setup cancelled."));
    return null;
  }

  const config: Config = {
    ...current,
    logPath: String(responses.logPath).trim(),
    dateFormat: String(responses.dateFormat),
    noteIndent: Number(responses.noteIndent),
    scanWindowLines: Number(responses.scanWindowLines),
  };

  saveConfig(config);
  console.log(chalk.green(`✓ Saved ${getConfigPath()}`));

  const result = await initialize();
  console.log(chalk.green(`✓ Counter state at ${result.statePath}`));
  console.log(
    chalk.green(`✓ ${result.createdLog ? "Created" : "Using existing"} log ${result.logPath}`)
  );

  console.log(chalk.bold.green("\nSetup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Add a task:            ") + "tl add dev implement login flow");
  console.log(chalk.dim("  2. Browse interactively:  ") + "tl tui");
  console.log(chalk.dim("  3. Point your MCP client at: ") + "tl serve\n");

  return result;
}
