#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { loadConfig, getConfigPath, getLogPath, getStatePath } from "./config/index.js";
import { runServer } from "./index.js";
import { createActivityLogger } from "./logging.js";
import { runInteractiveSetup } from "./setup/interactive.js";
import { formatMatches } from "./tasks/format.js";
import { initialize, TaskLogStore } from "./tasks/store.js";
import { InteractiveSession } from "./tui/session.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

function openStore(): TaskLogStore {
  const config = loadConfig();
  return TaskLogStore.fromConfig(config, { log: createActivityLogger(config) });
}

function fail(error: unknown): never {
  console.error(chalk.red(`error: ${(error as Error).message}`));
  process.exit(1);
}

/** Wraps an action so every failure prints one red line and exits 1. */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      fail(error);
    }
  };
}

const program = new Command();

program
  .name("tl")
  .description("Trackable tasks inside a freeform markdown log")
  .version(packageJson.version);

program
  .command("init")
  .description("Create config, counter state and log file (an existing log is left as is)")
  .option("--log <path>", "Path to your markdown log (default: ~/.config/tasklog/log.md)")
  .option("-i, --interactive", "Ask for settings interactively")
  .action(
    run(async (options: { log?: string; interactive?: boolean }) => {
      if (options.interactive) {
        await runInteractiveSetup();
        return;
      }
      const result = await initialize(options.log);
      console.log(chalk.green(`initialized at ${result.baseDir}`));
      console.log(`log file: ${result.logPath}`);
    })
  );

program
  .command("add <tag> <title...>")
  .description("Add a task under today's section: tl add <tag> <title>")
  .action(
    run(async (tag: string, title: string[]) => {
      const id = await openStore().createTask(tag, title.join(" "));
      console.log(chalk.green(`created ${id}`));
    })
  );

program
  .command("done <id>")
  .description("Mark a task as done: tl done <id>")
  .action(
    run(async (id: string) => {
      await openStore().completeTask(id);
      console.log(chalk.green(`completed ${id}`));
    })
  );

program
  .command("note <id> <text...>")
  .description("Add a note to a task: tl note <id> <text>")
  .action(
    run(async (id: string, text: string[]) => {
      await openStore().addNote(id, text.join(" "));
      console.log(chalk.green(`noted on ${id}`));
    })
  );

program
  .command("search <query...>")
  .description("Search task titles and notes")
  .option("-t, --tag <tag>", "Only show tasks with this tag")
  .action(
    run(async (query: string[], options: { tag?: string }) => {
      const text = query.join(" ");
      const store = openStore();
      const matches = await store.searchTasks(text, options.tag);
      if (matches.length === 0) {
        console.log(chalk.yellow(`no tasks found matching "${text}"`));
        return;
      }
      console.log(formatMatches(matches, store.grammar.noteIndent));
    })
  );

program
  .command("today")
  .description("Show today's section")
  .action(
    run(async () => {
      const store = openStore();
      const section = await store.getTodaySection();
      if (section === "") {
        console.log(chalk.yellow(`No section for ${store.today()} yet.`));
        return;
      }
      console.log(section.trimEnd());
    })
  );

program
  .command("tui")
  .description("Open the interactive session")
  .action(
    run(async () => {
      await new InteractiveSession(openStore()).run();
    })
  );

program
  .command("serve")
  .description("Start the MCP server on stdio")
  .action(run(runServer));

program
  .command("config")
  .description("Show current configuration")
  .action(
    run(async () => {
      const config = loadConfig();
      console.log(chalk.bold("\nConfiguration:\n"));
      console.log(`Config file: ${getConfigPath()}`);
      console.log(`Log file: ${getLogPath(config)}`);
      console.log(`Counter state: ${getStatePath()}`);
      console.log(`Date format: ${config.dateFormat}`);
      console.log(`Note indent: ${config.noteIndent}`);
      console.log(`Scan window: ${config.scanWindowLines} lines`);
      console.log(`Lock timeout: ${config.lockTimeoutMs}ms`);
    })
  );

program.parseAsync().catch(fail);
