import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import chalk from "chalk";
import prompts from "prompts";
import { DEFAULT_CONFIG } from "../config/index.js";
import { TaskLogStore } from "../tasks/store.js";
import { InteractiveSession } from "./session.js";

const HEADER = "### 18/10/2026\n";

describe("InteractiveSession", () => {
  let dir: string;
  let logPath: string;
  let store: TaskLogStore;
  let printed: string[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tasklog-session-"));
    logPath = join(dir, "log.md");
    const statePath = join(dir, "state.json");
    writeFileSync(logPath, "");
    writeFileSync(statePath, "{}\n");
    store = new TaskLogStore(
      { ...DEFAULT_CONFIG, logPath },
      { logPath, statePath },
      { now: () => new Date(2026, 9, 19, 9, 30) }
    );
    printed = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function runWith(answers: string[]): Promise<void> {
    prompts.inject(answers);
    await new InteractiveSession(store, { print: (line) => printed.push(line) }).run();
  }

  it("adds a task and shows today's section", async () => {
    await runWith(["add", "dev", "write docs", "today", "quit"]);

    expect(printed).toEqual([
      chalk.green("created dev-1"),
      "### 19/10/2026\n- [ ] dev-1 write docs",
    ]);
  });

  it("completes a picked task", async () => {
    writeFileSync(logPath, `${HEADER}- [ ] dev-1 a\n- [x] dev-2 b\n`);

    await runWith(["done", "dev-1", "quit"]);

    expect(readFileSync(logPath, "utf-8")).toBe(`${HEADER}- [x] dev-1 a\n- [x] dev-2 b\n`);
    expect(printed).toEqual([chalk.green("completed dev-1")]);
  });

  it("adds a note to a picked task", async () => {
    writeFileSync(logPath, `${HEADER}- [x] dev-1 a\n`);

    await runWith(["note", "dev-1", "follow up next week", "quit"]);

    expect(readFileSync(logPath, "utf-8")).toBe(`${HEADER}- [x] dev-1 a\n      - follow up next week\n`);
    expect(printed).toEqual([chalk.green("noted on dev-1")]);
  });

  it("browses tasks of one tag", async () => {
    writeFileSync(logPath, `${HEADER}- [ ] dev-1 a\n      - n\n- [ ] ops-1 b\n- [x] dev-2 c\n`);

    await runWith(["browse", "dev", "quit"]);

    expect(printed).toEqual(["[ ] dev-1 a\n      - n", "[x] dev-2 c"]);
  });

  it("prints search results and reports empty ones", async () => {
    writeFileSync(logPath, `${HEADER}- [ ] dev-1 Write docs\n`);

    await runWith(["search", "docs", "search", "tests", "quit"]);

    expect(printed).toEqual([
      "[ ] dev-1 Write docs",
      chalk.yellow('no tasks found matching "tests"'),
    ]);
  });

  it("explains when there is nothing to act on", async () => {
    await runWith(["done", "today", "quit"]);

    expect(printed).toEqual([
      chalk.yellow("No open tasks."),
      chalk.yellow("No section for 19/10/2026 yet."),
    ]);
  });

  it("shows failures and keeps going", async () => {
    await runWith(["add", "Dev", "x", "add", "dev", "y", "quit"]);

    expect(printed).toEqual([
      chalk.red('error: invalid tag "Dev": use lowercase letters, digits and hyphens'),
      chalk.green("created dev-1"),
    ]);
  });
});
