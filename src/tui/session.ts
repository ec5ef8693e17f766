import prompts from "prompts";
import chalk from "chalk";
import { formatMatch } from "../tasks/format.js";
import { TaskLogStore } from "../tasks/store.js";
import { TaskMatch } from "../tasks/types.js";

export type SessionAction = "browse" | "add" | "done" | "note" | "search" | "today" | "quit";

export interface SessionOutput {
  print(line: string): void;
}

interface Choice<T> {
  title: string;
  value: T;
}

const consoleOutput: SessionOutput = {
  print: (line) => console.log(line),
};

const MENU: Choice<SessionAction>[] = [
  { title: "Browse tasks by tag", value: "browse" },
  { title: "Add task", value: "add" },
  { title: "Complete task", value: "done" },
  { title: "Add note", value: "note" },
  { title: "Search", value: "search" },
  { title: "Show today", value: "today" },
  { title: "Quit", value: "quit" },
];

async function askChoice<T>(message: string, choices: Choice<T>[]): Promise<T | null> {
  const response = await prompts({ type: "select", name: "value", message, choices });
  const picked = choices.find((choice) => choice.value === response.value);
  return picked ? picked.value : null;
}

async function askText(message: string): Promise<string | null> {
  const response = await prompts({ type: "text", name: "value", message });
  return typeof response.value === "string" ? response.value : null;
}

function taskChoices(matches: TaskMatch[]): Choice<string>[] {
  return matches.map((match) => ({
    title: `${match.status === "done" ? "[x]" : "[ ]"} ${match.id} ${match.title}`,
    value: match.id,
  }));
}

/**
 * Menu-driven session over the store. Every iteration reads the log again,
 * so edits made meanwhile by other processes show up on the next step.
 * Failures become the status line and the loop carries on.
 */
export class InteractiveSession {
  private store: TaskLogStore;
  private output: SessionOutput;
  private status = "";

  constructor(store: TaskLogStore, output: SessionOutput = consoleOutput) {
    this.store = store;
    this.output = output;
  }

  async run(): Promise<void> {
    for (;;) {
      if (this.status) {
        this.output.print(this.status);
        this.status = "";
      }

      const action = await askChoice("tasklog", MENU);
      if (action === null || action === "quit") {
        return;
      }

      try {
        await this.perform(action);
      } catch (error) {
        this.status = chalk.red(`error: ${(error as Error).message}`);
      }
    }
  }

  private async perform(action: Exclude<SessionAction, "quit">): Promise<void> {
    switch (action) {
      case "browse":
        return this.browse();
      case "add":
        return this.add();
      case "done":
        return this.complete();
      case "note":
        return this.note();
      case "search":
        return this.search();
      case "today":
        return this.today();
    }
  }

  private async browse(): Promise<void> {
    const tasks = await this.store.searchTasks("");
    const tags = [...new Set(tasks.map((task) => task.tag))].sort();
    if (tags.length === 0) {
      this.status = chalk.yellow("No tasks yet.");
      return;
    }

    const tag = await askChoice(
      "Tag",
      tags.map((value) => ({ title: value, value }))
    );
    if (tag === null) return;

    for (const task of tasks.filter((candidate) => candidate.tag === tag)) {
      this.output.print(formatMatch(task, this.store.grammar.noteIndent));
    }
  }

  private async add(): Promise<void> {
    const tag = await askText("Tag");
    if (tag === null) return;
    const title = await askText("Title");
    if (title === null) return;

    const id = await this.store.createTask(tag.trim(), title);
    this.status = chalk.green(`created ${id}`);
  }

  private async complete(): Promise<void> {
    const open = (await this.store.searchTasks("")).filter((task) => task.status === "open");
    if (open.length === 0) {
      this.status = chalk.yellow("No open tasks.");
      return;
    }

    const id = await askChoice("Complete which task?", taskChoices(open));
    if (id === null) return;

    await this.store.completeTask(id);
    this.status = chalk.green(`completed ${id}`);
  }

  private async note(): Promise<void> {
    const tasks = await this.store.searchTasks("");
    if (tasks.length === 0) {
      this.status = chalk.yellow("No tasks yet.");
      return;
    }

    const id = await askChoice("Note on which task?", taskChoices(tasks));
    if (id === null) return;
    const text = await askText("Note");
    if (text === null) return;

    await this.store.addNote(id, text);
    this.status = chalk.green(`noted on ${id}`);
  }

  private async search(): Promise<void> {
    const query = await askText("Search");
    if (query === null) return;

    const matches = await this.store.searchTasks(query);
    if (matches.length === 0) {
      this.status = chalk.yellow(`no tasks found matching "${query}"`);
      return;
    }
    for (const match of matches) {
      this.output.print(formatMatch(match, this.store.grammar.noteIndent));
    }
  }

  private async today(): Promise<void> {
    const section = await this.store.getTodaySection();
    if (section === "") {
      this.status = chalk.yellow(`No section for ${this.store.today()} yet.`);
      return;
    }
    this.output.print(section.trimEnd());
  }
}
