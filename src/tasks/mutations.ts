import { isValidTag } from "./classifier.js";
import { endsWithContent, joinLines, renderHeader, sectionLines } from "./document.js";
import { DuplicateTaskIdError, InvalidInputError, TaskNotFoundError } from "./errors.js";
import {
  LogDocument,
  LogGrammar,
  Section,
  SectionEntry,
  Task,
  TaskMatch,
  taskId,
} from "./types.js";

const LINE_BREAK_RE = /[\r\n\u2028\u2029]/;

function requireSingleLine(value: string, field: string): void {
  if (value.trim() === "") {
    throw new InvalidInputError(`${field} cannot be empty`);
  }
  if (LINE_BREAK_RE.test(value)) {
    throw new InvalidInputError(`${field} must be a single line`);
  }
}

export function validateTag(tag: string): void {
  if (tag === "") {
    throw new InvalidInputError("tag cannot be empty");
  }
  if (!isValidTag(tag)) {
    throw new InvalidInputError(
      `invalid tag "${tag}": use lowercase letters, digits and hyphens`
    );
  }
}

export function validateTitle(title: string): void {
  requireSingleLine(title, "title");
}

export function validateNoteText(text: string): void {
  requireSingleLine(text, "note text");
}

/** Finds a task inside the window. An ID typed twice by hand is an error, not a guess. */
export function findTask(doc: LogDocument, id: string): Task {
  const found: Task[] = [];
  for (const section of doc.sections) {
    for (const entry of section.entries) {
      if (entry.kind === "task" && taskId(entry.task) === id) {
        found.push(entry.task);
      }
    }
  }
  if (found.length === 0) {
    throw new TaskNotFoundError(id);
  }
  if (found.length > 1) {
    throw new DuplicateTaskIdError(id, found.length);
  }
  return found[0];
}

function findSection(doc: LogDocument, date: string): Section | null {
  for (let i = doc.sections.length - 1; i >= 0; i--) {
    if (doc.sections[i].date === date) return doc.sections[i];
  }
  return null;
}

function insertIntoSection(section: Section, entry: SectionEntry): void {
  let lastTask = -1;
  section.entries.forEach((candidate, index) => {
    if (candidate.kind === "task") lastTask = index;
  });
  if (lastTask >= 0) {
    section.entries.splice(lastTask + 1, 0, entry);
    return;
  }

  // No tasks yet: place the entry after the section's text, ahead of any
  // blank lines that separate it from the next section.
  const span = section.entries.find((candidate) => candidate.kind === "freeform");
  if (!span || span.kind !== "freeform") {
    section.entries.push(entry);
    return;
  }
  const lines = span.span.lines;
  let split = lines.length;
  while (split > 0 && lines[split - 1].text.trim() === "") split--;

  const rebuilt: SectionEntry[] = [];
  if (split > 0) rebuilt.push({ kind: "freeform", span: { lines: lines.slice(0, split) } });
  rebuilt.push(entry);
  if (split < lines.length) rebuilt.push({ kind: "freeform", span: { lines: lines.slice(split) } });
  section.entries = rebuilt;
}

export interface NewTask {
  tag: string;
  number: number;
  title: string;
  today: string;
}

/**
 * Appends an open task to the last section dated `today`, creating that
 * section at the end of the document when the window has none.
 */
export function addTask(doc: LogDocument, input: NewTask, grammar: LogGrammar): Task {
  const task: Task = {
    tag: input.tag,
    number: input.number,
    title: input.title,
    status: "open",
    notes: [],
    eol: doc.newline,
  };
  const entry: SectionEntry = { kind: "task", task };

  const existing = findSection(doc, input.today);
  if (existing) {
    insertIntoSection(existing, entry);
    return task;
  }

  const previous = doc.sections[doc.sections.length - 1];
  if (previous && endsWithContent(doc)) {
    previous.entries.push({
      kind: "freeform",
      span: { lines: [{ text: "", eol: doc.newline }] },
    });
  }
  doc.sections.push({
    date: input.today,
    header: { text: renderHeader(input.today, grammar), eol: doc.newline },
    entries: [entry],
  });
  return task;
}

/** Marks a task done. Returns false when it already was. */
export function completeTask(doc: LogDocument, id: string, stamp?: string): boolean {
  const task = findTask(doc, id);
  if (task.status === "done") {
    return false;
  }
  task.status = "done";
  if (stamp) {
    task.title = `${task.title} (${stamp})`;
  }
  return true;
}

export function addNote(doc: LogDocument, id: string, text: string): Task {
  const task = findTask(doc, id);
  task.notes.push({ text, eol: doc.newline });
  return task;
}

export interface SearchOptions {
  tag?: string;
}

export function searchTasks(
  doc: LogDocument,
  query: string,
  options: SearchOptions = {}
): TaskMatch[] {
  const needle = query.toLowerCase();
  const matches: TaskMatch[] = [];

  for (const section of doc.sections) {
    for (const entry of section.entries) {
      if (entry.kind !== "task") continue;
      const { task } = entry;
      if (options.tag && task.tag !== options.tag) continue;

      const noteTexts = task.notes.map((note) => note.text);
      let snippet: string | undefined;
      if (task.title.toLowerCase().includes(needle)) {
        snippet = task.title;
      } else {
        snippet = noteTexts.find((text) => text.toLowerCase().includes(needle));
      }
      if (snippet === undefined) continue;

      matches.push({
        id: taskId(task),
        tag: task.tag,
        number: task.number,
        status: task.status,
        title: task.title,
        snippet,
        date: section.date,
        notes: noteTexts,
      });
    }
  }

  return matches;
}

/** Verbatim text of the last section headed `today`, or "" when there is none. */
export function todaySection(doc: LogDocument, today: string, grammar: LogGrammar): string {
  const section = findSection(doc, today);
  if (!section) return "";
  return joinLines(sectionLines(section, grammar), doc.newline);
}
