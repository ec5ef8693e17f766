export type TaskStatus = "open" | "done";

/** Line terminator as found in the file; "" only for a final unterminated line. */
export type LineEnding = "\n" | "\r\n" | "";

export interface RawLine {
  text: string;
  eol: LineEnding;
}

export interface Note {
  text: string;
  eol: LineEnding;
}

export interface Task {
  tag: string;
  number: number;
  title: string;
  status: TaskStatus;
  notes: Note[];
  eol: LineEnding;
}

/** Lines inside a section that the engine does not own, kept in place between tasks. */
export interface FreeformSpan {
  lines: RawLine[];
}

export type SectionEntry =
  | { kind: "task"; task: Task }
  | { kind: "freeform"; span: FreeformSpan };

export interface Section {
  date: string | null; // null for the freeform lines above the first header in the window
  header: RawLine | null;
  entries: SectionEntry[];
}

export interface LogDocument {
  head: string; // verbatim bytes above the scan window
  sections: Section[];
  newline: "\n" | "\r\n";
}

/** Formatting rules shared by the classifier, builder and serializer. */
export interface LogGrammar {
  dateFormat: string;
  noteIndent: number;
  headingLevel: number;
}

export interface TaskMatch {
  id: string;
  tag: string;
  number: number;
  status: TaskStatus;
  title: string;
  snippet: string;
  date: string | null;
  notes: string[];
}

export interface CounterState {
  [tag: string]: number;
}

export function taskId(task: Pick<Task, "tag" | "number">): string {
  return `${task.tag}-${task.number}`;
}

export function sectionTasks(section: Section): Task[] {
  const tasks: Task[] = [];
  for (const entry of section.entries) {
    if (entry.kind === "task") tasks.push(entry.task);
  }
  return tasks;
}

export function documentTasks(doc: LogDocument): Task[] {
  return doc.sections.flatMap(sectionTasks);
}
