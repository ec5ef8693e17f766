import { isSectionDate } from "./dates.js";
import { LogGrammar, TaskStatus } from "./types.js";

export type LineKind = "section" | "task" | "note" | "freeform";

export type ClassifiedLine =
  | { kind: "section"; date: string }
  | { kind: "task"; status: TaskStatus; tag: string; number: number; title: string }
  | { kind: "note"; text: string }
  | { kind: "freeform" };

export const TAG_PATTERN = /^[a-z0-9-]+$/;

const HEADING_RE = /^#{1,6} (.+)$/;
// Numbers are capped at 15 digits and may not carry leading zeros so that
// regenerating the line reproduces it exactly.
const TASK_RE = /^- \[( |x)\] ([a-z0-9-]+)-([1-9][0-9]{0,14}) (.+)$/;

const noteRegexCache = new Map<number, RegExp>();

function noteRegex(indent: number): RegExp {
  let re = noteRegexCache.get(indent);
  if (!re) {
    re = new RegExp(`^ {${indent}}- (.*)$`);
    noteRegexCache.set(indent, re);
  }
  return re;
}

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

/**
 * Classifies one line (without its terminator). `previous` is the kind of the
 * line directly above; note lines only count when it is a task or a note.
 */
export function classifyLine(
  line: string,
  previous: LineKind | null,
  grammar: LogGrammar
): ClassifiedLine {
  const heading = HEADING_RE.exec(line);
  if (heading && isSectionDate(heading[1], grammar.dateFormat)) {
    return { kind: "section", date: heading[1] };
  }

  const task = TASK_RE.exec(line);
  if (task) {
    return {
      kind: "task",
      status: task[1] === "x" ? "done" : "open",
      tag: task[2],
      number: Number(task[3]),
      title: task[4],
    };
  }

  if (previous === "task" || previous === "note") {
    const note = noteRegex(grammar.noteIndent).exec(line);
    if (note) {
      return { kind: "note", text: note[1] };
    }
  }

  return { kind: "freeform" };
}
