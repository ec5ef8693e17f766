import { classifyLine, LineKind } from "./classifier.js";
import {
  FreeformSpan,
  LineEnding,
  LogDocument,
  LogGrammar,
  RawLine,
  Section,
  Task,
} from "./types.js";

export function splitLines(content: string): RawLine[] {
  if (content === "") return [];

  const parts = content.split("\n");
  const lines: RawLine[] = [];
  parts.forEach((part, index) => {
    const isLast = index === parts.length - 1;
    if (isLast && part === "") return;

    let eol: LineEnding = isLast ? "" : "\n";
    let text = part;
    if (!isLast && text.endsWith("\r")) {
      text = text.slice(0, -1);
      eol = "\r\n";
    }
    lines.push({ text, eol });
  });
  return lines;
}

function detectNewline(lines: RawLine[]): "\n" | "\r\n" {
  const terminated = lines.find((line) => line.eol !== "");
  return terminated?.eol === "\r\n" ? "\r\n" : "\n";
}

function emptySection(): Section {
  return { date: null, header: null, entries: [] };
}

function appendFreeform(section: Section, line: RawLine): void {
  const last = section.entries[section.entries.length - 1];
  if (last?.kind === "freeform") {
    last.span.lines.push(line);
  } else {
    const span: FreeformSpan = { lines: [line] };
    section.entries.push({ kind: "freeform", span });
  }
}

/**
 * Builds the document model from the trailing `windowLines` lines of `content`.
 * Everything above the window is kept as an opaque string; lines inside the
 * window that are not headers, tasks or notes are kept as freeform spans in
 * the section they appear in. Task-shaped lines before the first in-window
 * header stay freeform, so a task whose header lies above the window is
 * invisible.
 */
export function buildDocument(
  content: string,
  grammar: LogGrammar,
  windowLines: number
): LogDocument {
  const lines = splitLines(content);
  const start = Math.max(0, lines.length - windowLines);
  const head = lines
    .slice(0, start)
    .map((line) => line.text + line.eol)
    .join("");

  const sections: Section[] = [];
  let current = emptySection();
  let currentTask: Task | null = null;
  let previous: LineKind | null = null;

  for (const line of lines.slice(start)) {
    const classified = classifyLine(line.text, previous, grammar);
    let kind: LineKind = classified.kind;

    switch (classified.kind) {
      case "section":
        if (current.header || current.entries.length > 0) {
          sections.push(current);
        }
        current = { date: classified.date, header: line, entries: [] };
        currentTask = null;
        break;

      case "task":
        if (!current.header) {
          // Lines above the first in-window header belong to no section.
          appendFreeform(current, line);
          currentTask = null;
          kind = "freeform";
          break;
        }
        currentTask = {
          tag: classified.tag,
          number: classified.number,
          title: classified.title,
          status: classified.status,
          notes: [],
          eol: line.eol,
        };
        current.entries.push({ kind: "task", task: currentTask });
        break;

      case "note":
        if (currentTask) {
          currentTask.notes.push({ text: classified.text, eol: line.eol });
        } else {
          appendFreeform(current, line);
          kind = "freeform";
        }
        break;

      case "freeform":
        appendFreeform(current, line);
        currentTask = null;
        break;
    }

    previous = kind;
  }

  if (current.header || current.entries.length > 0) {
    sections.push(current);
  }

  return { head, sections, newline: detectNewline(lines) };
}

export function renderTaskLine(task: Task): string {
  const mark = task.status === "done" ? "x" : " ";
  return `- [${mark}] ${task.tag}-${task.number} ${task.title}`;
}

export function renderNoteLine(text: string, grammar: LogGrammar): string {
  return `${" ".repeat(grammar.noteIndent)}- ${text}`;
}

export function renderHeader(date: string, grammar: LogGrammar): string {
  return `${"#".repeat(grammar.headingLevel)} ${date}`;
}

export function sectionLines(section: Section, grammar: LogGrammar): RawLine[] {
  const lines: RawLine[] = [];
  if (section.header) lines.push(section.header);

  for (const entry of section.entries) {
    if (entry.kind === "freeform") {
      lines.push(...entry.span.lines);
      continue;
    }
    const { task } = entry;
    lines.push({ text: renderTaskLine(task), eol: task.eol });
    for (const note of task.notes) {
      lines.push({ text: renderNoteLine(note.text, grammar), eol: note.eol });
    }
  }
  return lines;
}

/** Joins lines, terminating a formerly-final line once something follows it. */
export function joinLines(lines: RawLine[], newline: "\n" | "\r\n"): string {
  return lines
    .map((line, index) => {
      const eol = line.eol === "" && index < lines.length - 1 ? newline : line.eol;
      return line.text + eol;
    })
    .join("");
}

export function serializeDocument(doc: LogDocument, grammar: LogGrammar): string {
  const lines = doc.sections.flatMap((section) => sectionLines(section, grammar));
  return doc.head + joinLines(lines, doc.newline);
}

/** True when the window is non-empty and its last line has visible content. */
export function endsWithContent(doc: LogDocument): boolean {
  for (let s = doc.sections.length - 1; s >= 0; s--) {
    const section = doc.sections[s];
    const last = section.entries[section.entries.length - 1];
    if (last?.kind === "task") return true;
    if (last?.kind === "freeform") {
      const { lines } = last.span;
      return lines[lines.length - 1].text.trim() !== "";
    }
    if (section.header) return true;
  }
  return false;
}
