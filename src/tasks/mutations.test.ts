import { describe, it, expect } from "vitest";
import { buildDocument, serializeDocument } from "./document.js";
import { DuplicateTaskIdError, InvalidInputError, TaskNotFoundError } from "./errors.js";
import {
  addNote,
  addTask,
  completeTask,
  findTask,
  searchTasks,
  todaySection,
  validateNoteText,
  validateTag,
  validateTitle,
} from "./mutations.js";
import { LogGrammar } from "./types.js";

const grammar: LogGrammar = { dateFormat: "dd/MM/yyyy", noteIndent: 6, headingLevel: 3 };
const TODAY = "19/10/2026";
const HEADER = "### 19/10/2026\n";

function apply(content: string, mutate: (doc: ReturnType<typeof buildDocument>) => void): string {
  const doc = buildDocument(content, grammar, 5000);
  mutate(doc);
  return serializeDocument(doc, grammar);
}

describe("addTask", () => {
  it("creates today's section in an empty log", () => {
    const result = apply("", (doc) =>
      addTask(doc, { tag: "dev", number: 1, title: "implement login flow", today: TODAY }, grammar)
    );

    expect(result).toBe("### 19/10/2026\n- [ ] dev-1 implement login flow\n");
  });

  it("appends a new section after older ones, separated by a blank line", () => {
    const result = apply("### 18/10/2026\n- [ ] dev-1 old", (doc) =>
      addTask(doc, { tag: "dev", number: 2, title: "new", today: TODAY }, grammar)
    );

    expect(result).toBe("### 18/10/2026\n- [ ] dev-1 old\n\n### 19/10/2026\n- [ ] dev-2 new\n");
  });

  it("does not add a second blank line when one is already there", () => {
    const result = apply("### 18/10/2026\n- [ ] dev-1 old\n\n", (doc) =>
      addTask(doc, { tag: "dev", number: 2, title: "new", today: TODAY }, grammar)
    );

    expect(result).toBe("### 18/10/2026\n- [ ] dev-1 old\n\n### 19/10/2026\n- [ ] dev-2 new\n");
  });

  it("inserts after the last task of today's section and its notes", () => {
    const content = "### 19/10/2026\n- [ ] dev-1 first\n      - n1\nSome prose.\n";
    const result = apply(content, (doc) =>
      addTask(doc, { tag: "dev", number: 2, title: "second", today: TODAY }, grammar)
    );

    expect(result).toBe(
      "### 19/10/2026\n- [ ] dev-1 first\n      - n1\n- [ ] dev-2 second\nSome prose.\n"
    );
  });

  it("places the first task of a section after its text but before trailing blank lines", () => {
    const content = "### 19/10/2026\nPlanning notes\n\n### 20/10/2026\n";
    const result = apply(content, (doc) =>
      addTask(doc, { tag: "ops", number: 1, title: "check alerts", today: TODAY }, grammar)
    );

    expect(result).toBe(
      "### 19/10/2026\nPlanning notes\n- [ ] ops-1 check alerts\n\n### 20/10/2026\n"
    );
  });

  it("keeps an existing header spelled at another level", () => {
    const result = apply("## 19/10/2026\n", (doc) =>
      addTask(doc, { tag: "dev", number: 1, title: "a", today: TODAY }, grammar)
    );

    expect(result).toBe("## 19/10/2026\n- [ ] dev-1 a\n");
  });

  it("uses the file's CRLF endings for new lines", () => {
    const result = apply("### 18/10/2026\r\n", (doc) =>
      addTask(doc, { tag: "dev", number: 1, title: "a", today: TODAY }, grammar)
    );

    expect(result).toBe("### 18/10/2026\r\n\r\n### 19/10/2026\r\n- [ ] dev-1 a\r\n");
  });
});

describe("completeTask", () => {
  it("flips an open task to done in place", () => {
    const content = "### 19/10/2026\nintro\n- [ ] dev-1 implement login flow\n      - n\noutro\n";
    const result = apply(content, (doc) => {
      expect(completeTask(doc, "dev-1")).toBe(true);
    });

    expect(result).toBe("### 19/10/2026\nintro\n- [x] dev-1 implement login flow\n      - n\noutro\n");
  });

  it("is idempotent", () => {
    const once = apply(`${HEADER}- [ ] dev-1 a\n`, (doc) => completeTask(doc, "dev-1"));
    const twice = apply(`${HEADER}- [ ] dev-1 a\n`, (doc) => {
      completeTask(doc, "dev-1");
      expect(completeTask(doc, "dev-1")).toBe(false);
    });

    expect(twice).toBe(once);
  });

  it("leaves an already-done task untouched", () => {
    const content = `${HEADER}- [x] dev-1 implement login flow\n`;
    const result = apply(content, (doc) => {
      expect(completeTask(doc, "dev-1", "19/10/2026 09:30AM")).toBe(false);
    });

    expect(result).toBe(content);
  });

  it("appends a completion stamp when given one", () => {
    const result = apply(`${HEADER}- [ ] dev-1 a\n`, (doc) =>
      completeTask(doc, "dev-1", "19/10/2026 09:30AM")
    );

    expect(result).toBe(`${HEADER}- [x] dev-1 a (19/10/2026 09:30AM)\n`);
  });

  it("fails for an unknown ID", () => {
    const doc = buildDocument(`${HEADER}- [ ] dev-1 a\n`, grammar, 5000);

    expect(() => completeTask(doc, "dev-2")).toThrow(TaskNotFoundError);
  });
});

describe("addNote", () => {
  it("puts the first note directly below the task", () => {
    const content = `${HEADER}- [ ] infra-1 rotate production credentials\nnext line\n`;
    const result = apply(content, (doc) => addNote(doc, "infra-1", "blocked on access request"));

    expect(result).toBe(
      `${HEADER}- [ ] infra-1 rotate production credentials\n      - blocked on access request\nnext line\n`
    );
  });

  it("appends after existing notes", () => {
    const content = `${HEADER}- [ ] dev-1 a\n      - first\n- [ ] dev-2 b\n`;
    const result = apply(content, (doc) => addNote(doc, "dev-1", "second"));

    expect(result).toBe(`${HEADER}- [ ] dev-1 a\n      - first\n      - second\n- [ ] dev-2 b\n`);
  });

  it("terminates an unterminated last line before appending", () => {
    const result = apply(`${HEADER}- [ ] dev-1 a`, (doc) => addNote(doc, "dev-1", "n"));

    expect(result).toBe(`${HEADER}- [ ] dev-1 a\n      - n\n`);
  });

  it("fails for an unknown ID", () => {
    const doc = buildDocument("", grammar, 5000);

    expect(() => addNote(doc, "dev-1", "n")).toThrow(TaskNotFoundError);
  });
});

describe("findTask", () => {
  it("refuses to pick between hand-made duplicates", () => {
    const doc = buildDocument(`${HEADER}- [ ] dev-1 older\n- [ ] dev-1 newer\n`, grammar, 5000);

    expect(() => findTask(doc, "dev-1")).toThrow(DuplicateTaskIdError);
    expect(() => completeTask(doc, "dev-1")).toThrow(
      "Task ID dev-1 appears 2 times in the log; fix the duplicate by hand first"
    );
    expect(() => addNote(doc, "dev-1", "n")).toThrow(DuplicateTaskIdError);
    expect(serializeDocument(doc, grammar)).toBe(`${HEADER}- [ ] dev-1 older\n- [ ] dev-1 newer\n`);
  });

  it("still reports both duplicates in search", () => {
    const doc = buildDocument(`${HEADER}- [ ] dev-1 older\n- [ ] dev-1 newer\n`, grammar, 5000);

    expect(searchTasks(doc, "er").map((match) => match.title)).toEqual(["older", "newer"]);
  });

  it("does not see task lines above the first header", () => {
    const doc = buildDocument(`- [ ] dev-1 loose\n${HEADER}- [ ] dev-2 kept\n`, grammar, 5000);

    expect(() => findTask(doc, "dev-1")).toThrow(TaskNotFoundError);
    expect(findTask(doc, "dev-2").title).toBe("kept");
  });
});

describe("searchTasks", () => {
  const content = [
    "### 18/10/2026",
    "- [x] infra-3 rotate production keys",
    "- [ ] dev-1 implement login flow",
    "      - Rotate the session secret too",
    "- [ ] dev-2 write docs",
    "rotate this freeform line is never a match",
    "### 19/10/2026",
    "- [ ] infra-4 Rotate staging keys",
    "",
  ].join("\n");
  const doc = buildDocument(content, grammar, 5000);

  it("finds done tasks by title", () => {
    const [first] = searchTasks(doc, "rotate");

    expect(first).toEqual({
      id: "infra-3",
      tag: "infra",
      number: 3,
      status: "done",
      title: "rotate production keys",
      snippet: "rotate production keys",
      date: "18/10/2026",
      notes: [],
    });
  });

  it("matches titles and notes case-insensitively, in file order", () => {
    const matches = searchTasks(doc, "ROTATE");

    expect(matches.map((match) => [match.id, match.snippet])).toEqual([
      ["infra-3", "rotate production keys"],
      ["dev-1", "Rotate the session secret too"],
      ["infra-4", "Rotate staging keys"],
    ]);
  });

  it("filters by tag", () => {
    expect(searchTasks(doc, "rotate", { tag: "infra" }).map((match) => match.id)).toEqual([
      "infra-3",
      "infra-4",
    ]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(searchTasks(doc, "kubernetes")).toEqual([]);
  });
});

describe("todaySection", () => {
  it("returns the section's text verbatim", () => {
    const content = "### 18/10/2026\n- [ ] a-1 x\n\n### 19/10/2026\nprose\n- [ ] a-2 y\n      - n\n";
    const doc = buildDocument(content, grammar, 5000);

    expect(todaySection(doc, TODAY, grammar)).toBe("### 19/10/2026\nprose\n- [ ] a-2 y\n      - n\n");
  });

  it("returns an empty string when today has no section", () => {
    const doc = buildDocument("### 18/10/2026\n", grammar, 5000);

    expect(todaySection(doc, TODAY, grammar)).toBe("");
  });
});

describe("freeform isolation", () => {
  it("leaves every line it does not own untouched across operations", () => {
    const content = [
      "Meeting notes: nothing to track",
      "- [ ]  dev-9 looks like a task but is not",
      "### 19/10/2026",
      "- [ ] dev-1 a",
      "> quoted text",
      "      - orphan bullet",
      "- [ ] dev-2 b",
      "",
      "trailing prose",
      "",
    ].join("\n");

    const result = apply(content, (doc) => {
      completeTask(doc, "dev-1");
      addNote(doc, "dev-2", "note");
      addTask(doc, { tag: "dev", number: 3, title: "c", today: TODAY }, grammar);
    });

    expect(result).toBe(
      [
        "Meeting notes: nothing to track",
        "- [ ]  dev-9 looks like a task but is not",
        "### 19/10/2026",
        "- [x] dev-1 a",
        "> quoted text",
        "      - orphan bullet",
        "- [ ] dev-2 b",
        "      - note",
        "- [ ] dev-3 c",
        "",
        "trailing prose",
        "",
      ].join("\n")
    );
  });
});

describe("input validation", () => {
  it("rejects empty or malformed tags", () => {
    expect(() => validateTag("")).toThrow(InvalidInputError);
    expect(() => validateTag("Dev")).toThrow(InvalidInputError);
    expect(() => validateTag("dev ops")).toThrow(InvalidInputError);
    expect(() => validateTag("dev")).not.toThrow();
  });

  it("rejects empty or multi-line titles and notes", () => {
    expect(() => validateTitle("")).toThrow("title cannot be empty");
    expect(() => validateTitle("   ")).toThrow("title cannot be empty");
    expect(() => validateTitle("a\nb")).toThrow("title must be a single line");
    expect(() => validateNoteText("")).toThrow("note text cannot be empty");
    expect(() => validateNoteText("a\r\nb")).toThrow("note text must be a single line");
  });
});
