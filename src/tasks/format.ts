import { TaskMatch } from "./types.js";

export function formatMatch(match: TaskMatch, noteIndent: number): string {
  const mark = match.status === "done" ? "x" : " ";
  const lines = [`[${mark}] ${match.id} ${match.title}`];
  for (const note of match.notes) {
    lines.push(`${" ".repeat(noteIndent)}- ${note}`);
  }
  return lines.join("\n");
}

export function formatMatches(matches: TaskMatch[], noteIndent: number): string {
  return matches.map((match) => formatMatch(match, noteIndent)).join("\n");
}
