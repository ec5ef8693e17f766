import { z } from "zod";

export const InitLogSchema = z.object({
  logPath: z
    .string()
    .optional()
    .describe("Path of an existing or new markdown log (defaults to the configured one)"),
});

export const CreateTaskSchema = z.object({
  tag: z.string().describe('Task tag (lowercase letters, digits, hyphens, e.g. "infra")'),
  title: z.string().describe("Task title (single line)"),
});

export const CompleteTaskSchema = z.object({
  id: z.string().describe('Task ID (e.g. "infra-12")'),
});

export const AddNoteSchema = z.object({
  id: z.string().describe('Task ID (e.g. "infra-12")'),
  text: z.string().describe("Note text (single line)"),
});

export const SearchTasksSchema = z.object({
  query: z.string().describe("Case-insensitive text to find in task titles and notes"),
  tag: z.string().optional().describe("Only return tasks with this tag"),
});

export const GetTodaySectionSchema = z.object({});

export type InitLogInput = z.infer<typeof InitLogSchema>;
export type CreateTaskInput = z.infer<typeof CreateTaskSchema>;
export type CompleteTaskInput = z.infer<typeof CompleteTaskSchema>;
export type AddNoteInput = z.infer<typeof AddNoteSchema>;
export type SearchTasksInput = z.infer<typeof SearchTasksSchema>;
