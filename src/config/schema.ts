import { z } from "zod";
import { isUsableDateFormat } from "../tasks/dates.js";

export const ConfigSchema = z.object({
  logPath: z.string().min(1).default("~/.config/tasklog/log.md"),
  dateFormat: z
    .string()
    .default("dd/MM/yyyy")
    .refine(isUsableDateFormat, {
      message: "dateFormat must be a date-fns pattern naming day, month and year (e.g. dd/MM/yyyy)",
    }),
  noteIndent: z.number().int().min(1).max(16).default(6),
  scanWindowLines: z.number().int().min(1).default(5000),
  headingLevel: z.number().int().min(1).max(6).default(3), // for headers the tool creates
  lockTimeoutMs: z.number().int().min(0).max(600_000).default(5000),
  stampCompletions: z.boolean().default(false),
  stampNotes: z.boolean().default(false),
  activityLog: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
