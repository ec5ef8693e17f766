import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import { formatMatches } from "../tasks/format.js";
import { InitResult, TaskLogStore } from "../tasks/store.js";
import {
  AddNoteSchema,
  CompleteTaskSchema,
  CreateTaskSchema,
  GetTodaySectionSchema,
  InitLogSchema,
  SearchTasksSchema,
} from "./definitions.js";

export interface ToolContext {
  /** Loads config afresh, so a log initialized mid-session is picked up. */
  openStore(): TaskLogStore;
  initialize(logPath?: string): Promise<InitResult>;
}

export const TOOLS: Tool[] = [
  {
    name: "init_log",
    description:
      "Initialize the task log environment. Creates config, counter state and log files if missing; never modifies an existing log.",
    inputSchema: {
      type: "object",
      properties: {
        logPath: {
          type: "string",
          description: "Path of an existing or new markdown log (defaults to the configured one)",
        },
      },
    },
  },
  {
    name: "create_task",
    description:
      "Create a new open task under today's section of the log. Returns the assigned task ID (tag-number).",
    inputSchema: {
      type: "object",
      properties: {
        tag: {
          type: "string",
          description: 'Task tag (lowercase letters, digits, hyphens, e.g. "infra")',
        },
        title: { type: "string", description: "Task title (single line)" },
      },
      required: ["tag", "title"],
    },
  },
  {
    name: "complete_task",
    description: "Mark a task as done by its ID (e.g. 'infra-12'). Completing a done task is a no-op.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: 'Task ID (e.g. "infra-12")' },
      },
      required: ["id"],
    },
  },
  {
    name: "add_note",
    description: "Append a note under an existing task, after its earlier notes.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: 'Task ID (e.g. "infra-12")' },
        text: { type: "string", description: "Note text (single line)" },
      },
      required: ["id", "text"],
    },
  },
  {
    name: "search_tasks",
    description:
      "Search task titles and notes (case-insensitive) in the recent part of the log. Optionally filter by tag.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Text to search for" },
        tag: { type: "string", description: "Only return tasks with this tag" },
      },
      required: ["query"],
    },
  },
  {
    name: "get_today_section",
    description: "Get the raw markdown of today's section of the log.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}

export async function handleToolCall(
  context: ToolContext,
  name: string,
  args: unknown
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "init_log": {
        const input = InitLogSchema.parse(args ?? {});
        const result = await context.initialize(input.logPath);
        return text(`Task log initialized. Log file: ${result.logPath}`);
      }

      case "create_task": {
        const input = CreateTaskSchema.parse(args);
        const id = await context.openStore().createTask(input.tag, input.title);
        return text(`Created task: ${id}`);
      }

      case "complete_task": {
        const input = CompleteTaskSchema.parse(args);
        await context.openStore().completeTask(input.id);
        return text(`Completed task: ${input.id}`);
      }

      case "add_note": {
        const input = AddNoteSchema.parse(args);
        await context.openStore().addNote(input.id, input.text);
        return text(`Note added to task: ${input.id}`);
      }

      case "search_tasks": {
        const input = SearchTasksSchema.parse(args);
        const store = context.openStore();
        const matches = await store.searchTasks(input.query, input.tag);
        if (matches.length === 0) {
          return text(`No tasks found matching '${input.query}'`);
        }
        return text(formatMatches(matches, store.grammar.noteIndent));
      }

      case "get_today_section": {
        GetTodaySectionSchema.parse(args ?? {});
        const store = context.openStore();
        const section = await store.getTodaySection();
        return text(section === "" ? `No section for ${store.today()} yet.` : section);
      }

      default:
        return {
          content: [{ type: "text", text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  } catch (error) {
    return {
      content: [
        {
          type: "text",
          text: `Error: ${(error as Error).message}`,
        },
      ],
      isError: true,
    };
  }
}
