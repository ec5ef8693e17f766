#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { loadConfig } from "./config/index.js";
import { createActivityLogger } from "./logging.js";
import { initialize, TaskLogStore } from "./tasks/store.js";
import { handleToolCall, ToolContext, TOOLS } from "./tools/handlers.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

export class TaskLogServer {
  private server: Server;
  private context: ToolContext;

  constructor(context: ToolContext) {
    this.context = context;

    this.server = new Server(
      {
        name: "tasklog",
        version: packageJson.version,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions:
          "Task log tool. Use create_task to add tasks, complete_task to mark them done, add_note to annotate, search_tasks to find tasks and get_today_section to read today's entries.",
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(this.context, name, args);
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error("tasklog MCP server running on stdio");
  }
}

export function defaultToolContext(): ToolContext {
  return {
    openStore: () => {
      const config = loadConfig();
      return TaskLogStore.fromConfig(config, { log: createActivityLogger(config) });
    },
    initialize,
  };
}

export async function runServer(): Promise<void> {
  const server = new TaskLogServer(defaultToolContext());
  await server.run();
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runServer().catch((error) => {
    console.error(`Failed to start MCP server: ${(error as Error).message}`);
    process.exit(1);
  });
}
