import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { Config, getActivityLogPath } from "./config/index.js";

export type ActivityLogger = (message: string) => void;

export function isDebugEnabled(): boolean {
  const flag = process.env.TASKLOG_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0";
}

/**
 * Logger handed to the store. Lines go to the configured activity log and,
 * with TASKLOG_DEBUG set, to stderr. Nothing is written to stdout because the
 * MCP server speaks its protocol there.
 */
export function createActivityLogger(config: Config): ActivityLogger {
  const logPath = getActivityLogPath(config);
  const debug = isDebugEnabled();

  return (message: string) => {
    const line = `[${new Date().toISOString()}] ${message}\n`;

    if (debug) {
      process.stderr.write(chalk.dim(line));
    }

    if (logPath) {
      try {
        mkdirSync(dirname(logPath), { recursive: true });
        appendFileSync(logPath, line);
      } catch (error) {
        process.stderr.write(
          chalk.yellow(`Could not write activity log ${logPath}: ${(error as Error).message}\n`)
        );
      }
    }
  };
}
