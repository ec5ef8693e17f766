import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError, IOFailureError, NotInitializedError } from "../tasks/errors.js";
import { Config, ConfigSchema } from "./schema.js";

const CONFIG_FILENAME = "config.json";
const STATE_FILENAME = "state.json";

export function getBaseDir(): string {
  const override = process.env.TASKLOG_HOME;
  if (override) {
    return expandPath(override);
  }
  return join(homedir(), ".config", "tasklog");
}

export function getConfigPath(): string {
  return join(getBaseDir(), CONFIG_FILENAME);
}

export function getStatePath(): string {
  return join(getBaseDir(), STATE_FILENAME);
}

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function parseConfig(raw: string, source: string): Config {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${source}`);
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file ${source}: ${details}`, result.error);
  }
  return result.data;
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    throw new NotInitializedError(configPath);
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new IOFailureError(configPath, "read", error);
  }
  return parseConfig(raw, configPath);
}

export function saveConfig(config: Config): void {
  const validated = ConfigSchema.parse(config);
  const configPath = getConfigPath();
  try {
    mkdirSync(getBaseDir(), { recursive: true });
    writeFileSync(configPath, JSON.stringify(validated, null, 2) + "\n");
  } catch (error) {
    throw new IOFailureError(configPath, "write", error);
  }
}

export function getLogPath(config: Config): string {
  return expandPath(config.logPath);
}

export function getActivityLogPath(config: Config): string | null {
  return config.activityLog ? expandPath(config.activityLog) : null;
}

export * from "./schema.js";
