import { existsSync } from "fs";
import {
  Config,
  configExists,
  DEFAULT_CONFIG,
  getBaseDir,
  expandPath,
  getConfigPath,
  getLogPath,
  getStatePath,
  loadConfig,
  saveConfig,
} from "../config/index.js";
import { ActivityLogger } from "../logging.js";
import { parseCounterState, reserve, serializeCounterState } from "./counters.js";
import { formatSectionDate, formatStamp } from "./dates.js";
import { buildDocument, serializeDocument } from "./document.js";
import { NotInitializedError } from "./errors.js";
import { createFileIfAbsent, readOptionalFile, withLocks, writeFileAtomic } from "./files.js";
import {
  addNote,
  addTask,
  completeTask,
  searchTasks,
  todaySection,
  validateNoteText,
  validateTag,
  validateTitle,
} from "./mutations.js";
import { CounterState, LogDocument, LogGrammar, TaskMatch, taskId } from "./types.js";

export interface TaskLogPaths {
  logPath: string;
  statePath: string;
}

export interface TaskLogStoreOptions {
  now?: () => Date;
  log?: ActivityLogger;
}

/**
 * The operations every front end uses. Each mutation is one critical section:
 * lock, read, build the window, apply one change, write atomically, unlock.
 * Reads skip the lock since writes only ever swap whole files into place.
 */
export class TaskLogStore {
  private config: Config;
  private paths: TaskLogPaths;
  private now: () => Date;
  private log: ActivityLogger;

  constructor(config: Config, paths: TaskLogPaths, options: TaskLogStoreOptions = {}) {
    this.config = config;
    this.paths = paths;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? (() => {});
  }

  static fromConfig(config: Config, options: TaskLogStoreOptions = {}): TaskLogStore {
    return new TaskLogStore(
      config,
      { logPath: getLogPath(config), statePath: getStatePath() },
      options
    );
  }

  get logPath(): string {
    return this.paths.logPath;
  }

  get grammar(): LogGrammar {
    return {
      dateFormat: this.config.dateFormat,
      noteIndent: this.config.noteIndent,
      headingLevel: this.config.headingLevel,
    };
  }

  today(): string {
    return formatSectionDate(this.now(), this.config.dateFormat);
  }

  async createTask(tag: string, title: string): Promise<string> {
    validateTag(tag);
    validateTitle(title);

    return this.mutate((doc, counters) => {
      const reservation = reserve(counters, tag);
      const task = addTask(
        doc,
        { tag, number: reservation.number, title, today: this.today() },
        this.grammar
      );
      const id = taskId(task);
      return { result: id, counters: reservation.state, changed: true, message: `created ${id}` };
    });
  }

  async completeTask(id: string): Promise<void> {
    const stamp = this.config.stampCompletions
      ? formatStamp(this.now(), this.config.dateFormat)
      : undefined;

    await this.mutate((doc) => {
      const changed = completeTask(doc, id, stamp);
      return {
        result: undefined,
        changed,
        message: changed ? `completed ${id}` : `${id} was already done`,
      };
    });
  }

  async addNote(id: string, text: string): Promise<void> {
    validateNoteText(text);
    const noteText = this.config.stampNotes
      ? `[${formatStamp(this.now(), this.config.dateFormat)}] ${text}`
      : text;

    await this.mutate((doc) => {
      addNote(doc, id, noteText);
      return { result: undefined, changed: true, message: `noted on ${id}` };
    });
  }

  async searchTasks(query: string, tag?: string): Promise<TaskMatch[]> {
    const doc = await this.readDocument();
    return searchTasks(doc, query, { tag });
  }

  async getTodaySection(): Promise<string> {
    const doc = await this.readDocument();
    return todaySection(doc, this.today(), this.grammar);
  }

  private async readLogContent(): Promise<string> {
    const content = await readOptionalFile(this.paths.logPath);
    if (content === null) {
      throw new NotInitializedError(this.paths.logPath);
    }
    return content;
  }

  private async readCounters(): Promise<CounterState> {
    const raw = await readOptionalFile(this.paths.statePath);
    if (raw === null) {
      throw new NotInitializedError(this.paths.statePath);
    }
    return parseCounterState(raw, this.paths.statePath);
  }

  private async readDocument(): Promise<LogDocument> {
    const content = await this.readLogContent();
    return buildDocument(content, this.grammar, this.config.scanWindowLines);
  }

  private async mutate<T>(
    apply: (
      doc: LogDocument,
      counters: CounterState
    ) => { result: T; changed: boolean; message: string; counters?: CounterState }
  ): Promise<T> {
    const { logPath, statePath } = this.paths;
    for (const path of [logPath, statePath]) {
      if (!existsSync(path)) {
        throw new NotInitializedError(path);
      }
    }

    return withLocks([logPath, statePath], this.config.lockTimeoutMs, async () => {
      const content = await this.readLogContent();
      const counters = await this.readCounters();
      const doc = buildDocument(content, this.grammar, this.config.scanWindowLines);

      const outcome = apply(doc, counters);

      if (outcome.counters) {
        // State first: a failed log write then skips a number instead of reusing one.
        await writeFileAtomic(statePath, serializeCounterState(outcome.counters));
      }
      if (outcome.changed) {
        await writeFileAtomic(logPath, serializeDocument(doc, this.grammar));
      }
      this.log(outcome.message);
      return outcome.result;
    });
  }
}

export interface InitResult {
  baseDir: string;
  configPath: string;
  statePath: string;
  logPath: string;
  createdConfig: boolean;
  createdState: boolean;
  createdLog: boolean;
}

/**
 * Ensures config, counter state and log exist. An existing log is never
 * touched; passing `logPath` points the config at a different file.
 */
export async function initialize(logPath?: string): Promise<InitResult> {
  if (logPath) {
    logPath = expandPath(logPath);
  }

  let createdConfig = false;
  if (!configExists()) {
    saveConfig(logPath ? { ...DEFAULT_CONFIG, logPath } : DEFAULT_CONFIG);
    createdConfig = true;
  } else if (logPath) {
    saveConfig({ ...loadConfig(), logPath });
  }

  const config = loadConfig();
  const statePath = getStatePath();
  const resolvedLogPath = getLogPath(config);

  const createdState = await createFileIfAbsent(statePath, serializeCounterState({}));
  const createdLog = await createFileIfAbsent(resolvedLogPath, "");

  return {
    baseDir: getBaseDir(),
    configPath: getConfigPath(),
    statePath,
    logPath: resolvedLogPath,
    createdConfig,
    createdState,
    createdLog,
  };
}

export function openStore(options: TaskLogStoreOptions = {}): TaskLogStore {
  return TaskLogStore.fromConfig(loadConfig(), options);
}
