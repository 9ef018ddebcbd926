import path from 'node:path';

import { TaskStorageError, errorCode, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { copyFile, ensureDir, listDir, moveFile, readText, statFile, writeText } from './fs.js';
import { fromTaskRecord, toTaskRecord } from './task.js';
import type { Task } from './types.js';

export interface TaskStorageOptions {
  dataFile: string; // path to data/tasks.json
  logger: Logger;
  now?: () => Date;
}

export interface TaskLoadResult {
  tasks: Task[];
  // number of file entries that failed validation and were left out
  skipped: number;
  // where the unreadable original was put aside, if it was
  quarantined: string | null;
}

export type TaskFileInfo =
  | { exists: false }
  | { exists: true; path: string; size: number; modified: string; created: string };

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock stamp used for backup and quarantine file names: YYYYMMDD_HHMMSS. */
export function timestampSuffix(d: Date): string {
  const date = `${d.getFullYear()}${pad2(d.getMonth() + 1)}${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}${pad2(d.getMinutes())}${pad2(d.getSeconds())}`;
  return `${date}_${time}`;
}

export function serializeTasks(tasks: readonly Task[]): string {
  return `${JSON.stringify(tasks.map(toTaskRecord), null, 2)}\n`;
}

export class TaskStorage {
  readonly dataFile: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: TaskStorageOptions) {
    this.dataFile = path.resolve(opts.dataFile);
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
  }

  get dataDir(): string {
    return path.dirname(this.dataFile);
  }

  async ensureDataDirectory(): Promise<void> {
    try {
      await ensureDir(this.dataDir);
    } catch (err) {
      throw new TaskStorageError(`Cannot create data directory ${this.dataDir}: ${errorMessage(err)}`, this.dataDir, err);
    }
  }

  async saveTasks(tasks: readonly Task[]): Promise<void> {
    try {
      await writeText(this.dataFile, serializeTasks(tasks));
    } catch (err) {
      throw new TaskStorageError(`Cannot save tasks to ${this.dataFile}: ${errorMessage(err)}`, this.dataFile, err);
    }
    this.logger.debug({ file: this.dataFile, count: tasks.length }, 'tasks saved');
  }

  async loadTasks(): Promise<TaskLoadResult> {
    let raw: string;
    try {
      raw = await readText(this.dataFile);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        this.logger.info({ file: this.dataFile }, 'task file does not exist yet, it will be created on first save');
        return { tasks: [], skipped: 0, quarantined: null };
      }
      throw new TaskStorageError(`Cannot read task file ${this.dataFile}: ${errorMessage(err)}`, this.dataFile, err);
    }

    if (raw.trim() === '') {
      this.logger.info({ file: this.dataFile }, 'task file is empty');
      return { tasks: [], skipped: 0, quarantined: null };
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const quarantined = await this.quarantine('move');
      this.logger.warn({ file: this.dataFile, quarantined, err: errorMessage(err) }, 'task file is not valid JSON, starting with an empty list');
      return { tasks: [], skipped: 0, quarantined };
    }

    if (!Array.isArray(data)) {
      const quarantined = await this.quarantine('move');
      this.logger.warn({ file: this.dataFile, quarantined }, 'task file does not contain a list, starting with an empty list');
      return { tasks: [], skipped: 0, quarantined };
    }

    const now = this.now();
    const tasks: Task[] = [];
    const seen = new Set<string>();
    let skipped = 0;
    for (const [index, item] of data.entries()) {
      try {
        const task = fromTaskRecord(item, { now });
        if (seen.has(task.id)) throw new Error(`duplicate task id ${task.id}`);
        seen.add(task.id);
        tasks.push(task);
      } catch (err) {
        skipped++;
        this.logger.warn({ file: this.dataFile, index, err: errorMessage(err) }, 'skipping invalid task entry');
      }
    }

    let quarantined: string | null = null;
    if (skipped > 0) {
      // Keep what the next save would drop, once per distinct content.
      quarantined = (await this.findQuarantinedCopy(raw)) ?? (await this.quarantine('copy'));
    }

    this.logger.info({ file: this.dataFile, count: tasks.length, skipped }, 'tasks loaded');
    return { tasks, skipped, quarantined };
  }

  async backupTasks(suffix?: string): Promise<string | null> {
    if (!(await this.exists())) {
      this.logger.info({ file: this.dataFile }, 'nothing to back up');
      return null;
    }

    const backupFile = `${this.dataFile}.backup_${suffix ?? timestampSuffix(this.now())}`;
    try {
      await copyFile(this.dataFile, backupFile);
    } catch (err) {
      throw new TaskStorageError(`Cannot back up ${this.dataFile}: ${errorMessage(err)}`, backupFile, err);
    }
    this.logger.info({ file: this.dataFile, backupFile }, 'backup created');
    return backupFile;
  }

  async getFileInfo(): Promise<TaskFileInfo> {
    const st = await this.stat();
    if (!st) return { exists: false };
    return {
      exists: true,
      path: this.dataFile,
      size: st.size,
      modified: st.mtime.toISOString(),
      created: st.birthtime.toISOString()
    };
  }

  private async exists(): Promise<boolean> {
    return (await this.stat()) !== null;
  }

  private async stat() {
    try {
      return await statFile(this.dataFile);
    } catch (err) {
      throw new TaskStorageError(`Cannot stat ${this.dataFile}: ${errorMessage(err)}`, this.dataFile, err);
    }
  }

  private async findQuarantinedCopy(content: string): Promise<string | null> {
    const prefix = `${path.basename(this.dataFile)}.corrupt_`;
    try {
      const names = (await listDir(this.dataDir)).filter((n) => n.startsWith(prefix)).sort().reverse();
      for (const name of names) {
        const candidate = path.join(this.dataDir, name);
        if ((await readText(candidate)) === content) return candidate;
      }
    } catch (err) {
      throw new TaskStorageError(`Cannot inspect ${this.dataDir}: ${errorMessage(err)}`, this.dataDir, err);
    }
    return null;
  }

  private async quarantine(mode: 'move' | 'copy'): Promise<string> {
    const target = `${this.dataFile}.corrupt_${timestampSuffix(this.now())}`;
    try {
      if (mode === 'move') await moveFile(this.dataFile, target);
      else await copyFile(this.dataFile, target);
    } catch (err) {
      // Continuing would let the next save overwrite the only copy.
      throw new TaskStorageError(`Cannot set aside unreadable task file ${this.dataFile}: ${errorMessage(err)}`, target, err);
    }
    return target;
  }
}
