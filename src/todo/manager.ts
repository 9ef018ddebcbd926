import { TaskNotFoundError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { TaskLoadResult, TaskStorage } from './storage.js';
import { applyTaskPatch, createTask, matchesQuery, nextTaskId } from './task.js';
import { DEFAULT_CATEGORIES } from './types.js';
import type { CreateTaskInput, Task, TaskPatch, TaskState } from './types.js';

export interface TaskManagerOptions {
  storage: TaskStorage;
  logger: Logger;
  categories?: readonly string[];
  now?: () => Date;
}

export interface TaskListFilter {
  category?: string;
  state?: TaskState;
  query?: string;
}

export type TaskListener = (tasks: readonly Task[]) => void;

/**
 * In-memory task list with write-through persistence.
 *
 * Every mutation replaces the list, notifies subscribers and then saves the
 * whole file. Saves run one at a time and each writes the newest list, so the
 * last write to finish carries every change. When a save fails the in-memory
 * change stays, the manager is dirty and the storage error reaches the caller;
 * `flush()` retries.
 */
export class TaskManager {
  readonly storage: TaskStorage;
  private readonly logger: Logger;
  private readonly categories: readonly string[];
  private readonly now: () => Date;
  private readonly listeners = new Set<TaskListener>();

  private tasks: Task[] = [];
  // bumped by every change; the file holds savedVersion
  private version = 0;
  private savedVersion = 0;
  private writing: Promise<void> = Promise.resolve();
  private lastLoadResult: TaskLoadResult | null = null;

  constructor(opts: TaskManagerOptions) {
    this.storage = opts.storage;
    this.logger = opts.logger;
    this.categories = opts.categories ?? DEFAULT_CATEGORIES;
    this.now = opts.now ?? (() => new Date());
  }

  static async open(opts: TaskManagerOptions): Promise<TaskManager> {
    const manager = new TaskManager(opts);
    await manager.load();
    return manager;
  }

  get isDirty(): boolean {
    return this.version !== this.savedVersion;
  }

  get lastLoad(): TaskLoadResult | null {
    return this.lastLoadResult;
  }

  async load(): Promise<TaskLoadResult> {
    await this.storage.ensureDataDirectory();
    const result = await this.storage.loadTasks();
    this.tasks = result.tasks;
    this.version++;
    this.savedVersion = this.version;
    this.lastLoadResult = result;
    this.notify();
    return result;
  }

  async save(): Promise<void> {
    // A failed earlier write has already rejected its own caller.
    const write = () => this.writeLatest();
    const run = this.writing.then(write, write);
    this.writing = run;
    await run;
  }

  /** Saves only when a previous write-through failed. */
  async flush(): Promise<boolean> {
    if (!this.isDirty) return false;
    await this.save();
    return true;
  }

  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async addTask(input: CreateTaskInput): Promise<Task> {
    const task = createTask(input, { id: nextTaskId(this.tasks), now: this.now() });
    await this.commit([...this.tasks, task]);
    this.logger.info({ id: task.id, category: task.category }, 'task added');
    return task;
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task> {
    const idx = this.tasks.findIndex((t) => t.id === id);
    if (idx === -1) throw new TaskNotFoundError(id);

    const updated = applyTaskPatch(this.tasks[idx], patch, this.now().toISOString());
    const next = this.tasks.slice();
    next[idx] = updated;
    await this.commit(next);
    return updated;
  }

  async toggleTask(id: string): Promise<Task> {
    const task = this.requireTask(id);
    return await this.updateTask(task.id, { completed: !task.completed });
  }

  async completeTask(id: string): Promise<Task> {
    return await this.updateTask(id, { completed: true });
  }

  async uncompleteTask(id: string): Promise<Task> {
    return await this.updateTask(id, { completed: false });
  }

  async setReminder(id: string, remindAt: string | null): Promise<Task> {
    return await this.updateTask(id, { remindAt });
  }

  async removeTask(id: string): Promise<boolean> {
    return (await this.removeTasks([id])) > 0;
  }

  async removeTasks(ids: readonly string[]): Promise<number> {
    const drop = new Set(ids);
    const next = this.tasks.filter((t) => !drop.has(t.id));
    const removed = this.tasks.length - next.length;
    if (removed === 0) return 0;
    await this.commit(next);
    this.logger.info({ ids: [...drop], removed }, 'tasks removed');
    return removed;
  }

  async clearCompletedTasks(): Promise<number> {
    const next = this.tasks.filter((t) => !t.completed);
    const removed = this.tasks.length - next.length;
    if (removed > 0) await this.commit(next);
    return removed;
  }

  getTaskById(id: string): Task | null {
    return this.tasks.find((t) => t.id === id) ?? null;
  }

  /** A task id, or a 1-based position in list order. */
  resolveRef(ref: string): Task | null {
    const byId = this.getTaskById(ref);
    if (byId) return byId;
    if (!/^\d+$/.test(ref)) return null;
    return this.tasks[Number(ref) - 1] ?? null;
  }

  requireTask(ref: string): Task {
    const task = this.resolveRef(ref);
    if (!task) throw new TaskNotFoundError(ref);
    return task;
  }

  getAllTasks(): Task[] {
    return this.tasks.slice();
  }

  listTasks(filter: TaskListFilter = {}): Task[] {
    return this.tasks.filter((t) => {
      if (filter.category !== undefined && t.category !== filter.category) return false;
      if (filter.state === 'pending' && t.completed) return false;
      if (filter.state === 'completed' && !t.completed) return false;
      if (filter.query !== undefined && !matchesQuery(t, filter.query)) return false;
      return true;
    });
  }

  getTasksByCategory(category: string): Task[] {
    return this.listTasks({ category });
  }

  getCompletedTasks(): Task[] {
    return this.listTasks({ state: 'completed' });
  }

  getPendingTasks(): Task[] {
    return this.listTasks({ state: 'pending' });
  }

  searchTasks(query: string): Task[] {
    return this.listTasks({ query });
  }

  /** Configured categories first, then any other category in use. */
  listCategories(): string[] {
    const out = [...this.categories];
    for (const t of this.tasks) {
      if (!out.includes(t.category)) out.push(t.category);
    }
    return out;
  }

  private async commit(next: Task[]): Promise<void> {
    this.tasks = next;
    this.version++;
    this.notify();
    await this.save();
  }

  private async writeLatest(): Promise<void> {
    const version = this.version;
    await this.storage.saveTasks(this.tasks);
    if (version > this.savedVersion) this.savedVersion = version;
  }

  private notify(): void {
    const snapshot = this.tasks.slice();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error({ err: errorMessage(err) }, 'task listener failed');
      }
    }
  }
}
