import { TaskValidationError } from '../errors.js';
import { DEFAULT_CATEGORY } from './types.js';
import type { CreateTaskInput, Task, TaskPatch, TaskRecordV1 } from './types.js';

export const TASK_ID_PATTERN = /^TASK-(\d+)$/;

export function nowIso(): string {
  return new Date().toISOString();
}

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function normalizeTimestamp(value: unknown, field: string): string {
  if (!isString(value)) throw new TaskValidationError(`${field} must be a date-time string`);
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new TaskValidationError(`${field} is not a valid date-time: ${value}`);
  return new Date(ms).toISOString();
}

function normalizeOptionalTimestamp(value: unknown, field: string): string | null {
  if (value === undefined || value === null || value === '') return null;
  return normalizeTimestamp(value, field);
}

export function normalizeTitle(title: unknown): string {
  if (!isString(title) || title.trim() === '') throw new TaskValidationError('Task title is required');
  return title.trim();
}

export function normalizeCategory(category: unknown): string {
  if (category === undefined) return DEFAULT_CATEGORY;
  if (!isString(category) || category.trim() === '') {
    throw new TaskValidationError('category must be a non-empty string');
  }
  return category.trim();
}

export function nextTaskId(tasks: readonly Task[]): string {
  let max = 0;
  for (const t of tasks) {
    const m = TASK_ID_PATTERN.exec(t.id);
    if (!m) continue;
    const n = Number(m[1]);
    if (n > max) max = n;
  }
  return `TASK-${String(max + 1).padStart(4, '0')}`;
}

export function createTask(input: CreateTaskInput, opts: { id: string; now?: Date }): Task {
  const at = (opts.now ?? new Date()).toISOString();
  return {
    id: opts.id,
    title: normalizeTitle(input.title),
    category: normalizeCategory(input.category),
    completed: false,
    remindAt: normalizeOptionalTimestamp(input.remindAt, 'remindAt'),
    createdAt: at,
    completedAt: null
  };
}

export function markCompleted(task: Task, at: string = nowIso()): Task {
  return { ...task, completed: true, completedAt: at };
}

export function markUncompleted(task: Task): Task {
  return { ...task, completed: false, completedAt: null };
}

export function toggleCompleted(task: Task, at: string = nowIso()): Task {
  return task.completed ? markUncompleted(task) : markCompleted(task, at);
}

export function setReminder(task: Task, remindAt: string | null): Task {
  return { ...task, remindAt: normalizeOptionalTimestamp(remindAt, 'remindAt') };
}

export function applyTaskPatch(task: Task, patch: TaskPatch, at: string = nowIso()): Task {
  let next: Task = { ...task };

  if (patch.title !== undefined) next.title = normalizeTitle(patch.title);
  if (patch.category !== undefined) next.category = normalizeCategory(patch.category);
  if (patch.remindAt !== undefined) next = setReminder(next, patch.remindAt);
  if (patch.completed !== undefined && patch.completed !== next.completed) {
    next = patch.completed ? markCompleted(next, at) : markUncompleted(next);
  }

  return next;
}

export function toTaskRecord(task: Task): TaskRecordV1 {
  return {
    id: task.id,
    title: task.title,
    category: task.category,
    completed: task.completed,
    remind_at: task.remindAt,
    created_at: task.createdAt,
    completed_at: task.completedAt
  };
}

/**
 * Validates one element of the task file and converts it to a `Task`.
 * Keys missing from files written by older versions fall back to defaults;
 * keys that are present but malformed are rejected.
 */
export function fromTaskRecord(raw: unknown, opts?: { now?: Date }): Task {
  if (!isRecord(raw)) throw new TaskValidationError('Task record must be an object');

  const id = raw.id;
  if (!isString(id) || id.trim() === '') throw new TaskValidationError(`Invalid task id: ${String(id)}`);
  if (!isString(raw.title) || raw.title.trim() === '') throw new TaskValidationError(`Task ${id}: title is required`);

  let category = DEFAULT_CATEGORY;
  if (raw.category !== undefined) {
    if (!isString(raw.category) || raw.category.trim() === '') {
      throw new TaskValidationError(`Task ${id}: category must be a non-empty string`);
    }
    category = raw.category;
  }

  let completed = false;
  if (raw.completed !== undefined) {
    if (typeof raw.completed !== 'boolean') throw new TaskValidationError(`Task ${id}: completed must be a boolean`);
    completed = raw.completed;
  }

  const createdAt =
    raw.created_at === undefined
      ? (opts?.now ?? new Date()).toISOString()
      : normalizeTimestamp(raw.created_at, `Task ${id}: created_at`);

  return {
    id,
    title: raw.title,
    category,
    completed,
    remindAt: normalizeOptionalTimestamp(raw.remind_at, `Task ${id}: remind_at`),
    createdAt,
    completedAt: completed ? normalizeOptionalTimestamp(raw.completed_at, `Task ${id}: completed_at`) : null
  };
}

export function formatReminderTime(iso: string, timeZone?: string): string {
  const fmt = new Intl.DateTimeFormat('en-US', {
    timeZone,
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  });
  const parts = fmt.formatToParts(new Date(iso));
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
  return `${get('month')}/${get('day')} ${get('hour')}:${get('minute')}`;
}

export function formatTaskLine(task: Task, opts?: { timeZone?: string }): string {
  const status = task.completed ? '✓' : '○';
  const reminder = task.remindAt ? ` ⏰${formatReminderTime(task.remindAt, opts?.timeZone)}` : '';
  return `${status} ${task.title} [${task.category}]${reminder}`;
}

export function matchesQuery(task: Task, query: string): boolean {
  const q = query.trim().toLowerCase();
  if (!q) return true;
  return task.title.toLowerCase().includes(q) || task.category.toLowerCase().includes(q);
}
