import Fastify from 'fastify';
import cors from '@fastify/cors';
import { fileURLToPath } from 'node:url';

import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { TaskNotFoundError, TaskStorageError, TaskValidationError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { TaskManager } from './todo/manager.js';
import { ReminderManager } from './todo/reminder.js';
import type { Reminder } from './todo/reminder.js';
import { getQuickReminderOptions, parseReminderTime } from './todo/reminder-time.js';
import { buildTaskStatistics } from './todo/report.js';
import { TaskStorage } from './todo/storage.js';
import type { CreateTaskInput, TaskPatch, TaskState } from './todo/types.js';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function readBody(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) throw new TaskValidationError('Request body must be a JSON object');
  return body;
}

function pickRemindAt(b: Record<string, unknown>): string | null | undefined {
  const v = b.remindAt;
  if (v === undefined || v === null) return v;
  if (!isString(v)) throw new TaskValidationError('remindAt must be an ISO date-time string or null');
  return v;
}

function pickCreate(body: unknown): CreateTaskInput {
  const b = readBody(body);
  if (!isString(b.title)) throw new TaskValidationError('title must be a non-empty string');
  if (b.category !== undefined && !isString(b.category)) throw new TaskValidationError('category must be a string');

  return { title: b.title, category: b.category, remindAt: pickRemindAt(b) };
}

function pickPatch(body: unknown): TaskPatch {
  const b = readBody(body);
  const out: TaskPatch = {};

  if (b.title !== undefined) {
    if (!isString(b.title)) throw new TaskValidationError('title must be a non-empty string');
    out.title = b.title;
  }

  if (b.category !== undefined) {
    if (!isString(b.category)) throw new TaskValidationError('category must be a string');
    out.category = b.category;
  }

  if (b.completed !== undefined) {
    if (typeof b.completed !== 'boolean') throw new TaskValidationError('completed must be a boolean');
    out.completed = b.completed;
  }

  const remindAt = pickRemindAt(b);
  if (remindAt !== undefined) out.remindAt = remindAt;

  return out;
}

function pickState(raw: string | undefined): TaskState | undefined {
  if (raw === undefined || raw === '' || raw === 'all') return undefined;
  if (raw === 'pending' || raw === 'completed') return raw;
  throw new TaskValidationError(`Invalid state: ${raw}`);
}

function pickHours(raw: string | undefined): number {
  if (raw === undefined || raw === '') return 24;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) throw new TaskValidationError(`Invalid hours: ${raw}`);
  return n;
}

export function statusForError(err: unknown): number {
  if (err instanceof TaskNotFoundError) return 404;
  if (err instanceof TaskValidationError) return 400;
  if (err instanceof TaskStorageError) return 500;
  if (isRecord(err) && typeof err.statusCode === 'number') return err.statusCode;
  return 500;
}

// Undelivered notifications kept for the UI; older ones are dropped first.
export const MAX_PENDING_NOTIFICATIONS = 50;

export type ServerOptions = {
  config?: AppConfig;
  logger?: Logger;
  manager?: TaskManager;
  now?: () => Date;
  startReminderMonitor?: boolean;
  maxPendingNotifications?: number;
};

export async function buildApp(opts: ServerOptions = {}) {
  const config = opts.config ?? (await loadConfig());
  const logger = opts.logger ?? createLogger({ level: config.logLevel ?? 'info' });
  const now = opts.now ?? (() => new Date());

  const app = Fastify({ loggerInstance: logger });

  const manager =
    opts.manager ??
    (await TaskManager.open({
      storage: new TaskStorage({ dataFile: config.dataFile, logger, now }),
      logger,
      categories: config.categories,
      now
    }));

  // Fired reminders wait here until the UI polls /api/notifications.
  const maxPending = opts.maxPendingNotifications ?? MAX_PENDING_NOTIFICATIONS;
  const notifications: Reminder[] = [];
  const reminders = new ReminderManager({
    logger,
    now,
    checkIntervalMs: config.reminderIntervalMs,
    onNotify: (r) => {
      notifications.push(r);
      if (notifications.length > maxPending) {
        const dropped = notifications.splice(0, notifications.length - maxPending);
        logger.debug({ dropped: dropped.length }, 'notification queue full, dropped oldest');
      }
    }
  });
  reminders.updateReminders(manager.getAllTasks());
  const unsubscribe = manager.subscribe((tasks) => reminders.updateReminders(tasks));
  if (opts.startReminderMonitor ?? true) reminders.start();

  app.addHook('onClose', async () => {
    reminders.stop();
    unsubscribe();
    await manager.flush();
  });

  if (config.cors) {
    await app.register(cors, {
      origin: config.corsOrigin ?? true
    });
  }

  app.get('/', async () => {
    return {
      ok: true,
      service: 'todo-desk',
      endpoints: [
        '/api/tasks',
        '/api/tasks/:id (GET, PATCH, DELETE)',
        '/api/tasks/:id/toggle (POST)',
        '/api/tasks/clear-completed (POST)',
        '/api/categories',
        '/api/stats',
        '/api/reminders/upcoming',
        '/api/notifications',
        '/api/storage'
      ]
    };
  });

  app.get('/favicon.ico', async (_req, reply) => {
    reply.code(204).send();
  });

  app.get<{ Querystring: { category?: string; state?: string; q?: string } }>('/api/tasks', async (req) => {
    const tasks = manager.listTasks({
      category: req.query.category || undefined,
      state: pickState(req.query.state),
      query: req.query.q
    });
    return { ok: true, tasks };
  });

  app.post('/api/tasks', async (req, reply) => {
    const task = await manager.addTask(pickCreate(req.body));
    reply.status(201);
    return { ok: true, task };
  });

  app.post('/api/tasks/clear-completed', async () => {
    const removed = await manager.clearCompletedTasks();
    return { ok: true, removed };
  });

  app.get<{ Params: { id: string } }>('/api/tasks/:id', async (req) => {
    const task = manager.getTaskById(req.params.id);
    if (!task) throw new TaskNotFoundError(req.params.id);
    return { ok: true, task };
  });

  app.patch<{ Params: { id: string } }>('/api/tasks/:id', async (req) => {
    const task = await manager.updateTask(req.params.id, pickPatch(req.body));
    return { ok: true, task };
  });

  app.post<{ Params: { id: string } }>('/api/tasks/:id/toggle', async (req) => {
    const task = await manager.toggleTask(req.params.id);
    return { ok: true, task };
  });

  app.delete<{ Params: { id: string } }>('/api/tasks/:id', async (req) => {
    const removed = await manager.removeTask(req.params.id);
    if (!removed) throw new TaskNotFoundError(req.params.id);
    return { ok: true };
  });

  app.get('/api/categories', async () => {
    return { ok: true, categories: manager.listCategories() };
  });

  app.get('/api/stats', async () => {
    const stats = buildTaskStatistics(manager.getAllTasks(), reminders.getUpcomingReminders(24));
    return { ok: true, stats };
  });

  app.get<{ Querystring: { hours?: string } }>('/api/reminders/upcoming', async (req) => {
    return { ok: true, reminders: reminders.getUpcomingReminders(pickHours(req.query.hours)) };
  });

  app.get('/api/reminders/status', async () => {
    return { ok: true, status: reminders.getStatus() };
  });

  app.get('/api/reminders/quick', async () => {
    const options = getQuickReminderOptions(now()).map((o) => ({ label: o.label, remindAt: o.at.toISOString() }));
    return { ok: true, options };
  });

  app.post('/api/reminders/parse', async (req) => {
    const b = readBody(req.body);
    if (!isString(b.time)) throw new TaskValidationError('time must be a string');
    if (b.date !== undefined && !isString(b.date)) throw new TaskValidationError('date must be a string');
    const at = parseReminderTime(b.time, b.date, now());
    if (!at) throw new TaskValidationError('Unrecognized time; use HH:MM (or H:MM AM/PM) and an optional YYYY-MM-DD date');
    return { ok: true, remindAt: at.toISOString() };
  });

  app.get('/api/notifications', async () => {
    const drained = notifications.splice(0, notifications.length);
    return { ok: true, notifications: drained };
  });

  app.get('/api/storage', async () => {
    const file = await manager.storage.getFileInfo();
    return { ok: true, file, lastLoad: manager.lastLoad, dirty: manager.isDirty };
  });

  app.post('/api/storage/backup', async () => {
    const path = await manager.storage.backupTasks();
    return { ok: true, path };
  });

  app.post('/api/reload', async () => {
    const result = await manager.load();
    return { ok: true, count: result.tasks.length, skipped: result.skipped, quarantined: result.quarantined };
  });

  // Error handling: return JSON consistently.
  app.setErrorHandler((err, req, reply) => {
    const statusCode = statusForError(err);
    if (statusCode >= 500) req.log.error({ err }, 'request failed');
    reply.status(statusCode).send({ ok: false, error: errorMessage(err) });
  });

  return app;
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const app = await buildApp({ config });

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ host: config.host, port: config.port });
}

const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
}
