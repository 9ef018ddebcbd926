#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { loadConfig } from './config.js';
import { ConfigError, TaskNotFoundError, TaskStorageError, TaskValidationError } from './errors.js';
import { createLogger } from './logger.js';
import { TaskManager } from './todo/manager.js';
import type { TaskListFilter } from './todo/manager.js';
import { ReminderManager } from './todo/reminder.js';
import { parseReminderTime } from './todo/reminder-time.js';
import { buildTaskStatistics, formatStatisticsText } from './todo/report.js';
import { TaskStorage } from './todo/storage.js';
import { formatReminderTime, formatTaskLine } from './todo/task.js';
import type { Task } from './todo/types.js';

export const USAGE = `todo CLI

Usage:
  todo list [--category <c>] [--pending | --completed] [--search <q>]
  todo add <title...> [--category <c>] [--remind <HH:MM | H:MM AM/PM>] [--date YYYY-MM-DD]
  todo done <ref...>                 # mark completed
  todo undo <ref...>                 # mark not completed
  todo toggle <ref...>
  todo rm <ref...>
  todo edit <ref> [--title <t>] [--category <c>]
  todo remind <ref> <HH:MM | H:MM AM/PM> [--date YYYY-MM-DD]
  todo remind <ref> --clear
  todo clear-completed
  todo categories
  todo stats
  todo reminders [hours]             # upcoming reminders, default 24h
  todo backup [suffix]
  todo info                          # task file location and size
  todo watch                         # print reminders as they come due
  todo help

<ref> is a task id (TASK-0001) or its position in \`todo list\`.
`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliContext {
  manager: TaskManager;
  reminders: ReminderManager;
  io: CliIo;
  now: () => Date;
  timeZone?: string;
  // resolves when `todo watch` should stop
  waitForExit: () => Promise<void>;
}

class UsageError extends Error {
  constructor() {
    super('usage');
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set(['--category', '--search', '--remind', '--date', '--title']);

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) throw new UsageError();
  return value;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

// `2:30 PM` arrives as two arguments; rejoin it so it reads as one value.
function joinMeridiem(args: string[]): string[] {
  const out: string[] = [];
  for (const a of args) {
    const prev = out[out.length - 1];
    if (/^(am|pm)$/i.test(a) && prev !== undefined && /^\d{1,2}:\d{2}$/.test(prev)) {
      out[out.length - 1] = `${prev} ${a}`;
      continue;
    }
    out.push(a);
  }
  return out;
}

// Arguments that are neither flags nor flag values.
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (a.startsWith('--')) continue;
    out.push(a);
  }
  return out;
}

function reminderFromArgs(time: string, date: string | undefined, now: Date): string {
  const at = parseReminderTime(time, date, now);
  if (!at) throw new TaskValidationError(`Unrecognized reminder time: ${time}${date ? ` ${date}` : ''}`);
  return at.toISOString();
}

function describe(ctx: CliContext, task: Task): string {
  return `${task.id}  ${formatTaskLine(task, { timeZone: ctx.timeZone })}`;
}

function resolveAll(ctx: CliContext, refs: string[]): Task[] {
  if (!refs.length) throw new UsageError();
  // Resolve every ref up front: positions shift once the list changes.
  return refs.map((ref) => ctx.manager.requireTask(ref));
}

async function cmdList(ctx: CliContext, args: string[]): Promise<void> {
  const filter: TaskListFilter = {
    category: readFlag(args, '--category'),
    query: readFlag(args, '--search')
  };
  if (hasFlag(args, '--pending')) filter.state = 'pending';
  if (hasFlag(args, '--completed')) filter.state = 'completed';

  const all = ctx.manager.getAllTasks();
  const shown = ctx.manager.listTasks(filter);
  if (!shown.length) {
    ctx.io.out('No tasks.');
    return;
  }
  for (const t of shown) {
    ctx.io.out(`${all.indexOf(t) + 1}\t${describe(ctx, t)}`);
  }
}

async function cmdAdd(ctx: CliContext, argv: string[]): Promise<void> {
  const args = joinMeridiem(argv);
  const title = positionals(args).join(' ');
  if (!title.trim()) throw new UsageError();

  const remind = readFlag(args, '--remind');
  const date = readFlag(args, '--date');
  if (date !== undefined && remind === undefined) throw new UsageError();

  const task = await ctx.manager.addTask({
    title,
    category: readFlag(args, '--category'),
    remindAt: remind === undefined ? null : reminderFromArgs(remind, date, ctx.now())
  });
  ctx.io.out(`Added ${describe(ctx, task)}`);
}

async function cmdSetCompleted(ctx: CliContext, args: string[], mode: 'done' | 'undo' | 'toggle'): Promise<void> {
  for (const task of resolveAll(ctx, positionals(args))) {
    const updated =
      mode === 'done'
        ? await ctx.manager.completeTask(task.id)
        : mode === 'undo'
          ? await ctx.manager.uncompleteTask(task.id)
          : await ctx.manager.toggleTask(task.id);
    ctx.io.out(describe(ctx, updated));
  }
}

async function cmdRemove(ctx: CliContext, args: string[]): Promise<void> {
  const tasks = resolveAll(ctx, positionals(args));
  const removed = await ctx.manager.removeTasks(tasks.map((t) => t.id));
  ctx.io.out(`Removed ${removed} task(s)`);
}

async function cmdEdit(ctx: CliContext, args: string[]): Promise<void> {
  const [ref] = positionals(args);
  if (!ref) throw new UsageError();
  const title = readFlag(args, '--title');
  const category = readFlag(args, '--category');
  if (title === undefined && category === undefined) throw new UsageError();

  const task = ctx.manager.requireTask(ref);
  const updated = await ctx.manager.updateTask(task.id, { title, category });
  ctx.io.out(describe(ctx, updated));
}

async function cmdRemind(ctx: CliContext, argv: string[]): Promise<void> {
  const args = joinMeridiem(argv);
  const [ref, time, ...extra] = positionals(args);
  if (!ref || extra.length) throw new UsageError();
  const task = ctx.manager.requireTask(ref);

  if (hasFlag(args, '--clear')) {
    const updated = await ctx.manager.setReminder(task.id, null);
    ctx.io.out(`Reminder cleared: ${describe(ctx, updated)}`);
    return;
  }

  if (!time) throw new UsageError();
  const updated = await ctx.manager.setReminder(task.id, reminderFromArgs(time, readFlag(args, '--date'), ctx.now()));
  ctx.io.out(`Reminder set: ${describe(ctx, updated)}`);
}

async function cmdReminders(ctx: CliContext, args: string[]): Promise<void> {
  const raw = args[0];
  const hours = raw === undefined ? 24 : Number(raw);
  if (!Number.isFinite(hours) || hours <= 0) throw new UsageError();

  const upcoming = ctx.reminders.getUpcomingReminders(hours);
  if (!upcoming.length) {
    ctx.io.out(`No reminders in the next ${hours}h.`);
    return;
  }
  for (const r of upcoming) {
    ctx.io.out(`${formatReminderTime(r.remindAt, ctx.timeZone)}  ${r.taskId}  ${r.taskTitle}`);
  }
}

async function cmdInfo(ctx: CliContext): Promise<void> {
  const info = await ctx.manager.storage.getFileInfo();
  if (!info.exists) {
    ctx.io.out(`Task file: ${ctx.manager.storage.dataFile} (not created yet)`);
    return;
  }
  ctx.io.out(`Task file: ${info.path}`);
  ctx.io.out(`Size: ${info.size} bytes`);
  ctx.io.out(`Modified: ${info.modified}`);
  ctx.io.out(`Created: ${info.created}`);
  ctx.io.out(`Tasks: ${ctx.manager.getAllTasks().length}`);
}

async function cmdWatch(ctx: CliContext): Promise<void> {
  ctx.reminders.setNotificationCallback((r) => {
    ctx.io.out(`⏰ ${formatReminderTime(r.remindAt, ctx.timeZone)}  ${r.taskId}  ${r.taskTitle}`);
  });
  ctx.reminders.start();
  ctx.io.out(`Watching ${ctx.reminders.getStatus().activeReminders} reminder(s). Press Ctrl+C to stop.`);
  try {
    await ctx.waitForExit();
  } finally {
    ctx.reminders.stop();
    ctx.reminders.setNotificationCallback(null);
  }
}

async function dispatch(ctx: CliContext, cmd: string, rest: string[]): Promise<boolean> {
  switch (cmd) {
    case 'list':
    case 'ls':
      await cmdList(ctx, rest);
      return true;
    case 'add':
      await cmdAdd(ctx, rest);
      return true;
    case 'done':
    case 'undo':
    case 'toggle':
      await cmdSetCompleted(ctx, rest, cmd);
      return true;
    case 'rm':
    case 'delete':
      await cmdRemove(ctx, rest);
      return true;
    case 'edit':
      await cmdEdit(ctx, rest);
      return true;
    case 'remind':
      await cmdRemind(ctx, rest);
      return true;
    case 'clear-completed': {
      const removed = await ctx.manager.clearCompletedTasks();
      ctx.io.out(removed ? `Cleared ${removed} completed task(s)` : 'No completed tasks to clear.');
      return true;
    }
    case 'categories':
      for (const c of ctx.manager.listCategories()) ctx.io.out(c);
      return true;
    case 'stats': {
      const stats = buildTaskStatistics(ctx.manager.getAllTasks(), ctx.reminders.getUpcomingReminders(24));
      ctx.io.out(formatStatisticsText(stats, { timeZone: ctx.timeZone }));
      return true;
    }
    case 'reminders':
      await cmdReminders(ctx, rest);
      return true;
    case 'backup': {
      const p = await ctx.manager.storage.backupTasks(rest[0]);
      ctx.io.out(p ? `Backup created: ${p}` : 'Nothing to back up yet.');
      return true;
    }
    case 'info':
      await cmdInfo(ctx);
      return true;
    case 'watch':
      await cmdWatch(ctx);
      return true;
    default:
      return false;
  }
}

function reportLoadIssues(ctx: CliContext): void {
  const load = ctx.manager.lastLoad;
  if (!load?.quarantined) return;
  if (load.skipped > 0) {
    ctx.io.err(`Warning: skipped ${load.skipped} invalid task entr${load.skipped === 1 ? 'y' : 'ies'}; original saved to ${load.quarantined}`);
  } else {
    ctx.io.err(`Warning: task file was unreadable and has been moved to ${load.quarantined}; starting with an empty list`);
  }
}

/** Runs one CLI command and returns the process exit code. */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [cmd, ...rest] = argv;
  if (cmd === 'help' || cmd === '--help' || cmd === '-h') {
    ctx.io.out(USAGE);
    return 0;
  }
  if (!cmd) {
    ctx.io.err(USAGE);
    return 2;
  }

  reportLoadIssues(ctx);

  try {
    if (await dispatch(ctx, cmd, rest)) return 0;
    ctx.io.err(`Unknown command: ${cmd}\n`);
    ctx.io.err(USAGE);
    return 2;
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.io.err(USAGE);
      return 2;
    }
    if (err instanceof TaskNotFoundError || err instanceof TaskValidationError || err instanceof TaskStorageError) {
      ctx.io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = await loadConfig();
  // stdout is reserved for command output.
  const logger = createLogger({ level: config.logLevel ?? 'warn', stream: 'stderr' });

  const manager = await TaskManager.open({
    storage: new TaskStorage({ dataFile: config.dataFile, logger }),
    logger,
    categories: config.categories
  });
  const reminders = new ReminderManager({ logger, checkIntervalMs: config.reminderIntervalMs });
  reminders.updateReminders(manager.getAllTasks());
  manager.subscribe((tasks) => reminders.updateReminders(tasks));

  return await runCli(process.argv.slice(2), {
    manager,
    reminders,
    io: { out: (line) => console.log(line), err: (line) => console.error(line) },
    now: () => new Date(),
    timeZone: config.timeZone,
    waitForExit: () =>
      new Promise<void>((resolve) => {
        // The reminder timer is unref'd; this one holds the process open.
        const keepAlive = setInterval(() => undefined, 60 * 60 * 1000);
        const done = () => {
          clearInterval(keepAlive);
          resolve();
        };
        process.once('SIGINT', done);
        process.once('SIGTERM', done);
      })
  });
}

// Installed as a bin, argv[1] is a symlink to this file.
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      if (err instanceof ConfigError || err instanceof TaskStorageError) {
        console.error(`Error: ${err.message}`);
      } else {
        console.error(err);
      }
      process.exit(1);
    }
  );
}
