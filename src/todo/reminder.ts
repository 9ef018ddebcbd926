import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Task } from './types.js';

export interface Reminder {
  taskId: string;
  taskTitle: string;
  remindAt: string; // ISO-8601
  notified: boolean;
}

export interface ReminderStatus {
  isRunning: boolean;
  totalReminders: number;
  activeReminders: number;
  overdueReminders: number;
  checkIntervalMs: number;
}

export type NotificationCallback = (reminder: Reminder) => void;

export interface ReminderManagerOptions {
  logger: Logger;
  now?: () => Date;
  checkIntervalMs?: number;
  onNotify?: NotificationCallback;
}

export const DEFAULT_CHECK_INTERVAL_MS = 1000;

const HOUR_MS = 60 * 60 * 1000;

export class ReminderManager {
  readonly checkIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private notificationCallback: NotificationCallback | null;
  private reminders: Reminder[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: ReminderManagerOptions) {
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
    this.checkIntervalMs = opts.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.notificationCallback = opts.onNotify ?? null;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  setNotificationCallback(callback: NotificationCallback | null): void {
    this.notificationCallback = callback;
  }

  /** Registers a reminder for the task if its time is still ahead. Replaces any previous one. */
  addReminder(task: Task): boolean {
    if (!task.remindAt) return false;
    if (Date.parse(task.remindAt) <= this.now().getTime()) return false;

    this.removeReminder(task.id);
    this.reminders.push({ taskId: task.id, taskTitle: task.title, remindAt: task.remindAt, notified: false });
    this.logger.debug({ id: task.id, remindAt: task.remindAt }, 'reminder added');
    return true;
  }

  removeReminder(taskId: string): void {
    this.reminders = this.reminders.filter((r) => r.taskId !== taskId);
  }

  /**
   * Rebuilds the registry from the pending tasks that carry a reminder.
   * An entry already waiting for the same time survives even once it is past
   * due, so the next check still fires it.
   */
  updateReminders(tasks: readonly Task[]): void {
    const waiting = new Map(this.reminders.filter((r) => !r.notified).map((r) => [r.taskId, r]));
    this.reminders = [];
    for (const t of tasks) {
      if (t.completed || !t.remindAt) continue;
      const kept = waiting.get(t.id);
      if (kept && kept.remindAt === t.remindAt) {
        this.reminders.push({ ...kept, taskTitle: t.title });
        continue;
      }
      this.addReminder(t);
    }
  }

  getReminders(): Reminder[] {
    return this.reminders.map((r) => ({ ...r }));
  }

  /**
   * Fires every reminder whose time has come. Each one fires once; fired
   * reminders in the past are then dropped from the registry.
   */
  checkDue(now: Date = this.now()): Reminder[] {
    const nowMs = now.getTime();
    const fired: Reminder[] = [];

    for (const r of this.reminders) {
      if (r.notified || Date.parse(r.remindAt) > nowMs) continue;
      r.notified = true;
      const copy = { ...r };
      fired.push(copy);
      this.trigger(copy);
    }

    this.reminders = this.reminders.filter((r) => !r.notified || Date.parse(r.remindAt) > nowMs);
    return fired;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.checkIntervalMs);
    this.timer.unref();
    this.logger.info({ checkIntervalMs: this.checkIntervalMs }, 'reminder monitor started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('reminder monitor stopped');
  }

  getUpcomingReminders(hours = 24): Reminder[] {
    const nowMs = this.now().getTime();
    const cutoff = nowMs + hours * HOUR_MS;
    return this.reminders
      .filter((r) => {
        const at = Date.parse(r.remindAt);
        return !r.notified && at >= nowMs && at <= cutoff;
      })
      .sort((a, b) => Date.parse(a.remindAt) - Date.parse(b.remindAt))
      .map((r) => ({ ...r }));
  }

  getStatus(): ReminderStatus {
    const nowMs = this.now().getTime();
    const active = this.reminders.filter((r) => !r.notified);
    return {
      isRunning: this.isRunning,
      totalReminders: this.reminders.length,
      activeReminders: active.length,
      overdueReminders: active.filter((r) => Date.parse(r.remindAt) < nowMs).length,
      checkIntervalMs: this.checkIntervalMs
    };
  }

  private tick(): void {
    try {
      this.checkDue();
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'reminder check failed');
    }
  }

  private trigger(reminder: Reminder): void {
    this.logger.info({ id: reminder.taskId, remindAt: reminder.remindAt }, `reminder: ${reminder.taskTitle}`);
    if (!this.notificationCallback) return;
    try {
      this.notificationCallback(reminder);
    } catch (err) {
      this.logger.error({ id: reminder.taskId, err: errorMessage(err) }, 'notification callback failed');
    }
  }
}
